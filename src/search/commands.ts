/**
 * Colon commands: `:s <terms>` searches the providers, `:<name> <arg>` runs
 * the shell template configured under `<name>` and lists its output lines.
 * @module
 */

import { type ChildProcess, spawn } from "node:child_process";
import { CommandError } from "../utils/errors.ts";
import { getLogger } from "../utils/logger.ts";

const log = getLogger("commands");

/** Command name reserved for provider search */
export const PROVIDER_COMMAND = "s";

export interface ColonCommand {
  name: string;
  /** Everything after the first space, trimmed */
  arg: string;
}

/**
 * Splits `":name arg"` into its parts. Returns null for text that does not
 * start with a colon.
 */
export function parseColonCommand(query: string): ColonCommand | null {
  if (!query.startsWith(":")) return null;
  const rest = query.slice(1);
  const space = rest.indexOf(" ");
  if (space === -1) return { name: rest, arg: "" };
  return { name: rest.slice(0, space), arg: rest.slice(space + 1).trim() };
}

export type RunCommand = (
  template: string,
  arg: string,
  maxLines: number,
) => Promise<string[]>;

/**
 * Runs `sh -c <template> -- <arg>`, so the template sees the argument as
 * `$1`, and resolves with at most `maxLines` non-empty output lines.
 * Once enough lines have been read the output pipe is closed and the whole
 * process group is terminated, so pipeline stages started by the shell stop
 * too. A non-zero exit status is not an error: tools like grep exit 1 when
 * nothing matches.
 */
export const runCommand: RunCommand = (template, arg, maxLines) => {
  return new Promise((resolve, reject) => {
    const child = spawn("sh", ["-c", template, "--", arg], {
      stdio: ["ignore", "pipe", "ignore"],
      // Own process group, so the pipeline can be signalled as a whole.
      detached: true,
    });
    const lines: string[] = [];
    let partial = "";
    let done = false;

    const finish = () => {
      if (done) return;
      done = true;
      child.stdout.destroy();
      if (partial !== "" && lines.length < maxLines) lines.push(partial);
      resolve(lines);
    };

    child.stdout.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      if (done) return;
      const parts = (partial + chunk).split("\n");
      partial = parts.pop() ?? "";
      for (const line of parts) {
        if (line === "") continue;
        lines.push(line);
        if (lines.length >= maxLines) {
          partial = "";
          stopProcessGroup(child);
          finish();
          return;
        }
      }
    });
    child.on("error", (err) => {
      if (done) return;
      done = true;
      child.stdout.destroy();
      reject(new CommandError(`Failed to run command: ${template}`, { cause: err }));
    });
    child.on("close", finish);
  });
};

function stopProcessGroup(child: ChildProcess): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, "SIGTERM");
  } catch (err) {
    // ESRCH: the group already exited.
    if (!isNoSuchProcess(err)) {
      log.warn({ err, pid: child.pid }, "failed to stop command");
    }
  }
}

function isNoSuchProcess(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ESRCH";
}
