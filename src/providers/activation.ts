/**
 * Acting on a selected entry. Every activation is fire-and-forget: nothing
 * here is awaited by the input path, and failures are only logged.
 * @module
 */

import { spawn } from "node:child_process";
import { existsSync } from "node:fs";
import type { ProviderTransport } from "./interface.ts";
import type { ListItem } from "../search/results.ts";
import { getLogger } from "../utils/logger.ts";

const log = getLogger("activation");

/** "path/to/file:42" or "path/to/file:42:matched text" as printed by grep and rg */
const FILE_LINE_RE = /^(.+?):(\d+)(?::|$)/;

export type LaunchCommand = (command: string, args: string[]) => void;

/** Starts `command` detached from the launcher, ignoring its output. */
export const launchDetached: LaunchCommand = (command, args) => {
  const child = spawn(command, args, { stdio: "ignore", detached: true });
  child.on("error", (err) => {
    log.error({ err, command }, "failed to launch");
  });
  child.unref();
};

export interface ActivatorOptions {
  launch?: LaunchCommand;
  /** Reports whether a path exists; defaults to the filesystem */
  exists?: (path: string) => boolean;
  editor?: string;
  /** Clock used for the activation timestamp, in milliseconds */
  now?: () => number;
}

export class Activator {
  #transport: ProviderTransport;
  #launch: LaunchCommand;
  #exists: (path: string) => boolean;
  #editor: string;
  #now: () => number;

  constructor(transport: ProviderTransport, options: ActivatorOptions = {}) {
    this.#transport = transport;
    this.#launch = options.launch ?? launchDetached;
    this.#exists = options.exists ?? existsSync;
    this.#editor = options.editor ?? process.env.EDITOR ?? "xdg-open";
    this.#now = options.now ?? Date.now;
  }

  activate(item: ListItem): void {
    switch (item.kind) {
      case "provider": {
        const { result, terms } = item;
        const timestamp = Math.floor(this.#now() / 1000);
        this.#transport
          .activateResult(result, result.id, terms, timestamp)
          .catch((err: unknown) => {
            log.error(
              { err, busName: result.busName, id: result.id },
              "ActivateResult failed",
            );
          });
        return;
      }
      case "line":
        this.#openLine(item.text);
        return;
      case "info":
        return;
    }
  }

  /**
   * Opens `file:line` output in the editor at that line, or a plain path
   * with xdg-open. Anything else is left alone.
   */
  #openLine(line: string): void {
    const match = FILE_LINE_RE.exec(line);
    if (match) {
      const [, file = "", lineNumber = ""] = match;
      if (this.#exists(file)) {
        const args = this.#editor === "xdg-open"
          ? [file]
          : [`+${lineNumber}`, file];
        log.info({ file, line: lineNumber }, "opening file at line");
        this.#launch(this.#editor, args);
        return;
      }
    }

    if (this.#exists(line)) {
      log.info({ path: line }, "opening file");
      this.#launch("xdg-open", [line]);
    } else {
      log.debug({ line }, "nothing to open");
    }
  }
}
