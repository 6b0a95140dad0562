import { homedir } from "node:os";
import { join } from "node:path";

export function homeDir(): string {
  return process.env.HOME || homedir();
}

/**
 * Expands a leading `~` or `~/` to the user's home directory.
 */
export function expandHome(path: string): string {
  if (path === "~") return homeDir();
  if (path.startsWith("~/")) return join(homeDir(), path.slice(2));
  return path;
}
