import { getLogger } from "../utils/logger.ts";

const log = getLogger("debounce");

/** Delay before querying search providers */
export const DEFAULT_PROVIDER_DEBOUNCE_MS = 120;
/** Delay before running command-mode subprocesses */
export const DEFAULT_COMMAND_DEBOUNCE_MS = 300;

/**
 * Holds at most one pending action. Scheduling replaces whatever was
 * pending; an action runs at most once.
 */
export class DebounceScheduler {
  #handle: ReturnType<typeof setTimeout> | null = null;

  get pending(): boolean {
    return this.#handle !== null;
  }

  schedule(delayMs: number, action: () => void | Promise<void>): void {
    this.cancel();
    this.#handle = setTimeout(() => {
      // Cleared first so the action can schedule a successor.
      this.#handle = null;
      try {
        const done = action();
        if (done instanceof Promise) {
          done.catch((err: unknown) => {
            log.error({ err }, "debounced action failed");
          });
        }
      } catch (err) {
        log.error({ err }, "debounced action failed");
      }
    }, delayMs);
  }

  cancel(): void {
    if (this.#handle !== null) {
      clearTimeout(this.#handle);
      this.#handle = null;
    }
  }
}
