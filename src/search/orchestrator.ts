/**
 * Turns the stream of edits to the search entry into provider queries and
 * command runs whose output lands in a single {@link ResultList}.
 *
 * Everything here runs on the event loop that owns the list. Superseded work
 * is never aborted: each unit of work carries the generation it was started
 * under, and its output is dropped at delivery if the counter has moved on.
 * @module
 */

import type { SearchProvider, SearchResult } from "../providers/interface.ts";
import type { ProviderRegistry } from "../providers/registry.ts";
import type { FanOutExecutor } from "../providers/fanout.ts";
import type { Activator } from "../providers/activation.ts";
import type { Config } from "../config.ts";
import { GenerationController } from "./generation.ts";
import { DebounceScheduler } from "./debounce.ts";
import { type ListItem, ResultList } from "./results.ts";
import {
  parseColonCommand,
  PROVIDER_COMMAND,
  type RunCommand,
  runCommand,
} from "./commands.ts";
import { getLogger } from "../utils/logger.ts";

const log = getLogger("orchestrator");

export const NO_PROVIDERS_MESSAGE = "No GNOME Shell search providers found";

export type OrchestratorState =
  | "idle"
  | "debouncing"
  | "fanning-out"
  | "running-command";

/** One provider query, fixed when its debounce timer fires. */
export interface SearchQuery {
  readonly text: string;
  readonly terms: readonly string[];
  readonly maxResults: number;
  readonly generation: number;
}

export type OrchestratorConfig = Pick<
  Config,
  | "maxResults"
  | "providerDebounceMs"
  | "commandDebounceMs"
  | "clearDelayMs"
  | "commands"
>;

export interface OrchestratorOptions {
  config: OrchestratorConfig;
  registry: Pick<ProviderRegistry, "providers">;
  executor: Pick<FanOutExecutor, "run">;
  activator?: Pick<Activator, "activate">;
  runCommand?: RunCommand;
  results?: ResultList;
  generations?: GenerationController;
  scheduler?: DebounceScheduler;
}

export function splitTerms(text: string): string[] {
  return text.split(/\s+/).filter((term) => term !== "");
}

export class QueryOrchestrator {
  readonly results: ResultList;
  readonly generations: GenerationController;

  #config: OrchestratorConfig;
  #registry: Pick<ProviderRegistry, "providers">;
  #executor: Pick<FanOutExecutor, "run">;
  #activator?: Pick<Activator, "activate">;
  #runCommand: RunCommand;
  #scheduler: DebounceScheduler;
  #clearTimer: ReturnType<typeof setTimeout> | null = null;
  #state: OrchestratorState = "idle";

  constructor(options: OrchestratorOptions) {
    this.#config = options.config;
    this.#registry = options.registry;
    this.#executor = options.executor;
    this.#activator = options.activator;
    this.#runCommand = options.runCommand ?? runCommand;
    this.results = options.results ?? new ResultList();
    this.generations = options.generations ?? new GenerationController();
    this.#scheduler = options.scheduler ?? new DebounceScheduler();
  }

  get state(): OrchestratorState {
    return this.#state;
  }

  /**
   * Handles a change of the search text. Returns immediately; results
   * arrive in {@link results} later.
   */
  setQuery(text: string): void {
    const command = parseColonCommand(text);
    if (!command) {
      this.#searchProviders(text);
      return;
    }
    if (command.name === PROVIDER_COMMAND) {
      this.#searchProviders(command.arg);
      return;
    }
    const template = this.#config.commands[command.name];
    if (template === undefined) {
      // Not a command (yet): make sure nothing older shows up under it.
      this.#reset();
      return;
    }
    this.#scheduleCommand(template, command.arg);
  }

  /** Activates the visible entry at `index`, without waiting for it. */
  activate(index: number = this.results.selected): void {
    const item = this.results.at(index);
    if (item) this.#activator?.activate(item);
  }

  /** Stops timers and orphans all outstanding work. */
  dispose(): void {
    this.#scheduler.cancel();
    this.#cancelClearTimer();
    this.generations.bump();
    this.#state = "idle";
  }

  #reset(): void {
    this.generations.bump();
    this.#scheduler.cancel();
    this.#cancelClearTimer();
    this.results.clear();
    this.#state = "idle";
  }

  #searchProviders(text: string): void {
    const terms = splitTerms(text);
    if (terms.length === 0) {
      this.#reset();
      return;
    }

    const generation = this.generations.bump();
    const maxResults = this.#config.maxResults;
    this.#state = "debouncing";
    this.#scheduler.schedule(
      this.#config.providerDebounceMs,
      () =>
        this.#runProviderSearch({
          text: text.trim(),
          terms,
          maxResults,
          generation,
        }),
    );
  }

  async #runProviderSearch(query: SearchQuery): Promise<void> {
    if (!this.generations.isCurrent(query.generation)) return;
    this.#state = "fanning-out";

    const providers = await this.#registry.providers();
    if (!this.generations.isCurrent(query.generation)) return;

    if (providers.length === 0) {
      this.results.replace([{ kind: "info", message: NO_PROVIDERS_MESSAGE }]);
      this.#state = "idle";
      return;
    }

    await this.#fanOut(query, providers);
    if (this.generations.isCurrent(query.generation)) this.#state = "idle";
  }

  async #fanOut(
    query: SearchQuery,
    providers: readonly SearchProvider[],
  ): Promise<void> {
    let firstBatch = true;

    // Old results stay up briefly, so fast providers replace them without
    // the list flashing empty in between.
    this.#armClearTimer(query.generation);

    const deliver = (batch: SearchResult[]) => {
      if (!this.generations.isCurrent(query.generation)) return;
      this.#cancelClearTimer();
      const items = batch.map((result): ListItem => ({
        kind: "provider",
        result,
        terms: query.terms,
      }));
      if (firstBatch) {
        firstBatch = false;
        this.results.replace(items);
      } else {
        this.results.append(items);
      }
    };

    const summary = await this.#executor.run(
      providers,
      query.terms,
      query.maxResults,
      deliver,
    );
    log.debug({ generation: query.generation, ...summary }, "query settled");
  }

  #armClearTimer(generation: number): void {
    this.#cancelClearTimer();
    this.#clearTimer = setTimeout(() => {
      this.#clearTimer = null;
      if (this.generations.isCurrent(generation)) this.results.clear();
    }, this.#config.clearDelayMs);
  }

  #cancelClearTimer(): void {
    if (this.#clearTimer !== null) {
      clearTimeout(this.#clearTimer);
      this.#clearTimer = null;
    }
  }

  #scheduleCommand(template: string, arg: string): void {
    if (arg === "") {
      this.#reset();
      return;
    }

    const generation = this.generations.bump();
    const maxLines = this.#config.maxResults;
    this.#state = "debouncing";
    this.#scheduler.schedule(this.#config.commandDebounceMs, async () => {
      if (!this.generations.isCurrent(generation)) return;
      this.#state = "running-command";

      let lines: string[] = [];
      try {
        lines = await this.#runCommand(template, arg, maxLines);
      } catch (err) {
        log.error({ err, template }, "command failed");
      }

      if (!this.generations.isCurrent(generation)) return;
      this.#cancelClearTimer();
      this.results.replace(
        lines.map((text): ListItem => ({ kind: "line", text })),
      );
      this.#state = "idle";
    });
  }
}
