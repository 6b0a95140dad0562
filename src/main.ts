/**
 * Terminal front end for the seekr search engine.
 * Every keystroke edits the query line; the result list redraws as provider
 * batches arrive. Enter activates the first entry, Escape or Ctrl+C quits.
 * @module
 */

import { emitKeypressEvents, type Key } from "node:readline";
import { fileURLToPath } from "node:url";
import { loadEngine, type SearchEngine } from "./loader.ts";
import type { SearchResult } from "./providers/interface.ts";
import type { ListItem } from "./search/results.ts";
import { ConfigurationError } from "./utils/errors.ts";
import logger from "./utils/logger.ts";

const CLEAR_SCREEN = "\x1b[2J\x1b[H";
const PROMPT = "> ";

export function iconLabel(result: SearchResult): string {
  const icon = result.icon;
  if (icon?.kind === "themed") return icon.name;
  if (icon?.kind === "file") return icon.path;
  return result.appIcon || "system-search";
}

export function formatItem(item: ListItem): string {
  switch (item.kind) {
    case "provider": {
      const { result } = item;
      const description = result.description ? `  ${result.description}` : "";
      return `[${iconLabel(result)}] ${result.name}${description}`;
    }
    case "line":
      return item.text;
    case "info":
      return `(${item.message})`;
  }
}

class LauncherApp {
  #engine: SearchEngine;
  #query = "";
  #rows: number;
  #done?: () => void;

  constructor(engine: SearchEngine) {
    this.#engine = engine;
    this.#rows = process.stdout.rows || 24;
    engine.orchestrator.results.subscribe(() => this.#render());
  }

  run(): Promise<void> {
    emitKeypressEvents(process.stdin);
    if (process.stdin.isTTY) process.stdin.setRawMode(true);
    process.stdin.on("keypress", (text: string | undefined, key: Key) => {
      this.#onKey(text, key);
    });
    this.#render();
    return new Promise((resolve) => {
      this.#done = resolve;
    });
  }

  #onKey(text: string | undefined, key: Key) {
    if ((key.ctrl && key.name === "c") || key.name === "escape") {
      this.#quit();
      return;
    }

    if (key.name === "return") {
      this.#engine.orchestrator.activate();
      this.#query = "";
    } else if (key.name === "backspace") {
      this.#query = this.#query.slice(0, -1);
    } else if (text && !key.ctrl && !key.meta && text >= " ") {
      this.#query += text;
    } else {
      return;
    }

    this.#engine.orchestrator.setQuery(this.#query);
    this.#render();
  }

  #render() {
    const { items, selected } = this.#engine.orchestrator.results;
    const lines = items.slice(0, this.#rows - 2).map((item, i) =>
      `${i === selected ? "›" : " "} ${formatItem(item)}`
    );
    process.stdout.write(
      `${CLEAR_SCREEN}${PROMPT}${this.#query}\n${lines.join("\n")}`,
    );
  }

  #quit() {
    if (process.stdin.isTTY) process.stdin.setRawMode(false);
    process.stdin.pause();
    process.stdout.write("\n");
    this.#engine.shutdown();
    this.#done?.();
  }
}

async function main() {
  let engine: SearchEngine;
  try {
    engine = await loadEngine();
  } catch (e) {
    if (e instanceof ConfigurationError) {
      logger.fatal({ err: e }, e.message);
      process.exitCode = 1;
      return;
    }
    throw e;
  }
  await new LauncherApp(engine).run();
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  await main();
}
