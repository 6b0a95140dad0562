import type { SearchResult } from "../providers/interface.ts";

/**
 * Entry of the visible result list.
 */
export type ListItem =
  | {
    readonly kind: "provider";
    readonly result: SearchResult;
    /** Terms of the query that produced the result, sent on activation */
    readonly terms: readonly string[];
  }
  /** One output line of a command-mode subprocess */
  | { readonly kind: "line"; readonly text: string }
  /** Explanatory entry, e.g. when no provider is installed */
  | { readonly kind: "info"; readonly message: string };

export type ResultListener = (items: readonly ListItem[]) => void;

/**
 * The list the user sees. Owned and mutated by the orchestrator only; the
 * front end subscribes to redraw.
 */
export class ResultList {
  #items: ListItem[] = [];
  #listeners = new Set<ResultListener>();

  get items(): readonly ListItem[] {
    return this.#items;
  }

  get length(): number {
    return this.#items.length;
  }

  /** Index of the highlighted entry: the first one, or -1 when empty. */
  get selected(): number {
    return this.#items.length > 0 ? 0 : -1;
  }

  at(index: number): ListItem | undefined {
    return this.#items[index];
  }

  clear(): void {
    if (this.#items.length === 0) return;
    this.#items = [];
    this.#emit();
  }

  append(items: readonly ListItem[]): void {
    if (items.length === 0) return;
    this.#items = [...this.#items, ...items];
    this.#emit();
  }

  replace(items: readonly ListItem[]): void {
    this.#items = [...items];
    this.#emit();
  }

  /** Registers a listener; the returned function unregisters it. */
  subscribe(listener: ResultListener): () => void {
    this.#listeners.add(listener);
    return () => this.#listeners.delete(listener);
  }

  #emit(): void {
    for (const listener of this.#listeners) listener(this.#items);
  }
}
