import type {
  ProviderTransport,
  ResultMeta,
  SearchProvider,
  SearchResult,
} from "./interface.ts";
import { decodeIcon } from "./icon.ts";
import { asString } from "./wire.ts";
import {
  getErrorMessage,
  ProviderError,
  ProviderTimeoutError,
  withTimeout,
} from "../utils/errors.ts";

export const DEFAULT_CALL_TIMEOUT_MS = 3000;

/**
 * Runs the two-call search protocol against one provider.
 */
export class ProviderClient {
  #transport: ProviderTransport;
  #timeoutMs: number;

  constructor(
    transport: ProviderTransport,
    timeoutMs: number = DEFAULT_CALL_TIMEOUT_MS,
  ) {
    this.#transport = transport;
    this.#timeoutMs = timeoutMs;
  }

  /**
   * Asks `provider` for results matching `terms`.
   * Only the first `maxResults` ids are passed on to `GetResultMetas`.
   * Rejects with a {@link ProviderError} or {@link ProviderTimeoutError}.
   */
  async query(
    provider: SearchProvider,
    terms: readonly string[],
    maxResults: number,
  ): Promise<SearchResult[]> {
    const ids = await this.#call(
      provider,
      "GetInitialResultSet",
      () => this.#transport.getInitialResultSet(provider, terms),
    );
    if (ids.length === 0) return [];

    const metas = await this.#call(
      provider,
      "GetResultMetas",
      () => this.#transport.getResultMetas(provider, ids.slice(0, maxResults)),
    );

    const results: SearchResult[] = [];
    for (const meta of metas) {
      const result = buildResult(meta, provider);
      if (result) results.push(result);
    }
    return results;
  }

  async #call<T>(
    provider: SearchProvider,
    name: string,
    send: () => Promise<T>,
  ): Promise<T> {
    try {
      return await withTimeout(
        send(),
        this.#timeoutMs,
        () => new ProviderTimeoutError(provider.busName, name, this.#timeoutMs),
      );
    } catch (err) {
      if (err instanceof ProviderTimeoutError) throw err;
      throw new ProviderError(
        provider.busName,
        `${name} failed: ${getErrorMessage(err)}`,
        { cause: err },
      );
    }
  }
}

/**
 * Builds a result from one metas entry. Entries without an id are dropped.
 */
export function buildResult(
  meta: ResultMeta,
  provider: SearchProvider,
): SearchResult | null {
  const id = asString(meta.get("id"));
  if (id === undefined) return null;

  const icon = meta.get("icon");
  return {
    id,
    name: asString(meta.get("name")) ?? id,
    description: asString(meta.get("description")) ?? "",
    icon: icon && decodeIcon(icon),
    appIcon: provider.appIcon,
    busName: provider.busName,
    objectPath: provider.objectPath,
  };
}
