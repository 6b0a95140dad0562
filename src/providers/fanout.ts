import type { SearchProvider, SearchResult } from "./interface.ts";
import type { ProviderClient } from "./client.ts";
import { getLogger } from "../utils/logger.ts";

const log = getLogger("fanout");

export type DeliverBatch = (results: SearchResult[]) => void;

export interface FanOutSummary {
  /** Providers whose non-empty batch was handed to `deliver` */
  delivered: number;
  /** Providers that answered with nothing */
  empty: number;
  /** Providers that errored or timed out */
  failed: number;
}

/**
 * Queries every provider at once and streams each provider's batch to
 * `deliver` as soon as it arrives, in completion order.
 */
export class FanOutExecutor {
  #client: Pick<ProviderClient, "query">;

  constructor(client: Pick<ProviderClient, "query">) {
    this.#client = client;
  }

  /**
   * Resolves once every provider has answered, failed or timed out.
   * Never rejects: a failing provider is logged and contributes nothing.
   */
  async run(
    providers: readonly SearchProvider[],
    terms: readonly string[],
    maxPerProvider: number,
    deliver: DeliverBatch,
  ): Promise<FanOutSummary> {
    const summary: FanOutSummary = { delivered: 0, empty: 0, failed: 0 };

    await Promise.all(providers.map(async (provider) => {
      let results: SearchResult[];
      try {
        results = await this.#client.query(provider, terms, maxPerProvider);
      } catch (err) {
        summary.failed++;
        log.warn({ err, busName: provider.busName }, "provider query failed");
        return;
      }

      if (results.length === 0) {
        summary.empty++;
        return;
      }

      summary.delivered++;
      try {
        deliver(results);
      } catch (err) {
        log.error(
          { err, busName: provider.busName },
          "result delivery failed",
        );
      }
    }));

    log.debug({ ...summary, terms }, "fan-out finished");
    return summary;
  }
}
