/**
 * Shared types for the search provider side of the launcher.
 * This module defines the contract between the search engine and the
 * applications that answer its queries.
 * @module
 */

/** D-Bus interface every supported provider implements. */
export const SEARCH_PROVIDER_IFACE = "org.gnome.Shell.SearchProvider2";

/** The only descriptor version the launcher speaks. */
export const SUPPORTED_PROVIDER_VERSION = 2;

/**
 * A search provider discovered from its descriptor file.
 */
export interface SearchProvider {
  /** Well-known bus name, e.g. "org.gnome.Nautilus" */
  readonly busName: string;
  /** Object path of the provider, e.g. "/org/gnome/Nautilus/SearchProvider" */
  readonly objectPath: string;
  /**
   * Icon name from the provider application's .desktop file.
   * Empty when the application ships none.
   */
  readonly appIcon: string;
  /** Desktop file id, also the key used by the exclusion list */
  readonly desktopId: string;
}

/**
 * Icon attached to a single result.
 */
export type IconDescriptor =
  | { readonly kind: "themed"; readonly name: string }
  | { readonly kind: "file"; readonly path: string };

/**
 * One result returned by a provider.
 */
export interface SearchResult {
  /** Provider-specific identifier, sent back on activation */
  readonly id: string;
  readonly name: string;
  /** May be empty */
  readonly description: string;
  readonly icon?: IconDescriptor;
  /** Fallback icon of the provider application */
  readonly appIcon: string;
  readonly busName: string;
  readonly objectPath: string;
}

/**
 * A self-describing value as it arrives from a provider, with the transport's
 * own representation stripped away.
 */
export type WireValue =
  | { readonly type: "string"; readonly value: string }
  | { readonly type: "array"; readonly items: readonly WireValue[] }
  | { readonly type: "tuple"; readonly fields: readonly WireValue[] }
  | { readonly type: "dict"; readonly entries: ReadonlyMap<string, WireValue> }
  | { readonly type: "boxed"; readonly inner: WireValue }
  | { readonly type: "other" };

/** Field map of one entry of a `GetResultMetas` answer. */
export type ResultMeta = ReadonlyMap<string, WireValue>;

/**
 * The three calls of the provider protocol. The D-Bus implementation lives in
 * `dbus.ts`; tests substitute an in-process fake.
 */
export interface ProviderTransport {
  getInitialResultSet(
    provider: SearchProvider,
    terms: readonly string[],
  ): Promise<string[]>;
  getResultMetas(
    provider: SearchProvider,
    ids: readonly string[],
  ): Promise<ResultMeta[]>;
  /**
   * @param timestamp Seconds since the epoch
   */
  activateResult(
    provider: Pick<SearchProvider, "busName" | "objectPath">,
    id: string,
    terms: readonly string[],
    timestamp: number,
  ): Promise<void>;
}
