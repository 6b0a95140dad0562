/**
 * D-Bus side of the provider protocol.
 * This module owns the shared session bus connection and turns the values
 * dbus-next unmarshals into the transport-neutral {@link WireValue} tree.
 * @module
 */

import dbus from "dbus-next";
import type { MessageBus } from "dbus-next";
import {
  type ProviderTransport,
  type ResultMeta,
  SEARCH_PROVIDER_IFACE,
  type SearchProvider,
  type WireValue,
} from "./interface.ts";
import { array, boxed, other, str, tuple } from "./wire.ts";
import { getLogger } from "../utils/logger.ts";

const log = getLogger("dbus");

const STRING_TYPES = new Set(["s", "o", "g"]);

/**
 * Splits a signature into its complete types: `"sa{sv}(ss)"` becomes
 * `["s", "a{sv}", "(ss)"]`.
 */
export function splitSignature(signature: string): string[] {
  const types: string[] = [];
  let i = 0;
  while (i < signature.length) {
    const end = completeTypeEnd(signature, i);
    types.push(signature.slice(i, end));
    i = end;
  }
  return types;
}

function completeTypeEnd(signature: string, start: number): number {
  const c = signature[start];
  if (c === "a") return completeTypeEnd(signature, start + 1);
  if (c !== "(" && c !== "{") {
    if (c === undefined) {
      throw new Error(`Truncated D-Bus signature "${signature}"`);
    }
    return start + 1;
  }
  const close = c === "(" ? ")" : "}";
  let i = start + 1;
  while (signature[i] !== close) {
    if (i >= signature.length) {
      throw new Error(`Unbalanced D-Bus signature "${signature}"`);
    }
    i = completeTypeEnd(signature, i);
  }
  return i + 1;
}

/**
 * Converts an unmarshalled dbus-next value of type `signature`.
 * Variants carry their own signature, so nested payloads of any shape are
 * converted faithfully.
 */
export function fromDBus(value: unknown, signature: string): WireValue {
  if (value instanceof dbus.Variant) {
    const inner: unknown = value.value;
    return boxed(fromDBus(inner, value.signature));
  }
  if (STRING_TYPES.has(signature)) {
    return typeof value === "string" ? str(value) : other;
  }
  if (signature.startsWith("a{")) {
    const [, valueType = "v"] = splitSignature(signature.slice(2, -1));
    if (value instanceof Map) {
      const entries = new Map<string, WireValue>();
      for (const [k, v] of value) entries.set(String(k), fromDBus(v, valueType));
      return { type: "dict", entries };
    }
    if (typeof value === "object" && value !== null && !Array.isArray(value)) {
      const entries = new Map<string, WireValue>();
      for (const [k, v] of Object.entries(value)) {
        entries.set(k, fromDBus(v, valueType));
      }
      return { type: "dict", entries };
    }
    return other;
  }
  if (signature.startsWith("a")) {
    const itemType = signature.slice(1);
    return Array.isArray(value)
      ? array(...value.map((item: unknown) => fromDBus(item, itemType)))
      : other;
  }
  if (signature.startsWith("(")) {
    const fieldTypes = splitSignature(signature.slice(1, -1));
    return Array.isArray(value)
      ? tuple(
        ...value.map((field: unknown, i) => fromDBus(field, fieldTypes[i] ?? "v")),
      )
      : other;
  }
  return other;
}

/**
 * {@link ProviderTransport} over the D-Bus session bus.
 *
 * The connection is opened on first use and shared by every concurrent call;
 * it is only used to issue calls, never reconfigured.
 */
export class DBusTransport implements ProviderTransport {
  #bus?: MessageBus;

  async getInitialResultSet(
    provider: SearchProvider,
    terms: readonly string[],
  ): Promise<string[]> {
    const [ids] = await this.#call(provider, "GetInitialResultSet", "as", [
      [...terms],
    ]);
    return Array.isArray(ids)
      ? ids.filter((id): id is string => typeof id === "string")
      : [];
  }

  async getResultMetas(
    provider: SearchProvider,
    ids: readonly string[],
  ): Promise<ResultMeta[]> {
    const [metas] = await this.#call(provider, "GetResultMetas", "as", [
      [...ids],
    ]);
    if (!Array.isArray(metas)) return [];
    const converted: ResultMeta[] = [];
    for (const meta of metas) {
      const value = fromDBus(meta, "a{sv}");
      if (value.type === "dict") converted.push(value.entries);
    }
    return converted;
  }

  async activateResult(
    provider: Pick<SearchProvider, "busName" | "objectPath">,
    id: string,
    terms: readonly string[],
    timestamp: number,
  ): Promise<void> {
    await this.#call(provider, "ActivateResult", "sasu", [
      id,
      [...terms],
      timestamp,
    ]);
  }

  disconnect(): void {
    this.#bus?.disconnect();
    this.#bus = undefined;
  }

  #connect(): MessageBus {
    if (this.#bus) return this.#bus;
    const bus = dbus.sessionBus();
    bus.on("error", (err: unknown) => {
      log.error({ err }, "session bus connection failed");
      // Drop the broken connection so the next query reconnects.
      if (this.#bus === bus) this.#bus = undefined;
    });
    this.#bus = bus;
    return bus;
  }

  async #call(
    provider: Pick<SearchProvider, "busName" | "objectPath">,
    member: string,
    signature: string,
    body: unknown[],
  ): Promise<unknown[]> {
    const reply = await this.#connect().call(
      new dbus.Message({
        destination: provider.busName,
        path: provider.objectPath,
        interface: SEARCH_PROVIDER_IFACE,
        member,
        signature,
        body,
      }),
    );
    const replyBody: unknown[] = reply?.body ?? [];
    return replyBody;
  }
}
