/**
 * Decoding of the `icon` field of provider results.
 *
 * Providers serialize a GIcon as a tagged pair, either
 * `("themed-icon", {"names": <["folder", "folder-generic"]>})` or
 * `("file-icon", {"file": <"file:///path/to/thumb.png">})`, wrapped in any
 * number of variants. Some send a bare icon name instead. Decoding is best
 * effort: anything unrecognized means the result has no icon of its own.
 * @module
 */

import type { IconDescriptor, WireValue } from "./interface.ts";

const THEMED_TAG = "themed-icon";
const FILE_TAG = "file-icon";
const FILE_URI_PREFIX = "file://";

export function decodeIcon(value: WireValue): IconDescriptor | undefined {
  switch (value.type) {
    case "boxed":
      return decodeIcon(value.inner);
    case "tuple": {
      const [tag, payload] = value.fields;
      if (payload && tag?.type === "string") {
        if (tag.value === THEMED_TAG) return extractThemed(payload);
        if (tag.value === FILE_TAG) return extractFile(payload);
      }
      // Unknown tag: the first field that decodes on its own wins.
      for (const field of value.fields) {
        const icon = decodeIcon(field);
        if (icon) return icon;
      }
      return undefined;
    }
    case "string":
      return isIconName(value.value)
        ? { kind: "themed", name: value.value }
        : undefined;
    case "array":
    case "dict":
    case "other":
      return undefined;
    default:
      return assertNever(value);
  }
}

function extractThemed(payload: WireValue): IconDescriptor | undefined {
  const value = unbox(payload);
  let name: string | undefined;
  if (value.type === "dict") {
    const names = value.entries.get("names");
    name = names && firstName(names);
    if (name === undefined) {
      for (const [key, entry] of value.entries) {
        if (key === "names" || unbox(entry).type !== "array") continue;
        name = firstName(entry);
        if (name !== undefined) break;
      }
    }
  } else if (value.type === "array") {
    name = firstName(value);
  }
  return name === undefined ? undefined : { kind: "themed", name };
}

function extractFile(payload: WireValue): IconDescriptor | undefined {
  const path = findPath(payload);
  return path === undefined ? undefined : { kind: "file", path };
}

/** First non-empty string of a (possibly boxed) string or string array. */
function firstName(value: WireValue): string | undefined {
  switch (value.type) {
    case "boxed":
      return firstName(value.inner);
    case "string":
      return value.value === "" ? undefined : value.value;
    case "array":
      for (const item of value.items) {
        const inner = unbox(item);
        if (inner.type === "string" && inner.value !== "") return inner.value;
        if (inner.type === "array") {
          const name = firstName(inner);
          if (name !== undefined) return name;
        }
      }
      return undefined;
    default:
      return undefined;
  }
}

function findPath(value: WireValue): string | undefined {
  switch (value.type) {
    case "boxed":
      return findPath(value.inner);
    case "string":
      if (value.value === "") return undefined;
      return value.value.startsWith(FILE_URI_PREFIX)
        ? value.value.slice(FILE_URI_PREFIX.length)
        : value.value;
    case "dict": {
      const file = value.entries.get("file");
      const preferred = file && findPath(file);
      if (preferred !== undefined) return preferred;
      for (const entry of value.entries.values()) {
        const path = findPath(entry);
        if (path !== undefined) return path;
      }
      return undefined;
    }
    default:
      return undefined;
  }
}

function unbox(value: WireValue): WireValue {
  return value.type === "boxed" ? unbox(value.inner) : value;
}

function isIconName(text: string): boolean {
  return text !== "" && !text.includes(" ");
}

function assertNever(value: never): never {
  throw new Error(`Unhandled wire value: ${JSON.stringify(value)}`);
}
