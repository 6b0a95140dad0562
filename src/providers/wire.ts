import type { WireValue } from "./interface.ts";

export const str = (value: string): WireValue => ({ type: "string", value });

export const array = (...items: WireValue[]): WireValue => ({
  type: "array",
  items,
});

export const tuple = (...fields: WireValue[]): WireValue => ({
  type: "tuple",
  fields,
});

export const dict = (entries: Record<string, WireValue>): WireValue => ({
  type: "dict",
  entries: new Map(Object.entries(entries)),
});

export const boxed = (inner: WireValue): WireValue => ({
  type: "boxed",
  inner,
});

export const other: WireValue = { type: "other" };

/** Plain string carried by `value`, looking through boxes. */
export function asString(value: WireValue | undefined): string | undefined {
  if (!value) return undefined;
  if (value.type === "boxed") return asString(value.inner);
  return value.type === "string" ? value.value : undefined;
}
