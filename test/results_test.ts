import { expect, test, vi } from "vitest";
import {
  type ListItem,
  ResultList,
  type ResultListener,
} from "../src/search/results.ts";
import { formatItem } from "../src/main.ts";
import type { SearchResult } from "../src/providers/interface.ts";

const line = (text: string): ListItem => ({ kind: "line", text });

test("ResultList - replace, append and clear notify listeners", () => {
  const list = new ResultList();
  const listener = vi.fn<ResultListener>();
  list.subscribe(listener);

  list.replace([line("a")]);
  list.append([line("b"), line("c")]);
  list.append([]);
  list.clear();
  list.clear();

  expect(listener.mock.calls.map(([items]) => items.length)).toEqual([1, 3, 0]);
});

test("ResultList - selects the first entry when there is one", () => {
  const list = new ResultList();
  expect(list.selected).toBe(-1);
  expect(list.at(list.selected)).toBeUndefined();

  list.replace([line("a"), line("b")]);
  expect(list.selected).toBe(0);
  expect(list.at(list.selected)).toEqual(line("a"));
});

test("ResultList - unsubscribe stops notifications", () => {
  const list = new ResultList();
  const listener = vi.fn<ResultListener>();
  const unsubscribe = list.subscribe(listener);

  unsubscribe();
  list.replace([line("a")]);

  expect(listener).not.toHaveBeenCalled();
});

const result: SearchResult = {
  id: "1",
  name: "Budget.ods",
  description: "~/Documents",
  appIcon: "org.example.Files",
  busName: "org.example.Files",
  objectPath: "/org/example/Files/SearchProvider",
};

test("formatItem - provider results show their icon and description", () => {
  expect(formatItem({ kind: "provider", result, terms: [] })).toBe(
    "[org.example.Files] Budget.ods  ~/Documents",
  );
  expect(
    formatItem({
      kind: "provider",
      result: {
        ...result,
        description: "",
        icon: { kind: "file", path: "/tmp/thumb.png" },
      },
      terms: [],
    }),
  ).toBe("[/tmp/thumb.png] Budget.ods");
  expect(
    formatItem({
      kind: "provider",
      result: { ...result, appIcon: "", description: "" },
      terms: [],
    }),
  ).toBe("[system-search] Budget.ods");
});

test("formatItem - lines and notices", () => {
  expect(formatItem(line("/home/user/a.txt:1:x"))).toBe("/home/user/a.txt:1:x");
  expect(formatItem({ kind: "info", message: "No providers" })).toBe(
    "(No providers)",
  );
});
