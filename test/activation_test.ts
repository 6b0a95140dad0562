import { expect, test, vi } from "vitest";
import { Activator, type LaunchCommand } from "../src/providers/activation.ts";
import type { SearchResult } from "../src/providers/interface.ts";
import { FakeTransport } from "./fakes.ts";

const existing = new Set(["/home/user/notes.md", "/home/user/plan.txt"]);
const exists = (path: string) => existing.has(path);

const result: SearchResult = {
  id: "doc-7",
  name: "Plan",
  description: "",
  appIcon: "",
  busName: "org.example.Docs",
  objectPath: "/org/example/Docs/SearchProvider",
};

test("activate - provider results go back to their provider", () => {
  const transport = new FakeTransport();
  const activator = new Activator(transport, { now: () => 1_234_567_890 });

  activator.activate({ kind: "provider", result, terms: ["plan"] });

  expect(transport.calls).toEqual([{
    busName: "org.example.Docs",
    method: "ActivateResult",
    args: ["doc-7", ["plan"], 1_234_567],
  }]);
});

test("activate - a failing ActivateResult is contained", async () => {
  const transport = new FakeTransport();
  const failing = vi.spyOn(transport, "activateResult").mockRejectedValue(
    new Error("org.freedesktop.DBus.Error.NoReply"),
  );
  const activator = new Activator(transport);

  activator.activate({ kind: "provider", result, terms: [] });
  await Promise.resolve();

  expect(failing).toHaveBeenCalledOnce();
});

test("activate - file:line output opens the editor at that line", () => {
  const launch = vi.fn<LaunchCommand>();
  const activator = new Activator(new FakeTransport(), {
    launch,
    exists,
    editor: "vim",
  });

  activator.activate({ kind: "line", text: "/home/user/notes.md:12:- [ ] buy" });

  expect(launch).toHaveBeenCalledWith("vim", ["+12", "/home/user/notes.md"]);
});

test("activate - xdg-open gets no line number", () => {
  const launch = vi.fn<LaunchCommand>();
  const activator = new Activator(new FakeTransport(), {
    launch,
    exists,
    editor: "xdg-open",
  });

  activator.activate({ kind: "line", text: "/home/user/plan.txt:3" });

  expect(launch).toHaveBeenCalledWith("xdg-open", ["/home/user/plan.txt"]);
});

test("activate - a plain path is opened", () => {
  const launch = vi.fn<LaunchCommand>();
  const activator = new Activator(new FakeTransport(), {
    launch,
    exists,
    editor: "vim",
  });

  activator.activate({ kind: "line", text: "/home/user/plan.txt" });

  expect(launch).toHaveBeenCalledWith("xdg-open", ["/home/user/plan.txt"]);
});

test("activate - unknown lines and notices do nothing", () => {
  const launch = vi.fn<LaunchCommand>();
  const transport = new FakeTransport();
  const activator = new Activator(transport, { launch, exists, editor: "vim" });

  activator.activate({ kind: "line", text: "/gone/file.txt:4:text" });
  activator.activate({ kind: "info", message: "nothing here" });

  expect(launch).not.toHaveBeenCalled();
  expect(transport.calls).toEqual([]);
});
