import { describe, expect, test } from "vitest";
import { decodeIcon } from "../src/providers/icon.ts";
import {
  array,
  boxed,
  dict,
  other,
  str,
  tuple,
} from "../src/providers/wire.ts";

describe("decodeIcon", () => {
  test("takes the first name of a themed icon", () => {
    const payload = tuple(
      str("themed-icon"),
      dict({ names: boxed(array(str("folder"), str("folder-generic"))) }),
    );
    expect(decodeIcon(payload)).toEqual({ kind: "themed", name: "folder" });
  });

  test("unwraps nested boxes before inspecting", () => {
    const payload = boxed(boxed(tuple(
      str("themed-icon"),
      boxed(dict({ names: array(str("text-x-generic")) })),
    )));
    expect(decodeIcon(payload)).toEqual({
      kind: "themed",
      name: "text-x-generic",
    });
  });

  test("skips empty names", () => {
    const payload = tuple(
      str("themed-icon"),
      dict({ names: array(str(""), boxed(str("audio-x-generic"))) }),
    );
    expect(decodeIcon(payload)).toEqual({
      kind: "themed",
      name: "audio-x-generic",
    });
  });

  test("falls back to another array of names when 'names' is missing", () => {
    const payload = tuple(
      str("themed-icon"),
      dict({
        "use-default-fallbacks": str("true"),
        aliases: boxed(array(str("image-x-generic"))),
      }),
    );
    expect(decodeIcon(payload)).toEqual({
      kind: "themed",
      name: "image-x-generic",
    });
  });

  test("strips the file:// prefix of a file icon", () => {
    const payload = tuple(
      str("file-icon"),
      dict({ file: boxed(str("file:///tmp/x.png")) }),
    );
    expect(decodeIcon(payload)).toEqual({ kind: "file", path: "/tmp/x.png" });
  });

  test("uses the first string of a file icon without a 'file' key", () => {
    const payload = tuple(
      str("file-icon"),
      dict({ uri: boxed(str("/home/user/thumb.jpg")) }),
    );
    expect(decodeIcon(payload)).toEqual({
      kind: "file",
      path: "/home/user/thumb.jpg",
    });
  });

  test("treats a bare name as a themed icon", () => {
    expect(decodeIcon(boxed(str("org.gnome.Nautilus")))).toEqual({
      kind: "themed",
      name: "org.gnome.Nautilus",
    });
  });

  test("rejects bare strings that cannot be icon names", () => {
    expect(decodeIcon(str(""))).toBeUndefined();
    expect(decodeIcon(str("not an icon"))).toBeUndefined();
  });

  test("returns no icon for unrecognized shapes", () => {
    expect(decodeIcon(other)).toBeUndefined();
    expect(decodeIcon(array(str("folder")))).toBeUndefined();
    expect(decodeIcon(dict({ names: array(str("folder")) }))).toBeUndefined();
    expect(decodeIcon(tuple(str("themed-icon"), dict({})))).toBeUndefined();
    expect(decodeIcon(tuple(str("file-icon"), other))).toBeUndefined();
  });

  test("walks the fields of a tuple with an unknown tag", () => {
    const payload = tuple(str("two words"), boxed(str("emblem-default")));
    expect(decodeIcon(payload)).toEqual({
      kind: "themed",
      name: "emblem-default",
    });
  });
});
