import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, expect, test } from "vitest";
import {
  discoverProviders,
  parseProviderDescriptor,
  ProviderRegistry,
} from "../src/providers/registry.ts";

let root: string;
let providerDir: string;
let userProviderDir: string;
let appDir: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "seekr-registry-"));
  providerDir = join(root, "search-providers");
  userProviderDir = join(root, "user-search-providers");
  appDir = join(root, "applications");
  await mkdir(providerDir);
  await mkdir(userProviderDir);
  await mkdir(appDir);
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

function descriptor(name: string, version = "2"): string {
  return `[Shell Search Provider]
DesktopId=org.example.${name}.desktop
BusName=org.example.${name}
ObjectPath=/org/example/${name}/SearchProvider
Version=${version}
`;
}

test("parseProviderDescriptor - standard descriptor", () => {
  expect(parseProviderDescriptor(descriptor("Files"))).toEqual({
    busName: "org.example.Files",
    objectPath: "/org/example/Files/SearchProvider",
    desktopId: "org.example.Files.desktop",
  });
});

test("parseProviderDescriptor - rejects other protocol versions", () => {
  expect(parseProviderDescriptor(descriptor("Files", "1"))).toBeNull();
  expect(parseProviderDescriptor(descriptor("Files", "two"))).toBeNull();
  expect(parseProviderDescriptor(descriptor("Files", "2.0"))).toBeNull();
});

test("parseProviderDescriptor - requires every address field", () => {
  const content = `[Shell Search Provider]
BusName=org.example.Files
Version=2
`;
  expect(parseProviderDescriptor(content)).toBeNull();
  expect(parseProviderDescriptor("")).toBeNull();
});

test("discoverProviders - reads .ini files in name order", async () => {
  await writeFile(join(providerDir, "b.ini"), descriptor("Beta"));
  await writeFile(join(providerDir, "a.ini"), descriptor("Alpha"));
  await writeFile(join(providerDir, "notes.txt"), descriptor("Ignored"));
  await writeFile(join(userProviderDir, "c.ini"), descriptor("Gamma"));

  const providers = await discoverProviders({
    providerDirs: [providerDir, userProviderDir],
    applicationDirs: [appDir],
  });

  expect(providers.map((p) => p.busName)).toEqual([
    "org.example.Alpha",
    "org.example.Beta",
    "org.example.Gamma",
  ]);
});

test("discoverProviders - skips unsupported files and missing directories", async () => {
  await writeFile(join(providerDir, "old.ini"), descriptor("Old", "1"));
  await writeFile(join(providerDir, "broken.ini"), "not a descriptor");
  await mkdir(join(providerDir, "dir.ini"));
  await writeFile(join(providerDir, "good.ini"), descriptor("Good"));

  const providers = await discoverProviders({
    providerDirs: [join(root, "missing"), providerDir],
    applicationDirs: [appDir],
  });

  expect(providers.map((p) => p.busName)).toEqual(["org.example.Good"]);
});

test("discoverProviders - drops excluded desktop ids", async () => {
  await writeFile(join(providerDir, "a.ini"), descriptor("Alpha"));
  await writeFile(join(providerDir, "b.ini"), descriptor("Beta"));

  const providers = await discoverProviders({
    exclusions: ["org.example.Alpha.desktop"],
    providerDirs: [providerDir],
    applicationDirs: [appDir],
  });

  expect(providers.map((p) => p.busName)).toEqual(["org.example.Beta"]);
});

test("discoverProviders - resolves the application icon", async () => {
  await writeFile(join(providerDir, "a.ini"), descriptor("Alpha"));
  await writeFile(join(providerDir, "b.ini"), descriptor("Beta"));
  await writeFile(
    join(appDir, "org.example.Alpha.desktop"),
    "[Desktop Entry]\nName=Alpha\nIcon=alpha-icon\n",
  );

  const providers = await discoverProviders({
    providerDirs: [providerDir],
    applicationDirs: [appDir],
  });

  expect(providers).toEqual([
    {
      busName: "org.example.Alpha",
      objectPath: "/org/example/Alpha/SearchProvider",
      desktopId: "org.example.Alpha.desktop",
      appIcon: "alpha-icon",
    },
    {
      busName: "org.example.Beta",
      objectPath: "/org/example/Beta/SearchProvider",
      desktopId: "org.example.Beta.desktop",
      appIcon: "",
    },
  ]);
});

test("ProviderRegistry - discovers once", async () => {
  await writeFile(join(providerDir, "a.ini"), descriptor("Alpha"));
  const registry = new ProviderRegistry({
    providerDirs: [providerDir],
    applicationDirs: [appDir],
  });

  const first = await registry.providers();
  await writeFile(join(providerDir, "b.ini"), descriptor("Beta"));
  const second = await registry.providers();

  expect(second).toBe(first);
  expect(second.map((p) => p.busName)).toEqual(["org.example.Alpha"]);
});
