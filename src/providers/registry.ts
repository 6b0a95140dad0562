/**
 * Discovery of installed search providers.
 *
 * Providers install a small INI descriptor, e.g.
 *
 * ```ini
 * [Shell Search Provider]
 * DesktopId=org.gnome.Nautilus.desktop
 * BusName=org.gnome.Nautilus
 * ObjectPath=/org/gnome/Nautilus/SearchProvider
 * Version=2
 * ```
 * @module
 */

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { type SearchProvider, SUPPORTED_PROVIDER_VERSION } from "./interface.ts";
import { resolveAppIcon } from "../desktop.ts";
import { homeDir } from "../utils/paths.ts";
import { getLogger } from "../utils/logger.ts";

const log = getLogger("registry");

export function defaultProviderDirs(): string[] {
  return [
    "/usr/share/gnome-shell/search-providers",
    join(homeDir(), ".local/share/gnome-shell/search-providers"),
  ];
}

export interface ProviderDescriptor {
  busName: string;
  objectPath: string;
  desktopId: string;
}

/**
 * Parses a descriptor file. Returns null unless the file declares every
 * address field and exactly the supported protocol version.
 */
export function parseProviderDescriptor(
  content: string,
): ProviderDescriptor | null {
  let busName: string | undefined;
  let objectPath: string | undefined;
  let desktopId: string | undefined;
  let version: number | undefined;

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    const eq = trimmed.indexOf("=");
    if (eq === -1) continue;
    const key = trimmed.slice(0, eq);
    const value = trimmed.slice(eq + 1).trim();
    switch (key) {
      case "BusName":
        busName = value;
        break;
      case "ObjectPath":
        objectPath = value;
        break;
      case "DesktopId":
        desktopId = value;
        break;
      case "Version":
        version = /^\d+$/.test(value) ? Number(value) : undefined;
        break;
    }
  }

  if (version !== SUPPORTED_PROVIDER_VERSION) return null;
  if (!busName || !objectPath || !desktopId) return null;
  return { busName, objectPath, desktopId };
}

export interface ProviderRegistryOptions {
  /** Desktop ids whose providers are never queried */
  exclusions?: Iterable<string>;
  /** Directories scanned for `*.ini` descriptors */
  providerDirs?: readonly string[];
  /** Directories searched for the providers' .desktop files */
  applicationDirs?: readonly string[];
}

/**
 * Scans the descriptor directories and returns every usable provider.
 * Unreadable, malformed or wrong-version files are skipped.
 */
export async function discoverProviders(
  options: ProviderRegistryOptions = {},
): Promise<SearchProvider[]> {
  const exclusions = new Set(options.exclusions ?? []);
  const providers: SearchProvider[] = [];

  for (const dir of options.providerDirs ?? defaultProviderDirs()) {
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (err) {
      log.debug({ dir, err }, "skipping provider directory");
      continue;
    }

    for (const name of names.filter((n) => n.endsWith(".ini")).sort()) {
      const path = join(dir, name);
      let descriptor: ProviderDescriptor | null;
      try {
        descriptor = parseProviderDescriptor(await readFile(path, "utf8"));
      } catch (err) {
        log.debug({ path, err }, "unreadable provider descriptor");
        continue;
      }
      if (!descriptor) {
        log.debug({ path }, "ignoring unsupported provider descriptor");
        continue;
      }
      if (exclusions.has(descriptor.desktopId)) continue;

      providers.push({
        ...descriptor,
        appIcon: await resolveAppIcon(
          descriptor.desktopId,
          options.applicationDirs,
        ),
      });
    }
  }

  return providers;
}

/**
 * Process-wide provider list. Discovery runs on first use and its outcome is
 * kept for the lifetime of the registry; newly installed providers appear
 * only after a restart.
 */
export class ProviderRegistry {
  #options: ProviderRegistryOptions;
  #providers?: Promise<SearchProvider[]>;

  constructor(options: ProviderRegistryOptions = {}) {
    this.#options = options;
  }

  providers(): Promise<SearchProvider[]> {
    this.#providers ??= discoverProviders(this.#options).then((found) => {
      log.info({ count: found.length }, "discovered search providers");
      return found;
    });
    return this.#providers;
  }
}
