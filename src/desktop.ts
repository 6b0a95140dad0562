import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { homeDir } from "./utils/paths.ts";

export function defaultApplicationDirs(): string[] {
  return [
    "/usr/share/applications",
    join(homeDir(), ".local/share/applications"),
    "/usr/local/share/applications",
  ];
}

/**
 * Reads `Icon=` from the `[Desktop Entry]` group of a .desktop file.
 * Returns "" when the group or the key is missing.
 */
export function parseDesktopIcon(content: string): string {
  let isDesktopEntry = false;

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (trimmed === "[Desktop Entry]") {
      isDesktopEntry = true;
      continue;
    }

    if (!isDesktopEntry) continue;
    // Stop if we hit another section
    if (trimmed.startsWith("[")) break;

    if (trimmed.startsWith("Icon=")) {
      const icon = trimmed.substring(5).trim();
      if (icon) return icon;
    }
  }

  return "";
}

/**
 * Looks up the icon of the application owning `desktopId`
 * (e.g. "org.gnome.Nautilus.desktop"; the extension is optional).
 * Directories are tried in order and the first file naming an icon wins.
 * Returns "" when nothing is found.
 */
export async function resolveAppIcon(
  desktopId: string,
  dirs: readonly string[] = defaultApplicationDirs(),
): Promise<string> {
  const filename = desktopId.endsWith(".desktop")
    ? desktopId
    : `${desktopId}.desktop`;

  for (const dir of dirs) {
    const path = join(dir, filename);
    let content: string;
    try {
      content = await readFile(path, "utf8");
    } catch {
      continue;
    }
    const icon = parseDesktopIcon(content);
    if (icon) return icon;
  }
  return "";
}
