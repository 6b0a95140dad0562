import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import { defaultProviderDirs } from "./providers/registry.ts";
import { DEFAULT_CALL_TIMEOUT_MS } from "./providers/client.ts";
import {
  DEFAULT_COMMAND_DEBOUNCE_MS,
  DEFAULT_PROVIDER_DEBOUNCE_MS,
} from "./search/debounce.ts";
import { ConfigurationError } from "./utils/errors.ts";
import { expandHome, homeDir } from "./utils/paths.ts";

/** Delay before a still-empty result list is cleared for a new query */
export const DEFAULT_CLEAR_DELAY_MS = 25;
export const DEFAULT_MAX_RESULTS = 64;

export const DEFAULT_COMMANDS: Record<string, string> = {
  f: 'plocate -i -- "$1" 2>/dev/null | grep "^$HOME/" | head -20',
  fg: 'rg --with-filename --line-number --no-heading -S "$1" ~ 2>/dev/null | head -20',
};

const millis = z.number().int().nonnegative();

export const configSchema = z.object({
  /** Cap on results shown per provider and on command output lines */
  maxResults: z.number().int().positive().default(DEFAULT_MAX_RESULTS),
  providerDebounceMs: millis.default(DEFAULT_PROVIDER_DEBOUNCE_MS),
  commandDebounceMs: millis.default(DEFAULT_COMMAND_DEBOUNCE_MS),
  clearDelayMs: millis.default(DEFAULT_CLEAR_DELAY_MS),
  callTimeoutMs: z.number().int().positive().default(DEFAULT_CALL_TIMEOUT_MS),
  /** Desktop ids of providers that are never queried */
  providerBlacklist: z.array(z.string()).default([]),
  providerDirs: z.array(z.string()).default(defaultProviderDirs)
    .transform((dirs) => dirs.map(expandHome)),
  /** Colon-command templates; the argument is passed as `$1` */
  commands: z.record(z.string()).default(() => ({ ...DEFAULT_COMMANDS })),
});

export type Config = z.output<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

export function defaultConfigPath(): string {
  if (process.env.SEEKR_CONFIG) return process.env.SEEKR_CONFIG;
  const base = process.env.XDG_CONFIG_HOME || join(homeDir(), ".config");
  return join(base, "seekr", "config.json");
}

export class ConfigManager {
  #configPath: string;

  constructor(configPath: string = defaultConfigPath()) {
    this.#configPath = configPath;
  }

  get path(): string {
    return this.#configPath;
  }

  /**
   * Reads and validates the configuration. A missing file yields the
   * defaults; a file that fails to parse or validate throws.
   */
  async read(): Promise<Config> {
    let text: string;
    try {
      text = await readFile(this.#configPath, "utf8");
    } catch (e) {
      if (isNotFound(e)) return configSchema.parse({});
      throw new ConfigurationError(`Cannot read ${this.#configPath}`, {
        cause: e,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (e) {
      throw new ConfigurationError(`${this.#configPath} is not valid JSON`, {
        cause: e,
      });
    }

    const parsed = configSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) =>
        `${issue.path.join(".") || "(root)"}: ${issue.message}`
      );
      throw new ConfigurationError(
        `Invalid configuration in ${this.#configPath}: ${issues.join("; ")}`,
        { cause: parsed.error, context: { issues } },
      );
    }
    return parsed.data;
  }

  async write(config: ConfigInput): Promise<void> {
    await mkdir(dirname(this.#configPath), { recursive: true });
    await writeFile(this.#configPath, JSON.stringify(config, null, 2) + "\n");
  }
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}
