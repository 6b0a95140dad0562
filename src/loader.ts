import { type Config, ConfigManager } from "./config.ts";
import { DBusTransport } from "./providers/dbus.ts";
import { ProviderRegistry } from "./providers/registry.ts";
import { ProviderClient } from "./providers/client.ts";
import { FanOutExecutor } from "./providers/fanout.ts";
import { Activator } from "./providers/activation.ts";
import type { ProviderTransport } from "./providers/interface.ts";
import { QueryOrchestrator } from "./search/orchestrator.ts";
import { getLogger } from "./utils/logger.ts";

const log = getLogger("loader");

export interface SearchEngine {
  config: Config;
  orchestrator: QueryOrchestrator;
  /** Closes the bus connection and drops pending work */
  shutdown(): void;
}

/**
 * Wires the search engine together from a validated configuration.
 * The transport defaults to the D-Bus session bus.
 */
export function createEngine(
  config: Config,
  transport: ProviderTransport & { disconnect?(): void } = new DBusTransport(),
): SearchEngine {
  const registry = new ProviderRegistry({
    exclusions: config.providerBlacklist,
    providerDirs: config.providerDirs,
  });
  const executor = new FanOutExecutor(
    new ProviderClient(transport, config.callTimeoutMs),
  );
  const orchestrator = new QueryOrchestrator({
    config,
    registry,
    executor,
    activator: new Activator(transport),
  });

  return {
    config,
    orchestrator,
    shutdown() {
      orchestrator.dispose();
      transport.disconnect?.();
    },
  };
}

export async function loadEngine(
  configManager: ConfigManager = new ConfigManager(),
): Promise<SearchEngine> {
  const config = await configManager.read();
  log.debug({ path: configManager.path, config }, "configuration loaded");
  return createEngine(config);
}
