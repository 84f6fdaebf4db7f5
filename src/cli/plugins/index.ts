import { PluginRegistry } from "../registry";
import type { PluginDescriptor } from "../types";
import { deepscrapePlugin } from "./deepscrape";
import { facebookPlugin } from "./facebook";
import { modelsPlugin } from "./models";
import { versionPlugin } from "./version";
import { webscrapePlugin } from "./webscrape";

export const BUILTIN_PLUGINS: readonly PluginDescriptor[] = [
  deepscrapePlugin,
  webscrapePlugin,
  facebookPlugin,
  modelsPlugin,
  versionPlugin,
];

export function createRegistry(plugins: readonly PluginDescriptor[] = BUILTIN_PLUGINS): PluginRegistry {
  const registry = new PluginRegistry();
  for (const plugin of plugins) {
    registry.register(plugin);
  }
  registry.freeze();
  return registry;
}
