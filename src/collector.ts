// CHANGE: Merge subscription-sourced descriptors with configured standalone plugins.
// WHY: Sources are resolved one after another so log order is stable between runs.

import { resolveSubscription } from "./api.js";
import { info } from "./logger.js";
import type { PluginDescriptor, SourceConfig } from "./types.js";
import type { RetryPolicy } from "./utils/http.js";

/**
 * Build the candidate list: subscription plugins in source order, then `singles` as declared.
 *
 * @param config - Loaded source configuration.
 * @param policy - Retry policy for each subscription request.
 */
export async function collectPlugins(config: SourceConfig, policy?: RetryPolicy): Promise<PluginDescriptor[]> {
  const collected: PluginDescriptor[] = [];

  if (config.sources.length > 0) {
    info(`Fetching plugins from ${config.sources.length} subscription sources...`);
    for (const source of config.sources) {
      const plugins = await resolveSubscription(source, policy);
      if (plugins.length > 0) {
        info(`Fetched ${plugins.length} plugins from ${source}`);
        collected.push(...plugins);
      }
    }
  }

  if (config.singles.length > 0) {
    info(`Adding ${config.singles.length} standalone plugins...`);
    collected.push(...config.singles);
  }

  return collected;
}
