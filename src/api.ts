// CHANGE: Subscription-facing network operations.
// WHY: A failing subscription source contributes no plugins and never aborts the run.

import { debug, warn } from "./logger.js";
import type { JsonRecord, PluginDescriptor } from "./types.js";
import { fetchJson, type RetryPolicy } from "./utils/http.js";
import { isRecord, pickDescriptors } from "./utils/json.js";

function assertSubscriptionBody(value: unknown, url: string): asserts value is JsonRecord {
  if (!isRecord(value)) {
    throw new Error(`Malformed subscription body: ${url}`);
  }
}

/**
 * Pull the plugin list published by one subscription source.
 *
 * @param url - Subscription source URL.
 * @returns Descriptors in source order; empty when the source is unreachable or lists none.
 */
export async function resolveSubscription(url: string, policy?: RetryPolicy): Promise<PluginDescriptor[]> {
  const result = await fetchJson(
    url,
    data => {
      assertSubscriptionBody(data, url);
      return data;
    },
    policy,
    `Subscription ${url}`
  );
  if (!result.ok) {
    return [];
  }
  const plugins = result.value.plugins;
  if (!Array.isArray(plugins)) {
    debug(`Subscription ${url} has no plugins array.`);
    return [];
  }
  return pickDescriptors(plugins, index => {
    warn(`Skipping entry ${index} of ${url}: not a plugin descriptor with a string url.`);
  });
}
