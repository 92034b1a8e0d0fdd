// CHANGE: Concurrent per-plugin dedupe, download, rename and mirroring.
// WHY: Every input yields one original-links record; only mirrored plugins reach the primary manifest.

import pLimit from "p-limit";
import { MANIFEST } from "./config.js";
import { debug, describeError, error as logError, info, success, warn } from "./logger.js";
import { RunRegistry } from "./registry.js";
import type { ContentStore } from "./store.js";
import type { PluginDescriptor, PluginOutcome, ProcessResult } from "./types.js";
import { replaceSensitiveTerms, sanitizeFilename } from "./utils/filename.js";
import { fetchText, type RetryPolicy } from "./utils/http.js";
import { mirrorUrl } from "./utils/url.js";

/**
 * @property store - Destination of downloaded payloads.
 * @property cdnBase - CDN base for rewritten URLs; empty selects relative `js/` paths.
 * @property fetchPolicy - Retry policy for each payload download.
 * @property concurrency - Maximum simultaneous plugin tasks; unset or 0 means unbounded.
 * @property registry - Shared run state; a fresh registry is created when omitted.
 */
export interface ProcessorOptions {
  readonly store: ContentStore;
  readonly cdnBase?: string;
  readonly fetchPolicy?: RetryPolicy;
  readonly concurrency?: number;
  readonly registry?: RunRegistry;
}

function displayName(plugin: PluginDescriptor): string {
  return plugin.name ?? plugin.url;
}

async function processPlugin(
  plugin: PluginDescriptor,
  registry: RunRegistry,
  options: ProcessorOptions
): Promise<PluginOutcome> {
  const label = displayName(plugin);
  if (!registry.claimUrl(plugin.url)) {
    warn(`Skipping duplicate plugin ${label}: ${plugin.url} already queued.`);
    return { status: "duplicate", original: { ...plugin } };
  }

  const download = await fetchText(plugin.url, options.fetchPolicy, `Plugin ${label} download`);
  if (!download.ok) {
    return { status: "download-failed", original: { ...plugin }, reason: download.error };
  }

  const resolvedName = registry.reserveName(replaceSensitiveTerms(label));
  const filename = `${sanitizeFilename(resolvedName)}${MANIFEST.SCRIPT_EXTENSION}`;

  let storedAt: string;
  try {
    storedAt = await options.store.write(filename, download.value);
  } catch (cause) {
    const reason = describeError(cause);
    logError(`Failed to store plugin ${resolvedName} as ${filename}: ${reason}`);
    return { status: "store-failed", original: { ...plugin }, reason };
  }

  success(`Plugin ${resolvedName} downloaded: ${storedAt}`);
  return {
    status: "mirrored",
    processed: { ...plugin, name: resolvedName, url: mirrorUrl(filename, options.cdnBase) },
    original: { ...plugin, name: resolvedName },
    filename
  };
}

/**
 * Partition settled outcomes into the two manifest lists.
 */
export function partitionOutcomes(outcomes: readonly PluginOutcome[]): ProcessResult {
  const processed: PluginDescriptor[] = [];
  const originals: PluginDescriptor[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === "mirrored") {
      processed.push(outcome.processed);
    }
    originals.push(outcome.original);
  }
  return { processed, originals, outcomes };
}

/**
 * Mirror every candidate concurrently.
 *
 * All tasks are launched together and awaited as one batch. Output order follows input
 * order, which callers must not rely on.
 *
 * @param plugins - Candidates from the collector, duplicates included.
 */
export async function processPlugins(
  plugins: readonly PluginDescriptor[],
  options: ProcessorOptions
): Promise<ProcessResult> {
  const registry = options.registry ?? new RunRegistry();
  const limit = pLimit(options.concurrency && options.concurrency > 0 ? options.concurrency : Number.POSITIVE_INFINITY);

  const outcomes = await Promise.all(plugins.map(plugin => limit(() => processPlugin(plugin, registry, options))));
  const result = partitionOutcomes(outcomes);

  const tracked = registry.stats();
  debug(`Registry tracked ${tracked.urls} unique URLs and ${tracked.names} distinct names.`);
  const duplicates = outcomes.filter(outcome => outcome.status === "duplicate").length;
  info(
    `Processed ${plugins.length} plugins: ${result.processed.length} mirrored, ${duplicates} duplicates, ${
      plugins.length - result.processed.length - duplicates
    } failed.`
  );
  return result;
}
