// CHANGE: Orchestrate one mirroring run from store reset to manifest output.
// WHY: Only a store reset failure aborts the run; all other failures degrade to partial output.

import { CDN, MANIFEST, NET, PATHS } from "./config.js";
import { collectPlugins } from "./collector.js";
import { describeError, error as logError, info, success, warn } from "./logger.js";
import { buildManifest, writeManifest } from "./manifest.js";
import { processPlugins } from "./processor.js";
import { loadSourceConfig } from "./sources.js";
import { ContentStore } from "./store.js";
import type { RunSummary } from "./types.js";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "./utils/http.js";

/**
 * Locations and policies of a run. Defaults come from `config.ts`.
 */
export interface RunSettings {
  readonly sourcesPath: string;
  readonly jsDir: string;
  readonly primaryManifestPath: string;
  readonly originalManifestPath: string;
  readonly cdnBase: string;
  readonly version: string;
  readonly fetchPolicy: RetryPolicy;
  readonly concurrency: number;
}

export const DEFAULT_RUN_SETTINGS: RunSettings = {
  sourcesPath: PATHS.SOURCES,
  jsDir: PATHS.JS_DIR,
  primaryManifestPath: PATHS.PRIMARY_MANIFEST,
  originalManifestPath: PATHS.ORIGINAL_MANIFEST,
  cdnBase: CDN.URL,
  version: MANIFEST.VERSION,
  fetchPolicy: DEFAULT_RETRY_POLICY,
  concurrency: NET.CONCURRENCY
};

function summary(status: RunSummary["status"], fields: Partial<Omit<RunSummary, "status">> = {}): RunSummary {
  return { status, collected: 0, processed: 0, originals: 0, duplicates: 0, failed: 0, ...fields };
}

/**
 * Execute a full run.
 *
 * @returns Status and counters; `completed` only when both manifests were written.
 */
export async function runMirror(overrides: Partial<RunSettings> = {}): Promise<RunSummary> {
  const settings: RunSettings = { ...DEFAULT_RUN_SETTINGS, ...overrides };
  const cdnEnabled = settings.cdnBase.trim() !== "";

  info("Starting plugin mirror run...");
  info(`CDN mode: ${cdnEnabled ? "enabled" : "disabled"}`);
  if (cdnEnabled) {
    info(`CDN base: ${settings.cdnBase}`);
  }

  const store = new ContentStore(settings.jsDir);
  try {
    await store.reset();
  } catch (cause) {
    logError(`Failed to reset ${settings.jsDir}: ${describeError(cause)}`);
    return summary("aborted");
  }

  const config = await loadSourceConfig(settings.sourcesPath);
  const candidates = await collectPlugins(config, settings.fetchPolicy);
  if (candidates.length === 0) {
    warn("No plugins collected.");
    return summary("empty");
  }

  info(`Downloading and verifying ${candidates.length} plugins...`);
  const result = await processPlugins(candidates, {
    store,
    cdnBase: settings.cdnBase,
    fetchPolicy: settings.fetchPolicy,
    concurrency: settings.concurrency
  });
  const duplicates = result.outcomes.filter(outcome => outcome.status === "duplicate").length;
  const counters = {
    collected: candidates.length,
    processed: result.processed.length,
    originals: result.originals.length,
    duplicates,
    failed: result.outcomes.length - result.processed.length - duplicates
  };

  if (result.processed.length === 0) {
    logError("No valid plugins.");
    return summary("empty", counters);
  }

  info(`Verified ${result.processed.length} plugins`);
  info(`Collected ${result.originals.length} original plugin entries`);

  const primaryWritten = await writeManifest(
    settings.primaryManifestPath,
    buildManifest(result.processed, settings.version)
  );
  const originalWritten = await writeManifest(
    settings.originalManifestPath,
    buildManifest(result.originals, settings.version)
  );

  if (primaryWritten && originalWritten) {
    success(`Run complete: ${result.processed.length} plugins updated`);
    return summary("completed", counters);
  }
  warn("Run finished with manifest write failures.");
  return summary("incomplete", counters);
}
