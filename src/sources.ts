// CHANGE: Load the subscription list and standalone plugins from disk.
// WHY: An unreadable configuration degrades to the empty one; the run then has nothing to do.

import fs from "fs-extra";
import { debug, describeError, error as logError, warn } from "./logger.js";
import type { JsonValue, SourceConfig } from "./types.js";
import { isRecord, pickDescriptors } from "./utils/json.js";

export const EMPTY_SOURCE_CONFIG: SourceConfig = { sources: [], singles: [] };

/**
 * Read the subscription list and standalone plugins.
 *
 * A missing or unreadable file, or one that is not a JSON object, yields the empty
 * configuration. Malformed entries are dropped individually.
 *
 * @param filePath - Location of the JSON source configuration.
 */
export async function loadSourceConfig(filePath: string): Promise<SourceConfig> {
  let raw: unknown;
  try {
    raw = await fs.readJson(filePath, { encoding: "utf8" });
  } catch (cause) {
    logError(`Failed to read source configuration ${filePath}: ${describeError(cause)}`);
    return EMPTY_SOURCE_CONFIG;
  }
  if (!isRecord(raw)) {
    logError(`Source configuration ${filePath} is not a JSON object.`);
    return EMPTY_SOURCE_CONFIG;
  }

  const listedSources: readonly JsonValue[] = Array.isArray(raw.sources) ? raw.sources : [];
  const sources = listedSources.filter((entry): entry is string => typeof entry === "string" && entry.trim() !== "");
  if (sources.length !== listedSources.length) {
    warn(`Ignored ${listedSources.length - sources.length} non-URL entries in sources of ${filePath}.`);
  }

  const singles = Array.isArray(raw.singles)
    ? pickDescriptors(raw.singles, index => {
        warn(`Skipping singles[${index}] of ${filePath}: not a plugin descriptor with a string url.`);
      })
    : [];

  debug(`Loaded ${sources.length} sources and ${singles.length} singles from ${filePath}.`);
  return { sources, singles };
}
