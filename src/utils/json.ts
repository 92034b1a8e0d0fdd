// CHANGE: Type guards for parsed JSON and plugin descriptors.
// WHY: Only entries with a string `url` can be deduplicated and downloaded.

import type { JsonRecord, JsonValue, PluginDescriptor } from "../types.js";

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Narrow a raw JSON entry to a descriptor. Entries without a string `url` are rejected.
 */
export function isDescriptor(value: unknown): value is PluginDescriptor {
  if (!isRecord(value) || typeof value.url !== "string") {
    return false;
  }
  return value.name === undefined || typeof value.name === "string";
}

/**
 * Keep the valid descriptors of a raw list, in order, reporting each rejected index.
 */
export function pickDescriptors(
  entries: readonly JsonValue[],
  onRejected: (index: number) => void
): PluginDescriptor[] {
  const descriptors: PluginDescriptor[] = [];
  entries.forEach((entry, index) => {
    if (isDescriptor(entry)) {
      descriptors.push(entry);
    } else {
      onRejected(index);
    }
  });
  return descriptors;
}
