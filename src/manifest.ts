// CHANGE: Serialize the primary and original-links manifests.
// WHY: Callers aggregate two independent boolean outcomes; this boundary never throws.

import fs from "fs-extra";
import path from "path";
import { MANIFEST } from "./config.js";
import { describeError, error as logError, success } from "./logger.js";
import type { PluginDescriptor, PluginManifest } from "./types.js";

/**
 * Wrap a plugin list in the published document shape.
 */
export function buildManifest(plugins: readonly PluginDescriptor[], version: string = MANIFEST.VERSION): PluginManifest {
  return { desc: version, plugins };
}

// A `\/` escape: an odd run of backslashes before the slash. Even runs are escaped backslashes.
const ESCAPED_SLASH = /(?<!\\)((?:\\\\)*)\\\//g;

/**
 * Render a manifest as indented JSON with literal forward slashes.
 */
export function serializeManifest(manifest: PluginManifest): string {
  return JSON.stringify(manifest, null, 2).replace(ESCAPED_SLASH, "$1/");
}

/**
 * Persist a manifest by writing a temporary sibling and renaming it over the target.
 *
 * @returns true when the manifest is in place.
 */
export async function writeManifest(filePath: string, manifest: PluginManifest): Promise<boolean> {
  const tempPath = `${filePath}.tmp`;
  try {
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeFile(tempPath, serializeManifest(manifest), { encoding: "utf8" });
    await fs.move(tempPath, filePath, { overwrite: true });
    success(`Saved ${manifest.plugins.length} plugins to ${filePath}`);
    return true;
  } catch (cause) {
    logError(`Failed to save ${filePath}: ${describeError(cause)}`);
    await fs.remove(tempPath).catch((cleanupError: unknown) => {
      logError(`Failed to remove ${tempPath}: ${describeError(cleanupError)}`);
    });
    return false;
  }
}
