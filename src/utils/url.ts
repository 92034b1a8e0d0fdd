// CHANGE: Build the published location of a mirrored plugin script.
// WHY: CDN mode and relative mode must yield the same filename under different bases.

import { MANIFEST } from "../config.js";

/**
 * Location published in the primary manifest for a mirrored file.
 *
 * @param filename - Stored filename including extension.
 * @param cdnBase - CDN base URL; empty or undefined selects the relative `js/` path.
 */
export function mirrorUrl(filename: string, cdnBase?: string): string {
  const base = cdnBase?.trim() ?? "";
  if (base === "") {
    return `${MANIFEST.RELATIVE_PREFIX}/${filename}`;
  }
  return `${base.replace(/\/+$/, "")}/${filename}`;
}
