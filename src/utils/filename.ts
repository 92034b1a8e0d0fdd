// CHANGE: Derive display names and content-store filenames from descriptor names.
// WHY: Stored filenames must be filesystem-safe and never empty.

import { SENSITIVE_TERMS } from "../config.js";

export const FALLBACK_FILENAME = "plugin";
export const MAX_FILENAME_LENGTH = 50;

// Letters, digits, CJK unified ideographs, underscore and whitespace survive.
const DISALLOWED = /[^\p{L}\p{N}_\u4e00-\u9fff\s]/gu;

/**
 * Replace sensitive substrings of a display name with their neutral tokens.
 */
export function replaceSensitiveTerms(
  name: string,
  terms: ReadonlyArray<readonly [string, string]> = SENSITIVE_TERMS
): string {
  return terms.reduce((current, [term, replacement]) => current.split(term).join(replacement), name);
}

/**
 * Reduce a resolved name to a filename stem.
 *
 * Disallowed characters are stripped, spaces become underscores and the result is cut to
 * 50 code points. An empty result becomes `plugin`.
 */
export function sanitizeFilename(name: string): string {
  const cleaned = name.replace(DISALLOWED, "").replace(/ /g, "_");
  const truncated = Array.from(cleaned).slice(0, MAX_FILENAME_LENGTH).join("");
  return truncated === "" ? FALLBACK_FILENAME : truncated;
}
