// CHANGE: Centralise run configuration with environment overrides.
// WHY: Every stage reads paths, network policy and CDN mode from one place.

import * as dotenv from "dotenv";
import path from "path";

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

const OUT_DIR = process.env.MIRROR_OUT_DIR || "dist";

/**
 * Filesystem locations for the source configuration and generated artefacts.
 */
export const PATHS = {
  SOURCES: process.env.MIRROR_SOURCES_PATH || path.join("data", "origins.json"),
  OUT_DIR,
  JS_DIR: path.join(OUT_DIR, "js"),
  PRIMARY_MANIFEST: path.join(OUT_DIR, "all.json"),
  ORIGINAL_MANIFEST: path.join(OUT_DIR, "plugins.json")
} as const;

/**
 * Network-level configuration for HTTP operations.
 *
 * Invariant: `RETRY_ATTEMPTS` is at least 1. `CONCURRENCY` of 0 means no cap.
 */
export const NET = {
  TIMEOUT: intFromEnv("HTTP_TIMEOUT", 10_000),
  RETRY_ATTEMPTS: Math.max(1, intFromEnv("HTTP_RETRY_ATTEMPTS", 3)),
  RETRY_DELAY: Math.max(0, intFromEnv("HTTP_RETRY_DELAY", 1_000)),
  CONCURRENCY: Math.max(0, intFromEnv("PLUGINS_CONCURRENCY", 0))
} as const;

/**
 * CDN base for rewritten plugin URLs. Empty string disables CDN mode.
 */
export const CDN = {
  URL: process.env.CDN_URL ?? ""
} as const;

export const MANIFEST = {
  VERSION: "0.2.0",
  SCRIPT_EXTENSION: ".js",
  RELATIVE_PREFIX: "js"
} as const;

/**
 * Substrings replaced in display names before collision handling, applied in order.
 */
export const SENSITIVE_TERMS: ReadonlyArray<readonly [string, string]> = [
  ["网易云", "W"],
  ["QQ", "T"]
];
