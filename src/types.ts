// CHANGE: Domain models for the aggregation and mirroring pipeline.
// WHY: Descriptors are opaque JSON records; only `url` and `name` are interpreted.

/**
 * JSON-like value type used for permissive properties without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

export type JsonRecord = { readonly [key: string]: JsonValue };

/**
 * Plugin entry as published by a subscription source or listed in `singles`.
 *
 * @property url - Location of the plugin script payload.
 * @property name - Display name; the URL stands in when absent.
 *
 * Fields other than `url` and `name` are carried through every output untouched.
 */
export interface PluginDescriptor {
  readonly url: string;
  readonly name?: string;
  readonly [key: string]: JsonValue;
}

/**
 * Run input loaded from the source configuration file.
 */
export interface SourceConfig {
  readonly sources: readonly string[];
  readonly singles: readonly PluginDescriptor[];
}

/**
 * Serialized shape of both published manifests.
 */
export interface PluginManifest {
  readonly desc: string;
  readonly plugins: readonly PluginDescriptor[];
}

/**
 * Per-descriptor result of the processor.
 *
 * `mirrored` is the only variant that contributes to the primary manifest;
 * every variant contributes `original` to the original-links manifest.
 */
export type PluginOutcome =
  | {
      readonly status: "mirrored";
      readonly processed: PluginDescriptor;
      readonly original: PluginDescriptor;
      readonly filename: string;
    }
  | { readonly status: "duplicate"; readonly original: PluginDescriptor }
  | { readonly status: "download-failed"; readonly original: PluginDescriptor; readonly reason: string }
  | { readonly status: "store-failed"; readonly original: PluginDescriptor; readonly reason: string };

export interface ProcessResult {
  readonly processed: PluginDescriptor[];
  readonly originals: PluginDescriptor[];
  readonly outcomes: readonly PluginOutcome[];
}

export type RunStatus = "completed" | "incomplete" | "empty" | "aborted";

export interface RunSummary {
  readonly status: RunStatus;
  readonly collected: number;
  readonly processed: number;
  readonly originals: number;
  readonly duplicates: number;
  readonly failed: number;
}
