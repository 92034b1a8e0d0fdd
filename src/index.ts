#!/usr/bin/env node
// CHANGE: Delegate execution to the modular CLI runner.
// WHY: Importing the package must not parse process arguments.

import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { runMirror, type RunSettings } from "./pipeline.js";
export { processPlugins, type ProcessorOptions } from "./processor.js";
export { collectPlugins } from "./collector.js";
export { resolveSubscription } from "./api.js";
export { writeManifest } from "./manifest.js";
export type { PluginDescriptor, PluginManifest, RunSummary, SourceConfig } from "./types.js";
