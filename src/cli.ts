// CHANGE: CLI orchestration exposed as functions for the entrypoint and tests.
// WHY: Commands can be built and inspected without touching the network or the filesystem.

import { Command, InvalidArgumentError } from "commander";
import path from "path";
import { collectPlugins } from "./collector.js";
import { PATHS } from "./config.js";
import { describeError, error as logError, info, setLogLevel } from "./logger.js";
import { runMirror, type RunSettings } from "./pipeline.js";
import { loadSourceConfig } from "./sources.js";

interface RunOptions {
  readonly sources?: string;
  readonly cdn?: string;
  readonly concurrency?: number;
  readonly logLevel?: string;
  readonly out?: string;
}

const PREVIEW_SIZE = 20;

function parseConcurrency(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Concurrency must be a non-negative integer.");
  }
  return parsed;
}

/**
 * Translate command-line options into run setting overrides.
 */
export function settingsFromOptions(options: RunOptions): Partial<RunSettings> {
  const overrides: { -readonly [K in keyof RunSettings]?: RunSettings[K] } = {};
  if (options.sources !== undefined) {
    overrides.sourcesPath = options.sources;
  }
  if (options.cdn !== undefined) {
    overrides.cdnBase = options.cdn;
  }
  if (options.concurrency !== undefined) {
    overrides.concurrency = options.concurrency;
  }
  if (options.out !== undefined) {
    overrides.jsDir = path.join(options.out, "js");
    overrides.primaryManifestPath = path.join(options.out, "all.json");
    overrides.originalManifestPath = path.join(options.out, "plugins.json");
  }
  return overrides;
}

/**
 * Run mode entry point: full mirroring run. Aborted and incomplete runs set exit code 1.
 */
export async function runAction(options: RunOptions): Promise<void> {
  if (options.logLevel) {
    setLogLevel(options.logLevel);
  }
  const result = await runMirror(settingsFromOptions(options));
  info(
    `Run status: ${result.status} (collected ${result.collected}, mirrored ${result.processed}, duplicates ${result.duplicates}, failed ${result.failed})`
  );
  if (result.status === "aborted" || result.status === "incomplete") {
    process.exitCode = 1;
  }
}

/**
 * Dry-run mode entry point: list collected candidates without downloading or writing.
 */
export async function dryRunAction(options: RunOptions): Promise<void> {
  if (options.logLevel) {
    setLogLevel(options.logLevel);
  }
  const config = await loadSourceConfig(options.sources ?? PATHS.SOURCES);
  const candidates = await collectPlugins(config);
  info(`Dry-run: listing first ${PREVIEW_SIZE} collected plugins.`);
  const preview = candidates.slice(0, PREVIEW_SIZE).map((plugin, idx) => ({
    index: idx + 1,
    name: plugin.name ?? "",
    url: plugin.url
  }));
  console.table(preview);
  const uniqueUrls = new Set(candidates.map(plugin => plugin.url)).size;
  info(`Collected plugins: ${candidates.length}; unique URLs: ${uniqueUrls}`);
}

/**
 * Construct commander program with configured commands.
 */
export function buildProgram(): Command {
  const program = new Command();
  program.name("plugin-mirror").description("Plugin subscription aggregator and mirror").version("0.2.0");

  const mirrorCommand = program.command("mirror").description("Mirror operations");
  mirrorCommand
    .command("run")
    .description("Collect, download and republish all plugins")
    .option("-s, --sources <path>", "source configuration file", PATHS.SOURCES)
    .option("-o, --out <dir>", "output directory")
    .option("--cdn <url>", "CDN base for rewritten plugin URLs")
    .option("-c, --concurrency <n>", "maximum simultaneous plugin downloads (0 = unbounded)", parseConcurrency)
    .option("--log-level <level>", "debug, info, warn or error")
    .action(async (options: RunOptions) => runAction(options));
  mirrorCommand
    .command("dry-run")
    .description("List collected plugins without downloading")
    .option("-s, --sources <path>", "source configuration file", PATHS.SOURCES)
    .option("--log-level <level>", "debug, info, warn or error")
    .action(async (options: RunOptions) => dryRunAction(options));

  return program;
}

/**
 * Execute CLI with provided argv array.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trim())
      })
      .parseAsync([...argv]);
  } catch (cause) {
    logError(`CLI failed: ${describeError(cause)}`);
    process.exitCode = 1;
  }
}
