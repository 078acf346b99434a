/**
 * CLI command dispatcher
 */

import { resolve } from "node:path";
import {
  EMPTY_MAPPINGS,
  formatDiagnostic,
  map,
  type NameMappings,
  unwrapOrElse,
} from "@wrapgen/frontend";
import {
  CONFIG_FILE_NAME,
  DEFAULT_DUMP_FILE,
  findDefaultFile,
  loadConfig,
  resolveConfig,
} from "../config.js";
import { detectCommand } from "../commands/detect.js";
import {
  formatExclusionReport,
  generateCommand,
} from "../commands/generate.js";
import { readDump } from "../dump-file.js";
import { loadMappings } from "../mappings.js";
import type { CliOptions, ResolvedConfig, WrapgenConfig } from "../types.js";
import {
  EXIT_DUMP_UNREADABLE,
  EXIT_SUCCESS,
  EXIT_USAGE,
  EXIT_WRITE_FAILED,
  VERSION,
} from "./constants.js";
import { showHelp } from "./help.js";
import { createLog, type Log } from "./log.js";
import { parseArgs } from "./parser.js";

/**
 * wrapgen.json contents, or the built-in defaults when there is none or
 * it cannot be used.
 */
const fileConfigFor = (
  options: CliOptions,
  dumpFile: string | undefined,
  cwd: string,
  log: Log
): WrapgenConfig => {
  const dumpPath = resolve(cwd, dumpFile ?? DEFAULT_DUMP_FILE);
  const configPath =
    options.config !== undefined
      ? resolve(cwd, options.config)
      : findDefaultFile(CONFIG_FILE_NAME, dumpPath, cwd);
  if (configPath === undefined) {
    log.detail(`No ${CONFIG_FILE_NAME} found - using defaults`);
    return {};
  }

  const loaded = map(loadConfig(configPath), (config) => {
    log.detail(`Loaded configuration from ${configPath}`);
    return config;
  });
  return unwrapOrElse(loaded, (diagnostics): WrapgenConfig => {
    diagnostics.forEach(log.warn);
    log.info("Using default configuration");
    return {};
  });
};

const mappingsFor = (config: ResolvedConfig, log: Log): NameMappings => {
  const { mappingsPath } = config;
  if (mappingsPath === undefined) {
    log.info("No mappings file found - using obfuscated names");
    return EMPTY_MAPPINGS;
  }
  const loaded = map(loadMappings(mappingsPath), ({ mappings, warnings }) => {
    warnings.forEach(log.warn);
    log.detail(`Loaded ${mappings.entries.size} mappings from ${mappingsPath}`);
    return mappings;
  });
  return unwrapOrElse(loaded, (diagnostics) => {
    diagnostics.forEach(log.warn);
    log.info("Using obfuscated names");
    return EMPTY_MAPPINGS;
  });
};

/**
 * Main CLI entry point. Returns the process exit code.
 */
export const runCli = (
  args: readonly string[],
  cwd: string = process.cwd()
): number => {
  const parsed = parseArgs(args);
  const log = createLog(parsed.options);

  if (parsed.usageError !== undefined) {
    log.error(parsed.usageError);
    console.error("Run 'wrapgen --help' for usage information");
    return EXIT_USAGE;
  }

  if (parsed.command === "version") {
    console.log(`wrapgen v${VERSION}`);
    return EXIT_SUCCESS;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_SUCCESS;
  }

  if (parsed.command !== "generate" && parsed.command !== "detect") {
    log.error(`Unknown command '${parsed.command}'`);
    console.error("Run 'wrapgen --help' for usage information");
    return EXIT_USAGE;
  }

  const fileConfig = fileConfigFor(parsed.options, parsed.dumpFile, cwd, log);
  const config = resolveConfig(
    fileConfig,
    parsed.options,
    cwd,
    parsed.dumpFile
  );

  const dump = readDump(config.dumpPath);
  if (!dump.ok) {
    log.error(formatDiagnostic(dump.error));
    return EXIT_DUMP_UNREADABLE;
  }

  if (parsed.command === "detect") {
    const detected = detectCommand(config, dump.value);
    if (detected.length === 0) {
      log.info("No third-party namespaces detected");
    }
    detected.forEach((ns) => console.log(ns));
    return EXIT_SUCCESS;
  }

  const mappings = mappingsFor(config, log);
  log.detail(`Parsing ${config.dumpPath}`);
  const generated = generateCommand(config, mappings, dump.value, log);
  if (!generated.ok) {
    log.error(formatDiagnostic(generated.error));
    return EXIT_WRITE_FAILED;
  }

  const summary = generated.value;
  log.info(
    `Generated ${summary.typeCount} types in ${summary.namespaceCount} namespaces (${summary.writtenFiles.length} files) -> ${config.outputDirectory}`
  );
  if (config.report) {
    formatExclusionReport(summary.exclusions).forEach((line) =>
      console.log(line)
    );
  }
  return EXIT_SUCCESS;
};
