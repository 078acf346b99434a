/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  dumpFile?: string;
  options: CliOptions;
  /** Set for unknown options, missing option values and extra arguments */
  usageError?: string;
};

type ValueOption = "config" | "mappings" | "out" | "filePrefix";

const VALUE_OPTIONS: ReadonlyMap<string, ValueOption> = new Map([
  ["-c", "config"],
  ["--config", "config"],
  ["-m", "mappings"],
  ["--mappings", "mappings"],
  ["-o", "out"],
  ["--out", "out"],
  ["--file-prefix", "filePrefix"],
]);

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  let dumpFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (!arg.startsWith("-")) {
      if (!command) {
        command = arg;
      } else if (dumpFile === undefined) {
        dumpFile = arg;
      } else {
        return { command, options, usageError: `Unexpected argument '${arg}'` };
      }
      continue;
    }

    const valueOption = VALUE_OPTIONS.get(arg);
    if (valueOption !== undefined) {
      const value = args[++i];
      if (value === undefined || value.startsWith("-")) {
        return { command, options, usageError: `Option '${arg}' needs a value` };
      }
      options[valueOption] = value;
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "--no-auto-detect":
        options.noAutoDetect = true;
        break;
      case "--report":
        options.report = true;
        break;
      default:
        return { command, options, usageError: `Unknown option '${arg}'` };
    }
  }

  return dumpFile === undefined
    ? { command, options }
    : { command, dumpFile, options };
};
