/**
 * Configuration loading and validation
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import {
  createDiagnostic,
  createGeneratorConfig,
  type Diagnostic,
  error,
  isRecord,
  isStringArray,
  ok,
  type OutputSettings,
  type Result,
  type ThirdPartyDetection,
} from "@wrapgen/frontend";
import type { CliOptions, ResolvedConfig, WrapgenConfig } from "./types.js";

export const CONFIG_FILE_NAME = "wrapgen.json";
export const MAPPINGS_FILE_NAME = "mappings.json";
export const DEFAULT_DUMP_FILE = "dump.cs";

const LIST_FIELDS = [
  "skipNamespaces",
  "skipNamespacePrefixes",
  "skipTypes",
  "skipBaseTypes",
  "nestedEnumNames",
  "genericParameterExceptions",
] as const;

type ListField = (typeof LIST_FIELDS)[number];

const OUTPUT_FIELDS = [
  "runtimeNamespace",
  "outputDirectory",
  "filePrefix",
] as const;

/**
 * Look for `fileName` beside the dump, then in the working directory.
 */
export const findDefaultFile = (
  fileName: string,
  dumpPath: string,
  cwd: string
): string | undefined =>
  [join(dirname(dumpPath), fileName), join(cwd, fileName)].find((path) =>
    existsSync(path)
  );

const invalidField = (path: string, field: string, expected: string) =>
  createDiagnostic(
    "WG1005",
    "error",
    `'${field}' must be ${expected}`,
    { file: path }
  );

const readOutput = (
  path: string,
  value: unknown,
  diagnostics: Diagnostic[]
): Partial<OutputSettings> => {
  if (!isRecord(value)) {
    diagnostics.push(invalidField(path, "output", "an object"));
    return {};
  }
  const output: { -readonly [K in keyof OutputSettings]?: string } = {};
  for (const field of OUTPUT_FIELDS) {
    const setting = value[field];
    if (setting === undefined) {
      continue;
    }
    if (typeof setting !== "string") {
      diagnostics.push(invalidField(path, `output.${field}`, "a string"));
      continue;
    }
    output[field] = setting;
  }
  return output;
};

const readThirdParty = (
  path: string,
  value: unknown,
  diagnostics: Diagnostic[]
): Partial<ThirdPartyDetection> => {
  if (!isRecord(value)) {
    diagnostics.push(invalidField(path, "thirdParty", "an object"));
    return {};
  }
  const { autoDetect, patterns } = value;
  if (autoDetect !== undefined && typeof autoDetect !== "boolean") {
    diagnostics.push(invalidField(path, "thirdParty.autoDetect", "a boolean"));
  }
  if (patterns !== undefined && !isStringArray(patterns)) {
    diagnostics.push(
      invalidField(path, "thirdParty.patterns", "an array of strings")
    );
  }
  return {
    ...(typeof autoDetect === "boolean" ? { autoDetect } : {}),
    ...(isStringArray(patterns) ? { patterns } : {}),
  };
};

/**
 * Validate parsed JSON against the wrapgen.json shape.
 */
export const parseConfig = (
  path: string,
  data: unknown
): Result<WrapgenConfig, readonly Diagnostic[]> => {
  if (!isRecord(data)) {
    return error([
      createDiagnostic(
        "WG1004",
        "error",
        "Config file must contain a JSON object",
        { file: path }
      ),
    ]);
  }

  const diagnostics: Diagnostic[] = [];
  const lists: { -readonly [K in ListField]?: readonly string[] } = {};
  for (const field of LIST_FIELDS) {
    const value = data[field];
    if (value === undefined) {
      continue;
    }
    if (!isStringArray(value)) {
      diagnostics.push(invalidField(path, field, "an array of strings"));
      continue;
    }
    lists[field] = value;
  }
  const output =
    data.output === undefined
      ? undefined
      : readOutput(path, data.output, diagnostics);
  const thirdParty =
    data.thirdParty === undefined
      ? undefined
      : readThirdParty(path, data.thirdParty, diagnostics);

  if (diagnostics.length > 0) {
    return error(diagnostics);
  }
  return ok({
    ...lists,
    ...(output !== undefined ? { output } : {}),
    ...(thirdParty !== undefined ? { thirdParty } : {}),
  });
};

/**
 * Load wrapgen.json
 */
export const loadConfig = (
  configPath: string
): Result<WrapgenConfig, readonly Diagnostic[]> => {
  if (!existsSync(configPath)) {
    return error([
      createDiagnostic("WG1001", "error", "Config file not found", {
        file: configPath,
      }),
    ]);
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (e) {
    return error([
      createDiagnostic(
        "WG1002",
        "error",
        `Failed to read config file: ${e instanceof Error ? e.message : String(e)}`,
        { file: configPath }
      ),
    ]);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (e) {
    return error([
      createDiagnostic(
        "WG1003",
        "error",
        `Invalid JSON: ${e instanceof Error ? e.message : String(e)}`,
        { file: configPath }
      ),
    ]);
  }

  return parseConfig(configPath, data);
};

/**
 * Resolve final configuration from file config and CLI options.
 * CLI options win over the file, the file over the built-in defaults.
 */
export const resolveConfig = (
  fileConfig: WrapgenConfig,
  cliOptions: CliOptions,
  cwd: string,
  dumpArg?: string
): ResolvedConfig => {
  const dumpPath = resolve(cwd, dumpArg ?? DEFAULT_DUMP_FILE);
  const generator = createGeneratorConfig({
    ...fileConfig,
    output: {
      ...fileConfig.output,
      ...(cliOptions.out !== undefined
        ? { outputDirectory: cliOptions.out }
        : {}),
      ...(cliOptions.filePrefix !== undefined
        ? { filePrefix: cliOptions.filePrefix }
        : {}),
    },
    thirdParty: {
      ...fileConfig.thirdParty,
      ...(cliOptions.noAutoDetect === true ? { autoDetect: false } : {}),
    },
  });

  return {
    dumpPath,
    mappingsPath:
      cliOptions.mappings !== undefined
        ? resolve(cwd, cliOptions.mappings)
        : findDefaultFile(MAPPINGS_FILE_NAME, dumpPath, cwd),
    outputDirectory: resolve(cwd, generator.output.outputDirectory),
    generator,
    report: cliOptions.report ?? false,
  };
};
