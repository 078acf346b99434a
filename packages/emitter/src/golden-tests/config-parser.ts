/**
 * Config.yaml parser for golden tests
 */

import { isRecord, isStringArray, isStringMap } from "@wrapgen/frontend";
import YAML from "yaml";
import type { TestEntry } from "./types.js";

const DUMP_SUFFIX = ".dump.txt";

const optionalStringArray = (
  item: Record<string, unknown>,
  key: string,
  input: string
): readonly string[] | undefined => {
  const value = item[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isStringArray(value)) {
    throw new Error(`${key} must be an array of strings for ${input}`);
  }
  return value;
};

const parseEntry = (item: unknown): TestEntry => {
  if (!isRecord(item)) {
    throw new Error(`Invalid test entry: ${JSON.stringify(item)}`);
  }

  const { input, title, files, mappings } = item;
  if (typeof input !== "string" || typeof title !== "string") {
    throw new Error("Each test entry must have 'input' and 'title' as strings");
  }
  if (!input.endsWith(DUMP_SUFFIX)) {
    throw new Error(`input must end with ${DUMP_SUFFIX}: ${input}`);
  }
  if (title.trim().length === 0) {
    throw new Error(`Title cannot be empty for ${input}`);
  }
  if (!isStringArray(files)) {
    throw new Error(`files must be an array of strings for ${input}`);
  }
  if (mappings !== undefined && mappings !== null && !isStringMap(mappings)) {
    throw new Error(`mappings must map names to names for ${input}`);
  }

  const skipNamespaces = optionalStringArray(item, "skipNamespaces", input);
  const skipTypes = optionalStringArray(item, "skipTypes", input);

  return {
    input,
    title,
    files,
    ...(skipNamespaces !== undefined ? { skipNamespaces } : {}),
    ...(skipTypes !== undefined ? { skipTypes } : {}),
    ...(isStringMap(mappings) ? { mappings } : {}),
  };
};

/**
 * Parse config.yaml and extract test entries
 */
export const parseConfigYaml = (yamlContent: string): readonly TestEntry[] => {
  const parsed: unknown = YAML.parse(yamlContent);

  if (!Array.isArray(parsed)) {
    throw new Error("config.yaml must be an array of test entries");
  }

  return parsed.map(parseEntry);
};
