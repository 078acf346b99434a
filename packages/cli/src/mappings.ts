/**
 * Deobfuscation mapping file loading
 *
 * mappings.json is an array of records exported by the mapping database.
 * Only ObfuscatedName and FriendlyName are read.
 */

import { existsSync, readFileSync } from "node:fs";
import {
  createDiagnostic,
  createNameMappings,
  type Diagnostic,
  error,
  isRecord,
  type NameMappingEntry,
  type NameMappings,
  ok,
  type Result,
} from "@wrapgen/frontend";

export type LoadedMappings = {
  readonly mappings: NameMappings;
  /** One WG2005 warning per skipped entry */
  readonly warnings: readonly Diagnostic[];
};

const nonEmptyString = (value: unknown): value is string =>
  typeof value === "string" && value !== "";

export const parseMappings = (
  path: string,
  data: unknown
): Result<LoadedMappings, readonly Diagnostic[]> => {
  if (!Array.isArray(data)) {
    return error([
      createDiagnostic(
        "WG2004",
        "error",
        "Mappings file must contain a JSON array",
        { file: path }
      ),
    ]);
  }

  const entries: NameMappingEntry[] = [];
  const warnings: Diagnostic[] = [];
  data.forEach((item: unknown, index) => {
    const obfuscatedName = isRecord(item) ? item.ObfuscatedName : undefined;
    const friendlyName = isRecord(item) ? item.FriendlyName : undefined;
    if (!nonEmptyString(obfuscatedName) || !nonEmptyString(friendlyName)) {
      warnings.push(
        createDiagnostic(
          "WG2005",
          "warning",
          `Mapping entry ${index} needs ObfuscatedName and FriendlyName strings; skipped`,
          { file: path }
        )
      );
      return;
    }
    entries.push({ obfuscatedName, friendlyName });
  });

  return ok({ mappings: createNameMappings(entries), warnings });
};

export const loadMappings = (
  mappingsPath: string
): Result<LoadedMappings, readonly Diagnostic[]> => {
  if (!existsSync(mappingsPath)) {
    return error([
      createDiagnostic("WG2001", "error", "Mappings file not found", {
        file: mappingsPath,
      }),
    ]);
  }

  let content: string;
  try {
    content = readFileSync(mappingsPath, "utf-8");
  } catch (e) {
    return error([
      createDiagnostic(
        "WG2002",
        "error",
        `Failed to read mappings file: ${e instanceof Error ? e.message : String(e)}`,
        { file: mappingsPath }
      ),
    ]);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (e) {
    return error([
      createDiagnostic(
        "WG2003",
        "error",
        `Invalid JSON: ${e instanceof Error ? e.message : String(e)}`,
        { file: mappingsPath }
      ),
    ]);
  }

  return parseMappings(mappingsPath, data);
};
