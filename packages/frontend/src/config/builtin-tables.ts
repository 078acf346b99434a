/**
 * Built-in name tables
 *
 * Namespace skip lists, BCL/engine type names and the heuristic skip sets
 * tuned on real dumps. They ship as builtin-tables.json next to this module
 * and seed every GeneratorConfig.
 */

import { readFileSync } from "node:fs";
import { isRecord, isStringArray, isStringMap } from "./json-guards.js";

export type BuiltinTables = {
  readonly skipNamespaces: readonly string[];
  readonly skipNamespacePrefixes: readonly string[];
  readonly skipBaseTypes: readonly string[];
  readonly nestedEnumNames: readonly string[];
  readonly genericParameterNames: readonly string[];
  readonly genericParameterExceptions: readonly string[];
  readonly builtinTypes: readonly string[];
  readonly primitiveTypeMap: Readonly<Record<string, string>>;
  readonly knownGenericTypes: readonly string[];
  readonly unresolvableTypes: readonly string[];
  readonly knownBaseTypes: readonly string[];
  readonly baseTypeDisambiguation: Readonly<Record<string, string>>;
  readonly skipPropertyNames: readonly string[];
  readonly importedNamespaces: readonly string[];
  readonly thirdPartyPatterns: readonly string[];
};

const readList = (
  data: Record<string, unknown>,
  key: string
): readonly string[] => {
  const value = data[key];
  if (!isStringArray(value)) {
    throw new Error(
      `ICE: builtin-tables.json '${key}' must be an array of strings`
    );
  }
  return value;
};

const readMap = (
  data: Record<string, unknown>,
  key: string
): Readonly<Record<string, string>> => {
  const value = data[key];
  if (!isStringMap(value)) {
    throw new Error(
      `ICE: builtin-tables.json '${key}' must map strings to strings`
    );
  }
  return value;
};

export const parseBuiltinTables = (data: unknown): BuiltinTables => {
  if (!isRecord(data)) {
    throw new Error("ICE: builtin-tables.json must contain an object");
  }

  return {
    skipNamespaces: readList(data, "skipNamespaces"),
    skipNamespacePrefixes: readList(data, "skipNamespacePrefixes"),
    skipBaseTypes: readList(data, "skipBaseTypes"),
    nestedEnumNames: readList(data, "nestedEnumNames"),
    genericParameterNames: readList(data, "genericParameterNames"),
    genericParameterExceptions: readList(data, "genericParameterExceptions"),
    builtinTypes: readList(data, "builtinTypes"),
    primitiveTypeMap: readMap(data, "primitiveTypeMap"),
    knownGenericTypes: readList(data, "knownGenericTypes"),
    unresolvableTypes: readList(data, "unresolvableTypes"),
    knownBaseTypes: readList(data, "knownBaseTypes"),
    baseTypeDisambiguation: readMap(data, "baseTypeDisambiguation"),
    skipPropertyNames: readList(data, "skipPropertyNames"),
    importedNamespaces: readList(data, "importedNamespaces"),
    thirdPartyPatterns: readList(data, "thirdPartyPatterns"),
  };
};

export const BUILTIN_TABLES: BuiltinTables = parseBuiltinTables(
  JSON.parse(
    readFileSync(new URL("./builtin-tables.json", import.meta.url), "utf-8")
  )
);
