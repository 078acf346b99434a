/**
 * Generator configuration
 *
 * One immutable value holding every skip/allow set the registry, resolver
 * and emitter consult. Built once from the built-in tables plus user
 * additions and threaded through the pipeline.
 */

import { BUILTIN_TABLES, type BuiltinTables } from "./builtin-tables.js";

export type OutputSettings = {
  /** Namespace of the runtime facility (Il2CppObject, Il2CppRuntime) */
  readonly runtimeNamespace: string;
  readonly outputDirectory: string;
  readonly filePrefix: string;
};

export type ThirdPartyDetection = {
  readonly autoDetect: boolean;
  readonly patterns: readonly string[];
};

export type GeneratorConfig = {
  readonly output: OutputSettings;
  readonly skipNamespaces: ReadonlySet<string>;
  readonly skipNamespacePrefixes: readonly string[];
  readonly skipTypes: ReadonlySet<string>;
  readonly skipBaseTypes: ReadonlySet<string>;
  readonly nestedEnumNames: ReadonlySet<string>;
  readonly genericParameterNames: ReadonlySet<string>;
  readonly genericParameterExceptions: ReadonlySet<string>;
  readonly builtinTypes: ReadonlySet<string>;
  readonly primitiveTypeMap: ReadonlyMap<string, string>;
  readonly knownGenericTypes: ReadonlySet<string>;
  readonly unresolvableTypes: ReadonlySet<string>;
  readonly knownBaseTypes: ReadonlySet<string>;
  readonly baseTypeDisambiguation: ReadonlyMap<string, string>;
  readonly skipPropertyNames: ReadonlySet<string>;
  readonly importedNamespaces: readonly string[];
  readonly thirdParty: ThirdPartyDetection;
};

/**
 * User additions. Lists extend the built-in tables; they never replace them.
 */
export type GeneratorConfigInput = {
  readonly output?: Partial<OutputSettings>;
  readonly skipNamespaces?: readonly string[];
  readonly skipNamespacePrefixes?: readonly string[];
  readonly skipTypes?: readonly string[];
  readonly skipBaseTypes?: readonly string[];
  readonly nestedEnumNames?: readonly string[];
  readonly genericParameterExceptions?: readonly string[];
  readonly thirdParty?: Partial<ThirdPartyDetection>;
};

export const DEFAULT_OUTPUT: OutputSettings = {
  runtimeNamespace: "GameSDK",
  outputDirectory: "Generated",
  filePrefix: "GameSDK",
};

const union = (
  defaults: readonly string[],
  additions: readonly string[] = []
): ReadonlySet<string> => new Set([...defaults, ...additions]);

const appendUnique = (
  defaults: readonly string[],
  additions: readonly string[] = []
): readonly string[] => [...new Set([...defaults, ...additions])];

export const createGeneratorConfig = (
  input: GeneratorConfigInput = {},
  tables: BuiltinTables = BUILTIN_TABLES
): GeneratorConfig => ({
  output: {
    runtimeNamespace:
      input.output?.runtimeNamespace ?? DEFAULT_OUTPUT.runtimeNamespace,
    outputDirectory:
      input.output?.outputDirectory ?? DEFAULT_OUTPUT.outputDirectory,
    filePrefix: input.output?.filePrefix ?? DEFAULT_OUTPUT.filePrefix,
  },
  skipNamespaces: union(tables.skipNamespaces, input.skipNamespaces),
  skipNamespacePrefixes: appendUnique(
    tables.skipNamespacePrefixes,
    input.skipNamespacePrefixes
  ),
  skipTypes: union([], input.skipTypes),
  skipBaseTypes: union(tables.skipBaseTypes, input.skipBaseTypes),
  nestedEnumNames: union(tables.nestedEnumNames, input.nestedEnumNames),
  genericParameterNames: union(tables.genericParameterNames),
  genericParameterExceptions: union(
    tables.genericParameterExceptions,
    input.genericParameterExceptions
  ),
  builtinTypes: union(tables.builtinTypes),
  primitiveTypeMap: new Map(Object.entries(tables.primitiveTypeMap)),
  knownGenericTypes: union(tables.knownGenericTypes),
  unresolvableTypes: union(tables.unresolvableTypes),
  knownBaseTypes: union(tables.knownBaseTypes),
  baseTypeDisambiguation: new Map(
    Object.entries(tables.baseTypeDisambiguation)
  ),
  skipPropertyNames: union(tables.skipPropertyNames),
  importedNamespaces: tables.importedNamespaces,
  thirdParty: {
    autoDetect: input.thirdParty?.autoDetect ?? true,
    patterns: appendUnique(
      tables.thirdPartyPatterns,
      input.thirdParty?.patterns
    ),
  },
});
