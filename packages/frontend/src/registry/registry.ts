/**
 * Type registry
 *
 * Built once from the complete declaration list, then read by every
 * resolution query and by the emitter. Nothing mutates it after
 * buildRegistry returns.
 */

import type { GeneratorConfig } from "../config/generator-config.js";
import { friendlyName, type NameMappings } from "../mappings.js";
import { isUnicodeName } from "../names/identifiers.js";
import { exclude, type Decision } from "../types/decision.js";
import {
  isPublic,
  namespaceOf,
  type TypeDeclaration,
} from "../types/declarations.js";
import {
  declarationGroup,
  EMISSION_ORDER,
  evaluateContent,
  isGenericTypeName,
} from "./eligibility.js";
import {
  createNamespaceFilter,
  detectThirdPartyNamespaces,
  type NamespaceFilter,
  observeNamespaces,
} from "./namespaces.js";

export type TypeRegistry = {
  readonly config: GeneratorConfig;
  readonly mappings: NameMappings;
  readonly namespaceFilter: NamespaceFilter;
  /** Third-party namespaces auto-detection added to the skip set */
  readonly detectedNamespaces: readonly string[];
  /** Namespaces every emitted file imports */
  readonly imports: ReadonlySet<string>;
  readonly sealedTypes: ReadonlySet<string>;
  /** Non-generic type name -> namespaces, in registration order */
  readonly typeNamespaces: ReadonlyMap<string, readonly string[]>;
  /** Generic base name ("List" for "List`1") -> namespaces */
  readonly genericBaseNamespaces: ReadonlyMap<string, readonly string[]>;
  /** Type name -> namespaces where it produces output */
  readonly generatedTypes: ReadonlyMap<string, ReadonlySet<string>>;
  readonly decisionFor: (decl: TypeDeclaration) => Decision;
  /** Declaration that publishes a type name in a namespace */
  readonly typeNameOwner: (
    namespace: string,
    name: string
  ) => TypeDeclaration | undefined;
  readonly isGenerated: (name: string, namespace: string) => boolean;
  readonly namespacesOf: (name: string) => readonly string[];
};

const appendUnique = (
  index: Map<string, string[]>,
  key: string,
  namespace: string
): void => {
  const list = index.get(key);
  if (list === undefined) {
    index.set(key, [namespace]);
  } else if (!list.includes(namespace)) {
    list.push(namespace);
  }
};

const addGenerated = (
  index: Map<string, Set<string>>,
  name: string,
  namespace: string
): void => {
  const set = index.get(name);
  if (set === undefined) {
    index.set(name, new Set([namespace]));
  } else {
    set.add(namespace);
  }
};

/**
 * Name a declaration is published under: the friendly name when the
 * mapping has one.
 */
export const publishedTypeName = (
  mappings: NameMappings,
  decl: TypeDeclaration
): string => friendlyName(mappings, decl.name) ?? decl.name;

const genericBaseName = (name: string): string =>
  name.split("`")[0]?.split("<")[0] ?? name;

export const buildRegistry = (
  declarations: readonly TypeDeclaration[],
  config: GeneratorConfig,
  mappings: NameMappings
): TypeRegistry => {
  const detectedNamespaces = detectThirdPartyNamespaces(
    observeNamespaces(declarations),
    config
  );
  const namespaceFilter = createNamespaceFilter(config, detectedNamespaces);

  const sealedTypes = new Set(
    declarations.filter((decl) => decl.isSealed).map((decl) => decl.name)
  );

  const typeNamespaces = new Map<string, string[]>();
  const genericBaseNamespaces = new Map<string, string[]>();
  const generatedTypes = new Map<string, Set<string>>();
  const decisions = new Map<TypeDeclaration, Decision>();

  for (const decl of declarations) {
    if (!isPublic(decl)) {
      decisions.set(decl, exclude("notPublic"));
      continue;
    }
    if (isUnicodeName(genericBaseName(decl.name))) {
      decisions.set(decl, exclude("obfuscatedName"));
      continue;
    }
    const ns = namespaceOf(decl);
    const admission = namespaceFilter.admit(ns);
    if (!admission.admitted) {
      decisions.set(decl, admission);
      continue;
    }

    const friendly = friendlyName(mappings, decl.name);
    decisions.set(decl, evaluateContent(decl, { config, sealedTypes }));

    if (isGenericTypeName(decl.name)) {
      appendUnique(genericBaseNamespaces, genericBaseName(decl.name), ns);
    } else {
      appendUnique(typeNamespaces, decl.name, ns);
      if (friendly !== undefined) {
        appendUnique(typeNamespaces, friendly, ns);
      }
    }
  }

  // Admitted declarations that publish the same name in one namespace:
  // only the first in emission order is written.
  const owners = new Map<string, Map<string, TypeDeclaration>>();
  const admitted = declarations.filter(
    (decl) => decisions.get(decl)?.admitted === true
  );
  for (const group of EMISSION_ORDER) {
    for (const decl of admitted) {
      if (declarationGroup(decl) !== group) {
        continue;
      }
      const ns = namespaceOf(decl);
      const name = publishedTypeName(mappings, decl);
      const taken = owners.get(ns) ?? new Map<string, TypeDeclaration>();
      owners.set(ns, taken);
      if (taken.has(name)) {
        decisions.set(decl, exclude("duplicateTypeName"));
        continue;
      }
      taken.set(name, decl);
      addGenerated(generatedTypes, decl.name, ns);
      addGenerated(generatedTypes, name, ns);
    }
  }

  const imports = new Set([
    ...config.importedNamespaces,
    config.output.runtimeNamespace,
  ]);

  return {
    config,
    mappings,
    namespaceFilter,
    detectedNamespaces,
    imports,
    sealedTypes,
    typeNamespaces,
    genericBaseNamespaces,
    generatedTypes,
    decisionFor: (decl) => {
      const decision = decisions.get(decl);
      if (decision === undefined) {
        throw new Error(
          `ICE: No registry decision for '${decl.name}' - declaration was not part of the registry input`
        );
      }
      return decision;
    },
    typeNameOwner: (namespace, name) => owners.get(namespace)?.get(name),
    isGenerated: (name, namespace) =>
      generatedTypes.get(name)?.has(namespace) ?? false,
    namespacesOf: (name) => typeNamespaces.get(name) ?? [],
  };
};
