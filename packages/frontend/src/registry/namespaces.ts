/**
 * Namespace admission
 *
 * A namespace is skipped when it is listed (universal, custom or
 * auto-detected third-party) or starts with a skip prefix. Everything else,
 * including the global namespace, is admitted.
 */

import type { GeneratorConfig } from "../config/generator-config.js";
import {
  ADMITTED,
  type Decision,
  exclude,
} from "../types/decision.js";
import type { TypeDeclaration } from "../types/declarations.js";

export type NamespaceFilter = {
  readonly admit: (namespace: string) => Decision;
  readonly skipped: ReadonlySet<string>;
  readonly prefixes: readonly string[];
};

/**
 * Distinct declared namespaces in first-appearance order.
 */
export const observeNamespaces = (
  declarations: readonly TypeDeclaration[]
): readonly string[] => {
  const seen = new Set<string>();
  for (const decl of declarations) {
    if (decl.namespace !== undefined && decl.namespace !== "") {
      seen.add(decl.namespace);
    }
  }
  return [...seen];
};

const matchesPattern = (namespace: string, pattern: string): boolean =>
  namespace === pattern || namespace.startsWith(`${pattern}.`);

export const detectThirdPartyNamespaces = (
  observed: readonly string[],
  config: GeneratorConfig
): readonly string[] => {
  if (!config.thirdParty.autoDetect) {
    return [];
  }
  return observed.filter((ns) =>
    config.thirdParty.patterns.some((pattern) => matchesPattern(ns, pattern))
  );
};

export const createNamespaceFilter = (
  config: GeneratorConfig,
  detected: readonly string[] = []
): NamespaceFilter => {
  const skipped = new Set([...config.skipNamespaces, ...detected]);
  const prefixes = config.skipNamespacePrefixes;

  const admit = (namespace: string): Decision => {
    if (namespace === "") {
      return ADMITTED;
    }
    if (
      skipped.has(namespace) ||
      prefixes.some((prefix) => namespace.startsWith(prefix))
    ) {
      return exclude("skippedNamespace");
    }
    return ADMITTED;
  };

  return { admit, skipped, prefixes };
};
