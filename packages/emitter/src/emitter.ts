/**
 * Main C# Emitter - Public API
 * Orchestrates wrapper generation from a finished type registry
 */

import {
  namespaceOf,
  type TypeDeclaration,
  type TypeRegistry,
} from "@wrapgen/frontend";
import { emitNamespace } from "./namespace-emitter.js";
import type { EmitExclusion, EmitResult, EmitterOptions } from "./types.js";

/**
 * Group declarations by namespace in first-appearance order. Declarations
 * of skipped namespaces are returned separately.
 */
const groupByNamespace = (
  declarations: readonly TypeDeclaration[],
  registry: TypeRegistry
): {
  readonly groups: ReadonlyMap<string, readonly TypeDeclaration[]>;
  readonly skipped: readonly EmitExclusion[];
} => {
  const groups = new Map<string, TypeDeclaration[]>();
  const skipped: EmitExclusion[] = [];

  for (const decl of declarations) {
    const namespace = namespaceOf(decl);
    const admission = registry.namespaceFilter.admit(namespace);
    if (!admission.admitted) {
      skipped.push({ namespace, typeName: decl.name, reason: admission.reason });
      continue;
    }
    const group = groups.get(namespace);
    if (group === undefined) {
      groups.set(namespace, [decl]);
    } else {
      group.push(decl);
    }
  }

  return { groups, skipped };
};

/**
 * Emit one wrapper file per admitted namespace that produces at least one
 * type. The registry must have been built from the same declarations.
 */
export const emitWrappers = (
  declarations: readonly TypeDeclaration[],
  registry: TypeRegistry,
  options: EmitterOptions = {}
): EmitResult => {
  const { groups, skipped } = groupByNamespace(declarations, registry);
  const files = new Map<string, string>();
  const typeCounts = new Map<string, number>();
  const exclusions: EmitExclusion[] = [...skipped];

  for (const [namespace, members] of groups) {
    const emission = emitNamespace(namespace, members, registry, options);
    exclusions.push(...emission.exclusions);
    if (emission.file === undefined) {
      continue;
    }
    files.set(emission.file.fileName, emission.file.text);
    // Namespaces that sanitize alike share a file; the last one wins
    typeCounts.set(emission.file.namespace, emission.typeCount);
  }

  return { files, typeCounts, exclusions };
};
