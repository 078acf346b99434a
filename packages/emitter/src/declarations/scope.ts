/**
 * Per-namespace emission state
 *
 * One scope is created for each namespace block. It owns the set of type
 * names already taken in the block, the class placeholder counter and the
 * list of exclusions recorded while emitting.
 */

import {
  error,
  type ExclusionReason,
  GLOBAL_NAMESPACE,
  mapType,
  ok,
  publishedTypeName,
  qualify,
  type Result,
  sanitizeNamespace,
  type TypeDeclaration,
  type TypeRegistry,
} from "@wrapgen/frontend";
import { createPlaceholderNames, type PlaceholderNames } from "../naming.js";
import type { EmitExclusion } from "../types.js";
import { validateType } from "../validation.js";

export type NamespaceScope = {
  readonly registry: TypeRegistry;
  /** Namespace as registered ("Global" for declarations without one) */
  readonly namespace: string;
  /** Namespace written in the output file */
  readonly outputNamespace: string;
  /** Namespace the runtime looks classes up in; "" for the global namespace */
  readonly lookupNamespace: string;
  readonly isSanitized: boolean;
  readonly classPlaceholders: PlaceholderNames;
  /**
   * False when the registry publishes the declaration's name for another
   * declaration, or an earlier declaration in the block took the name.
   */
  readonly claimTypeName: (decl: TypeDeclaration, name: string) => boolean;
  readonly record: (
    typeName: string,
    reason: ExclusionReason,
    memberName?: string
  ) => void;
  readonly exclusions: () => readonly EmitExclusion[];
};

export const createNamespaceScope = (
  registry: TypeRegistry,
  namespace: string
): NamespaceScope => {
  const outputNamespace = sanitizeNamespace(namespace);
  const takenNames = new Set<string>();
  const exclusions: EmitExclusion[] = [];

  return {
    registry,
    namespace,
    outputNamespace,
    lookupNamespace: namespace === GLOBAL_NAMESPACE ? "" : namespace,
    isSanitized: outputNamespace !== namespace,
    classPlaceholders: createPlaceholderNames(),
    claimTypeName: (decl, name) => {
      const owner = registry.typeNameOwner(
        namespace,
        publishedTypeName(registry.mappings, decl)
      );
      if ((owner !== undefined && owner !== decl) || takenNames.has(name)) {
        return false;
      }
      takenNames.add(name);
      return true;
    },
    record: (typeName, reason, memberName) => {
      exclusions.push({
        namespace,
        typeName,
        ...(memberName !== undefined ? { memberName } : {}),
        reason,
      });
    },
    exclusions: () => exclusions,
  };
};

/**
 * Validate, map and qualify a dump type reference for use in this
 * namespace block.
 */
export const writableType = (
  scope: NamespaceScope,
  typeText: string
): Result<string, ExclusionReason> => {
  const decision = validateType(scope.registry, typeText);
  if (!decision.admitted) {
    return error(decision.reason);
  }
  const mapped = mapType(scope.registry, typeText);
  if (mapped === undefined) {
    throw new Error(`ICE: Validated type '${typeText}' has no C# mapping`);
  }
  return ok(qualify(scope.registry, mapped, scope.namespace));
};
