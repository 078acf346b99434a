/**
 * Admission decisions
 *
 * Every per-item filter (namespace, type, member, parameter) answers with a
 * Decision instead of a bare boolean so callers and tests can see why an
 * item was left out.
 */

export type ExclusionReason =
  // Namespaces
  | "skippedNamespace"
  // Types
  | "notPublic"
  | "obfuscatedName"
  | "genericName"
  | "skippedType"
  | "delegateBase"
  | "sealedBase"
  | "skippedBaseType"
  | "emptyEnum"
  | "nestedEnumName"
  | "noMembers"
  | "genericField"
  | "duplicateTypeName"
  | "noInvokeMethod"
  // Type references
  | "emptyType"
  | "pointerType"
  | "skippedTypePrefix"
  | "unresolvableType"
  | "unknownGenericType"
  | "unregisteredType"
  | "notGenerated"
  | "genericParameter"
  | "genericArgument"
  | "nullableType"
  // Members
  | "constructor"
  | "compilerGenerated"
  | "explicitInterface"
  | "unnamedParameter"
  | "byRefParameter"
  | "unrepresentableName"
  | "noNativeAddress"
  | "duplicateSignature"
  | "skippedPropertyName"
  | "memberNameConflict"
  | "constField"
  | "inaccessibleField";

export type Decision =
  | { readonly admitted: true }
  | { readonly admitted: false; readonly reason: ExclusionReason };

export const ADMITTED: Decision = { admitted: true };

export const exclude = (reason: ExclusionReason): Decision => ({
  admitted: false,
  reason,
});

/**
 * Returns the first exclusion in evaluation order, or ADMITTED.
 */
export const firstExclusion = (
  checks: readonly (() => Decision)[]
): Decision => {
  for (const check of checks) {
    const decision = check();
    if (!decision.admitted) {
      return decision;
    }
  }
  return ADMITTED;
};
