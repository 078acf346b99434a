/**
 * Type resolvability
 *
 * A type reference may only be emitted when it names something the
 * generated code (or the base class library) will actually declare.
 */

import { isGenericTypeParameter } from "../names/generic-parameters.js";
import {
  baseTypeName,
  isGenericUse,
  splitGenericTypeText,
} from "../names/type-text.js";
import type { TypeRegistry } from "../registry/registry.js";
import { ADMITTED, type Decision, exclude } from "../types/decision.js";

/**
 * Namespaces where `name` is registered, admitted and generated, in
 * registration order.
 */
export const eligibleNamespaces = (
  registry: TypeRegistry,
  name: string
): readonly string[] =>
  registry
    .namespacesOf(name)
    .filter(
      (ns) =>
        registry.namespaceFilter.admit(ns).admitted &&
        registry.isGenerated(name, ns)
    );

export const isResolvable = (
  registry: TypeRegistry,
  typeText: string
): Decision => {
  const { config } = registry;

  if (typeText === "") {
    return exclude("emptyType");
  }
  if (typeText.includes("*")) {
    return exclude("pointerType");
  }
  if (config.skipNamespacePrefixes.some((p) => typeText.startsWith(p))) {
    return exclude("skippedTypePrefix");
  }

  const base = baseTypeName(typeText);
  if (config.unresolvableTypes.has(base)) {
    return exclude("unresolvableType");
  }

  // Containers are only as resolvable as their arguments
  if (isGenericUse(typeText)) {
    if (!config.knownGenericTypes.has(base)) {
      return exclude("unknownGenericType");
    }
    const args = splitGenericTypeText(typeText)?.typeArguments ?? [];
    return args.every((arg) => isResolvable(registry, arg).admitted)
      ? ADMITTED
      : exclude("genericArgument");
  }

  if (
    isGenericTypeParameter(base, config) ||
    config.primitiveTypeMap.has(base) ||
    config.builtinTypes.has(base)
  ) {
    return ADMITTED;
  }

  if (registry.namespacesOf(base).length === 0) {
    return exclude("unregisteredType");
  }
  return eligibleNamespaces(registry, base).length > 0
    ? ADMITTED
    : exclude("notGenerated");
};
