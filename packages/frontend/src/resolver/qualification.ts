/**
 * Type-name qualification
 *
 * Decides whether a C# type reference can stay unqualified inside a given
 * namespace block or must be written as global::Ns.Name.
 */

import { namespaceSegments, sanitizeNamespace } from "../names/namespaces.js";
import {
  splitGenericTypeText,
  stripArraySuffix,
} from "../names/type-text.js";
import type { TypeRegistry } from "../registry/registry.js";
import { eligibleNamespaces } from "./resolvability.js";

export type NameResolution =
  | { readonly kind: "builtin" }
  /** Not registered, or generated nowhere admitted */
  | { readonly kind: "unknown" }
  | { readonly kind: "current" }
  | { readonly kind: "imported"; readonly namespace: string }
  | { readonly kind: "qualified"; readonly namespace: string };

const isAncestorOf = (candidate: string, namespace: string): boolean =>
  namespace.startsWith(`${candidate}.`);

/**
 * Resolve a bare (non-generic, non-array) type name as seen from
 * `currentNamespace`.
 */
export const resolveName = (
  registry: TypeRegistry,
  name: string,
  currentNamespace: string
): NameResolution => {
  if (registry.config.builtinTypes.has(name)) {
    return { kind: "builtin" };
  }

  const eligible = eligibleNamespaces(registry, name);
  const [first] = eligible;
  if (first === undefined) {
    return { kind: "unknown" };
  }
  if (eligible.includes(currentNamespace)) {
    return { kind: "current" };
  }

  const imported = eligible.filter((ns) => registry.imports.has(ns));
  const [only] = imported;
  const shadowed =
    eligible.some((ns) => isAncestorOf(ns, currentNamespace)) ||
    namespaceSegments(sanitizeNamespace(currentNamespace)).includes(name);

  if (only !== undefined && imported.length === 1 && !shadowed) {
    return { kind: "imported", namespace: only };
  }
  return { kind: "qualified", namespace: first };
};

const render = (
  name: string,
  suffix: string,
  resolution: NameResolution
): string =>
  resolution.kind === "qualified"
    ? `global::${sanitizeNamespace(resolution.namespace)}.${name}${suffix}`
    : `${name}${suffix}`;

/**
 * Qualify a C# type reference for use inside `currentNamespace`.
 * Generic arguments are qualified recursively; array ranks are kept.
 */
export const qualify = (
  registry: TypeRegistry,
  typeText: string,
  currentNamespace: string
): string => {
  const generic = splitGenericTypeText(typeText);
  if (generic !== undefined) {
    const args = generic.typeArguments.map((arg) =>
      qualify(registry, arg, currentNamespace)
    );
    const name = qualify(registry, generic.name, currentNamespace);
    return `${name}<${args.join(", ")}>${generic.suffix}`;
  }

  const { element, suffix } = stripArraySuffix(typeText);
  return render(
    element,
    suffix,
    resolveName(registry, element, currentNamespace)
  );
};

/**
 * qualify for base-class references. A base name that would otherwise be
 * written unqualified (or is not generated at all) and has a
 * disambiguation entry is pinned to that entry, e.g. Object ->
 * global::UnityEngine.Object.
 */
export const qualifyBaseType = (
  registry: TypeRegistry,
  typeText: string,
  currentNamespace: string
): string => {
  const { element, suffix } = stripArraySuffix(typeText);
  if (splitGenericTypeText(element) !== undefined) {
    return qualify(registry, typeText, currentNamespace);
  }

  const resolution = resolveName(registry, element, currentNamespace);
  const pinned = registry.config.baseTypeDisambiguation.get(element);
  if (
    pinned !== undefined &&
    (resolution.kind === "unknown" || resolution.kind === "imported")
  ) {
    return `global::${pinned}${suffix}`;
  }
  return render(element, suffix, resolution);
};
