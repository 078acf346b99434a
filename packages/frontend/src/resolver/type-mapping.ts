/**
 * Metadata type text -> C# type text
 *
 * No qualification happens here; callers run the result through qualify.
 */

import { friendlyName } from "../mappings.js";
import {
  splitGenericTypeText,
  stripArraySuffix,
} from "../names/type-text.js";
import type { TypeRegistry } from "../registry/registry.js";

const ARITY = /^(\d+)/;

const mapBacktickGeneric = (typeText: string): string => {
  const [base = "", rest = ""] = typeText.split("`");
  const arity = ARITY.exec(rest)?.[1];
  if (arity === undefined) {
    return base;
  }
  const args = Array.from({ length: Number(arity) }, () => "object");
  const suffix = typeText.endsWith("[]") ? "[]" : "";
  return `${base}<${args.join(", ")}>${suffix}`;
};

/**
 * Convert dump type text to C# type text, or undefined when the type
 * cannot be written in a wrapper (pointers, open generic arguments,
 * nullable value types).
 */
export const mapType = (
  registry: TypeRegistry,
  typeText: string
): string | undefined => {
  const { config, mappings } = registry;
  if (typeText === "" || typeText.includes("*")) {
    return undefined;
  }

  const generic = splitGenericTypeText(typeText);
  if (
    generic?.typeArguments.some((arg) =>
      config.genericParameterNames.has(arg.replace(/[[\]]+$/, ""))
    )
  ) {
    return undefined;
  }
  if (typeText.startsWith("Nullable`1") || typeText.includes("Nullable<")) {
    return undefined;
  }

  if (typeText.includes("`")) {
    return mapBacktickGeneric(typeText);
  }

  if (generic !== undefined) {
    const args = generic.typeArguments.map((arg) => mapType(registry, arg));
    if (args.some((arg) => arg === undefined)) {
      return undefined;
    }
    return `${generic.name}<${args.join(", ")}>${generic.suffix}`;
  }

  const { element, suffix } = stripArraySuffix(typeText);
  const primitive = config.primitiveTypeMap.get(element) ?? element;
  const mapped = friendlyName(mappings, primitive) ?? primitive;
  return `${mapped}${suffix}`;
};
