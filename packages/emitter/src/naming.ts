/**
 * Output naming
 *
 * Identifier sanitization, placeholder names for obfuscated members and
 * output file names.
 */

import { isRepresentableName } from "@wrapgen/frontend";
import { escapeCSharpIdentifier } from "./emitter-types/index.js";

const DECORATION = /[<>.|]/g;
const LEADING_DIGIT = /^\d/;

/**
 * Turn a member name into a C# identifier, or undefined when it holds
 * characters no identifier can. "<Item>k__BackingField" becomes
 * "_Item_k__BackingField"; "2D" becomes "_2D"; "event" becomes "@event".
 */
export const sanitizeIdentifier = (name: string): string | undefined => {
  if (!isRepresentableName(name)) {
    return undefined;
  }
  const replaced = name.replace(DECORATION, "_");
  const prefixed = LEADING_DIGIT.test(replaced) ? `_${replaced}` : replaced;
  return escapeCSharpIdentifier(prefixed);
};

export type PlaceholderKind = "class" | "field" | "property";

/**
 * Counter-based names for obfuscated declarations. One instance per
 * scope: a namespace for classes, a class for fields and properties.
 */
export type PlaceholderNames = {
  readonly next: (kind: PlaceholderKind) => string;
};

export const createPlaceholderNames = (): PlaceholderNames => {
  const counters = new Map<PlaceholderKind, number>();
  return {
    next: (kind) => {
      const n = (counters.get(kind) ?? 0) + 1;
      counters.set(kind, n);
      return `unicode_${kind}_${n}`;
    },
  };
};

/**
 * Name for a method that is forwarded by native address.
 */
export const addressPlaceholder = (nativeAddress: string): string =>
  `unicode_method_rva_${nativeAddress}`;

export const wrapperFileName = (filePrefix: string, namespace: string): string =>
  `${filePrefix}.${namespace.replace(/\./g, "_")}.cs`;
