/**
 * Namespace names
 */

import { GLOBAL_NAMESPACE } from "../types/declarations.js";
import { isUnicodeName } from "./identifiers.js";

/**
 * Replace obfuscated segments of a dotted namespace with numbered
 * placeholders: "Game.ഇഈ.ഉ" -> "Game.unicode_ns_1.unicode_ns_2".
 * Numbering restarts for every namespace, so the result depends only on
 * the input.
 */
export const sanitizeNamespace = (namespace: string): string => {
  if (namespace === "" || namespace === GLOBAL_NAMESPACE) {
    return namespace;
  }
  let counter = 0;
  return namespace
    .split(".")
    .map((segment) =>
      isUnicodeName(segment) ? `unicode_ns_${++counter}` : segment
    )
    .join(".");
};

export const namespaceSegments = (namespace: string): readonly string[] =>
  namespace === "" ? [] : namespace.split(".");
