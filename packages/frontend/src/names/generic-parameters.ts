/**
 * Generic-parameter heuristics
 *
 * Dumps print open generic signatures with their parameter names in type
 * position ("T", "TKey", "TValue[]"). Those are told apart from real types
 * that merely start with "T" by a fixed token list, a shape rule and an
 * exception list of known real types.
 */

import type { GeneratorConfig } from "../config/generator-config.js";

export type GenericParameterRules = Pick<
  GeneratorConfig,
  "genericParameterNames" | "genericParameterExceptions"
>;

const SINGLE_UPPERCASE = /^\p{Lu}$/u;
const T_PREFIXED = /^T\p{Lu}/u;

export const isGenericTypeParameter = (
  typeText: string,
  rules: GenericParameterRules
): boolean => {
  const base = typeText.replace(/[[\]]+$/, "").replace(/\?+$/, "");
  if (rules.genericParameterNames.has(base) || SINGLE_UPPERCASE.test(base)) {
    return true;
  }
  // TMP_FontAsset and friends are real types
  if (base.includes("_")) {
    return false;
  }
  return T_PREFIXED.test(base) && !rules.genericParameterExceptions.has(base);
};

/**
 * True when any argument of the first generic argument list is a generic
 * parameter, e.g. "List<T>" or "Dictionary<string, TValue>".
 */
export const hasGenericTypeArgument = (
  typeText: string,
  rules: GenericParameterRules
): boolean => {
  const open = typeText.indexOf("<");
  const close = typeText.lastIndexOf(">");
  if (open < 0 || close < open) {
    return false;
  }
  return typeText
    .slice(open + 1, close)
    .split(",")
    .some((arg) => isGenericTypeParameter(arg.trim(), rules));
};
