/**
 * Name classification and type-text helpers - Public API
 */

export {
  bareName,
  hasValidIdentifierChars,
  isObfuscatedName,
  isRepresentableName,
  isUnicodeName,
  stripDecoration,
} from "./identifiers.js";
export type { GenericParameterRules } from "./generic-parameters.js";
export {
  hasGenericTypeArgument,
  isGenericTypeParameter,
} from "./generic-parameters.js";
export type { ArrayTypeText, GenericTypeText } from "./type-text.js";
export {
  baseTypeName,
  isGenericUse,
  splitGenericArguments,
  splitGenericTypeText,
  stripArraySuffix,
  trimBaseType,
} from "./type-text.js";
export { namespaceSegments, sanitizeNamespace } from "./namespaces.js";
