/**
 * Type registry - Public API
 */

export type { TypeRegistry } from "./registry.js";
export { buildRegistry, publishedTypeName } from "./registry.js";
export type { NamespaceFilter } from "./namespaces.js";
export {
  createNamespaceFilter,
  detectThirdPartyNamespaces,
  observeNamespaces,
} from "./namespaces.js";
export type {
  DeclarationGroup,
  EligibilityContext,
  EnumConstant,
} from "./eligibility.js";
export {
  declarationGroup,
  DELEGATE_BASE_TYPE,
  EMISSION_ORDER,
  emittableEnumConstants,
  evaluateContent,
  hasGenericPublicField,
  isEmittableEnumValue,
  isDelegateDeclaration,
  isGenericTypeName,
} from "./eligibility.js";
