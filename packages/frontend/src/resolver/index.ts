/**
 * Type resolution - Public API
 */

export { mapType } from "./type-mapping.js";
export { eligibleNamespaces, isResolvable } from "./resolvability.js";
export type { NameResolution } from "./qualification.js";
export { qualify, qualifyBaseType, resolveName } from "./qualification.js";
