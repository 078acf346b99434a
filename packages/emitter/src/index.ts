/**
 * wrapgen emitter - C# wrapper generator
 */

export * from "./types.js";
export { emitWrappers } from "./emitter.js";
export { emitNamespace } from "./namespace-emitter.js";
export { generateFileHeader } from "./constants.js";
export {
  addressPlaceholder,
  createPlaceholderNames,
  type PlaceholderKind,
  type PlaceholderNames,
  sanitizeIdentifier,
  wrapperFileName,
} from "./naming.js";
export { validateMethod, validateType } from "./validation.js";
export {
  escapeCSharpIdentifier,
  escapeQualifiedName,
  isCSharpKeyword,
} from "./emitter-types/index.js";
