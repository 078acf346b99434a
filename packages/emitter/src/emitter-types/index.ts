/**
 * Emitter types - Public API
 */

export {
  PREDEFINED_TYPE_KEYWORDS,
  escapeCSharpIdentifier,
  escapeQualifiedName,
  isCSharpKeyword,
} from "./identifiers.js";
