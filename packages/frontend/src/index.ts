/**
 * wrapgen frontend - dump parser, type registry and resolution engine
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./types/declarations.js";
export * from "./types/decision.js";

export * from "./config/index.js";
export * from "./names/index.js";
export * from "./mappings.js";
export * from "./parser/index.js";
export * from "./registry/index.js";
export * from "./resolver/index.js";
