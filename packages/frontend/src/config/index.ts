/**
 * Generator configuration - Public API
 */

export type {
  GeneratorConfig,
  GeneratorConfigInput,
  OutputSettings,
  ThirdPartyDetection,
} from "./generator-config.js";
export { createGeneratorConfig, DEFAULT_OUTPUT } from "./generator-config.js";
export type { BuiltinTables } from "./builtin-tables.js";
export { BUILTIN_TABLES, parseBuiltinTables } from "./builtin-tables.js";
export { isRecord, isStringArray, isStringMap } from "./json-guards.js";
