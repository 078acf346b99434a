/**
 * Dump parser - Public API
 */

export { parseDump, splitLines } from "./dump-parser.js";
export type { TypeBody } from "./type-body.js";
export { scanTypeBody } from "./type-body.js";
export {
  parseFieldLine,
  parseMethodLine,
  parseParameter,
  parseParameterList,
  parsePropertyLine,
  parseRvaComment,
} from "./members.js";
