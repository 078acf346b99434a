/**
 * Declaration emitters - Public API
 */

export type { NamespaceScope } from "./scope.js";
export { createNamespaceScope, writableType } from "./scope.js";
export type { ClassLookup, ForwardCall, ForwardTarget } from "./forwarding.js";
export {
  forwardCall,
  getFieldCall,
  parameterTypeArray,
  ROOT_BASE_TYPE,
  RUNTIME_CLASS,
  setFieldCall,
} from "./forwarding.js";
export { emitDelegate } from "./delegates.js";
export { emitEnum } from "./enums.js";
export { emitInterface } from "./interfaces.js";
export { emitStruct } from "./structs.js";
export { emitClass, resolveBaseType } from "./classes.js";
