import type { TypeDeclaration } from "@wrapgen/frontend";
import {
  commentLine,
  type CSharpInterfaceDeclarationAst,
} from "../core/format/backend-ast/index.js";
import type { NamespaceScope } from "./scope.js";
import { mappedTypeName, plainTypeGate } from "./type-names.js";

/**
 * Interfaces are written as empty stubs so that wrapper signatures can
 * still name them.
 */
export const emitInterface = (
  scope: NamespaceScope,
  decl: TypeDeclaration
): CSharpInterfaceDeclarationAst | undefined => {
  const gate = plainTypeGate(scope, decl);
  if (!gate.admitted) {
    scope.record(decl.name, gate.reason);
    return undefined;
  }

  const { name, docSummary } = mappedTypeName(scope, decl, "interface");
  if (!scope.claimTypeName(decl, name)) {
    scope.record(decl.name, "duplicateTypeName");
    return undefined;
  }

  return {
    kind: "interfaceDeclaration",
    ...(docSummary !== undefined ? { docSummary } : {}),
    modifiers: ["public"],
    name,
    members: [commentLine("Stub interface")],
  };
};
