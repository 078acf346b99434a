import type { TypeDeclaration } from "@wrapgen/frontend";
import {
  commentLine,
  typeFromText,
  type CSharpMemberAst,
  type CSharpStructDeclarationAst,
} from "../core/format/backend-ast/index.js";
import { sanitizeIdentifier } from "../naming.js";
import { type NamespaceScope, writableType } from "./scope.js";
import { mappedTypeName } from "./type-names.js";

/**
 * Structs are plain field holders. Fields whose type cannot be written
 * are dropped; a struct left without fields becomes a stub.
 */
export const emitStruct = (
  scope: NamespaceScope,
  decl: TypeDeclaration
): CSharpStructDeclarationAst | undefined => {
  const decision = scope.registry.decisionFor(decl);
  if (!decision.admitted) {
    scope.record(decl.name, decision.reason);
    return undefined;
  }

  const { name, docSummary } = mappedTypeName(scope, decl, "struct");
  if (!scope.claimTypeName(decl, name)) {
    scope.record(decl.name, "duplicateTypeName");
    return undefined;
  }

  const usedNames = new Set<string>([name]);
  const fields: CSharpMemberAst[] = [];
  for (const field of decl.fields) {
    if (field.visibility !== "public" || field.isConst) {
      continue;
    }
    const type = writableType(scope, field.type);
    if (!type.ok) {
      scope.record(decl.name, type.error, field.name);
      continue;
    }
    const fieldName = sanitizeIdentifier(field.name);
    if (fieldName === undefined) {
      scope.record(decl.name, "unrepresentableName", field.name);
      continue;
    }
    if (usedNames.has(fieldName)) {
      scope.record(decl.name, "memberNameConflict", field.name);
      continue;
    }
    usedNames.add(fieldName);
    fields.push({
      kind: "fieldDeclaration",
      modifiers: ["public"],
      type: typeFromText(type.value),
      name: fieldName,
    });
  }

  return {
    kind: "structDeclaration",
    ...(docSummary !== undefined ? { docSummary } : {}),
    modifiers: ["public"],
    name,
    members: fields.length > 0 ? fields : [commentLine("Stub struct")],
  };
};
