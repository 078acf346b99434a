import {
  emittableEnumConstants,
  type TypeDeclaration,
} from "@wrapgen/frontend";
import {
  literal,
  type CSharpEnumDeclarationAst,
  type CSharpEnumMemberAst,
} from "../core/format/backend-ast/index.js";
import { sanitizeIdentifier } from "../naming.js";
import type { NamespaceScope } from "./scope.js";
import { mappedTypeName } from "./type-names.js";

export const emitEnum = (
  scope: NamespaceScope,
  decl: TypeDeclaration
): CSharpEnumDeclarationAst | undefined => {
  const decision = scope.registry.decisionFor(decl);
  if (!decision.admitted) {
    scope.record(decl.name, decision.reason);
    return undefined;
  }

  const members = emittableEnumConstants(decl).map(
    (constant): CSharpEnumMemberAst => {
      const name = sanitizeIdentifier(constant.name);
      if (name === undefined) {
        throw new Error(
          `ICE: Enum constant '${decl.name}.${constant.name}' passed the registry but has no identifier`
        );
      }
      return {
        name,
        ...(constant.value !== undefined
          ? { value: literal(constant.value) }
          : {}),
      };
    }
  );

  const { name, docSummary } = mappedTypeName(scope, decl, "enum");
  if (!scope.claimTypeName(decl, name)) {
    scope.record(decl.name, "duplicateTypeName");
    return undefined;
  }

  return {
    kind: "enumDeclaration",
    ...(docSummary !== undefined ? { docSummary } : {}),
    modifiers: ["public"],
    name,
    members,
  };
};
