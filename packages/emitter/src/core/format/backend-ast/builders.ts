/**
 * Builders for backend C# AST nodes.
 */

import { splitGenericTypeText, stripArraySuffix } from "@wrapgen/frontend";
import { PREDEFINED_TYPE_KEYWORDS } from "../../../emitter-types/index.js";
import type {
  CSharpBlankLineAst,
  CSharpCommentLineAst,
  CSharpExpressionAst,
  CSharpLiteralExpressionAst,
  CSharpMemberAst,
  CSharpTypeAst,
} from "./types.js";

/**
 * Build a type node from C# type text such as "global::Game.Item[]" or
 * "Dictionary<string, List<int>>".
 */
export const typeFromText = (text: string): CSharpTypeAst => {
  const trimmed = text.trim();
  const { element, suffix } = stripArraySuffix(trimmed);
  if (suffix !== "") {
    let type = typeFromText(element);
    for (let rank = 0; rank < suffix.length / 2; rank++) {
      type = { kind: "arrayType", elementType: type, rank: 1 };
    }
    return type;
  }

  if (trimmed.endsWith("?")) {
    return {
      kind: "nullableType",
      underlyingType: typeFromText(trimmed.slice(0, -1)),
    };
  }

  const generic = splitGenericTypeText(trimmed);
  if (generic !== undefined) {
    return {
      kind: "identifierType",
      name: generic.name.trim(),
      typeArguments: generic.typeArguments.map(typeFromText),
    };
  }

  return PREDEFINED_TYPE_KEYWORDS.has(trimmed)
    ? { kind: "predefinedType", keyword: trimmed }
    : { kind: "identifierType", name: trimmed };
};

export const stringLiteral = (value: string): CSharpLiteralExpressionAst => ({
  kind: "literalExpression",
  text: `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`,
});

export const literal = (text: string): CSharpLiteralExpressionAst => ({
  kind: "literalExpression",
  text,
});

export const identifier = (name: string): CSharpExpressionAst => ({
  kind: "identifierExpression",
  identifier: name,
});

export const thisExpression: CSharpExpressionAst = { kind: "thisExpression" };

/**
 * `Il2CppRuntime.Call` style access from a dotted path.
 */
export const memberPath = (path: string): CSharpExpressionAst => {
  const [head = "", ...rest] = path.split(".");
  return rest.reduce<CSharpExpressionAst>(
    (expression, memberName) => ({
      kind: "memberAccessExpression",
      expression,
      memberName,
    }),
    identifier(head)
  );
};

export const invocation = (
  expression: CSharpExpressionAst,
  args: readonly CSharpExpressionAst[],
  typeArguments?: readonly CSharpTypeAst[]
): CSharpExpressionAst => ({
  kind: "invocationExpression",
  expression,
  arguments: args,
  ...(typeArguments !== undefined && typeArguments.length > 0
    ? { typeArguments }
    : {}),
});

export const blankLine = (): CSharpBlankLineAst => ({ kind: "blankLine" });

export const commentLine = (text: string): CSharpCommentLineAst => ({
  kind: "commentLine",
  text,
});

/**
 * Join member groups with a blank line between groups. Empty groups are
 * dropped.
 */
export const separatedGroups = (
  groups: readonly (readonly CSharpMemberAst[])[]
): readonly CSharpMemberAst[] =>
  groups
    .filter((group) => group.length > 0)
    .flatMap((group, index) => (index === 0 ? group : [blankLine(), ...group]));
