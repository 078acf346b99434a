/**
 * Member line parsing
 *
 * Each function takes one trimmed line from a type body and returns the
 * declaration it describes, or undefined when the line is not that kind
 * of member.
 */

import {
  type FieldDeclaration,
  type MethodDeclaration,
  NO_NAME_PARAMETER,
  type ParameterDeclaration,
  type ParameterModifier,
  type PropertyDeclaration,
} from "../types/declarations.js";
import {
  DEFAULT_VALUE_SUFFIX,
  FIELD_LINE,
  METHOD_LINE,
  PARAMETER_TOKEN,
  PROPERTY_LINE,
  RVA_VALUE,
} from "./patterns.js";

const toModifier = (text: string | undefined): ParameterModifier => {
  switch (text) {
    case "out":
    case "ref":
    case "in":
      return text;
    default:
      return "none";
  }
};

export const parseFieldLine = (line: string): FieldDeclaration | undefined => {
  const match = FIELD_LINE.exec(line);
  if (!match) {
    return undefined;
  }
  const [, visibility = "", constKeyword, type = "", name = "", literal] =
    match;
  return {
    name,
    type,
    visibility,
    isConst: constKeyword !== undefined,
    ...(literal !== undefined ? { literalValue: literal.trim() } : {}),
  };
};

export const parsePropertyLine = (
  line: string
): PropertyDeclaration | undefined => {
  const match = PROPERTY_LINE.exec(line);
  if (!match) {
    return undefined;
  }
  const [, visibility = "", type = "", name = "", accessors = ""] = match;
  return {
    name,
    type,
    visibility,
    hasGetter: accessors.includes("get;"),
    hasSetter: accessors.includes("set;"),
  };
};

/**
 * Parse one comma-separated parameter token.
 *
 * "ref Vector3" has no name: the modifier lands in the type slot, so the
 * parameter is rebuilt with the sentinel name. Tokens that do not parse
 * at all keep their text as the type, also with the sentinel name.
 */
export const parseParameter = (token: string): ParameterDeclaration => {
  const text = token.replace(DEFAULT_VALUE_SUFFIX, "");
  const match = PARAMETER_TOKEN.exec(text);
  if (!match) {
    return { modifier: "none", type: token.trim(), name: NO_NAME_PARAMETER };
  }

  const [, modifier, type = "", name = ""] = match;
  const misplaced = toModifier(type);
  if (misplaced !== "none") {
    return { modifier: misplaced, type: name, name: NO_NAME_PARAMETER };
  }
  return { modifier: toModifier(modifier), type, name };
};

export const parseParameterList = (
  block: string
): readonly ParameterDeclaration[] =>
  block
    .split(",")
    .map((token) => token.trim())
    .filter((token) => token !== "")
    .map(parseParameter);

export const parseMethodLine = (
  line: string,
  nativeAddress: string | undefined
): MethodDeclaration | undefined => {
  const match = METHOD_LINE.exec(line);
  if (!match) {
    return undefined;
  }
  const [, visibility = "", modifier, returnType = "", name = "", params = ""] =
    match;
  return {
    name,
    returnType,
    isStatic: modifier?.trim() === "static",
    visibility,
    parameters: parseParameterList(params.trim()),
    ...(nativeAddress !== undefined ? { nativeAddress } : {}),
  };
};

/**
 * Extract the hex RVA from an "// RVA: 0x52F1E0 Offset: ..." comment.
 * "RVA: -1" (no code) yields undefined.
 */
export const parseRvaComment = (line: string): string | undefined =>
  RVA_VALUE.exec(line)?.[1];
