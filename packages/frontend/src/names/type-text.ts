/**
 * Type-text helpers
 *
 * Type references in a dump are plain strings ("List<Item>[]",
 * "Dictionary`2", "Vector3?"). These helpers take them apart without
 * building a full type syntax.
 */

import { bareName } from "./identifiers.js";

const ARRAY_SUFFIX = /(?:\[\])+$/;

/**
 * Bare name with nullable markers removed: "Item?[]" -> "Item".
 */
export const baseTypeName = (typeText: string): string =>
  bareName(typeText).replace(/^\?+|\?+$/g, "");

export const isGenericUse = (typeText: string): boolean =>
  (typeText.includes("<") && typeText.includes(">")) || typeText.includes("`");

/**
 * Split an argument list on top-level commas.
 * "int, Dictionary<string, int>" -> ["int", "Dictionary<string, int>"]
 */
export const splitGenericArguments = (inner: string): readonly string[] => {
  const args: string[] = [];
  let depth = 0;
  let current = "";

  for (const ch of inner) {
    if (ch === "<") {
      depth++;
    } else if (ch === ">") {
      depth--;
    } else if (ch === "," && depth === 0) {
      args.push(current.trim());
      current = "";
      continue;
    }
    current += ch;
  }

  if (current.trim() !== "") {
    args.push(current.trim());
  }
  return args;
};

export type GenericTypeText = {
  readonly name: string;
  readonly typeArguments: readonly string[];
  /** Anything after the closing bracket, usually array ranks */
  readonly suffix: string;
};

/**
 * Take "List<Item>[]" apart into name, arguments and suffix.
 * Returns undefined for text without an angle-bracket argument list.
 */
export const splitGenericTypeText = (
  typeText: string
): GenericTypeText | undefined => {
  const open = typeText.indexOf("<");
  const close = typeText.lastIndexOf(">");
  if (open < 0 || close < open) {
    return undefined;
  }
  return {
    name: typeText.slice(0, open),
    typeArguments: splitGenericArguments(typeText.slice(open + 1, close)),
    suffix: typeText.slice(close + 1),
  };
};

export type ArrayTypeText = {
  readonly element: string;
  /** "" for non-array text, otherwise one "[]" per rank */
  readonly suffix: string;
};

export const stripArraySuffix = (typeText: string): ArrayTypeText => {
  const match = ARRAY_SUFFIX.exec(typeText);
  if (!match) {
    return { element: typeText, suffix: "" };
  }
  return {
    element: typeText.slice(0, match.index),
    suffix: match[0],
  };
};

/**
 * Base types in headers keep the comma that separates them from the
 * interface list: "MonoBehaviour," -> "MonoBehaviour".
 */
export const trimBaseType = (baseType: string): string =>
  baseType.replace(/,+$/, "").trim();
