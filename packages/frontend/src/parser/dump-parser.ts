/**
 * Dump parser
 *
 * Single forward scan over the dump text. Directive comments update the
 * current library and namespace; each type header hands over to the body
 * scanner, and the outer scan resumes after the line that closed it.
 * Unrecognised lines are skipped, so parsing never fails.
 */

import type { TypeDeclaration, TypeKind } from "../types/declarations.js";
import {
  DLL_DIRECTIVE,
  NAMESPACE_DIRECTIVE,
  TYPE_HEADER,
} from "./patterns.js";
import { scanTypeBody } from "./type-body.js";

const toTypeKind = (text: string): TypeKind | undefined => {
  switch (text) {
    case "class":
    case "interface":
    case "enum":
    case "struct":
      return text;
    default:
      return undefined;
  }
};

export const splitLines = (text: string): readonly string[] =>
  text.split(/\r?\n/);

export const parseDump = (text: string): readonly TypeDeclaration[] => {
  const lines = splitLines(text);
  const declarations: TypeDeclaration[] = [];
  let library: string | undefined;
  let namespace: string | undefined;

  for (let index = 0; index < lines.length; index++) {
    const line = (lines[index] ?? "").trim();

    const dll = DLL_DIRECTIVE.exec(line);
    if (dll) {
      library = dll[1]?.trim();
      continue;
    }

    const ns = NAMESPACE_DIRECTIVE.exec(line);
    if (ns) {
      const value = ns[1]?.trim() ?? "";
      namespace = value === "" ? undefined : value;
      continue;
    }

    const header = TYPE_HEADER.exec(line);
    if (!header) {
      continue;
    }
    const [, visibility = "", modifiers = "", kindText = "", name = "", base] =
      header;
    const kind = toTypeKind(kindText);
    if (kind === undefined) {
      continue;
    }

    const body = scanTypeBody(lines, index);
    declarations.push({
      ...(library !== undefined ? { library } : {}),
      ...(namespace !== undefined ? { namespace } : {}),
      kind,
      name,
      ...(base !== undefined ? { baseType: base } : {}),
      visibility,
      isSealed: /\bsealed\b/.test(modifiers),
      isAbstract: /\babstract\b/.test(modifiers),
      isStatic: /\bstatic\b/.test(modifiers),
      fields: body.fields,
      properties: body.properties,
      methods: body.methods,
    });
    index = body.endIndex;
  }

  return declarations;
};
