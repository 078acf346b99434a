/**
 * Type body scanning
 *
 * Walks the brace-delimited body that follows a type header, sorting
 * member lines by the most recent section marker. Depth is tracked on raw
 * lines, so braces inside comments and accessor lists count too; that is
 * how the dump format balances.
 */

import type {
  FieldDeclaration,
  MethodDeclaration,
  PropertyDeclaration,
} from "../types/declarations.js";
import {
  parseFieldLine,
  parseMethodLine,
  parsePropertyLine,
  parseRvaComment,
} from "./members.js";
import {
  RVA_COMMENT_PREFIX,
  SECTION_FIELDS,
  SECTION_METHODS,
  SECTION_PROPERTIES,
} from "./patterns.js";

type Section = "none" | "fields" | "properties" | "methods";

export type TypeBody = {
  readonly fields: readonly FieldDeclaration[];
  readonly properties: readonly PropertyDeclaration[];
  readonly methods: readonly MethodDeclaration[];
  /** Index of the line that closed the body (last line on EOF) */
  readonly endIndex: number;
};

const braceDelta = (line: string): number => {
  let delta = 0;
  for (const ch of line) {
    if (ch === "{") {
      delta++;
    } else if (ch === "}") {
      delta--;
    }
  }
  return delta;
};

const sectionMarker = (trimmed: string): Section | undefined => {
  if (trimmed.startsWith(SECTION_FIELDS)) return "fields";
  if (trimmed.startsWith(SECTION_PROPERTIES)) return "properties";
  if (trimmed.startsWith(SECTION_METHODS)) return "methods";
  return undefined;
};

/**
 * Scan the body of the type whose header sits at `headerIndex`.
 */
export const scanTypeBody = (
  lines: readonly string[],
  headerIndex: number
): TypeBody => {
  const fields: FieldDeclaration[] = [];
  const properties: PropertyDeclaration[] = [];
  const methods: MethodDeclaration[] = [];
  const lastIndex = Math.max(lines.length - 1, 0);

  let index = headerIndex;
  let depth = 0;

  // Find the opening brace
  for (; index < lines.length; index++) {
    const line = lines[index] ?? "";
    if (line.includes("{")) {
      depth = braceDelta(line);
      if (depth === 0) {
        return { fields, properties, methods, endIndex: index };
      }
      index++;
      break;
    }
  }

  let section: Section = "none";
  let pendingAddress: string | undefined;

  for (; index < lines.length; index++) {
    const raw = lines[index] ?? "";
    depth += braceDelta(raw);
    if (depth <= 0) {
      return { fields, properties, methods, endIndex: index };
    }

    const trimmed = raw.trim();
    const marker = sectionMarker(trimmed);
    if (marker !== undefined) {
      section = marker;
      continue;
    }

    switch (section) {
      case "fields": {
        const field = parseFieldLine(trimmed);
        if (field) fields.push(field);
        break;
      }
      case "properties": {
        const property = parsePropertyLine(trimmed);
        if (property) properties.push(property);
        break;
      }
      case "methods": {
        if (trimmed.startsWith(RVA_COMMENT_PREFIX)) {
          pendingAddress = parseRvaComment(trimmed);
          break;
        }
        const method = parseMethodLine(trimmed, pendingAddress);
        if (method) {
          methods.push(method);
          pendingAddress = undefined;
        }
        break;
      }
      case "none":
        break;
    }
  }

  return { fields, properties, methods, endIndex: lastIndex };
};
