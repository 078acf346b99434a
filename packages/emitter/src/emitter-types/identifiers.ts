/**
 * C# identifier escaping
 *
 * Reserved keywords need an @ prefix to be used as names. Contextual
 * keywords (get, set, value, var, ...) are legal identifiers and are
 * left alone.
 */

const CSHARP_KEYWORDS: ReadonlySet<string> = new Set([
  "abstract",
  "as",
  "base",
  "bool",
  "break",
  "byte",
  "case",
  "catch",
  "char",
  "checked",
  "class",
  "const",
  "continue",
  "decimal",
  "default",
  "delegate",
  "do",
  "double",
  "else",
  "enum",
  "event",
  "explicit",
  "extern",
  "false",
  "finally",
  "fixed",
  "float",
  "for",
  "foreach",
  "goto",
  "if",
  "implicit",
  "in",
  "int",
  "interface",
  "internal",
  "is",
  "lock",
  "long",
  "namespace",
  "new",
  "null",
  "object",
  "operator",
  "out",
  "override",
  "params",
  "private",
  "protected",
  "public",
  "readonly",
  "ref",
  "return",
  "sbyte",
  "sealed",
  "short",
  "sizeof",
  "stackalloc",
  "static",
  "string",
  "struct",
  "switch",
  "this",
  "throw",
  "true",
  "try",
  "typeof",
  "uint",
  "ulong",
  "unchecked",
  "unsafe",
  "ushort",
  "using",
  "virtual",
  "void",
  "volatile",
  "while",
]);

/**
 * Keywords that name a type. Written bare in type position.
 */
export const PREDEFINED_TYPE_KEYWORDS: ReadonlySet<string> = new Set([
  "bool",
  "byte",
  "char",
  "decimal",
  "double",
  "float",
  "int",
  "long",
  "object",
  "sbyte",
  "short",
  "string",
  "uint",
  "ulong",
  "ushort",
  "void",
]);

export const isCSharpKeyword = (name: string): boolean =>
  CSHARP_KEYWORDS.has(name);

/**
 * `class` -> `@class`. Names that already carry the prefix are returned
 * unchanged.
 */
export const escapeCSharpIdentifier = (name: string): string =>
  CSHARP_KEYWORDS.has(name) ? `@${name}` : name;

/**
 * Escape each segment of a dotted name. A leading `global::` and
 * predefined type keywords are kept as written.
 */
export const escapeQualifiedName = (name: string): string => {
  const globalPrefix = "global::";
  const hasGlobal = name.startsWith(globalPrefix);
  const body = hasGlobal ? name.slice(globalPrefix.length) : name;

  const escaped = body
    .split(".")
    .map((segment) =>
      PREDEFINED_TYPE_KEYWORDS.has(segment)
        ? segment
        : escapeCSharpIdentifier(segment)
    )
    .join(".");

  return hasGlobal ? `${globalPrefix}${escaped}` : escaped;
};
