/**
 * Identifier classification predicates
 *
 * Pure string inspections used to spot obfuscated names in dumps. IL2CPP
 * obfuscators either rename to non-ASCII scripts (Malayalam, Greek, ...)
 * or to long runs of uppercase letters such as "FKALGHJIADI".
 */

const IDENTIFIER_TEXT = /^[A-Za-z0-9_]+$/;
const ALL_UPPERCASE_LETTERS = /^[A-Z]+$/;
const DECORATION_CHARS = /[<>.|]/g;

/** Minimum length at which an all-uppercase name is treated as obfuscated */
const UPPERCASE_OBFUSCATION_LENGTH = 8;

/**
 * True when every character is an ASCII letter, digit or underscore.
 * The empty string is not a valid identifier.
 */
export const hasValidIdentifierChars = (name: string): boolean =>
  IDENTIFIER_TEXT.test(name);

/**
 * Remove generic, member-access and pipe decoration that compiler-generated
 * names carry, e.g. "<Start>d__4" -> "Startd__4".
 */
export const stripDecoration = (name: string): string =>
  name.replace(DECORATION_CHARS, "");

/**
 * True for names that contain characters no C# identifier can hold,
 * ignoring decoration characters.
 */
export const isUnicodeName = (name: string): boolean =>
  name.length > 0 && !hasValidIdentifierChars(stripDecoration(name));

const CONSTRUCTOR_NAMES: ReadonlySet<string> = new Set([".ctor", ".cctor"]);

/**
 * True when a member name can become a C# identifier once its decoration
 * is replaced. Constructor names never can.
 */
export const isRepresentableName = (name: string): boolean =>
  !CONSTRUCTOR_NAMES.has(name) && hasValidIdentifierChars(stripDecoration(name));

/**
 * Cut type text down to the bare name: no generic arguments,
 * array ranks or backtick arity.
 */
export const bareName = (typeText: string): string =>
  typeText.split("<")[0]?.split("[")[0]?.split("`")[0] ?? "";

export const isObfuscatedName = (name: string): boolean => {
  const base = bareName(name);
  if (!hasValidIdentifierChars(base)) {
    return true;
  }
  return (
    base.length >= UPPERCASE_OBFUSCATION_LENGTH &&
    ALL_UPPERCASE_LETTERS.test(base)
  );
};
