/**
 * Line patterns for IL2CPP dump text
 *
 * Every pattern is matched against a trimmed line. Identifier-like slots
 * accept any Unicode letter, mark or digit so obfuscated names survive
 * parsing and are judged later.
 */

export const DLL_DIRECTIVE = /^\/\/\s*Dll\s*:\s*(.+)$/u;

export const NAMESPACE_DIRECTIVE = /^\/\/\s*Namespace:\s*(.*)$/u;

export const TYPE_HEADER =
  /^(public|internal|private)\s+((?:sealed\s+|abstract\s+|static\s+)*)(class|interface|enum|struct)\s+(\S+)(?:\s*:\s*(\S+))?/u;

export const FIELD_LINE =
  /^\s*(public|protected|internal|private)\s+(const\s+)?([\p{L}\p{M}\p{N}_.`[\]]+)\s+([\p{L}\p{M}\p{N}_]+)\s*(?:=\s*([^;]+))?;/u;

export const PROPERTY_LINE =
  /^\s*(public|internal|private)\s+([\p{L}\p{M}\p{N}_.`[\]]+)\s+([\p{L}\p{M}\p{N}_]+)\s*\{([^}]*)\}/u;

export const METHOD_LINE =
  /^\s*(public|internal|private)\s+(static\s+|virtual\s+|override\s+|abstract\s+|sealed\s+)?([\p{L}\p{M}\p{N}_.`[\]]+)\s+(\S+)\s*\(([^)]*)\)/u;

/** `[out|ref|in ]TYPE NAME`; the modifier needs its own whitespace */
export const PARAMETER_TOKEN = /^\s*(?:(out|ref|in)\s+)?(\S+)\s+(\S+)\s*$/u;

export const DEFAULT_VALUE_SUFFIX = /\s*=.*$/su;

export const RVA_COMMENT_PREFIX = "// RVA:";

export const RVA_VALUE = /RVA:\s*(0x[0-9A-Fa-f]+)/u;

export const SECTION_FIELDS = "// Fields";
export const SECTION_PROPERTIES = "// Properties";
export const SECTION_METHODS = "// Methods";
