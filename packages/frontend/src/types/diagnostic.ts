/**
 * Diagnostic types for wrapgen
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "WG1001" // Config file not found
  | "WG1002" // Failed to read config file
  | "WG1003" // Invalid JSON in config file
  | "WG1004" // Config file must be an object
  | "WG1005" // Invalid config field
  | "WG2001" // Mappings file not found
  | "WG2002" // Failed to read mappings file
  | "WG2003" // Invalid JSON in mappings file
  | "WG2004" // Mappings file must be an array
  | "WG2005" // Invalid mapping entry
  | "WG3001" // Dump file not found
  | "WG3002" // Failed to read dump file
  | "WG4001"; // Failed to write output file

export type SourceLocation = {
  readonly file: string;
  readonly line?: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      diagnostic.location.line !== undefined
        ? `${diagnostic.location.file}:${diagnostic.location.line}`
        : diagnostic.location.file
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
