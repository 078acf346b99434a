/**
 * Console output for the CLI, filtered by --verbose and --quiet.
 * Quiet wins when both are given; errors always print.
 */

import { type Diagnostic, formatDiagnostic } from "@wrapgen/frontend";
import type { CliOptions } from "../types.js";

export type Log = {
  readonly info: (message: string) => void;
  readonly detail: (message: string) => void;
  readonly warn: (diagnostic: Diagnostic) => void;
  readonly error: (message: string) => void;
};

export const createLog = (options: CliOptions): Log => {
  const quiet = options.quiet ?? false;
  const verbose = (options.verbose ?? false) && !quiet;
  return {
    info: (message) => {
      if (!quiet) console.log(message);
    },
    detail: (message) => {
      if (verbose) console.log(message);
    },
    warn: (diagnostic) => {
      if (!quiet) console.warn(`Warning: ${formatDiagnostic(diagnostic)}`);
    },
    error: (message) => console.error(`Error: ${message}`),
  };
};
