/**
 * Type definitions for CLI
 */

import type {
  GeneratorConfig,
  GeneratorConfigInput,
} from "@wrapgen/frontend";

/**
 * Configuration file (wrapgen.json). Every field is optional; lists
 * extend the built-in tables.
 */
export type WrapgenConfig = GeneratorConfigInput;

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  mappings?: string;
  out?: string;
  filePrefix?: string;
  noAutoDetect?: boolean;
  report?: boolean;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly dumpPath: string;
  /** Undefined when no mapping file was named or found */
  readonly mappingsPath: string | undefined;
  readonly outputDirectory: string;
  readonly generator: GeneratorConfig;
  readonly report: boolean;
};
