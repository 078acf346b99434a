/**
 * C# Emitter Types
 */

import type { ExclusionReason } from "@wrapgen/frontend";

export type EmitterOptions = {
  /** Dump file name recorded in a "Generated from" header line */
  readonly sourceName?: string;
  /** Off by default so repeated runs produce identical files */
  readonly includeTimestamp?: boolean;
  readonly timestamp?: string;
};

/**
 * Something the emitter left out, and why. `memberName` is absent for
 * whole types.
 */
export type EmitExclusion = {
  readonly namespace: string;
  readonly typeName: string;
  readonly memberName?: string;
  readonly reason: ExclusionReason;
};

export type EmittedFile = {
  readonly fileName: string;
  /** Namespace as written in the file */
  readonly namespace: string;
  readonly text: string;
};

export type NamespaceEmission = {
  /** Undefined when no type in the namespace produced output */
  readonly file: EmittedFile | undefined;
  readonly typeCount: number;
  readonly exclusions: readonly EmitExclusion[];
};

export type EmitResult = {
  /** File name -> C# text, in namespace first-appearance order */
  readonly files: ReadonlyMap<string, string>;
  /** Output namespace -> number of emitted types */
  readonly typeCounts: ReadonlyMap<string, number>;
  readonly exclusions: readonly EmitExclusion[];
};
