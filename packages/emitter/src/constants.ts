/**
 * Shared constants for the wrapper emitter
 */

import type { EmitterOptions } from "./types.js";

/**
 * Header comment lines of a wrapper file, without their `//` markers.
 */
export const generateFileHeader = (
  namespace: string,
  options: EmitterOptions = {}
): readonly string[] => {
  const lines = [
    "Auto-generated Il2Cpp wrapper classes",
    `Namespace: ${namespace}`,
    "Do not edit manually",
  ];

  if (options.sourceName !== undefined) {
    lines.push(`Generated from: ${options.sourceName}`);
  }

  if (options.includeTimestamp ?? false) {
    const timestamp = options.timestamp ?? new Date().toISOString();
    lines.push(`Generated at: ${timestamp}`);
  }

  return lines;
};
