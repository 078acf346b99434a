/**
 * wrapgen generate command - write wrapper files for a dump
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { basename, join } from "node:path";
import {
  buildRegistry,
  createDiagnostic,
  type Diagnostic,
  error,
  type NameMappings,
  ok,
  parseDump,
  type Result,
} from "@wrapgen/frontend";
import { emitWrappers, type EmitExclusion } from "@wrapgen/emitter";
import type { Log } from "../cli/log.js";
import type { ResolvedConfig } from "../types.js";

export type GenerateSummary = {
  readonly namespaceCount: number;
  readonly typeCount: number;
  /** Absolute paths, in write order */
  readonly writtenFiles: readonly string[];
  readonly exclusions: readonly EmitExclusion[];
};

/**
 * Exclusion counts by reason, most frequent first.
 */
export const formatExclusionReport = (
  exclusions: readonly EmitExclusion[]
): readonly string[] => {
  const counts = new Map<string, number>();
  for (const exclusion of exclusions) {
    counts.set(exclusion.reason, (counts.get(exclusion.reason) ?? 0) + 1);
  }
  const rows = [...counts].sort(
    ([a, countA], [b, countB]) => countB - countA || a.localeCompare(b)
  );
  return [
    `Exclusions: ${exclusions.length}`,
    ...rows.map(([reason, count]) => `  ${reason}: ${count}`),
  ];
};

export const generateCommand = (
  config: ResolvedConfig,
  mappings: NameMappings,
  dumpText: string,
  log: Pick<Log, "detail">
): Result<GenerateSummary, Diagnostic> => {
  const declarations = parseDump(dumpText);
  const registry = buildRegistry(declarations, config.generator, mappings);
  const result = emitWrappers(declarations, registry, {
    sourceName: basename(config.dumpPath),
  });

  const writtenFiles: string[] = [];
  try {
    mkdirSync(config.outputDirectory, { recursive: true });
    for (const [fileName, text] of result.files) {
      const path = join(config.outputDirectory, fileName);
      writeFileSync(path, text, "utf-8");
      writtenFiles.push(path);
      log.detail(`  Wrote ${fileName}`);
    }
  } catch (e) {
    return error(
      createDiagnostic(
        "WG4001",
        "error",
        `Failed to write output: ${e instanceof Error ? e.message : String(e)}`,
        { file: config.outputDirectory }
      )
    );
  }

  let typeCount = 0;
  for (const count of result.typeCounts.values()) {
    typeCount += count;
  }

  return ok({
    namespaceCount: result.typeCounts.size,
    typeCount,
    writtenFiles,
    exclusions: result.exclusions,
  });
};
