/**
 * Dump file input
 */

import { existsSync, readFileSync } from "node:fs";
import {
  createDiagnostic,
  type Diagnostic,
  error,
  ok,
  type Result,
} from "@wrapgen/frontend";

/**
 * Decode dump bytes as UTF-8. Invalid sequences become U+FFFD and a
 * leading byte order mark is dropped.
 */
export const decodeDump = (bytes: Uint8Array): string =>
  new TextDecoder("utf-8").decode(bytes);

export const readDump = (dumpPath: string): Result<string, Diagnostic> => {
  if (!existsSync(dumpPath)) {
    return error(
      createDiagnostic("WG3001", "error", "Dump file not found", {
        file: dumpPath,
      })
    );
  }
  try {
    return ok(decodeDump(readFileSync(dumpPath)));
  } catch (e) {
    return error(
      createDiagnostic(
        "WG3002",
        "error",
        `Failed to read dump file: ${e instanceof Error ? e.message : String(e)}`,
        { file: dumpPath }
      )
    );
  }
};
