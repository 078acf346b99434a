/**
 * CLI constants
 */

import { createRequire } from "node:module";
import { isRecord } from "@wrapgen/frontend";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");

export const VERSION =
  isRecord(packageJson) && typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

/** Process exit codes */
export const EXIT_SUCCESS = 0;
export const EXIT_USAGE = 1;
export const EXIT_DUMP_UNREADABLE = 2;
export const EXIT_WRITE_FAILED = 5;
