#!/usr/bin/env node
/**
 * wrapgen CLI - generates C# wrappers from IL2CPP metadata dumps
 */

import { pathToFileURL } from "node:url";
import { runCli } from "./cli/index.js";

const isEntryPoint =
  process.argv[1] !== undefined &&
  import.meta.url === pathToFileURL(process.argv[1]).href;

if (isEntryPoint) {
  try {
    process.exitCode = runCli(process.argv.slice(2));
  } catch (error) {
    console.error("Fatal error:", error);
    process.exitCode = 1;
  }
}

// Export for testing
export { runCli } from "./cli/index.js";
export * from "./types.js";
export * from "./config.js";
export * from "./mappings.js";
