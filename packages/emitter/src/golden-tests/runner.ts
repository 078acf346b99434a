/**
 * Test scenario runner
 */

import {
  buildRegistry,
  createGeneratorConfig,
  createNameMappings,
  parseDump,
} from "@wrapgen/frontend";
import { expect } from "chai";
import * as fs from "fs";
import * as path from "path";
import { emitWrappers } from "../emitter.js";
import { undeclaredReferences } from "../emitter.fixture.js";
import type { Scenario } from "./types.js";

/**
 * Normalize C# output for comparison
 */
export const normalizeCs = (code: string): string =>
  code
    .trim()
    .replace(/\r\n/g, "\n")
    .replace(/[ \t]+$/gm, "");

/**
 * Run a single test scenario
 */
export const runScenario = (scenario: Scenario): void => {
  const declarations = parseDump(fs.readFileSync(scenario.inputPath, "utf-8"));
  const config = createGeneratorConfig({
    skipNamespaces: scenario.skipNamespaces,
    skipTypes: scenario.skipTypes,
  });
  const mappings = createNameMappings(
    Object.entries(scenario.mappings).map(([obfuscatedName, friendlyName]) => ({
      obfuscatedName,
      friendlyName,
    }))
  );
  const registry = buildRegistry(declarations, config, mappings);
  const result = emitWrappers(declarations, registry, {
    sourceName: path.basename(scenario.inputPath),
  });

  expect([...result.files.keys()]).to.deep.equal(
    [...scenario.expectedFiles.keys()],
    `Generated files for ${scenario.pathParts.join("/")}`
  );

  for (const [fileName, expectedPath] of scenario.expectedFiles) {
    const actual = result.files.get(fileName) ?? "";
    const expected = fs.readFileSync(expectedPath, "utf-8");
    expect(normalizeCs(actual)).to.equal(
      normalizeCs(expected),
      `C# output mismatch for ${scenario.pathParts.join("/")}/${fileName}`
    );
  }

  expect(undeclaredReferences(result, registry)).to.deep.equal(
    [],
    `Undeclared types in ${scenario.pathParts.join("/")}`
  );
};
