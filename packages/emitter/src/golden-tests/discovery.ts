/**
 * Test scenario discovery
 *
 * Directory structure:
 *   testcases/
 *   └── <category>/<test>/
 *       ├── config.yaml
 *       ├── <name>.dump.txt
 *       └── expected/<file>.cs
 */

import * as fs from "fs";
import * as path from "path";
import { parseConfigYaml } from "./config-parser.js";
import type { Scenario } from "./types.js";

/**
 * Discover all test scenarios below `baseDir`
 */
export const discoverScenarios = (baseDir: string): readonly Scenario[] => {
  const scenarios: Scenario[] = [];

  const walk = (dir: string, pathParts: readonly string[]): void => {
    const entries = fs.readdirSync(dir, { withFileTypes: true });
    const hasConfig = entries.some((e) => e.name === "config.yaml");

    if (hasConfig) {
      const configPath = path.join(dir, "config.yaml");
      const testEntries = parseConfigYaml(fs.readFileSync(configPath, "utf-8"));

      for (const entry of testEntries) {
        const inputPath = path.join(dir, entry.input);
        if (!fs.existsSync(inputPath)) {
          throw new Error(
            `Input file not found: ${inputPath} (title: "${entry.title}", config: ${configPath})`
          );
        }

        const expectedFiles = new Map<string, string>();
        for (const file of entry.files) {
          const expectedPath = path.join(dir, "expected", file);
          if (!fs.existsSync(expectedPath)) {
            throw new Error(
              `Expected file not found: ${expectedPath} (title: "${entry.title}", config: ${configPath})`
            );
          }
          expectedFiles.set(file, expectedPath);
        }

        scenarios.push({
          pathParts,
          title: entry.title,
          inputPath,
          expectedFiles,
          skipNamespaces: entry.skipNamespaces ?? [],
          skipTypes: entry.skipTypes ?? [],
          mappings: entry.mappings ?? {},
        });
      }
    }

    for (const entry of entries) {
      if (entry.isDirectory() && entry.name !== "expected") {
        walk(path.join(dir, entry.name), [...pathParts, entry.name]);
      }
    }
  };

  if (fs.existsSync(baseDir)) {
    walk(baseDir, []);
  }
  return scenarios;
};
