export type { DescribeNode, Scenario, TestEntry } from "./types.js";
export { parseConfigYaml } from "./config-parser.js";
export { discoverScenarios } from "./discovery.js";
export { normalizeCs, runScenario } from "./runner.js";
export { buildDescribeTree, registerNode } from "./registration.js";
