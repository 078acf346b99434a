/**
 * Mocha registration for golden scenarios: one describe block per
 * directory below testcases/, one it() per config.yaml entry.
 */

import { describe, it } from "mocha";
import { runScenario } from "./runner.js";
import type { DescribeNode, Scenario } from "./types.js";

const childOf = (node: DescribeNode, name: string): DescribeNode => {
  const existing = node.children.get(name);
  if (existing !== undefined) {
    return existing;
  }
  const created: DescribeNode = { name, children: new Map(), tests: [] };
  node.children.set(name, created);
  return created;
};

/**
 * Nest scenarios by their directory path. Undefined when there are none.
 */
export const buildDescribeTree = (
  scenarios: readonly Scenario[]
): DescribeNode | undefined => {
  if (scenarios.length === 0) {
    return undefined;
  }
  const root: DescribeNode = { name: "", children: new Map(), tests: [] };
  for (const scenario of scenarios) {
    scenario.pathParts.reduce(childOf, root).tests.push(scenario);
  }
  return root;
};

export const registerNode = (node: DescribeNode): void => {
  describe(node.name, () => {
    node.children.forEach(registerNode);
    for (const scenario of node.tests) {
      it(scenario.title, () => runScenario(scenario));
    }
  });
};
