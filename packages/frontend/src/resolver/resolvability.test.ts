import { describe, it } from "mocha";
import { expect } from "chai";
import { eligibleNamespaces, isResolvable } from "./resolvability.js";
import { createResolverRegistry } from "./resolver.fixture.js";
import type { TypeRegistry } from "../registry/registry.js";

const reasonOf = (registry: TypeRegistry, typeText: string): string => {
  const decision = isResolvable(registry, typeText);
  return decision.admitted ? "admitted" : decision.reason;
};

describe("isResolvable", () => {
  const registry = createResolverRegistry();

  it("should accept primitives, built-ins and generic parameters", () => {
    expect(reasonOf(registry, "Int32")).to.equal("admitted");
    expect(reasonOf(registry, "string[]")).to.equal("admitted");
    expect(reasonOf(registry, "TimeSpan")).to.equal("admitted");
    expect(reasonOf(registry, "TKey")).to.equal("admitted");
  });

  it("should accept generated types", () => {
    expect(reasonOf(registry, "Player")).to.equal("admitted");
    expect(reasonOf(registry, "Player[]")).to.equal("admitted");
    expect(reasonOf(registry, "Inventory")).to.equal("admitted");
  });

  it("should give a reason for every failure", () => {
    expect(reasonOf(registry, "")).to.equal("emptyType");
    expect(reasonOf(registry, "Player*")).to.equal("pointerType");
    expect(reasonOf(registry, "System.IO.Stream")).to.equal(
      "skippedTypePrefix"
    );
    expect(reasonOf(registry, "Path")).to.equal("unresolvableType");
    expect(reasonOf(registry, "Pool<Player>")).to.equal("unknownGenericType");
    expect(reasonOf(registry, "List<Ghost>")).to.equal("genericArgument");
    expect(reasonOf(registry, "Ghost")).to.equal("unregisteredType");
    expect(reasonOf(registry, "Hidden")).to.equal("notGenerated");
  });

  it("should check every argument of a known container", () => {
    expect(reasonOf(registry, "Dictionary<string, List<Player>>")).to.equal(
      "admitted"
    );
    expect(reasonOf(registry, "List`1")).to.equal("admitted");
  });

  it("should only grow when a skipped namespace is admitted", () => {
    const candidates = [
      "Player",
      "Room",
      "Camera",
      "Hidden",
      "List<Room>",
      "Object",
      "Ghost",
    ];
    const resolvedWith = (reg: TypeRegistry): string[] =>
      candidates.filter((c) => isResolvable(reg, c).admitted);

    const narrow = createResolverRegistry({
      skipNamespaces: ["Game"],
      skipNamespacePrefixes: ["Photon."],
    });
    const wide = createResolverRegistry({ skipNamespaces: ["Game"] });

    const before = resolvedWith(narrow);
    const after = resolvedWith(wide);
    expect(before).to.deep.equal(["Camera", "Object"]);
    expect(after).to.deep.equal(["Room", "Camera", "List<Room>", "Object"]);
    expect(before.every((c) => after.includes(c))).to.equal(true);
  });

  it("should list eligible namespaces in registration order", () => {
    expect(eligibleNamespaces(registry, "Object")).to.deep.equal([
      "UnityEngine",
      "Alpha",
      "Beta",
    ]);
    expect(eligibleNamespaces(registry, "Hidden")).to.deep.equal([]);
  });
});
