import { describe, it } from "mocha";
import { expect } from "chai";
import { mapType } from "./type-mapping.js";
import { createResolverRegistry } from "./resolver.fixture.js";

describe("mapType", () => {
  const registry = createResolverRegistry();

  it("should map metadata primitives to C# keywords", () => {
    expect(mapType(registry, "Int32")).to.equal("int");
    expect(mapType(registry, "Void")).to.equal("void");
    expect(mapType(registry, "Single[]")).to.equal("float[]");
    expect(mapType(registry, "int")).to.equal("int");
  });

  it("should reject pointers and empty text", () => {
    expect(mapType(registry, "byte*")).to.equal(undefined);
    expect(mapType(registry, "")).to.equal(undefined);
  });

  it("should reject open generic arguments", () => {
    expect(mapType(registry, "List<T>")).to.equal(undefined);
    expect(mapType(registry, "Dictionary<string, TValue[]>")).to.equal(
      undefined
    );
  });

  it("should reject nullable value types", () => {
    expect(mapType(registry, "Nullable<int>")).to.equal(undefined);
    expect(mapType(registry, "Nullable`1")).to.equal(undefined);
  });

  it("should expand arity notation with object arguments", () => {
    expect(mapType(registry, "Dictionary`2")).to.equal(
      "Dictionary<object, object>"
    );
    expect(mapType(registry, "List`1[]")).to.equal("List<object>[]");
    expect(mapType(registry, "Weird`x")).to.equal("Weird");
  });

  it("should map generic arguments", () => {
    expect(mapType(registry, "List<Int32>")).to.equal("List<int>");
    expect(mapType(registry, "Dictionary<String, FKQPZLMWOER>[]")).to.equal(
      "Dictionary<string, Inventory>[]"
    );
  });

  it("should substitute friendly names and keep array ranks", () => {
    expect(mapType(registry, "FKQPZLMWOER[][]")).to.equal("Inventory[][]");
  });
});
