import { describe, it } from "mocha";
import { expect } from "chai";
import {
  type MethodDeclaration,
  NO_NAME_PARAMETER,
} from "@wrapgen/frontend";
import { buildFixture, typeWithMethod } from "./emitter.fixture.js";
import { validateMethod, validateType } from "./validation.js";

const { registry } = buildFixture([
  "// Namespace: Game",
  ...typeWithMethod("Player"),
  "public class Hidden",
  "{",
  "}",
]);

const method = (overrides: Partial<MethodDeclaration>): MethodDeclaration => ({
  name: "Run",
  returnType: "void",
  isStatic: false,
  visibility: "public",
  parameters: [],
  ...overrides,
});

describe("Member validation", () => {
  describe("validateType", () => {
    it("should admit primitives and generated types", () => {
      expect(validateType(registry, "int").admitted).to.equal(true);
      expect(validateType(registry, "Player").admitted).to.equal(true);
      expect(validateType(registry, "Player[]").admitted).to.equal(true);
    });

    it("should name the first rule a type breaks", () => {
      const reasons = [
        "T",
        "List<TValue>",
        "Player*",
        "ഇഈ",
        "Nullable<int>",
        "Missing",
        "Hidden",
      ].map((type) => {
        const decision = validateType(registry, type);
        return decision.admitted ? "admitted" : decision.reason;
      });
      expect(reasons).to.deep.equal([
        "genericParameter",
        "genericArgument",
        "pointerType",
        "obfuscatedName",
        "nullableType",
        "unregisteredType",
        "notGenerated",
      ]);
    });
  });

  describe("validateMethod", () => {
    const reasonOf = (m: MethodDeclaration): string => {
      const decision = validateMethod(registry, m);
      return decision.admitted ? "admitted" : decision.reason;
    };

    it("should admit a plain method", () => {
      expect(
        reasonOf(
          method({
            returnType: "Player",
            parameters: [{ modifier: "none", type: "int", name: "count" }],
          })
        )
      ).to.equal("admitted");
    });

    it("should reject constructors and compiler-generated names", () => {
      expect(reasonOf(method({ name: ".ctor" }))).to.equal("constructor");
      expect(reasonOf(method({ name: ".cctor" }))).to.equal("constructor");
      expect(reasonOf(method({ name: "<Start>d__4" }))).to.equal(
        "compilerGenerated"
      );
    });

    it("should reject explicit interface implementations", () => {
      expect(reasonOf(method({ name: "System.IDisposable.Dispose" }))).to.equal(
        "explicitInterface"
      );
    });

    it("should reject unnamed before by-reference parameters", () => {
      expect(
        reasonOf(
          method({
            parameters: [
              { modifier: "ref", type: "int", name: NO_NAME_PARAMETER },
            ],
          })
        )
      ).to.equal("unnamedParameter");
      expect(
        reasonOf(
          method({ parameters: [{ modifier: "out", type: "int", name: "x" }] })
        )
      ).to.equal("byRefParameter");
    });

    it("should check the return type before the parameters", () => {
      expect(
        reasonOf(
          method({
            returnType: "T",
            parameters: [{ modifier: "none", type: "Missing", name: "m" }],
          })
        )
      ).to.equal("genericParameter");
    });
  });
});
