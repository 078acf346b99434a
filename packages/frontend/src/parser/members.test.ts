import { describe, it } from "mocha";
import { expect } from "chai";
import {
  parseFieldLine,
  parseMethodLine,
  parseParameter,
  parseParameterList,
  parsePropertyLine,
  parseRvaComment,
} from "./members.js";

describe("Member line parsing", () => {
  describe("parseFieldLine", () => {
    it("should parse an instance field with its offset comment", () => {
      expect(parseFieldLine("public int health; // 0x18")).to.deep.equal({
        name: "health",
        type: "int",
        visibility: "public",
        isConst: false,
      });
    });

    it("should capture const literals", () => {
      expect(parseFieldLine("public const Weather Rain = 2;")).to.deep.equal({
        name: "Rain",
        type: "Weather",
        visibility: "public",
        isConst: true,
        literalValue: "2",
      });
    });

    it("should accept array and backtick types", () => {
      expect(parseFieldLine("protected List`1[] items;")).to.deep.equal({
        name: "items",
        type: "List`1[]",
        visibility: "protected",
        isConst: false,
      });
    });

    it("should keep obfuscated names", () => {
      expect(parseFieldLine("private ഇഈ ഉഊ; // 0x20")?.name).to.equal("ഉഊ");
    });

    it("should skip static and readonly fields", () => {
      expect(parseFieldLine("public static int count; // 0x0")).to.equal(
        undefined
      );
      expect(parseFieldLine("public readonly int limit; // 0x10")).to.equal(
        undefined
      );
    });
  });

  describe("parsePropertyLine", () => {
    it("should decode accessors", () => {
      expect(parsePropertyLine("public float Speed { get; set; }")).to.deep.equal(
        {
          name: "Speed",
          type: "float",
          visibility: "public",
          hasGetter: true,
          hasSetter: true,
        }
      );
      expect(
        parsePropertyLine("internal string Label { get; }")
      ).to.deep.equal({
        name: "Label",
        type: "string",
        visibility: "internal",
        hasGetter: true,
        hasSetter: false,
      });
    });
  });

  describe("parseParameter", () => {
    it("should parse plain and modified parameters", () => {
      expect(parseParameter("int amount")).to.deep.equal({
        modifier: "none",
        type: "int",
        name: "amount",
      });
      expect(parseParameter("out Vector3 hit")).to.deep.equal({
        modifier: "out",
        type: "Vector3",
        name: "hit",
      });
    });

    it("should not read a type starting with 'in' as a modifier", () => {
      expect(parseParameter("int index")).to.deep.equal({
        modifier: "none",
        type: "int",
        name: "index",
      });
    });

    it("should give a modifier without a name the sentinel name", () => {
      expect(parseParameter("ref Vector3")).to.deep.equal({
        modifier: "ref",
        type: "Vector3",
        name: "__no_name__",
      });
    });

    it("should drop default values", () => {
      expect(parseParameter("bool force = False")).to.deep.equal({
        modifier: "none",
        type: "bool",
        name: "force",
      });
    });

    it("should keep unparsable tokens with the sentinel name", () => {
      expect(parseParameter("params")).to.deep.equal({
        modifier: "none",
        type: "params",
        name: "__no_name__",
      });
    });

    it("should ignore empty tokens in a list", () => {
      expect(parseParameterList("int a, , string b")).to.deep.equal([
        { modifier: "none", type: "int", name: "a" },
        { modifier: "none", type: "string", name: "b" },
      ]);
    });
  });

  describe("parseMethodLine", () => {
    it("should parse a static method with parameters", () => {
      expect(
        parseMethodLine("public static Item Spawn(int id, Vector3 at) { }", "0x1A2B")
      ).to.deep.equal({
        name: "Spawn",
        returnType: "Item",
        isStatic: true,
        visibility: "public",
        parameters: [
          { modifier: "none", type: "int", name: "id" },
          { modifier: "none", type: "Vector3", name: "at" },
        ],
        nativeAddress: "0x1A2B",
      });
    });

    it("should only treat 'static' as static", () => {
      const method = parseMethodLine("public override void Update() { }", undefined);
      expect(method?.isStatic).to.equal(false);
      expect(method?.parameters).to.deep.equal([]);
      expect(method).to.not.have.property("nativeAddress");
    });

    it("should keep constructor names", () => {
      expect(parseMethodLine("public void .ctor() { }", undefined)?.name).to.equal(
        ".ctor"
      );
    });
  });

  describe("parseRvaComment", () => {
    it("should extract the hex address", () => {
      expect(
        parseRvaComment("// RVA: 0x52F1E0 Offset: 0x52E5E0 VA: 0x18052F1E0")
      ).to.equal("0x52F1E0");
    });

    it("should ignore methods without code", () => {
      expect(parseRvaComment("// RVA: -1 Offset: -1")).to.equal(undefined);
    });
  });
});
