import { describe, it } from "mocha";
import { expect } from "chai";
import {
  emittableEnumConstants,
  evaluateContent,
  isEmittableEnumValue,
} from "./eligibility.js";
import { createGeneratorConfig } from "../config/generator-config.js";
import { parseDump } from "../parser/dump-parser.js";
import type { TypeDeclaration } from "../types/declarations.js";

const config = createGeneratorConfig({ skipTypes: ["DebugPanel"] });
const ctx = { config, sealedTypes: new Set(["FinalStep"]) };

const single = (...lines: string[]): TypeDeclaration => {
  const [decl] = parseDump(lines.join("\n"));
  if (decl === undefined) {
    throw new Error("fixture did not parse");
  }
  return decl;
};

const withMethod = (header: string): TypeDeclaration =>
  single(header, "{", "\t// Methods", "\tpublic void Run() { }", "}");

describe("Content eligibility", () => {
  describe("isEmittableEnumValue", () => {
    it("should bound integer literals to the signed 32-bit range", () => {
      expect(isEmittableEnumValue("2147483647")).to.equal(true);
      expect(isEmittableEnumValue("-2147483648")).to.equal(true);
      expect(isEmittableEnumValue("2147483648")).to.equal(false);
      expect(isEmittableEnumValue("-2147483649")).to.equal(false);
    });

    it("should pass other literal forms through", () => {
      expect(isEmittableEnumValue("0x7F")).to.equal(true);
    });
  });

  describe("emittableEnumConstants", () => {
    it("should keep own-typed constants and strip trailing comments", () => {
      const decl = single(
        "public enum Flag",
        "{",
        "\t// Fields",
        "\tpublic int value__;",
        "\tpublic const Flag None = 0 // zero;",
        "\tpublic const Flag Huge = 2147483648;",
        "\tpublic const Flag Last = 4;",
        "}"
      );
      expect(emittableEnumConstants(decl)).to.deep.equal([
        { name: "None", value: "0" },
        { name: "Last", value: "4" },
      ]);
    });

    it("should drop constants whose names cannot become identifiers", () => {
      const decl = single(
        "public enum Mode2",
        "{",
        "\t// Fields",
        "\tpublic const Mode2 ഇ = 0;",
        "\tpublic const Mode2 Open = 1;",
        "}"
      );
      expect(emittableEnumConstants(decl)).to.deep.equal([
        { name: "Open", value: "1" },
      ]);
    });
  });

  describe("evaluateContent", () => {
    it("should admit a class with members", () => {
      expect(evaluateContent(withMethod("public class Door"), ctx)).to.deep.equal(
        { admitted: true }
      );
    });

    it("should report why a type has no content", () => {
      const reasons = [
        withMethod("public class List`1"),
        withMethod("public class DebugPanel"),
        withMethod("public sealed class OnDone : MulticastDelegate"),
        withMethod("public class Ending : FinalStep"),
        withMethod("public class Oops : Exception"),
        single("public class Hollow", "{", "}"),
      ].map((decl) => {
        const decision = evaluateContent(decl, ctx);
        return decision.admitted ? "admitted" : decision.reason;
      });

      expect(reasons).to.deep.equal([
        "genericName",
        "skippedType",
        "delegateBase",
        "sealedBase",
        "skippedBaseType",
        "noMembers",
      ]);
    });

    it("should reject dotted nested names", () => {
      expect(
        evaluateContent(withMethod("public class Outer.Inner"), ctx)
      ).to.deep.equal({ admitted: false, reason: "unrepresentableName" });
    });

    it("should require an emittable constant for enums", () => {
      const onlyHuge = single(
        "public enum Wide",
        "{",
        "\t// Fields",
        "\tpublic const Wide Huge = 4294967295;",
        "}"
      );
      expect(evaluateContent(onlyHuge, ctx)).to.deep.equal({
        admitted: false,
        reason: "emptyEnum",
      });
    });

    it("should treat an enum with only unnamed constants as empty", () => {
      const unnamed = single(
        "public enum Mode2",
        "{",
        "\t// Fields",
        "\tpublic const Mode2 ഇ = 0;",
        "}"
      );
      expect(evaluateContent(unnamed, ctx)).to.deep.equal({
        admitted: false,
        reason: "emptyEnum",
      });
    });

    it("should skip enums with commonly nested names", () => {
      const state = single(
        "public enum State",
        "{",
        "\t// Fields",
        "\tpublic const State Idle = 0;",
        "}"
      );
      expect(evaluateContent(state, ctx)).to.deep.equal({
        admitted: false,
        reason: "nestedEnumName",
      });
    });

    it("should reject structs with generic-parameter fields", () => {
      const pair = single(
        "public struct Slot",
        "{",
        "\t// Fields",
        "\tpublic TValue value;",
        "}"
      );
      expect(evaluateContent(pair, ctx)).to.deep.equal({
        admitted: false,
        reason: "genericField",
      });
    });
  });
});
