import { describe, it } from "mocha";
import { expect } from "chai";
import {
  hasGenericTypeArgument,
  isGenericTypeParameter,
} from "./generic-parameters.js";
import { createGeneratorConfig } from "../config/generator-config.js";

const rules = createGeneratorConfig();

describe("Generic-parameter heuristics", () => {
  describe("isGenericTypeParameter", () => {
    it("should recognise the fixed parameter tokens", () => {
      expect(isGenericTypeParameter("T", rules)).to.equal(true);
      expect(isGenericTypeParameter("TKey", rules)).to.equal(true);
      expect(isGenericTypeParameter("U", rules)).to.equal(true);
    });

    it("should ignore array ranks and nullable markers", () => {
      expect(isGenericTypeParameter("TValue[]", rules)).to.equal(true);
      expect(isGenericTypeParameter("T?", rules)).to.equal(true);
    });

    it("should treat any single uppercase letter as a parameter", () => {
      expect(isGenericTypeParameter("K", rules)).to.equal(true);
      expect(isGenericTypeParameter("k", rules)).to.equal(false);
    });

    it("should match T followed by an uppercase letter", () => {
      expect(isGenericTypeParameter("TComponent", rules)).to.equal(true);
      expect(isGenericTypeParameter("Tank", rules)).to.equal(false);
    });

    it("should reject names containing an underscore", () => {
      expect(isGenericTypeParameter("TMP_FontAsset", rules)).to.equal(false);
    });

    it("should honour the real-type exception list", () => {
      expect(isGenericTypeParameter("TMPro", rules)).to.equal(false);
      expect(isGenericTypeParameter("TextMeshPro", rules)).to.equal(false);

      const custom = createGeneratorConfig({
        genericParameterExceptions: ["TGrid"],
      });
      expect(isGenericTypeParameter("TGrid", rules)).to.equal(true);
      expect(isGenericTypeParameter("TGrid", custom)).to.equal(false);
    });
  });

  describe("hasGenericTypeArgument", () => {
    it("should inspect every argument of the list", () => {
      expect(hasGenericTypeArgument("List<T>", rules)).to.equal(true);
      expect(
        hasGenericTypeArgument("Dictionary<string, TValue>", rules)
      ).to.equal(true);
      expect(hasGenericTypeArgument("List<Item>", rules)).to.equal(false);
    });

    it("should be false without an argument list", () => {
      expect(hasGenericTypeArgument("T", rules)).to.equal(false);
      expect(hasGenericTypeArgument("List<", rules)).to.equal(false);
    });
  });
});
