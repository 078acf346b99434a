import { describe, it } from "mocha";
import { expect } from "chai";
import { createGeneratorConfig, DEFAULT_OUTPUT } from "./generator-config.js";
import { parseBuiltinTables } from "./builtin-tables.js";

describe("Generator configuration", () => {
  describe("createGeneratorConfig", () => {
    it("should seed every set from the built-in tables", () => {
      const config = createGeneratorConfig();

      expect(config.output).to.deep.equal(DEFAULT_OUTPUT);
      expect(config.skipNamespaces.has("System.Collections.Generic")).to.equal(
        true
      );
      expect(config.skipNamespacePrefixes).to.deep.equal([
        "System.",
        "Mono.",
        "Internal.",
        "Microsoft.",
      ]);
      expect(config.skipTypes.size).to.equal(0);
      expect(config.skipBaseTypes.has("MulticastDelegate")).to.equal(true);
      expect(config.nestedEnumNames.has("State")).to.equal(true);
      expect(config.genericParameterNames.has("TKey")).to.equal(true);
      expect(config.genericParameterExceptions.has("Transform")).to.equal(
        true
      );
      expect(config.primitiveTypeMap.get("Int32")).to.equal("int");
      expect(config.baseTypeDisambiguation.get("Object")).to.equal(
        "UnityEngine.Object"
      );
      expect(config.thirdParty).to.deep.equal({
        autoDetect: true,
        patterns: [],
      });
    });

    it("should extend the defaults with user additions", () => {
      const config = createGeneratorConfig({
        skipNamespaces: ["Photon.Realtime"],
        skipNamespacePrefixes: ["Photon.", "System."],
        skipTypes: ["DebugOverlay"],
        skipBaseTypes: ["NetworkBehaviour"],
        nestedEnumNames: ["Phase"],
        genericParameterExceptions: ["TerrainLayer"],
      });

      expect(config.skipNamespaces.has("Photon.Realtime")).to.equal(true);
      expect(config.skipNamespaces.has("System")).to.equal(true);
      expect(config.skipNamespacePrefixes).to.deep.equal([
        "System.",
        "Mono.",
        "Internal.",
        "Microsoft.",
        "Photon.",
      ]);
      expect([...config.skipTypes]).to.deep.equal(["DebugOverlay"]);
      expect(config.skipBaseTypes.has("NetworkBehaviour")).to.equal(true);
      expect(config.skipBaseTypes.has("Exception")).to.equal(true);
      expect(config.nestedEnumNames.has("Phase")).to.equal(true);
      expect(config.genericParameterExceptions.has("TerrainLayer")).to.equal(
        true
      );
    });

    it("should merge output settings field by field", () => {
      const config = createGeneratorConfig({
        output: { filePrefix: "Acme" },
        thirdParty: { autoDetect: false, patterns: ["DG.Tweening"] },
      });

      expect(config.output).to.deep.equal({
        runtimeNamespace: "GameSDK",
        outputDirectory: "Generated",
        filePrefix: "Acme",
      });
      expect(config.thirdParty).to.deep.equal({
        autoDetect: false,
        patterns: ["DG.Tweening"],
      });
    });
  });

  describe("parseBuiltinTables", () => {
    it("should reject tables with a malformed list", () => {
      expect(() => parseBuiltinTables({ skipNamespaces: "System" })).to.throw(
        "ICE: builtin-tables.json 'skipNamespaces' must be an array of strings"
      );
    });

    it("should reject a non-object document", () => {
      expect(() => parseBuiltinTables([])).to.throw(
        "ICE: builtin-tables.json must contain an object"
      );
    });
  });
});
