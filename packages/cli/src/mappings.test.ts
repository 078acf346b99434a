import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadMappings, parseMappings } from "./mappings.js";

describe("Mappings", () => {
  describe("parseMappings", () => {
    it("should read names and skip incomplete entries", () => {
      const result = parseMappings("mappings.json", [
        { ObfuscatedName: "ABCDEFGHIJ", FriendlyName: "Spawner", Confidence: 0.9 },
        { ObfuscatedName: "KLMNOPQRST" },
        "Spawner",
        { ObfuscatedName: "UVWXYZABCD", FriendlyName: "Spawn" },
      ]);
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.mappings.entries).to.deep.equal(
        new Map([
          ["ABCDEFGHIJ", "Spawner"],
          ["UVWXYZABCD", "Spawn"],
        ])
      );
      expect(
        result.value.warnings.map((d) => [d.code, d.severity, d.message])
      ).to.deep.equal([
        [
          "WG2005",
          "warning",
          "Mapping entry 1 needs ObfuscatedName and FriendlyName strings; skipped",
        ],
        [
          "WG2005",
          "warning",
          "Mapping entry 2 needs ObfuscatedName and FriendlyName strings; skipped",
        ],
      ]);
    });

    it("should let a later entry replace an earlier one", () => {
      const result = parseMappings("mappings.json", [
        { ObfuscatedName: "ABCDEFGHIJ", FriendlyName: "Spawner" },
        { ObfuscatedName: "ABCDEFGHIJ", FriendlyName: "EnemySpawner" },
      ]);
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.mappings.entries.get("ABCDEFGHIJ")).to.equal(
        "EnemySpawner"
      );
    });

    it("should reject a top level that is not an array", () => {
      const result = parseMappings("mappings.json", { ABCDEFGHIJ: "Spawner" });
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.map((d) => d.code)).to.deep.equal(["WG2004"]);
    });
  });

  describe("loadMappings", () => {
    it("should report missing and malformed files", () => {
      const dir = mkdtempSync(join(tmpdir(), "wrapgen-mappings-"));
      try {
        const missing = loadMappings(join(dir, "mappings.json"));
        expect(missing.ok).to.equal(false);
        if (missing.ok) return;
        expect(missing.error.map((d) => d.code)).to.deep.equal(["WG2001"]);

        const path = join(dir, "broken.json");
        writeFileSync(path, "[{", "utf-8");
        const broken = loadMappings(path);
        expect(broken.ok).to.equal(false);
        if (broken.ok) return;
        expect(broken.error.map((d) => d.code)).to.deep.equal(["WG2003"]);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should load a mapping database export", () => {
      const dir = mkdtempSync(join(tmpdir(), "wrapgen-mappings-valid-"));
      try {
        const path = join(dir, "mappings.json");
        writeFileSync(
          path,
          JSON.stringify([
            { ObfuscatedName: "Player.KLMNOPQRST", FriendlyName: "health" },
          ]),
          "utf-8"
        );
        const result = loadMappings(path);
        expect(result.ok).to.equal(true);
        if (!result.ok) return;
        expect(result.value.mappings.entries.get("Player.KLMNOPQRST")).to.equal(
          "health"
        );
        expect(result.value.warnings).to.deep.equal([]);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
