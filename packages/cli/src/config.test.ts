/**
 * Tests for configuration loading and resolution
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  findDefaultFile,
  loadConfig,
  parseConfig,
  resolveConfig,
} from "./config.js";

const withTempDir = (prefix: string, run: (dir: string) => void): void => {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  try {
    run(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
};

describe("Config", () => {
  describe("parseConfig", () => {
    it("should accept every documented field", () => {
      const data = {
        output: { runtimeNamespace: "ModSDK", filePrefix: "Mod" },
        skipNamespaces: ["Game.Debug"],
        skipTypes: ["Cheat"],
        thirdParty: { autoDetect: false, patterns: ["DG.Tweening"] },
      };
      const result = parseConfig("wrapgen.json", data);
      expect(result).to.deep.equal({ ok: true, value: data });
    });

    it("should ignore unknown keys", () => {
      expect(parseConfig("wrapgen.json", { comment: "notes" })).to.deep.equal(
        { ok: true, value: {} }
      );
    });

    it("should reject a top level that is not an object", () => {
      const result = parseConfig("wrapgen.json", ["Game"]);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.map((d) => d.code)).to.deep.equal(["WG1004"]);
    });

    it("should report each mistyped field", () => {
      const result = parseConfig("wrapgen.json", {
        skipTypes: "Player",
        output: { filePrefix: 3 },
        thirdParty: { autoDetect: "yes" },
      });
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.map((d) => [d.code, d.message])).to.deep.equal([
        ["WG1005", "'skipTypes' must be an array of strings"],
        ["WG1005", "'output.filePrefix' must be a string"],
        ["WG1005", "'thirdParty.autoDetect' must be a boolean"],
      ]);
    });
  });

  describe("loadConfig", () => {
    it("should report a missing file", () => {
      withTempDir("wrapgen-config-missing-", (dir) => {
        const path = join(dir, "wrapgen.json");
        const result = loadConfig(path);
        expect(result.ok).to.equal(false);
        if (result.ok) return;
        expect(result.error).to.deep.equal([
          {
            code: "WG1001",
            severity: "error",
            message: "Config file not found",
            location: { file: path },
            hint: undefined,
          },
        ]);
      });
    });

    it("should report invalid JSON", () => {
      withTempDir("wrapgen-config-json-", (dir) => {
        const path = join(dir, "wrapgen.json");
        writeFileSync(path, "{ skipTypes: ", "utf-8");
        const result = loadConfig(path);
        expect(result.ok).to.equal(false);
        if (result.ok) return;
        expect(result.error.map((d) => d.code)).to.deep.equal(["WG1003"]);
      });
    });

    it("should load a valid file", () => {
      withTempDir("wrapgen-config-valid-", (dir) => {
        const path = join(dir, "wrapgen.json");
        writeFileSync(path, JSON.stringify({ skipTypes: ["Cheat"] }), "utf-8");
        expect(loadConfig(path)).to.deep.equal({
          ok: true,
          value: { skipTypes: ["Cheat"] },
        });
      });
    });
  });

  describe("findDefaultFile", () => {
    it("should prefer the file beside the dump", () => {
      withTempDir("wrapgen-config-find-", (dir) => {
        mkdirSync(join(dir, "dumps"));
        writeFileSync(join(dir, "dumps", "mappings.json"), "[]", "utf-8");
        writeFileSync(join(dir, "mappings.json"), "[]", "utf-8");
        expect(
          findDefaultFile("mappings.json", join(dir, "dumps", "dump.cs"), dir)
        ).to.equal(join(dir, "dumps", "mappings.json"));
      });
    });

    it("should fall back to the working directory", () => {
      withTempDir("wrapgen-config-cwd-", (dir) => {
        mkdirSync(join(dir, "dumps"));
        writeFileSync(join(dir, "wrapgen.json"), "{}", "utf-8");
        expect(
          findDefaultFile("wrapgen.json", join(dir, "dumps", "dump.cs"), dir)
        ).to.equal(join(dir, "wrapgen.json"));
        expect(
          findDefaultFile("mappings.json", join(dir, "dumps", "dump.cs"), dir)
        ).to.equal(undefined);
      });
    });
  });

  describe("resolveConfig", () => {
    it("should use config values as defaults", () => {
      withTempDir("wrapgen-config-resolve-", (dir) => {
        const result = resolveConfig(
          {
            output: { outputDirectory: "Gen", filePrefix: "Mod" },
            skipNamespaces: ["Game.Debug"],
          },
          {},
          dir,
          "dumps/dump.cs"
        );
        expect(result.dumpPath).to.equal(join(dir, "dumps", "dump.cs"));
        expect(result.outputDirectory).to.equal(join(dir, "Gen"));
        expect(result.mappingsPath).to.equal(undefined);
        expect(result.generator.output.filePrefix).to.equal("Mod");
        expect(result.generator.output.runtimeNamespace).to.equal("GameSDK");
        expect(result.generator.skipNamespaces.has("Game.Debug")).to.equal(
          true
        );
        expect(result.generator.skipNamespaces.has("System")).to.equal(true);
      });
    });

    it("should override config with CLI options", () => {
      withTempDir("wrapgen-config-override-", (dir) => {
        const result = resolveConfig(
          {
            output: { outputDirectory: "Gen", filePrefix: "Mod" },
            thirdParty: { autoDetect: true, patterns: ["DG.Tweening"] },
          },
          {
            out: "Out",
            filePrefix: "Cli",
            noAutoDetect: true,
            mappings: "names.json",
            report: true,
          },
          dir
        );
        expect(result.dumpPath).to.equal(join(dir, "dump.cs"));
        expect(result.outputDirectory).to.equal(join(dir, "Out"));
        expect(result.mappingsPath).to.equal(join(dir, "names.json"));
        expect(result.generator.output.filePrefix).to.equal("Cli");
        expect(result.generator.thirdParty.autoDetect).to.equal(false);
        expect(result.generator.thirdParty.patterns).to.include("DG.Tweening");
        expect(result.report).to.equal(true);
      });
    });
  });
});
