/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse generate with a dump path", () => {
        const result = parseArgs(["generate", "dump.cs"]);
        expect(result.command).to.equal("generate");
        expect(result.dumpFile).to.equal("dump.cs");
      });

      it("should leave the dump path unset when omitted", () => {
        const result = parseArgs(["detect"]);
        expect(result.command).to.equal("detect");
        expect(result.dumpFile).to.equal(undefined);
      });

      it("should parse help command from --help and -h", () => {
        expect(parseArgs(["--help"]).command).to.equal("help");
        expect(parseArgs(["generate", "-h"]).command).to.equal("help");
      });

      it("should parse version command from --version and -v", () => {
        expect(parseArgs(["--version"]).command).to.equal("version");
        expect(parseArgs(["-v"]).command).to.equal("version");
      });

      it("should return an empty command without arguments", () => {
        expect(parseArgs([])).to.deep.equal({ command: "", options: {} });
      });
    });

    describe("Options", () => {
      it("should read options that take values", () => {
        const result = parseArgs([
          "generate",
          "-c",
          "wrapgen.json",
          "--mappings",
          "names.json",
          "-o",
          "Generated",
          "--file-prefix",
          "ModSDK",
        ]);
        expect(result.options).to.deep.equal({
          config: "wrapgen.json",
          mappings: "names.json",
          out: "Generated",
          filePrefix: "ModSDK",
        });
      });

      it("should read flags in any position", () => {
        const result = parseArgs([
          "--report",
          "generate",
          "-V",
          "dump.cs",
          "--no-auto-detect",
          "-q",
        ]);
        expect(result.command).to.equal("generate");
        expect(result.dumpFile).to.equal("dump.cs");
        expect(result.options).to.deep.equal({
          report: true,
          verbose: true,
          noAutoDetect: true,
          quiet: true,
        });
      });
    });

    describe("Usage errors", () => {
      it("should reject unknown options", () => {
        expect(parseArgs(["generate", "--bogus"]).usageError).to.equal(
          "Unknown option '--bogus'"
        );
      });

      it("should reject an option without its value", () => {
        expect(parseArgs(["generate", "-o"]).usageError).to.equal(
          "Option '-o' needs a value"
        );
        expect(parseArgs(["generate", "-c", "--report"]).usageError).to.equal(
          "Option '-c' needs a value"
        );
      });

      it("should reject a second positional argument", () => {
        expect(parseArgs(["generate", "a.cs", "b.cs"]).usageError).to.equal(
          "Unexpected argument 'b.cs'"
        );
      });
    });
  });
});
