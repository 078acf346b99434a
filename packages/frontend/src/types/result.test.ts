/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { ok, error, map, unwrapOrElse } from "./result.js";

describe("Result", () => {
  describe("ok and error constructors", () => {
    it("should create ok result", () => {
      const result = ok<number, string>(42);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value).to.equal(42);
      }
    });

    it("should create error result", () => {
      const result = error<number, string>("dump missing");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error).to.equal("dump missing");
      }
    });
  });

  describe("map", () => {
    it("should map ok value", () => {
      const result = map(ok<string, string>("Assembly-CSharp"), (s) => s.length);
      expect(result).to.deep.equal({ ok: true, value: 15 });
    });

    it("should pass errors through untouched", () => {
      const failed = error<string, string>("bad json");
      const result = map(failed, (s) => s.length);
      expect(result).to.deep.equal({ ok: false, error: "bad json" });
    });
  });

  describe("unwrapOrElse", () => {
    it("should return the value for ok results", () => {
      expect(unwrapOrElse(ok<number, string>(3), () => 0)).to.equal(3);
    });

    it("should compute a fallback from the error", () => {
      const result = error<number, string>("abc");
      expect(unwrapOrElse(result, (e) => e.length)).to.equal(3);
    });
  });
});
