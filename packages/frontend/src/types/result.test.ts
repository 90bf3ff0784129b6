/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { ok, error, map, flatMap, sequence } from "./result.js";

describe("Result", () => {
  describe("map", () => {
    it("should map ok value", () => {
      const mapped = map(ok<number, string>(5), (x) => x * 2);

      expect(mapped.ok).to.equal(true);
      if (mapped.ok) {
        expect(mapped.value).to.equal(10);
      }
    });

    it("should pass through error", () => {
      const mapped = map(error<number, string>("Error"), (x) => x * 2);

      expect(mapped.ok).to.equal(false);
      if (!mapped.ok) {
        expect(mapped.error).to.equal("Error");
      }
    });
  });

  describe("flatMap", () => {
    it("should handle flatMap returning error", () => {
      const mapped = flatMap(ok<number, string>(5), (x) =>
        x > 10 ? ok<number, string>(x) : error<number, string>("Too small")
      );

      expect(mapped.ok).to.equal(false);
      if (!mapped.ok) {
        expect(mapped.error).to.equal("Too small");
      }
    });
  });

  describe("sequence", () => {
    it("should collect ok values in order", () => {
      const collected = sequence([ok<number, string>(1), ok<number, string>(2)]);

      expect(collected.ok).to.equal(true);
      if (collected.ok) {
        expect(collected.value).to.deep.equal([1, 2]);
      }
    });

    it("should stop at the first error", () => {
      const collected = sequence([
        ok<number, string>(1),
        error<number, string>("first"),
        error<number, string>("second"),
      ]);

      expect(collected.ok).to.equal(false);
      if (!collected.ok) {
        expect(collected.error).to.equal("first");
      }
    });
  });
});
