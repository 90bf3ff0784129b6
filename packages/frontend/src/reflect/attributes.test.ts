/**
 * Tests for attribute parsing
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseAttributeComment } from "./attributes.js";

describe("Attributes", () => {
  it("should parse quoted values", () => {
    expect(parseAttributeComment('/** @name "Up" */')).to.deep.equal([
      { name: "name", value: "Up" },
    ]);
  });

  it("should parse bare flags and several tags", () => {
    expect(
      parseAttributeComment("/**\n * @default\n * @key coord_x\n */")
    ).to.deep.equal([{ name: "default" }, { name: "key", value: "coord_x" }]);
  });
});
