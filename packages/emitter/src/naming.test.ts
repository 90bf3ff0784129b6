/**
 * Tests for the unit naming contract
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as ts from "typescript";
import type { Longident } from "@shapegen/frontend";
import {
  deriveOfLabel,
  deriveParamName,
  derivePolyName,
  ederiver,
} from "./naming.js";

const loc = { file: "/input.ts", line: 1, column: 1, length: 0 };

const print = (node: ts.Node): string =>
  ts
    .createPrinter()
    .printNode(
      ts.EmitHint.Unspecified,
      node,
      ts.createSourceFile("/print.ts", "", ts.ScriptTarget.ES2022)
    );

describe("naming", () => {
  it("should suffix the type name", () => {
    expect(deriveOfLabel("toJson", "Point")).to.equal("toJson_Point");
  });

  it("should use the bare derivation name for the self type", () => {
    expect(deriveOfLabel("toJson", "t")).to.equal("toJson");
  });

  it("should name probes and handlers", () => {
    expect(derivePolyName("ofJson")).to.equal("ofJson_poly");
    expect(deriveOfLabel(derivePolyName("ofJson"), "Color")).to.equal(
      "ofJson_poly_Color"
    );
    expect(deriveParamName("ofJson", "A")).to.equal("ofJson_A");
  });

  it("should keep the qualifier of a qualified reference", () => {
    const lid: Longident = {
      qualifier: ["geometry", "shapes"],
      name: "Point",
      loc,
    };
    expect(print(ederiver("toJson", lid))).to.equal(
      "geometry.shapes.toJson_Point"
    );
  });

  it("should reference an unqualified unit by name", () => {
    const lid: Longident = { qualifier: [], name: "t", loc };
    expect(print(ederiver("example", lid))).to.equal("example");
  });
});
