/**
 * Tests for sample values
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  deriveSource,
  evaluateModule,
  getFunction,
  getValue,
} from "@shapegen/emitter/testing";
import * as runtime from "./runtime.js";
import { RUNTIME_MODULE, runtimeImports } from "./runtime-exports.js";
import { example } from "./example.js";

const SOURCE = [
  "export type Line = [Point, Point];",
  "export interface Point { x: number; y: number }",
  "export type Shape =",
  '  | { kind: "Circle"; args: [number] }',
  '  | { kind: "Rect"; w: number; h: number }',
  '  | { kind: "Dot" };',
  'export type Only = { kind: "Rect"; w: number };',
  'export type Color = ["rgb", number] | "black" | "white";',
  'export type Rgb = ["rgb", number, string];',
  "export type Pair<A> = [A, A];",
  "export interface Box { items: number[]; label: Option<string> }",
].join("\n");

const derived = deriveSource(SOURCE, example, [runtimeImports()]);
const exports = evaluateModule(derived.text, { [RUNTIME_MODULE]: runtime });

describe("example", () => {
  it("should define referenced constants first", () => {
    expect(
      derived.items.map((item) => (item.kind === "statement" ? item.name : ""))
    ).to.deep.equal([
      "example_Point",
      "example_Line",
      "example_Shape",
      "example_Only",
      "example_Color",
      "example_Rgb",
      "example_Pair",
      "example_Box",
    ]);
  });

  it("should fill records and tuples from their parts", () => {
    expect(getValue(exports, "example_Point")).to.deep.equal({ x: 0, y: 0 });
    expect(getValue(exports, "example_Line")).to.deep.equal([
      { x: 0, y: 0 },
      { x: 0, y: 0 },
    ]);
  });

  it("should prefer a payload-free case of a closed sum", () => {
    expect(getValue(exports, "example_Shape")).to.deep.equal({ kind: "Dot" });
  });

  it("should fill the fields of a record case", () => {
    expect(getValue(exports, "example_Only")).to.deep.equal({
      kind: "Rect",
      w: 0,
    });
  });

  it("should prefer a payload-free tag of an open sum", () => {
    expect(getValue(exports, "example_Color")).to.equal("black");
    expect(getValue(exports, "example_Rgb")).to.deep.equal(["rgb", 0, ""]);
  });

  it("should take a sample per type parameter", () => {
    expect(getFunction(exports, "example_Pair")("a")).to.deep.equal(["a", "a"]);
  });

  it("should use the runtime samples for arrays and options", () => {
    expect(getValue(exports, "example_Box")).to.deep.equal({
      items: [0],
      label: null,
    });
  });

  it("should refuse a sample that would contain itself", () => {
    const tree = deriveSource(
      "export interface Tree { value: number; children: Tree[] }",
      example,
      [runtimeImports()]
    );

    expect(
      tree.items.map((item) =>
        item.kind === "diagnostic" ? item.diagnostic.code : item.name
      )
    ).to.deep.equal(["SG1004"]);
  });

  it("should sample a recursive sum through its payload-free case", () => {
    const list = deriveSource(
      'export type List = { kind: "Nil" } | { kind: "Cons"; args: [number, List] };',
      example,
      [runtimeImports()]
    );

    expect(
      getValue(
        evaluateModule(list.text, { [RUNTIME_MODULE]: runtime }),
        "example_List"
      )
    ).to.deep.equal({ kind: "Nil" });
  });
});
