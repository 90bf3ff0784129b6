/**
 * Tests for the combinators, composition and the registry
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as ts from "typescript";
import type { TypeExpr } from "@shapegen/frontend";
import { callbackNotProvided } from "../errors.js";
import type { DeriveExpr, GeneratedItem } from "../engine/types.js";
import {
  arrayLiteral,
  call,
  conditional,
  id,
  str,
  strictEquals,
} from "../helpers.js";
import { createRegistry } from "../registry.js";
import {
  deriveSource,
  evaluateModule,
  getFunction,
} from "../testing/harness.js";
import { combined } from "./combined.js";
import { derivingOf } from "./deriving-of.js";
import { derivingTo } from "./deriving-to.js";

const joined = (parts: readonly ts.Expression[]): ts.Expression =>
  call(ts.factory.createPropertyAccessExpression(arrayLiteral(parts), "join"), [
    str(" "),
  ]);

const zipDerive = (
  derive: DeriveExpr,
  types: readonly TypeExpr[],
  es: readonly ts.Expression[]
): readonly ts.Expression[] =>
  types.flatMap((te, i) => {
    const e = es[i];
    return e ? [derive(te, e)] : [];
  });

const show = derivingTo({
  name: "show",
  tTo: () => ts.factory.createKeywordTypeNode(ts.SyntaxKind.StringKeyword),
  deriveOfTuple: (derive, types, es) => joined(zipDerive(derive, types, es)),
  deriveOfRecord: (derive, fields, es) =>
    joined(
      zipDerive(
        derive,
        fields.map((f) => f.type),
        es
      )
    ),
  deriveOfVariantCase: (derive, name, _attrs, types, es) =>
    joined([str(name.txt), ...zipDerive(derive, types, es)]),
  deriveOfEnumVariantCase: (_derive, name) => str(name.txt.toUpperCase()),
  deriveOfVariantCaseRecord: (derive, name, _attrs, fields, es) =>
    joined([
      str(name.txt),
      ...zipDerive(
        derive,
        fields.map((f) => f.type),
        es
      ),
    ]),
});

const check = derivingOf({
  name: "check",
  ofT: () => ts.factory.createKeywordTypeNode(ts.SyntaxKind.UnknownKeyword),
  error: () => call(id("fail"), []),
  deriveOfTuple: () => callbackNotProvided("check", "tuple types"),
  deriveOfRecord: () => callbackNotProvided("check", "record types"),
  deriveOfVariantCase: (_derive, make, name, _attrs, _types, x, next) =>
    conditional(strictEquals(x, str(name.txt)), make(), next),
  deriveOfVariantCaseRecord: () =>
    callbackNotProvided("check", "record cases"),
});

const SHOW_RUNTIME = {
  module: "show-runtime",
  values: ["show_number", "show_string"],
  types: [],
};

const showRuntime = {
  show_number: (n: number): string => String(n),
  show_string: (s: string): string => JSON.stringify(s),
};

const SOURCE = [
  "export type Shape =",
  '  | { kind: "Circle"; args: [number] }',
  '  | { kind: "Rect"; w: number; h: number }',
  '  | { kind: "Dot" };',
  'export type Color = "red" | ["rgb", number, number, number] | Named;',
  'export type Named = "black" | "white";',
  "export interface Label { text: string; at: [number, number] }",
].join("\n");

const unitNames = (items: readonly GeneratedItem[]): readonly string[] =>
  items.map((item) => (item.kind === "statement" ? item.name : "<diagnostic>"));

describe("Combinators", () => {
  describe("derivingTo", () => {
    const { text } = deriveSource(SOURCE, show, [SHOW_RUNTIME]);
    const exports = evaluateModule(text, { "show-runtime": showRuntime });

    it("should encode closed sum cases by kind", () => {
      const showShape = getFunction(exports, "show_Shape");

      expect(showShape({ kind: "Circle", args: [2] })).to.equal("Circle 2");
      expect(showShape({ kind: "Rect", w: 1, h: 3 })).to.equal("Rect 1 3");
      expect(showShape({ kind: "Dot" })).to.equal("Dot");
    });

    it("should encode open sums by the tag the value carries", () => {
      const showColor = getFunction(exports, "show_Color");

      expect(showColor("red")).to.equal("red");
      expect(showColor(["rgb", 1, 2, 3])).to.equal("rgb 1 2 3");
    });

    it("should hand included tags to the included sum", () => {
      const showColor = getFunction(exports, "show_Color");

      expect(showColor("white")).to.equal("WHITE");
    });

    it("should bind record fields in declared order", () => {
      const showLabel = getFunction(exports, "show_Label");

      expect(showLabel({ text: "hi", at: [4, 5] })).to.equal('"hi" 4 5');
    });

    it("should dispatch an enumerated sum with the enum callback", () => {
      expect(text.split("\n")).to.include(
        'export const show_Named: (x: Named) => string = (x) => x === "black" ? "BLACK" : "WHITE";'
      );
    });

    it("should import only the runtime names the module uses", () => {
      expect(text.split("\n")).to.include(
        'import { show_number, show_string } from "show-runtime";'
      );
      expect(text.split("\n")).to.include(
        'import type { Shape, Color, Named, Label } from "./input.js";'
      );
    });
  });

  describe("derivingOf", () => {
    it("should emit the probe before the decoder of an open sum", () => {
      const { items } = deriveSource('export type Mode = "on" | "off";', check);

      expect(unitNames(items)).to.deep.equal(["check_poly_Mode", "check_Mode"]);
    });

    it("should fall back to undefined in the probe only", () => {
      const { text } = deriveSource('export type Mode = "on" | "off";', check);

      expect(text.split("\n")).to.include(
        'export const check_poly_Mode: (x: unknown) => Mode | undefined = (x) => x === "on" ? "on" : x === "off" ? "off" : undefined;'
      );
      expect(text.split("\n")).to.include(
        "export const check_Mode: (x: unknown) => Mode = (x) => check_poly_Mode(x) ?? fail();"
      );
    });
  });

  describe("combined", () => {
    it("should concatenate outputs in composition order", () => {
      const both = combined("both", show, check);
      const { items } = deriveSource('export type Mode = "on" | "off";', both);

      expect(unitNames(items)).to.deep.equal([
        "show_Mode",
        "check_poly_Mode",
        "check_Mode",
      ]);
    });

    it("should yield one diagnostic for a failing batch", () => {
      const both = combined("both", show, check);
      const { items } = deriveSource("export type F = () => void;", both);

      expect(unitNames(items)).to.deep.equal(["<diagnostic>"]);
    });
  });

  describe("registry", () => {
    it("should look derivations up by name", () => {
      const registry = createRegistry([show, check]);

      expect(registry.lookup("show")).to.equal(show);
      expect(registry.lookup("missing")).to.equal(undefined);
      expect(registry.names()).to.deep.equal(["show", "check"]);
    });

    it("should let a later registration replace an earlier one", () => {
      const registry = createRegistry([show]);
      const replacement = combined("show", check);
      registry.register(replacement);

      expect(registry.lookup("show")).to.equal(replacement);
      expect(registry.names()).to.deep.equal(["show"]);
    });
  });
});
