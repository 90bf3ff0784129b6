/**
 * Tests for the derivation engines
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as ts from "typescript";
import { CallbackNotProvidedError } from "../errors.js";
import { arrayLiteral, typeRef } from "../helpers.js";
import { deriveSource } from "../testing/harness.js";
import { createDeriving0, deriving0Defaults } from "./deriving0.js";
import { createDerivingType, derivingTypeDefaults } from "./deriving-type.js";
import type { GeneratedItem } from "./types.js";

const sample = createDeriving0({
  ...deriving0Defaults,
  name: "sample",
  t: (typeNode) => typeNode,
  deriveOfTuple: (self, types) =>
    arrayLiteral(types.map((te) => self.deriveOfTypeExpr(te))),
});

const mirror = createDerivingType({
  ...derivingTypeDefaults,
  name: "Mirror",
  deriveOfTuple: (self, types) =>
    ts.factory.createTupleTypeNode(types.map((te) => self.deriveOfTypeExpr(te))),
});

const unitNames = (items: readonly GeneratedItem[]): readonly string[] =>
  items.map((item) => (item.kind === "statement" ? item.name : "<diagnostic>"));

const lines = (text: string): readonly string[] => text.split("\n");

describe("Derivation engines", () => {
  describe("arity 0", () => {
    it("should emit a typed constant per declaration", () => {
      const { text } = deriveSource(
        "export type Inner = [number];\nexport type Outer = [Inner, number];",
        sample
      );

      expect(lines(text)).to.include(
        "export const sample_Outer: Outer = [sample_Inner, sample_number];"
      );
    });

    it("should place constants after the constants they reference", () => {
      const { items } = deriveSource(
        [
          "export type C = [B];",
          "export type B = [A];",
          "export type A = [number];",
        ].join("\n"),
        sample
      );

      expect(unitNames(items)).to.deep.equal([
        "sample_A",
        "sample_B",
        "sample_C",
      ]);
    });

    it("should report constants that refer to each other", () => {
      const { items, text } = deriveSource(
        "export type P = [Q];\nexport type Q = [P];",
        sample
      );

      expect(unitNames(items)).to.deep.equal(["<diagnostic>"]);
      const [item] = items;
      expect(item?.kind === "diagnostic" && item.diagnostic.code).to.equal("SG1004");
      expect(item?.kind === "diagnostic" && item.diagnostic.message).to.equal(
        "recursive constants are not supported: sample_P, sample_Q"
      );
      expect(lines(text).filter((line) => line.startsWith("export "))).to.deep.equal(
        []
      );
    });

    it("should report a constant that refers to itself", () => {
      const { items } = deriveSource(
        "export type Tree = [number, Array<Tree>];\nexport type Leaf = [number];",
        sample
      );

      expect(items).to.have.length(1);
      const [item] = items;
      expect(item?.kind === "diagnostic" && item.diagnostic.message).to.equal(
        "recursive constants are not supported: sample_Tree"
      );
      expect(item?.kind === "diagnostic" && item.diagnostic.location?.line).to.equal(1);
    });

    it("should not mistake a handler parameter for a unit of the batch", () => {
      const { items } = deriveSource(
        "export type A = [Box<number>];\nexport type Box<A> = [A];",
        sample
      );

      expect(unitNames(items)).to.deep.equal(["sample_Box", "sample_A"]);
    });

    it("should abstract generic declarations over parameter handlers", () => {
      const { text } = deriveSource("export type Box<A> = [A, A];", sample);

      expect(lines(text)).to.include(
        "export const sample_Box = <A>(sample_A: A): Box<A> => [sample_A, sample_A];"
      );
    });

    it("should raise for a shape the derivation has no callback for", () => {
      expect(() =>
        deriveSource("export interface P { x: number }", sample)
      ).to.throw(CallbackNotProvidedError, "sample: record types are not supported");
    });
  });

  describe("type level", () => {
    it("should mirror references and type variables", () => {
      const { text } = deriveSource(
        "export type Pair<A> = [A, Array<string>];",
        mirror
      );

      expect(lines(text)).to.include(
        "export type Mirror_Pair<A> = [A, Mirror_Array<Mirror_string>];"
      );
    });

    it("should resolve a reference to the mirrored type", () => {
      const mirrored = mirror.deriveTypeRef(
        "Mirror",
        { qualifier: ["geo"], name: "Point", loc: { file: "/input.ts", line: 1, column: 1, length: 0 } },
        []
      );

      expect(ts.isTypeReferenceNode(mirrored)).to.equal(true);
      expect(
        ts
          .createPrinter()
          .printNode(
            ts.EmitHint.Unspecified,
            mirrored,
            ts.createSourceFile("/print.ts", "", ts.ScriptTarget.ES2022)
          )
      ).to.equal("geo.Mirror_Point");
    });
  });

  describe("failure policy", () => {
    it("should replace the whole batch with one diagnostic", () => {
      const { items, text } = deriveSource(
        "export type Ok = [number];\nexport type F = () => void;",
        sample
      );

      expect(items).to.have.length(1);
      const [item] = items;
      expect(item?.kind).to.equal("diagnostic");
      if (item?.kind === "diagnostic") {
        expect(item.diagnostic.code).to.equal("SG1001");
        expect(item.diagnostic.message).to.equal("function types are not supported");
      }
      expect(lines(text)).to.include(
        "// error: /input.ts:2:17 error SG1001: function types are not supported"
      );
    });
  });

  describe("extension", () => {
    it("should derive an unnamed type expression", () => {
      const node = typeRef("Array", [typeRef("number")]);
      const sourceFile = ts.createSourceFile(
        "/print.ts",
        "",
        ts.ScriptTarget.ES2022
      );
      const program = ts.createProgram({
        rootNames: [],
        options: { noLib: true },
      });

      const derived = sample.extension(node, program.getTypeChecker());

      expect(derived.ok).to.equal(true);
      if (derived.ok) {
        expect(
          ts
            .createPrinter()
            .printNode(ts.EmitHint.Unspecified, derived.value, sourceFile)
        ).to.equal("sample_Array(sample_number)");
      }
    });
  });
});
