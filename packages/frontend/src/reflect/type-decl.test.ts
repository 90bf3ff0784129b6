/**
 * Tests for declaration reflection
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { Diagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import type { TypeDecl, TypeExpr } from "../repr/types.js";
import { createSourceProgram } from "../program/creation.js";
import { reflectDeclarations } from "./type-decl.js";

const reflectSource = (
  source: string
): Result<readonly TypeDecl[], Diagnostic> => {
  const created = createSourceProgram(source);
  if (!created.ok) {
    throw new Error("test source does not parse");
  }
  const { sourceFiles, checker } = created.value;
  return reflectDeclarations(sourceFiles[0]?.statements ?? [], checker);
};

const reflectOne = (source: string, name: string): TypeDecl => {
  const result = reflectSource(source);
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  const decl = result.value.find((d) => d.name.txt === name);
  if (!decl) {
    throw new Error(`no declaration ${name}`);
  }
  return decl;
};

const failureOf = (source: string): Diagnostic => {
  const result = reflectSource(source);
  if (result.ok) {
    throw new Error("expected reflection to fail");
  }
  return result.error;
};

const describeExpr = (te: TypeExpr): string => {
  switch (te.shape.kind) {
    case "opaque":
      return te.shape.args.length === 0
        ? te.shape.name.name
        : `${te.shape.name.name}<${te.shape.args.map(describeExpr).join(", ")}>`;
    case "var":
      return `'${te.shape.name.txt}`;
    case "tuple":
      return `[${te.shape.elements.map(describeExpr).join(", ")}]`;
    case "polyvariant":
      return te.shape.cases
        .map((c) => (c.kind === "construct" ? `#${c.name.txt}` : c.name.name))
        .join(" | ");
  }
};

describe("Declaration reflection", () => {
  describe("records", () => {
    it("should reflect interface fields in declared order", () => {
      const decl = reflectOne(
        "export interface Point { x: number; y: number }",
        "Point"
      );

      expect(decl.params).to.deep.equal([]);
      expect(decl.shape.kind).to.equal("record");
      if (decl.shape.kind === "record") {
        expect(decl.shape.fields.map((f) => f.name.txt)).to.deep.equal([
          "x",
          "y",
        ]);
        expect(decl.shape.fields.map((f) => describeExpr(f.type))).to.deep.equal(
          ["number", "number"]
        );
      }
    });

    it("should read field attributes from JSDoc tags", () => {
      const decl = reflectOne(
        'export type Point = {\n  /** @key "x-coord" */\n  x: number;\n};',
        "Point"
      );

      expect(decl.shape.kind).to.equal("record");
      if (decl.shape.kind === "record") {
        expect(decl.shape.fields[0]?.attrs).to.deep.equal([
          { name: "key", value: "x-coord" },
        ]);
      }
    });

    it("should resolve type parameters to variables", () => {
      const decl = reflectOne(
        "export type Box<A> = { value: A; items: readonly A[]; pair: [A, string] };",
        "Box"
      );

      expect(decl.params.map((p) => p.txt)).to.deep.equal(["A"]);
      if (decl.shape.kind === "record") {
        expect(decl.shape.fields.map((f) => describeExpr(f.type))).to.deep.equal(
          ["'A", "Array<'A>", "['A, string]"]
        );
      }
    });
  });

  describe("closed sums", () => {
    it("should classify kind-tagged object unions", () => {
      const decl = reflectOne(
        [
          "export type Shape =",
          '  | { kind: "circle"; radius: number }',
          '  | { kind: "dot" }',
          '  | { kind: "line"; args: [number, number] };',
        ].join("\n"),
        "Shape"
      );

      expect(decl.shape.kind).to.equal("variant");
      if (decl.shape.kind === "variant") {
        expect(
          decl.shape.cases.map((c) => [c.kind, c.name.txt])
        ).to.deep.equal([
          ["record", "circle"],
          ["tuple", "dot"],
          ["tuple", "line"],
        ]);
        const line = decl.shape.cases[2];
        expect(line?.kind === "tuple" ? line.types.length : -1).to.equal(2);
      }
    });

    it("should treat a single tagged object type as a one-case sum", () => {
      const decl = reflectOne('export type Only = { kind: "only" };', "Only");

      expect(decl.shape.kind).to.equal("variant");
    });
  });

  describe("open sums", () => {
    it("should reflect tags and inclusions in declared order", () => {
      const decl = reflectOne(
        [
          'export type Color = "red" | ["rgb", number, number, number] | Other;',
          'export type Other = "black" | ["gray", number];',
        ].join("\n"),
        "Color"
      );

      expect(decl.shape.kind).to.equal("expr");
      if (decl.shape.kind === "expr") {
        expect(describeExpr(decl.shape.type)).to.equal("#red | #rgb | Other");
        const inherit = decl.shape.type.shape.kind === "polyvariant"
          ? decl.shape.type.shape.cases[2]
          : undefined;
        expect(inherit?.kind === "inherit" ? inherit.tags : []).to.deep.equal([
          { name: "black", hasPayload: false },
          { name: "gray", hasPayload: true },
        ]);
      }
    });

    it("should flatten nested inclusions into the tag set", () => {
      const decl = reflectOne(
        [
          'export type A = "a" | B;',
          'export type B = "b" | C;',
          'export type C = "c";',
        ].join("\n"),
        "A"
      );

      if (decl.shape.kind === "expr" && decl.shape.type.shape.kind === "polyvariant") {
        const inherit = decl.shape.type.shape.cases[1];
        expect(inherit?.kind === "inherit" ? inherit.tags : []).to.deep.equal([
          { name: "b", hasPayload: false },
          { name: "c", hasPayload: false },
        ]);
      } else {
        expect.fail("expected an open sum");
      }
    });

    it("should read tag attributes written before the separator", () => {
      const decl = reflectOne(
        ["export type Dir =", '  /** @name "Up" */', '  | "up"', '  | "down";'].join(
          "\n"
        ),
        "Dir"
      );

      if (decl.shape.kind === "expr" && decl.shape.type.shape.kind === "polyvariant") {
        expect(decl.shape.type.shape.cases.map((c) => c.kind === "construct" ? c.attrs : [])).to.deep.equal([
          [{ name: "name", value: "Up" }],
          [],
        ]);
      } else {
        expect.fail("expected an open sum");
      }
    });

    it("should not hand a comment trailing one tag to the next", () => {
      const tagAttrs = (source: string): unknown => {
        const decl = reflectOne(source, "Dir");
        return decl.shape.kind === "expr" &&
          decl.shape.type.shape.kind === "polyvariant"
          ? decl.shape.type.shape.cases.map((c) =>
              c.kind === "construct" ? c.attrs : []
            )
          : undefined;
      };

      expect(
        tagAttrs(
          ["export type Dir =", '  | "up" /** @name "Down" */', '  | "down";'].join("\n")
        )
      ).to.deep.equal([[], []]);
      expect(
        tagAttrs(
          ["export type Dir =", '  | "up"', '  /** @name "Down" */', '  | "down";'].join(
            "\n"
          )
        )
      ).to.deep.equal([[], [{ name: "name", value: "Down" }]]);
    });

    it("should accept a single tagged tuple behind a leading bar", () => {
      const decl = reflectOne('export type One = | ["one", number];', "One");

      expect(decl.shape.kind === "expr" ? describeExpr(decl.shape.type) : "").to.equal(
        "#one"
      );
    });
  });

  describe("rejections", () => {
    const cases: readonly (readonly [string, string])[] = [
      ["export type F = { f: (x: number) => number };", "function types"],
      ["export interface M { m(): void }", "function types"],
      ["export interface G { m<T>(x: T): T }", "polymorphic type expressions"],
      ["export type O = { x?: number };", "optional fields"],
      ["export type T = [number, string?];", "optional tuple elements"],
      ["export type R = [number, ...string[]];", "rest elements"],
      ["export type A = { x: any };", "type placeholders"],
      ["export type N = { nested: { x: number } };", "object types"],
      ["export type I = { [key: string]: number };", "index signatures"],
      ["export enum E { A }", "enum declarations"],
      ["export class K {}", "class types"],
      ["export const v = 1;", "non-type declarations"],
      ["export type U = number | null;", "open unions"],
      ["export type L = 1;", "non-string literal types"],
      ["export type X = { a: number } & { b: number };", "intersection types"],
      ["export type C<A extends string> = A;", "constrained type parameters"],
      ["export type V<A> = { x: A<number> };", "type variables applied to arguments"],
      ["export type W<A> = \"a\" | A;", "inclusions of type variables"],
      ['export type Mix = { kind: "a" } | "b";', "unions mixing variant cases with other members"],
      ["export interface P { x: number }\nexport type Q = \"a\" | P;", "inclusions of types other than open sums"],
      ['export type A = "a" | B;\nexport type B = "b" | A;', "cyclic open sum inclusions"],
      ["export type K = keyof { a: number };", "type operators"],
      ["export type T = `a${string}`;", "template literal types"],
      ["export type S = { x: number }[\"x\"];", "indexed access types"],
    ];

    for (const [source, category] of cases) {
      it(`should reject ${category}: ${source.split("\n").at(-1) ?? source}`, () => {
        const failure = failureOf(source);

        expect(failure.code).to.equal("SG1001");
        expect(failure.message).to.equal(`${category} are not supported`);
      });
    }

    it("should report the location of the offending node", () => {
      const failure = failureOf(
        "export type Ok = { x: number };\nexport type Bad = {\n  f: () => void;\n};"
      );

      expect(failure.location?.line).to.equal(3);
      expect(failure.location?.column).to.equal(6);
    });

    it("should fail the whole batch on one bad declaration", () => {
      const result = reflectSource(
        "export type Ok = { x: number };\nexport type Bad = { f: () => void };"
      );

      expect(result.ok).to.equal(false);
    });
  });
});
