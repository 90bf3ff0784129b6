/**
 * Tests for derivation request collection
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as ts from "typescript";
import { collectDerivingRequests, isExported } from "./requests.js";

const parse = (source: string): ts.SourceFile =>
  ts.createSourceFile("/shapes.ts", source, ts.ScriptTarget.ES2022, true);

const declarationName = (statement: ts.Statement): string =>
  ts.isTypeAliasDeclaration(statement) || ts.isInterfaceDeclaration(statement)
    ? statement.name.text
    : "?";

describe("Derivation requests", () => {
  it("should group declarations per derivation in source order", () => {
    const sourceFile = parse(
      [
        "/** @deriving json */",
        'export type A = "a";',
        "/** @deriving json, example */",
        "export interface B { x: number }",
        "/** Plain documentation */",
        'export type C = "c";',
      ].join("\n")
    );

    const requests = collectDerivingRequests(sourceFile);

    expect(
      requests.map((r) => [r.derivation, r.declarations.map(declarationName)])
    ).to.deep.equal([
      ["json", ["A", "B"]],
      ["example", ["B"]],
    ]);
  });

  it("should ignore a derivation named twice on one declaration", () => {
    const sourceFile = parse('/** @deriving json json */\nexport type A = "a";');

    const requests = collectDerivingRequests(sourceFile);

    expect(requests).to.have.length(1);
    expect(requests[0]?.declarations).to.have.length(1);
  });

  it("should detect the export modifier", () => {
    const sourceFile = parse('export type A = "a";\ntype B = "b";');

    expect(sourceFile.statements.map(isExported)).to.deep.equal([true, false]);
  });
});
