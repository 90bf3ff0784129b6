/**
 * Shared core of the decoder combinators
 *
 * A decoder `D` generates, for every open-sum declaration `T`, the probe
 * `D_poly_T : (x: In) => T | undefined` next to `D_T`. The probe tries local
 * tags and included sums in declared order and yields `undefined` when none
 * applies. `D_T` is the probe with the decode error as fallback. An included
 * sum `S` is decoded by calling `D_poly_S`, so a tag that `S` does not know
 * falls through to the next alternative.
 */

import * as ts from "typescript";
import {
  declToLongident,
  declToTypeNode,
  getOpenSum,
  teVar,
  type PolyvariantCase,
  type RecordField,
  type TypeDecl,
  type TypeExpr,
  type VariantCase,
} from "@shapegen/frontend";
import { INPUT_NAME } from "../constants.js";
import { asVal } from "../engine/deriver.js";
import {
  createDeriving1,
  deriveTypeDeclDefault,
  deriving1Defaults,
  type Deriving1,
} from "../engine/deriving1.js";
import { unitStatement } from "../engine/generate.js";
import type { DeriveExpr, GeneratedItem } from "../engine/types.js";
import { arrow, coalesce, functionType, id } from "../helpers.js";
import {
  deriveOfLabel,
  deriveParamName,
  derivePolyName,
} from "../naming.js";

const f = ts.factory;

export type InheritCase = Extract<PolyvariantCase, { readonly kind: "inherit" }>;

/**
 * `D_poly_S(handlers)(x)` for an included sum `S`
 */
export type ProbeInherit = (c: InheritCase, x: ts.Expression) => ts.Expression;

export type DecoderHooks = {
  readonly name: string;
  /** Type every value decodes from */
  readonly ofT: () => ts.TypeNode;
  /** Expression raising the decode error */
  readonly error: () => ts.Expression;
  readonly deriveOfTuple: (
    derive: DeriveExpr,
    types: readonly TypeExpr[],
    x: ts.Expression
  ) => ts.Expression;
  readonly deriveOfRecord: (
    derive: DeriveExpr,
    fields: readonly RecordField[],
    x: ts.Expression
  ) => ts.Expression;
  readonly deriveOfVariant: (
    derive: DeriveExpr,
    cases: readonly VariantCase[],
    typeNode: ts.TypeNode,
    x: ts.Expression
  ) => ts.Expression;
  /**
   * Decode an open sum. `fallback` is taken once every alternative failed:
   * the decode error in `D`, `undefined` in the probe.
   */
  readonly deriveOfPolyvariant: (
    derive: DeriveExpr,
    probe: ProbeInherit,
    cases: readonly PolyvariantCase[],
    resultType: ts.TypeNode,
    x: ts.Expression,
    fallback: ts.Expression
  ) => ts.Expression;
};

export type DerivingOf = Deriving1 & {
  /** The `D_poly` derivation generated alongside open-sum declarations */
  readonly probe: Deriving1;
};

const orUndefined = (typeNode: ts.TypeNode): ts.TypeNode =>
  f.createUnionTypeNode([
    typeNode,
    f.createKeywordTypeNode(ts.SyntaxKind.UndefinedKeyword),
  ]);

export const createDecoder = (hooks: DecoderHooks): DerivingOf => {
  const polyName = derivePolyName(hooks.name);

  // main and probe refer to each other; both references are resolved lazily
  const probeInherit: ProbeInherit = (c, x) =>
    asVal(main.deriveTypeRefDeriver(polyName, c.name, c.args), x);

  const openSumUnit = (self: Deriving1, decl: TypeDecl): GeneratedItem =>
    unitStatement({
      name: self.declName(decl.name),
      params: decl.params,
      handlerName: (param) => deriveParamName(self.name, param.txt),
      handlerType: self.paramType,
      unitType: self.unitType(declToTypeNode(decl)),
      body: arrow(
        [INPUT_NAME],
        coalesce(
          asVal(
            probe.deriveTypeRefDeriver(
              polyName,
              declToLongident(decl),
              decl.params.map(teVar)
            ),
            id(INPUT_NAME)
          ),
          hooks.error()
        )
      ),
    });

  const main: Deriving1 = createDeriving1({
    ...deriving1Defaults,
    name: hooks.name,
    t: (typeNode) => functionType(hooks.ofT(), typeNode),
    deriveOfTuple: (self, types, x) =>
      hooks.deriveOfTuple(self.deriveOfTypeExpr, types, x),
    deriveOfRecord: (self, fields, x) =>
      hooks.deriveOfRecord(self.deriveOfTypeExpr, fields, x),
    deriveOfVariant: (self, cases, typeNode, x) =>
      hooks.deriveOfVariant(self.deriveOfTypeExpr, cases, typeNode, x),
    deriveOfPolyvariant: (self, cases, typeNode, x) =>
      hooks.deriveOfPolyvariant(
        self.deriveOfTypeExpr,
        probeInherit,
        cases,
        typeNode,
        x,
        hooks.error()
      ),
    deriveTypeDecl: (self, decl) =>
      getOpenSum(decl)
        ? [...probe.deriveTypeDecl(decl), openSumUnit(self, decl)]
        : deriveTypeDeclDefault(self, decl),
  });

  const probe: Deriving1 = createDeriving1({
    ...deriving1Defaults,
    name: hooks.name,
    t: (typeNode) => functionType(hooks.ofT(), orUndefined(typeNode)),
    paramT: (_self, param) => main.unitType(param),
    declLabel: (_self, name) => deriveOfLabel(polyName, name.txt),
    deriveOfPolyvariant: (_self, cases, typeNode, x) =>
      hooks.deriveOfPolyvariant(
        main.deriveOfTypeExpr,
        probeInherit,
        cases,
        orUndefined(typeNode),
        x,
        id("undefined")
      ),
  });

  return { ...main, probe };
};
