/**
 * Match decoder combinator
 *
 * Closed sums decode through one `switch` on the tag read from the input.
 * An open sum is cut at every included sum: each run of local tags is one
 * `switch` whose `default` probes the included sum and then continues with
 * the rest, so alternatives are still tried in declared order.
 */

import type * as ts from "typescript";
import {
  isPolyvariantEnum,
  isVariantEnum,
  type Attributes,
  type Label,
  type PolyvariantCase,
  type RecordField,
  type TypeExpr,
} from "@shapegen/frontend";
import type { DeriveExpr } from "../engine/types.js";
import {
  coalesce,
  makePolyvariant,
  makeVariantRecord,
  makeVariantTuple,
  switchExpr,
  type Arm,
  type Make,
} from "../helpers.js";
import {
  createDecoder,
  type DerivingOf,
  type InheritCase,
  type ProbeInherit,
} from "./decoder.js";

export type DerivingOfMatchHooks = {
  readonly name: string;
  readonly ofT: () => ts.TypeNode;
  readonly error: () => ts.Expression;
  /**
   * Expression the `switch` dispatches on. `enumerated` is set when every
   * case of the sum is payload-free.
   */
  readonly deriveOfTag: (x: ts.Expression, enumerated: boolean) => ts.Expression;
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
  readonly deriveOfVariantCase: (
    derive: DeriveExpr,
    make: Make,
    name: Label,
    attrs: Attributes,
    types: readonly TypeExpr[],
    x: ts.Expression
  ) => Arm;
  readonly deriveOfEnumVariantCase?: (
    derive: DeriveExpr,
    make: Make,
    name: Label,
    attrs: Attributes,
    x: ts.Expression
  ) => Arm;
  readonly deriveOfVariantCaseRecord: (
    derive: DeriveExpr,
    make: Make,
    name: Label,
    attrs: Attributes,
    fields: readonly RecordField[],
    x: ts.Expression
  ) => Arm;
};

type Construct = Exclude<PolyvariantCase, InheritCase>;

export const derivingOfMatch = (hooks: DerivingOfMatchHooks): DerivingOf => {
  const tupleArm = (
    derive: DeriveExpr,
    enumerated: boolean,
    make: Make,
    name: Label,
    attrs: Attributes,
    types: readonly TypeExpr[],
    x: ts.Expression
  ): Arm =>
    types.length === 0 && enumerated && hooks.deriveOfEnumVariantCase
      ? hooks.deriveOfEnumVariantCase(derive, make, name, attrs, x)
      : hooks.deriveOfVariantCase(derive, make, name, attrs, types, x);

  const renderOpenSum = (
    derive: DeriveExpr,
    probe: ProbeInherit,
    cases: readonly PolyvariantCase[],
    enumerated: boolean,
    resultType: ts.TypeNode,
    x: ts.Expression,
    fallback: ts.Expression
  ): ts.Expression => {
    const split = cases.findIndex((c) => c.kind === "inherit");
    const run: readonly Construct[] = (
      split < 0 ? cases : cases.slice(0, split)
    ).flatMap((c) => (c.kind === "construct" ? [c] : []));
    const inherit = split < 0 ? undefined : cases[split];

    const rest =
      inherit?.kind === "inherit"
        ? coalesce(
            probe(inherit, x),
            renderOpenSum(
              derive,
              probe,
              cases.slice(split + 1),
              enumerated,
              resultType,
              x,
              fallback
            )
          )
        : fallback;

    if (run.length === 0) {
      return rest;
    }
    return switchExpr(
      resultType,
      hooks.deriveOfTag(x, enumerated),
      run.map((c) =>
        tupleArm(
          derive,
          enumerated,
          makePolyvariant(c.name.txt),
          c.name,
          c.attrs,
          c.types,
          x
        )
      ),
      rest
    );
  };

  return createDecoder({
    name: hooks.name,
    ofT: hooks.ofT,
    error: hooks.error,
    deriveOfTuple: hooks.deriveOfTuple,
    deriveOfRecord: hooks.deriveOfRecord,

    deriveOfVariant: (derive, cases, typeNode, x) => {
      const enumerated = isVariantEnum(cases);
      return switchExpr(
        typeNode,
        hooks.deriveOfTag(x, enumerated),
        cases.map((c) =>
          c.kind === "record"
            ? hooks.deriveOfVariantCaseRecord(
                derive,
                makeVariantRecord(c.name.txt),
                c.name,
                c.attrs,
                c.fields,
                x
              )
            : tupleArm(
                derive,
                enumerated,
                makeVariantTuple(c.name.txt),
                c.name,
                c.attrs,
                c.types,
                x
              )
        ),
        hooks.error()
      );
    },

    deriveOfPolyvariant: (derive, probe, cases, resultType, x, fallback) =>
      renderOpenSum(
        derive,
        probe,
        cases,
        isPolyvariantEnum(cases),
        resultType,
        x,
        fallback
      ),
  });
};
