/**
 * Cascade decoder combinator
 *
 * Each sum case becomes one guarded alternative; the callback receives the
 * alternative to continue with when its guard does not hold.
 */

import type * as ts from "typescript";
import {
  isPolyvariantEnum,
  isVariantEnum,
  type Attributes,
  type Label,
  type RecordField,
  type TypeExpr,
} from "@shapegen/frontend";
import type { DeriveExpr } from "../engine/types.js";
import {
  coalesce,
  makePolyvariant,
  makeVariantRecord,
  makeVariantTuple,
  type Make,
} from "../helpers.js";
import { createDecoder, type DerivingOf } from "./decoder.js";

export type DerivingOfHooks = {
  readonly name: string;
  readonly ofT: () => ts.TypeNode;
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
  /** Wraps the cascade of a closed sum */
  readonly deriveOfVariant?: (
    derive: DeriveExpr,
    body: ts.Expression,
    x: ts.Expression
  ) => ts.Expression;
  /** Wraps the cascade of an enumerated closed sum */
  readonly deriveOfEnumVariant?: (
    derive: DeriveExpr,
    body: ts.Expression,
    x: ts.Expression
  ) => ts.Expression;
  readonly deriveOfVariantCase: (
    derive: DeriveExpr,
    make: Make,
    name: Label,
    attrs: Attributes,
    types: readonly TypeExpr[],
    x: ts.Expression,
    next: ts.Expression
  ) => ts.Expression;
  readonly deriveOfEnumVariantCase?: (
    derive: DeriveExpr,
    make: Make,
    name: Label,
    attrs: Attributes,
    x: ts.Expression,
    next: ts.Expression
  ) => ts.Expression;
  readonly deriveOfVariantCaseRecord: (
    derive: DeriveExpr,
    make: Make,
    name: Label,
    attrs: Attributes,
    fields: readonly RecordField[],
    x: ts.Expression,
    next: ts.Expression
  ) => ts.Expression;
};

export const derivingOf = (hooks: DerivingOfHooks): DerivingOf => {
  const payloadFreeCase = (
    derive: DeriveExpr,
    enumerated: boolean,
    make: Make,
    name: Label,
    attrs: Attributes,
    x: ts.Expression,
    next: ts.Expression
  ): ts.Expression =>
    enumerated && hooks.deriveOfEnumVariantCase
      ? hooks.deriveOfEnumVariantCase(derive, make, name, attrs, x, next)
      : hooks.deriveOfVariantCase(derive, make, name, attrs, [], x, next);

  return createDecoder({
    name: hooks.name,
    ofT: hooks.ofT,
    error: hooks.error,
    deriveOfTuple: hooks.deriveOfTuple,
    deriveOfRecord: hooks.deriveOfRecord,

    deriveOfVariant: (derive, cases, _typeNode, x) => {
      const enumerated = isVariantEnum(cases);
      const body = cases.reduceRight<ts.Expression>((next, c) => {
        if (c.kind === "record") {
          return hooks.deriveOfVariantCaseRecord(
            derive,
            makeVariantRecord(c.name.txt),
            c.name,
            c.attrs,
            c.fields,
            x,
            next
          );
        }
        const make = makeVariantTuple(c.name.txt);
        return c.types.length === 0
          ? payloadFreeCase(derive, enumerated, make, c.name, c.attrs, x, next)
          : hooks.deriveOfVariantCase(
              derive,
              make,
              c.name,
              c.attrs,
              c.types,
              x,
              next
            );
      }, hooks.error());

      const wrap = enumerated ? hooks.deriveOfEnumVariant : hooks.deriveOfVariant;
      return wrap ? wrap(derive, body, x) : body;
    },

    deriveOfPolyvariant: (derive, probe, cases, _resultType, x, fallback) => {
      const enumerated = isPolyvariantEnum(cases);
      return cases.reduceRight<ts.Expression>((next, c) => {
        if (c.kind === "inherit") {
          return coalesce(probe(c, x), next);
        }
        const make = makePolyvariant(c.name.txt);
        return c.types.length === 0
          ? payloadFreeCase(derive, enumerated, make, c.name, c.attrs, x, next)
          : hooks.deriveOfVariantCase(
              derive,
              make,
              c.name,
              c.attrs,
              c.types,
              x,
              next
            );
      }, fallback);
    },
  });
};
