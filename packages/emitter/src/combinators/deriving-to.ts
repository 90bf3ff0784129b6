/**
 * Encoder combinator
 *
 * Builds an arity-1 derivation from a value of the declared type to `tTo`.
 * Tuple, record and case payloads are bound to `x_*` names before the case
 * callbacks see them. Closed sums dispatch on `kind`, open sums on the tag
 * the value carries.
 */

import * as ts from "typescript";
import {
  VARIANT_ARGS_PROPERTY,
  VARIANT_TAG_PROPERTY,
  isPolyvariantEnum,
  isVariantEnum,
  teOpaque,
  type Attributes,
  type Label,
  type PolyvariantCase,
  type RecordField,
  type TypeExpr,
  type VariantCase,
} from "@shapegen/frontend";
import {
  createDeriving1,
  deriving1Defaults,
  type Deriving1,
} from "../engine/deriving1.js";
import type { DeriveExpr } from "../engine/types.js";
import {
  bindInput,
  cascade,
  functionType,
  genPatRecord,
  genPatTuple,
  or,
  polyvariantTagTest,
  str,
  strictEquals,
  type Alternative,
} from "../helpers.js";

const f = ts.factory;

export type DerivingToHooks = {
  readonly name: string;
  /** Type every value encodes to */
  readonly tTo: () => ts.TypeNode;
  readonly deriveOfTuple: (
    derive: DeriveExpr,
    types: readonly TypeExpr[],
    es: readonly ts.Expression[]
  ) => ts.Expression;
  readonly deriveOfRecord: (
    derive: DeriveExpr,
    fields: readonly RecordField[],
    es: readonly ts.Expression[]
  ) => ts.Expression;
  readonly deriveOfVariantCase: (
    derive: DeriveExpr,
    name: Label,
    attrs: Attributes,
    types: readonly TypeExpr[],
    es: readonly ts.Expression[]
  ) => ts.Expression;
  /** Used instead of deriveOfVariantCase when every case of the sum is payload-free */
  readonly deriveOfEnumVariantCase?: (
    derive: DeriveExpr,
    name: Label,
    attrs: Attributes
  ) => ts.Expression;
  readonly deriveOfVariantCaseRecord: (
    derive: DeriveExpr,
    name: Label,
    attrs: Attributes,
    fields: readonly RecordField[],
    es: readonly ts.Expression[]
  ) => ts.Expression;
};

export const derivingTo = (hooks: DerivingToHooks): Deriving1 => {
  const enumCase = (
    derive: DeriveExpr,
    name: Label,
    attrs: Attributes
  ): ts.Expression =>
    hooks.deriveOfEnumVariantCase
      ? hooks.deriveOfEnumVariantCase(derive, name, attrs)
      : hooks.deriveOfVariantCase(derive, name, attrs, [], []);

  const variantAlternative = (
    derive: DeriveExpr,
    enumerated: boolean,
    c: VariantCase,
    x: ts.Expression
  ): Alternative => {
    const test = strictEquals(
      f.createPropertyAccessExpression(x, VARIANT_TAG_PROPERTY),
      str(c.name.txt)
    );
    if (c.kind === "record") {
      const [pattern, names] = genPatRecord("x", c.fields);
      return {
        test,
        body: bindInput(
          pattern,
          x,
          hooks.deriveOfVariantCaseRecord(derive, c.name, c.attrs, c.fields, names)
        ),
      };
    }
    if (c.types.length === 0) {
      return {
        test,
        body: enumerated
          ? enumCase(derive, c.name, c.attrs)
          : hooks.deriveOfVariantCase(derive, c.name, c.attrs, [], []),
      };
    }
    const [pattern, names] = genPatTuple("x", c.types.length);
    return {
      test,
      body: bindInput(
        pattern,
        f.createPropertyAccessExpression(x, VARIANT_ARGS_PROPERTY),
        hooks.deriveOfVariantCase(derive, c.name, c.attrs, c.types, names)
      ),
    };
  };

  const polyvariantAlternative = (
    self: Deriving1,
    enumerated: boolean,
    c: PolyvariantCase,
    x: ts.Expression
  ): Alternative => {
    const derive = self.deriveOfTypeExpr;
    if (c.kind === "inherit") {
      const tests = c.tags.map((tag) =>
        polyvariantTagTest(x, tag.name, tag.hasPayload)
      );
      const [first, ...rest] = tests;
      return {
        test: first ? rest.reduce(or, first) : f.createFalse(),
        body: self.deriveOfTypeExpr(teOpaque(c.name, c.args), x),
      };
    }
    if (c.types.length === 0) {
      return {
        test: polyvariantTagTest(x, c.name.txt, false),
        body: enumerated
          ? enumCase(derive, c.name, c.attrs)
          : hooks.deriveOfVariantCase(derive, c.name, c.attrs, [], []),
      };
    }
    const [pattern, names] = genPatTuple("x", c.types.length, 1);
    return {
      test: polyvariantTagTest(x, c.name.txt, true),
      body: bindInput(
        pattern,
        x,
        hooks.deriveOfVariantCase(derive, c.name, c.attrs, c.types, names)
      ),
    };
  };

  return createDeriving1({
    ...deriving1Defaults,
    name: hooks.name,
    t: (typeNode) => functionType(typeNode, hooks.tTo()),

    deriveOfTuple: (self, types, x) => {
      const [pattern, names] = genPatTuple("x", types.length);
      return bindInput(
        pattern,
        x,
        hooks.deriveOfTuple(self.deriveOfTypeExpr, types, names)
      );
    },

    deriveOfRecord: (self, fields, x) => {
      const [pattern, names] = genPatRecord("x", fields);
      return bindInput(
        pattern,
        x,
        hooks.deriveOfRecord(self.deriveOfTypeExpr, fields, names)
      );
    },

    deriveOfVariant: (self, cases, _typeNode, x) => {
      const enumerated = isVariantEnum(cases);
      return cascade(
        cases.map((c) =>
          variantAlternative(self.deriveOfTypeExpr, enumerated, c, x)
        )
      );
    },

    deriveOfPolyvariant: (self, cases, _typeNode, x) => {
      const enumerated = isPolyvariantEnum(cases);
      return cascade(
        cases.map((c) => polyvariantAlternative(self, enumerated, c, x))
      );
    },
  });
};
