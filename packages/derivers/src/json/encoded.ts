/**
 * Type-level derivation of the JSON shape of each declaration
 */

import * as ts from "typescript";
import {
  isPolyvariantEnum,
  isVariantEnum,
  type RecordField,
  type TypeExpr,
} from "@shapegen/frontend";
import {
  createDerivingType,
  derivingTypeDefaults,
  propertyName,
  type DerivingType,
} from "@shapegen/emitter";
import { jsonKey, jsonTagName } from "./names.js";

const f = ts.factory;

const tagType = (tag: string): ts.TypeNode =>
  f.createLiteralTypeNode(f.createStringLiteral(tag));

const unionOf = (types: readonly ts.TypeNode[]): ts.TypeNode => {
  const [only] = types;
  return types.length === 1 && only ? only : f.createUnionTypeNode(types);
};

const fieldsType = (
  self: DerivingType,
  fields: readonly RecordField[]
): ts.TypeNode =>
  f.createTypeLiteralNode(
    fields.map((field) =>
      f.createPropertySignature(
        [f.createModifier(ts.SyntaxKind.ReadonlyKeyword)],
        propertyName(jsonKey(field)),
        undefined,
        self.deriveOfTypeExpr(field.type)
      )
    )
  );

const caseType = (
  self: DerivingType,
  enumerated: boolean,
  tag: string,
  types: readonly TypeExpr[]
): ts.TypeNode =>
  enumerated
    ? tagType(tag)
    : f.createTupleTypeNode([
        tagType(tag),
        ...types.map((te) => self.deriveOfTypeExpr(te)),
      ]);

export const Encoded: DerivingType = createDerivingType({
  ...derivingTypeDefaults,
  name: "Encoded",
  deriveOfTuple: (self, types) =>
    f.createTupleTypeNode(types.map((te) => self.deriveOfTypeExpr(te))),
  deriveOfRecord: fieldsType,
  deriveOfVariant: (self, cases) => {
    const enumerated = isVariantEnum(cases);
    return unionOf(
      cases.map((c) =>
        c.kind === "record"
          ? f.createTupleTypeNode([
              tagType(jsonTagName(c.name, c.attrs)),
              fieldsType(self, c.fields),
            ])
          : caseType(self, enumerated, jsonTagName(c.name, c.attrs), c.types)
      )
    );
  },
  deriveOfPolyvariant: (self, cases) => {
    const enumerated = isPolyvariantEnum(cases);
    return unionOf(
      cases.map((c) =>
        c.kind === "inherit"
          ? self.deriveTypeRef(self.name, c.name, c.args)
          : caseType(self, enumerated, jsonTagName(c.name, c.attrs), c.types)
      )
    );
  },
});
