/**
 * Sample values
 *
 * One constant per declaration holding some value of the type: the first
 * payload-free case of a sum when there is one, otherwise its first case.
 */

import * as ts from "typescript";
import {
  createDeriving0,
  deriving0Defaults,
  makePolyvariant,
  makeVariantRecord,
  makeVariantTuple,
  objectLiteral,
  arrayLiteral,
  str,
  type Deriving0,
} from "@shapegen/emitter";
import type { RecordField, TypeExpr } from "@shapegen/frontend";

const samples = (self: Deriving0, types: readonly TypeExpr[]): ts.Expression =>
  arrayLiteral(types.map((te) => self.deriveOfTypeExpr(te)));

const sampleFields = (
  self: Deriving0,
  fields: readonly RecordField[]
): ts.Expression =>
  objectLiteral(
    fields.map((field): readonly [string, ts.Expression] => [
      field.name.txt,
      self.deriveOfTypeExpr(field.type),
    ])
  );

export const example: Deriving0 = createDeriving0({
  ...deriving0Defaults,
  name: "example",
  t: (typeNode) => typeNode,
  deriveOfTuple: samples,
  deriveOfRecord: sampleFields,

  deriveOfVariant: (self, cases) => {
    const chosen =
      cases.find((c) => c.kind === "tuple" && c.types.length === 0) ??
      cases[0];
    if (chosen === undefined) {
      return ts.factory.createIdentifier("undefined");
    }
    if (chosen.kind === "record") {
      return makeVariantRecord(chosen.name.txt)(sampleFields(self, chosen.fields));
    }
    return makeVariantTuple(chosen.name.txt)(
      chosen.types.length === 0 ? undefined : samples(self, chosen.types)
    );
  },

  deriveOfPolyvariant: (self, cases) => {
    const constructs = cases.flatMap((c) => (c.kind === "construct" ? [c] : []));
    const chosen =
      constructs.find((c) => c.types.length === 0) ?? constructs[0];
    if (chosen) {
      return chosen.types.length === 0
        ? str(chosen.name.txt)
        : makePolyvariant(chosen.name.txt)(samples(self, chosen.types));
    }
    const inherit = cases.find((c) => c.kind === "inherit");
    return inherit?.kind === "inherit"
      ? self.deriveTypeRef(self.name, inherit.name, inherit.args)
      : ts.factory.createIdentifier("undefined");
  },
});
