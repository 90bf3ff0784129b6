/**
 * JSON encoder derivation
 *
 * Records encode to objects, tuples to arrays. A case of an enumerated sum
 * encodes to its tag; any other case to `[tag, ...payload]`, with record
 * payloads as one object.
 */

import type * as ts from "typescript";
import type { RecordField, TypeExpr } from "@shapegen/frontend";
import {
  arrayLiteral,
  derivingTo,
  objectLiteral,
  str,
  typeRef,
  type DeriveExpr,
  type Deriving1,
} from "@shapegen/emitter";
import { jsonKey, jsonTagName } from "./names.js";

const encodeElements = (
  derive: DeriveExpr,
  types: readonly TypeExpr[],
  es: readonly ts.Expression[]
): readonly ts.Expression[] =>
  types.flatMap((te, i) => {
    const e = es[i];
    return e ? [derive(te, e)] : [];
  });

const encodeFields = (
  derive: DeriveExpr,
  fields: readonly RecordField[],
  es: readonly ts.Expression[]
): ts.Expression =>
  objectLiteral(
    fields.flatMap((field, i): readonly (readonly [string, ts.Expression])[] => {
      const e = es[i];
      return e ? [[jsonKey(field), derive(field.type, e)]] : [];
    })
  );

export const toJson: Deriving1 = derivingTo({
  name: "toJson",
  tTo: () => typeRef("Json"),
  deriveOfTuple: (derive, types, es) =>
    arrayLiteral(encodeElements(derive, types, es)),
  deriveOfRecord: encodeFields,
  deriveOfVariantCase: (derive, name, attrs, types, es) =>
    arrayLiteral([
      str(jsonTagName(name, attrs)),
      ...encodeElements(derive, types, es),
    ]),
  deriveOfEnumVariantCase: (_derive, name, attrs) =>
    str(jsonTagName(name, attrs)),
  deriveOfVariantCaseRecord: (derive, name, attrs, fields, es) =>
    arrayLiteral([
      str(jsonTagName(name, attrs)),
      encodeFields(derive, fields, es),
    ]),
});
