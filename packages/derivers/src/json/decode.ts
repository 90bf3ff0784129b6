/**
 * Expressions shared by both JSON decoder styles
 */

import * as ts from "typescript";
import type { RecordField, TypeExpr } from "@shapegen/frontend";
import {
  arrayLiteral,
  call,
  id,
  objectLiteral,
  str,
  typeRef,
  type DeriveExpr,
  type Make,
} from "@shapegen/emitter";
import { jsonKey } from "./names.js";

export const DECODER_NAME = "ofJson";

const num = (n: number): ts.Expression => ts.factory.createNumericLiteral(n);

export const jsonInputType = (): ts.TypeNode => typeRef("Json");

export const decodeFailure = (): ts.Expression =>
  call(id("decodeError"), [str("unexpected JSON value")]);

export const jsonTagOf = (x: ts.Expression): ts.Expression =>
  call(id("jsonTag"), [x]);

const element = (
  x: ts.Expression,
  length: number,
  index: number
): ts.Expression => call(id("jsonElement"), [x, num(length), num(index)]);

/**
 * Positions `offset..` of an array of `offset + types.length` elements
 */
export const decodeElements = (
  derive: DeriveExpr,
  types: readonly TypeExpr[],
  x: ts.Expression,
  offset = 0
): ts.Expression =>
  arrayLiteral(
    types.map((te, i) =>
      derive(te, element(x, types.length + offset, i + offset))
    )
  );

export const decodeFields = (
  derive: DeriveExpr,
  fields: readonly RecordField[],
  x: ts.Expression
): ts.Expression =>
  objectLiteral(
    fields.map((field): readonly [string, ts.Expression] => [
      field.name.txt,
      derive(field.type, call(id("jsonField"), [x, str(jsonKey(field))])),
    ])
  );

/**
 * Value of a `[tag, ...payload]` case
 */
export const decodeCase = (
  derive: DeriveExpr,
  make: Make,
  types: readonly TypeExpr[],
  x: ts.Expression
): ts.Expression =>
  types.length === 0 ? make() : make(decodeElements(derive, types, x, 1));

/**
 * Value of a `[tag, { ...fields }]` case
 */
export const decodeRecordCase = (
  derive: DeriveExpr,
  make: Make,
  fields: readonly RecordField[],
  x: ts.Expression
): ts.Expression => make(decodeFields(derive, fields, element(x, 2, 1)));
