/**
 * Canonical type representation
 *
 * Every declaration the reflector accepts is normalized into one of these
 * shapes. Nodes are readonly and built once per generation request.
 */

import type * as ts from "typescript";
import type { SourceLocation } from "../types/diagnostic.js";

export type Label = {
  readonly txt: string;
  readonly loc: SourceLocation;
};

/**
 * Possibly qualified type name, e.g. `geometry.Point` →
 * `{ qualifier: ["geometry"], name: "Point" }`.
 */
export type Longident = {
  readonly qualifier: readonly string[];
  readonly name: string;
  readonly loc: SourceLocation;
};

/**
 * A JSDoc tag attached to a declaration, field or case (`@key "x"`).
 */
export type Attribute = {
  readonly name: string;
  readonly value?: string;
};

export type Attributes = readonly Attribute[];

export type TypeDecl = {
  readonly name: Label;
  readonly params: readonly Label[];
  readonly shape: TypeDeclShape;
  readonly loc: SourceLocation;
  readonly attrs: Attributes;
};

export type TypeDeclShape =
  | RecordShape
  | VariantShape
  | ExprShape;

export type RecordShape = {
  readonly kind: "record";
  readonly fields: readonly RecordField[];
};

export type VariantShape = {
  readonly kind: "variant";
  readonly cases: readonly VariantCase[];
};

/**
 * Synonym. When `type.shape` is a polyvariant this is an open-sum
 * declaration, which is the only kind that can be included by another.
 */
export type ExprShape = {
  readonly kind: "expr";
  readonly type: TypeExpr;
};

export type RecordField = {
  readonly name: Label;
  readonly attrs: Attributes;
  readonly type: TypeExpr;
};

/**
 * Original syntax paired with its normalized shape. The node is kept so
 * generated signatures can reuse the type exactly as written.
 */
export type TypeExpr = {
  readonly node: ts.TypeNode;
  readonly shape: TypeExprShape;
};

export type TypeExprShape =
  | OpaqueTypeExpr
  | VarTypeExpr
  | TupleTypeExpr
  | PolyvariantTypeExpr;

export type OpaqueTypeExpr = {
  readonly kind: "opaque";
  readonly name: Longident;
  readonly args: readonly TypeExpr[];
};

export type VarTypeExpr = {
  readonly kind: "var";
  readonly name: Label;
};

export type TupleTypeExpr = {
  readonly kind: "tuple";
  readonly elements: readonly TypeExpr[];
};

export type PolyvariantTypeExpr = {
  readonly kind: "polyvariant";
  readonly cases: readonly PolyvariantCase[];
};

export type VariantCase =
  | {
      readonly kind: "tuple";
      readonly name: Label;
      readonly attrs: Attributes;
      readonly types: readonly TypeExpr[];
    }
  | {
      readonly kind: "record";
      readonly name: Label;
      readonly attrs: Attributes;
      readonly fields: readonly RecordField[];
    };

/**
 * Tag of an open sum as seen by a type that includes it.
 */
export type PolyvariantTag = {
  readonly name: string;
  readonly hasPayload: boolean;
};

export type PolyvariantCase =
  | {
      readonly kind: "construct";
      readonly name: Label;
      readonly attrs: Attributes;
      readonly types: readonly TypeExpr[];
    }
  | {
      readonly kind: "inherit";
      readonly name: Longident;
      readonly args: readonly TypeExpr[];
      /** Every tag of the included sum, inherited tags flattened in order */
      readonly tags: readonly PolyvariantTag[];
    };
