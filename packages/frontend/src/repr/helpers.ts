/**
 * Helpers over the canonical representation
 */

import * as ts from "typescript";
import type {
  Attributes,
  Label,
  Longident,
  PolyvariantCase,
  PolyvariantTypeExpr,
  TypeDecl,
  TypeExpr,
  VariantCase,
} from "./types.js";

/** Discriminant property of a closed-sum case object */
export const VARIANT_TAG_PROPERTY = "kind";

/** Positional payload property of a closed-sum case object */
export const VARIANT_ARGS_PROPERTY = "args";

/**
 * A closed sum is enumerated when no case carries a payload.
 */
export const isVariantEnum = (cases: readonly VariantCase[]): boolean =>
  cases.every((c) =>
    c.kind === "tuple" ? c.types.length === 0 : c.fields.length === 0
  );

/**
 * Open-sum counterpart of {@link isVariantEnum}. An inherited sum counts as
 * payload-free when it is referenced without type arguments.
 */
export const isPolyvariantEnum = (cases: readonly PolyvariantCase[]): boolean =>
  cases.every((c) =>
    c.kind === "construct" ? c.types.length === 0 : c.args.length === 0
  );

export const getAttribute = (
  attrs: Attributes,
  name: string
): string | undefined => attrs.find((a) => a.name === name)?.value;

export const longidentToEntityName = (lid: Longident): ts.EntityName =>
  [...lid.qualifier, lid.name]
    .slice(1)
    .reduce<ts.EntityName>(
      (left, right) => ts.factory.createQualifiedName(left, right),
      ts.factory.createIdentifier(lid.qualifier[0] ?? lid.name)
    );

export const teOpaque = (
  name: Longident,
  args: readonly TypeExpr[]
): TypeExpr => ({
  node: ts.factory.createTypeReferenceNode(
    longidentToEntityName(name),
    args.length > 0 ? args.map((a) => a.node) : undefined
  ),
  shape: { kind: "opaque", name, args },
});

export const teVar = (name: Label): TypeExpr => ({
  node: ts.factory.createTypeReferenceNode(name.txt),
  shape: { kind: "var", name },
});

/**
 * `T<A, B>` for a declaration `T` with parameters `A`, `B`.
 */
export const declToTypeNode = (decl: TypeDecl): ts.TypeNode =>
  ts.factory.createTypeReferenceNode(
    decl.name.txt,
    decl.params.length > 0
      ? decl.params.map((p) => ts.factory.createTypeReferenceNode(p.txt))
      : undefined
  );

export const declToLongident = (decl: TypeDecl): Longident => ({
  qualifier: [],
  name: decl.name.txt,
  loc: decl.name.loc,
});

/**
 * The open-sum body of a declaration, when it is one.
 */
export const getOpenSum = (decl: TypeDecl): PolyvariantTypeExpr | undefined =>
  decl.shape.kind === "expr" && decl.shape.type.shape.kind === "polyvariant"
    ? decl.shape.type.shape
    : undefined;
