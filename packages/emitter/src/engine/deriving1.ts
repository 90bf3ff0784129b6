/**
 * Arity-1 derivation engine
 *
 * Generates one function of exactly one input per declaration. Whether the
 * function encodes or decodes is purely a property of the hooks.
 */

import type * as ts from "typescript";
import {
  declToTypeNode,
  map,
  reflectBareTypeExpr,
  type Diagnostic,
  type Label,
  type Longident,
  type PolyvariantCase,
  type RecordField,
  type Result,
  type TypeDecl,
  type TypeExpr,
  type VariantCase,
} from "@shapegen/frontend";
import { INPUT_NAME } from "../constants.js";
import { callbackNotProvided } from "../errors.js";
import { arrow, call, id } from "../helpers.js";
import { deriveOfLabel, deriveParamName, ederiver } from "../naming.js";
import { asFun, asVal } from "./deriver.js";
import { generateUnits, unitStatement } from "./generate.js";
import type { Deriver, Deriving, GeneratedItem } from "./types.js";

export type Deriving1 = Deriving & {
  /** Type of the unit generated for values of `typeNode` */
  readonly unitType: (typeNode: ts.TypeNode) => ts.TypeNode;
  /** Type of the handler a generic unit takes for one type parameter */
  readonly paramType: (param: ts.TypeNode) => ts.TypeNode;
  readonly declName: (name: Label) => string;
  readonly deriver: (te: TypeExpr) => Deriver;
  readonly deriveOfTypeExpr: (te: TypeExpr, x: ts.Expression) => ts.Expression;
  /** Reference to derivation `derivation` of `name` applied to handlers for `args` */
  readonly deriveTypeRefDeriver: (
    derivation: string,
    name: Longident,
    args: readonly TypeExpr[]
  ) => Deriver;
  readonly deriveTypeRef: (
    derivation: string,
    name: Longident,
    args: readonly TypeExpr[],
    x: ts.Expression
  ) => ts.Expression;
  readonly deriveTypeShape: (decl: TypeDecl, x: ts.Expression) => ts.Expression;
  readonly deriveTypeDecl: (decl: TypeDecl) => readonly GeneratedItem[];
  /** Apply the derivation inline to an unnamed type expression */
  readonly extension: (
    node: ts.TypeNode,
    checker: ts.TypeChecker
  ) => Result<ts.Expression, Diagnostic>;
};

export type Deriving1Hooks = {
  readonly name: string;
  readonly t: (typeNode: ts.TypeNode) => ts.TypeNode;
  readonly paramT: (self: Deriving1, param: ts.TypeNode) => ts.TypeNode;
  readonly declLabel: (self: Deriving1, name: Label) => string;
  readonly deriveOfTuple: (
    self: Deriving1,
    types: readonly TypeExpr[],
    x: ts.Expression
  ) => ts.Expression;
  readonly deriveOfRecord: (
    self: Deriving1,
    fields: readonly RecordField[],
    x: ts.Expression
  ) => ts.Expression;
  readonly deriveOfVariant: (
    self: Deriving1,
    cases: readonly VariantCase[],
    typeNode: ts.TypeNode,
    x: ts.Expression
  ) => ts.Expression;
  readonly deriveOfPolyvariant: (
    self: Deriving1,
    cases: readonly PolyvariantCase[],
    typeNode: ts.TypeNode,
    x: ts.Expression
  ) => ts.Expression;
  readonly deriveTypeRefName: (
    self: Deriving1,
    derivation: string,
    name: Longident
  ) => ts.Expression;
  readonly deriveTypeDecl: (
    self: Deriving1,
    decl: TypeDecl
  ) => readonly GeneratedItem[];
};

/**
 * The unit for a declaration: `(x) => <shape>` typed by the derivation,
 * abstracted over one handler per type parameter.
 */
export const deriveTypeDeclDefault = (
  self: Deriving1,
  decl: TypeDecl
): readonly GeneratedItem[] => [
  unitStatement({
    name: self.declName(decl.name),
    params: decl.params,
    handlerName: (param) => deriveParamName(self.name, param.txt),
    handlerType: self.paramType,
    unitType: self.unitType(declToTypeNode(decl)),
    body: arrow([INPUT_NAME], self.deriveTypeShape(decl, id(INPUT_NAME))),
  }),
];

export const deriving1Defaults: Omit<Deriving1Hooks, "name" | "t"> = {
  paramT: (self, param) => self.unitType(param),
  declLabel: (self, name) => deriveOfLabel(self.name, name.txt),
  deriveOfTuple: (self) => callbackNotProvided(self.name, "tuple types"),
  deriveOfRecord: (self) => callbackNotProvided(self.name, "record types"),
  deriveOfVariant: (self) => callbackNotProvided(self.name, "variant types"),
  deriveOfPolyvariant: (self) =>
    callbackNotProvided(self.name, "open sum types"),
  deriveTypeRefName: (_self, derivation, name) => ederiver(derivation, name),
  deriveTypeDecl: deriveTypeDeclDefault,
};

export const createDeriving1 = (hooks: Deriving1Hooks): Deriving1 => {
  const self: Deriving1 = {
    name: hooks.name,
    unitType: hooks.t,
    paramType: (param) => hooks.paramT(self, param),
    declName: (name) => hooks.declLabel(self, name),

    deriver: (te) => {
      const shape = te.shape;
      switch (shape.kind) {
        case "tuple":
          return {
            kind: "fun",
            apply: (x) => hooks.deriveOfTuple(self, shape.elements, x),
          };
        case "var":
          return {
            kind: "val",
            expr: id(deriveParamName(self.name, shape.name.txt)),
          };
        case "opaque":
          return self.deriveTypeRefDeriver(self.name, shape.name, shape.args);
        case "polyvariant":
          return {
            kind: "fun",
            apply: (x) =>
              hooks.deriveOfPolyvariant(self, shape.cases, te.node, x),
          };
      }
    },

    deriveOfTypeExpr: (te, x) => asVal(self.deriver(te), x),

    deriveTypeRefDeriver: (derivation, name, args) => {
      const ref = hooks.deriveTypeRefName(self, derivation, name);
      return {
        kind: "val",
        expr:
          args.length === 0
            ? ref
            : call(
                ref,
                args.map((arg) => asFun(self.deriver(arg)))
              ),
      };
    },

    deriveTypeRef: (derivation, name, args, x) =>
      asVal(self.deriveTypeRefDeriver(derivation, name, args), x),

    deriveTypeShape: (decl, x) => {
      const shape = decl.shape;
      switch (shape.kind) {
        case "expr":
          return self.deriveOfTypeExpr(shape.type, x);
        case "record":
          return hooks.deriveOfRecord(self, shape.fields, x);
        case "variant":
          return hooks.deriveOfVariant(
            self,
            shape.cases,
            declToTypeNode(decl),
            x
          );
      }
    },

    deriveTypeDecl: (decl) => hooks.deriveTypeDecl(self, decl),
    deriveDecls: (decls) => decls.flatMap((decl) => self.deriveTypeDecl(decl)),
    generate: (batch) => generateUnits(batch, self.deriveDecls),

    extension: (node, checker) =>
      map(reflectBareTypeExpr(node, checker), (te) => asFun(self.deriver(te))),
  };
  return self;
};
