/**
 * Type-level derivation engine
 *
 * Generates one type alias per declaration that mirrors it under the
 * derivation, e.g. the JSON shape a value of the type encodes to.
 */

import type * as ts from "typescript";
import {
  longidentToEntityName,
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
import { callbackNotProvided } from "../errors.js";
import { typeRef } from "../helpers.js";
import { deriveOfLabel, deriveOfLongident } from "../naming.js";
import { generateUnits, typeUnitStatement } from "./generate.js";
import type { Deriving, GeneratedItem } from "./types.js";

export type DerivingType = Deriving & {
  readonly declName: (name: Label) => string;
  readonly deriveOfTypeExpr: (te: TypeExpr) => ts.TypeNode;
  readonly deriveTypeRef: (
    derivation: string,
    name: Longident,
    args: readonly TypeExpr[]
  ) => ts.TypeNode;
  readonly deriveTypeShape: (decl: TypeDecl) => ts.TypeNode;
  readonly deriveTypeDecl: (decl: TypeDecl) => readonly GeneratedItem[];
  readonly extension: (
    node: ts.TypeNode,
    checker: ts.TypeChecker
  ) => Result<ts.TypeNode, Diagnostic>;
};

export type DerivingTypeHooks = {
  readonly name: string;
  readonly declLabel: (self: DerivingType, name: Label) => string;
  readonly deriveOfTuple: (
    self: DerivingType,
    types: readonly TypeExpr[]
  ) => ts.TypeNode;
  readonly deriveOfRecord: (
    self: DerivingType,
    fields: readonly RecordField[]
  ) => ts.TypeNode;
  readonly deriveOfVariant: (
    self: DerivingType,
    cases: readonly VariantCase[]
  ) => ts.TypeNode;
  readonly deriveOfPolyvariant: (
    self: DerivingType,
    cases: readonly PolyvariantCase[]
  ) => ts.TypeNode;
  readonly deriveTypeDecl: (
    self: DerivingType,
    decl: TypeDecl
  ) => readonly GeneratedItem[];
};

export const deriveTypeDeclTypeDefault = (
  self: DerivingType,
  decl: TypeDecl
): readonly GeneratedItem[] => [
  typeUnitStatement(
    self.declName(decl.name),
    decl.params,
    self.deriveTypeShape(decl)
  ),
];

export const derivingTypeDefaults: Omit<DerivingTypeHooks, "name"> = {
  declLabel: (self, name) => deriveOfLabel(self.name, name.txt),
  deriveOfTuple: (self) => callbackNotProvided(self.name, "tuple types"),
  deriveOfRecord: (self) => callbackNotProvided(self.name, "record types"),
  deriveOfVariant: (self) => callbackNotProvided(self.name, "variant types"),
  deriveOfPolyvariant: (self) =>
    callbackNotProvided(self.name, "open sum types"),
  deriveTypeDecl: deriveTypeDeclTypeDefault,
};

export const createDerivingType = (hooks: DerivingTypeHooks): DerivingType => {
  const self: DerivingType = {
    name: hooks.name,
    declName: (name) => hooks.declLabel(self, name),

    deriveOfTypeExpr: (te) => {
      const shape = te.shape;
      switch (shape.kind) {
        case "tuple":
          return hooks.deriveOfTuple(self, shape.elements);
        case "var":
          return typeRef(shape.name.txt);
        case "opaque":
          return self.deriveTypeRef(self.name, shape.name, shape.args);
        case "polyvariant":
          return hooks.deriveOfPolyvariant(self, shape.cases);
      }
    },

    deriveTypeRef: (derivation, name, args) =>
      typeRef(
        longidentToEntityName(deriveOfLongident(derivation, name)),
        args.map((arg) => self.deriveOfTypeExpr(arg))
      ),

    deriveTypeShape: (decl) => {
      const shape = decl.shape;
      switch (shape.kind) {
        case "expr":
          return self.deriveOfTypeExpr(shape.type);
        case "record":
          return hooks.deriveOfRecord(self, shape.fields);
        case "variant":
          return hooks.deriveOfVariant(self, shape.cases);
      }
    },

    deriveTypeDecl: (decl) => hooks.deriveTypeDecl(self, decl),
    deriveDecls: (decls) => decls.flatMap((decl) => self.deriveTypeDecl(decl)),
    generate: (batch) => generateUnits(batch, self.deriveDecls),

    extension: (node, checker) =>
      map(reflectBareTypeExpr(node, checker), (te) => self.deriveOfTypeExpr(te)),
  };
  return self;
};

