/**
 * Arity-0 derivation engine
 *
 * Generates one constant per declaration, or a function over parameter
 * handlers when the declaration is generic.
 */

import * as ts from "typescript";
import {
  createDiagnostic,
  declToTypeNode,
  error,
  map,
  ok,
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
import { call, id } from "../helpers.js";
import { deriveOfLabel, deriveParamName, ederiver } from "../naming.js";
import { generateUnits, unitStatement } from "./generate.js";
import type { Deriving, GeneratedItem } from "./types.js";

export type Deriving0 = Deriving & {
  readonly unitType: (typeNode: ts.TypeNode) => ts.TypeNode;
  readonly declName: (name: Label) => string;
  readonly deriveOfTypeExpr: (te: TypeExpr) => ts.Expression;
  readonly deriveTypeRef: (
    derivation: string,
    name: Longident,
    args: readonly TypeExpr[]
  ) => ts.Expression;
  readonly deriveTypeShape: (decl: TypeDecl) => ts.Expression;
  readonly deriveTypeDecl: (decl: TypeDecl) => readonly GeneratedItem[];
  readonly extension: (
    node: ts.TypeNode,
    checker: ts.TypeChecker
  ) => Result<ts.Expression, Diagnostic>;
};

export type Deriving0Hooks = {
  readonly name: string;
  readonly t: (typeNode: ts.TypeNode) => ts.TypeNode;
  readonly declLabel: (self: Deriving0, name: Label) => string;
  readonly deriveOfTuple: (
    self: Deriving0,
    types: readonly TypeExpr[]
  ) => ts.Expression;
  readonly deriveOfRecord: (
    self: Deriving0,
    fields: readonly RecordField[]
  ) => ts.Expression;
  readonly deriveOfVariant: (
    self: Deriving0,
    cases: readonly VariantCase[]
  ) => ts.Expression;
  readonly deriveOfPolyvariant: (
    self: Deriving0,
    cases: readonly PolyvariantCase[],
    typeNode: ts.TypeNode
  ) => ts.Expression;
  readonly deriveTypeRefName: (
    self: Deriving0,
    derivation: string,
    name: Longident
  ) => ts.Expression;
  readonly deriveTypeDecl: (
    self: Deriving0,
    decl: TypeDecl
  ) => readonly GeneratedItem[];
};

/**
 * Names the initializer of a unit reads, less its own handler parameters
 */
const referencedNames = (statement: ts.Statement): ReadonlySet<string> => {
  const names = new Set<string>();
  const visit = (child: ts.Node): void => {
    if (ts.isIdentifier(child)) {
      names.add(child.text);
    }
    ts.forEachChild(child, visit);
  };
  const initializers = ts.isVariableStatement(statement)
    ? statement.declarationList.declarations.flatMap((d) =>
        d.initializer ? [d.initializer] : []
      )
    : [statement];
  for (const initializer of initializers) {
    visit(initializer);
    if (ts.isArrowFunction(initializer)) {
      for (const param of initializer.parameters) {
        if (ts.isIdentifier(param.name)) {
          names.delete(param.name.text);
        }
      }
    }
  }
  return names;
};

/**
 * Order units so that each follows the units of the batch it references.
 * Units that reach themselves through their references cannot be
 * initialized; their names are the error.
 */
export const orderByReferences = (
  items: readonly GeneratedItem[]
): Result<readonly GeneratedItem[], readonly string[]> => {
  const unitNames = new Set(
    items.flatMap((item) => (item.kind === "statement" ? [item.name] : []))
  );
  const dependencies = new Map(
    items.map((item) => [
      item,
      item.kind === "statement"
        ? [...referencedNames(item.statement)].filter((name) =>
            unitNames.has(name)
          )
        : [],
    ])
  );

  const emitted = new Set<string>();
  const ordered: GeneratedItem[] = [];
  let pending = [...items];

  while (pending.length > 0) {
    const ready = pending.find((item) =>
      (dependencies.get(item) ?? []).every((name) => emitted.has(name))
    );
    if (ready === undefined) {
      return error(
        pending.flatMap((item) => (item.kind === "statement" ? [item.name] : []))
      );
    }
    ordered.push(ready);
    if (ready.kind === "statement") {
      emitted.add(ready.name);
    }
    pending = pending.filter((item) => item !== ready);
  }

  return ok(ordered);
};

const recursiveUnits = (
  decls: readonly TypeDecl[],
  declName: (name: Label) => string,
  names: readonly string[]
): GeneratedItem => {
  const first = decls.find((decl) => names.includes(declName(decl.name)));
  return {
    kind: "diagnostic",
    diagnostic: createDiagnostic(
      "SG1004",
      "error",
      `recursive constants are not supported: ${names.join(", ")}`,
      first?.name.loc
    ),
  };
};

export const deriveTypeDecl0Default = (
  self: Deriving0,
  decl: TypeDecl
): readonly GeneratedItem[] => [
  unitStatement({
    name: self.declName(decl.name),
    params: decl.params,
    handlerName: (param) => deriveParamName(self.name, param.txt),
    handlerType: self.unitType,
    unitType: self.unitType(declToTypeNode(decl)),
    body: self.deriveTypeShape(decl),
  }),
];

export const deriving0Defaults: Omit<Deriving0Hooks, "name" | "t"> = {
  declLabel: (self, name) => deriveOfLabel(self.name, name.txt),
  deriveOfTuple: (self) => callbackNotProvided(self.name, "tuple types"),
  deriveOfRecord: (self) => callbackNotProvided(self.name, "record types"),
  deriveOfVariant: (self) => callbackNotProvided(self.name, "variant types"),
  deriveOfPolyvariant: (self) =>
    callbackNotProvided(self.name, "open sum types"),
  deriveTypeRefName: (_self, derivation, name) => ederiver(derivation, name),
  deriveTypeDecl: deriveTypeDecl0Default,
};

export const createDeriving0 = (hooks: Deriving0Hooks): Deriving0 => {
  const self: Deriving0 = {
    name: hooks.name,
    unitType: hooks.t,
    declName: (name) => hooks.declLabel(self, name),

    deriveOfTypeExpr: (te) => {
      const shape = te.shape;
      switch (shape.kind) {
        case "tuple":
          return hooks.deriveOfTuple(self, shape.elements);
        case "var":
          return id(deriveParamName(self.name, shape.name.txt));
        case "opaque":
          return self.deriveTypeRef(self.name, shape.name, shape.args);
        case "polyvariant":
          return hooks.deriveOfPolyvariant(self, shape.cases, te.node);
      }
    },

    deriveTypeRef: (derivation, name, args) => {
      const ref = hooks.deriveTypeRefName(self, derivation, name);
      return args.length === 0
        ? ref
        : call(
            ref,
            args.map((arg) => self.deriveOfTypeExpr(arg))
          );
    },

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
    deriveDecls: (decls) => {
      const ordered = orderByReferences(
        decls.flatMap((decl) => self.deriveTypeDecl(decl))
      );
      return ordered.ok
        ? ordered.value
        : [recursiveUnits(decls, self.declName, ordered.error)];
    },
    generate: (batch) => generateUnits(batch, self.deriveDecls),

    extension: (node, checker) =>
      map(reflectBareTypeExpr(node, checker), (te) => self.deriveOfTypeExpr(te)),
  };
  return self;
};
