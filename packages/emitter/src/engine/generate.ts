/**
 * Batch generation and unit statements
 */

import * as ts from "typescript";
import {
  reflectDeclarations,
  type Label,
  type TypeDecl,
} from "@shapegen/frontend";
import { typeRef } from "../helpers.js";
import type { Batch, GeneratedItem } from "./types.js";

const f = ts.factory;

/**
 * Reflect the batch and derive it. Any unsupported shape in the batch
 * replaces the whole output with one diagnostic.
 */
export const generateUnits = (
  batch: Batch,
  deriveDecls: (decls: readonly TypeDecl[]) => readonly GeneratedItem[]
): readonly GeneratedItem[] => {
  const reflected = reflectDeclarations(batch.declarations, batch.checker);
  return reflected.ok
    ? deriveDecls(reflected.value)
    : [{ kind: "diagnostic", diagnostic: reflected.error }];
};

const exportModifiers = (): readonly ts.ModifierLike[] => [
  f.createModifier(ts.SyntaxKind.ExportKeyword),
];

export type UnitOptions = {
  readonly name: string;
  readonly params: readonly Label[];
  /** Handler parameter name for a type parameter */
  readonly handlerName: (param: Label) => string;
  /** Handler parameter type for a type parameter */
  readonly handlerType: (param: ts.TypeNode) => ts.TypeNode;
  readonly unitType: ts.TypeNode;
  readonly body: ts.Expression;
};

/**
 * `export const name: unitType = body`, or for a generic declaration
 * `export const name = <A>(D_A: handlerType): unitType => body`.
 */
export const unitStatement = (options: UnitOptions): GeneratedItem => {
  const { name, params, unitType, body } = options;

  const initializer =
    params.length === 0
      ? body
      : f.createArrowFunction(
          undefined,
          params.map((p) => f.createTypeParameterDeclaration(undefined, p.txt)),
          params.map((p) =>
            f.createParameterDeclaration(
              undefined,
              undefined,
              options.handlerName(p),
              undefined,
              options.handlerType(typeRef(p.txt))
            )
          ),
          ts.isFunctionTypeNode(unitType)
            ? f.createParenthesizedType(unitType)
            : unitType,
          f.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
          body
        );

  const statement = f.createVariableStatement(
    exportModifiers(),
    f.createVariableDeclarationList(
      [
        f.createVariableDeclaration(
          name,
          undefined,
          params.length === 0 ? unitType : undefined,
          initializer
        ),
      ],
      ts.NodeFlags.Const
    )
  );

  return { kind: "statement", name, statement };
};

/**
 * `export type name<A, B> = type`
 */
export const typeUnitStatement = (
  name: string,
  params: readonly Label[],
  type: ts.TypeNode
): GeneratedItem => ({
  kind: "statement",
  name,
  statement: f.createTypeAliasDeclaration(
    exportModifiers(),
    name,
    params.length > 0
      ? params.map((p) => f.createTypeParameterDeclaration(undefined, p.txt))
      : undefined,
    type
  ),
});
