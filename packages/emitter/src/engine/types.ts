/**
 * Engine-level types shared by every derivation
 */

import type * as ts from "typescript";
import type { Diagnostic, TypeDecl, TypeExpr } from "@shapegen/frontend";

/**
 * Declarations of one generation request, with the checker of their program
 */
export type Batch = {
  readonly declarations: readonly ts.Statement[];
  readonly checker: ts.TypeChecker;
};

export type GeneratedItem =
  | {
      readonly kind: "statement";
      readonly name: string;
      readonly statement: ts.Statement;
    }
  | {
      readonly kind: "diagnostic";
      readonly diagnostic: Diagnostic;
    };

export type Deriving = {
  readonly name: string;
  /** Units for already reflected declarations */
  readonly deriveDecls: (decls: readonly TypeDecl[]) => readonly GeneratedItem[];
  /** Reflect a batch and derive it, or yield one diagnostic */
  readonly generate: (batch: Batch) => readonly GeneratedItem[];
};

/**
 * Apply the enclosing derivation to a type expression and an input.
 */
export type DeriveExpr = (te: TypeExpr, x: ts.Expression) => ts.Expression;

/**
 * Either a function over the input or a value to apply to it.
 */
export type Deriver =
  | {
      readonly kind: "fun";
      readonly apply: (x: ts.Expression) => ts.Expression;
    }
  | {
      readonly kind: "val";
      readonly expr: ts.Expression;
    };
