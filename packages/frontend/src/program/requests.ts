/**
 * Derivation requests
 *
 * A declaration asks for derivations with a JSDoc tag:
 *
 *   /** @deriving json, example *\/
 *   export type Shape = ...
 */

import * as ts from "typescript";

export const DERIVING_TAG = "deriving";

export type DerivingRequest = {
  readonly derivation: string;
  readonly declarations: readonly ts.Statement[];
};

export const isExported = (statement: ts.Statement): boolean =>
  ts.canHaveModifiers(statement) &&
  (ts.getModifiers(statement) ?? []).some(
    (m) => m.kind === ts.SyntaxKind.ExportKeyword
  );

/**
 * Derivation names requested on one statement, in written order
 */
export const requestedDerivations = (
  statement: ts.Statement
): readonly string[] =>
  ts
    .getJSDocTags(statement)
    .filter((tag) => tag.tagName.text === DERIVING_TAG)
    .flatMap((tag) =>
      (ts.getTextOfJSDocComment(tag.comment) ?? "")
        .split(/[\s,]+/)
        .filter((name) => name !== "")
    );

/**
 * Group the requesting declarations of a file into one batch per
 * derivation, in order of first request. Declarations keep source order.
 */
export const collectDerivingRequests = (
  sourceFile: ts.SourceFile
): readonly DerivingRequest[] => {
  const batches = new Map<string, ts.Statement[]>();

  for (const statement of sourceFile.statements) {
    for (const derivation of new Set(requestedDerivations(statement))) {
      const batch = batches.get(derivation);
      if (batch) {
        batch.push(statement);
      } else {
        batches.set(derivation, [statement]);
      }
    }
  }

  return [...batches].map(([derivation, declarations]) => ({
    derivation,
    declarations,
  }));
};
