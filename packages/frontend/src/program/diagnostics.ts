/**
 * TypeScript diagnostics collection and conversion
 */

import * as ts from "typescript";
import {
  type Diagnostic,
  type DiagnosticsCollector,
  type SourceLocation,
  createDiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
} from "../types/diagnostic.js";

/**
 * Collect the syntax errors of a program. Semantic errors are not reported:
 * programs are created without a standard library.
 */
export const collectTsDiagnostics = (
  program: ts.Program
): DiagnosticsCollector =>
  program
    .getSyntacticDiagnostics()
    .reduce((collector, tsDiag) => {
      const diagnostic = convertTsDiagnostic(tsDiag);
      return diagnostic ? addDiagnostic(collector, diagnostic) : collector;
    }, createDiagnosticsCollector());

export const convertTsDiagnostic = (
  tsDiag: ts.Diagnostic
): Diagnostic | null => {
  if (tsDiag.category === ts.DiagnosticCategory.Suggestion) {
    return null;
  }

  const severity =
    tsDiag.category === ts.DiagnosticCategory.Error
      ? "error"
      : tsDiag.category === ts.DiagnosticCategory.Warning
        ? "warning"
        : "info";

  const message = ts.flattenDiagnosticMessageText(tsDiag.messageText, "\n");

  const location =
    tsDiag.file && tsDiag.start !== undefined
      ? getSourceLocation(tsDiag.file, tsDiag.start, tsDiag.length ?? 1)
      : undefined;

  return createDiagnostic("SG9003", severity, message, location);
};

export const getSourceLocation = (
  file: ts.SourceFile,
  start: number,
  length: number
): SourceLocation => {
  const { line, character } = file.getLineAndCharacterOfPosition(start);
  return {
    file: file.fileName,
    line: line + 1,
    column: character + 1,
    length,
  };
};
