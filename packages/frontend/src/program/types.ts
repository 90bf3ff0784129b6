/**
 * Program type definitions
 */

import type * as ts from "typescript";

export type ProgramOptions = {
  readonly verbose?: boolean;
};

export type ShapegenProgram = {
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  /** The input files, in the order they were given */
  readonly sourceFiles: readonly ts.SourceFile[];
};
