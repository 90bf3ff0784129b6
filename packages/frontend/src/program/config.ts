/**
 * TypeScript compiler configuration
 */

import * as ts from "typescript";

/**
 * Only declarations are read, so no standard library is loaded. Type
 * references resolve through the checker for the files of the program.
 */
export const defaultTsConfig: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.NodeNext,
  moduleResolution: ts.ModuleResolutionKind.NodeNext,
  noLib: true,
  types: [],
  strict: true,
  skipLibCheck: true,
  allowJs: false,
  noEmit: true,
  resolveJsonModule: false,
  allowImportingTsExtensions: true,
};
