/**
 * shapegen frontend - declaration reflection into the canonical type model
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./repr/types.js";
export * from "./repr/helpers.js";
export * from "./program/index.js";

export {
  UnsupportedShapeError,
  notSupported,
  unsupportedShapeDiagnostic,
} from "./reflect/errors.js";
export { getNodeLocation } from "./reflect/location.js";
export {
  parseAttributeComment,
  readJSDocAttributes,
  readUnionMemberAttributes,
} from "./reflect/attributes.js";
export {
  type ReflectContext,
  reflectTypeExpr,
  entityNameToLongident,
} from "./reflect/type-expr.js";
export {
  reflectTypeDeclaration,
  reflectDeclarations,
  reflectBareTypeExpr,
} from "./reflect/type-decl.js";
