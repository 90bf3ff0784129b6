/**
 * Program - Public API
 */

export type { ProgramOptions, ShapegenProgram } from "./types.js";
export { defaultTsConfig } from "./config.js";
export {
  collectTsDiagnostics,
  convertTsDiagnostic,
  getSourceLocation,
} from "./diagnostics.js";
export { createProgram, createSourceProgram } from "./creation.js";
export {
  DERIVING_TAG,
  type DerivingRequest,
  collectDerivingRequests,
  isExported,
  requestedDerivations,
} from "./requests.js";
