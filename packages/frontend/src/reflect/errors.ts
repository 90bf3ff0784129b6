/**
 * Reflection failures
 */

import {
  createDiagnostic,
  type Diagnostic,
  type SourceLocation,
} from "../types/diagnostic.js";

/**
 * Raised when a declaration uses a construct the canonical model cannot
 * represent. Always fatal to the whole batch.
 */
export class UnsupportedShapeError extends Error {
  constructor(
    readonly location: SourceLocation,
    readonly category: string
  ) {
    super(`${category} are not supported`);
    this.name = "UnsupportedShapeError";
  }
}

export const notSupported = (
  location: SourceLocation,
  category: string
): never => {
  throw new UnsupportedShapeError(location, category);
};

export const unsupportedShapeDiagnostic = (
  failure: UnsupportedShapeError
): Diagnostic =>
  createDiagnostic("SG1001", "error", failure.message, failure.location);
