/**
 * Derivation errors
 */

import { createDiagnostic, type Diagnostic } from "@shapegen/frontend";

/**
 * Raised when a derivation meets a shape it supplies no callback for.
 */
export class CallbackNotProvidedError extends Error {
  constructor(
    readonly derivation: string,
    readonly construct: string
  ) {
    super(`${derivation}: ${construct} are not supported`);
    this.name = "CallbackNotProvidedError";
  }
}

export const callbackNotProvided = (
  derivation: string,
  construct: string
): never => {
  throw new CallbackNotProvidedError(derivation, construct);
};

export const callbackNotProvidedDiagnostic = (
  failure: CallbackNotProvidedError
): Diagnostic => createDiagnostic("SG2001", "error", failure.message);
