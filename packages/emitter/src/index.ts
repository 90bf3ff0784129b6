/**
 * shapegen emitter - derivation engines, combinators and module printing
 */

export * from "./engine/types.js";
export { asVal, asFun } from "./engine/deriver.js";
export {
  generateUnits,
  unitStatement,
  typeUnitStatement,
  type UnitOptions,
} from "./engine/generate.js";
export {
  type Deriving0,
  type Deriving0Hooks,
  createDeriving0,
  deriving0Defaults,
  deriveTypeDecl0Default,
  orderByReferences,
} from "./engine/deriving0.js";
export {
  type Deriving1,
  type Deriving1Hooks,
  createDeriving1,
  deriving1Defaults,
  deriveTypeDeclDefault,
} from "./engine/deriving1.js";
export {
  type DerivingType,
  type DerivingTypeHooks,
  createDerivingType,
  derivingTypeDefaults,
  deriveTypeDeclTypeDefault,
} from "./engine/deriving-type.js";

export { derivingTo, type DerivingToHooks } from "./combinators/deriving-to.js";
export {
  createDecoder,
  type DecoderHooks,
  type DerivingOf,
  type InheritCase,
  type ProbeInherit,
} from "./combinators/decoder.js";
export { derivingOf, type DerivingOfHooks } from "./combinators/deriving-of.js";
export {
  derivingOfMatch,
  type DerivingOfMatchHooks,
} from "./combinators/deriving-of-match.js";
export { combined } from "./combinators/combined.js";

export { createRegistry, type DerivingRegistry } from "./registry.js";
export {
  emitModule,
  collectReferencedNames,
  exportedTypeNames,
  type EmitModuleOptions,
  type RuntimeImports,
} from "./module/emit-module.js";

export * from "./helpers.js";
export * from "./naming.js";
export {
  CallbackNotProvidedError,
  callbackNotProvided,
  callbackNotProvidedDiagnostic,
} from "./errors.js";
export { generateFileHeader, INPUT_NAME } from "./constants.js";
