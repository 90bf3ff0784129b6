/**
 * Names the runtime module provides to generated code
 */

import type { RuntimeImports } from "@shapegen/emitter";

export const RUNTIME_MODULE = "@shapegen/derivers/runtime";

export const RUNTIME_VALUES: readonly string[] = [
  "DecodeError",
  "decodeError",
  "jsonField",
  "jsonElement",
  "jsonTag",
  "toJson_number",
  "toJson_string",
  "toJson_boolean",
  "toJson_null",
  "toJson_bigint",
  "toJson_undefined",
  "toJson_Array",
  "toJson_Option",
  "ofJson_number",
  "ofJson_string",
  "ofJson_boolean",
  "ofJson_null",
  "ofJson_bigint",
  "ofJson_undefined",
  "ofJson_Array",
  "ofJson_Option",
  "example_number",
  "example_string",
  "example_boolean",
  "example_null",
  "example_bigint",
  "example_undefined",
  "example_Array",
  "example_Option",
];

export const RUNTIME_TYPES: readonly string[] = [
  "Json",
  "Option",
  "Encoded_number",
  "Encoded_string",
  "Encoded_boolean",
  "Encoded_null",
  "Encoded_bigint",
  "Encoded_undefined",
  "Encoded_Array",
  "Encoded_Option",
];

export const runtimeImports = (
  module: string = RUNTIME_MODULE
): RuntimeImports => ({
  module,
  values: RUNTIME_VALUES,
  types: RUNTIME_TYPES,
});
