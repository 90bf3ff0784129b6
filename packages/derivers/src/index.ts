/**
 * shapegen derivers - JSON encoding, decoding, mirrored types and samples
 */

export { toJson } from "./json/to-json.js";
export { ofJson } from "./json/of-json.js";
export { ofJsonMatch } from "./json/of-json-match.js";
export { Encoded } from "./json/encoded.js";
export { KEY_ATTRIBUTE, NAME_ATTRIBUTE, jsonKey, jsonTagName } from "./json/names.js";
export { example } from "./example.js";
export {
  type BuiltinOptions,
  type DecoderStyle,
  DECODER_STYLES,
  createBuiltinRegistry,
  isDecoderStyle,
  json,
} from "./registry.js";
export {
  RUNTIME_MODULE,
  RUNTIME_TYPES,
  RUNTIME_VALUES,
  runtimeImports,
} from "./runtime-exports.js";
