/**
 * Built-in derivations
 */

import {
  combined,
  createRegistry,
  type Deriving,
  type DerivingRegistry,
} from "@shapegen/emitter";
import { example } from "./example.js";
import { Encoded } from "./json/encoded.js";
import { ofJson } from "./json/of-json.js";
import { ofJsonMatch } from "./json/of-json-match.js";
import { toJson } from "./json/to-json.js";

export type DecoderStyle = "cascade" | "match";

export const DECODER_STYLES: readonly DecoderStyle[] = ["cascade", "match"];

export const isDecoderStyle = (value: string): value is DecoderStyle =>
  value === "cascade" || value === "match";

export type BuiltinOptions = {
  readonly decoderStyle?: DecoderStyle;
};

/**
 * `toJson` followed by `ofJson` for the same declarations
 */
export const json = (decoder: Deriving = ofJson): Deriving =>
  combined("json", toJson, decoder);

export const createBuiltinRegistry = (
  options: BuiltinOptions = {}
): DerivingRegistry => {
  const decoder = options.decoderStyle === "match" ? ofJsonMatch : ofJson;
  return createRegistry([toJson, decoder, json(decoder), Encoded, example]);
};
