/**
 * JSON decoder derivation, match style
 *
 * Generates the same `ofJson` units as the cascade style, dispatching with
 * `switch` on the tag instead.
 */

import {
  derivingOfMatch,
  str,
  type DerivingOf,
} from "@shapegen/emitter";
import {
  DECODER_NAME,
  decodeCase,
  decodeElements,
  decodeFailure,
  decodeFields,
  decodeRecordCase,
  jsonInputType,
  jsonTagOf,
} from "./decode.js";
import { jsonTagName } from "./names.js";

export const ofJsonMatch: DerivingOf = derivingOfMatch({
  name: DECODER_NAME,
  ofT: jsonInputType,
  error: decodeFailure,
  deriveOfTag: (x, enumerated) => (enumerated ? x : jsonTagOf(x)),
  deriveOfTuple: (derive, types, x) => decodeElements(derive, types, x),
  deriveOfRecord: decodeFields,
  deriveOfVariantCase: (derive, make, name, attrs, types, x) => ({
    test: str(jsonTagName(name, attrs)),
    body: decodeCase(derive, make, types, x),
  }),
  deriveOfEnumVariantCase: (_derive, make, name, attrs) => ({
    test: str(jsonTagName(name, attrs)),
    body: make(),
  }),
  deriveOfVariantCaseRecord: (derive, make, name, attrs, fields, x) => ({
    test: str(jsonTagName(name, attrs)),
    body: decodeRecordCase(derive, make, fields, x),
  }),
});
