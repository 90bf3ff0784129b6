/**
 * JSON decoder derivation, cascade style
 */

import {
  conditional,
  derivingOf,
  str,
  strictEquals,
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

export const ofJson: DerivingOf = derivingOf({
  name: DECODER_NAME,
  ofT: jsonInputType,
  error: decodeFailure,
  deriveOfTuple: (derive, types, x) => decodeElements(derive, types, x),
  deriveOfRecord: decodeFields,
  deriveOfVariantCase: (derive, make, name, attrs, types, x, next) =>
    conditional(
      strictEquals(jsonTagOf(x), str(jsonTagName(name, attrs))),
      decodeCase(derive, make, types, x),
      next
    ),
  deriveOfEnumVariantCase: (_derive, make, name, attrs, x, next) =>
    conditional(strictEquals(x, str(jsonTagName(name, attrs))), make(), next),
  deriveOfVariantCaseRecord: (derive, make, name, attrs, fields, x, next) =>
    conditional(
      strictEquals(jsonTagOf(x), str(jsonTagName(name, attrs))),
      decodeRecordCase(derive, make, fields, x),
      next
    ),
});
