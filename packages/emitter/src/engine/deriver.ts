/**
 * Conversions between the two deriver forms
 */

import { INPUT_NAME } from "../constants.js";
import { arrow, call, id } from "../helpers.js";
import type { Deriver } from "./types.js";
import type * as ts from "typescript";

export const asVal = (deriver: Deriver, x: ts.Expression): ts.Expression =>
  deriver.kind === "fun" ? deriver.apply(x) : call(deriver.expr, [x]);

export const asFun = (deriver: Deriver): ts.Expression =>
  deriver.kind === "fun"
    ? arrow([INPUT_NAME], deriver.apply(id(INPUT_NAME)))
    : deriver.expr;
