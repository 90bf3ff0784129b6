/**
 * shapegen list command - derivations a source file may request
 */

import { createBuiltinRegistry } from "@shapegen/derivers";
import type { ResolvedConfig } from "../types.js";

export const listCommand = (
  config: Pick<ResolvedConfig, "decoderStyle" | "derivings">
): readonly string[] => {
  const names = createBuiltinRegistry({
    decoderStyle: config.decoderStyle,
  }).names();
  const allowed = config.derivings;
  return allowed ? names.filter((name) => allowed.includes(name)) : names;
};
