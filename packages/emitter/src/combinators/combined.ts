/**
 * Composition of derivations
 */

import { generateUnits } from "../engine/generate.js";
import type { Deriving } from "../engine/types.js";

/**
 * One derivation that runs every constituent on the same batch and
 * concatenates their outputs in composition order. The batch is reflected
 * once, so a failing batch still yields a single diagnostic.
 */
export const combined = (
  name: string,
  ...derivings: readonly Deriving[]
): Deriving => {
  const deriveDecls: Deriving["deriveDecls"] = (decls) =>
    derivings.flatMap((deriving) => deriving.deriveDecls(decls));
  return {
    name,
    deriveDecls,
    generate: (batch) => generateUnits(batch, deriveDecls),
  };
};
