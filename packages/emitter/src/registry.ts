/**
 * Named derivation registry
 */

import type { Deriving } from "./engine/types.js";

export type DerivingRegistry = {
  /** Register under the derivation's own name. A later registration replaces an earlier one. */
  readonly register: (deriving: Deriving) => void;
  readonly lookup: (name: string) => Deriving | undefined;
  /** Registered names in registration order */
  readonly names: () => readonly string[];
};

export const createRegistry = (
  derivings: readonly Deriving[] = []
): DerivingRegistry => {
  const entries = new Map<string, Deriving>();

  const register = (deriving: Deriving): void => {
    entries.set(deriving.name, deriving);
  };

  derivings.forEach(register);

  return {
    register,
    lookup: (name) => entries.get(name),
    names: () => [...entries.keys()],
  };
};
