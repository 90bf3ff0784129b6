/**
 * CLI constants
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");

const readVersion = (manifest: unknown): string =>
  typeof manifest === "object" &&
  manifest !== null &&
  "version" in manifest &&
  typeof manifest.version === "string"
    ? manifest.version
    : "0.0.0";

export const VERSION = readVersion(packageJson);

/**
 * Process exit codes
 */
export const EXIT_OK = 0;
export const EXIT_DIAGNOSTICS = 1;
export const EXIT_USAGE = 2;
export const EXIT_CONFIG = 3;
export const EXIT_FAILURE = 5;
