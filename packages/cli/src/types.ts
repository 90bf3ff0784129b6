/**
 * Type definitions for CLI
 */

import type { DecoderStyle } from "@shapegen/derivers";

/**
 * Configuration file (shapegen.json)
 */
export type ShapegenConfig = {
  readonly $schema?: string;
  /** Directory generated modules are written to, beside the source when absent */
  readonly outDir?: string;
  /** Appended to the source file name, default ".derived.ts" */
  readonly suffix?: string;
  /** Module generated code imports the runtime from */
  readonly runtimeModule?: string;
  readonly decoderStyle?: DecoderStyle;
  /** Derivations a source file may request; every registered one when absent */
  readonly derivings?: readonly string[];
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  out?: string;
  suffix?: string;
  decoder?: string;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly projectRoot: string; // Directory containing shapegen.json, or the working directory
  readonly outDir: string | undefined;
  readonly suffix: string;
  readonly runtimeModule: string;
  readonly decoderStyle: DecoderStyle;
  readonly derivings: readonly string[] | undefined;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * Result type for operations
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };
