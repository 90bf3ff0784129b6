/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  RUNTIME_MODULE,
  isDecoderStyle,
  type DecoderStyle,
} from "@shapegen/derivers";
import type {
  ShapegenConfig,
  CliOptions,
  ResolvedConfig,
  Result,
} from "./types.js";

export const CONFIG_FILE_NAME = "shapegen.json";
export const DEFAULT_SUFFIX = ".derived.ts";

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const isDecoderStyleValue = (value: unknown): value is DecoderStyle =>
  typeof value === "string" && isDecoderStyle(value);

const optionalString = (
  raw: Readonly<Record<string, unknown>>,
  key: string
): Result<string | undefined, string> => {
  const value = raw[key];
  if (value === undefined || typeof value === "string") {
    return { ok: true, value };
  }
  return { ok: false, error: `${CONFIG_FILE_NAME}: '${key}' must be a string` };
};

/**
 * Validate the parsed contents of shapegen.json
 */
export const parseConfig = (raw: unknown): Result<ShapegenConfig, string> => {
  if (!isRecord(raw)) {
    return { ok: false, error: `${CONFIG_FILE_NAME}: expected an object` };
  }

  const strings: Record<string, string | undefined> = {};
  for (const key of ["$schema", "outDir", "suffix", "runtimeModule"]) {
    const result = optionalString(raw, key);
    if (!result.ok) {
      return result;
    }
    strings[key] = result.value;
  }

  const decoderStyle = raw["decoderStyle"];
  if (decoderStyle !== undefined && !isDecoderStyleValue(decoderStyle)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'decoderStyle' must be "cascade" or "match"`,
    };
  }

  const derivings = raw["derivings"];
  if (derivings !== undefined && !isStringArray(derivings)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'derivings' must be an array of names`,
    };
  }

  return {
    ok: true,
    value: {
      $schema: strings["$schema"],
      outDir: strings["outDir"],
      suffix: strings["suffix"],
      runtimeModule: strings["runtimeModule"],
      decoderStyle,
      derivings,
    },
  };
};

/**
 * Load shapegen.json from a path
 */
export const loadConfig = (
  configPath: string
): Result<ShapegenConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  try {
    const content: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
    return parseConfig(content);
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

/**
 * Find shapegen.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

const resolveDecoderStyle = (
  config: ShapegenConfig,
  cliOptions: CliOptions
): Result<DecoderStyle, string> => {
  const requested = cliOptions.decoder;
  if (requested === undefined) {
    return { ok: true, value: config.decoderStyle ?? "cascade" };
  }
  return isDecoderStyle(requested)
    ? { ok: true, value: requested }
    : {
        ok: false,
        error: `Unknown decoder style '${requested}' (expected cascade or match)`,
      };
};

/**
 * Resolve the effective configuration from config file + CLI options.
 * Paths in the config file are relative to the directory holding it.
 */
export const resolveConfig = (
  config: ShapegenConfig,
  cliOptions: CliOptions,
  projectRoot: string = process.cwd()
): Result<ResolvedConfig, string> => {
  const decoderStyle = resolveDecoderStyle(config, cliOptions);
  if (!decoderStyle.ok) {
    return decoderStyle;
  }

  const outDir =
    cliOptions.out !== undefined
      ? resolve(cliOptions.out)
      : config.outDir !== undefined
        ? resolve(projectRoot, config.outDir)
        : undefined;

  return {
    ok: true,
    value: {
      projectRoot,
      outDir,
      suffix: cliOptions.suffix ?? config.suffix ?? DEFAULT_SUFFIX,
      runtimeModule: config.runtimeModule ?? RUNTIME_MODULE,
      decoderStyle: decoderStyle.value,
      derivings: config.derivings,
      verbose: cliOptions.verbose ?? false,
      quiet: cliOptions.quiet ?? false,
    },
  };
};
