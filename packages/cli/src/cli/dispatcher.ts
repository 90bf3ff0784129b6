/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { formatDiagnostic } from "@shapegen/frontend";
import { findConfig, loadConfig, resolveConfig } from "../config.js";
import { generateCommand } from "../commands/generate.js";
import { listCommand } from "../commands/list.js";
import type { ResolvedConfig, Result, ShapegenConfig } from "../types.js";
import {
  EXIT_CONFIG,
  EXIT_DIAGNOSTICS,
  EXIT_FAILURE,
  EXIT_OK,
  EXIT_USAGE,
  VERSION,
} from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs, type ParsedArgs } from "./parser.js";

/**
 * Config file named with -c, or found by walking up from `cwd`. Without
 * either, the defaults apply.
 */
const loadEffectiveConfig = (
  parsed: ParsedArgs,
  cwd: string
): Result<ResolvedConfig, string> => {
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let fileConfig: ShapegenConfig = {};
  if (configPath) {
    const loaded = loadConfig(configPath);
    if (!loaded.ok) {
      return loaded;
    }
    fileConfig = loaded.value;
  }

  return resolveConfig(
    fileConfig,
    parsed.options,
    configPath ? dirname(configPath) : cwd
  );
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.error) {
    console.error(`Error: ${parsed.error}`);
    console.error("Run 'shapegen --help' for usage information");
    return EXIT_USAGE;
  }

  if (parsed.command === "version") {
    console.log(`shapegen v${VERSION}`);
    return EXIT_OK;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_OK;
  }

  const configResult = loadEffectiveConfig(parsed, cwd);
  if (!configResult.ok) {
    console.error(`Error: ${configResult.error}`);
    return EXIT_CONFIG;
  }
  const config = configResult.value;

  switch (parsed.command) {
    case "generate": {
      const result = generateCommand(
        parsed.files.map((file) => resolve(cwd, file)),
        config
      );
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return EXIT_FAILURE;
      }

      for (const file of result.value.files) {
        for (const diagnostic of file.diagnostics) {
          console.error(formatDiagnostic(diagnostic));
        }
        if (!config.quiet) {
          console.log(`✓ ${file.outputPath}`);
        }
      }
      return result.value.errorCount > 0 ? EXIT_DIAGNOSTICS : EXIT_OK;
    }

    case "list": {
      for (const name of listCommand(config)) {
        console.log(name);
      }
      return EXIT_OK;
    }

    default:
      console.error(`Error: Unknown command '${parsed.command}'`);
      console.error("Run 'shapegen --help' for usage information");
      return EXIT_USAGE;
  }
};
