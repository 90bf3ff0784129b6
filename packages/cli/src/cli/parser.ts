/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  files: string[];
  options: CliOptions;
  /** Set when an option is missing its value */
  error?: string;
};

const VALUE_OPTIONS: Readonly<Record<string, keyof CliOptions>> = {
  "-c": "config",
  "--config": "config",
  "-o": "out",
  "--out": "out",
  "--suffix": "suffix",
  "--decoder": "decoder",
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  const files: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    if (!arg.startsWith("-")) {
      if (!command) {
        command = arg;
      } else {
        files.push(arg);
      }
      continue;
    }

    const valueOption = VALUE_OPTIONS[arg];
    if (valueOption !== undefined) {
      const value = args[++i];
      if (value === undefined || value.startsWith("-")) {
        return { command, files, options, error: `${arg} requires a value` };
      }
      switch (valueOption) {
        case "config":
          options.config = value;
          break;
        case "out":
          options.out = value;
          break;
        case "suffix":
          options.suffix = value;
          break;
        case "decoder":
          options.decoder = value;
          break;
      }
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", files: [], options: {} };
      case "-v":
      case "--version":
        return { command: "version", files: [], options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      default:
        return { command, files, options, error: `Unknown option '${arg}'` };
    }
  }

  return { command, files, options };
};
