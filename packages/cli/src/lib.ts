/**
 * Programmatic API of the CLI
 */

export { runCli, parseArgs, VERSION } from "./cli.js";
export * from "./types.js";
export * from "./config.js";
export {
  generateCommand,
  outputPathFor,
  sourceModuleFor,
  type GeneratedFile,
  type GenerateSummary,
} from "./commands/generate.js";
export { listCommand } from "./commands/list.js";
