/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
shapegen - type-directed code generation v${VERSION}

USAGE:
  shapegen <command> [options]

COMMANDS:
  generate <files...>       Write the derived module of each source file
  list                      List the derivations a file may request

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: shapegen.json)

GENERATE OPTIONS:
  -o, --out <dir>           Output directory (default: beside each source)
  --suffix <suffix>         Derived file suffix (default: .derived.ts)
  --decoder <style>         JSON decoder style: cascade or match

REQUESTS:
  /** @deriving json, example */
  export type Shape = { kind: "Circle"; args: [number] } | { kind: "Dot" };

EXAMPLES:
  shapegen list
  shapegen generate src/shapes.ts
  shapegen generate src/*.ts --out src/derived --decoder match
`);
};
