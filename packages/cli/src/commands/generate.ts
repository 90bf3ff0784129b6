/**
 * shapegen generate command - write the derived module of each source file
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { basename, dirname, join, relative, sep } from "node:path";
import * as ts from "typescript";
import {
  createDiagnostic,
  createProgram,
  collectDerivingRequests,
  formatDiagnostic,
  getNodeLocation,
  isExported,
  type Diagnostic,
  type DerivingRequest,
} from "@shapegen/frontend";
import {
  CallbackNotProvidedError,
  callbackNotProvidedDiagnostic,
  emitModule,
  type DerivingRegistry,
  type GeneratedItem,
} from "@shapegen/emitter";
import { createBuiltinRegistry, runtimeImports } from "@shapegen/derivers";
import type { ResolvedConfig, Result } from "../types.js";

export type GeneratedFile = {
  readonly sourcePath: string;
  readonly outputPath: string;
  readonly diagnostics: readonly Diagnostic[];
};

export type GenerateSummary = {
  readonly files: readonly GeneratedFile[];
  readonly errorCount: number;
};

const diagnosticItem = (diagnostic: Diagnostic): GeneratedItem => ({
  kind: "diagnostic",
  diagnostic,
});

/**
 * Path of the derived module of `sourcePath`
 */
export const outputPathFor = (
  sourcePath: string,
  config: Pick<ResolvedConfig, "outDir" | "suffix">
): string => {
  const stem = basename(sourcePath).replace(/\.(d\.)?[cm]?tsx?$/, "");
  return join(config.outDir ?? dirname(sourcePath), `${stem}${config.suffix}`);
};

/**
 * Specifier the derived module imports the source types through
 */
export const sourceModuleFor = (
  sourcePath: string,
  outputPath: string
): string => {
  const path = relative(dirname(outputPath), sourcePath)
    .split(sep)
    .join("/")
    .replace(/\.ts$/, ".js");
  return path.startsWith(".") ? path : `./${path}`;
};

const declarationName = (statement: ts.Statement): string =>
  ts.isTypeAliasDeclaration(statement) || ts.isInterfaceDeclaration(statement)
    ? statement.name.text
    : "declaration";

const deriveRequest = (
  request: DerivingRequest,
  registry: DerivingRegistry,
  allowed: ReadonlySet<string> | undefined,
  checker: ts.TypeChecker
): readonly GeneratedItem[] => {
  const [first] = request.declarations;
  const location = first ? getNodeLocation(first) : undefined;

  const deriving =
    allowed === undefined || allowed.has(request.derivation)
      ? registry.lookup(request.derivation)
      : undefined;
  if (!deriving) {
    return [
      diagnosticItem(
        createDiagnostic(
          "SG1002",
          "error",
          `Unknown derivation '${request.derivation}'`,
          location,
          `Available: ${registry
            .names()
            .filter((name) => allowed === undefined || allowed.has(name))
            .join(", ")}`
        )
      ),
    ];
  }

  const hidden = request.declarations.filter((d) => !isExported(d));
  if (hidden.length > 0) {
    return hidden.map((d) =>
      diagnosticItem(
        createDiagnostic(
          "SG1003",
          "error",
          `${declarationName(d)} must be exported to derive '${request.derivation}'`,
          getNodeLocation(d)
        )
      )
    );
  }

  try {
    return deriving.generate({
      declarations: request.declarations,
      checker,
    });
  } catch (error) {
    if (error instanceof CallbackNotProvidedError) {
      return [
        diagnosticItem({
          ...callbackNotProvidedDiagnostic(error),
          location,
        }),
      ];
    }
    throw error;
  }
};

/**
 * Generate the derived module of every source file
 */
export const generateCommand = (
  sourcePaths: readonly string[],
  config: ResolvedConfig
): Result<GenerateSummary, string> => {
  if (sourcePaths.length === 0) {
    return { ok: false, error: "No source files given" };
  }

  const created = createProgram(sourcePaths, { verbose: config.verbose });
  if (!created.ok) {
    return {
      ok: false,
      error: created.error.diagnostics.map(formatDiagnostic).join("\n"),
    };
  }

  const registry = createBuiltinRegistry({
    decoderStyle: config.decoderStyle,
  });
  const allowed = config.derivings ? new Set(config.derivings) : undefined;
  const { checker } = created.value;

  const files = created.value.sourceFiles.map((sourceFile): GeneratedFile => {
    const requests = collectDerivingRequests(sourceFile);
    const items = requests.flatMap((request) =>
      deriveRequest(request, registry, allowed, checker)
    );

    const outputPath = outputPathFor(sourceFile.fileName, config);
    const text = emitModule({
      items,
      sourceFile,
      sourceModule: sourceModuleFor(sourceFile.fileName, outputPath),
      runtimes: [runtimeImports(config.runtimeModule)],
    });

    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, text, "utf-8");

    if (config.verbose) {
      console.log(
        `  ${sourceFile.fileName}: ${requests.length} request(s) -> ${outputPath}`
      );
    }

    return {
      sourcePath: sourceFile.fileName,
      outputPath,
      diagnostics: items.flatMap((item) =>
        item.kind === "diagnostic" ? [item.diagnostic] : []
      ),
    };
  });

  return {
    ok: true,
    value: {
      files,
      errorCount: files
        .flatMap((file) => file.diagnostics)
        .filter((d) => d.severity === "error").length,
    },
  };
};
