/**
 * Program creation
 */

import * as ts from "typescript";
import * as path from "node:path";
import * as fs from "node:fs";
import { type Result, ok, error } from "../types/result.js";
import {
  type DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";
import type { ProgramOptions, ShapegenProgram } from "./types.js";
import { defaultTsConfig } from "./config.js";
import { collectTsDiagnostics } from "./diagnostics.js";

const missingFiles = (paths: readonly string[]): DiagnosticsCollector =>
  paths
    .filter((p) => !fs.existsSync(p))
    .reduce(
      (collector, p) =>
        addDiagnostic(
          collector,
          createDiagnostic("SG9001", "error", `Cannot read file ${p}`)
        ),
      createDiagnosticsCollector()
    );

const finishProgram = (
  program: ts.Program,
  rootNames: readonly string[]
): Result<ShapegenProgram, DiagnosticsCollector> => {
  const diagnostics = collectTsDiagnostics(program);
  if (diagnostics.hasErrors) {
    return error(diagnostics);
  }

  const sourceFiles = rootNames.flatMap((name) => {
    const sourceFile = program.getSourceFile(name);
    return sourceFile ? [sourceFile] : [];
  });

  return ok({
    program,
    checker: program.getTypeChecker(),
    sourceFiles,
  });
};

/**
 * Create a program over files on disk
 */
export const createProgram = (
  filePaths: readonly string[],
  options: ProgramOptions = {}
): Result<ShapegenProgram, DiagnosticsCollector> => {
  const absolutePaths = filePaths.map((fp) => path.resolve(fp));

  const missing = missingFiles(absolutePaths);
  if (missing.hasErrors) {
    return error(missing);
  }

  if (options.verbose) {
    console.log(`Creating program for ${absolutePaths.length} file(s)`);
  }

  const host = ts.createCompilerHost(defaultTsConfig, true);
  const program = ts.createProgram(absolutePaths, defaultTsConfig, host);
  return finishProgram(program, absolutePaths);
};

/**
 * Create a program over one in-memory source file. Imports of other files
 * are left unresolved.
 */
export const createSourceProgram = (
  source: string,
  fileName = "/input.ts"
): Result<ShapegenProgram, DiagnosticsCollector> => {
  const sourceFile = ts.createSourceFile(
    fileName,
    source,
    ts.ScriptTarget.ES2022,
    true,
    ts.ScriptKind.TS
  );

  const host = ts.createCompilerHost(defaultTsConfig);
  const originalGetSourceFile = host.getSourceFile;
  host.getSourceFile = (
    name: string,
    languageVersion: ts.ScriptTarget | ts.CreateSourceFileOptions,
    onError?: (message: string) => void,
    shouldCreateNewSourceFile?: boolean
  ): ts.SourceFile | undefined =>
    name === fileName
      ? sourceFile
      : originalGetSourceFile.call(
          host,
          name,
          languageVersion,
          onError,
          shouldCreateNewSourceFile
        );
  host.fileExists = (name: string): boolean =>
    name === fileName || ts.sys.fileExists(name);
  host.readFile = (name: string): string | undefined =>
    name === fileName ? source : ts.sys.readFile(name);

  const program = ts.createProgram([fileName], defaultTsConfig, host);
  return finishProgram(program, [fileName]);
};
