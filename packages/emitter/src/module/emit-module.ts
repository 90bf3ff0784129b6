/**
 * Module assembly
 *
 * Prints generated items as one TypeScript module: header, imports of the
 * declared types and of the runtime names the code uses, then the units in
 * order. Diagnostic items become comment lines in place.
 */

import * as ts from "typescript";
import { formatDiagnostic, isExported } from "@shapegen/frontend";
import { generateFileHeader } from "../constants.js";
import type { GeneratedItem } from "../engine/types.js";

const f = ts.factory;

/**
 * Names a runtime module provides to generated code
 */
export type RuntimeImports = {
  readonly module: string;
  readonly values: readonly string[];
  readonly types: readonly string[];
};

export type EmitModuleOptions = {
  readonly items: readonly GeneratedItem[];
  /** File the declarations were read from */
  readonly sourceFile: ts.SourceFile;
  /** Specifier the generated module imports the declared types from */
  readonly sourceModule: string;
  readonly runtimes?: readonly RuntimeImports[];
  readonly includeTimestamp?: boolean;
  readonly timestamp?: string;
};

const isNameOnly = (node: ts.Identifier, parent: ts.Node | undefined): boolean =>
  parent !== undefined &&
  ((ts.isPropertyAccessExpression(parent) && parent.name === node) ||
    (ts.isQualifiedName(parent) && parent.right === node) ||
    (ts.isPropertyAssignment(parent) && parent.name === node) ||
    (ts.isPropertySignature(parent) && parent.name === node) ||
    (ts.isBindingElement(parent) && parent.propertyName === node));

/**
 * Identifiers a statement refers to. Parents are tracked during the walk
 * since synthesized nodes carry none.
 */
export const collectReferencedNames = (
  statements: readonly ts.Node[]
): ReadonlySet<string> => {
  const names = new Set<string>();
  const visit = (node: ts.Node, parent: ts.Node | undefined): void => {
    if (ts.isIdentifier(node) && !isNameOnly(node, parent)) {
      names.add(node.text);
    }
    ts.forEachChild(node, (child) => visit(child, node));
  };
  statements.forEach((statement) => visit(statement, undefined));
  return names;
};

/**
 * Names of the exported interfaces and type aliases of a file
 */
export const exportedTypeNames = (
  sourceFile: ts.SourceFile
): readonly string[] =>
  sourceFile.statements.flatMap((statement) =>
    (ts.isInterfaceDeclaration(statement) ||
      ts.isTypeAliasDeclaration(statement)) &&
    isExported(statement)
      ? [statement.name.text]
      : []
  );

const namedImport = (
  names: readonly string[],
  specifier: string,
  typeOnly: boolean
): ts.ImportDeclaration =>
  f.createImportDeclaration(
    undefined,
    f.createImportClause(
      typeOnly,
      undefined,
      f.createNamedImports(
        names.map((name) =>
          f.createImportSpecifier(false, undefined, f.createIdentifier(name))
        )
      )
    ),
    f.createStringLiteral(specifier)
  );

const importDeclarations = (
  options: EmitModuleOptions,
  used: ReadonlySet<string>,
  local: ReadonlySet<string>
): readonly ts.ImportDeclaration[] => {
  const pick = (names: readonly string[]): readonly string[] =>
    names.filter((name) => used.has(name) && !local.has(name));

  const sourceTypes = pick(exportedTypeNames(options.sourceFile));
  const runtimeImports = (options.runtimes ?? []).flatMap((runtime) => {
    const values = pick(runtime.values);
    const types = pick(runtime.types);
    return [
      ...(values.length > 0 ? [namedImport(values, runtime.module, false)] : []),
      ...(types.length > 0 ? [namedImport(types, runtime.module, true)] : []),
    ];
  });

  return [
    ...(sourceTypes.length > 0
      ? [namedImport(sourceTypes, options.sourceModule, true)]
      : []),
    ...runtimeImports,
  ];
};

export const emitModule = (options: EmitModuleOptions): string => {
  const printer = ts.createPrinter({
    newLine: ts.NewLineKind.LineFeed,
    removeComments: true,
  });
  // Units reuse type nodes of the input file, so print against its text
  const print = (node: ts.Node): string =>
    printer.printNode(ts.EmitHint.Unspecified, node, options.sourceFile);

  const statements = options.items.flatMap((item) =>
    item.kind === "statement" ? [item.statement] : []
  );
  const local = new Set(
    options.items.flatMap((item) => (item.kind === "statement" ? [item.name] : []))
  );
  const imports = importDeclarations(
    options,
    collectReferencedNames(statements),
    local
  );

  const header = generateFileHeader(options.sourceFile.fileName, {
    includeTimestamp: options.includeTimestamp,
    timestamp: options.timestamp,
  });

  const body = options.items.map((item) =>
    item.kind === "statement"
      ? print(item.statement)
      : `// error: ${formatDiagnostic(item.diagnostic)}`
  );

  const sections = [
    ...(imports.length > 0 ? [imports.map(print).join("\n")] : []),
    ...body,
  ];

  return `${header}\n${sections.join("\n\n")}\n`;
};
