/**
 * Source locations for reflected nodes
 */

import * as ts from "typescript";
import type { SourceLocation } from "../types/diagnostic.js";

const SYNTHESIZED_LOCATION: SourceLocation = {
  file: "<synthesized>",
  line: 0,
  column: 0,
  length: 0,
};

/**
 * Get location information for a node. Factory-made nodes have no source
 * position and map to a placeholder location.
 */
export const getNodeLocation = (node: ts.Node): SourceLocation => {
  if (node.pos < 0) {
    return SYNTHESIZED_LOCATION;
  }

  const sourceFile = node.getSourceFile();
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(
    node.getStart(sourceFile)
  );
  return {
    file: sourceFile.fileName,
    line: line + 1,
    column: character + 1,
    length: node.getWidth(sourceFile),
  };
};
