/**
 * Shared constants for the shapegen emitter
 */

/**
 * Generate standard file header for generated modules
 */
export const generateFileHeader = (
  filePath: string,
  options: {
    readonly includeTimestamp?: boolean;
    readonly timestamp?: string;
  } = {}
): string => {
  const lines: string[] = [];

  lines.push(`// Generated from: ${filePath}`);

  if (options.includeTimestamp ?? false) {
    const timestamp = options.timestamp ?? new Date().toISOString();
    lines.push(`// Generated at: ${timestamp}`);
  }

  lines.push("// WARNING: Do not modify this file manually");
  lines.push("");

  return lines.join("\n");
};

/** Name of the value every generated unit takes as input */
export const INPUT_NAME = "x";
