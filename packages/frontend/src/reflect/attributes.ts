/**
 * Attribute extraction from JSDoc tags
 *
 * `@key "x-coord"` on a field becomes `{ name: "key", value: "x-coord" }`.
 */

import * as ts from "typescript";
import type { Attribute, Attributes } from "../repr/types.js";

const unquote = (text: string): string => {
  const trimmed = text.trim();
  const quoted = /^(["'`])(.*)\1$/s.exec(trimmed);
  return quoted?.[2] ?? trimmed;
};

const toAttribute = (name: string, value: string | undefined): Attribute =>
  value === undefined || value.trim() === ""
    ? { name }
    : { name, value: unquote(value) };

/**
 * Attributes of a node TypeScript attaches JSDoc to (declarations, members).
 */
export const readJSDocAttributes = (node: ts.Node): Attributes =>
  ts
    .getJSDocTags(node)
    .map((tag) =>
      toAttribute(tag.tagName.text, ts.getTextOfJSDocComment(tag.comment))
    );

const TAG_PATTERN = /@([A-Za-z_][\w-]*)(?:[ \t]+([^\n@*]+))?/g;

export const parseAttributeComment = (text: string): Attributes =>
  [...text.matchAll(TAG_PATTERN)].map((match) =>
    toAttribute(match[1] ?? "", match[2])
  );

/**
 * Attributes of a union member. TypeScript does not attach JSDoc to union
 * members, so doc comments on the lines before the `|` separator and right
 * after it are both read. A comment on the same line as the previous member
 * trails that member and is skipped.
 */
export const readUnionMemberAttributes = (
  union: ts.UnionTypeNode,
  index: number
): Attributes => {
  const member = union.types[index];
  if (!member || member.pos < 0) {
    return [];
  }

  const text = member.getSourceFile().text;
  const previous = index === 0 ? union.pos : union.types[index - 1]?.end;
  const positions = previous === undefined ? [member.pos] : [previous, member.pos];

  const seen = new Set<number>();
  if (index > 0 && previous !== undefined) {
    for (const range of ts.getTrailingCommentRanges(text, previous) ?? []) {
      seen.add(range.pos);
    }
  }

  const attrs: Attribute[] = [];
  for (const position of positions) {
    for (const range of ts.getLeadingCommentRanges(text, position) ?? []) {
      if (seen.has(range.pos)) continue;
      seen.add(range.pos);
      const comment = text.slice(range.pos, range.end);
      if (comment.startsWith("/**")) {
        attrs.push(...parseAttributeComment(comment));
      }
    }
  }
  return attrs;
};
