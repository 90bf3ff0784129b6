/**
 * Declaration reflection
 *
 * Interfaces and type aliases become TypeDecl values. A union whose members
 * are all `{ kind: "..." }` object types is a closed sum; any other alias body
 * is reflected as a type expression.
 */

import * as ts from "typescript";
import type {
  Attributes,
  Label,
  RecordField,
  TypeDecl,
  TypeExpr,
  VariantCase,
} from "../repr/types.js";
import {
  VARIANT_ARGS_PROPERTY,
  VARIANT_TAG_PROPERTY,
} from "../repr/helpers.js";
import { error, ok, type Result } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import {
  readJSDocAttributes,
  readUnionMemberAttributes,
} from "./attributes.js";
import {
  notSupported,
  UnsupportedShapeError,
  unsupportedShapeDiagnostic,
} from "./errors.js";
import { getNodeLocation } from "./location.js";
import {
  reflectTypeExpr,
  toLabel,
  unwrapParentheses,
  type ReflectContext,
} from "./type-expr.js";

const propertyName = (member: ts.PropertySignature): Label => {
  const name = member.name;
  if (ts.isIdentifier(name) || ts.isStringLiteral(name)) {
    return toLabel(name);
  }
  return notSupported(getNodeLocation(name), "object types");
};

const reflectField = (
  member: ts.TypeElement,
  ctx: ReflectContext
): RecordField => {
  const location = getNodeLocation(member);

  if (ts.isPropertySignature(member)) {
    if (member.questionToken) {
      return notSupported(location, "optional fields");
    }
    if (!member.type) {
      return notSupported(location, "type placeholders");
    }
    return {
      name: propertyName(member),
      attrs: readJSDocAttributes(member),
      type: reflectTypeExpr(member.type, ctx),
    };
  }

  if (ts.isMethodSignature(member)) {
    return notSupported(
      location,
      member.typeParameters
        ? "polymorphic type expressions"
        : "function types"
    );
  }
  if (ts.isIndexSignatureDeclaration(member)) {
    return notSupported(location, "index signatures");
  }
  if (
    ts.isCallSignatureDeclaration(member) ||
    ts.isConstructSignatureDeclaration(member) ||
    ts.isGetAccessorDeclaration(member) ||
    ts.isSetAccessorDeclaration(member)
  ) {
    return notSupported(location, "function types");
  }
  return notSupported(location, "object types");
};

type TagProperty = ts.PropertySignature & {
  readonly type: ts.LiteralTypeNode & { readonly literal: ts.StringLiteral };
};

const isTagProperty = (member: ts.TypeElement): member is TagProperty =>
  ts.isPropertySignature(member) &&
  ts.isIdentifier(member.name) &&
  member.name.text === VARIANT_TAG_PROPERTY &&
  member.questionToken === undefined &&
  member.type !== undefined &&
  ts.isLiteralTypeNode(member.type) &&
  ts.isStringLiteral(member.type.literal);

/**
 * The `kind` property of an object type that denotes a closed-sum case.
 */
const findTagProperty = (node: ts.TypeNode): TagProperty | undefined => {
  const unwrapped = unwrapParentheses(node);
  return ts.isTypeLiteralNode(unwrapped)
    ? unwrapped.members.find(isTagProperty)
    : undefined;
};

const positionalArgs = (
  members: readonly ts.TypeElement[],
  ctx: ReflectContext
): readonly TypeExpr[] | undefined => {
  const [only] = members;
  if (
    members.length !== 1 ||
    only === undefined ||
    !ts.isPropertySignature(only) ||
    !ts.isIdentifier(only.name) ||
    only.name.text !== VARIANT_ARGS_PROPERTY ||
    only.questionToken !== undefined ||
    only.type === undefined
  ) {
    return undefined;
  }
  const args = reflectTypeExpr(only.type, ctx);
  return args.shape.kind === "tuple" ? args.shape.elements : undefined;
};

const reflectVariantCase = (
  node: ts.TypeNode,
  attrs: Attributes,
  ctx: ReflectContext
): VariantCase => {
  const unwrapped = unwrapParentheses(node);
  const tag = findTagProperty(unwrapped);
  if (!tag || !ts.isTypeLiteralNode(unwrapped)) {
    return notSupported(
      getNodeLocation(node),
      "unions mixing variant cases with other members"
    );
  }

  const name = toLabel(tag.type.literal);
  const caseAttrs = [...attrs, ...readJSDocAttributes(tag)];
  const rest = unwrapped.members.filter((m) => m !== tag);

  if (rest.length === 0) {
    return { kind: "tuple", name, attrs: caseAttrs, types: [] };
  }

  const args = positionalArgs(rest, ctx);
  if (args) {
    return { kind: "tuple", name, attrs: caseAttrs, types: args };
  }

  return {
    kind: "record",
    name,
    attrs: caseAttrs,
    fields: rest.map((m) => reflectField(m, ctx)),
  };
};

const reflectTypeParameters = (
  params: readonly ts.TypeParameterDeclaration[] | undefined
): readonly Label[] => {
  const seen = new Set<string>();
  return (params ?? []).map((param) => {
    const location = getNodeLocation(param);
    if (param.constraint || param.default) {
      return notSupported(location, "constrained type parameters");
    }
    if (seen.has(param.name.text)) {
      return notSupported(location, "duplicate type parameters");
    }
    seen.add(param.name.text);
    return toLabel(param.name);
  });
};

const reflectAliasBody = (
  declaration: ts.TypeAliasDeclaration,
  ctx: ReflectContext
): TypeDecl["shape"] => {
  const body = unwrapParentheses(declaration.type);

  if (ts.isTypeLiteralNode(body)) {
    return findTagProperty(body)
      ? { kind: "variant", cases: [reflectVariantCase(body, [], ctx)] }
      : { kind: "record", fields: body.members.map((m) => reflectField(m, ctx)) };
  }

  if (
    ts.isUnionTypeNode(body) &&
    body.types.some((member) => findTagProperty(member) !== undefined)
  ) {
    return {
      kind: "variant",
      cases: body.types.map((member, index) =>
        reflectVariantCase(member, readUnionMemberAttributes(body, index), ctx)
      ),
    };
  }

  return {
    kind: "expr",
    type: reflectTypeExpr(declaration.type, {
      ...ctx,
      including: new Set([declaration]),
    }),
  };
};

/**
 * Reflect one declaration. Throws UnsupportedShapeError for anything the
 * canonical model cannot represent.
 */
export const reflectTypeDeclaration = (
  statement: ts.Statement,
  checker: ts.TypeChecker
): TypeDecl => {
  const location = getNodeLocation(statement);

  if (ts.isInterfaceDeclaration(statement)) {
    if (statement.heritageClauses && statement.heritageClauses.length > 0) {
      return notSupported(location, "interface inheritance");
    }
    const params = reflectTypeParameters(statement.typeParameters);
    const ctx: ReflectContext = {
      checker,
      params: new Set(params.map((p) => p.txt)),
      including: new Set(),
    };
    return {
      name: toLabel(statement.name),
      params,
      shape: {
        kind: "record",
        fields: statement.members.map((m) => reflectField(m, ctx)),
      },
      loc: location,
      attrs: readJSDocAttributes(statement),
    };
  }

  if (ts.isTypeAliasDeclaration(statement)) {
    const params = reflectTypeParameters(statement.typeParameters);
    const ctx: ReflectContext = {
      checker,
      params: new Set(params.map((p) => p.txt)),
      including: new Set(),
    };
    return {
      name: toLabel(statement.name),
      params,
      shape: reflectAliasBody(statement, ctx),
      loc: location,
      attrs: readJSDocAttributes(statement),
    };
  }

  if (ts.isEnumDeclaration(statement)) {
    return notSupported(location, "enum declarations");
  }
  if (ts.isClassDeclaration(statement)) {
    return notSupported(location, "class types");
  }
  return notSupported(location, "non-type declarations");
};

/**
 * Reflect a whole batch. The first unsupported shape anywhere in the batch
 * becomes the single diagnostic of the result.
 */
export const reflectDeclarations = (
  declarations: readonly ts.Statement[],
  checker: ts.TypeChecker
): Result<readonly TypeDecl[], Diagnostic> => {
  try {
    const decls = declarations.map((d) => reflectTypeDeclaration(d, checker));
    const names = new Set<string>();
    for (const decl of decls) {
      if (names.has(decl.name.txt)) {
        return notSupported(decl.loc, "duplicate type declarations");
      }
      names.add(decl.name.txt);
    }
    return ok(decls);
  } catch (e) {
    if (e instanceof UnsupportedShapeError) {
      return error(unsupportedShapeDiagnostic(e));
    }
    throw e;
  }
};

/**
 * Reflect an unnamed type expression with no type parameters in scope.
 */
export const reflectBareTypeExpr = (
  node: ts.TypeNode,
  checker: ts.TypeChecker
): Result<TypeExpr, Diagnostic> => {
  try {
    return ok(
      reflectTypeExpr(node, { checker, params: new Set(), including: new Set() })
    );
  } catch (e) {
    if (e instanceof UnsupportedShapeError) {
      return error(unsupportedShapeDiagnostic(e));
    }
    throw e;
  }
};
