/**
 * Type expression reflection
 *
 * Normalizes a TypeScript type node into the canonical TypeExpr shapes:
 * opaque references, type variables, tuples and open sums. Anything else
 * is rejected with an UnsupportedShapeError.
 */

import * as ts from "typescript";
import type {
  Label,
  Longident,
  PolyvariantCase,
  PolyvariantTag,
  TypeExpr,
} from "../repr/types.js";
import { readUnionMemberAttributes } from "./attributes.js";
import { notSupported } from "./errors.js";
import { getNodeLocation } from "./location.js";

export type ReflectContext = {
  readonly checker: ts.TypeChecker;
  /** Type parameters of the enclosing declaration */
  readonly params: ReadonlySet<string>;
  /** Open-sum declarations currently being expanded, for cycle detection */
  readonly including: ReadonlySet<ts.Declaration>;
};

const KEYWORD_NAMES: ReadonlyMap<ts.SyntaxKind, string> = new Map([
  [ts.SyntaxKind.NumberKeyword, "number"],
  [ts.SyntaxKind.StringKeyword, "string"],
  [ts.SyntaxKind.BooleanKeyword, "boolean"],
  [ts.SyntaxKind.BigIntKeyword, "bigint"],
  [ts.SyntaxKind.UndefinedKeyword, "undefined"],
]);

const PLACEHOLDER_KEYWORDS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.AnyKeyword,
  ts.SyntaxKind.UnknownKeyword,
  ts.SyntaxKind.NeverKeyword,
  ts.SyntaxKind.VoidKeyword,
]);

export const toLabel = (node: ts.Identifier | ts.StringLiteral): Label => ({
  txt: node.text,
  loc: getNodeLocation(node),
});

export const entityNameToLongident = (
  name: ts.EntityName,
  loc = getNodeLocation(name)
): Longident => {
  if (ts.isIdentifier(name)) {
    return { qualifier: [], name: name.text, loc };
  }
  const left = entityNameToLongident(name.left, loc);
  return {
    qualifier: [...left.qualifier, left.name],
    name: name.right.text,
    loc,
  };
};

export const unwrapParentheses = (node: ts.TypeNode): ts.TypeNode =>
  ts.isParenthesizedTypeNode(node) ? unwrapParentheses(node.type) : node;

const isStringLiteralType = (
  node: ts.TypeNode
): node is ts.LiteralTypeNode & { readonly literal: ts.StringLiteral } =>
  ts.isLiteralTypeNode(node) && ts.isStringLiteral(node.literal);

/**
 * Element types of a tuple node. Named members are unwrapped; optional and
 * rest elements are rejected.
 */
const tupleElementNodes = (tuple: ts.TupleTypeNode): readonly ts.TypeNode[] =>
  tuple.elements.map((element) => {
    if (ts.isNamedTupleMember(element)) {
      if (element.questionToken) {
        return notSupported(getNodeLocation(element), "optional tuple elements");
      }
      if (element.dotDotDotToken) {
        return notSupported(getNodeLocation(element), "rest elements");
      }
      return element.type;
    }
    if (ts.isOptionalTypeNode(element)) {
      return notSupported(getNodeLocation(element), "optional tuple elements");
    }
    if (ts.isRestTypeNode(element)) {
      return notSupported(getNodeLocation(element), "rest elements");
    }
    return element;
  });

const reflectTypeReference = (
  node: ts.TypeReferenceNode,
  ctx: ReflectContext
): TypeExpr => {
  const typeName = node.typeName;
  if (ts.isIdentifier(typeName) && ctx.params.has(typeName.text)) {
    if (node.typeArguments && node.typeArguments.length > 0) {
      return notSupported(
        getNodeLocation(node),
        "type variables applied to arguments"
      );
    }
    return { node, shape: { kind: "var", name: toLabel(typeName) } };
  }

  return {
    node,
    shape: {
      kind: "opaque",
      name: entityNameToLongident(typeName),
      args: (node.typeArguments ?? []).map((arg) => reflectTypeExpr(arg, ctx)),
    },
  };
};

const declarationOfReference = (
  ref: ts.TypeReferenceNode,
  checker: ts.TypeChecker
): ts.Declaration | undefined => {
  const nameNode = ts.isQualifiedName(ref.typeName)
    ? ref.typeName.right
    : ref.typeName;
  const found = checker.getSymbolAtLocation(nameNode);
  const symbol =
    found && found.flags & ts.SymbolFlags.Alias
      ? checker.getAliasedSymbol(found)
      : found;
  const declarations = symbol?.declarations ?? [];
  return declarations.find(ts.isTypeAliasDeclaration) ?? declarations[0];
};

const isOpenSumSyntax = (node: ts.TypeNode): boolean =>
  isStringLiteralType(node) ||
  (ts.isUnionTypeNode(node) &&
    !node.types.some((member) => ts.isTypeLiteralNode(unwrapParentheses(member))));

/**
 * Tag set of an included open sum, with its own inclusions flattened in
 * declared order.
 */
const resolveInclusion = (
  ref: ts.TypeReferenceNode,
  ctx: ReflectContext
): readonly PolyvariantTag[] => {
  const location = getNodeLocation(ref);
  const declaration = declarationOfReference(ref, ctx.checker);
  if (!declaration) {
    return notSupported(location, "inclusions of unresolved types");
  }
  if (!ts.isTypeAliasDeclaration(declaration)) {
    return notSupported(location, "inclusions of types other than open sums");
  }
  if (!isOpenSumSyntax(unwrapParentheses(declaration.type))) {
    return notSupported(location, "inclusions of types other than open sums");
  }
  if (ctx.including.has(declaration)) {
    return notSupported(location, "cyclic open sum inclusions");
  }

  const body = reflectTypeExpr(declaration.type, {
    checker: ctx.checker,
    params: new Set(
      (declaration.typeParameters ?? []).map((p) => p.name.text)
    ),
    including: new Set([...ctx.including, declaration]),
  });
  if (body.shape.kind !== "polyvariant") {
    return notSupported(location, "inclusions of types other than open sums");
  }

  return body.shape.cases.flatMap((c): readonly PolyvariantTag[] =>
    c.kind === "construct"
      ? [{ name: c.name.txt, hasPayload: c.types.length > 0 }]
      : c.tags
  );
};

const reflectUnionMember = (
  union: ts.UnionTypeNode,
  index: number,
  member: ts.TypeNode,
  ctx: ReflectContext
): PolyvariantCase => {
  const node = unwrapParentheses(member);
  const attrs = readUnionMemberAttributes(union, index);

  if (isStringLiteralType(node)) {
    return {
      kind: "construct",
      name: toLabel(node.literal),
      attrs,
      types: [],
    };
  }

  if (ts.isTupleTypeNode(node)) {
    const [tag, ...payload] = tupleElementNodes(node);
    const tagNode = tag === undefined ? undefined : unwrapParentheses(tag);
    if (tagNode === undefined || !isStringLiteralType(tagNode)) {
      return notSupported(getNodeLocation(node), "open unions");
    }
    return {
      kind: "construct",
      name: toLabel(tagNode.literal),
      attrs,
      types: payload.map((p) => reflectTypeExpr(p, ctx)),
    };
  }

  if (ts.isTypeReferenceNode(node)) {
    if (ts.isIdentifier(node.typeName) && ctx.params.has(node.typeName.text)) {
      return notSupported(
        getNodeLocation(node),
        "inclusions of type variables"
      );
    }
    return {
      kind: "inherit",
      name: entityNameToLongident(node.typeName),
      args: (node.typeArguments ?? []).map((arg) => reflectTypeExpr(arg, ctx)),
      tags: resolveInclusion(node, ctx),
    };
  }

  if (ts.isTypeLiteralNode(node)) {
    return notSupported(getNodeLocation(node), "object types");
  }

  return notSupported(getNodeLocation(node), "open unions");
};

export const reflectUnion = (
  union: ts.UnionTypeNode,
  ctx: ReflectContext
): TypeExpr => ({
  node: union,
  shape: {
    kind: "polyvariant",
    cases: union.types.map((member, index) =>
      reflectUnionMember(union, index, member, ctx)
    ),
  },
});

const reflectTypeOperator = (
  node: ts.TypeOperatorNode,
  ctx: ReflectContext
): TypeExpr => {
  const operand = unwrapParentheses(node.type);
  if (
    node.operator === ts.SyntaxKind.ReadonlyKeyword &&
    (ts.isArrayTypeNode(operand) || ts.isTupleTypeNode(operand))
  ) {
    return { ...reflectTypeExpr(operand, ctx), node };
  }
  return notSupported(getNodeLocation(node), "type operators");
};

/**
 * Reflect one type expression in the scope of `ctx`.
 */
export const reflectTypeExpr = (
  node: ts.TypeNode,
  ctx: ReflectContext
): TypeExpr => {
  const location = getNodeLocation(node);

  const keyword = KEYWORD_NAMES.get(node.kind);
  if (keyword !== undefined) {
    return {
      node,
      shape: {
        kind: "opaque",
        name: { qualifier: [], name: keyword, loc: location },
        args: [],
      },
    };
  }
  if (PLACEHOLDER_KEYWORDS.has(node.kind)) {
    return notSupported(location, "type placeholders");
  }

  if (ts.isParenthesizedTypeNode(node)) {
    return reflectTypeExpr(node.type, ctx);
  }

  if (ts.isLiteralTypeNode(node)) {
    if (node.literal.kind === ts.SyntaxKind.NullKeyword) {
      return {
        node,
        shape: {
          kind: "opaque",
          name: { qualifier: [], name: "null", loc: location },
          args: [],
        },
      };
    }
    if (ts.isStringLiteral(node.literal)) {
      return {
        node,
        shape: {
          kind: "polyvariant",
          cases: [
            {
              kind: "construct",
              name: toLabel(node.literal),
              attrs: [],
              types: [],
            },
          ],
        },
      };
    }
    return notSupported(location, "non-string literal types");
  }

  if (ts.isTypeReferenceNode(node)) {
    return reflectTypeReference(node, ctx);
  }

  if (ts.isArrayTypeNode(node)) {
    return {
      node,
      shape: {
        kind: "opaque",
        name: { qualifier: [], name: "Array", loc: location },
        args: [reflectTypeExpr(node.elementType, ctx)],
      },
    };
  }

  if (ts.isTupleTypeNode(node)) {
    return {
      node,
      shape: {
        kind: "tuple",
        elements: tupleElementNodes(node).map((e) => reflectTypeExpr(e, ctx)),
      },
    };
  }

  if (ts.isUnionTypeNode(node)) {
    return reflectUnion(node, ctx);
  }

  if (ts.isTypeOperatorNode(node)) {
    return reflectTypeOperator(node, ctx);
  }

  if (ts.isFunctionTypeNode(node) || ts.isConstructorTypeNode(node)) {
    return notSupported(location, "function types");
  }
  if (ts.isInferTypeNode(node)) {
    return notSupported(location, "type placeholders");
  }
  if (
    ts.isTypeLiteralNode(node) ||
    node.kind === ts.SyntaxKind.ObjectKeyword
  ) {
    return notSupported(location, "object types");
  }
  if (ts.isMappedTypeNode(node)) {
    return notSupported(location, "mapped types");
  }
  if (ts.isTypeQueryNode(node)) {
    return notSupported(location, "type queries");
  }
  if (ts.isThisTypeNode(node)) {
    return notSupported(location, "this types");
  }
  if (ts.isImportTypeNode(node)) {
    return notSupported(location, "import types");
  }
  if (ts.isConditionalTypeNode(node)) {
    return notSupported(location, "conditional types");
  }
  if (ts.isIndexedAccessTypeNode(node)) {
    return notSupported(location, "indexed access types");
  }
  if (ts.isTemplateLiteralTypeNode(node)) {
    return notSupported(location, "template literal types");
  }
  if (ts.isIntersectionTypeNode(node)) {
    return notSupported(location, "intersection types");
  }

  return notSupported(location, `${ts.SyntaxKind[node.kind]} types`);
};
