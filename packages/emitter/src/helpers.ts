/**
 * AST helpers shared by derivations
 *
 * Generated code binds tuple positions to `x_0`, `x_1`, ... and record
 * fields to `x_<field>`, and builds the runtime value of sum cases.
 */

import * as ts from "typescript";
import {
  VARIANT_ARGS_PROPERTY,
  VARIANT_TAG_PROPERTY,
  type RecordField,
} from "@shapegen/frontend";

const f = ts.factory;

export const id = (name: string): ts.Identifier => f.createIdentifier(name);

export const str = (text: string): ts.StringLiteral =>
  f.createStringLiteral(text);

export const isIdentifierName = (text: string): boolean =>
  ts.isIdentifierText(text, ts.ScriptTarget.ES2022);

export const propertyName = (text: string): ts.PropertyName =>
  isIdentifierName(text) ? id(text) : str(text);

const bindingName = (prefix: string, suffix: string): string =>
  `${prefix}_${suffix.replace(/[^\w$]/g, "_")}`;

export const genTuple = (
  prefix: string,
  n: number
): readonly ts.Identifier[] =>
  Array.from({ length: n }, (_, i) => id(bindingName(prefix, String(i))));

/**
 * One name per field. Fields whose names clean to the same identifier
 * (`"a-b"` and `a_b`) get their position appended.
 */
export const genRecord = (
  prefix: string,
  fields: readonly RecordField[]
): readonly ts.Identifier[] => {
  const used = new Set<string>();
  return fields.map((field, i) => {
    let name = bindingName(prefix, field.name.txt);
    while (used.has(name)) {
      name = `${name}_${i}`;
    }
    used.add(name);
    return id(name);
  });
};

/**
 * `[x_0, x_1]`, after `skip` elided leading positions.
 */
export const genPatTuple = (
  prefix: string,
  n: number,
  skip = 0
): readonly [ts.ArrayBindingPattern, readonly ts.Identifier[]] => {
  const names = genTuple(prefix, n);
  const holes = Array.from({ length: skip }, () => f.createOmittedExpression());
  const elements = names.map((name) =>
    f.createBindingElement(undefined, undefined, name)
  );
  return [f.createArrayBindingPattern([...holes, ...elements]), names];
};

/**
 * `{ x: x_x, y: x_y }`
 */
export const genPatRecord = (
  prefix: string,
  fields: readonly RecordField[]
): readonly [ts.ObjectBindingPattern, readonly ts.Identifier[]] => {
  const names = genRecord(prefix, fields);
  const elements = fields.map((field, i) =>
    f.createBindingElement(
      undefined,
      propertyName(field.name.txt),
      names[i] ?? id(`${prefix}_${i}`)
    )
  );
  return [f.createObjectBindingPattern(elements), names];
};

export const arrow = (
  params: readonly (string | ts.BindingName)[],
  body: ts.ConciseBody,
  returnType?: ts.TypeNode
): ts.ArrowFunction =>
  f.createArrowFunction(
    undefined,
    undefined,
    params.map((p) =>
      f.createParameterDeclaration(
        undefined,
        undefined,
        typeof p === "string" ? id(p) : p
      )
    ),
    returnType,
    f.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
    body
  );

export const call = (
  callee: ts.Expression,
  args: readonly ts.Expression[]
): ts.CallExpression => f.createCallExpression(callee, undefined, args);

/**
 * `((pattern) => body)(input)`
 */
export const bindInput = (
  pattern: ts.BindingName,
  input: ts.Expression,
  body: ts.Expression
): ts.Expression =>
  call(f.createParenthesizedExpression(arrow([pattern], body)), [input]);

export const strictEquals = (
  left: ts.Expression,
  right: ts.Expression
): ts.Expression => f.createStrictEquality(left, right);

export const and = (left: ts.Expression, right: ts.Expression): ts.Expression =>
  f.createLogicalAnd(left, right);

export const or = (left: ts.Expression, right: ts.Expression): ts.Expression =>
  f.createLogicalOr(left, right);

export const coalesce = (
  left: ts.Expression,
  right: ts.Expression
): ts.Expression =>
  f.createBinaryExpression(left, ts.SyntaxKind.QuestionQuestionToken, right);

export const conditional = (
  test: ts.Expression,
  whenTrue: ts.Expression,
  whenFalse: ts.Expression
): ts.Expression =>
  f.createConditionalExpression(
    test,
    f.createToken(ts.SyntaxKind.QuestionToken),
    whenTrue,
    f.createToken(ts.SyntaxKind.ColonToken),
    whenFalse
  );

export type Alternative = {
  readonly test: ts.Expression;
  readonly body: ts.Expression;
};

/**
 * Guarded alternatives as nested conditionals. Without a fallback the last
 * alternative is taken unconditionally.
 */
export const cascade = (
  alternatives: readonly Alternative[],
  fallback?: ts.Expression
): ts.Expression => {
  const init = fallback === undefined ? alternatives.slice(0, -1) : alternatives;
  const last =
    fallback ?? alternatives[alternatives.length - 1]?.body ?? f.createVoidZero();
  return init.reduceRight<ts.Expression>(
    (next, alt) => conditional(alt.test, alt.body, next),
    last
  );
};

export type Arm = {
  readonly test: ts.Expression;
  readonly body: ts.Expression;
};

/**
 * `((): T => { switch (tag) { case test: return body; default: return fallback; } })()`
 */
export const switchExpr = (
  resultType: ts.TypeNode,
  tag: ts.Expression,
  arms: readonly Arm[],
  fallback: ts.Expression
): ts.Expression =>
  call(
    f.createParenthesizedExpression(
      arrow(
        [],
        f.createBlock(
          [
            f.createSwitchStatement(
              tag,
              f.createCaseBlock([
                ...arms.map((arm) =>
                  f.createCaseClause(arm.test, [f.createReturnStatement(arm.body)])
                ),
                f.createDefaultClause([f.createReturnStatement(fallback)]),
              ])
            ),
          ],
          true
        ),
        resultType
      )
    ),
    []
  );

export const arrayLiteral = (
  elements: readonly ts.Expression[]
): ts.ArrayLiteralExpression => f.createArrayLiteralExpression(elements, false);

export const objectLiteral = (
  entries: readonly (readonly [string, ts.Expression])[]
): ts.ObjectLiteralExpression =>
  f.createObjectLiteralExpression(
    entries.map(([key, value]) =>
      f.createPropertyAssignment(propertyName(key), value)
    ),
    entries.length > 1
  );

/** Builds the runtime value of one sum case from its payload */
export type Make = (payload?: ts.Expression) => ts.Expression;

const objectMembers = (
  payload: ts.Expression
): readonly ts.ObjectLiteralElementLike[] =>
  ts.isObjectLiteralExpression(payload)
    ? payload.properties
    : [f.createSpreadAssignment(payload)];

const arrayMembers = (payload: ts.Expression): readonly ts.Expression[] =>
  ts.isArrayLiteralExpression(payload)
    ? payload.elements
    : [f.createSpreadElement(payload)];

/**
 * Closed-sum case with positional payload: `{ kind: tag }` or
 * `{ kind: tag, args: payload }`.
 */
export const makeVariantTuple =
  (tag: string): Make =>
  (payload) =>
    f.createObjectLiteralExpression(
      [
        f.createPropertyAssignment(VARIANT_TAG_PROPERTY, str(tag)),
        ...(payload === undefined
          ? []
          : [f.createPropertyAssignment(VARIANT_ARGS_PROPERTY, payload)]),
      ],
      false
    );

/**
 * Closed-sum case with named fields: `{ kind: tag, ...fields }`.
 */
export const makeVariantRecord =
  (tag: string): Make =>
  (payload) =>
    f.createObjectLiteralExpression(
      [
        f.createPropertyAssignment(VARIANT_TAG_PROPERTY, str(tag)),
        ...(payload === undefined ? [] : objectMembers(payload)),
      ],
      false
    );

/**
 * Open-sum tag: `"tag"` or `["tag", ...payload]`.
 */
export const makePolyvariant =
  (tag: string): Make =>
  (payload) =>
    payload === undefined
      ? str(tag)
      : arrayLiteral([str(tag), ...arrayMembers(payload)]);

/**
 * Test that an open-sum value carries `tag`.
 */
export const polyvariantTagTest = (
  x: ts.Expression,
  tag: string,
  hasPayload: boolean
): ts.Expression =>
  hasPayload
    ? and(
        call(f.createPropertyAccessExpression(id("Array"), "isArray"), [x]),
        strictEquals(f.createElementAccessExpression(x, 0), str(tag))
      )
    : strictEquals(x, str(tag));

export const functionType = (
  input: ts.TypeNode,
  output: ts.TypeNode,
  inputName = "x"
): ts.FunctionTypeNode =>
  f.createFunctionTypeNode(
    undefined,
    [f.createParameterDeclaration(undefined, undefined, inputName, undefined, input)],
    output
  );

export const typeRef = (
  name: string | ts.EntityName,
  args?: readonly ts.TypeNode[]
): ts.TypeReferenceNode =>
  f.createTypeReferenceNode(name, args && args.length > 0 ? args : undefined);
