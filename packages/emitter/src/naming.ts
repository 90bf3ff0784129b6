/**
 * Naming contract for generated units
 *
 * A derivation `D` applied to a type `T` produces a unit named `D_T`, or
 * just `D` when the type carries the distinguished self name `t`.
 */

import * as ts from "typescript";
import type { Longident } from "@shapegen/frontend";

export const SELF_NAME = "t";

export const deriveOfLabel = (derivation: string, typeName: string): string =>
  typeName === SELF_NAME ? derivation : `${derivation}_${typeName}`;

/** Name of the probe derivation that shadows decoder `derivation` */
export const derivePolyName = (derivation: string): string =>
  `${derivation}_poly`;

/** Handler parameter a generic unit takes for type parameter `param` */
export const deriveParamName = (derivation: string, param: string): string =>
  `${derivation}_${param}`;

export const deriveOfLongident = (
  derivation: string,
  name: Longident
): Longident => ({
  ...name,
  name: deriveOfLabel(derivation, name.name),
});

export const longidentToExpression = (name: Longident): ts.Expression =>
  [...name.qualifier, name.name]
    .slice(1)
    .reduce<ts.Expression>(
      (left, right) => ts.factory.createPropertyAccessExpression(left, right),
      ts.factory.createIdentifier(name.qualifier[0] ?? name.name)
    );

/**
 * Reference to the unit derivation `derivation` generated for `name`,
 * keeping its qualifier: `geometry.Point` → `geometry.toJson_Point`.
 */
export const ederiver = (derivation: string, name: Longident): ts.Expression =>
  longidentToExpression(deriveOfLongident(derivation, name));
