/**
 * Replacer - retargeting session facade
 *
 * One Replacer is one session between an origin and a target universe. The
 * caches and the variable table live as long as the Replacer does; every
 * function below shares them through a single ReplacerState.
 */

import type {
  TypeDescriptor,
  TypeDefinition,
  TypeUniverse,
  PropertyInfo,
  FieldInfo,
  MethodInfo,
  ConstructorInfo,
} from "../metadata/types.js";
import type { Expr, Var } from "../expr/types.js";
import { createMetadataReflection } from "../metadata/reflection.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { formatDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { captureDiagnostic } from "../types/errors.js";
import type { Direction, ReplacerConfig, ReplacerState } from "./types.js";
import { DEFAULT_INTERACTIVE_HOST_NAMING, typeCache, log } from "./types.js";
import { resolveType } from "./type-resolution.js";
import {
  resolveProperty,
  resolveField,
  resolveMethod,
  resolveConstructor,
} from "./member-resolution.js";
import { createVariableTable, rewriteVariable } from "./variable-table.js";
import { rewriteExpr } from "./expression-rewriter.js";

export interface Replacer {
  readonly origin: TypeUniverse;
  readonly target: TypeUniverse;

  resolveType(direction: Direction, type: TypeDescriptor): TypeDescriptor;
  resolveProperty(direction: Direction, property: PropertyInfo): PropertyInfo;
  resolveField(direction: Direction, field: FieldInfo): FieldInfo;
  resolveMethod(direction: Direction, method: MethodInfo): MethodInfo;
  resolveConstructor(
    direction: Direction,
    ctor: ConstructorInfo
  ): ConstructorInfo;
  rewriteVariable(direction: Direction, variable: Var): Var;

  /** Rewrite a tree; throws DiagnosticError on the first failure */
  rewrite(direction: Direction, expr: Expr): Expr;
  /** Rewrite a tree, capturing the first failure as a diagnostic */
  tryRewrite(direction: Direction, expr: Expr): Result<Expr, Diagnostic>;

  typeToTarget(type: TypeDescriptor): TypeDescriptor;
  exprToTarget(expr: Expr): Expr;
  exprToOrigin(expr: Expr): Expr;

  /** Cached resolution of a definition, if one has been recorded */
  cachedType(
    direction: Direction,
    definition: TypeDefinition
  ): TypeDefinition | undefined;
}

export const createReplacerState = (config: ReplacerConfig): ReplacerState => ({
  origin: config.origin,
  target: config.target,
  reflection: config.reflection ?? createMetadataReflection(),
  verbose: config.verbose ?? false,
  naming: { ...DEFAULT_INTERACTIVE_HOST_NAMING, ...config.interactiveHost },
  typeCacheForward: new Map(),
  typeCacheBackward: new Map(),
  variables: createVariableTable(),
});

export const createReplacer = (config: ReplacerConfig): Replacer => {
  const state = createReplacerState(config);

  const rewrite = (direction: Direction, expr: Expr): Expr =>
    rewriteExpr(state, direction, expr);

  return {
    origin: state.origin,
    target: state.target,

    resolveType: (direction, type) => resolveType(state, direction, type),
    resolveProperty: (direction, property) =>
      resolveProperty(state, direction, property),
    resolveField: (direction, field) => resolveField(state, direction, field),
    resolveMethod: (direction, method) =>
      resolveMethod(state, direction, method),
    resolveConstructor: (direction, ctor) =>
      resolveConstructor(state, direction, ctor),
    rewriteVariable: (direction, variable) =>
      rewriteVariable(state, direction, variable),

    rewrite,

    tryRewrite: (direction, expr) => {
      const result = captureDiagnostic(() => rewrite(direction, expr));
      if (!result.ok) {
        log(state, formatDiagnostic(result.error));
      }
      return result;
    },

    typeToTarget: (type) => resolveType(state, "forward", type),
    exprToTarget: (expr) => rewrite("forward", expr),
    exprToOrigin: (expr) => rewrite("backward", expr),

    cachedType: (direction, definition) =>
      typeCache(state, direction).get(definition),
  };
};
