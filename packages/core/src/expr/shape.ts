/**
 * Structural combinations
 *
 * Node kinds whose only universe-sensitive content is their children.
 * A pass that has nothing specific to do for them takes the children,
 * transforms them, and rebuilds the same shape; the node's own metadata
 * (a value's type, an operator name) is carried over as it was.
 */

import type { Expr, CombinationExpr } from "./types.js";
import { internalError } from "../types/errors.js";

export const isCombination = (expr: Expr): expr is CombinationExpr => {
  switch (expr.kind) {
    case "value":
    case "sequential":
    case "ifThenElse":
    case "whileLoop":
    case "operator":
      return true;
    default:
      return false;
  }
};

export const combinationChildren = (
  expr: CombinationExpr
): readonly Expr[] => {
  switch (expr.kind) {
    case "value":
      return [];
    case "sequential":
      return [expr.first, expr.second];
    case "ifThenElse":
      return [expr.condition, expr.whenTrue, expr.whenFalse];
    case "whileLoop":
      return [expr.condition, expr.body];
    case "operator":
      return [expr.left, expr.right];
  }
};

const child = (
  children: readonly Expr[],
  index: number,
  kind: string
): Expr =>
  children[index] ??
  internalError(`rebuilding '${kind}' needs child ${index}`);

/**
 * Same shape as `expr`, new children (in combinationChildren order).
 */
export const rebuildCombination = (
  expr: CombinationExpr,
  children: readonly Expr[]
): CombinationExpr => {
  switch (expr.kind) {
    case "value":
      return expr;
    case "sequential":
      return {
        ...expr,
        first: child(children, 0, expr.kind),
        second: child(children, 1, expr.kind),
      };
    case "ifThenElse":
      return {
        ...expr,
        condition: child(children, 0, expr.kind),
        whenTrue: child(children, 1, expr.kind),
        whenFalse: child(children, 2, expr.kind),
      };
    case "whileLoop":
      return {
        ...expr,
        condition: child(children, 0, expr.kind),
        body: child(children, 1, expr.kind),
      };
    case "operator":
      return {
        ...expr,
        left: child(children, 0, expr.kind),
        right: child(children, 1, expr.kind),
      };
  }
};

const mapOptional = (
  expr: Expr | undefined,
  f: (child: Expr) => Expr
): Expr | undefined => (expr ? f(expr) : undefined);

/**
 * Same node with `f` applied to each direct child. Members, types and
 * binders are kept as they are.
 */
export const mapChildren = (expr: Expr, f: (child: Expr) => Expr): Expr => {
  if (isCombination(expr)) {
    return rebuildCombination(expr, combinationChildren(expr).map(f));
  }
  switch (expr.kind) {
    case "call":
      return { ...expr, object: mapOptional(expr.object, f), args: expr.args.map(f) };
    case "propertyGet":
      return {
        ...expr,
        object: mapOptional(expr.object, f),
        indexArgs: expr.indexArgs.map(f),
      };
    case "propertySet":
      return {
        ...expr,
        object: mapOptional(expr.object, f),
        indexArgs: expr.indexArgs.map(f),
        value: f(expr.value),
      };
    case "fieldGet":
      return { ...expr, object: mapOptional(expr.object, f) };
    case "fieldSet":
      return { ...expr, object: mapOptional(expr.object, f), value: f(expr.value) };
    case "newObject":
    case "newUnionCase":
    case "newRecord":
      return { ...expr, args: expr.args.map(f) };
    case "coerce":
    case "unionCaseTest":
      return { ...expr, expression: f(expr.expression) };
    case "newArray":
    case "newTuple":
      return { ...expr, elements: expr.elements.map(f) };
    case "tupleGet":
      return { ...expr, tuple: f(expr.tuple) };
    case "newDelegate":
    case "lambda":
      return { ...expr, body: f(expr.body) };
    case "let":
      return { ...expr, value: f(expr.value), body: f(expr.body) };
    case "varSet":
      return { ...expr, value: f(expr.value) };
    case "application":
      return { ...expr, func: f(expr.func), arg: f(expr.arg) };
    case "var":
      return expr;
  }
};
