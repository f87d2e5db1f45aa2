/**
 * Expression rewriting across universes
 *
 * Walks a tree bottom-up and rebuilds every node against the destination
 * universe: types through resolveType, members through the member
 * resolvers, binders through the variable table. Sugar nodes are
 * desugared before dispatch, so the rebuilt tree only contains nodes
 * whose members the destination universe can name.
 *
 * Rebuilt nodes go through the unchecked constructors: until every child
 * is rewritten, a node can hold destination members over source-typed
 * children.
 */

import type { Expr, Var } from "../expr/types.js";
import { raw } from "../expr/factory.js";
import {
  isCombination,
  combinationChildren,
  rebuildCombination,
} from "../expr/shape.js";
import { formatType } from "../metadata/type-ops.js";
import type { TypeDescriptor } from "../metadata/types.js";
import { raise } from "../types/errors.js";
import type { Direction, ReplacerState, VariableScope } from "./types.js";
import { resolveType } from "./type-resolution.js";
import {
  resolveProperty,
  resolveField,
  resolveMethod,
  resolveConstructor,
} from "./member-resolution.js";
import { rewriteVariable } from "./variable-table.js";
import { desugar, isDesugarable } from "./desugar.js";

const POINT_FREE_HINT =
  "Write the function with all its arguments named instead of composing it point-free or returning a curried function.";

const lambdaNotSupported = (functionType: TypeDescriptor): never =>
  raise(
    "UnsupportedConstruct",
    "QSH2001",
    `A first-class function value of type '${formatType(functionType)}' cannot be used in a provided declaration body. ` +
      "This is usually a function of type A -> (B -> C) where A -> B -> C was meant; point-free composition, for example with |>, causes this.",
    POINT_FREE_HINT
  );

/**
 * Rewrite one tree. Every call gets its own variable scope: binders
 * manufactured during a backward rewrite are shared by all their
 * occurrences in this tree and by no other tree.
 */
export const rewriteExpr = (
  state: ReplacerState,
  direction: Direction,
  expr: Expr
): Expr => {
  const scope: VariableScope = new Map();

  const rt = (type: TypeDescriptor): TypeDescriptor =>
    resolveType(state, direction, type);
  const rv = (variable: Var): Var =>
    rewriteVariable(state, direction, variable, scope);
  const rewriteOptional = (e: Expr | undefined): Expr | undefined =>
    e ? rewrite(e) : undefined;

  const rewrite = (e: Expr): Expr => {
    if (isDesugarable(e)) {
      return rewrite(desugar(state.reflection, e));
    }
    if (isCombination(e)) {
      return rebuildCombination(e, combinationChildren(e).map(rewrite));
    }

    switch (e.kind) {
      case "call":
        return raw.call(
          rewriteOptional(e.object),
          resolveMethod(state, direction, e.method),
          e.args.map(rewrite)
        );

      case "propertyGet":
        return raw.propertyGet(
          rewriteOptional(e.object),
          resolveProperty(state, direction, e.property),
          e.indexArgs.map(rewrite)
        );

      case "propertySet":
        return raw.propertySet(
          rewriteOptional(e.object),
          resolveProperty(state, direction, e.property),
          rewrite(e.value),
          e.indexArgs.map(rewrite)
        );

      case "fieldGet":
        return raw.fieldGet(
          rewriteOptional(e.object),
          resolveField(state, direction, e.field)
        );

      case "fieldSet":
        return raw.fieldSet(
          rewriteOptional(e.object),
          resolveField(state, direction, e.field),
          rewrite(e.value)
        );

      case "newObject":
        return raw.newObject(
          resolveConstructor(state, direction, e.ctor),
          e.args.map(rewrite)
        );

      case "coerce":
        return raw.coerce(rewrite(e.expression), rt(e.type));

      case "newArray":
        return raw.newArray(rt(e.elementType), e.elements.map(rewrite));

      case "newTuple":
        return raw.newTuple(rt(e.tupleType), e.elements.map(rewrite));

      case "tupleGet":
        return raw.tupleGet(rewrite(e.tuple), e.index);

      case "newDelegate":
        return raw.newDelegate(
          rt(e.delegateType),
          e.parameters.map(rv),
          rewrite(e.body)
        );

      case "let":
        return raw.let(rv(e.variable), rewrite(e.value), rewrite(e.body));

      case "var":
        return raw.var(rv(e.variable));

      case "varSet":
        return raw.varSet(rv(e.variable), rewrite(e.value));

      case "lambda":
        return lambdaNotSupported(e.functionType);
    }
  };

  return rewrite(expr);
};
