/**
 * Reference evaluator
 *
 * Interprets an expression tree through the runtime hooks attached to the
 * members it uses. Used to check that a rewritten tree computes what the
 * original computed.
 */

import type { Expr, BinaryOperator } from "../expr/types.js";
import type { ReflectionService } from "../metadata/reflection.js";
import type { MemberInfo } from "../metadata/types.js";
import { formatMember } from "../metadata/type-ops.js";
import { raise } from "../types/errors.js";

export type EvaluationOptions = {
  readonly reflection: ReflectionService;
};

/**
 * Function values (lambdas, delegates) evaluate to closures.
 */
export type Closure = (...args: readonly unknown[]) => unknown;

type Cell = { value: unknown };
type Environment = ReadonlyMap<number, Cell>;

const fail = (message: string): never =>
  raise("EvaluationError", "QSH5001", message);

const isClosure = (value: unknown): value is Closure =>
  typeof value === "function";

const noHook = (member: MemberInfo): never =>
  fail(`'${formatMember(member)}' has no runtime implementation`);

const bind = (env: Environment, id: number, value: unknown): Environment =>
  new Map(env).set(id, { value });

// ═══════════════════════════════════════════════════════════════════════════
// OPERATORS
// ═══════════════════════════════════════════════════════════════════════════

const numeric = (operator: BinaryOperator, value: unknown): number =>
  typeof value === "number"
    ? value
    : fail(`operator '${operator}' expects numbers, got ${typeof value}`);

const ordered = (
  operator: BinaryOperator,
  left: unknown,
  right: unknown
): number => {
  if (typeof left === "string" && typeof right === "string") {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  return numeric(operator, left) - numeric(operator, right);
};

const applyOperator = (
  operator: BinaryOperator,
  left: unknown,
  right: unknown
): unknown => {
  switch (operator) {
    case "equals":
      return left === right;
    case "notEquals":
      return left !== right;
    case "lessThan":
      return ordered(operator, left, right) < 0;
    case "lessThanOrEqual":
      return ordered(operator, left, right) <= 0;
    case "greaterThan":
      return ordered(operator, left, right) > 0;
    case "greaterThanOrEqual":
      return ordered(operator, left, right) >= 0;
    case "add":
      if (typeof left === "string" && typeof right === "string") {
        return left + right;
      }
      return numeric(operator, left) + numeric(operator, right);
    case "subtract":
      return numeric(operator, left) - numeric(operator, right);
    case "multiply":
      return numeric(operator, left) * numeric(operator, right);
    case "divide": {
      const divisor = numeric(operator, right);
      if (divisor === 0) fail("division by zero");
      return numeric(operator, left) / divisor;
    }
  }
};

// ═══════════════════════════════════════════════════════════════════════════
// DISPATCH
// ═══════════════════════════════════════════════════════════════════════════

export const evaluate = (expr: Expr, options: EvaluationOptions): unknown => {
  const { reflection } = options;

  const run = (e: Expr, env: Environment): unknown => {
    const all = (items: readonly Expr[]): readonly unknown[] =>
      items.map((item) => run(item, env));
    const target = (object: Expr | undefined): unknown =>
      object ? run(object, env) : undefined;

    switch (e.kind) {
      case "value":
        return e.value;

      case "call": {
        const invoke = e.method.invoke ?? noHook(e.method);
        return invoke(target(e.object), all(e.args));
      }

      case "propertyGet": {
        const get = e.property.getValue ?? noHook(e.property);
        return get(target(e.object), all(e.indexArgs));
      }

      case "propertySet": {
        const set = e.property.setValue ?? noHook(e.property);
        set(target(e.object), run(e.value, env), all(e.indexArgs));
        return undefined;
      }

      case "fieldGet": {
        const get = e.field.getValue ?? noHook(e.field);
        return get(target(e.object), []);
      }

      case "fieldSet": {
        const set = e.field.setValue ?? noHook(e.field);
        set(target(e.object), run(e.value, env), []);
        return undefined;
      }

      case "newObject": {
        const construct = e.ctor.invoke ?? noHook(e.ctor);
        return construct(all(e.args));
      }

      case "coerce":
        return run(e.expression, env);

      case "newArray":
      case "newTuple":
        return all(e.elements);

      case "tupleGet": {
        const tuple = run(e.tuple, env);
        if (!Array.isArray(tuple) || e.index >= tuple.length) {
          return fail(`tuple has no item ${e.index}`);
        }
        const item: unknown = tuple[e.index];
        return item;
      }

      case "newDelegate":
        return (...args: readonly unknown[]): unknown =>
          run(
            e.body,
            e.parameters.reduce<Environment>(
              (scope, parameter, i) => bind(scope, parameter.id, args[i]),
              env
            )
          );

      case "lambda":
        return (arg: unknown): unknown =>
          run(e.body, bind(env, e.parameter.id, arg));

      case "application": {
        const func = run(e.func, env);
        if (!isClosure(func)) return fail("applied value is not a function");
        return func(run(e.arg, env));
      }

      case "let":
        return run(e.body, bind(env, e.variable.id, run(e.value, env)));

      case "var": {
        const cell = env.get(e.variable.id);
        if (!cell) return fail(`unbound variable '${e.variable.name}'`);
        return cell.value;
      }

      case "varSet": {
        const cell = env.get(e.variable.id);
        if (!cell) return fail(`unbound variable '${e.variable.name}'`);
        cell.value = run(e.value, env);
        return undefined;
      }

      case "newUnionCase": {
        const ctor = reflection.getUnionConstructor(e.unionCase);
        const invoke = ctor.invoke ?? noHook(ctor);
        return invoke(undefined, all(e.args));
      }

      case "newRecord": {
        const ctor = reflection.getRecordConstructor(e.recordType);
        const construct = ctor.invoke ?? noHook(ctor);
        return construct(all(e.args));
      }

      case "unionCaseTest": {
        const value = run(e.expression, env);
        const tagMember = reflection.getUnionTagMember(
          e.unionCase.declaringType
        );
        const readTag = (): unknown => {
          switch (tagMember.memberKind) {
            case "property":
            case "field": {
              const get = tagMember.getValue ?? noHook(tagMember);
              return get(value, []);
            }
            case "method": {
              const invoke = tagMember.invoke ?? noHook(tagMember);
              return tagMember.isStatic
                ? invoke(undefined, [value])
                : invoke(value, []);
            }
          }
        };
        return readTag() === e.unionCase.tag;
      }

      case "sequential":
        run(e.first, env);
        return run(e.second, env);

      case "ifThenElse": {
        const condition = run(e.condition, env);
        if (typeof condition !== "boolean") {
          return fail("condition did not evaluate to a boolean");
        }
        return condition ? run(e.whenTrue, env) : run(e.whenFalse, env);
      }

      case "whileLoop":
        for (;;) {
          const condition = run(e.condition, env);
          if (typeof condition !== "boolean") {
            return fail("loop condition did not evaluate to a boolean");
          }
          if (!condition) return undefined;
          run(e.body, env);
        }

      case "operator":
        return applyOperator(e.operator, run(e.left, env), run(e.right, env));
    }
  };

  return run(expr, new Map());
};
