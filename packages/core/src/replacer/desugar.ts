/**
 * Desugaring of constructs that do not cross universes
 *
 * Function application and union/record construction and tests are
 * expressed through members the host resolves symbolically (a function
 * value's Invoke, precomputed case constructors, the tag accessor). Before
 * crossing, each is rewritten into the primitive call/construct/compare
 * nodes that the member resolver can carry over.
 */

import type {
  Expr,
  ApplicationExpr,
  NewUnionCaseExpr,
  NewRecordExpr,
  UnionCaseTestExpr,
} from "../expr/types.js";
import { raw, makeOperator, makeValue } from "../expr/factory.js";
import { exprType } from "../expr/expr-type.js";
import { formatType } from "../metadata/type-ops.js";
import type { ReflectionService } from "../metadata/reflection.js";
import { internalError, raise } from "../types/errors.js";

export type DesugarableExpr =
  | ApplicationExpr
  | NewUnionCaseExpr
  | NewRecordExpr
  | UnionCaseTestExpr;

export const isDesugarable = (expr: Expr): expr is DesugarableExpr => {
  switch (expr.kind) {
    case "application":
    case "newUnionCase":
    case "newRecord":
    case "unionCaseTest":
      return true;
    default:
      return false;
  }
};

/**
 * `f e` becomes `f.Invoke(e)`.
 */
const desugarApplication = (
  reflection: ReflectionService,
  expr: ApplicationExpr
): Expr => {
  const functionType = exprType(expr.func);
  const invoke =
    reflection.getMethodByName(functionType, "Invoke") ??
    raise(
      "MemberNotFound",
      "QSH1103",
      `Method 'Invoke' of type '${formatType(functionType)}' not found`
    );
  return raw.call(expr.func, invoke, [expr.arg]);
};

/**
 * `e is Case` becomes `tag(e) == Case.tag`, reading the tag through
 * whatever accessor the union exposes.
 */
const desugarUnionCaseTest = (
  reflection: ReflectionService,
  expr: UnionCaseTestExpr
): Expr => {
  const tagMember = reflection.getUnionTagMember(expr.unionCase.declaringType);

  const readTag = (): { readonly tagExpr: Expr; readonly tagValue: Expr } => {
    switch (tagMember.memberKind) {
      case "property":
        return {
          tagExpr: raw.propertyGet(expr.expression, tagMember),
          tagValue: makeValue(expr.unionCase.tag, tagMember.type),
        };
      case "method":
        return {
          tagExpr: tagMember.isStatic
            ? raw.call(undefined, tagMember, [expr.expression])
            : raw.call(expr.expression, tagMember, []),
          tagValue: makeValue(expr.unionCase.tag, tagMember.returnType),
        };
      case "field":
        return internalError(
          `unreachable: unexpected tag member '${tagMember.name}' for '${formatType(expr.unionCase.declaringType)}'`
        );
    }
  };

  const { tagExpr, tagValue } = readTag();
  return makeOperator("equals", tagExpr, tagValue);
};

export const desugar = (
  reflection: ReflectionService,
  expr: DesugarableExpr
): Expr => {
  switch (expr.kind) {
    case "application":
      return desugarApplication(reflection, expr);
    case "newUnionCase":
      return raw.call(
        undefined,
        reflection.getUnionConstructor(expr.unionCase),
        expr.args
      );
    case "newRecord":
      return raw.newObject(
        reflection.getRecordConstructor(expr.recordType),
        expr.args
      );
    case "unionCaseTest":
      return desugarUnionCaseTest(reflection, expr);
  }
};
