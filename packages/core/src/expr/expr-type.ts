/**
 * Static type of an expression node
 */

import type { Expr } from "./types.js";
import type { TypeDescriptor } from "../metadata/types.js";
import { voidType, booleanType } from "../metadata/intrinsics.js";
import { makeArrayType, formatType } from "../metadata/type-ops.js";
import { internalError } from "../types/errors.js";

/**
 * Result type of a first-class function type: its last type argument.
 */
const functionResultType = (functionType: TypeDescriptor): TypeDescriptor => {
  if (functionType.kind === "genericInstance") {
    const last = functionType.typeArguments[functionType.typeArguments.length - 1];
    if (last) return last;
  }
  return internalError(`'${formatType(functionType)}' is not a function type`);
};

export const exprType = (expr: Expr): TypeDescriptor => {
  switch (expr.kind) {
    case "call":
      return expr.method.returnType;
    case "propertyGet":
      return expr.property.type;
    case "fieldGet":
      return expr.field.type;
    case "propertySet":
    case "fieldSet":
    case "whileLoop":
    case "varSet":
      return voidType;
    case "newObject":
      return expr.ctor.declaringType;
    case "coerce":
      return expr.type;
    case "newArray":
      return makeArrayType(expr.elementType, 1);
    case "newTuple":
      return expr.tupleType;
    case "tupleGet": {
      const tupleType = exprType(expr.tuple);
      const item =
        tupleType.kind === "genericInstance"
          ? tupleType.typeArguments[expr.index]
          : undefined;
      return (
        item ??
        internalError(
          `no item ${expr.index} in tuple type '${formatType(tupleType)}'`
        )
      );
    }
    case "newDelegate":
      return expr.delegateType;
    case "let":
      return exprType(expr.body);
    case "var":
      return expr.variable.type;
    case "lambda":
      return expr.functionType;
    case "application":
      return functionResultType(exprType(expr.func));
    case "newUnionCase":
      return expr.unionCase.declaringType;
    case "newRecord":
      return expr.recordType;
    case "unionCaseTest":
      return booleanType;
    case "value":
      return expr.type;
    case "sequential":
      return exprType(expr.second);
    case "ifThenElse":
      return exprType(expr.whenTrue);
    case "operator":
      switch (expr.operator) {
        case "add":
        case "subtract":
        case "multiply":
        case "divide":
          return exprType(expr.left);
        default:
          return booleanType;
      }
  }
};
