/**
 * Expression construction
 *
 * Two construction modes:
 *
 * - make*: checked. Validates static/instance shape, arity and argument
 *   types against the member being used, the way a host validates a tree
 *   built in its own universe.
 * - raw.*: unchecked. Builds the node as given. The retargeting engine
 *   uses this while a tree is halfway across: a rebuilt node can hold a
 *   member of the destination universe over children whose types the
 *   checked builders would reject. Internal to the engine; trees built
 *   with raw.* are only as valid as the caller makes them.
 */

import type {
  Expr,
  Var,
  CallExpr,
  PropertyGetExpr,
  PropertySetExpr,
  FieldGetExpr,
  FieldSetExpr,
  NewObjectExpr,
  CoerceExpr,
  NewArrayExpr,
  NewTupleExpr,
  TupleGetExpr,
  NewDelegateExpr,
  LetExpr,
  VarExpr,
  LambdaExpr,
  ApplicationExpr,
  NewUnionCaseExpr,
  NewRecordExpr,
  UnionCaseTestExpr,
  ValueExpr,
  SequentialExpr,
  IfThenElseExpr,
  WhileLoopExpr,
  VarSetExpr,
  OperatorExpr,
  BinaryOperator,
  RuntimeValue,
} from "./types.js";
import type {
  TypeDescriptor,
  MethodInfo,
  PropertyInfo,
  FieldInfo,
  ConstructorInfo,
  ParameterInfo,
  UnionCaseInfo,
} from "../metadata/types.js";
import {
  isAssignableTo,
  formatType,
  formatMember,
} from "../metadata/type-ops.js";
import { isStaticProperty } from "../metadata/reflection.js";
import { exprType } from "./expr-type.js";
import { raise } from "../types/errors.js";

// ═══════════════════════════════════════════════════════════════════════════
// VARIABLES
// ═══════════════════════════════════════════════════════════════════════════

let nextVarId = 1;

export const createVar = (
  name: string,
  type: TypeDescriptor,
  isMutable = false
): Var => ({ id: nextVarId++, name, type, isMutable });

export const sameVar = (a: Var, b: Var): boolean => a.id === b.id;

// ═══════════════════════════════════════════════════════════════════════════
// UNCHECKED CONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════

export const raw = {
  call: (
    object: Expr | undefined,
    method: MethodInfo,
    args: readonly Expr[]
  ): CallExpr => ({ kind: "call", object, method, args }),

  propertyGet: (
    object: Expr | undefined,
    property: PropertyInfo,
    indexArgs: readonly Expr[] = []
  ): PropertyGetExpr => ({ kind: "propertyGet", object, property, indexArgs }),

  propertySet: (
    object: Expr | undefined,
    property: PropertyInfo,
    value: Expr,
    indexArgs: readonly Expr[] = []
  ): PropertySetExpr => ({
    kind: "propertySet",
    object,
    property,
    indexArgs,
    value,
  }),

  fieldGet: (object: Expr | undefined, field: FieldInfo): FieldGetExpr => ({
    kind: "fieldGet",
    object,
    field,
  }),

  fieldSet: (
    object: Expr | undefined,
    field: FieldInfo,
    value: Expr
  ): FieldSetExpr => ({ kind: "fieldSet", object, field, value }),

  newObject: (ctor: ConstructorInfo, args: readonly Expr[]): NewObjectExpr => ({
    kind: "newObject",
    ctor,
    args,
  }),

  coerce: (expression: Expr, type: TypeDescriptor): CoerceExpr => ({
    kind: "coerce",
    expression,
    type,
  }),

  newArray: (
    elementType: TypeDescriptor,
    elements: readonly Expr[]
  ): NewArrayExpr => ({ kind: "newArray", elementType, elements }),

  newTuple: (
    tupleType: TypeDescriptor,
    elements: readonly Expr[]
  ): NewTupleExpr => ({ kind: "newTuple", tupleType, elements }),

  tupleGet: (tuple: Expr, index: number): TupleGetExpr => ({
    kind: "tupleGet",
    tuple,
    index,
  }),

  newDelegate: (
    delegateType: TypeDescriptor,
    parameters: readonly Var[],
    body: Expr
  ): NewDelegateExpr => ({ kind: "newDelegate", delegateType, parameters, body }),

  let: (variable: Var, value: Expr, body: Expr): LetExpr => ({
    kind: "let",
    variable,
    value,
    body,
  }),

  var: (variable: Var): VarExpr => ({ kind: "var", variable }),

  varSet: (variable: Var, value: Expr): VarSetExpr => ({
    kind: "varSet",
    variable,
    value,
  }),
};

// ═══════════════════════════════════════════════════════════════════════════
// CHECKED CONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════

const invalid = (message: string): never =>
  raise("InvalidExpression", "QSH2101", message);

const checkReceiver = (
  what: string,
  isStatic: boolean,
  object: Expr | undefined
): void => {
  if (isStatic && object) {
    invalid(`Static member '${what}' cannot be used with a receiver`);
  }
  if (!isStatic && !object) {
    invalid(`Instance member '${what}' requires a receiver`);
  }
};

const checkAssignable = (
  what: string,
  actual: TypeDescriptor,
  expected: TypeDescriptor
): void => {
  if (!isAssignableTo(actual, expected)) {
    invalid(
      `${what}: expected '${formatType(expected)}', got '${formatType(actual)}'`
    );
  }
};

const checkArguments = (
  what: string,
  parameters: readonly ParameterInfo[],
  args: readonly Expr[]
): void => {
  if (parameters.length !== args.length) {
    invalid(
      `'${what}' takes ${parameters.length} arguments, got ${args.length}`
    );
  }
  parameters.forEach((parameter, i) => {
    const arg = args[i];
    if (arg) {
      checkAssignable(
        `Argument '${parameter.name}' of '${what}'`,
        exprType(arg),
        parameter.type
      );
    }
  });
};

export const makeCall = (
  object: Expr | undefined,
  method: MethodInfo,
  args: readonly Expr[]
): CallExpr => {
  const what = formatMember(method);
  if (method.genericParameters.length > 0 && !method.genericArguments) {
    invalid(`Method '${what}' is a generic definition; instantiate it first`);
  }
  checkReceiver(what, method.isStatic, object);
  if (object) {
    checkAssignable(`Receiver of '${what}'`, exprType(object), method.declaringType);
  }
  checkArguments(what, method.parameters, args);
  return raw.call(object, method, args);
};

export const makePropertyGet = (
  object: Expr | undefined,
  property: PropertyInfo,
  indexArgs: readonly Expr[] = []
): PropertyGetExpr => {
  const what = formatMember(property);
  if (!property.getter) invalid(`Property '${what}' has no getter`);
  checkReceiver(what, isStaticProperty(property), object);
  checkArguments(what, property.indexParameters, indexArgs);
  return raw.propertyGet(object, property, indexArgs);
};

export const makePropertySet = (
  object: Expr | undefined,
  property: PropertyInfo,
  value: Expr,
  indexArgs: readonly Expr[] = []
): PropertySetExpr => {
  const what = formatMember(property);
  if (!property.setter) invalid(`Property '${what}' has no setter`);
  checkReceiver(what, isStaticProperty(property), object);
  checkArguments(what, property.indexParameters, indexArgs);
  checkAssignable(`Value of '${what}'`, exprType(value), property.type);
  return raw.propertySet(object, property, value, indexArgs);
};

export const makeFieldGet = (
  object: Expr | undefined,
  field: FieldInfo
): FieldGetExpr => {
  checkReceiver(formatMember(field), field.isStatic, object);
  return raw.fieldGet(object, field);
};

export const makeFieldSet = (
  object: Expr | undefined,
  field: FieldInfo,
  value: Expr
): FieldSetExpr => {
  const what = formatMember(field);
  checkReceiver(what, field.isStatic, object);
  checkAssignable(`Value of '${what}'`, exprType(value), field.type);
  return raw.fieldSet(object, field, value);
};

export const makeNewObject = (
  ctor: ConstructorInfo,
  args: readonly Expr[]
): NewObjectExpr => {
  checkArguments(formatMember(ctor), ctor.parameters, args);
  return raw.newObject(ctor, args);
};

export const makeNewArray = (
  elementType: TypeDescriptor,
  elements: readonly Expr[]
): NewArrayExpr => {
  elements.forEach((element, i) =>
    checkAssignable(`Array element ${i}`, exprType(element), elementType)
  );
  return raw.newArray(elementType, elements);
};

export const makeLet = (variable: Var, value: Expr, body: Expr): LetExpr => {
  checkAssignable(`Binding '${variable.name}'`, exprType(value), variable.type);
  return raw.let(variable, value, body);
};

// ═══════════════════════════════════════════════════════════════════════════
// PLAIN BUILDERS
// ═══════════════════════════════════════════════════════════════════════════

export const makeCoerce = raw.coerce;
export const makeNewTuple = raw.newTuple;
export const makeTupleGet = raw.tupleGet;
export const makeNewDelegate = raw.newDelegate;

export const makeVar = raw.var;

export const makeLambda = (
  parameter: Var,
  body: Expr,
  functionType: TypeDescriptor
): LambdaExpr => ({ kind: "lambda", parameter, body, functionType });

export const makeApplication = (func: Expr, arg: Expr): ApplicationExpr => ({
  kind: "application",
  func,
  arg,
});

export const makeNewUnionCase = (
  unionCase: UnionCaseInfo,
  args: readonly Expr[]
): NewUnionCaseExpr => {
  if (unionCase.fields.length !== args.length) {
    invalid(
      `Union case '${unionCase.name}' takes ${unionCase.fields.length} arguments, got ${args.length}`
    );
  }
  return { kind: "newUnionCase", unionCase, args };
};

export const makeNewRecord = (
  recordType: TypeDescriptor,
  args: readonly Expr[]
): NewRecordExpr => ({ kind: "newRecord", recordType, args });

export const makeUnionCaseTest = (
  expression: Expr,
  unionCase: UnionCaseInfo
): UnionCaseTestExpr => ({ kind: "unionCaseTest", expression, unionCase });

export const makeValue = (
  value: RuntimeValue,
  type: TypeDescriptor
): ValueExpr => ({ kind: "value", value, type });

export const makeSequential = (first: Expr, second: Expr): SequentialExpr => ({
  kind: "sequential",
  first,
  second,
});

export const makeIfThenElse = (
  condition: Expr,
  whenTrue: Expr,
  whenFalse: Expr
): IfThenElseExpr => ({ kind: "ifThenElse", condition, whenTrue, whenFalse });

export const makeWhileLoop = (condition: Expr, body: Expr): WhileLoopExpr => ({
  kind: "whileLoop",
  condition,
  body,
});

export const makeVarSet = (variable: Var, value: Expr): VarSetExpr => {
  if (!variable.isMutable) {
    invalid(`Variable '${variable.name}' is not mutable`);
  }
  return raw.varSet(variable, value);
};

export const makeOperator = (
  operator: BinaryOperator,
  left: Expr,
  right: Expr
): OperatorExpr => ({ kind: "operator", operator, left, right });
