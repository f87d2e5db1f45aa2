/**
 * Expression tree types
 *
 * A statically-typed expression tree whose type and member references point
 * into one type universe. Every node owns its children; the only sharing is
 * repeated references to the same bound variable.
 */

import type {
  TypeDescriptor,
  MethodInfo,
  PropertyInfo,
  FieldInfo,
  ConstructorInfo,
  UnionCaseInfo,
} from "../metadata/types.js";

/**
 * Identity-carrying binder. Two variables are the same variable only when
 * their ids are equal; name, type and mutability say nothing about identity.
 */
export type Var = {
  readonly id: number;
  readonly name: string;
  readonly type: TypeDescriptor;
  readonly isMutable: boolean;
};

export type Expr =
  // Member access and construction
  | CallExpr
  | PropertyGetExpr
  | PropertySetExpr
  | FieldGetExpr
  | FieldSetExpr
  | NewObjectExpr
  | CoerceExpr
  | NewArrayExpr
  | NewTupleExpr
  | TupleGetExpr
  | NewDelegateExpr
  // Binding
  | LetExpr
  | VarExpr
  | LambdaExpr
  // Desugared before crossing universes
  | ApplicationExpr
  | NewUnionCaseExpr
  | NewRecordExpr
  | UnionCaseTestExpr
  // Structural combinations
  | ValueExpr
  | SequentialExpr
  | IfThenElseExpr
  | WhileLoopExpr
  | VarSetExpr
  | OperatorExpr;

export type CallExpr = {
  readonly kind: "call";
  /** Undefined for static calls */
  readonly object?: Expr;
  readonly method: MethodInfo;
  readonly args: readonly Expr[];
};

export type PropertyGetExpr = {
  readonly kind: "propertyGet";
  readonly object?: Expr;
  readonly property: PropertyInfo;
  readonly indexArgs: readonly Expr[];
};

export type PropertySetExpr = {
  readonly kind: "propertySet";
  readonly object?: Expr;
  readonly property: PropertyInfo;
  readonly indexArgs: readonly Expr[];
  readonly value: Expr;
};

export type FieldGetExpr = {
  readonly kind: "fieldGet";
  readonly object?: Expr;
  readonly field: FieldInfo;
};

export type FieldSetExpr = {
  readonly kind: "fieldSet";
  readonly object?: Expr;
  readonly field: FieldInfo;
  readonly value: Expr;
};

export type NewObjectExpr = {
  readonly kind: "newObject";
  readonly ctor: ConstructorInfo;
  readonly args: readonly Expr[];
};

export type CoerceExpr = {
  readonly kind: "coerce";
  readonly expression: Expr;
  readonly type: TypeDescriptor;
};

export type NewArrayExpr = {
  readonly kind: "newArray";
  readonly elementType: TypeDescriptor;
  readonly elements: readonly Expr[];
};

export type NewTupleExpr = {
  readonly kind: "newTuple";
  readonly tupleType: TypeDescriptor;
  readonly elements: readonly Expr[];
};

export type TupleGetExpr = {
  readonly kind: "tupleGet";
  readonly tuple: Expr;
  readonly index: number;
};

export type NewDelegateExpr = {
  readonly kind: "newDelegate";
  readonly delegateType: TypeDescriptor;
  readonly parameters: readonly Var[];
  readonly body: Expr;
};

export type LetExpr = {
  readonly kind: "let";
  readonly variable: Var;
  readonly value: Expr;
  readonly body: Expr;
};

export type VarExpr = {
  readonly kind: "var";
  readonly variable: Var;
};

/**
 * First-class function literal. Cannot cross universes.
 */
export type LambdaExpr = {
  readonly kind: "lambda";
  readonly parameter: Var;
  readonly body: Expr;
  /** Function type of the literal (a generic instance with Invoke) */
  readonly functionType: TypeDescriptor;
};

/**
 * `func` applied to `arg`, where func is a first-class function value.
 */
export type ApplicationExpr = {
  readonly kind: "application";
  readonly func: Expr;
  readonly arg: Expr;
};

export type NewUnionCaseExpr = {
  readonly kind: "newUnionCase";
  readonly unionCase: UnionCaseInfo;
  readonly args: readonly Expr[];
};

export type NewRecordExpr = {
  readonly kind: "newRecord";
  readonly recordType: TypeDescriptor;
  readonly args: readonly Expr[];
};

export type UnionCaseTestExpr = {
  readonly kind: "unionCaseTest";
  readonly expression: Expr;
  readonly unionCase: UnionCaseInfo;
};

export type RuntimeValue = string | number | boolean | null;

export type ValueExpr = {
  readonly kind: "value";
  readonly value: RuntimeValue;
  readonly type: TypeDescriptor;
};

export type SequentialExpr = {
  readonly kind: "sequential";
  readonly first: Expr;
  readonly second: Expr;
};

export type IfThenElseExpr = {
  readonly kind: "ifThenElse";
  readonly condition: Expr;
  readonly whenTrue: Expr;
  readonly whenFalse: Expr;
};

export type WhileLoopExpr = {
  readonly kind: "whileLoop";
  readonly condition: Expr;
  readonly body: Expr;
};

export type VarSetExpr = {
  readonly kind: "varSet";
  readonly variable: Var;
  readonly value: Expr;
};

export type ComparisonOperator =
  | "equals"
  | "notEquals"
  | "lessThan"
  | "lessThanOrEqual"
  | "greaterThan"
  | "greaterThanOrEqual";

export type ArithmeticOperator = "add" | "subtract" | "multiply" | "divide";

export type BinaryOperator = ComparisonOperator | ArithmeticOperator;

export type OperatorExpr = {
  readonly kind: "operator";
  readonly operator: BinaryOperator;
  readonly left: Expr;
  readonly right: Expr;
};

export type ExprKind = Expr["kind"];

/**
 * Node kinds rebuilt generically from their children, with their own
 * metadata (value types, operator names) carried over untouched.
 */
export type CombinationExpr =
  | ValueExpr
  | SequentialExpr
  | IfThenElseExpr
  | WhileLoopExpr
  | OperatorExpr;
