/**
 * Provided declarations
 *
 * Types and members synthesized by the host rather than loaded from a
 * module. Every definition and member built here carries
 * `origin: "provided"`, so the retargeting engine passes it through
 * unchanged. A provided member has no runtime implementation of its own:
 * each call site is replaced by the expression its invoke code returns.
 */

import type {
  ConstructorInfo,
  Expr,
  MemberInfo,
  MethodInfo,
  ParameterInfo,
  PropertyInfo,
  TypeDefinition,
  TypeDescriptor,
} from "@quoteshift/core";
import {
  createTypeBuilder,
  definitionOf,
  formatMember,
  internalError,
  mapChildren,
} from "@quoteshift/core";

export const PROVIDED_MODULE_NAME = "<provided>";

/** Object-identity members hidden by `hideObjectMethods` */
export const OBJECT_METHOD_NAMES: readonly string[] = [
  "Equals",
  "GetHashCode",
  "GetType",
  "ToString",
];

const OBJECT_TYPE_NAME = "System.Object";

// ═══════════════════════════════════════════════════════════════════════════
// DECLARATIONS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Splices a body for one call site. Instance members receive the receiver
 * as the first argument.
 */
export type InvokeCode = (args: readonly Expr[]) => Expr;

export type ProvidedParameter = ParameterInfo;

export type ProvidedProperty = {
  readonly declarationKind: "property";
  readonly name: string;
  readonly type: TypeDescriptor;
  readonly isStatic: boolean;
  readonly getterCode: InvokeCode;
};

export type ProvidedConstructor = {
  readonly declarationKind: "constructor";
  readonly parameters: readonly ProvidedParameter[];
  readonly invokeCode: InvokeCode;
};

export type ProvidedMethod = {
  readonly declarationKind: "method";
  readonly name: string;
  readonly parameters: readonly ProvidedParameter[];
  readonly returnType: TypeDescriptor;
  readonly isStatic: boolean;
  readonly invokeCode: InvokeCode;
};

export type ProvidedMember =
  | ProvidedProperty
  | ProvidedConstructor
  | ProvidedMethod;

export const createProvidedParameter = (
  name: string,
  type: TypeDescriptor
): ProvidedParameter => ({ name, type });

export const createProvidedProperty = (
  name: string,
  type: TypeDescriptor,
  getterCode: InvokeCode,
  isStatic = false
): ProvidedProperty => ({
  declarationKind: "property",
  name,
  type,
  isStatic,
  getterCode,
});

export const createProvidedConstructor = (
  parameters: readonly ProvidedParameter[],
  invokeCode: InvokeCode
): ProvidedConstructor => ({
  declarationKind: "constructor",
  parameters,
  invokeCode,
});

export const createProvidedMethod = (
  name: string,
  parameters: readonly ProvidedParameter[],
  returnType: TypeDescriptor,
  isStatic: boolean,
  invokeCode: InvokeCode
): ProvidedMethod => ({
  declarationKind: "method",
  name,
  parameters,
  returnType,
  isStatic,
  invokeCode,
});

// ═══════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════

export type ProvidedTypeOptions = {
  /** Hide Equals, GetHashCode, GetType and ToString from member listings */
  readonly hideObjectMethods?: boolean;
  /** Null is not a value of the type */
  readonly nonNullable?: boolean;
};

export interface ProvidedTypeDefinition {
  readonly definition: TypeDefinition;
  readonly moduleName: string;
  readonly namespace: string | undefined;
  readonly name: string;
  readonly hideObjectMethods: boolean;
  readonly nonNullable: boolean;

  addProperty(property: ProvidedProperty): PropertyInfo;
  addConstructor(ctor: ProvidedConstructor): ConstructorInfo;
  addMethod(method: ProvidedMethod): MethodInfo;
  addMember(member: ProvidedMember): MemberInfo;
}

// Invoke code of every attached provided member
const invokers = new WeakMap<MemberInfo, InvokeCode>();

const register = <M extends MemberInfo>(member: M, code: InvokeCode): M => {
  invokers.set(member, code);
  return member;
};

/**
 * A provided type in `namespace` of `moduleName`, or a free-standing one
 * when neither is given.
 */
export const createProvidedTypeDefinition = (
  name: string,
  baseType: TypeDescriptor | undefined,
  options: ProvidedTypeOptions = {},
  moduleName: string = PROVIDED_MODULE_NAME,
  namespace?: string
): ProvidedTypeDefinition => {
  const builder = createTypeBuilder(moduleName, {
    fullName: namespace ? `${namespace}.${name}` : name,
    baseType,
    origin: "provided",
  });

  const addProperty = (property: ProvidedProperty): PropertyInfo =>
    register(
      builder.addProperty({
        name: property.name,
        type: property.type,
        getter: { isStatic: property.isStatic, isPublic: true },
      }),
      property.getterCode
    );

  const addConstructor = (ctor: ProvidedConstructor): ConstructorInfo =>
    register(
      builder.addConstructor({ parameters: ctor.parameters }),
      ctor.invokeCode
    );

  const addMethod = (method: ProvidedMethod): MethodInfo =>
    register(
      builder.addMethod({
        name: method.name,
        parameters: method.parameters,
        returnType: method.returnType,
        isStatic: method.isStatic,
      }),
      method.invokeCode
    );

  return {
    definition: builder.definition,
    moduleName,
    namespace,
    name,
    hideObjectMethods: options.hideObjectMethods ?? false,
    nonNullable: options.nonNullable ?? false,
    addProperty,
    addConstructor,
    addMethod,
    addMember: (member) => {
      switch (member.declarationKind) {
        case "property":
          return addProperty(member);
        case "constructor":
          return addConstructor(member);
        case "method":
          return addMethod(member);
      }
    },
  };
};

/**
 * Methods a member listing shows for the type: its own and every inherited
 * one, minus the object-identity methods when they are hidden.
 */
export const visibleMethods = (
  provided: ProvidedTypeDefinition
): readonly MethodInfo[] => {
  const methods: MethodInfo[] = [];
  let current: TypeDescriptor | undefined = provided.definition;
  while (current) {
    const definition = definitionOf(current);
    if (!definition) break;
    const hidden =
      provided.hideObjectMethods && definition.fullName === OBJECT_TYPE_NAME;
    methods.push(
      ...definition.members.methods.filter(
        (m) => !(hidden && OBJECT_METHOD_NAMES.includes(m.name))
      )
    );
    current = definition.baseType;
  }
  return methods;
};

export const acceptsNull = (provided: ProvidedTypeDefinition): boolean =>
  !provided.nonNullable;

// ═══════════════════════════════════════════════════════════════════════════
// INVOCATION
// ═══════════════════════════════════════════════════════════════════════════

export const isProvidedMember = (member: MemberInfo): boolean =>
  invokers.has(member);

/**
 * The expression a call of `member` with `args` stands for.
 */
export const getInvokerExpression = (
  member: MemberInfo,
  args: readonly Expr[]
): Expr => {
  const code = invokers.get(member);
  return code
    ? code(args)
    : internalError(`'${formatMember(member)}' has no invoke code`);
};

const withReceiver = (
  member: MemberInfo,
  isStatic: boolean,
  object: Expr | undefined,
  args: readonly Expr[]
): readonly Expr[] => {
  if (isStatic) return args;
  return object
    ? [object, ...args]
    : internalError(`instance member '${formatMember(member)}' called without a receiver`);
};

/**
 * Replace every call, property read and construction of a provided member
 * with its invoker body, bottom-up. Spliced bodies are expanded in turn.
 */
export const expandProvidedCalls = (expr: Expr): Expr => {
  const expand = (e: Expr): Expr => {
    const node = mapChildren(e, expand);
    switch (node.kind) {
      case "call":
        return isProvidedMember(node.method)
          ? expand(
              getInvokerExpression(
                node.method,
                withReceiver(node.method, node.method.isStatic, node.object, node.args)
              )
            )
          : node;
      case "propertyGet":
        return isProvidedMember(node.property)
          ? expand(
              getInvokerExpression(
                node.property,
                withReceiver(
                  node.property,
                  node.property.getter?.isStatic ?? false,
                  node.object,
                  node.indexArgs
                )
              )
            )
          : node;
      case "newObject":
        return isProvidedMember(node.ctor)
          ? expand(getInvokerExpression(node.ctor, node.args))
          : node;
      default:
        return node;
    }
  };
  return expand(expr);
};
