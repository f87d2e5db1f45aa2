/**
 * Type Universe Data Model
 *
 * Descriptors for types and members living in one type universe (an ordered
 * list of modules). Two universes may define structurally identical types;
 * their definitions are still distinct objects, and every identity check in
 * the engine treats them as foreign to each other.
 *
 * Key Types:
 * - TypeDescriptor: closed union over every type shape the engine crosses
 * - TypeDefinition: a nominal type with reference identity
 * - PropertyInfo / FieldInfo / MethodInfo / ConstructorInfo: members
 * - ModuleHandle / TypeUniverse: where definitions live
 */

// ═══════════════════════════════════════════════════════════════════════════
// ORIGIN
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Where a type or member came from.
 *
 * - metadata: loaded from a module of some universe; resolvable by name
 * - provided: synthesized by the host itself; never resolved
 */
export type TypeOrigin = "metadata" | "provided";

// ═══════════════════════════════════════════════════════════════════════════
// TYPE DESCRIPTORS
// ═══════════════════════════════════════════════════════════════════════════

export type TypeDescriptor =
  | TypeDefinition
  | GenericInstanceType
  | GenericParameterType
  | ArrayType
  | ByRefType
  | PointerType
  | TypeAbbreviation;

/**
 * A nominal type. Compared by reference: one object per type per universe.
 *
 * Generic definitions keep their open parameters in `genericParameters`;
 * member signatures refer to them through GenericParameterType.
 */
export type TypeDefinition = {
  readonly kind: "definition";
  /** e.g. "System.Collections.Generic.List`1" */
  readonly fullName: string;
  /** Display name of the owning module */
  readonly moduleName: string;
  readonly genericParameters: readonly GenericParameterType[];
  readonly baseType?: TypeDescriptor;
  readonly origin: TypeOrigin;
  readonly members: TypeMembers;
  readonly union?: UnionShape;
  readonly record?: RecordShape;
};

export type GenericInstanceType = {
  readonly kind: "genericInstance";
  readonly definition: TypeDefinition;
  readonly typeArguments: readonly TypeDescriptor[];
};

export type GenericParameterOwner = "type" | "method";

export type GenericParameterType = {
  readonly kind: "genericParameter";
  readonly name: string;
  readonly position: number;
  readonly owner: GenericParameterOwner;
};

export type ArrayType = {
  readonly kind: "array";
  readonly elementType: TypeDescriptor;
  readonly rank: number;
};

export type ByRefType = {
  readonly kind: "byRef";
  readonly elementType: TypeDescriptor;
};

export type PointerType = {
  readonly kind: "pointer";
  readonly elementType: TypeDescriptor;
};

/**
 * Host-defined alias for another type. Kept as written in both directions.
 */
export type TypeAbbreviation = {
  readonly kind: "abbreviation";
  readonly fullName: string;
  readonly abbreviated: TypeDescriptor;
};

// ═══════════════════════════════════════════════════════════════════════════
// MEMBERS
// ═══════════════════════════════════════════════════════════════════════════

export type TypeMembers = {
  readonly fields: readonly FieldInfo[];
  readonly properties: readonly PropertyInfo[];
  readonly methods: readonly MethodInfo[];
  readonly constructors: readonly ConstructorInfo[];
};

export type ParameterInfo = {
  readonly name: string;
  readonly type: TypeDescriptor;
};

/**
 * Runtime behaviour attached to members so trees can be evaluated.
 * The engine never calls these; only the reference evaluator does.
 */
export type RuntimeInvoker = (
  target: unknown,
  args: readonly unknown[]
) => unknown;
export type RuntimeConstructor = (args: readonly unknown[]) => unknown;
export type RuntimeGetter = (
  target: unknown,
  index: readonly unknown[]
) => unknown;
export type RuntimeSetter = (
  target: unknown,
  value: unknown,
  index: readonly unknown[]
) => void;

export type AccessorInfo = {
  readonly isStatic: boolean;
  readonly isPublic: boolean;
};

export type PropertyInfo = {
  readonly memberKind: "property";
  readonly name: string;
  readonly declaringType: TypeDescriptor;
  readonly type: TypeDescriptor;
  readonly indexParameters: readonly ParameterInfo[];
  readonly getter?: AccessorInfo;
  readonly setter?: AccessorInfo;
  readonly origin: TypeOrigin;
  readonly getValue?: RuntimeGetter;
  readonly setValue?: RuntimeSetter;
};

export type FieldInfo = {
  readonly memberKind: "field";
  readonly name: string;
  readonly declaringType: TypeDescriptor;
  readonly type: TypeDescriptor;
  readonly isStatic: boolean;
  readonly isPublic: boolean;
  readonly origin: TypeOrigin;
  readonly getValue?: RuntimeGetter;
  readonly setValue?: RuntimeSetter;
};

export type MethodInfo = {
  readonly memberKind: "method";
  readonly name: string;
  readonly declaringType: TypeDescriptor;
  readonly parameters: readonly ParameterInfo[];
  readonly returnType: TypeDescriptor;
  readonly isStatic: boolean;
  readonly isPublic: boolean;
  /** Open method-level parameters (empty for non-generic methods) */
  readonly genericParameters: readonly GenericParameterType[];
  /** Set once a generic method definition has been instantiated */
  readonly genericArguments?: readonly TypeDescriptor[];
  /** The open definition an instantiated generic method came from */
  readonly genericDefinition?: MethodInfo;
  readonly origin: TypeOrigin;
  readonly invoke?: RuntimeInvoker;
};

export type ConstructorInfo = {
  readonly memberKind: "constructor";
  readonly declaringType: TypeDescriptor;
  readonly parameters: readonly ParameterInfo[];
  readonly isPublic: boolean;
  readonly origin: TypeOrigin;
  readonly invoke?: RuntimeConstructor;
};

export type MemberInfo = PropertyInfo | FieldInfo | MethodInfo | ConstructorInfo;

/**
 * Lookup filter, mirroring runtime reflection binding flags.
 */
export type BindingFlags = {
  readonly public: boolean;
  readonly nonPublic: boolean;
  readonly static: boolean;
  readonly instance: boolean;
};

// ═══════════════════════════════════════════════════════════════════════════
// UNION AND RECORD SHAPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * How a union type exposes its case tag.
 */
export type UnionTagMember =
  | { readonly kind: "property"; readonly name: string }
  | {
      readonly kind: "method";
      readonly name: string;
      readonly isStatic: boolean;
    };

export type UnionCaseShape = {
  readonly name: string;
  readonly tag: number;
  readonly fields: readonly ParameterInfo[];
  /** Static method building this case */
  readonly constructorName: string;
};

export type UnionShape = {
  readonly cases: readonly UnionCaseShape[];
  readonly tagMember: UnionTagMember;
};

export type RecordShape = {
  readonly fields: readonly ParameterInfo[];
};

/**
 * A union case seen through a concrete union type (definition or instance).
 */
export type UnionCaseInfo = {
  readonly declaringType: TypeDescriptor;
  readonly name: string;
  readonly tag: number;
  readonly fields: readonly ParameterInfo[];
};

// ═══════════════════════════════════════════════════════════════════════════
// MODULES AND UNIVERSES
// ═══════════════════════════════════════════════════════════════════════════

export type ModuleHandle = {
  /** Full display name, e.g. "Runtime.Core, Version=4.4.0.0" */
  readonly name: string;
  readonly types: readonly TypeDefinition[];
};

/**
 * An ordered list of modules that together define a closed set of types.
 */
export type TypeUniverse = readonly ModuleHandle[];
