/**
 * Metadata Builder
 *
 * Constructs in-memory modules and type definitions. Definitions and their
 * members refer to each other (a member's declaringType is its definition),
 * so a definition is created first and members are attached afterwards.
 *
 * Used by the universe manifest loader, by provided (host-defined)
 * declarations, and by tests that need a universe without a manifest file.
 */

import type {
  TypeDefinition,
  TypeDescriptor,
  TypeOrigin,
  GenericParameterType,
  ModuleHandle,
  FieldInfo,
  PropertyInfo,
  MethodInfo,
  ConstructorInfo,
  MemberInfo,
  ParameterInfo,
  AccessorInfo,
  UnionShape,
  RecordShape,
  RuntimeInvoker,
  RuntimeConstructor,
  RuntimeGetter,
  RuntimeSetter,
} from "./types.js";
import { genericParameter, makeGenericType } from "./type-ops.js";
import { internalError } from "../types/errors.js";

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

// ═══════════════════════════════════════════════════════════════════════════
// INIT RECORDS
// ═══════════════════════════════════════════════════════════════════════════

export type TypeInit = {
  readonly fullName: string;
  /** Names of the open type parameters, in order */
  readonly genericParameters?: readonly string[];
  readonly baseType?: TypeDescriptor;
  readonly origin?: TypeOrigin;
};

export type FieldInit = {
  readonly name: string;
  readonly type: TypeDescriptor;
  readonly isStatic?: boolean;
  readonly isPublic?: boolean;
  readonly getValue?: RuntimeGetter;
  readonly setValue?: RuntimeSetter;
};

export type PropertyInit = {
  readonly name: string;
  readonly type: TypeDescriptor;
  readonly indexParameters?: readonly ParameterInfo[];
  /** Omit for a write-only property */
  readonly getter?: AccessorInfo;
  readonly setter?: AccessorInfo;
  readonly getValue?: RuntimeGetter;
  readonly setValue?: RuntimeSetter;
};

export type MethodInit = {
  readonly name: string;
  readonly parameters?: readonly ParameterInfo[];
  readonly returnType: TypeDescriptor;
  readonly isStatic?: boolean;
  readonly isPublic?: boolean;
  readonly genericParameters?: readonly GenericParameterType[];
  readonly invoke?: RuntimeInvoker;
};

export type ConstructorInit = {
  readonly parameters?: readonly ParameterInfo[];
  readonly isPublic?: boolean;
  readonly invoke?: RuntimeConstructor;
};

// ═══════════════════════════════════════════════════════════════════════════
// BUILDERS
// ═══════════════════════════════════════════════════════════════════════════

export type TypeBuilder = {
  readonly definition: TypeDefinition;
  /**
   * The definition as its own members see it: an instance over its open
   * parameters for generic definitions, the definition otherwise.
   */
  readonly self: TypeDescriptor;
  /** Open type parameter by name */
  readonly parameter: (name: string) => GenericParameterType;
  readonly addField: (init: FieldInit) => FieldInfo;
  readonly addProperty: (init: PropertyInit) => PropertyInfo;
  readonly addMethod: (init: MethodInit) => MethodInfo;
  readonly addConstructor: (init: ConstructorInit) => ConstructorInfo;
  /** Attach a member built elsewhere (provided members) */
  readonly attach: (member: MemberInfo) => void;
  readonly setBaseType: (baseType: TypeDescriptor) => void;
  readonly setUnion: (shape: UnionShape) => void;
  readonly setRecord: (shape: RecordShape) => void;
};

export type ModuleBuilder = {
  readonly module: ModuleHandle;
  readonly defineType: (init: TypeInit) => TypeBuilder;
};

/**
 * Create a definition that belongs to no module list (provided types are
 * registered by the host, not looked up).
 */
export const createTypeBuilder = (
  moduleName: string,
  init: TypeInit
): TypeBuilder => {
  const fields: FieldInfo[] = [];
  const properties: PropertyInfo[] = [];
  const methods: MethodInfo[] = [];
  const constructors: ConstructorInfo[] = [];
  const origin = init.origin ?? "metadata";

  const definition: Mutable<TypeDefinition> = {
    kind: "definition",
    fullName: init.fullName,
    moduleName,
    genericParameters: (init.genericParameters ?? []).map((name, i) =>
      genericParameter(name, i, "type")
    ),
    baseType: init.baseType,
    origin,
    members: { fields, properties, methods, constructors },
  };

  const self =
    definition.genericParameters.length > 0
      ? makeGenericType(definition, definition.genericParameters)
      : definition;

  const parameter = (name: string): GenericParameterType => {
    const found = definition.genericParameters.find((p) => p.name === name);
    return (
      found ??
      internalError(`'${init.fullName}' has no type parameter '${name}'`)
    );
  };

  return {
    definition,
    self,
    parameter,
    addField: (fieldInit) => {
      const field: FieldInfo = {
        memberKind: "field",
        name: fieldInit.name,
        declaringType: definition,
        type: fieldInit.type,
        isStatic: fieldInit.isStatic ?? false,
        isPublic: fieldInit.isPublic ?? true,
        origin,
        getValue: fieldInit.getValue,
        setValue: fieldInit.setValue,
      };
      fields.push(field);
      return field;
    },
    addProperty: (propertyInit) => {
      const property: PropertyInfo = {
        memberKind: "property",
        name: propertyInit.name,
        declaringType: definition,
        type: propertyInit.type,
        indexParameters: propertyInit.indexParameters ?? [],
        getter: propertyInit.getter,
        setter: propertyInit.setter,
        origin,
        getValue: propertyInit.getValue,
        setValue: propertyInit.setValue,
      };
      properties.push(property);
      return property;
    },
    addMethod: (methodInit) => {
      const method: MethodInfo = {
        memberKind: "method",
        name: methodInit.name,
        declaringType: definition,
        parameters: methodInit.parameters ?? [],
        returnType: methodInit.returnType,
        isStatic: methodInit.isStatic ?? false,
        isPublic: methodInit.isPublic ?? true,
        genericParameters: methodInit.genericParameters ?? [],
        origin,
        invoke: methodInit.invoke,
      };
      methods.push(method);
      return method;
    },
    addConstructor: (constructorInit) => {
      const ctor: ConstructorInfo = {
        memberKind: "constructor",
        declaringType: definition,
        parameters: constructorInit.parameters ?? [],
        isPublic: constructorInit.isPublic ?? true,
        origin,
        invoke: constructorInit.invoke,
      };
      constructors.push(ctor);
      return ctor;
    },
    attach: (member) => {
      switch (member.memberKind) {
        case "field":
          fields.push(member);
          return;
        case "property":
          properties.push(member);
          return;
        case "method":
          methods.push(member);
          return;
        case "constructor":
          constructors.push(member);
          return;
      }
    },
    setBaseType: (baseType) => {
      definition.baseType = baseType;
    },
    setUnion: (shape) => {
      definition.union = shape;
    },
    setRecord: (shape) => {
      definition.record = shape;
    },
  };
};

export const createModule = (name: string): ModuleBuilder => {
  const types: TypeDefinition[] = [];
  return {
    module: { name, types },
    defineType: (init) => {
      const builder = createTypeBuilder(name, init);
      types.push(builder.definition);
      return builder;
    },
  };
};
