/**
 * Reflection Service
 *
 * The capability the engine uses to query a universe: enumerate and look up
 * types in a module, and look up members on a type. The engine layers its
 * own ambiguity and name fix-up policy on top of these raw queries, so any
 * host that can answer them (a real metadata reader, an in-memory fake) can
 * drive a rewrite.
 *
 * createMetadataReflection() answers the queries over in-memory
 * definitions. Members looked up on a generic instance come back with the
 * instance's type arguments substituted into their signatures.
 */

import type {
  TypeDescriptor,
  TypeDefinition,
  ModuleHandle,
  BindingFlags,
  PropertyInfo,
  FieldInfo,
  MethodInfo,
  ConstructorInfo,
  ParameterInfo,
  UnionCaseInfo,
} from "./types.js";
import {
  definitionOf,
  parametersMatch,
  substituteType,
  formatType,
} from "./type-ops.js";
import { internalError } from "../types/errors.js";

export interface ReflectionService {
  /** Every type defined by a module */
  getTypes(module: ModuleHandle): readonly TypeDefinition[];
  /** Exact full-name lookup inside one module */
  getType(module: ModuleHandle, fullName: string): TypeDefinition | undefined;

  getProperty(
    type: TypeDescriptor,
    name: string,
    flags: BindingFlags
  ): PropertyInfo | undefined;
  getField(
    type: TypeDescriptor,
    name: string,
    flags: BindingFlags
  ): FieldInfo | undefined;
  /**
   * Exact signature match. Zero or several matches both answer undefined:
   * there is no nearest-overload selection.
   */
  getMethod(
    type: TypeDescriptor,
    name: string,
    parameterTypes: readonly TypeDescriptor[]
  ): MethodInfo | undefined;
  /** The single method with this name, if exactly one exists */
  getMethodByName(type: TypeDescriptor, name: string): MethodInfo | undefined;
  getConstructor(
    type: TypeDescriptor,
    parameterTypes: readonly TypeDescriptor[]
  ): ConstructorInfo | undefined;
  makeGenericMethod(
    definition: MethodInfo,
    typeArguments: readonly TypeDescriptor[]
  ): MethodInfo;

  // Union and record support (precomputed construction and tag access)
  getUnionCases(type: TypeDescriptor): readonly UnionCaseInfo[];
  getUnionConstructor(unionCase: UnionCaseInfo): MethodInfo;
  getUnionTagMember(type: TypeDescriptor): PropertyInfo | MethodInfo | FieldInfo;
  getRecordConstructor(type: TypeDescriptor): ConstructorInfo;
}

export const ALL_MEMBERS: BindingFlags = {
  public: true,
  nonPublic: true,
  static: true,
  instance: true,
};

// ═══════════════════════════════════════════════════════════════════════════
// SUBSTITUTION ONTO INSTANCES
// ═══════════════════════════════════════════════════════════════════════════

const typeArgumentsOf = (type: TypeDescriptor): readonly TypeDescriptor[] =>
  type.kind === "genericInstance" ? type.typeArguments : [];

const substituteParameters = (
  parameters: readonly ParameterInfo[],
  typeArguments: readonly TypeDescriptor[],
  methodArguments: readonly TypeDescriptor[] = []
): readonly ParameterInfo[] =>
  parameters.map((p) => ({
    ...p,
    type: substituteType(p.type, typeArguments, methodArguments),
  }));

/**
 * The type and its base types, each with the type arguments of the
 * requesting instance carried down the chain.
 */
const hierarchyOf = (type: TypeDescriptor): readonly TypeDescriptor[] => {
  const chain: TypeDescriptor[] = [];
  let current: TypeDescriptor | undefined = type;
  while (current) {
    const definition = definitionOf(current);
    if (!definition) break;
    chain.push(current);
    current = definition.baseType
      ? substituteType(definition.baseType, typeArgumentsOf(current))
      : undefined;
  }
  return chain;
};

const propertyOn = (
  type: TypeDescriptor,
  property: PropertyInfo
): PropertyInfo => {
  const args = typeArgumentsOf(type);
  return args.length === 0
    ? property
    : {
        ...property,
        declaringType: type,
        type: substituteType(property.type, args),
        indexParameters: substituteParameters(property.indexParameters, args),
      };
};

const fieldOn = (type: TypeDescriptor, field: FieldInfo): FieldInfo => {
  const args = typeArgumentsOf(type);
  return args.length === 0
    ? field
    : { ...field, declaringType: type, type: substituteType(field.type, args) };
};

const methodOn = (type: TypeDescriptor, method: MethodInfo): MethodInfo => {
  const args = typeArgumentsOf(type);
  return args.length === 0
    ? method
    : {
        ...method,
        declaringType: type,
        parameters: substituteParameters(method.parameters, args),
        returnType: substituteType(method.returnType, args),
      };
};

const constructorOn = (
  type: TypeDescriptor,
  ctor: ConstructorInfo
): ConstructorInfo => {
  const args = typeArgumentsOf(type);
  return args.length === 0
    ? ctor
    : {
        ...ctor,
        declaringType: type,
        parameters: substituteParameters(ctor.parameters, args),
      };
};

// ═══════════════════════════════════════════════════════════════════════════
// BINDING FLAGS
// ═══════════════════════════════════════════════════════════════════════════

const flagsAdmit = (
  flags: BindingFlags,
  isPublic: boolean,
  isStatic: boolean
): boolean =>
  (isPublic ? flags.public : flags.nonPublic) &&
  (isStatic ? flags.static : flags.instance);

export const isStaticProperty = (property: PropertyInfo): boolean =>
  (property.getter?.isStatic ?? false) || (property.setter?.isStatic ?? false);

export const isPublicProperty = (property: PropertyInfo): boolean =>
  (property.getter?.isPublic ?? false) || (property.setter?.isPublic ?? false);

/**
 * First level of the hierarchy with exactly one match wins; a level with
 * several matches makes the lookup fail.
 */
const findUnique = <M>(
  type: TypeDescriptor,
  candidates: (definition: TypeDefinition, level: TypeDescriptor) => readonly M[]
): M | undefined => {
  for (const level of hierarchyOf(type)) {
    const definition = definitionOf(level);
    if (!definition) continue;
    const matches = candidates(definition, level);
    if (matches.length === 1) return matches[0];
    if (matches.length > 1) return undefined;
  }
  return undefined;
};

// ═══════════════════════════════════════════════════════════════════════════
// IN-MEMORY IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export const createMetadataReflection = (): ReflectionService => {
  const getProperty = (
    type: TypeDescriptor,
    name: string,
    flags: BindingFlags
  ): PropertyInfo | undefined =>
    findUnique(type, (definition, level) =>
      definition.members.properties
        .filter(
          (p) =>
            p.name === name &&
            flagsAdmit(flags, isPublicProperty(p), isStaticProperty(p))
        )
        .map((p) => propertyOn(level, p))
    );

  const getMethodByName = (
    type: TypeDescriptor,
    name: string
  ): MethodInfo | undefined =>
    findUnique(type, (definition, level) =>
      definition.members.methods
        .filter((m) => m.name === name)
        .map((m) => methodOn(level, m))
    );

  const getConstructor = (
    type: TypeDescriptor,
    parameterTypes: readonly TypeDescriptor[]
  ): ConstructorInfo | undefined => {
    const definition = definitionOf(type);
    if (!definition) return undefined;
    const matches = definition.members.constructors
      .map((c) => constructorOn(type, c))
      .filter((c) => parametersMatch(c.parameters, parameterTypes));
    return matches.length === 1 ? matches[0] : undefined;
  };

  const getUnionCases = (type: TypeDescriptor): readonly UnionCaseInfo[] => {
    const definition = definitionOf(type);
    const shape = definition?.union;
    if (!shape) {
      return internalError(`'${formatType(type)}' is not a union type`);
    }
    const args = typeArgumentsOf(type);
    return shape.cases.map((c) => ({
      declaringType: type,
      name: c.name,
      tag: c.tag,
      fields: substituteParameters(c.fields, args),
    }));
  };

  return {
    getTypes: (module) => module.types,

    getType: (module, fullName) =>
      module.types.find((t) => t.fullName === fullName),

    getProperty,

    getField: (type, name, flags) =>
      findUnique(type, (definition, level) =>
        definition.members.fields
          .filter(
            (f) => f.name === name && flagsAdmit(flags, f.isPublic, f.isStatic)
          )
          .map((f) => fieldOn(level, f))
      ),

    getMethod: (type, name, parameterTypes) =>
      findUnique(type, (definition, level) =>
        definition.members.methods
          .filter(
            (m) => m.name === name && m.parameters.length === parameterTypes.length
          )
          .map((m) => methodOn(level, m))
          .filter((m) => parametersMatch(m.parameters, parameterTypes))
      ),

    getMethodByName,

    getConstructor,

    makeGenericMethod: (definition, typeArguments) => {
      if (definition.genericParameters.length !== typeArguments.length) {
        return internalError(
          `method '${definition.name}' takes ${definition.genericParameters.length} type arguments, got ${typeArguments.length}`
        );
      }
      return {
        ...definition,
        parameters: substituteParameters(
          definition.parameters,
          [],
          typeArguments
        ),
        returnType: substituteType(definition.returnType, [], typeArguments),
        genericArguments: typeArguments,
        genericDefinition: definition,
      };
    },

    getUnionCases,

    getUnionConstructor: (unionCase) => {
      const shape = definitionOf(unionCase.declaringType)?.union;
      const caseShape = shape?.cases.find((c) => c.name === unionCase.name);
      const ctor = caseShape
        ? getMethodByName(unionCase.declaringType, caseShape.constructorName)
        : undefined;
      return (
        ctor ??
        internalError(
          `no constructor for union case '${unionCase.name}' of '${formatType(unionCase.declaringType)}'`
        )
      );
    },

    getUnionTagMember: (type) => {
      const tagMember = definitionOf(type)?.union?.tagMember;
      if (!tagMember) {
        return internalError(`'${formatType(type)}' is not a union type`);
      }
      const member =
        tagMember.kind === "property"
          ? getProperty(type, tagMember.name, ALL_MEMBERS)
          : getMethodByName(type, tagMember.name);
      return (
        member ??
        internalError(
          `tag member '${tagMember.name}' missing on '${formatType(type)}'`
        )
      );
    },

    getRecordConstructor: (type) => {
      const shape = definitionOf(type)?.record;
      if (!shape) {
        return internalError(`'${formatType(type)}' is not a record type`);
      }
      const fieldTypes = substituteParameters(
        shape.fields,
        typeArgumentsOf(type)
      ).map((f) => f.type);
      return (
        getConstructor(type, fieldTypes) ??
        internalError(`no record constructor on '${formatType(type)}'`)
      );
    },
  };
};
