/**
 * Type Operations
 *
 * Pure helpers over TypeDescriptor:
 * - typesEqual: identity for definitions, structure for everything else
 * - formatType / formatMember: runtime display forms used in messages
 * - make*Type: symbol and generic type construction
 * - substituteType: replace generic parameters with arguments
 */

import type {
  TypeDescriptor,
  TypeDefinition,
  GenericParameterType,
  MemberInfo,
  ParameterInfo,
} from "./types.js";
import { internalError } from "../types/errors.js";

// ═══════════════════════════════════════════════════════════════════════════
// EQUALITY
// ═══════════════════════════════════════════════════════════════════════════

const allEqual = (
  left: readonly TypeDescriptor[],
  right: readonly TypeDescriptor[]
): boolean =>
  left.length === right.length &&
  left.every((type, i) => {
    const other = right[i];
    return other !== undefined && typesEqual(type, other);
  });

/**
 * Two descriptors denote the same type.
 *
 * Definitions compare by reference: a definition from another universe with
 * the same full name is a different type.
 */
export const typesEqual = (a: TypeDescriptor, b: TypeDescriptor): boolean => {
  if (a === b) return true;

  switch (a.kind) {
    case "definition":
      return false;

    case "genericInstance":
      return (
        b.kind === "genericInstance" &&
        a.definition === b.definition &&
        allEqual(a.typeArguments, b.typeArguments)
      );

    case "genericParameter":
      return (
        b.kind === "genericParameter" &&
        a.owner === b.owner &&
        a.position === b.position &&
        a.name === b.name
      );

    case "array":
      return (
        b.kind === "array" &&
        a.rank === b.rank &&
        typesEqual(a.elementType, b.elementType)
      );

    case "byRef":
    case "pointer":
      return b.kind === a.kind && typesEqual(a.elementType, b.elementType);

    case "abbreviation":
      return (
        b.kind === "abbreviation" &&
        a.fullName === b.fullName &&
        typesEqual(a.abbreviated, b.abbreviated)
      );
  }
};

export const parametersMatch = (
  parameters: readonly ParameterInfo[],
  parameterTypes: readonly TypeDescriptor[]
): boolean =>
  allEqual(
    parameters.map((p) => p.type),
    parameterTypes
  );

// ═══════════════════════════════════════════════════════════════════════════
// CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * The nominal definition behind a definition or a generic instance.
 */
export const definitionOf = (
  type: TypeDescriptor
): TypeDefinition | undefined => {
  switch (type.kind) {
    case "definition":
      return type;
    case "genericInstance":
      return type.definition;
    default:
      return undefined;
  }
};

/**
 * Synthesized by the host: provided definitions and abbreviations.
 */
export const isHostDefined = (type: TypeDescriptor): boolean =>
  (type.kind === "definition" && type.origin === "provided") ||
  type.kind === "abbreviation";

// ═══════════════════════════════════════════════════════════════════════════
// CONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════

export const genericParameter = (
  name: string,
  position: number,
  owner: GenericParameterType["owner"] = "type"
): GenericParameterType => ({
  kind: "genericParameter",
  name,
  position,
  owner,
});

export const makeGenericType = (
  definition: TypeDefinition,
  typeArguments: readonly TypeDescriptor[]
): TypeDescriptor => {
  if (definition.genericParameters.length !== typeArguments.length) {
    return internalError(
      `'${definition.fullName}' takes ${definition.genericParameters.length} type arguments, got ${typeArguments.length}`
    );
  }
  return { kind: "genericInstance", definition, typeArguments };
};

export const makeArrayType = (
  elementType: TypeDescriptor,
  rank = 1
): TypeDescriptor => ({ kind: "array", elementType, rank });

export const makeByRefType = (elementType: TypeDescriptor): TypeDescriptor => ({
  kind: "byRef",
  elementType,
});

export const makePointerType = (
  elementType: TypeDescriptor
): TypeDescriptor => ({ kind: "pointer", elementType });

// ═══════════════════════════════════════════════════════════════════════════
// SUBSTITUTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Replace type-level and method-level generic parameters by position.
 * Parameters without a corresponding argument are kept.
 */
export const substituteType = (
  type: TypeDescriptor,
  typeArguments: readonly TypeDescriptor[],
  methodArguments: readonly TypeDescriptor[] = []
): TypeDescriptor => {
  const go = (t: TypeDescriptor): TypeDescriptor => {
    switch (t.kind) {
      case "genericParameter": {
        const args = t.owner === "type" ? typeArguments : methodArguments;
        return args[t.position] ?? t;
      }
      case "genericInstance":
        return { ...t, typeArguments: t.typeArguments.map(go) };
      case "array":
      case "byRef":
      case "pointer":
        return { ...t, elementType: go(t.elementType) };
      case "definition":
      case "abbreviation":
        return t;
    }
  };
  return go(type);
};

/**
 * `from` is `to` or derives from it through its base-type chain.
 */
export const isAssignableTo = (
  from: TypeDescriptor,
  to: TypeDescriptor
): boolean => {
  let current: TypeDescriptor | undefined = from;
  while (current) {
    if (typesEqual(current, to)) return true;
    const definition = definitionOf(current);
    const args: readonly TypeDescriptor[] =
      current.kind === "genericInstance" ? current.typeArguments : [];
    current = definition?.baseType
      ? substituteType(definition.baseType, args)
      : undefined;
  }
  return false;
};

// ═══════════════════════════════════════════════════════════════════════════
// DISPLAY
// ═══════════════════════════════════════════════════════════════════════════

const rankSuffix = (rank: number): string =>
  rank === 1 ? "[]" : `[${",".repeat(rank - 1)}]`;

/**
 * Runtime display form: "System.Collections.Generic.List`1[System.Int32]",
 * "System.Int32[,]", "System.Int32&".
 */
export const formatType = (type: TypeDescriptor): string => {
  switch (type.kind) {
    case "definition":
    case "abbreviation":
      return type.fullName;
    case "genericInstance":
      return `${type.definition.fullName}[${type.typeArguments.map(formatType).join(",")}]`;
    case "genericParameter":
      return type.name;
    case "array":
      return `${formatType(type.elementType)}${rankSuffix(type.rank)}`;
    case "byRef":
      return `${formatType(type.elementType)}&`;
    case "pointer":
      return `${formatType(type.elementType)}*`;
  }
};

/**
 * Short form used inside member signatures: "Int32", "Int32[]".
 */
export const shortTypeName = (type: TypeDescriptor): string => {
  switch (type.kind) {
    case "definition":
      return type.fullName.slice(type.fullName.lastIndexOf(".") + 1);
    case "array":
      return `${shortTypeName(type.elementType)}${rankSuffix(type.rank)}`;
    case "byRef":
      return `${shortTypeName(type.elementType)}&`;
    case "pointer":
      return `${shortTypeName(type.elementType)}*`;
    default:
      return formatType(type);
  }
};

const formatParameters = (parameters: readonly ParameterInfo[]): string =>
  parameters.map((p) => shortTypeName(p.type)).join(", ");

/**
 * Runtime display form of a member: "Int32 Add(Int32, Int32)",
 * "Void .ctor(Int32)", "T Identity[T](T)", "Int32 Item [Int32]".
 */
export const formatMember = (member: MemberInfo): string => {
  switch (member.memberKind) {
    case "property":
      return member.indexParameters.length > 0
        ? `${shortTypeName(member.type)} ${member.name} [${formatParameters(member.indexParameters)}]`
        : `${shortTypeName(member.type)} ${member.name}`;
    case "field":
      return `${shortTypeName(member.type)} ${member.name}`;
    case "method": {
      const generics = member.genericArguments ?? member.genericParameters;
      const genericSuffix =
        generics.length > 0
          ? `[${generics.map(shortTypeName).join(",")}]`
          : "";
      return `${shortTypeName(member.returnType)} ${member.name}${genericSuffix}(${formatParameters(member.parameters)})`;
    }
    case "constructor":
      return `Void .ctor(${formatParameters(member.parameters)})`;
  }
};
