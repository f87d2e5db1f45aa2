/**
 * Member resolution across universes
 *
 * Resolve the declaring type first, then look the member up again on the
 * resolved type: properties and fields by name and binding flags, methods
 * and constructors by exact resolved signature.
 */

import type {
  TypeDescriptor,
  PropertyInfo,
  FieldInfo,
  MethodInfo,
  ConstructorInfo,
  BindingFlags,
} from "../metadata/types.js";
import { formatMember, formatType } from "../metadata/type-ops.js";
import { isStaticProperty } from "../metadata/reflection.js";
import type { DiagnosticCode } from "../types/diagnostic.js";
import { raise } from "../types/errors.js";
import type { Direction, ReplacerState } from "./types.js";
import { directionTag, log } from "./types.js";
import { resolveType } from "./type-resolution.js";

const memberNotFound = (
  code: DiagnosticCode,
  what: string,
  display: string,
  declaringType: TypeDescriptor
): never =>
  raise(
    "MemberNotFound",
    code,
    `${what} '${display}' of type '${formatType(declaringType)}' not found`
  );

export const resolveProperty = (
  state: ReplacerState,
  direction: Direction,
  property: PropertyInfo
): PropertyInfo => {
  if (property.origin === "provided") return property;

  const declaringType = resolveType(state, direction, property.declaringType);
  const isStatic = isStaticProperty(property);
  const flags: BindingFlags = {
    public: true,
    nonPublic: true,
    static: isStatic,
    instance: !isStatic,
  };
  return (
    state.reflection.getProperty(declaringType, property.name, flags) ??
    memberNotFound("QSH1101", "Property", formatMember(property), declaringType)
  );
};

export const resolveField = (
  state: ReplacerState,
  direction: Direction,
  field: FieldInfo
): FieldInfo => {
  if (field.origin === "provided") return field;

  const declaringType = resolveType(state, direction, field.declaringType);
  const flags: BindingFlags = {
    public: field.isPublic,
    nonPublic: !field.isPublic,
    static: field.isStatic,
    instance: !field.isStatic,
  };
  return (
    state.reflection.getField(declaringType, field.name, flags) ??
    memberNotFound("QSH1102", "Field", formatMember(field), declaringType)
  );
};

/**
 * Generic methods go through their open definition: resolve the definition
 * by its (resolved) parameter types, then instantiate it with the resolved
 * type arguments.
 */
export const resolveMethod = (
  state: ReplacerState,
  direction: Direction,
  method: MethodInfo
): MethodInfo => {
  if (method.origin === "provided") return method;

  const rt = (type: TypeDescriptor): TypeDescriptor =>
    resolveType(state, direction, type);
  const declaringType = rt(method.declaringType);

  const resolve = (): MethodInfo | undefined => {
    if (method.genericParameters.length === 0) {
      return state.reflection.getMethod(
        declaringType,
        method.name,
        method.parameters.map((p) => rt(p.type))
      );
    }
    const definition = method.genericDefinition ?? method;
    const definitionT = state.reflection.getMethod(
      declaringType,
      definition.name,
      definition.parameters.map((p) => rt(p.type))
    );
    if (!definitionT || !method.genericArguments) return definitionT;
    return state.reflection.makeGenericMethod(
      definitionT,
      method.genericArguments.map(rt)
    );
  };

  const resolved = resolve();
  if (!resolved) {
    return memberNotFound(
      "QSH1103",
      "Method",
      formatMember(method),
      declaringType
    );
  }
  log(
    state,
    `${directionTag(direction)} method ${formatMember(method)} --> ${formatMember(resolved)}`
  );
  return resolved;
};

export const resolveConstructor = (
  state: ReplacerState,
  direction: Direction,
  ctor: ConstructorInfo
): ConstructorInfo => {
  if (ctor.origin === "provided") return ctor;

  const declaringType = resolveType(state, direction, ctor.declaringType);
  return (
    state.reflection.getConstructor(
      declaringType,
      ctor.parameters.map((p) => resolveType(state, direction, p.type))
    ) ??
    memberNotFound("QSH1104", "Constructor", formatMember(ctor), declaringType)
  );
};
