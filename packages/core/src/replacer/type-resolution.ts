/**
 * Type resolution across universes
 *
 * Maps a type descriptor of the source universe to the structurally
 * corresponding descriptor of the destination universe. Composite types are
 * taken apart and rebuilt; only nominal definitions are looked up, by
 * full name, in every module of the destination universe.
 */

import type {
  TypeDescriptor,
  TypeDefinition,
  TypeUniverse,
} from "../metadata/types.js";
import {
  makeGenericType,
  makeArrayType,
  makeByRefType,
  makePointerType,
  formatType,
  isHostDefined,
} from "../metadata/type-ops.js";
import { voidType, VOID_TYPE_NAME } from "../metadata/intrinsics.js";
import { raise } from "../types/errors.js";
import type { Direction, ReplacerState } from "./types.js";
import {
  destinationUniverse,
  typeCache,
  directionTag,
  log,
} from "./types.js";
import { fixName, findTypeInModule } from "./name-fixup.js";
import type { TypeCandidate } from "./name-fixup.js";

export const formatUniverse = (universe: TypeUniverse): string =>
  `[${universe.map((m) => m.name).join("; ")}]`;

/**
 * Keep one candidate per definition; a definition seen in several modules
 * is stable only if every sighting was.
 */
const distinctCandidates = (
  candidates: readonly TypeCandidate[]
): readonly TypeCandidate[] => {
  const byType = new Map<TypeDefinition, TypeCandidate>();
  for (const candidate of candidates) {
    const seen = byType.get(candidate.type);
    byType.set(
      candidate.type,
      seen
        ? { type: candidate.type, stable: seen.stable && candidate.stable }
        : candidate
    );
  }
  return [...byType.values()];
};

const ambiguous = (
  direction: Direction,
  type: TypeDescriptor,
  universe: TypeUniverse
): never =>
  direction === "forward"
    ? raise(
        "AmbiguousType",
        "QSH1002",
        `The type '${formatType(type)}' utilized by a type provider was found in multiple modules in the reference module set '${formatUniverse(universe)}'. You may need to adjust your module references to avoid ambiguities.`
      )
    : raise(
        "AmbiguousType",
        "QSH1002",
        `The type '${formatType(type)}' utilized by a type provider was found in multiple modules in the module set '${formatUniverse(universe)}' used by the type provider itself. Please report this problem to the project site for the type provider.`
      );

const notFound = (
  direction: Direction,
  type: TypeDescriptor,
  universe: TypeUniverse
): never =>
  direction === "forward"
    ? raise(
        "TypeNotFound",
        "QSH1001",
        `The type '${formatType(type)}' utilized by a type provider was not found in reference module set '${formatUniverse(universe)}'. You may be referencing a portable profile which contains fewer types than those needed by the type provider you are using.`,
        "Check that every module the provided declarations depend on is referenced."
      )
    : raise(
        "TypeNotFound",
        "QSH1001",
        `The runtime type '${formatType(type)}' utilized by a type provider was not found in the compilation-time module set '${formatUniverse(universe)}'. You may be referencing a portable profile which contains fewer types than those needed by the type provider you are using. Please report this problem to the project site for the type provider.`,
        "Check that every module the provided declarations depend on is referenced."
      );

/**
 * Resolve a nominal definition (non-generic type or open generic
 * definition) by name.
 */
export const resolveDefinition = (
  state: ReplacerState,
  direction: Direction,
  definition: TypeDefinition
): TypeDefinition => {
  if (isHostDefined(definition)) return definition;

  const cache = typeCache(state, direction);
  const cached = cache.get(definition);
  if (cached) return cached;

  const fullName = fixName(state.naming, definition.fullName);

  // Hosts compare void against their own canonical void type, whatever
  // universe the signature came from.
  if (fullName === VOID_TYPE_NAME) return voidType;

  const universe = destinationUniverse(state, direction);
  const candidates = distinctCandidates(
    universe.flatMap((module) => {
      const found = findTypeInModule(
        state.reflection,
        state.naming,
        fullName,
        module
      );
      return found ? [found] : [];
    })
  );

  const [only, ...rest] = candidates;
  if (!only) return notFound(direction, definition, universe);
  if (rest.length > 0) return ambiguous(direction, definition, universe);

  if (only.stable) cache.set(definition, only.type);
  log(
    state,
    `${directionTag(direction)} ${formatType(definition)} --> ${formatType(only.type)}${only.stable ? "" : " (unstable)"}`
  );
  return only.type;
};

/**
 * Resolve any type descriptor into the destination universe.
 */
export const resolveType = (
  state: ReplacerState,
  direction: Direction,
  type: TypeDescriptor
): TypeDescriptor => {
  if (isHostDefined(type)) return type;

  switch (type.kind) {
    case "abbreviation":
    case "genericParameter":
      return type;

    case "genericInstance":
      return makeGenericType(
        resolveDefinition(state, direction, type.definition),
        type.typeArguments.map((arg) => resolveType(state, direction, arg))
      );

    case "array":
      return makeArrayType(
        resolveType(state, direction, type.elementType),
        type.rank
      );

    case "byRef":
      return makeByRefType(resolveType(state, direction, type.elementType));

    case "pointer":
      return makePointerType(resolveType(state, direction, type.elementType));

    case "definition":
      return resolveDefinition(state, direction, type);
  }
};
