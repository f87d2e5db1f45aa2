/**
 * Replacer Shared Types and State
 *
 * Leaf module for the replacer: configuration, direction, and the
 * ReplacerState every resolution function receives. The state is the one
 * piece of mutable data in a retargeting session; all functions sharing a
 * ReplacerState see the same caches and the same variable table.
 */

import type {
  TypeDefinition,
  TypeUniverse,
} from "../metadata/types.js";
import type { ReflectionService } from "../metadata/reflection.js";
import type { Var } from "../expr/types.js";

/**
 * forward: origin universe → target universe
 * backward: target universe → origin universe
 */
export type Direction = "forward" | "backward";

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Naming scheme of an interactive host that compiles each submission into
 * its own module and prefixes every namespace with a submission segment
 * ("FSI_0002.Sample.Widget").
 */
export type InteractiveHostNaming = {
  /** Leading namespace segment prefix stripped before lookup */
  readonly namespacePrefix: string;
  /** Modules whose name starts with this are searched exhaustively */
  readonly moduleNamePrefix: string;
};

export const DEFAULT_INTERACTIVE_HOST_NAMING: InteractiveHostNaming = {
  namespacePrefix: "FSI_",
  moduleNamePrefix: "FSI-ASSEMBLY",
};

export type ReplacerConfig = {
  /** Universe the declaration bodies are authored against */
  readonly origin: TypeUniverse;
  /** Universe the externally visible signatures must be valid in */
  readonly target: TypeUniverse;
  /** Defaults to createMetadataReflection() */
  readonly reflection?: ReflectionService;
  /** Log every resolution to the console */
  readonly verbose?: boolean;
  readonly interactiveHost?: Partial<InteractiveHostNaming>;
};

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Variable identity records, keyed by variable id.
 *
 * forward: variable → variable a later forward rewrite must return
 * backward: forward-produced variable → the variable it was produced from
 */
export type VariableTable = {
  readonly forward: Map<number, Var>;
  readonly backward: Map<number, Var>;
};

/**
 * Per-rewrite record of backward-manufactured variables, so every
 * occurrence of one binder inside a single rewrite gets the same variable.
 */
export type VariableScope = Map<number, Var>;

export type ReplacerState = {
  readonly origin: TypeUniverse;
  readonly target: TypeUniverse;
  readonly reflection: ReflectionService;
  readonly verbose: boolean;
  readonly naming: InteractiveHostNaming;

  // Append-only caches, stable matches only
  readonly typeCacheForward: Map<TypeDefinition, TypeDefinition>;
  readonly typeCacheBackward: Map<TypeDefinition, TypeDefinition>;

  readonly variables: VariableTable;
};

export const destinationUniverse = (
  state: ReplacerState,
  direction: Direction
): TypeUniverse => (direction === "forward" ? state.target : state.origin);

export const typeCache = (
  state: ReplacerState,
  direction: Direction
): Map<TypeDefinition, TypeDefinition> =>
  direction === "forward" ? state.typeCacheForward : state.typeCacheBackward;

export const directionTag = (direction: Direction): string =>
  direction === "forward" ? "fwd" : "bwd";

export const log = (state: ReplacerState, message: string): void => {
  if (state.verbose) {
    console.log(`[Replacer] ${message}`);
  }
};
