/**
 * Variable identity across universes
 *
 * A variable is only equal to itself, so a rewritten tree cannot simply
 * mint a look-alike for every occurrence. Forward rewrites are memoized:
 * an origin variable always maps to one target variable, and that target
 * variable maps back to the exact original. Backward rewrites hand user
 * code fresh variables (each body invocation is its own context) and
 * remember where they came from so the body's result maps back.
 */

import type { Var } from "../expr/types.js";
import { createVar } from "../expr/factory.js";
import { isHostDefined } from "../metadata/type-ops.js";
import type {
  Direction,
  ReplacerState,
  VariableTable,
  VariableScope,
} from "./types.js";
import { resolveType } from "./type-resolution.js";

export const createVariableTable = (): VariableTable => ({
  forward: new Map(),
  backward: new Map(),
});

const manufacture = (
  state: ReplacerState,
  direction: Direction,
  variable: Var
): Var =>
  createVar(
    variable.name,
    resolveType(state, direction, variable.type),
    variable.isMutable
  );

export const rewriteVariable = (
  state: ReplacerState,
  direction: Direction,
  variable: Var,
  scope?: VariableScope
): Var => {
  if (isHostDefined(variable.type)) return variable;

  const table = state.variables;

  if (direction === "forward") {
    const known = table.forward.get(variable.id);
    if (known) return known;
    // A variable local to the tree: reuse it from now on
    const created = manufacture(state, direction, variable);
    table.forward.set(variable.id, created);
    table.backward.set(created.id, variable);
    return created;
  }

  const original = table.backward.get(variable.id);
  if (original) return original;
  const inScope = scope?.get(variable.id);
  if (inScope) return inScope;

  const created = manufacture(state, direction, variable);
  table.forward.set(created.id, variable);
  scope?.set(variable.id, created);
  return created;
};
