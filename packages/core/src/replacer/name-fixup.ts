/**
 * Interactive-host name fix-up
 *
 * An interactive host compiles every submission into a fresh module and
 * prefixes each namespace with a submission segment, so one logical type
 * exists as "FSI_0001.Sample.Widget", "FSI_0002.Sample.Widget", ... while
 * the other universe knows it as "Sample.Widget".
 */

import type { ModuleHandle, TypeDefinition } from "../metadata/types.js";
import type { ReflectionService } from "../metadata/reflection.js";
import type { InteractiveHostNaming } from "./types.js";

/**
 * Strip the leading submission segment (everything up to the first '.').
 */
export const fixName = (
  naming: InteractiveHostNaming,
  fullName: string
): string =>
  fullName.startsWith(naming.namespacePrefix)
    ? fullName.substring(fullName.indexOf(".") + 1)
    : fullName;

export const isInteractiveModule = (
  naming: InteractiveHostNaming,
  module: ModuleHandle
): boolean => module.name.startsWith(naming.moduleNamePrefix);

/**
 * A type found in one module. `stable` is false when the match depends on
 * which submissions happen to exist, and must not be cached.
 */
export type TypeCandidate = {
  readonly type: TypeDefinition;
  readonly stable: boolean;
};

const byOrdinal = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

/**
 * Look a fixed-up full name up in one module.
 *
 * Interactive modules are scanned whole and the latest submission (the
 * lexicographically last full name) wins; the answer is unstable.
 */
export const findTypeInModule = (
  reflection: ReflectionService,
  naming: InteractiveHostNaming,
  fullName: string,
  module: ModuleHandle
): TypeCandidate | undefined => {
  if (isInteractiveModule(naming, module)) {
    const matches = reflection
      .getTypes(module)
      .filter((t) => fixName(naming, t.fullName) === fullName)
      .sort((a, b) => byOrdinal(a.fullName, b.fullName));
    const last = matches[matches.length - 1];
    return last ? { type: last, stable: false } : undefined;
  }

  const type = reflection.getType(module, fullName);
  return type ? { type, stable: true } : undefined;
};
