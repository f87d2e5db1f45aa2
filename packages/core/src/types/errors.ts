/**
 * Engine errors.
 *
 * The rewrite is synchronous and stops at the first failure, so deep
 * resolution code throws a DiagnosticError; session boundaries
 * (Replacer.tryRewrite) turn it back into a Result.
 */

import type { Diagnostic, DiagnosticCode } from "./diagnostic.js";
import { createDiagnostic } from "./diagnostic.js";
import type { Result } from "./result.js";
import { ok, error } from "./result.js";

export type RetargetErrorKind =
  | "TypeNotFound"
  | "AmbiguousType"
  | "MemberNotFound"
  | "UnsupportedConstruct"
  | "InvalidExpression"
  | "EvaluationError"
  | "InternalError";

export class DiagnosticError extends Error {
  readonly kind: RetargetErrorKind;
  readonly diagnostic: Diagnostic;

  constructor(kind: RetargetErrorKind, diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = "DiagnosticError";
    this.kind = kind;
    this.diagnostic = diagnostic;
  }
}

export const raise = (
  kind: RetargetErrorKind,
  code: DiagnosticCode,
  message: string,
  hint?: string
): never => {
  throw new DiagnosticError(
    kind,
    createDiagnostic(code, "error", message, hint)
  );
};

/**
 * Programming-error signal: the engine met a shape it cannot consume.
 */
export const internalError = (message: string): never =>
  raise("InternalError", "QSH6001", `ICE: ${message}`);

export const isDiagnosticError = (value: unknown): value is DiagnosticError =>
  value instanceof DiagnosticError;

/**
 * Run a throwing engine operation and capture its diagnostic.
 * Anything that is not a DiagnosticError is rethrown untouched.
 */
export const captureDiagnostic = <T>(
  operation: () => T
): Result<T, Diagnostic> => {
  try {
    return ok(operation());
  } catch (err) {
    if (isDiagnosticError(err)) {
      return error(err.diagnostic);
    }
    throw err;
  }
};
