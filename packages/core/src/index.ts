/**
 * @quoteshift/core - expression-tree retargeting between type universes
 */

// Diagnostics and results
export type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticSeverity,
} from "./types/diagnostic.js";
export {
  createDiagnostic,
  formatDiagnostic,
} from "./types/diagnostic.js";
export type { Result } from "./types/result.js";
export { ok, error } from "./types/result.js";
export type { RetargetErrorKind } from "./types/errors.js";
export {
  DiagnosticError,
  raise,
  internalError,
  isDiagnosticError,
  captureDiagnostic,
} from "./types/errors.js";

// Metadata
export type * from "./metadata/types.js";
export {
  typesEqual,
  parametersMatch,
  definitionOf,
  isHostDefined,
  genericParameter,
  makeGenericType,
  makeArrayType,
  makeByRefType,
  makePointerType,
  substituteType,
  isAssignableTo,
  formatType,
  shortTypeName,
  formatMember,
} from "./metadata/type-ops.js";
export {
  INTRINSIC_MODULE_NAME,
  VOID_TYPE_NAME,
  voidType,
  booleanType,
} from "./metadata/intrinsics.js";
export type {
  TypeInit,
  FieldInit,
  PropertyInit,
  MethodInit,
  ConstructorInit,
  TypeBuilder,
  ModuleBuilder,
} from "./metadata/builder.js";
export { createTypeBuilder, createModule } from "./metadata/builder.js";
export type { ReflectionService } from "./metadata/reflection.js";
export {
  ALL_MEMBERS,
  isStaticProperty,
  isPublicProperty,
  createMetadataReflection,
} from "./metadata/reflection.js";
export type { TypeSyntax } from "./metadata/type-string.js";
export { parseTypeString } from "./metadata/type-string.js";
export type { UniverseManifest } from "./metadata/manifest.js";
export {
  loadUniverseManifest,
  parseUniverseManifest,
  linkUniverseManifest,
} from "./metadata/manifest-loader.js";

// Expressions
export type * from "./expr/types.js";
export { exprType } from "./expr/expr-type.js";
export * from "./expr/factory.js";
export {
  isCombination,
  combinationChildren,
  rebuildCombination,
  mapChildren,
} from "./expr/shape.js";
export type { EvaluationOptions, Closure } from "./eval/evaluator.js";
export { evaluate } from "./eval/evaluator.js";

// Retargeting
export type {
  Direction,
  InteractiveHostNaming,
  ReplacerConfig,
  ReplacerState,
} from "./replacer/types.js";
export { DEFAULT_INTERACTIVE_HOST_NAMING } from "./replacer/types.js";
export type { Replacer } from "./replacer/replacer.js";
export { createReplacer, createReplacerState } from "./replacer/replacer.js";
