/**
 * Universe manifest schema and validation
 *
 * A universe manifest is a JSON description of one type universe: its
 * modules, their types and the members of each type. Type references are
 * runtime type strings (see type-string.ts).
 *
 * Validation is structural only. Type references are checked when the
 * manifest is linked into definitions (manifest-loader.ts).
 */

import type { Diagnostic, DiagnosticCode } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import type { UnionTagMember } from "./types.js";

// ═══════════════════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════════════════

export type ParameterEntry = {
  readonly name: string;
  readonly type: string;
};

export type FieldEntry = {
  readonly name: string;
  readonly type: string;
  readonly isStatic: boolean;
  readonly isPublic: boolean;
};

export type PropertyEntry = {
  readonly name: string;
  readonly type: string;
  readonly indexParameters: readonly ParameterEntry[];
  readonly canRead: boolean;
  readonly canWrite: boolean;
  readonly isStatic: boolean;
  readonly isPublic: boolean;
};

export type MethodEntry = {
  readonly name: string;
  readonly parameters: readonly ParameterEntry[];
  readonly returnType: string;
  readonly isStatic: boolean;
  readonly isPublic: boolean;
  readonly genericParameters: readonly string[];
};

export type ConstructorEntry = {
  readonly parameters: readonly ParameterEntry[];
  readonly isPublic: boolean;
};

export type UnionCaseEntry = {
  readonly name: string;
  readonly tag: number;
  readonly fields: readonly ParameterEntry[];
  readonly constructorName: string;
};

export type UnionEntry = {
  readonly cases: readonly UnionCaseEntry[];
  readonly tagMember: UnionTagMember;
};

export type RecordEntry = {
  readonly fields: readonly ParameterEntry[];
};

export type TypeEntry = {
  readonly fullName: string;
  readonly genericParameters: readonly string[];
  readonly baseType?: string;
  readonly fields: readonly FieldEntry[];
  readonly properties: readonly PropertyEntry[];
  readonly methods: readonly MethodEntry[];
  readonly constructors: readonly ConstructorEntry[];
  readonly union?: UnionEntry;
  readonly record?: RecordEntry;
};

export type ModuleEntry = {
  readonly name: string;
  readonly types: readonly TypeEntry[];
};

export type UniverseManifest = {
  readonly modules: readonly ModuleEntry[];
};

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

type JsonObject = Readonly<Record<string, unknown>>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isString = (value: unknown): value is string =>
  typeof value === "string";

const optionalBoolean = (value: unknown, fallback: boolean): boolean | undefined =>
  value === undefined ? fallback : typeof value === "boolean" ? value : undefined;

/**
 * Validation context: where we are in the file, and the diagnostics so far.
 */
type Context = {
  readonly file: string;
  readonly diagnostics: Diagnostic[];
};

const report = (
  ctx: Context,
  code: DiagnosticCode,
  where: string,
  message: string
): undefined => {
  ctx.diagnostics.push(
    createDiagnostic(code, "error", `${message} at ${where} in ${ctx.file}`)
  );
  return undefined;
};

/**
 * Validate every element of an optional array; invalid elements are
 * reported and dropped.
 */
const each = <T>(
  ctx: Context,
  code: DiagnosticCode,
  where: string,
  value: unknown,
  validate: (item: unknown, itemWhere: string) => T | undefined
): readonly T[] => {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    report(ctx, code, where, "Expected an array");
    return [];
  }
  const items: T[] = [];
  value.forEach((item: unknown, i) => {
    const validated = validate(item, `${where}[${i}]`);
    if (validated !== undefined) items.push(validated);
  });
  return items;
};

const validateParameter = (
  ctx: Context,
  item: unknown,
  where: string
): ParameterEntry | undefined => {
  if (!isObject(item) || !isString(item.name) || !isString(item.type)) {
    return report(ctx, "QSH9008", where, "Parameter needs string 'name' and 'type'");
  }
  return { name: item.name, type: item.type };
};

const parameters = (
  ctx: Context,
  where: string,
  value: unknown
): readonly ParameterEntry[] =>
  each(ctx, "QSH9008", where, value, (item, itemWhere) =>
    validateParameter(ctx, item, itemWhere)
  );

const validateField = (
  ctx: Context,
  item: unknown,
  where: string
): FieldEntry | undefined => {
  if (!isObject(item) || !isString(item.name) || !isString(item.type)) {
    return report(ctx, "QSH9008", where, "Field needs string 'name' and 'type'");
  }
  const isStatic = optionalBoolean(item.isStatic, false);
  const isPublic = optionalBoolean(item.isPublic, true);
  if (isStatic === undefined || isPublic === undefined) {
    return report(ctx, "QSH9008", where, "Field flags must be booleans");
  }
  return { name: item.name, type: item.type, isStatic, isPublic };
};

const validateProperty = (
  ctx: Context,
  item: unknown,
  where: string
): PropertyEntry | undefined => {
  if (!isObject(item) || !isString(item.name) || !isString(item.type)) {
    return report(ctx, "QSH9008", where, "Property needs string 'name' and 'type'");
  }
  const canRead = optionalBoolean(item.canRead, true);
  const canWrite = optionalBoolean(item.canWrite, false);
  const isStatic = optionalBoolean(item.isStatic, false);
  const isPublic = optionalBoolean(item.isPublic, true);
  if (
    canRead === undefined ||
    canWrite === undefined ||
    isStatic === undefined ||
    isPublic === undefined
  ) {
    return report(ctx, "QSH9008", where, "Property flags must be booleans");
  }
  if (!canRead && !canWrite) {
    return report(ctx, "QSH9008", where, "Property has neither getter nor setter");
  }
  return {
    name: item.name,
    type: item.type,
    indexParameters: parameters(ctx, `${where}.indexParameters`, item.indexParameters),
    canRead,
    canWrite,
    isStatic,
    isPublic,
  };
};

const genericParameterNames = (
  ctx: Context,
  code: DiagnosticCode,
  where: string,
  value: unknown
): readonly string[] =>
  each(ctx, code, where, value, (item, itemWhere) =>
    isString(item)
      ? item
      : report(ctx, code, itemWhere, "Generic parameter name must be a string")
  );

const validateMethod = (
  ctx: Context,
  item: unknown,
  where: string
): MethodEntry | undefined => {
  if (!isObject(item) || !isString(item.name) || !isString(item.returnType)) {
    return report(
      ctx,
      "QSH9008",
      where,
      "Method needs string 'name' and 'returnType'"
    );
  }
  const isStatic = optionalBoolean(item.isStatic, false);
  const isPublic = optionalBoolean(item.isPublic, true);
  if (isStatic === undefined || isPublic === undefined) {
    return report(ctx, "QSH9008", where, "Method flags must be booleans");
  }
  return {
    name: item.name,
    parameters: parameters(ctx, `${where}.parameters`, item.parameters),
    returnType: item.returnType,
    isStatic,
    isPublic,
    genericParameters: genericParameterNames(
      ctx,
      "QSH9008",
      `${where}.genericParameters`,
      item.genericParameters
    ),
  };
};

const validateConstructor = (
  ctx: Context,
  item: unknown,
  where: string
): ConstructorEntry | undefined => {
  if (!isObject(item)) {
    return report(ctx, "QSH9008", where, "Constructor must be an object");
  }
  const isPublic = optionalBoolean(item.isPublic, true);
  if (isPublic === undefined) {
    return report(ctx, "QSH9008", where, "Constructor flags must be booleans");
  }
  return {
    parameters: parameters(ctx, `${where}.parameters`, item.parameters),
    isPublic,
  };
};

const validateTagMember = (
  ctx: Context,
  value: unknown,
  where: string
): UnionTagMember | undefined => {
  if (!isObject(value) || !isString(value.name)) {
    return report(ctx, "QSH9011", where, "Tag member needs a string 'name'");
  }
  if (value.kind === "property") {
    return { kind: "property", name: value.name };
  }
  if (value.kind === "method") {
    const isStatic = optionalBoolean(value.isStatic, false);
    if (isStatic === undefined) {
      return report(ctx, "QSH9011", where, "'isStatic' must be a boolean");
    }
    return { kind: "method", name: value.name, isStatic };
  }
  return report(
    ctx,
    "QSH9011",
    where,
    "Tag member 'kind' must be 'property' or 'method'"
  );
};

const validateUnion = (
  ctx: Context,
  value: unknown,
  where: string
): UnionEntry | undefined => {
  if (!isObject(value)) {
    return report(ctx, "QSH9011", where, "Union shape must be an object");
  }
  const tagMember = validateTagMember(ctx, value.tagMember, `${where}.tagMember`);
  const cases = each(ctx, "QSH9011", `${where}.cases`, value.cases, (item, itemWhere) => {
    if (
      !isObject(item) ||
      !isString(item.name) ||
      typeof item.tag !== "number" ||
      !isString(item.constructorName)
    ) {
      return report(
        ctx,
        "QSH9011",
        itemWhere,
        "Union case needs 'name', numeric 'tag' and 'constructorName'"
      );
    }
    return {
      name: item.name,
      tag: item.tag,
      fields: parameters(ctx, `${itemWhere}.fields`, item.fields),
      constructorName: item.constructorName,
    };
  });
  if (!tagMember) return undefined;
  if (cases.length === 0) {
    return report(ctx, "QSH9011", where, "Union shape has no cases");
  }
  return { cases, tagMember };
};

const validateType = (
  ctx: Context,
  item: unknown,
  where: string
): TypeEntry | undefined => {
  if (!isObject(item) || !isString(item.fullName)) {
    return report(ctx, "QSH9007", where, "Type needs a string 'fullName'");
  }
  const { baseType, record } = item;
  if (baseType !== undefined && !isString(baseType)) {
    return report(ctx, "QSH9007", where, "'baseType' must be a type string");
  }
  if (record !== undefined && !isObject(record)) {
    return report(ctx, "QSH9011", `${where}.record`, "Record shape must be an object");
  }
  return {
    fullName: item.fullName,
    genericParameters: genericParameterNames(
      ctx,
      "QSH9007",
      `${where}.genericParameters`,
      item.genericParameters
    ),
    baseType,
    fields: each(ctx, "QSH9008", `${where}.fields`, item.fields, (f, w) =>
      validateField(ctx, f, w)
    ),
    properties: each(ctx, "QSH9008", `${where}.properties`, item.properties, (p, w) =>
      validateProperty(ctx, p, w)
    ),
    methods: each(ctx, "QSH9008", `${where}.methods`, item.methods, (m, w) =>
      validateMethod(ctx, m, w)
    ),
    constructors: each(
      ctx,
      "QSH9008",
      `${where}.constructors`,
      item.constructors,
      (c, w) => validateConstructor(ctx, c, w)
    ),
    union:
      item.union === undefined
        ? undefined
        : validateUnion(ctx, item.union, `${where}.union`),
    record: record
      ? { fields: parameters(ctx, `${where}.record.fields`, record.fields) }
      : undefined,
  };
};

const validateModule = (
  ctx: Context,
  item: unknown,
  where: string
): ModuleEntry | undefined => {
  if (!isObject(item) || !isString(item.name)) {
    return report(ctx, "QSH9006", where, "Module needs a string 'name'");
  }
  if (!Array.isArray(item.types)) {
    return report(ctx, "QSH9006", where, "Module needs a 'types' array");
  }
  return {
    name: item.name,
    types: each(ctx, "QSH9007", `${where}.types`, item.types, (t, w) =>
      validateType(ctx, t, w)
    ),
  };
};

/**
 * Validate that parsed JSON matches the UniverseManifest schema.
 */
export const validateUniverseManifest = (
  data: unknown,
  file: string
): Result<UniverseManifest, Diagnostic[]> => {
  if (!isObject(data)) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "QSH9004",
          "error",
          `Universe manifest must be an object, got ${Array.isArray(data) ? "array" : typeof data} in ${file}`
        ),
      ],
    };
  }

  const ctx: Context = { file, diagnostics: [] };

  if (!Array.isArray(data.modules)) {
    report(ctx, "QSH9005", "modules", "Missing or invalid 'modules' field");
    return { ok: false, error: ctx.diagnostics };
  }

  const modules = each(ctx, "QSH9005", "modules", data.modules, (m, w) =>
    validateModule(ctx, m, w)
  );

  if (ctx.diagnostics.length > 0) {
    return { ok: false, error: ctx.diagnostics };
  }
  return { ok: true, value: { modules } };
};
