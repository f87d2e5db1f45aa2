/**
 * Universe manifest loader - reads a manifest file, validates it and links
 * it into an in-memory type universe.
 *
 * Linking happens in two passes: every type of every module is defined
 * first, so that members, base types and shapes can refer to any type of
 * the manifest regardless of declaration order.
 */

import * as fs from "fs";
import * as path from "path";
import type { Result } from "../types/result.js";
import type { Diagnostic, DiagnosticCode } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type {
  TypeDescriptor,
  TypeDefinition,
  TypeUniverse,
  GenericParameterType,
  ParameterInfo,
} from "./types.js";
import type { ModuleBuilder, TypeBuilder } from "./builder.js";
import { createModule } from "./builder.js";
import {
  genericParameter,
  makeGenericType,
  makeArrayType,
  makeByRefType,
  makePointerType,
  parametersMatch,
} from "./type-ops.js";
import { voidType, VOID_TYPE_NAME } from "./intrinsics.js";
import type { TypeSyntax } from "./type-string.js";
import { parseTypeString, arityOf } from "./type-string.js";
import type {
  UniverseManifest,
  TypeEntry,
  ParameterEntry,
} from "./manifest.js";
import { validateUniverseManifest } from "./manifest.js";

// ═══════════════════════════════════════════════════════════════════════════
// LINKING
// ═══════════════════════════════════════════════════════════════════════════

type DefinedModule = {
  readonly builder: ModuleBuilder;
  readonly types: Map<string, TypeBuilder>;
};

type LinkContext = {
  readonly file: string;
  readonly modules: readonly DefinedModule[];
  readonly diagnostics: Diagnostic[];
};

/**
 * Generic parameters visible to a type reference.
 */
type Scope = {
  readonly module: DefinedModule;
  readonly typeParameters: readonly GenericParameterType[];
  readonly methodParameters: readonly GenericParameterType[];
};

const report = (
  ctx: LinkContext,
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
 * A type name resolves in its own module first, then in module order.
 */
const lookupDefinition = (
  ctx: LinkContext,
  scope: Scope,
  fullName: string
): TypeDefinition | undefined =>
  (
    scope.module.types.get(fullName) ??
    ctx.modules
      .map((m) => m.types.get(fullName))
      .find((builder) => builder !== undefined)
  )?.definition;

const linkSyntax = (
  ctx: LinkContext,
  scope: Scope,
  where: string,
  syntax: TypeSyntax
): TypeDescriptor | undefined => {
  switch (syntax.kind) {
    case "array": {
      const element = linkSyntax(ctx, scope, where, syntax.elementType);
      return element ? makeArrayType(element, syntax.rank) : undefined;
    }
    case "byRef": {
      const element = linkSyntax(ctx, scope, where, syntax.elementType);
      return element ? makeByRefType(element) : undefined;
    }
    case "pointer": {
      const element = linkSyntax(ctx, scope, where, syntax.elementType);
      return element ? makePointerType(element) : undefined;
    }
    case "named":
      break;
  }

  if (syntax.typeArguments.length === 0) {
    const parameter =
      scope.methodParameters.find((p) => p.name === syntax.name) ??
      scope.typeParameters.find((p) => p.name === syntax.name);
    if (parameter) return parameter;
  }

  const definition = lookupDefinition(ctx, scope, syntax.name);
  if (!definition) {
    if (syntax.name === VOID_TYPE_NAME) return voidType;
    return report(ctx, "QSH9009", where, `Unknown type '${syntax.name}'`);
  }
  if (syntax.typeArguments.length === 0) return definition;

  if (syntax.typeArguments.length !== definition.genericParameters.length) {
    return report(
      ctx,
      "QSH9012",
      where,
      `'${syntax.name}' takes ${definition.genericParameters.length} type arguments, got ${syntax.typeArguments.length}`
    );
  }
  const typeArguments: TypeDescriptor[] = [];
  for (const argument of syntax.typeArguments) {
    const linked = linkSyntax(ctx, scope, where, argument);
    if (!linked) return undefined;
    typeArguments.push(linked);
  }
  return makeGenericType(definition, typeArguments);
};

const linkType = (
  ctx: LinkContext,
  scope: Scope,
  where: string,
  text: string
): TypeDescriptor | undefined => {
  const syntax = parseTypeString(text);
  if (!syntax) {
    return report(ctx, "QSH9009", where, `Malformed type string '${text}'`);
  }
  return linkSyntax(ctx, scope, where, syntax);
};

const linkParameters = (
  ctx: LinkContext,
  scope: Scope,
  where: string,
  entries: readonly ParameterEntry[]
): readonly ParameterInfo[] | undefined => {
  const linked = entries.map((entry, i) => ({
    name: entry.name,
    type: linkType(ctx, scope, `${where}[${i}]`, entry.type),
  }));
  const complete: ParameterInfo[] = [];
  for (const { name, type } of linked) {
    if (!type) return undefined;
    complete.push({ name, type });
  }
  return complete;
};

const linkMembers = (
  ctx: LinkContext,
  module: DefinedModule,
  builder: TypeBuilder,
  entry: TypeEntry,
  where: string
): void => {
  const scope: Scope = {
    module,
    typeParameters: builder.definition.genericParameters,
    methodParameters: [],
  };

  if (entry.baseType !== undefined) {
    const baseType = linkType(ctx, scope, `${where}.baseType`, entry.baseType);
    if (baseType) builder.setBaseType(baseType);
  }

  entry.fields.forEach((field, i) => {
    const type = linkType(ctx, scope, `${where}.fields[${i}]`, field.type);
    if (type) {
      builder.addField({
        name: field.name,
        type,
        isStatic: field.isStatic,
        isPublic: field.isPublic,
      });
    }
  });

  entry.properties.forEach((property, i) => {
    const propertyWhere = `${where}.properties[${i}]`;
    const type = linkType(ctx, scope, propertyWhere, property.type);
    const indexParameters = linkParameters(
      ctx,
      scope,
      `${propertyWhere}.indexParameters`,
      property.indexParameters
    );
    if (!type || !indexParameters) return;
    const accessor = { isStatic: property.isStatic, isPublic: property.isPublic };
    builder.addProperty({
      name: property.name,
      type,
      indexParameters,
      getter: property.canRead ? accessor : undefined,
      setter: property.canWrite ? accessor : undefined,
    });
  });

  entry.methods.forEach((method, i) => {
    const methodWhere = `${where}.methods[${i}]`;
    const methodScope: Scope = {
      ...scope,
      methodParameters: method.genericParameters.map((name, position) =>
        genericParameter(name, position, "method")
      ),
    };
    const parameters = linkParameters(
      ctx,
      methodScope,
      `${methodWhere}.parameters`,
      method.parameters
    );
    const returnType = linkType(
      ctx,
      methodScope,
      `${methodWhere}.returnType`,
      method.returnType
    );
    if (!parameters || !returnType) return;
    builder.addMethod({
      name: method.name,
      parameters,
      returnType,
      isStatic: method.isStatic,
      isPublic: method.isPublic,
      genericParameters: methodScope.methodParameters,
    });
  });

  entry.constructors.forEach((ctor, i) => {
    const parameters = linkParameters(
      ctx,
      scope,
      `${where}.constructors[${i}].parameters`,
      ctor.parameters
    );
    if (parameters) {
      builder.addConstructor({ parameters, isPublic: ctor.isPublic });
    }
  });

  const { members } = builder.definition;

  if (entry.union) {
    const unionWhere = `${where}.union`;
    const cases = entry.union.cases.map((c, i) => ({
      name: c.name,
      tag: c.tag,
      fields:
        linkParameters(ctx, scope, `${unionWhere}.cases[${i}].fields`, c.fields) ??
        [],
      constructorName: c.constructorName,
    }));
    for (const c of cases) {
      if (!members.methods.some((m) => m.name === c.constructorName && m.isStatic)) {
        report(
          ctx,
          "QSH9011",
          unionWhere,
          `Union case '${c.name}' names missing static constructor '${c.constructorName}'`
        );
      }
    }
    const { tagMember } = entry.union;
    const hasTagMember =
      tagMember.kind === "property"
        ? members.properties.some((p) => p.name === tagMember.name)
        : members.methods.some(
            (m) => m.name === tagMember.name && m.isStatic === tagMember.isStatic
          );
    if (!hasTagMember) {
      report(
        ctx,
        "QSH9011",
        unionWhere,
        `Tag ${tagMember.kind} '${tagMember.name}' is not declared`
      );
    }
    builder.setUnion({ cases, tagMember });
  }

  if (entry.record) {
    const fields = linkParameters(
      ctx,
      scope,
      `${where}.record.fields`,
      entry.record.fields
    );
    if (fields) {
      const fieldTypes = fields.map((f) => f.type);
      if (!members.constructors.some((c) => parametersMatch(c.parameters, fieldTypes))) {
        report(
          ctx,
          "QSH9011",
          `${where}.record`,
          "Record has no constructor taking its fields in order"
        );
      }
      builder.setRecord({ fields });
    }
  }
};

/**
 * Link a validated manifest into a type universe.
 */
export const linkUniverseManifest = (
  manifest: UniverseManifest,
  file: string
): Result<TypeUniverse, Diagnostic[]> => {
  const diagnostics: Diagnostic[] = [];
  const modules: DefinedModule[] = [];
  const defined: {
    readonly module: DefinedModule;
    readonly builder: TypeBuilder;
    readonly entry: TypeEntry;
    readonly where: string;
  }[] = [];
  const ctx: LinkContext = { file, modules, diagnostics };

  // Pass 1: define every type
  manifest.modules.forEach((moduleEntry, m) => {
    const module: DefinedModule = {
      builder: createModule(moduleEntry.name),
      types: new Map(),
    };
    moduleEntry.types.forEach((entry, t) => {
      const where = `modules[${m}].types[${t}]`;
      if (module.types.has(entry.fullName)) {
        report(ctx, "QSH9010", where, `Duplicate type '${entry.fullName}'`);
        return;
      }
      if (arityOf(entry.fullName) !== entry.genericParameters.length) {
        report(
          ctx,
          "QSH9012",
          where,
          `'${entry.fullName}' declares ${entry.genericParameters.length} generic parameters`
        );
        return;
      }
      const builder = module.builder.defineType({
        fullName: entry.fullName,
        genericParameters: entry.genericParameters,
      });
      module.types.set(entry.fullName, builder);
      defined.push({ module, builder, entry, where });
    });
    modules.push(module);
  });

  // Pass 2: members, base types and shapes
  for (const { module, builder, entry, where } of defined) {
    linkMembers(ctx, module, builder, entry, where);
  }

  if (ctx.diagnostics.length > 0) {
    return { ok: false, error: ctx.diagnostics };
  }
  return { ok: true, value: modules.map((m) => m.builder.module) };
};

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINTS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Parse, validate and link manifest JSON text.
 */
export const parseUniverseManifest = (
  json: string,
  filePath: string
): Result<TypeUniverse, Diagnostic[]> => {
  const file = path.basename(filePath);

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "QSH9003",
          "error",
          `Invalid JSON in universe manifest ${file}: ${error}`
        ),
      ],
    };
  }

  const validation = validateUniverseManifest(parsed, file);
  if (!validation.ok) {
    return validation;
  }
  return linkUniverseManifest(validation.value, file);
};

/**
 * Load a universe manifest file.
 *
 * @param filePath - Path to the manifest JSON file
 */
export const loadUniverseManifest = (
  filePath: string
): Result<TypeUniverse, Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "QSH9001",
          "error",
          `Universe manifest not found: ${filePath}`
        ),
      ],
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "QSH9002",
          "error",
          `Failed to read universe manifest: ${error}`
        ),
      ],
    };
  }

  return parseUniverseManifest(content, filePath);
};
