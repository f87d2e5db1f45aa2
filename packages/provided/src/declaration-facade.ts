/**
 * DeclarationFacade
 *
 * Builds provided declarations whose bodies are written against the origin
 * universe while their signatures and spliced bodies live in the target
 * universe. Signature types are moved to the target when the declaration
 * is made; bodies are moved at each call site: arguments go back to the
 * origin, the user code runs, its result goes forward to the target.
 */

import type { Replacer, TypeDescriptor } from "@quoteshift/core";
import type {
  InvokeCode,
  ProvidedConstructor,
  ProvidedMethod,
  ProvidedParameter,
  ProvidedProperty,
  ProvidedTypeDefinition,
  ProvidedTypeOptions,
} from "./provided-types.js";
import {
  createProvidedConstructor,
  createProvidedMethod,
  createProvidedParameter,
  createProvidedProperty,
  createProvidedTypeDefinition,
  PROVIDED_MODULE_NAME,
} from "./provided-types.js";

export interface DeclarationFacade {
  readonly replacer: Replacer;

  providedParameter(name: string, type: TypeDescriptor): ProvidedParameter;
  providedProperty(
    name: string,
    type: TypeDescriptor,
    getterCode: InvokeCode,
    isStatic?: boolean
  ): ProvidedProperty;
  /** `parameters` come from providedParameter and are already retargeted */
  providedConstructor(
    parameters: readonly ProvidedParameter[],
    invokeCode: InvokeCode
  ): ProvidedConstructor;
  providedMethod(
    name: string,
    parameters: readonly ProvidedParameter[],
    resultType: TypeDescriptor,
    isStatic: boolean,
    invokeCode: InvokeCode
  ): ProvidedMethod;
  providedTypeDefinition(
    name: string,
    baseType: TypeDescriptor,
    options?: ProvidedTypeOptions
  ): ProvidedTypeDefinition;
  providedTypeDefinitionIn(
    moduleName: string,
    namespace: string,
    typeName: string,
    baseType: TypeDescriptor,
    options?: ProvidedTypeOptions
  ): ProvidedTypeDefinition;
}

export const createDeclarationFacade = (
  replacer: Replacer
): DeclarationFacade => {
  const toTarget = (type: TypeDescriptor): TypeDescriptor =>
    replacer.typeToTarget(type);

  const retargetBody =
    (code: InvokeCode): InvokeCode =>
    (args) =>
      replacer.exprToTarget(code(args.map((arg) => replacer.exprToOrigin(arg))));

  return {
    replacer,

    providedParameter: (name, type) =>
      createProvidedParameter(name, toTarget(type)),

    providedProperty: (name, type, getterCode, isStatic = false) =>
      createProvidedProperty(
        name,
        toTarget(type),
        retargetBody(getterCode),
        isStatic
      ),

    providedConstructor: (parameters, invokeCode) =>
      createProvidedConstructor(parameters, retargetBody(invokeCode)),

    providedMethod: (name, parameters, resultType, isStatic, invokeCode) =>
      createProvidedMethod(
        name,
        parameters,
        toTarget(resultType),
        isStatic,
        retargetBody(invokeCode)
      ),

    providedTypeDefinition: (name, baseType, options) =>
      createProvidedTypeDefinition(
        name,
        toTarget(baseType),
        options,
        PROVIDED_MODULE_NAME
      ),

    providedTypeDefinitionIn: (
      moduleName,
      namespace,
      typeName,
      baseType,
      options
    ) =>
      createProvidedTypeDefinition(
        typeName,
        toTarget(baseType),
        options,
        moduleName,
        namespace
      ),
  };
};
