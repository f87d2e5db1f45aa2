/**
 * @quoteshift/provided - host-defined declarations over retargeted bodies
 */

export type {
  InvokeCode,
  ProvidedParameter,
  ProvidedProperty,
  ProvidedConstructor,
  ProvidedMethod,
  ProvidedMember,
  ProvidedTypeOptions,
  ProvidedTypeDefinition,
} from "./provided-types.js";
export {
  PROVIDED_MODULE_NAME,
  OBJECT_METHOD_NAMES,
  createProvidedParameter,
  createProvidedProperty,
  createProvidedConstructor,
  createProvidedMethod,
  createProvidedTypeDefinition,
  visibleMethods,
  acceptsNull,
  isProvidedMember,
  getInvokerExpression,
  expandProvidedCalls,
} from "./provided-types.js";
export type { DeclarationFacade } from "./declaration-facade.js";
export { createDeclarationFacade } from "./declaration-facade.js";
