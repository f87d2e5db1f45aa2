/**
 * Canonical intrinsic types.
 *
 * These belong to no universe. `voidType` is what every void-typed
 * resolution returns, whichever universe the caller asked for;
 * `booleanType` types comparison operators and union case tests.
 */

import type { TypeDefinition, TypeMembers } from "./types.js";

export const INTRINSIC_MODULE_NAME = "<intrinsic>";

export const VOID_TYPE_NAME = "System.Void";

const noMembers: TypeMembers = {
  fields: [],
  properties: [],
  methods: [],
  constructors: [],
};

export const voidType: TypeDefinition = {
  kind: "definition",
  fullName: VOID_TYPE_NAME,
  moduleName: INTRINSIC_MODULE_NAME,
  genericParameters: [],
  origin: "metadata",
  members: noMembers,
};

export const booleanType: TypeDefinition = {
  kind: "definition",
  fullName: "System.Boolean",
  moduleName: INTRINSIC_MODULE_NAME,
  genericParameters: [],
  origin: "metadata",
  members: noMembers,
};
