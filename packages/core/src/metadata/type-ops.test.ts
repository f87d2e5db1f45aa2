/**
 * Tests for type operations
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  typesEqual,
  makeGenericType,
  makeArrayType,
  makeByRefType,
  makePointerType,
  substituteType,
  isAssignableTo,
  formatType,
  formatMember,
  genericParameter,
} from "./type-ops.js";
import { createSampleUniverse } from "../testing/sample-universes.js";
import { isDiagnosticError } from "../types/errors.js";

describe("Type Operations", () => {
  const design = createSampleUniverse("design");
  const runtime = createSampleUniverse("runtime");

  describe("typesEqual", () => {
    it("should compare definitions by identity", () => {
      expect(typesEqual(design.int32, design.int32)).to.equal(true);
      expect(typesEqual(design.int32, runtime.int32)).to.equal(false);
    });

    it("should compare generic instances structurally", () => {
      const a = makeGenericType(design.list, [design.int32]);
      const b = makeGenericType(design.list, [design.int32]);
      const c = makeGenericType(design.list, [runtime.int32]);
      expect(typesEqual(a, b)).to.equal(true);
      expect(typesEqual(a, c)).to.equal(false);
    });

    it("should distinguish array ranks", () => {
      expect(
        typesEqual(makeArrayType(design.int32), makeArrayType(design.int32, 1))
      ).to.equal(true);
      expect(
        typesEqual(makeArrayType(design.int32), makeArrayType(design.int32, 2))
      ).to.equal(false);
    });

    it("should distinguish by-ref from pointer", () => {
      expect(
        typesEqual(makeByRefType(design.int32), makePointerType(design.int32))
      ).to.equal(false);
    });
  });

  describe("makeGenericType", () => {
    it("should reject the wrong number of type arguments", () => {
      try {
        makeGenericType(design.dictionary, [design.int32]);
        expect.fail("expected an internal error");
      } catch (err) {
        expect(isDiagnosticError(err)).to.equal(true);
        if (isDiagnosticError(err)) {
          expect(err.kind).to.equal("InternalError");
          expect(err.diagnostic.code).to.equal("QSH6001");
        }
      }
    });
  });

  describe("substituteType", () => {
    it("should replace type and method parameters by position", () => {
      const t = genericParameter("T", 0, "type");
      const u = genericParameter("U", 0, "method");
      const open = makeGenericType(design.dictionary, [t, makeArrayType(u)]);
      const closed = substituteType(open, [design.int32], [design.string]);
      expect(formatType(closed)).to.equal(
        "System.Collections.Generic.Dictionary`2[System.Int32,System.String[]]"
      );
    });

    it("should keep parameters without an argument", () => {
      const t = genericParameter("T", 1, "type");
      expect(substituteType(t, [design.int32])).to.equal(t);
    });
  });

  describe("isAssignableTo", () => {
    it("should follow the base type chain", () => {
      const list = makeGenericType(design.list, [design.int32]);
      expect(isAssignableTo(list, design.object)).to.equal(true);
      expect(isAssignableTo(design.object, list)).to.equal(false);
    });
  });

  describe("formatType", () => {
    it("should render runtime display forms", () => {
      expect(formatType(makeArrayType(design.int32, 2))).to.equal(
        "System.Int32[,]"
      );
      expect(formatType(makeByRefType(design.int32))).to.equal("System.Int32&");
      expect(formatType(makePointerType(design.int32))).to.equal(
        "System.Int32*"
      );
      expect(
        formatType(makeGenericType(design.list, [design.string]))
      ).to.equal("System.Collections.Generic.List`1[System.String]");
    });
  });

  describe("formatMember", () => {
    it("should render method signatures with short type names", () => {
      expect(formatMember(design.members.add)).to.equal(
        "Int32 Add(Int32, Int32)"
      );
      expect(formatMember(design.members.identity)).to.equal(
        "T Identity[T](T)"
      );
    });

    it("should render constructors, fields and indexed properties", () => {
      expect(formatMember(design.members.calculatorCtor)).to.equal(
        "Void .ctor()"
      );
      expect(formatMember(design.members.total)).to.equal("Int32 Total");
      expect(formatMember(design.members.digits)).to.equal(
        "Int32 Digits [Int32]"
      );
    });
  });
});
