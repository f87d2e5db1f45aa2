/**
 * Tests for desugaring before crossing universes
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { desugar, isDesugarable } from "./desugar.js";
import {
  createVar,
  makeApplication,
  makeNewRecord,
  makeNewUnionCase,
  makeUnionCaseTest,
  makeValue,
  makeVar,
} from "../expr/factory.js";
import type { ReflectionService } from "../metadata/reflection.js";
import { createMetadataReflection } from "../metadata/reflection.js";
import { formatType, makeGenericType } from "../metadata/type-ops.js";
import type { TypeDescriptor, UnionCaseInfo } from "../metadata/types.js";
import {
  createSampleUniverse,
  functionType,
} from "../testing/sample-universes.js";
import { captureDiagnostic } from "../types/errors.js";

describe("Desugar", () => {
  const reflection = createMetadataReflection();
  const design = createSampleUniverse("design");
  const three = makeValue(3, design.int32);

  const caseOf = (type: TypeDescriptor, name: string): UnionCaseInfo => {
    const found = reflection.getUnionCases(type).find((c) => c.name === name);
    if (!found) throw new Error(`no case ${name}`);
    return found;
  };

  it("should recognise only the sugar kinds", () => {
    expect(isDesugarable(makeApplication(three, three))).to.equal(true);
    expect(isDesugarable(makeNewRecord(design.point, [three, three]))).to.equal(true);
    expect(isDesugarable(three)).to.equal(false);
  });

  describe("application", () => {
    it("should become a call to Invoke on the function value", () => {
      const f = makeVar(createVar("f", functionType(design, design.int32, design.string)));

      const result = desugar(reflection, makeApplication(f, three));

      expect(result.kind).to.equal("call");
      if (result.kind === "call") {
        expect(result.object).to.equal(f);
        expect(result.method.name).to.equal("Invoke");
        expect(formatType(result.method.returnType)).to.equal("System.String");
        expect(result.args).to.deep.equal([three]);
      }
    });

    it("should fail when the applied value has no Invoke", () => {
      const result = captureDiagnostic(() =>
        desugar(reflection, makeApplication(three, three))
      );

      expect(result.ok ? undefined : result.error.code).to.equal("QSH1103");
      expect(result.ok ? undefined : result.error.message).to.equal(
        "Method 'Invoke' of type 'System.Int32' not found"
      );
    });
  });

  describe("construction", () => {
    it("should turn a union case into its static constructor call", () => {
      const some = caseOf(makeGenericType(design.option, [design.int32]), "Some");

      const result = desugar(reflection, makeNewUnionCase(some, [three]));

      expect(result.kind).to.equal("call");
      if (result.kind === "call") {
        expect(result.object).to.equal(undefined);
        expect(result.method.name).to.equal("NewSome");
        expect(result.method.isStatic).to.equal(true);
        expect(result.args).to.deep.equal([three]);
      }
    });

    it("should turn a record into its constructor", () => {
      const four = makeValue(4, design.int32);

      const result = desugar(reflection, makeNewRecord(design.point, [three, four]));

      expect(result.kind).to.equal("newObject");
      if (result.kind === "newObject") {
        expect(result.ctor.declaringType).to.equal(design.point);
        expect(result.ctor.parameters.map((p) => p.name)).to.deep.equal(["x", "y"]);
        expect(result.args).to.deep.equal([three, four]);
      }
    });
  });

  describe("union case tests", () => {
    it("should compare an instance tag property", () => {
      const optionOfInt = makeGenericType(design.option, [design.int32]);
      const o = makeVar(createVar("o", optionOfInt));

      const result = desugar(reflection, makeUnionCaseTest(o, caseOf(optionOfInt, "Some")));

      expect(result.kind).to.equal("operator");
      if (result.kind === "operator") {
        expect(result.operator).to.equal("equals");
        expect(result.left.kind).to.equal("propertyGet");
        if (result.left.kind === "propertyGet") {
          expect(result.left.object).to.equal(o);
          expect(result.left.property.name).to.equal("Tag");
        }
        expect(result.right).to.deep.equal(makeValue(1, design.int32));
      }
    });

    it("should pass the value to a static tag method", () => {
      const s = makeVar(createVar("s", design.shape));

      const result = desugar(reflection, makeUnionCaseTest(s, caseOf(design.shape, "Square")));

      expect(result.kind).to.equal("operator");
      if (result.kind === "operator" && result.left.kind === "call") {
        expect(result.left.object).to.equal(undefined);
        expect(result.left.method.name).to.equal("GetTag");
        expect(result.left.args).to.deep.equal([s]);
        expect(result.right).to.deep.equal(makeValue(1, design.int32));
      } else {
        expect.fail("expected a comparison against a static call");
      }
    });

    it("should call an instance tag method on the value", () => {
      const s = makeVar(createVar("s", design.signal));

      const result = desugar(reflection, makeUnionCaseTest(s, caseOf(design.signal, "Red")));

      if (result.kind === "operator" && result.left.kind === "call") {
        expect(result.left.object).to.equal(s);
        expect(result.left.args).to.deep.equal([]);
        expect(result.right).to.deep.equal(makeValue(0, design.int32));
      } else {
        expect.fail("expected a comparison against an instance call");
      }
    });

    it("should treat a field tag member as an internal error", () => {
      const fieldTagged: ReflectionService = {
        ...reflection,
        getUnionTagMember: () => design.members.total,
      };
      const s = makeVar(createVar("s", design.signal));

      const result = captureDiagnostic(() =>
        desugar(fieldTagged, makeUnionCaseTest(s, caseOf(design.signal, "Red")))
      );

      expect(result.ok ? undefined : result.error.code).to.equal("QSH6001");
      expect(result.ok ? undefined : result.error.message).to.equal(
        "ICE: unreachable: unexpected tag member 'Total' for 'Sample.Signal'"
      );
    });
  });
});
