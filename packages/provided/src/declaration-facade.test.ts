/**
 * Tests for the DeclarationFacade
 *
 * Declarations are written against the design universe; the trees that use
 * them are built in, and evaluated against, the runtime universe.
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { Expr } from "@quoteshift/core";
import {
  captureDiagnostic,
  createMetadataReflection,
  createReplacer,
  createVar,
  evaluate,
  makeArrayType,
  makeCall,
  makeFieldGet,
  makeLambda,
  makeLet,
  makeNewObject,
  makePropertyGet,
  makeSequential,
  makeValue,
  makeVar,
  typesEqual,
} from "@quoteshift/core";
import {
  createSampleUniverse,
  functionType,
} from "@quoteshift/core/testing";
import { createDeclarationFacade } from "./declaration-facade.js";
import { expandProvidedCalls } from "./provided-types.js";

const argAt = (args: readonly Expr[], index: number): Expr => {
  const arg = args[index];
  if (!arg) throw new Error(`missing argument ${index}`);
  return arg;
};

describe("DeclarationFacade", () => {
  const design = createSampleUniverse("design");
  const runtime = createSampleUniverse("runtime");
  const reflection = createMetadataReflection();
  const run = (expr: Expr): unknown => evaluate(expr, { reflection });
  const facade = () =>
    createDeclarationFacade(
      createReplacer({ origin: design.universe, target: runtime.universe })
    );

  describe("signatures", () => {
    it("should retarget parameter and result types", () => {
      const f = facade();
      const amount = f.providedParameter("amount", makeArrayType(design.int32, 1));
      const method = f.providedMethod("Sum", [amount], design.int32, true, () =>
        makeValue(0, design.int32)
      );

      expect(amount.name).to.equal("amount");
      expect(typesEqual(amount.type, makeArrayType(runtime.int32, 1))).to.equal(true);
      expect(method.returnType).to.equal(runtime.int32);
      expect(method.parameters).to.deep.equal([amount]);
    });

    it("should retarget property types and base types", () => {
      const f = facade();
      const property = f.providedProperty(
        "Flavor",
        design.string,
        () => makeValue("x", design.string),
        true
      );
      const ledger = f.providedTypeDefinition("Ledger", design.calculator, {
        hideObjectMethods: true,
        nonNullable: true,
      });

      expect(property.type).to.equal(runtime.string);
      expect(property.isStatic).to.equal(true);
      expect(ledger.definition.baseType).to.equal(runtime.calculator);
      expect(ledger.hideObjectMethods).to.equal(true);
      expect(ledger.nonNullable).to.equal(true);
    });

    it("should place a type in a module and namespace", () => {
      const ledger = facade().providedTypeDefinitionIn(
        "Sample.Provided, Version=0.0.0.0",
        "Sample.Provided",
        "Ledger",
        design.object
      );

      expect(ledger.definition.fullName).to.equal("Sample.Provided.Ledger");
      expect(ledger.definition.moduleName).to.equal(
        "Sample.Provided, Version=0.0.0.0"
      );
      expect(ledger.definition.baseType).to.equal(runtime.object);
      expect(ledger.hideObjectMethods).to.equal(false);
    });
  });

  describe("bodies", () => {
    it("should run design-time code against runtime members", () => {
      const f = facade();
      const ledger = f.providedTypeDefinition("Ledger", design.object);
      const flavor = ledger.addProperty(
        f.providedProperty(
          "Flavor",
          design.string,
          () => makePropertyGet(undefined, design.members.flavorName),
          true
        )
      );

      const expanded = expandProvidedCalls(makePropertyGet(undefined, flavor));

      expect(expanded.kind === "propertyGet" && expanded.property).to.equal(
        runtime.members.flavorName
      );
      expect(run(expanded)).to.equal("runtime");
    });

    it("should hand the original runtime variables back to the call site", () => {
      const f = facade();
      const ledger = f.providedTypeDefinition("Ledger", design.object);
      const sum = ledger.addMethod(
        f.providedMethod(
          "Sum",
          [
            f.providedParameter("a", design.int32),
            f.providedParameter("b", design.int32),
          ],
          design.int32,
          true,
          (args) => makeCall(undefined, design.members.add, args)
        )
      );
      const a = createVar("a", runtime.int32);
      const b = createVar("b", runtime.int32);
      const call = makeCall(undefined, sum, [makeVar(a), makeVar(b)]);
      const tree = makeLet(
        a,
        makeValue(2, runtime.int32),
        makeLet(b, makeValue(3, runtime.int32), call)
      );

      const spliced = expandProvidedCalls(call);
      const expanded = expandProvidedCalls(tree);

      if (spliced.kind === "call") {
        expect(spliced.method).to.equal(runtime.members.add);
        expect(
          spliced.args.map((arg) => (arg.kind === "var" ? arg.variable : undefined))
        ).to.deep.equal([a, b]);
      } else {
        expect.fail("expected the body to be a call");
      }
      expect(run(expanded)).to.equal(5);
    });

    it("should construct and read instances through the base type", () => {
      const f = facade();
      const ledger = f.providedTypeDefinition("Ledger", design.calculator);
      const ctor = ledger.addConstructor(
        f.providedConstructor([f.providedParameter("start", design.int32)], (args) => {
          const c = createVar("c", design.calculator);
          return makeLet(
            c,
            makeNewObject(design.members.calculatorCtor, []),
            makeSequential(
              makeCall(makeVar(c), design.members.accumulate, [argAt(args, 0)]),
              makeVar(c)
            )
          );
        })
      );
      const total = ledger.addProperty(
        f.providedProperty("Total", design.int32, (args) =>
          makeFieldGet(argAt(args, 0), design.members.total)
        )
      );
      const n = createVar("n", runtime.int32);
      const tree = makeLet(
        n,
        makeValue(7, runtime.int32),
        makePropertyGet(makeNewObject(ctor, [makeVar(n)]), total)
      );

      expect(run(expandProvidedCalls(tree))).to.equal(7);
    });

    it("should surface a rejected body at the call site", () => {
      const f = facade();
      const ledger = f.providedTypeDefinition("Ledger", design.object);
      const curried = ledger.addMethod(
        f.providedMethod("Curried", [], design.int32, true, () => {
          const x = createVar("x", design.int32);
          return makeLambda(
            x,
            makeVar(x),
            functionType(design, design.int32, design.int32)
          );
        })
      );

      const result = captureDiagnostic(() =>
        expandProvidedCalls(makeCall(undefined, curried, []))
      );

      expect(result.ok ? undefined : result.error.code).to.equal("QSH2001");
    });
  });
});
