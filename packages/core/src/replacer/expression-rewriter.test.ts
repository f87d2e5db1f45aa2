/**
 * Tests for expression rewriting across universes
 *
 * Rewritten trees are evaluated with the reference evaluator: a tree that
 * crossed forward must run against the target universe's members.
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { rewriteExpr } from "./expression-rewriter.js";
import { createReplacerState } from "./replacer.js";
import { rewriteVariable } from "./variable-table.js";
import type { Expr } from "../expr/types.js";
import {
  createVar,
  makeApplication,
  makeCall,
  makeCoerce,
  makeFieldGet,
  makeFieldSet,
  makeIfThenElse,
  makeLambda,
  makeLet,
  makeNewArray,
  makeNewDelegate,
  makeNewObject,
  makeNewRecord,
  makeNewTuple,
  makeNewUnionCase,
  makeOperator,
  makePropertyGet,
  makePropertySet,
  makeSequential,
  makeTupleGet,
  makeUnionCaseTest,
  makeValue,
  makeVar,
  makeVarSet,
  makeWhileLoop,
  raw,
} from "../expr/factory.js";
import { mapChildren } from "../expr/shape.js";
import { evaluate } from "../eval/evaluator.js";
import { createMetadataReflection } from "../metadata/reflection.js";
import { makeGenericType, typesEqual } from "../metadata/type-ops.js";
import {
  createSampleUniverse,
  functionType,
  slotOf,
} from "../testing/sample-universes.js";
import { captureDiagnostic } from "../types/errors.js";

/** Every node of a tree, parents before children */
const nodesOf = (expr: Expr): readonly Expr[] => {
  const found: Expr[] = [expr];
  mapChildren(expr, (child) => {
    found.push(...nodesOf(child));
    return child;
  });
  return found;
};

describe("Expression Rewriter", () => {
  const reflection = createMetadataReflection();
  const design = createSampleUniverse("design");
  const runtime = createSampleUniverse("runtime");
  const session = () =>
    createReplacerState({ origin: design.universe, target: runtime.universe });
  const run = (expr: Expr): unknown => evaluate(expr, { reflection });
  const int = (n: number) => makeValue(n, design.int32);

  describe("member access", () => {
    it("should read the target universe's static property", () => {
      const tree = makePropertyGet(undefined, design.members.flavorName);

      const rewritten = rewriteExpr(session(), "forward", tree);

      expect(run(tree)).to.equal("design");
      expect(run(rewritten)).to.equal("runtime");
    });

    it("should rebuild calls, fields and constructors against the target", () => {
      const calc = createVar("calc", design.calculator);
      const tree = makeLet(
        calc,
        makeNewObject(design.members.calculatorCtor, []),
        makeSequential(
          makeCall(makeVar(calc), design.members.accumulate, [int(5)]),
          makeFieldGet(makeVar(calc), design.members.total)
        )
      );

      const rewritten = rewriteExpr(session(), "forward", tree);

      expect(run(rewritten)).to.equal(5);
      expect(rewritten.kind).to.equal("let");
      if (rewritten.kind === "let") {
        expect(rewritten.variable.type).to.equal(runtime.calculator);
        expect(rewritten.value.kind === "newObject" && rewritten.value.ctor).to.equal(
          runtime.members.calculatorCtor
        );
      }
    });

    it("should carry generic method instantiations across", () => {
      const identityOfInt = reflection.makeGenericMethod(design.members.identity, [
        design.int32,
      ]);
      const tree = makeCall(undefined, identityOfInt, [int(7)]);

      const rewritten = rewriteExpr(session(), "forward", tree);

      expect(run(rewritten)).to.equal(7);
      if (rewritten.kind === "call") {
        expect(rewritten.method.genericDefinition).to.equal(runtime.members.identity);
      } else {
        expect.fail("expected a call");
      }
    });

    it("should leave value types as written", () => {
      const rewritten = rewriteExpr(session(), "forward", int(1));
      expect(rewritten).to.deep.equal(int(1));
    });
  });

  describe("structural nodes", () => {
    it("should rebuild property and field assignments against the target", () => {
      const calc = createVar("calc", design.calculator);
      const tree = makeLet(
        calc,
        makeNewObject(design.members.calculatorCtor, []),
        makeSequential(
          makePropertySet(makeVar(calc), design.members.scale, int(3)),
          makeSequential(
            makeCall(makeVar(calc), design.members.accumulate, [int(2)]),
            makeSequential(
              makeFieldSet(
                makeVar(calc),
                design.members.total,
                makeOperator(
                  "add",
                  makeFieldGet(makeVar(calc), design.members.total),
                  int(4)
                )
              ),
              makeFieldGet(makeVar(calc), design.members.total)
            )
          )
        )
      );

      const rewritten = rewriteExpr(session(), "forward", tree);
      const nodes = nodesOf(rewritten);

      expect(
        nodes.flatMap((n) => (n.kind === "propertySet" ? [n.property] : []))
      ).to.deep.equal([runtime.members.scale]);
      expect(
        nodes.flatMap((n) => (n.kind === "fieldSet" ? [n.field] : []))
      ).to.deep.equal([runtime.members.total]);
      expect(run(rewritten)).to.equal(10);
    });

    it("should resolve the types carried by coercions, arrays and tuples", () => {
      const pairType = makeGenericType(design.tuple, [design.int32, design.string]);
      const coerced = rewriteExpr(session(), "forward", makeCoerce(int(2), design.object));
      const array = rewriteExpr(
        session(),
        "forward",
        makeNewArray(design.int32, [int(1), int(2)])
      );
      const item = rewriteExpr(
        session(),
        "forward",
        makeTupleGet(
          makeNewTuple(pairType, [int(5), makeValue("five", design.string)]),
          1
        )
      );

      if (coerced.kind === "coerce") {
        expect(coerced.type).to.equal(runtime.object);
      } else {
        expect.fail("expected a coercion");
      }
      if (array.kind === "newArray") {
        expect(array.elementType).to.equal(runtime.int32);
      } else {
        expect.fail("expected an array");
      }
      if (item.kind === "tupleGet" && item.tuple.kind === "newTuple") {
        expect(item.index).to.equal(1);
        expect(
          typesEqual(
            item.tuple.tupleType,
            makeGenericType(runtime.tuple, [runtime.int32, runtime.string])
          )
        ).to.equal(true);
      } else {
        expect.fail("expected a tuple read");
      }
      expect(run(coerced)).to.equal(2);
      expect(run(array)).to.deep.equal([1, 2]);
      expect(run(item)).to.equal("five");
    });

    it("should assign mutable binders through their forward rewrites", () => {
      const i = createVar("i", design.int32, true);
      const sum = createVar("sum", design.int32, true);
      const tree = makeLet(
        i,
        int(0),
        makeLet(
          sum,
          int(0),
          makeSequential(
            makeWhileLoop(
              makeOperator("lessThan", makeVar(i), int(4)),
              makeSequential(
                makeVarSet(
                  sum,
                  makeIfThenElse(
                    makeOperator("equals", makeVar(i), int(2)),
                    makeVar(sum),
                    makeCall(undefined, design.members.add, [
                      makeVar(sum),
                      makeVar(i),
                    ])
                  )
                ),
                makeVarSet(i, makeOperator("add", makeVar(i), int(1)))
              )
            ),
            makeVar(sum)
          )
        )
      );
      const state = session();

      const rewritten = rewriteExpr(state, "forward", tree);
      const iThere = rewriteVariable(state, "forward", i);
      const sumThere = rewriteVariable(state, "forward", sum);
      const nodes = nodesOf(rewritten);
      const assigned = nodes.flatMap((n) => (n.kind === "varSet" ? [n.variable] : []));

      expect(assigned.map((v) => v.id)).to.have.members([iThere.id, sumThere.id]);
      expect(assigned.every((v) => v.isMutable && v.type === runtime.int32)).to.equal(
        true
      );
      expect(nodes.some((n) => n.kind === "whileLoop")).to.equal(true);
      expect(nodes.some((n) => n.kind === "ifThenElse")).to.equal(true);
      expect(run(rewritten)).to.equal(4);
    });
  });

  describe("desugared constructs", () => {
    it("should test an Option case through the target's tag property", () => {
      const optionOfInt = makeGenericType(design.option, [design.int32]);
      const [none, some] = reflection.getUnionCases(optionOfInt);
      if (!none || !some) {
        expect.fail("Option has two cases");
        return;
      }
      const value = makeNewUnionCase(some, [int(3)]);

      const isSome = rewriteExpr(session(), "forward", makeUnionCaseTest(value, some));
      const isNone = rewriteExpr(session(), "forward", makeUnionCaseTest(value, none));

      expect(isSome.kind).to.equal("operator");
      expect(run(isSome)).to.equal(true);
      expect(run(isNone)).to.equal(false);
    });

    it("should build records through the target constructor", () => {
      const tree = makeNewRecord(design.point, [int(1), int(2)]);

      const rewritten = rewriteExpr(session(), "forward", tree);

      if (rewritten.kind === "newObject") {
        expect(rewritten.ctor.declaringType).to.equal(runtime.point);
      } else {
        expect.fail("expected a constructor call");
      }
      const point = run(rewritten);
      expect(slotOf(point, "X")).to.equal(1);
      expect(slotOf(point, "Y")).to.equal(2);
    });

    it("should apply a delegate through the target Invoke", () => {
      const intToInt = functionType(design, design.int32, design.int32);
      const a = createVar("a", design.int32);
      const f = createVar("f", intToInt);
      const tree = makeLet(
        f,
        makeNewDelegate(intToInt, [a], makeOperator("subtract", makeVar(a), int(1))),
        makeApplication(makeVar(f), int(10))
      );

      const rewritten = rewriteExpr(session(), "forward", tree);

      expect(run(rewritten)).to.equal(9);
      if (rewritten.kind === "let" && rewritten.body.kind === "call") {
        expect(rewritten.body.method.declaringType).to.deep.equal(
          functionType(runtime, runtime.int32, runtime.int32)
        );
      } else {
        expect.fail("expected the application to become a call");
      }
    });
  });

  describe("lambdas", () => {
    it("should reject a first-class function literal", () => {
      const x = createVar("x", design.int32);
      const lambda = makeLambda(
        x,
        makeVar(x),
        functionType(design, design.int32, design.int32)
      );

      const result = captureDiagnostic(() => rewriteExpr(session(), "forward", lambda));

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("QSH2001");
        expect(result.error.message).to.include("point-free");
        expect(result.error.message).to.include(
          "'Core.Func`2[System.Int32,System.Int32]'"
        );
        expect(result.error.hint).to.equal(
          "Write the function with all its arguments named instead of composing it point-free or returning a curried function."
        );
      }
    });

    it("should reject a lambda nested inside an application", () => {
      const x = createVar("x", design.int32);
      const lambda = makeLambda(
        x,
        makeVar(x),
        functionType(design, design.int32, design.int32)
      );
      const result = captureDiagnostic(() =>
        rewriteExpr(session(), "forward", makeApplication(lambda, int(1)))
      );
      expect(result.ok ? undefined : result.error.code).to.equal("QSH2001");
    });
  });

  describe("binders", () => {
    it("should give every occurrence of a binder one variable in a backward rewrite", () => {
      const state = session();
      const w = createVar("w", runtime.int32);
      const tree = raw.let(
        w,
        makeValue(2, runtime.int32),
        makeOperator("add", makeVar(w), makeVar(w))
      );

      const first = rewriteExpr(state, "backward", tree);
      const second = rewriteExpr(state, "backward", tree);

      if (
        first.kind === "let" &&
        first.body.kind === "operator" &&
        first.body.left.kind === "var" &&
        first.body.right.kind === "var" &&
        second.kind === "let"
      ) {
        expect(first.variable.type).to.equal(design.int32);
        expect(first.body.left.variable).to.equal(first.variable);
        expect(first.body.right.variable).to.equal(first.variable);
        expect(second.variable).to.not.equal(first.variable);
      } else {
        expect.fail("expected let w = 2 in w + w");
      }
      expect(run(first)).to.equal(4);
    });

    it("should restore original variables after a round trip", () => {
      const state = session();
      const x = createVar("x", design.int32);
      const tree = makeLet(x, int(3), makeVar(x));

      const back = rewriteExpr(state, "backward", rewriteExpr(state, "forward", tree));

      if (back.kind === "let" && back.body.kind === "var") {
        expect(back.variable).to.equal(x);
        expect(back.body.variable).to.equal(x);
      } else {
        expect.fail("expected let x = 3 in x");
      }
    });
  });

  describe("failures", () => {
    it("should stop at the first member the destination lacks", () => {
      const state = createReplacerState({
        origin: design.universe,
        target: [],
      });

      const result = captureDiagnostic(() =>
        rewriteExpr(state, "forward", makeCall(undefined, design.members.add, [int(1), int(2)]))
      );

      expect(result.ok ? undefined : result.error.code).to.equal("QSH1001");
    });
  });
});
