import assert from "assert";
import { TrieSpecializer } from "@hetero/specialize";
import {
  sequence,
  isSequence,
  compose,
  composeArray,
  Composer,
  makePlan,
  CompositionPlan,
  CompositionError,
  ArityError,
  DefinitionError,
} from "./index";

describe("sequence", function () {
  it("should be importable", function () {
    assert.strictEqual(typeof sequence, "function");
  });

  it("builds frozen arrays of its arguments", function () {
    const seq = sequence(1, "a", true);
    assert.deepStrictEqual(seq, [1, "a", true]);
    assert.strictEqual(Object.isFrozen(seq), true);
    assert.strictEqual(isSequence(seq), true);
    assert.strictEqual(isSequence({ length: 0 }), false);
    assert.strictEqual(sequence().length, 0);
  });

  it("keeps per-position types", function () {
    const seq: readonly [number, string, boolean] = sequence(1, "a", true);
    assert.strictEqual(seq[1].toUpperCase(), "A");
  });
});

describe("compose", function () {
  it("zips the i-th elements of every input into groups", function () {
    const composed = compose(sequence(1, 2, 3), sequence("a", "b", "c"));
    assert.deepStrictEqual(composed, [[1, "a"], [2, "b"], [3, "c"]]);
  });

  it("truncates to the shortest input", function () {
    const composed = compose(
      sequence(1, 2, 3, 4),
      sequence("a", "b"),
      sequence(true, false, true),
    );
    assert.strictEqual(composed.length, 2);
    assert.deepStrictEqual(composed, [[1, "a", true], [2, "b", false]]);
  });

  it("returns an empty sequence when any input is empty", function () {
    assert.deepStrictEqual(compose(sequence(1, 2), sequence()), []);
    assert.deepStrictEqual(compose(sequence(), sequence()), []);
  });

  it("has length min(l_1..l_n) for many length combinations", function () {
    const lengths = [0, 1, 2, 5];
    lengths.forEach(a => lengths.forEach(b => lengths.forEach(c => {
      const seqs = [a, b, c].map(n => Array.from({ length: n }, (_, i) => i));
      assert.strictEqual(composeArray(seqs).length, Math.min(a, b, c));
    })));
  });

  it("keeps elements by identity, without coercion", function () {
    const obj = { id: 1 };
    const fn = () => "fn";
    const big = 10n;
    const nested = sequence("x", 2);
    const composed = compose(
      sequence(obj, fn),
      sequence(big, nested),
      sequence(undefined, null),
    );
    assert.strictEqual(composed[0][0], obj);
    assert.strictEqual(composed[0][1], big);
    assert.strictEqual(composed[0][2], undefined);
    assert.strictEqual(composed[1][0], fn);
    assert.strictEqual(composed[1][1], nested);
    assert.strictEqual(composed[1][2], null);
    assert.strictEqual(typeof composed[0][1], "bigint");
  });

  it("types each group position after its input", function () {
    const composed: readonly [
      readonly [number, string],
      readonly [number, string],
    ] = compose(sequence(1, 2), sequence("a", "b", "c"));
    assert.strictEqual(composed[1][1].toUpperCase(), "B");
    assert.strictEqual(composed[0][0].toFixed(1), "1.0");

    const loose: readonly (readonly [number, string])[] =
      compose([1, 2, 3], sequence("a", "b"));
    assert.strictEqual(loose.length, 2);
  });

  it("freezes the result and its groups, leaving inputs alone", function () {
    const left = [1, 2];
    const right = ["a", "b"];
    const composed = compose(left, right);
    assert.strictEqual(Object.isFrozen(composed), true);
    assert.strictEqual(Object.isFrozen(composed[0]), true);
    assert.strictEqual(Object.isFrozen(left), false);
    assert.deepStrictEqual(left, [1, 2]);
    assert.deepStrictEqual(right, ["a", "b"]);
  });

  it("returns fresh groups on every call", function () {
    const a = sequence(1);
    const b = sequence(2);
    assert.notStrictEqual(compose(a, b), compose(a, b));
    assert.deepStrictEqual(compose(a, b), compose(a, b));
  });

  it("throws ArityError for exactly one sequence", function () {
    // @ts-expect-error
    assert.throws(() => compose(sequence(1, 2)), (error: unknown) => {
      assert.ok(error instanceof ArityError);
      assert.ok(error instanceof CompositionError);
      assert.strictEqual(error.name, "ArityError");
      assert.strictEqual(error.sequenceCount, 1);
      assert.strictEqual(
        error.message,
        "compose requires at least two sequences, but only 1 was given",
      );
      return true;
    });
    assert.throws(() => composeArray([[1]]), ArityError);
  });

  it("throws DefinitionError for zero sequences", function () {
    // @ts-expect-error
    assert.throws(() => compose(), (error: unknown) => {
      assert.ok(error instanceof DefinitionError);
      assert.strictEqual(error.name, "DefinitionError");
      assert.strictEqual(error.sequenceCount, 0);
      return true;
    });
    assert.throws(() => composeArray([]), DefinitionError);
  });

  it("rejects inputs that are not sequences before reading elements", function () {
    assert.throws(
      // @ts-expect-error
      () => compose([1], "ab"),
      new TypeError("Not a sequence: [object String]"),
    );
    assert.throws(
      // @ts-expect-error
      () => composeArray({ length: 2 }),
      new TypeError("Not a sequence: [object Object]"),
    );
  });
});

describe("Composer", function () {
  it("plans once per distinct combination of input lengths", function () {
    const composer = new Composer;
    assert.strictEqual(composer.plans, 0);

    composer.compose(sequence(1, 2), sequence("a", "b"));
    composer.compose(sequence(3, 4), sequence(true, false));
    assert.strictEqual(composer.plans, 1);

    composer.compose(sequence(1, 2), sequence("a", "b", "c"));
    composer.compose(sequence(1, 2), sequence("a", "b"), sequence(0, 0));
    assert.strictEqual(composer.plans, 3);

    assert.strictEqual(
      composer.planFor([5, 6], ["x", "y"]),
      composer.planFor(["p", "q"], [7, 8]),
    );
    assert.strictEqual(composer.plans, 3);
  });

  it("describes the result before any element is read", function () {
    const composer = new Composer;
    const plan = composer.planFor([1, 2, 3], ["a"], [true, false]);
    assert.deepStrictEqual(plan, {
      arity: 3,
      length: 1,
      inputLengths: [3, 1, 2],
    });
    assert.strictEqual(Object.isFrozen(plan), true);
    assert.strictEqual(Object.isFrozen(plan.inputLengths), true);
  });

  it("does not plan failing arities", function () {
    const composer = new Composer;
    assert.throws(() => composer.planFor(), DefinitionError);
    assert.throws(() => composer.planFor([1]), ArityError);
    assert.strictEqual(composer.plans, 0);
  });

  it("accepts a caller-supplied specializer", function () {
    const planned: string[] = [];
    const composer = new Composer(new TrieSpecializer(
      (lengths: readonly number[]): CompositionPlan => {
        planned.push(lengths.join(","));
        return makePlan(lengths);
      },
    ));
    composer.compose([1, 2], [3]);
    composer.compose([4, 5], [6]);
    composer.compose([1], [2, 3]);
    assert.deepStrictEqual(planned, ["2,1", "1,2"]);
    assert.strictEqual(composer.plans, 2);
  });
});

describe("makePlan", function () {
  it("takes the minimum input length", function () {
    assert.strictEqual(makePlan([4, 2, 9]).length, 2);
    assert.strictEqual(makePlan([0, 2]).length, 0);
    assert.strictEqual(makePlan([3, 3]).arity, 2);
  });

  it("copies the lengths it is given", function () {
    const lengths = [1, 2];
    const plan = makePlan(lengths);
    lengths.push(3);
    assert.deepStrictEqual(plan.inputLengths, [1, 2]);
  });

  it("rejects fewer than two lengths", function () {
    assert.throws(() => makePlan([]), DefinitionError);
    assert.throws(() => makePlan([1]), ArityError);
  });
});
