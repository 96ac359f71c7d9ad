import * as assert from "assert";
import {
  Shape,
  shapeOf,
  tagOf,
  TrieSpecializer,
  ShapedBody,
  unroll,
  forEachShaped,
} from "./index";

describe("Shape", function () {
  it("tags non-array values by type", function () {
    assert.strictEqual(tagOf(undefined), "undefined");
    assert.strictEqual(tagOf(null), "null");
    assert.strictEqual(tagOf(false), "boolean");
    assert.strictEqual(tagOf(1.5), "number");
    assert.strictEqual(tagOf(2n), "bigint");
    assert.strictEqual(tagOf("s"), "string");
    assert.strictEqual(tagOf(Symbol.iterator), "symbol");
    assert.strictEqual(tagOf(() => 0), "function");
    assert.strictEqual(tagOf({}), "object");
    assert.strictEqual(tagOf(new Date(0)), "object");
  });

  it("describes arrays by arity and per-position shape", function () {
    assert.strictEqual(String(shapeOf(1)), "number");
    assert.strictEqual(String(shapeOf([])), "()");
    assert.strictEqual(String(shapeOf([1, "a"])), "(number, string)");
    assert.strictEqual(
      String(shapeOf([1, [true, null]])),
      "(number, (boolean, null))",
    );
    assert.deepStrictEqual(
      shapeOf([1, "a"]).signature,
      [2, "number", "string", ")"],
    );
    assert.strictEqual(shapeOf([1, 2, 3]).arity, 3);
    assert.strictEqual(shapeOf("abc").arity, void 0);
    assert.strictEqual(shapeOf([]).isArray(), true);
    assert.strictEqual(shapeOf({}).isArray(), false);
  });

  it("interns equal shapes", function () {
    assert.strictEqual(Shape.of([1, 2]), Shape.of([3, 4]));
    assert.strictEqual(Shape.of("a"), Shape.of("b"));
    assert.strictEqual(
      Shape.of([1, ["x"]]).positions[1],
      Shape.of(["y"]),
    );
    assert.notStrictEqual(Shape.of([1]), Shape.of([[1]]));
    assert.notStrictEqual(Shape.of([1, 2]), Shape.of([1, 2, 3]));
    assert.notStrictEqual(Shape.of([1, "2"]), Shape.of(["1", 2]));
    // Nesting boundaries are part of the signature.
    assert.notStrictEqual(Shape.of([[1], 2]), Shape.of([[1, 2]]));
  });

  it("is frozen", function () {
    const shape = Shape.of([1, "a"]);
    assert.strictEqual(Object.isFrozen(shape), true);
    assert.strictEqual(Object.isFrozen(shape.positions), true);
    assert.strictEqual(Object.isFrozen(shape.signature), true);
  });

  it("treats holes as undefined positions", function () {
    assert.strictEqual(String(shapeOf([, 1])), "(undefined, number)");
  });

  it("allows shared (acyclic) sub-arrays but rejects cycles", function () {
    const inner = [1];
    assert.strictEqual(String(shapeOf([inner, inner])), "((number), (number))");

    const cyclic: unknown[] = [1];
    cyclic.push(cyclic);
    assert.throws(
      () => shapeOf(cyclic),
      new TypeError("Cannot compute the shape of a cyclic array"),
    );
  });
});

describe("TrieSpecializer", function () {
  it("builds once per distinct key", function () {
    const built: string[] = [];
    const specializer = new TrieSpecializer((key: readonly number[]) => {
      built.push(key.join("x"));
      return key.reduce((a, b) => a * b, 1);
    });

    assert.strictEqual(specializer.size, 0);
    assert.strictEqual(specializer.has([2, 3]), false);
    assert.strictEqual(specializer.specialize([2, 3]), 6);
    assert.strictEqual(specializer.specialize([2, 3]), 6);
    assert.strictEqual(specializer.specialize([3, 2]), 6);
    assert.strictEqual(specializer.specialize([]), 1);
    assert.strictEqual(specializer.has([2, 3]), true);
    assert.strictEqual(specializer.size, 3);
    assert.deepStrictEqual(built, ["2x3", "3x2", ""]);
  });

  it("does not cache a failed build", function () {
    let attempts = 0;
    const specializer = new TrieSpecializer((key: readonly string[]) => {
      if (++attempts === 1) throw new Error("first build fails");
      return key.length;
    });
    assert.throws(() => specializer.specialize(["a"]), /first build fails/);
    assert.strictEqual(specializer.size, 0);
    assert.strictEqual(specializer.specialize(["a"]), 1);
    assert.strictEqual(specializer.size, 1);
  });
});

describe("shape-polymorphic iteration", function () {
  it("builds one body per distinct element shape", function () {
    const seq = [1, "a", 2, ["x", 3], "b", ["y", 4]];
    const built: string[] = [];
    const seen: string[] = [];

    const visited = forEachShaped(seq, shape => {
      built.push(String(shape));
      return (_value, index) => {
        seen.push(`${index}:${shape}`);
      };
    });

    assert.strictEqual(visited, 6);
    assert.deepStrictEqual(built, ["number", "string", "(string, number)"]);
    assert.deepStrictEqual(seen, [
      "0:number",
      "1:string",
      "2:number",
      "3:(string, number)",
      "4:string",
      "5:(string, number)",
    ]);
  });

  it("yields value, index and shape for each element", function () {
    const f = () => "f";
    const elements = [...unroll([f, [1, 2]])];
    assert.strictEqual(elements.length, 2);
    assert.strictEqual(elements[0].value, f);
    assert.strictEqual(elements[0].index, 0);
    assert.strictEqual(elements[0].shape, Shape.of(f));
    assert.deepStrictEqual(elements[1].value, [1, 2]);
    assert.strictEqual(elements[1].index, 1);
    assert.strictEqual(String(elements[1].shape), "(number, number)");
  });

  it("is not restartable", function () {
    const iterator = unroll([1, 2]);
    assert.strictEqual([...iterator].length, 2);
    assert.strictEqual([...iterator].length, 0);
    assert.strictEqual(iterator.next().done, true);
    assert.strictEqual(iterator[Symbol.iterator](), iterator);
  });

  it("each drains only the remaining elements", function () {
    const iterator = unroll([1, "a", 2]);
    assert.strictEqual(iterator.next().value?.value, 1);
    const rest: unknown[] = [];
    assert.strictEqual(iterator.each(() => value => {
      rest.push(value);
    }), 2);
    assert.deepStrictEqual(rest, ["a", 2]);
    assert.strictEqual(iterator.each(() => () => {
      throw new Error("not reached");
    }), 0);
  });

  it("computes shapes lazily", function () {
    const cyclic: unknown[] = [];
    cyclic.push(cyclic);
    const iterator = unroll<unknown>([1, cyclic]);
    assert.strictEqual(iterator.next().done, false);
    assert.throws(() => iterator.next(), TypeError);
  });

  it("can shape a selected part of each element", function () {
    const cyclic: unknown[] = [];
    cyclic.push(cyclic);
    const seen: Array<[number, unknown]> = [];
    const iterator = unroll<readonly [string, unknown]>(
      [["a", cyclic], ["b", [1, 2, 3]]],
      (element, index) => {
        seen.push([index, element[0]]);
        return element[0];
      },
    );
    const shapes = [...iterator].map(element => String(element.shape));
    assert.deepStrictEqual(shapes, ["string", "string"]);
    assert.deepStrictEqual(seen, [[0, "a"], [1, "b"]]);
  });

  it("eachWith reuses bodies across sequences", function () {
    let builds = 0;
    const total: number[] = [];
    const specializer = new TrieSpecializer(
      ([shape]: readonly [Shape]): ShapedBody<unknown> => {
        ++builds;
        const arity = shape.arity || 0;
        return () => {
          total.push(arity);
        };
      },
    );

    unroll<unknown>([[1], [1, 2]]).eachWith(specializer);
    unroll<unknown>([[3, 4], [5], "x"]).eachWith(specializer);

    assert.strictEqual(builds, 3);
    assert.strictEqual(specializer.size, 3);
    assert.deepStrictEqual(total, [1, 2, 2, 1, 0]);
  });

  it("rejects non-sequences", function () {
    // @ts-expect-error
    assert.throws(() => unroll({ length: 0 }), new TypeError("Not a sequence: [object Object]"));
    // @ts-expect-error
    assert.throws(() => unroll("abc"), new TypeError("Not a sequence: [object String]"));
  });
});
