import * as assert from "assert";
import { Trie, isObjRef } from "./trie";

describe("Trie", function () {
  it("can be imported", function () {
    assert.strictEqual(typeof Trie, "function");
  });

  it("returns the same data for the same path", function () {
    const trie = new Trie<object>(true);
    const obj = {};
    assert.strictEqual(
      trie.lookup(obj, 2, "three"),
      trie.lookup(obj, 2, "three"),
    );
    assert.strictEqual(
      trie.lookup(obj, 2, "three"),
      trie.lookupArray([obj, 2, "three"]),
    );
    assert.notStrictEqual(
      trie.lookup(1, obj),
      trie.lookup(1, obj, 3),
    );
    assert.notStrictEqual(
      trie.lookup(1, 2),
      trie.lookup(2, 1),
    );
  });

  it("distinguishes paths by element identity, not structure", function () {
    const trie = new Trie<object>(true);
    assert.notStrictEqual(trie.lookup({}), trie.lookup({}));
    assert.notStrictEqual(trie.lookup([1]), trie.lookup([1]));
    assert.notStrictEqual(trie.lookup(1), trie.lookup("1"));
  });

  it("treats NaN and -0 the way Map keys do", function () {
    const trie = new Trie<object>(false);
    assert.strictEqual(trie.lookup(NaN), trie.lookup(NaN));
    assert.strictEqual(trie.lookup(0), trie.lookup(-0));
  });

  it("gives the empty path its own data", function () {
    const trie = new Trie<object>();
    const root = trie.lookup();
    assert.strictEqual(root, trie.lookupArray([]));
    assert.notStrictEqual(root, trie.lookup(undefined));
  });

  it("can disable WeakMap", function () {
    const trie = new Trie<{ count?: number }>(false);
    const obj = {};
    trie.lookup(obj).count = 1;
    assert.strictEqual(trie.lookup(obj).count, 1);
    assert.strictEqual(trie.peek(obj, 1), void 0);
  });

  it("peek never creates data", function () {
    let made = 0;
    const trie = new Trie(true, path => ({ path, serial: ++made }));
    assert.strictEqual(trie.peek(1, 2), void 0);
    assert.strictEqual(trie.peek(), void 0);
    assert.strictEqual(made, 0);

    const data = trie.lookup(1, 2);
    assert.strictEqual(made, 1);
    assert.strictEqual(trie.peek(1, 2), data);
    assert.strictEqual(trie.peekArray([1, 2]), data);
    // Interior nodes along the path carry no data of their own.
    assert.strictEqual(trie.peek(1), void 0);
    assert.strictEqual(made, 1);
  });

  it("can produce data types other than Object", function () {
    const symbolTrie = new Trie(true, path => Symbol.for(path.join(".")));
    const s123 = symbolTrie.lookup(1, 2, 3);
    assert.strictEqual(s123.toString(), "Symbol(1.2.3)");
    assert.strictEqual(s123, symbolTrie.lookupArray([1, 2, 3]));

    const copies: unknown[][] = [];
    const pathTrie = new Trie(false, path => {
      copies.push(path);
      return path.length;
    });
    const path = ["a", "b"];
    assert.strictEqual(pathTrie.lookupArray(path), 2);
    assert.deepStrictEqual(copies, [["a", "b"]]);
    assert.notStrictEqual(copies[0], path);
  });

  it("stores undefined data without recomputing it", function () {
    let calls = 0;
    const trie = new Trie<undefined>(true, () => {
      ++calls;
      return undefined;
    });
    assert.strictEqual(trie.lookup("x"), undefined);
    assert.strictEqual(trie.lookup("x"), undefined);
    assert.strictEqual(calls, 1);
  });

  it("isObjRef recognizes objects and functions only", function () {
    assert.strictEqual(isObjRef({}), true);
    assert.strictEqual(isObjRef([]), true);
    assert.strictEqual(isObjRef(() => 1), true);
    assert.strictEqual(isObjRef(null), false);
    assert.strictEqual(isObjRef(undefined), false);
    assert.strictEqual(isObjRef("s"), false);
    assert.strictEqual(isObjRef(1n), false);
  });
});
