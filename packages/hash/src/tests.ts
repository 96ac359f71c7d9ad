import assert from "assert";
import {
  hash64,
  Hasher,
  Hashable,
  isHashable,
  canonicalHash,
  CanonicalKey,
  DEFAULT_SEED,
  FINGERPRINT_SEED,
} from "./hash";

class Point implements Hashable {
  constructor(
    public readonly x: number,
    public readonly y: number,
  ) {}

  [canonicalHash](): CanonicalKey {
    return new Hasher().string("Point").uint(this.x).uint(this.y).digest();
  }
}

describe("Hasher", function () {
  it("starts from the seed", function () {
    assert.strictEqual(new Hasher().digest(), DEFAULT_SEED);
    assert.strictEqual(new Hasher(FINGERPRINT_SEED).digest(), FINGERPRINT_SEED);
  });

  it("computes FNV-1a over bytes", function () {
    assert.strictEqual(new Hasher().byte(0x61).digest(), 0xaf63dc4c8601ec8cn);
  });

  it("masks seeds to 64 bits", function () {
    assert.strictEqual(new Hasher((1n << 64n) + 5n).digest(), 5n);
  });
});

describe("hash64", function () {
  it("should be importable", function () {
    assert.strictEqual(typeof hash64, "function");
  });

  it("produces unsigned 64-bit bigints", function () {
    [undefined, null, 0, "", [], {}, [1, "a", [true]]].forEach(key => {
      const hash = hash64(key);
      assert.strictEqual(typeof hash, "bigint");
      assert.ok(hash >= 0n);
      assert.ok(hash < 1n << 64n);
    });
  });

  it("hashes equal keys equally", function () {
    assert.strictEqual(hash64([1, 2]), hash64([1, 2]));
    assert.strictEqual(hash64([3, [4, "5"]]), hash64([3, [4, "5"]]));
    assert.strictEqual(hash64({ a: 1, b: [2] }), hash64({ b: [2], a: 1 }));
    assert.strictEqual(hash64(Object.create(null)), hash64({}));
    assert.strictEqual(hash64(new Date(1000)), hash64(new Date(1000)));
    assert.strictEqual(hash64(12345678901234567890n), hash64(12345678901234567890n));
  });

  it("uses the key equality of Map for numbers", function () {
    assert.strictEqual(hash64(0), hash64(-0));
    assert.strictEqual(hash64(NaN), hash64(Number("not a number")));
    assert.strictEqual(hash64([0, NaN]), hash64([-0, NaN]));
  });

  it("distinguishes types", function () {
    const keys = [1, "1", 1n, true, [1], { 0: 1 }, null, undefined, "", 0, false];
    const hashes = new Set(keys.map(key => hash64(key)));
    assert.strictEqual(hashes.size, keys.length);
  });

  it("makes arity part of the key", function () {
    const hashes = new Set([
      hash64([1, 2]),
      hash64([1, 2, undefined]),
      hash64([[1], 2]),
      hash64([[1, 2]]),
      hash64([1, [2]]),
      hash64([]),
      hash64([[]]),
    ]);
    assert.strictEqual(hashes.size, 7);
  });

  it("does not confuse string boundaries", function () {
    assert.notStrictEqual(hash64(["ab", "c"]), hash64(["a", "bc"]));
    assert.notStrictEqual(hash64({ ab: "c" }), hash64({ a: "bc" }));
  });

  it("hashes functions, symbols and class instances by identity", function () {
    const f = () => 1;
    const g = () => 1;
    assert.strictEqual(hash64(f), hash64(f));
    assert.notStrictEqual(hash64(f), hash64(g));

    const s = Symbol("s");
    assert.strictEqual(hash64(s), hash64(s));
    assert.notStrictEqual(hash64(s), hash64(Symbol("s")));
    assert.strictEqual(hash64(Symbol.for("shared")), hash64(Symbol.for("shared")));

    const map = new Map([[1, 2]]);
    assert.strictEqual(hash64(map), hash64(map));
    assert.notStrictEqual(hash64(map), hash64(new Map([[1, 2]])));
    assert.strictEqual(hash64([f, map]), hash64([f, map]));
  });

  it("delegates to Hashable keys", function () {
    assert.strictEqual(isHashable(new Point(1, 2)), true);
    assert.strictEqual(isHashable({}), false);
    assert.strictEqual(isHashable(null), false);
    assert.strictEqual(isHashable("x"), false);
    assert.strictEqual(hash64(new Point(1, 2)), hash64(new Point(1, 2)));
    assert.notStrictEqual(hash64(new Point(1, 2)), hash64(new Point(2, 1)));
    assert.strictEqual(
      hash64([new Point(3, 4), "z"]),
      hash64([new Point(3, 4), "z"]),
    );
    assert.notStrictEqual(hash64(new Point(1, 2)), new Point(1, 2)[canonicalHash]());
  });

  it("accepts shared sub-keys but rejects cycles", function () {
    const shared = [1, 2];
    assert.strictEqual(hash64([shared, shared]), hash64([[1, 2], [1, 2]]));

    const cyclic: unknown[] = [];
    cyclic.push(cyclic);
    assert.throws(() => hash64(cyclic), new TypeError("Cannot hash a cyclic key"));

    const obj: Record<string, unknown> = {};
    obj.self = obj;
    assert.throws(() => hash64(obj), new TypeError("Cannot hash a cyclic key"));
  });

  it("gives independent results for other seeds", function () {
    const key = [1, "two", 3n];
    assert.strictEqual(hash64(key, FINGERPRINT_SEED), hash64(key, FINGERPRINT_SEED));
    assert.notStrictEqual(hash64(key, FINGERPRINT_SEED), hash64(key));
  });
});
