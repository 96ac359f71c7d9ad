import * as assert from "assert";
import { compose, sequence } from "@hetero/tuple";
import {
  HeterogeneousKeyMap,
  wrap,
  populate,
  pairBodies,
  hash64,
  fingerprint64,
  resolveKeyMapOptions,
  BackingStore,
  CanonicalKey,
  KeyMapError,
  KeyNotFoundError,
  CanonicalCollisionError,
  StoreOwnershipError,
  StoreReleasedError,
} from "../index";

function hex(key: CanonicalKey): string {
  return "0x" + key.toString(16).padStart(16, "0");
}

describe("HeterogeneousKeyMap", () => {
  it("should be importable/constructable/etc", () => {
    assert.strictEqual(typeof HeterogeneousKeyMap, "function");
    const map = HeterogeneousKeyMap.create();
    assert.strictEqual(map instanceof HeterogeneousKeyMap, true);
    assert.strictEqual(HeterogeneousKeyMap.isHeterogeneousKeyMap(map), true);
    assert.strictEqual(HeterogeneousKeyMap.isHeterogeneousKeyMap(new Map), false);
    assert.strictEqual(map.size, 0);
    assert.strictEqual(map.isReleased(), false);
  });

  it("reads back what was written", () => {
    const map = HeterogeneousKeyMap.create<string>();
    map.set("key", "value");
    assert.strictEqual(map.get("key"), "value");
    assert.strictEqual(map.has("key"), true);
    assert.strictEqual(map.peek("key"), "value");
    assert.strictEqual(map.size, 1);
  });

  it("keeps the last of several writes to one key", () => {
    const map = HeterogeneousKeyMap.create<number>();
    map.set([1, 2], 1);
    map.set([1, 2], 2);
    assert.strictEqual(map.get([1, 2]), 2);
    assert.strictEqual(map.size, 1);
  });

  it("looks keys up by structure, not identity", () => {
    const map = HeterogeneousKeyMap.create<string>();
    map.set(sequence(1, "a", [true]), "found");
    assert.strictEqual(map.get([1, "a", [true]]), "found");
    map.set({ x: 1, y: 2 }, "point");
    assert.strictEqual(map.get({ y: 2, x: 1 }), "point");
  });

  it("lets keys of different shapes coexist", () => {
    const map = HeterogeneousKeyMap.create<string>();
    const pair = sequence(1, 2);
    const triple = sequence(1, 2, 3);
    assert.notStrictEqual(hash64(pair), hash64(triple));

    map.set(pair, "pair");
    map.set(triple, "triple");
    map.set("1,2", "string");
    map.set(12, "number");

    assert.strictEqual(map.get(pair), "pair");
    assert.strictEqual(map.get(triple), "triple");
    assert.strictEqual(map.get("1,2"), "string");
    assert.strictEqual(map.get(12), "number");
    assert.strictEqual(map.size, 4);
  });

  it("throws KeyNotFoundError for keys never set", () => {
    const map = HeterogeneousKeyMap.create<number>();
    map.set([1, 2], 12);
    assert.throws(() => map.get([2, 1]), (error: unknown) => {
      assert.ok(error instanceof KeyNotFoundError);
      assert.ok(error instanceof KeyMapError);
      assert.strictEqual(error.name, "KeyNotFoundError");
      assert.strictEqual(error.canonicalKey, hash64([2, 1]));
      assert.strictEqual(
        error.message,
        `No entry for canonical key ${hex(hash64([2, 1]))}`,
      );
      return true;
    });
    assert.throws(() => map.get([1, 2, undefined]), KeyNotFoundError);
  });

  it("offers non-throwing reads", () => {
    const map = HeterogeneousKeyMap.create<number>();
    assert.strictEqual(map.has("missing"), false);
    assert.strictEqual(map.peek("missing"), void 0);
    assert.strictEqual(map.getOrDefault("missing", -1), -1);
    map.set("present", 7);
    assert.strictEqual(map.getOrDefault("present", -1), 7);
  });

  it("stores undefined values as present", () => {
    const map = HeterogeneousKeyMap.create<number | undefined>();
    map.set("u", void 0);
    assert.strictEqual(map.has("u"), true);
    assert.strictEqual(map.get("u"), void 0);
    assert.strictEqual(map.getOrDefault("u", 5), void 0);
  });

  it("can be typed to one family of keys", () => {
    const map = HeterogeneousKeyMap.create<string, readonly number[]>();
    map.set(sequence(1, 2), "pair");
    map.set([3, 4, 5], "triple");
    assert.strictEqual(map.get([1, 2]), "pair");
    // @ts-expect-error
    assert.throws(() => map.get("1,2"), KeyNotFoundError);
  });

  describe("wrap", () => {
    it("uses the given store without copying it", () => {
      const store: BackingStore<number> = new Map([[hash64("x"), 1]]);
      const map = wrap(store);
      assert.strictEqual(map.get("x"), 1);

      map.set(["y", 2], 2);
      assert.strictEqual(store.get(hash64(["y", 2])), 2);
      assert.strictEqual(store.size, 2);

      store.set(hash64("z"), 3);
      assert.strictEqual(map.get("z"), 3);
      assert.strictEqual(map.size, 3);
    });

    it("stores only canonical keys", () => {
      const store: BackingStore<string> = new Map;
      const map = HeterogeneousKeyMap.wrap(store);
      const key = sequence("a", 1);
      map.set(key, "v");
      assert.deepStrictEqual([...store.keys()], [hash64(key)]);
      assert.deepStrictEqual([...store.values()], ["v"]);
    });

    it("rejects stores that are not Maps", () => {
      // @ts-expect-error
      assert.throws(() => wrap({}), new TypeError("Not a Map: [object Object]"));
      // @ts-expect-error
      assert.throws(() => wrap(new WeakMap), new TypeError("Not a Map: [object WeakMap]"));
      // @ts-expect-error
      assert.throws(() => wrap(new Set), new TypeError("Not a Map: [object Set]"));
    });

    it("allows one owner per store", () => {
      const store: BackingStore<number> = new Map;
      const first = wrap(store);
      assert.throws(() => wrap(store), (error: unknown) => {
        assert.ok(error instanceof StoreOwnershipError);
        assert.strictEqual(
          error.message,
          "Backing store is already owned by another HeterogeneousKeyMap; call release() on that map first",
        );
        return true;
      });
      first.set("k", 1);
      assert.strictEqual(first.get("k"), 1);
    });

    it("does not claim the store when options are invalid", () => {
      const store: BackingStore<number> = new Map;
      // @ts-expect-error
      assert.throws(() => wrap(store, { detectCollisions: "yes" }), TypeError);
      const map = wrap(store);
      map.set("k", 1);
      assert.strictEqual(store.size, 1);
    });
  });

  describe("release", () => {
    it("hands the store back and disables the proxy", () => {
      const store: BackingStore<number> = new Map;
      const map = wrap(store);
      map.set("a", 1);

      assert.strictEqual(map.release(), store);
      assert.strictEqual(map.isReleased(), true);
      assert.throws(() => map.get("a"), StoreReleasedError);
      assert.throws(() => map.set("b", 2), StoreReleasedError);
      assert.throws(() => map.has("a"), StoreReleasedError);
      assert.throws(() => map.size, StoreReleasedError);
      assert.throws(() => map.release(), new StoreReleasedError);

      const again = wrap(store);
      assert.strictEqual(again.get("a"), 1);
    });
  });

  describe("options", () => {
    it("rejects unknown and mistyped options", () => {
      assert.throws(
        // @ts-expect-error
        () => HeterogeneousKeyMap.create({ weakness: true }),
        /^TypeError: Invalid HeterogeneousKeyMap options \(options: Unrecognized key/,
      );
      assert.throws(
        // @ts-expect-error
        () => HeterogeneousKeyMap.create({ hash: 42 }),
        /hash: Expected function/,
      );
      assert.throws(
        // @ts-expect-error
        () => HeterogeneousKeyMap.create({ detectCollisions: 1 }),
        /detectCollisions: Expected boolean/,
      );
    });

    it("resolves defaults", () => {
      const defaults = resolveKeyMapOptions();
      assert.strictEqual(defaults.hash, hash64);
      assert.strictEqual(defaults.fingerprint, null);

      const detecting = resolveKeyMapOptions({ detectCollisions: true });
      assert.strictEqual(detecting.fingerprint, fingerprint64);

      const custom = (key: unknown) => BigInt(String(key).length);
      assert.strictEqual(
        resolveKeyMapOptions({ detectCollisions: true, fingerprint: custom }).fingerprint,
        custom,
      );
      // A fingerprint without detectCollisions is ignored.
      assert.strictEqual(resolveKeyMapOptions({ fingerprint: custom }).fingerprint, null);
    });

    it("canonicalizes keys with a custom hash", () => {
      const byLength = (key: string) => BigInt(key.length);
      const map = HeterogeneousKeyMap.create<string, string>({ hash: byLength });
      map.set("abc", "three");
      assert.strictEqual(map.get("xyz"), "three");
    });
  });

  describe("collisions", () => {
    const collide = () => 7n;

    it("overwrite silently by default", () => {
      const map = HeterogeneousKeyMap.create<number>({ hash: collide });
      map.set("a", 1);
      map.set([1, 2], 2);
      assert.strictEqual(map.size, 1);
      assert.strictEqual(map.get("a"), 2);
      assert.strictEqual(map.get({ any: "thing" }), 2);
    });

    it("are reported when detection is enabled", () => {
      const map = HeterogeneousKeyMap.create<number>({
        hash: collide,
        detectCollisions: true,
      });
      map.set("a", 1);
      assert.throws(() => map.set([1, 2], 2), (error: unknown) => {
        assert.ok(error instanceof CanonicalCollisionError);
        assert.strictEqual(error.canonicalKey, 7n);
        assert.strictEqual(
          error.message,
          "Canonical key 0x0000000000000007 belongs to a different key",
        );
        return true;
      });
      assert.strictEqual(map.get("a"), 1);
      assert.throws(() => map.get([1, 2]), CanonicalCollisionError);
      assert.strictEqual(map.has([1, 2]), false);
      assert.strictEqual(map.peek([1, 2]), void 0);
      assert.strictEqual(map.getOrDefault([1, 2], 0), 0);

      map.set("a", 3);
      assert.strictEqual(map.get("a"), 3);
    });

    it("cannot be detected for entries that predate the wrap", () => {
      const store: BackingStore<string> = new Map([[7n, "old"]]);
      const map = wrap(store, { hash: collide, detectCollisions: true });
      assert.strictEqual(map.get("anything"), "old");
      map.set("b", "new");
      assert.strictEqual(map.get("b"), "new");
      assert.throws(() => map.get("c"), CanonicalCollisionError);
    });
  });
});

describe("populate", () => {
  it("writes every pair of a composed batch", () => {
    const map = HeterogeneousKeyMap.create<string>();
    const keys = sequence(sequence(1, 2), "k", sequence(true));
    const values = sequence("first", "second", "third");
    const written = populate<unknown, string>(map, compose(keys, values));
    assert.strictEqual(written, 3);
    assert.strictEqual(map.get([1, 2]), "first");
    assert.strictEqual(map.get("k"), "second");
    assert.strictEqual(map.get([true]), "third");
  });

  it("rejects an element that is not a pair when it is reached", () => {
    const map = HeterogeneousKeyMap.create<number>();
    const batch: unknown[] = [["k", 1], [1, 2, 3], ["never", 2]];
    assert.throws(
      // @ts-expect-error
      () => populate(map, batch),
      new TypeError("Expected a [key, value] pair at index 1"),
    );
    assert.strictEqual(map.get("k"), 1);
    assert.strictEqual(map.has("never"), false);
  });

  it("stores values that have no shape, as set does", () => {
    const map = HeterogeneousKeyMap.create<unknown[]>();
    const cyclic: unknown[] = [];
    cyclic.push(cyclic);
    map.set([1], cyclic);
    assert.strictEqual(populate<readonly number[], unknown[]>(map, [[[2], cyclic]]), 1);
    assert.strictEqual(map.get([2]), cyclic);
  });

  it("specializes on the shape of the key alone", () => {
    const map = HeterogeneousKeyMap.create<readonly number[], readonly number[]>();
    const bodies = pairBodies<readonly number[], readonly number[]>();
    const pairs: Array<readonly [readonly number[], readonly number[]]> = [];
    for (let i = 0; i < 20; ++i) {
      pairs.push([[i, i + 1], new Array<number>(i).fill(0)]);
    }
    assert.strictEqual(
      populate<readonly number[], readonly number[]>(map, pairs, { specializer: bodies }),
      20,
    );
    assert.strictEqual(bodies.size, 1);
    assert.strictEqual(map.size, 20);
    assert.deepStrictEqual(map.get([3, 4]), [0, 0, 0]);
  });

  it("reuses pair bodies across batches", () => {
    const map = HeterogeneousKeyMap.create<number>();
    const bodies = pairBodies<unknown, number>();

    populate<unknown, number>(map, [["a", 1], [[1, 2], 2]], { specializer: bodies });
    assert.strictEqual(bodies.size, 2);

    populate<unknown, number>(map, [["b", 3], [[3, 4], 4]], { specializer: bodies });
    assert.strictEqual(bodies.size, 2);

    populate<unknown, number>(map, [[[5, 6, 7], 5]], { specializer: bodies });
    assert.strictEqual(bodies.size, 3);

    assert.strictEqual(map.size, 5);
    assert.strictEqual(map.get([3, 4]), 4);
    assert.strictEqual(map.get([5, 6, 7]), 5);
  });

  it("writes to the map it is given when bodies are shared", () => {
    const a = HeterogeneousKeyMap.create<string>();
    const b = HeterogeneousKeyMap.create<string>();
    const bodies = pairBodies<unknown, string>();

    populate<unknown, string>(a, [["x", "in a"]], { specializer: bodies });
    populate<unknown, string>(b, [["y", "in b"]], { specializer: bodies });

    assert.strictEqual(bodies.size, 1);
    assert.strictEqual(a.size, 1);
    assert.strictEqual(b.size, 1);
    assert.strictEqual(a.get("x"), "in a");
    assert.strictEqual(b.get("y"), "in b");
    assert.strictEqual(a.has("y"), false);
  });
});
