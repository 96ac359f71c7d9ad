import type { CanonicalKey, HashFunction } from "@hetero/hash";

import { assertMap } from "./helpers";
import {
  KeyNotFoundError,
  CanonicalCollisionError,
  StoreOwnershipError,
  StoreReleasedError,
} from "./errors";
import {
  KeyMapOptions,
  resolveKeyMapOptions,
} from "./options";

export type BackingStore<TValue> = Map<CanonicalKey, TValue>;

// Stores currently owned by a live (unreleased) HeterogeneousKeyMap. A store
// has at most one owner at a time.
const ownedStores = new WeakSet<object>();

// A map whose keys may have different shapes (pairs, triples, strings, ...),
// all stored in one homogeneous BackingStore under their canonical hashes.
// The original keys are never retained, so there is no way to list them; the
// map only answers questions about keys the caller still has.
export class HeterogeneousKeyMap<TValue, TKey = unknown> {
  private store: BackingStore<TValue> | null;
  private readonly hash: HashFunction<TKey>;
  private readonly fingerprint: HashFunction<TKey> | null;
  // Fingerprints of the keys that last wrote each canonical key, maintained
  // only when collision detection is enabled.
  private readonly fingerprints = new Map<CanonicalKey, CanonicalKey>();

  private constructor(
    store: BackingStore<TValue>,
    options: KeyMapOptions<TKey> | undefined,
  ) {
    const resolved = resolveKeyMapOptions(options);
    this.store = store;
    this.hash = resolved.hash;
    this.fingerprint = resolved.fingerprint;
  }

  // Takes ownership of an existing (possibly populated) store without copying
  // it. Entries already in the store stay readable through any key that
  // canonicalizes to their canonical key. Ownership ends only with release():
  // a store whose map is dropped without releasing it cannot be wrapped again.
  public static wrap<TValue, TKey = unknown>(
    store: BackingStore<TValue>,
    options?: KeyMapOptions<TKey>,
  ): HeterogeneousKeyMap<TValue, TKey> {
    assertMap(store);
    const map = new HeterogeneousKeyMap<TValue, TKey>(store, options);
    if (ownedStores.has(store)) {
      throw new StoreOwnershipError;
    }
    ownedStores.add(store);
    return map;
  }

  public static create<TValue, TKey = unknown>(
    options?: KeyMapOptions<TKey>,
  ): HeterogeneousKeyMap<TValue, TKey> {
    return HeterogeneousKeyMap.wrap<TValue, TKey>(new Map, options);
  }

  public static isHeterogeneousKeyMap(
    value: unknown,
  ): value is HeterogeneousKeyMap<unknown, unknown> {
    return value instanceof HeterogeneousKeyMap;
  }

  // Number of distinct canonical keys in the store.
  public get size(): number {
    return this.owned().size;
  }

  public get(key: TKey): TValue {
    const store = this.owned();
    const canonical = this.hash(key);
    if (!store.has(canonical)) {
      throw new KeyNotFoundError(canonical);
    }
    if (!this.matches(key, canonical)) {
      throw new CanonicalCollisionError(canonical);
    }
    // Presence was checked above; TValue itself may include undefined.
    return store.get(canonical) as TValue;
  }

  public set(key: TKey, value: TValue): void {
    const store = this.owned();
    const canonical = this.hash(key);
    if (this.fingerprint) {
      const print = this.fingerprint(key);
      const existing = this.fingerprints.get(canonical);
      if (existing !== void 0 && existing !== print) {
        throw new CanonicalCollisionError(canonical);
      }
      this.fingerprints.set(canonical, print);
    }
    store.set(canonical, value);
  }

  public has(key: TKey): boolean {
    const store = this.owned();
    const canonical = this.hash(key);
    return store.has(canonical) && this.matches(key, canonical);
  }

  // Like get, but returns undefined rather than throwing when the key is
  // absent (or, with collision detection, owned by a different key).
  public peek(key: TKey): TValue | undefined {
    const store = this.owned();
    const canonical = this.hash(key);
    return this.matches(key, canonical) ? store.get(canonical) : void 0;
  }

  public getOrDefault<TDefault>(key: TKey, fallback: TDefault): TValue | TDefault {
    return this.has(key) ? this.get(key) : fallback;
  }

  // Gives up ownership of the store and returns it. The proxy cannot be used
  // afterwards, but the store can be wrapped again.
  public release(): BackingStore<TValue> {
    const store = this.owned();
    ownedStores.delete(store);
    this.store = null;
    this.fingerprints.clear();
    return store;
  }

  public isReleased(): boolean {
    return this.store === null;
  }

  private owned(): BackingStore<TValue> {
    if (!this.store) {
      throw new StoreReleasedError;
    }
    return this.store;
  }

  private matches(key: TKey, canonical: CanonicalKey): boolean {
    if (!this.fingerprint) return true;
    const existing = this.fingerprints.get(canonical);
    // Entries without a fingerprint predate the wrap, and cannot be checked.
    return existing === void 0 || existing === this.fingerprint(key);
  }
}

export function wrap<TValue, TKey = unknown>(
  store: BackingStore<TValue>,
  options?: KeyMapOptions<TKey>,
): HeterogeneousKeyMap<TValue, TKey> {
  return HeterogeneousKeyMap.wrap<TValue, TKey>(store, options);
}
