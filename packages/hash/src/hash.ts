// Canonical 64-bit hashing for keys of any supported shape. Keys that are equal
// by the rules below always produce the same CanonicalKey, in any process:
//
// - primitives compare by value, with 0 === -0 and NaN === NaN, as Map keys do
// - arrays compare element-wise, so arity is part of the key
// - plain objects compare by their own enumerable string keys and values
// - Dates compare by time value
// - Hashable objects compare by whatever their [canonicalHash] method returns
// - functions, symbols and all other objects compare by identity
//
// Unequal keys can still collide; nothing here detects that.

export type CanonicalKey = bigint;

export type HashFunction<TKey = unknown> = (key: TKey) => CanonicalKey;

export const canonicalHash =
  Symbol.for("@hetero/hash:canonicalHash");

export interface Hashable {
  [canonicalHash](): CanonicalKey;
}

export function isHashable(value: unknown): value is Hashable {
  return (
    value !== null &&
    (typeof value === "object" || typeof value === "function") &&
    // Using `in` rather than hasOwnProperty, since the method is usually
    // inherited from a class prototype.
    canonicalHash in value &&
    typeof value[canonicalHash] === "function"
  );
}

const MASK_64 = (1n << 64n) - 1n;
const FNV_PRIME = 0x100000001b3n;

// The standard FNV-1a 64-bit offset basis.
export const DEFAULT_SEED: CanonicalKey = 0xcbf29ce484222325n;

// An unrelated offset basis, for a second hash that is unlikely to collide
// whenever the first one does.
export const FINGERPRINT_SEED: CanonicalKey = 0x84222325cbf29ce4n;

// Type tags written before each encoded value, so that values of different
// types never share an encoding.
const enum Tag {
  UNDEFINED = 0x01,
  NULL = 0x02,
  FALSE = 0x03,
  TRUE = 0x04,
  NUMBER = 0x05,
  BIGINT = 0x06,
  STRING = 0x07,
  ARRAY = 0x08,
  OBJECT = 0x09,
  DATE = 0x0a,
  HASHABLE = 0x0b,
  IDENTITY = 0x0c,
  REGISTERED_SYMBOL = 0x0d,
  END = 0x0e,
}

// Incremental FNV-1a over bytes. Exported so Hashable implementations can
// combine the hashes of their parts the same way hash64 does.
export class Hasher {
  private state: CanonicalKey;

  constructor(seed: CanonicalKey = DEFAULT_SEED) {
    this.state = seed & MASK_64;
  }

  public byte(value: number): this {
    this.state = ((this.state ^ BigInt(value & 0xff)) * FNV_PRIME) & MASK_64;
    return this;
  }

  // Strings are written as their length followed by their UTF-16 code units,
  // two bytes each, so no string is a prefix-ambiguous encoding of another.
  public string(value: string): this {
    this.uint(value.length);
    for (let i = 0; i < value.length; ++i) {
      const unit = value.charCodeAt(i);
      this.byte(unit >>> 8).byte(unit);
    }
    return this;
  }

  // Non-negative integers below 2^53, written as eight bytes.
  public uint(value: number): this {
    let high = Math.floor(value / 0x100000000);
    let low = value >>> 0;
    for (let i = 0; i < 4; ++i, high >>>= 8) this.byte(high);
    for (let i = 0; i < 4; ++i, low >>>= 8) this.byte(low);
    return this;
  }

  public bigint(value: bigint): this {
    return this.string(value.toString(16));
  }

  public digest(): CanonicalKey {
    return this.state;
  }
}

// Identities handed out to values that hash by reference. Per-process only:
// these values have no structure that could be hashed stably across runs.
let nextIdentity = 1;
const objectIdentities = new WeakMap<object, number>();
const symbolIdentities = new Map<symbol, number>();

function identityOf(value: object | symbol): number {
  const existing = typeof value === "symbol"
    ? symbolIdentities.get(value)
    : objectIdentities.get(value);
  if (existing !== void 0) return existing;
  const id = nextIdentity++;
  if (typeof value === "symbol") {
    symbolIdentities.set(value, id);
  } else {
    objectIdentities.set(value, id);
  }
  return id;
}

const { getPrototypeOf } = Object;

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto = getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

function write(hasher: Hasher, value: unknown, seen: Set<object>): void {
  switch (typeof value) {
  case "undefined":
    hasher.byte(Tag.UNDEFINED);
    return;
  case "boolean":
    hasher.byte(value ? Tag.TRUE : Tag.FALSE);
    return;
  case "number":
    // String(-0) is "0" and every NaN prints as "NaN", which gives these the
    // same equality Map keys use.
    hasher.byte(Tag.NUMBER).string(String(value));
    return;
  case "bigint":
    hasher.byte(Tag.BIGINT).bigint(value);
    return;
  case "string":
    hasher.byte(Tag.STRING).string(value);
    return;
  case "symbol": {
    const registered = Symbol.keyFor(value);
    if (registered !== void 0) {
      hasher.byte(Tag.REGISTERED_SYMBOL).string(registered);
    } else {
      hasher.byte(Tag.IDENTITY).uint(identityOf(value));
    }
    return;
  }
  case "function":
    if (isHashable(value)) break;
    hasher.byte(Tag.IDENTITY).uint(identityOf(value));
    return;
  }

  if (value === null) {
    hasher.byte(Tag.NULL);
    return;
  }

  if (isHashable(value)) {
    hasher.byte(Tag.HASHABLE).bigint(value[canonicalHash]() & MASK_64);
    return;
  }

  if (typeof value !== "object") {
    // Unreachable: every typeof result has been handled above.
    throw new TypeError(`Cannot hash value of type ${typeof value}`);
  }

  if (value instanceof Date) {
    hasher.byte(Tag.DATE).string(String(value.getTime()));
    return;
  }

  if (!Array.isArray(value) && !isPlainObject(value)) {
    hasher.byte(Tag.IDENTITY).uint(identityOf(value));
    return;
  }

  if (seen.has(value)) {
    throw new TypeError("Cannot hash a cyclic key");
  }
  seen.add(value);

  if (Array.isArray(value)) {
    hasher.byte(Tag.ARRAY).uint(value.length);
    for (let i = 0; i < value.length; ++i) {
      write(hasher, value[i], seen);
    }
  } else if (isPlainObject(value)) {
    const keys = Object.keys(value).sort();
    hasher.byte(Tag.OBJECT).uint(keys.length);
    for (const key of keys) {
      hasher.string(key);
      write(hasher, value[key], seen);
    }
  }

  hasher.byte(Tag.END);
  seen.delete(value);
}

export function hash64(key: unknown, seed: CanonicalKey = DEFAULT_SEED): CanonicalKey {
  const hasher = new Hasher(seed);
  write(hasher, key, new Set);
  return hasher.digest();
}
