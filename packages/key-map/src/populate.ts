import {
  unroll,
  Specializer,
  TrieSpecializer,
  Shape,
} from "@hetero/specialize";
import type { HeterogeneousKeyMap } from "./key-map";

export type KeyValuePair<TKey, TValue> = readonly [TKey, TValue];

// The target map is passed to each body when it runs, so one set of bodies
// can serve any number of maps.
export type PairBody<TKey, TValue> = (
  map: HeterogeneousKeyMap<TValue, TKey>,
  pair: KeyValuePair<TKey, TValue>,
) => void;

// Keyed by the shape of the pair's key. Values never affect specialization.
export type PairSpecializer<TKey, TValue> =
  Specializer<readonly [Shape], PairBody<TKey, TValue>>;

export interface PopulateOptions<TKey, TValue> {
  // Reuse the bodies of an earlier populate call.
  specializer?: PairSpecializer<TKey, TValue>;
}

export function pairBodies<TKey, TValue>(): PairSpecializer<TKey, TValue> {
  return new TrieSpecializer<readonly [Shape], PairBody<TKey, TValue>>(
    () => (map, [key, value]) => map.set(key, value),
  );
}

function isPair(value: unknown): boolean {
  return Array.isArray(value) && value.length === 2;
}

function selectKey<TKey, TValue>(
  pair: KeyValuePair<TKey, TValue>,
  index: number,
): TKey {
  if (!isPair(pair)) {
    throw new TypeError(`Expected a [key, value] pair at index ${index}`);
  }
  return pair[0];
}

// Writes a batch of [key, value] pairs, such as compose(keys, values), with
// one set per pair into map. Each pair is checked when it is reached, so the
// pairs before a malformed one are already written. Returns the number of
// pairs written.
export function populate<TKey, TValue>(
  map: HeterogeneousKeyMap<TValue, TKey>,
  pairs: readonly KeyValuePair<TKey, TValue>[],
  options: PopulateOptions<TKey, TValue> = {},
): number {
  const bodies = options.specializer || pairBodies<TKey, TValue>();
  let written = 0;
  for (const { value: pair, shape } of unroll(pairs, selectKey)) {
    bodies.specialize([shape])(map, pair);
    ++written;
  }
  return written;
}
