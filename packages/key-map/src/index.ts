export {
  HeterogeneousKeyMap,
  wrap,
} from "./key-map";

export type { BackingStore } from "./key-map";

export {
  populate,
  pairBodies,
} from "./populate";

export type {
  KeyValuePair,
  PairBody,
  PairSpecializer,
  PopulateOptions,
} from "./populate";

export {
  resolveKeyMapOptions,
  fingerprint64,
} from "./options";

export type {
  KeyMapOptions,
  ResolvedKeyMapOptions,
} from "./options";

export {
  KeyMapError,
  KeyNotFoundError,
  CanonicalCollisionError,
  StoreOwnershipError,
  StoreReleasedError,
} from "./errors";

export { hash64, canonicalHash } from "@hetero/hash";
export type { CanonicalKey, HashFunction, Hashable } from "@hetero/hash";
