import { z } from "zod";
import {
  hash64,
  FINGERPRINT_SEED,
  CanonicalKey,
  HashFunction,
} from "@hetero/hash";

export interface KeyMapOptions<TKey = unknown> {
  // Canonicalizes every key before it reaches the backing store.
  hash?: HashFunction<TKey>;
  // When true, a fingerprint of each written key is kept beside the entry,
  // and reads or writes through a different key with the same canonical
  // form throw CanonicalCollisionError instead of silently sharing the entry.
  detectCollisions?: boolean;
  // Second, independent hash used as the fingerprint.
  fingerprint?: HashFunction<TKey>;
}

export interface ResolvedKeyMapOptions<TKey> {
  hash: HashFunction<TKey>;
  fingerprint: HashFunction<TKey> | null;
}

// Only the structure of the options is validated here; the functions
// themselves are taken from the caller's (typed) options object.
const keyMapOptionsSchema = z.object({
  hash: z.function().optional(),
  detectCollisions: z.boolean().optional(),
  fingerprint: z.function().optional(),
}).strict();

export function fingerprint64(key: unknown): CanonicalKey {
  return hash64(key, FINGERPRINT_SEED);
}

export function resolveKeyMapOptions<TKey>(
  options: KeyMapOptions<TKey> = {},
): ResolvedKeyMapOptions<TKey> {
  const result = keyMapOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map(
      issue => `${issue.path.join(".") || "options"}: ${issue.message}`,
    );
    throw new TypeError(`Invalid HeterogeneousKeyMap options (${issues.join("; ")})`);
  }
  return {
    hash: options.hash || hash64,
    fingerprint: options.detectCollisions
      ? options.fingerprint || fingerprint64
      : null,
  };
}
