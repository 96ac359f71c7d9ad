import type { CanonicalKey } from "@hetero/hash";
import { formatCanonicalKey } from "./helpers";

export class KeyMapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Thrown by get for a key whose canonical form has no entry. Callers that
// want a fallback instead can use peek or getOrDefault.
export class KeyNotFoundError extends KeyMapError {
  constructor(public readonly canonicalKey: CanonicalKey) {
    super(`No entry for canonical key ${formatCanonicalKey(canonicalKey)}`);
  }
}

// Only thrown when collision detection is enabled: the canonical key is
// present, but it was written by a different logical key.
export class CanonicalCollisionError extends KeyMapError {
  constructor(public readonly canonicalKey: CanonicalKey) {
    super(
      `Canonical key ${formatCanonicalKey(canonicalKey)} belongs to a different key`,
    );
  }
}

export class StoreOwnershipError extends KeyMapError {
  constructor() {
    super(
      "Backing store is already owned by another HeterogeneousKeyMap; " +
      "call release() on that map first",
    );
  }
}

export class StoreReleasedError extends KeyMapError {
  constructor() {
    super("HeterogeneousKeyMap has released its backing store");
  }
}
