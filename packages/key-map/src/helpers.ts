export const {
  prototype: {
    toString: objectToString,
  },
} = Object;

const MAP_TO_STRING_TAG = objectToString.call(new Map);

export function assertMap(map: unknown): asserts map is Map<unknown, unknown> {
  const toStringTag = objectToString.call(map);
  if (toStringTag !== MAP_TO_STRING_TAG) {
    throw new TypeError(`Not a Map: ${toStringTag}`);
  }
}

// Canonical keys print as fixed-width hexadecimal, which keeps error messages
// for nearby keys easy to compare.
export function formatCanonicalKey(key: bigint): string {
  return "0x" + key.toString(16).padStart(16, "0");
}
