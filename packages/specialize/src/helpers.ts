export const {
  prototype: {
    toString: objectToString,
  },
} = Object;

// Sequences are plain (usually frozen) arrays. Array-likes such as arguments
// objects or typed arrays are rejected, since their elements cannot be
// heterogeneous.
export function assertSequence(value: unknown): asserts value is readonly unknown[] {
  if (!Array.isArray(value)) {
    throw new TypeError(`Not a sequence: ${objectToString.call(value)}`);
  }
}
