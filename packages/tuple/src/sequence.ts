// A fixed-length, possibly heterogeneous, immutable group of elements.
export type Sequence = readonly unknown[];

// Builds a frozen Sequence whose static type keeps the type of every
// position, which an array literal would widen to a union:
//
//   sequence(1, "a")  // Readonly<[number, string]>
//   [1, "a"]          // (string | number)[]
//
export function sequence<E extends unknown[]>(...elements: E): Readonly<E> {
  return Object.freeze(elements);
}

export function isSequence(value: unknown): value is Sequence {
  return Array.isArray(value);
}
