import type { Sequence } from "./sequence";

// One element of a composed sequence: the i-th element of every input, in
// input order.
export type Group = readonly unknown[];

// The i-th position of every sequence in S, for i = 0.
type Heads<S> = {
  [K in keyof S]: S[K] extends readonly [infer Head, ...unknown[]] ? Head : never;
};

// Every sequence in S with its first position removed.
type Tails<S> = {
  [K in keyof S]: S[K] extends readonly [unknown, ...infer Tail] ? Tail : never;
};

// The element type of every sequence in S, for inputs whose length the
// compiler does not know.
type Elements<S> = {
  [K in keyof S]: S[K] extends readonly (infer Element)[] ? Element : never;
};

type AllNonEmpty<S> =
  S extends readonly [infer First, ...infer Rest]
    ? First extends readonly [unknown, ...unknown[]] ? AllNonEmpty<Rest> : false
    : true;

type AllFixedLength<S> =
  S extends readonly [infer First, ...infer Rest]
    ? First extends Sequence
      ? number extends First["length"] ? false : AllFixedLength<Rest>
      : false
    : true;

// Truncating zip over fixed-length tuple types (kept tail-recursive).
type ZipFixed<S, Acc extends readonly unknown[] = []> =
  AllNonEmpty<S> extends true
    ? ZipFixed<Tails<S>, [...Acc, Readonly<Heads<S>>]>
    : Acc;

type IsAny<T> = 0 extends 1 & T ? true : false;

// Static type of compose(...S). When every input is a fixed-length tuple
// type, the result is a tuple of exactly min(lengths) groups, each group
// keeping the per-position types of its inputs. Otherwise the result is an
// array of groups of element types.
export type Composed<S extends readonly Sequence[]> =
  IsAny<S> extends true
    ? readonly Group[]
    : AllFixedLength<S> extends true
      ? Readonly<ZipFixed<S>>
      : readonly Readonly<Elements<S>>[];
