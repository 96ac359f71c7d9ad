import {
  Specializer,
  TrieSpecializer,
  assertSequence,
} from "@hetero/specialize";

import type { Sequence } from "./sequence";
import type { Composed, Group } from "./types";
import { ArityError, DefinitionError } from "./errors";

// Everything compose needs to know about its inputs before reading any of
// their elements. Plans depend only on the input lengths, so one plan serves
// every call whose inputs have those lengths.
export interface CompositionPlan {
  // Number of input sequences, which is also the size of every group.
  readonly arity: number;
  // Number of groups in the result: the length of the shortest input.
  readonly length: number;
  readonly inputLengths: readonly number[];
}

export type PlanSpecializer = Specializer<readonly number[], CompositionPlan>;

export function makePlan(inputLengths: readonly number[]): CompositionPlan {
  const arity = inputLengths.length;
  if (arity === 0) throw new DefinitionError;
  if (arity === 1) throw new ArityError(arity);

  let length = inputLengths[0];
  for (let i = 1; i < arity; ++i) {
    if (inputLengths[i] < length) length = inputLengths[i];
  }

  return Object.freeze({
    arity,
    length,
    inputLengths: Object.freeze(inputLengths.slice(0)),
  });
}

export class Composer {
  constructor(
    private readonly specializer: PlanSpecializer =
      new TrieSpecializer(makePlan, false),
  ) {}

  // Number of distinct input-length combinations planned so far.
  public get plans(): number {
    return this.specializer.size;
  }

  public planFor(...sequences: Sequence[]): CompositionPlan {
    return this.planForArray(sequences);
  }

  public planForArray(sequences: readonly Sequence[]): CompositionPlan {
    assertSequence(sequences);
    // Arity problems are reported before the inputs themselves are checked.
    if (sequences.length === 0) throw new DefinitionError;
    if (sequences.length === 1) throw new ArityError(1);
    sequences.forEach(assertSequence);
    return this.specializer.specialize(sequences.map(lengthOf));
  }

  public compose<S extends readonly [Sequence, Sequence, ...Sequence[]]>(
    ...sequences: S
  ): Composed<S>;

  public compose(...sequences: Sequence[]): readonly Group[] {
    return this.composeArray(sequences);
  }

  // Like compose, for callers whose number of sequences is only known at run
  // time. The result is typed loosely for the same reason.
  public composeArray(sequences: readonly Sequence[]): readonly Group[] {
    const { arity, length } = this.planForArray(sequences);
    const groups: Group[] = new Array(length);
    for (let i = 0; i < length; ++i) {
      const group: unknown[] = new Array(arity);
      for (let j = 0; j < arity; ++j) {
        group[j] = sequences[j][i];
      }
      groups[i] = Object.freeze(group);
    }
    return Object.freeze(groups);
  }
}

function lengthOf(sequence: Sequence): number {
  return sequence.length;
}

const defaultComposer = new Composer;

export function compose<S extends readonly [Sequence, Sequence, ...Sequence[]]>(
  ...sequences: S
): Composed<S>;

export function compose(...sequences: Sequence[]): readonly Group[] {
  return defaultComposer.composeArray(sequences);
}

export function composeArray(sequences: readonly Sequence[]): readonly Group[] {
  return defaultComposer.composeArray(sequences);
}
