import { Shape } from "./shape";
import { Specializer, TrieSpecializer } from "./specializer";
import { assertSequence } from "./helpers";

export interface ShapedElement<T> {
  readonly value: T;
  readonly index: number;
  readonly shape: Shape;
}

export type ShapedBody<T> = (value: T, index: number) => void;

export type BodySpecializer<T> = Specializer<readonly [Shape], ShapedBody<T>>;

// Picks the part of an element whose shape drives specialization. The default
// shapes the whole element.
export type ShapeSelector<T> = (value: T, index: number) => unknown;

const selectWhole = <T>(value: T): unknown => value;

// Walks a heterogeneous sequence once, computing each element's shape only
// when the element is reached. The iterator is its own iterable, so a second
// for-of loop over an exhausted ShapedIterator sees no elements.
export class ShapedIterator<T> implements IterableIterator<ShapedElement<T>> {
  private cursor = 0;
  private finished = false;

  constructor(
    private readonly elements: readonly T[],
    private readonly select: ShapeSelector<T> = selectWhole,
  ) {}

  public next(): IteratorResult<ShapedElement<T>, undefined> {
    if (!this.finished && this.cursor < this.elements.length) {
      const index = this.cursor++;
      const value = this.elements[index];
      return {
        done: false,
        value: { value, index, shape: Shape.of(this.select(value, index)) },
      };
    }
    this.finished = true;
    return { done: true, value: void 0 };
  }

  public [Symbol.iterator](): this {
    return this;
  }

  // Drains the remaining elements. The build function runs once per distinct
  // element shape, and the body it returns handles every element of that
  // shape. Returns the number of elements visited.
  public each(build: (shape: Shape) => ShapedBody<T>): number {
    return this.eachWith(
      new TrieSpecializer<readonly [Shape], ShapedBody<T>>(
        ([shape]) => build(shape),
      ),
    );
  }

  // Like each, but with a caller-owned specializer, so bodies built for one
  // sequence are reused for later sequences with elements of the same shapes.
  public eachWith(specializer: BodySpecializer<T>): number {
    let visited = 0;
    for (const { value, index, shape } of this) {
      specializer.specialize([shape])(value, index);
      ++visited;
    }
    return visited;
  }
}

export function unroll<T>(
  sequence: readonly T[],
  select?: ShapeSelector<T>,
): ShapedIterator<T> {
  assertSequence(sequence);
  return new ShapedIterator<T>(sequence, select);
}

export function forEachShaped<T>(
  sequence: readonly T[],
  build: (shape: Shape) => ShapedBody<T>,
): number {
  return unroll(sequence).each(build);
}
