import { Trie } from "@hetero/trie";

export type ShapeTag =
  | "undefined"
  | "null"
  | "boolean"
  | "number"
  | "bigint"
  | "string"
  | "symbol"
  | "function"
  | "object";

// Closes the tokens of an array shape, which open with the array's arity.
export const ARRAY_END = ")";

export type ShapeToken = ShapeTag | number | typeof ARRAY_END;

// Every Shape is interned by its signature, so two values have the same shape
// if and only if Shape.of returns the same (===) Shape object for both.
const pool = new Trie<{ shape?: Shape }>(false);

export class Shape {
  private constructor(
    public readonly tag: ShapeTag | "array",
    public readonly positions: readonly Shape[],
    // The flat token array identifying this shape. Nested arrays contribute
    // their arity, then their positions' tokens, then ARRAY_END, so no two
    // distinct shapes share a signature.
    public readonly signature: readonly ShapeToken[],
  ) {
    Object.freeze(positions);
    Object.freeze(signature);
    Object.freeze(this);
  }

  public static of(value: unknown): Shape {
    return Shape.scan(value, new Set);
  }

  // Number of positions for array shapes, undefined for everything else.
  public get arity(): number | undefined {
    return this.tag === "array" ? this.positions.length : void 0;
  }

  public isArray(): boolean {
    return this.tag === "array";
  }

  public toString(): string {
    if (this.tag !== "array") return this.tag;
    return "(" + this.positions.map(String).join(", ") + ")";
  }

  private static intern(tag: ShapeTag | "array", positions: Shape[]): Shape {
    const signature: ShapeToken[] = [];
    if (tag === "array") {
      signature.push(positions.length);
      positions.forEach(position => signature.push(...position.signature));
      signature.push(ARRAY_END);
    } else {
      signature.push(tag);
    }
    const node = pool.lookupArray(signature);
    return node.shape || (node.shape = new Shape(tag, positions, signature));
  }

  private static scan(value: unknown, seen: Set<unknown[]>): Shape {
    if (!Array.isArray(value)) {
      return Shape.intern(tagOf(value), []);
    }
    if (seen.has(value)) {
      throw new TypeError("Cannot compute the shape of a cyclic array");
    }
    seen.add(value);
    const positions: Shape[] = [];
    // Index access rather than map, so holes count as undefined positions.
    for (let i = 0; i < value.length; ++i) {
      positions.push(Shape.scan(value[i], seen));
    }
    seen.delete(value);
    return Shape.intern("array", positions);
  }
}

export function tagOf(value: unknown): ShapeTag {
  if (value === null) return "null";
  return typeof value;
}

export function shapeOf(value: unknown): Shape {
  return Shape.of(value);
}
