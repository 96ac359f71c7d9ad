export {
  Shape,
  shapeOf,
  tagOf,
  ARRAY_END,
} from "./shape";

export type {
  ShapeTag,
  ShapeToken,
} from "./shape";

export { TrieSpecializer } from "./specializer";
export type { Specializer } from "./specializer";

export {
  ShapedIterator,
  unroll,
  forEachShaped,
} from "./iterate";

export type {
  ShapedElement,
  ShapedBody,
  BodySpecializer,
  ShapeSelector,
} from "./iterate";

export { assertSequence } from "./helpers";
