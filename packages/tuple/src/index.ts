export { sequence, isSequence } from "./sequence";
export type { Sequence } from "./sequence";

export type { Composed, Group } from "./types";

export {
  Composer,
  compose,
  composeArray,
  makePlan,
} from "./compose";

export type {
  CompositionPlan,
  PlanSpecializer,
} from "./compose";

export {
  CompositionError,
  ArityError,
  DefinitionError,
} from "./errors";
