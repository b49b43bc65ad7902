/**
 * Reverse-play generator
 */

export * from "./constants";
export {
  type AttemptOutcome,
  type AttemptRecord,
  createReversePlayGenerator,
  type GenerationFailure,
  type GenerationOutcome,
  type GenerationSuccess,
  ReversePlayGenerator,
} from "./generator";
export { buildLayout, carveInternalWalls, type LayoutRequest, placeGoals } from "./layout";
export {
  legalPulls,
  repositioningSteps,
  type ReversePlayFailure,
  type ReversePlayFailureReason,
  type ReversePlayOptions,
  type ReversePlayResult,
  type ReversePlaySuccess,
  reversePlay,
} from "./reverse-play";
