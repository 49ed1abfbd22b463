export {
  StoryLifecycleManager,
  DEFAULT_LIFECYCLE_CONFIG,
  type Chunker,
  type Extractor,
  type LifecycleConfig,
  type ProcessOutcome,
  type RetrySweepResult,
} from "./manager.js";
export { TRANSITIONS, assertTransition, canTransition } from "./transitions.js";
