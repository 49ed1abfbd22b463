export { createDbClient, initializeDatabase, type DatabaseConfig } from "./schema.js";
export { Store, STORY_STATUSES } from "./store.js";
export type {
  DeliveryCandidate,
  NewChunk,
  NewStory,
  QueueStats,
  Story,
  StoryChunk,
  StoryMetadataUpdate,
  StoryProgress,
  StoryStatus,
} from "./store.js";
