export {
  chunkStoragePath,
  chunkTitle,
  renderChunkDocument,
  type RenderableChunk,
  type RenderableStory,
} from "./renderer.js";
export {
  DatabaseArtifactStore,
  FileArtifactStore,
  MemoryArtifactStore,
  type ArtifactStore,
} from "./store.js";
