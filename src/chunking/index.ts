export { ChunkingOrchestrator, type ChunkingDependencies } from "./orchestrator.js";
export { SimpleChunker, planSimpleBreaks } from "./simple.js";
export { LlmChunker } from "./llm.js";
export { AgentChunker } from "./agent.js";
export {
  ExtractiveRecapWriter,
  ModelRecapWriter,
  extractiveRecap,
  formatRecap,
  splitRecap,
  type RecapWriter,
} from "./recap.js";
export { buildParagraphs, finalizeBreaks, segmentsFromBreaks } from "./plan.js";
export { numberParagraphs, parseBreakResponse } from "./prompting.js";
export {
  DEFAULT_CHUNKING_CONFIG,
  type ChunkDraft,
  type ChunkingConfig,
  type ChunkingOptions,
  type ChunkingOutcome,
  type ChunkingStrategyName,
  type Paragraph,
} from "./types.js";
