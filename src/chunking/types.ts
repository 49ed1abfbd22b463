import type { ChunkingError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";

export interface Paragraph {
  index: number;
  text: string;
  words: number;
  sceneBreak: boolean;
}

export interface ChunkingInput {
  paragraphs: Paragraph[];
  targetWords: number;
  tolerance: number;
  minChunkWords: number;
  totalWords: number;
}

/**
 * Paragraph indices at which a new chunk starts. Index 0 is implied.
 */
export interface BreakPlan {
  breaks: number[];
}

export type ChunkingStrategyName = "agent" | "llm" | "simple";

export interface ChunkingStrategy {
  readonly name: ChunkingStrategyName;
  attempt(input: ChunkingInput): Promise<Result<BreakPlan, ChunkingError>>;
}

export interface ChunkDraft {
  chunkNumber: number;
  totalChunks: number;
  text: string;
  recap: string | null;
  narrative: string;
  wordCount: number;
  narrativeWordCount: number;
}

export interface ChunkingAttempt {
  strategy: ChunkingStrategyName;
  message: string;
}

export interface ChunkingOutcome {
  chunks: ChunkDraft[];
  chunkingStrategy: ChunkingStrategyName;
  totalWords: number;
  attempts: ChunkingAttempt[];
}

export interface ChunkingOptions {
  targetWords?: number;
  preferred?: ChunkingStrategyName;
}

export interface ChunkingConfig {
  targetWords: number;
  tolerance: number;
  minChunkWords: number;
  recapWords: number;
  useAgent: boolean;
  useLlm: boolean;
  llmModel: string;
  agentModel: string;
  maxRevisionRounds: number;
  maxSinglePassChars: number;
  strategyTimeoutMs: number;
}

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  targetWords: 5000,
  tolerance: 0.15,
  minChunkWords: 500,
  recapWords: 250,
  useAgent: false,
  useLlm: false,
  llmModel: "claude-haiku-4-5",
  agentModel: "claude-sonnet-4-5",
  maxRevisionRounds: 2,
  maxSinglePassChars: 400_000,
  strategyTimeoutMs: 120_000,
};
