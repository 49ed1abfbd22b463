import type { ExtractionError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";

/**
 * Raw story input as it arrives from an email, the ingest endpoint, or the
 * intake mailbox.
 */
export interface ContentDescriptor {
  text: string;
  html: string;
  subject: string;
  from: string;
  url?: string;
  password?: string;
}

export type ExtractionMethod = "agent" | "inline" | "url";

export type Confidence = "low" | "medium" | "high";

export interface ExtractedContent {
  content: string;
  confidence: number;
  title?: string;
  sourceUrl?: string;
}

export interface ExtractionStrategy {
  readonly name: ExtractionMethod;
  attempt(input: ContentDescriptor): Promise<Result<ExtractedContent, ExtractionError>>;
}

export interface ExtractionMetadata {
  title: string;
  author: string | null;
  extractionMethod: ExtractionMethod;
  wordCount: number;
  confidence: number;
  sourceUrl: string | null;
}

export interface ExtractionResult {
  content: string;
  metadata: ExtractionMetadata;
}

export interface ExtractionConfig {
  useAgent: boolean;
  agentModel: string;
  agentMinConfidence: Confidence;
  minAgentWords: number;
  minInlineChars: number;
  minPageChars: number;
  strategyTimeoutMs: number;
  fetchTimeoutMs: number;
}

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = {
  useAgent: false,
  agentModel: "claude-sonnet-4-5",
  agentMinConfidence: "medium",
  minAgentWords: 100,
  minInlineChars: 500,
  minPageChars: 500,
  strategyTimeoutMs: 120_000,
  fetchTimeoutMs: 30_000,
};
