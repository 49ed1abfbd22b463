import { chunkStoragePath, renderChunkDocument, type ArtifactStore } from "../artifacts/index.js";
import type { ChunkingOptions, ChunkingOutcome } from "../chunking/index.js";
import type { NewChunk, Store, Story } from "../db/index.js";
import {
  parseStoredDescriptor,
  type ContentDescriptor,
  type ExtractionResult,
} from "../extraction/index.js";
import { notifySafely, type Notifier } from "../notify/index.js";
import {
  IllegalTransitionError,
  PersistenceError,
  errorMessage,
} from "../shared/errors.js";
import { authorFromSender, cleanSubject } from "../shared/text.js";
import { assertTransition } from "./transitions.js";

export interface Extractor {
  extract(input: ContentDescriptor): Promise<ExtractionResult>;
}

export interface Chunker {
  chunk(text: string, options?: ChunkingOptions): Promise<ChunkingOutcome>;
}

export interface LifecycleConfig {
  maxRetries: number;
  retryIntervalMinutes: number;
  concurrency: number;
}

export const DEFAULT_LIFECYCLE_CONFIG: LifecycleConfig = {
  maxRetries: 3,
  retryIntervalMinutes: 60,
  concurrency: 5,
};

export type ProcessOutcome =
  | { storyId: number; status: "chunked"; totalChunks: number; chunkingStrategy: string }
  | { storyId: number; status: "failed"; error: string; retriesExhausted: boolean }
  | { storyId: number; status: "error"; error: string };

export interface RetrySweepResult {
  retried: ProcessOutcome[];
  exhausted: Story[];
}

/**
 * Moves stories through pending -> processing -> chunked | failed and owns
 * the retry policy for failed ones.
 */
export class StoryLifecycleManager {
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly store: Store,
    private readonly extractor: Extractor,
    private readonly chunker: Chunker,
    private readonly artifacts: ArtifactStore,
    private readonly notifier: Notifier,
    private readonly config: LifecycleConfig = DEFAULT_LIFECYCLE_CONFIG
  ) {}

  /**
   * Record a new story. A source reference that was already ingested returns
   * the existing story untouched.
   */
  async ingest(
    descriptor: ContentDescriptor,
    sourceRef: string
  ): Promise<{ story: Story; created: boolean }> {
    const result = await this.store.createStory({
      sourceRef,
      title: cleanSubject(descriptor.subject) || "Untitled Story",
      author: authorFromSender(descriptor.from),
      rawInput: JSON.stringify(descriptor),
    });

    if (result.created) {
      console.log(`[Lifecycle] Ingested story ${result.story.id} from ${sourceRef}`);
    } else {
      console.log(`[Lifecycle] ${sourceRef} already ingested as story ${result.story.id}`);
    }

    return result;
  }

  async process(storyId: number): Promise<ProcessOutcome> {
    const story = await this.store.getStory(storyId);
    if (!story) {
      throw new Error(`Story not found: ${storyId}`);
    }

    const { status } = story;
    assertTransition(story, "processing", this.config.maxRetries);
    if (status !== "pending" && status !== "failed") {
      throw new IllegalTransitionError(status, "processing");
    }

    const begun = await this.store.beginProcessing(storyId, status, this.config.maxRetries);
    if (!begun) {
      throw new IllegalTransitionError(status, "processing", "story changed concurrently");
    }

    console.log(
      `[Lifecycle] Processing story ${storyId}${status === "failed" ? ` (retry ${story.retryCount})` : ""}`
    );

    try {
      return await this.runPipeline(story);
    } catch (error) {
      return this.handleFailure(story, error);
    }
  }

  private async runPipeline(story: Story): Promise<ProcessOutcome> {
    const descriptor = parseStoredDescriptor(story.rawInput);
    const extracted = await this.extractor.extract(descriptor);
    const { metadata } = extracted;

    await this.store.updateStoryMetadata(story.id, {
      title: metadata.title,
      author: metadata.author,
      wordCount: metadata.wordCount,
      extractionMethod: metadata.extractionMethod,
    });

    const outcome = await this.chunker.chunk(extracted.content);
    const renderable = { title: metadata.title, author: metadata.author };

    const chunks: NewChunk[] = outcome.chunks.map((draft) => ({
      chunkNumber: draft.chunkNumber,
      totalChunks: draft.totalChunks,
      wordCount: draft.wordCount,
      narrativeWordCount: draft.narrativeWordCount,
      text: draft.text,
      storagePath: chunkStoragePath(story.id, draft.chunkNumber),
    }));

    await Promise.all(
      chunks.map((chunk) =>
        this.artifacts.put(chunk.storagePath, renderChunkDocument(renderable, chunk))
      )
    );

    const completed = await this.store.completeStory(story.id, outcome.chunkingStrategy, chunks);
    if (!completed) {
      throw new IllegalTransitionError("processing", "chunked", "story left processing state");
    }

    console.log(
      `[Lifecycle] Story ${story.id} chunked into ${chunks.length} part(s) with ${outcome.chunkingStrategy}`
    );
    await notifySafely(this.notifier, {
      type: "story.chunked",
      storyId: story.id,
      details: {
        title: metadata.title,
        totalChunks: chunks.length,
        wordCount: metadata.wordCount,
        extractionMethod: metadata.extractionMethod,
        chunkingStrategy: outcome.chunkingStrategy,
      },
    });

    return {
      storyId: story.id,
      status: "chunked",
      totalChunks: chunks.length,
      chunkingStrategy: outcome.chunkingStrategy,
    };
  }

  private async handleFailure(story: Story, error: unknown): Promise<ProcessOutcome> {
    const message = errorMessage(error);
    console.error(`[Lifecycle] Story ${story.id} failed: ${message}`);

    let marked = false;
    try {
      marked = await this.store.markStoryFailed(story.id, message);
    } catch (markError) {
      console.error(
        `[Lifecycle] Could not mark story ${story.id} failed: ${errorMessage(markError)}`
      );
    }

    if (error instanceof PersistenceError || error instanceof IllegalTransitionError) {
      throw error;
    }

    // markStoryFailed added one to the count read before processing began.
    const retryCount = story.retryCount + (marked ? 1 : 0);
    const retriesExhausted = retryCount >= this.config.maxRetries;

    await notifySafely(this.notifier, {
      type: "story.failed",
      storyId: story.id,
      details: { title: story.title, error: message, retryCount },
    });

    if (retriesExhausted) {
      console.warn(`[Lifecycle] Story ${story.id} exhausted ${this.config.maxRetries} retries`);
      await notifySafely(this.notifier, {
        type: "story.retries-exhausted",
        storyId: story.id,
        details: { title: story.title, error: message, retryCount },
      });
    }

    return { storyId: story.id, status: "failed", error: message, retriesExhausted };
  }

  async processPending(): Promise<ProcessOutcome[]> {
    const pending = await this.store.getStoriesByStatus("pending");
    if (pending.length > 0) {
      console.log(`[Lifecycle] ${pending.length} pending story(ies) to process`);
    }
    return this.processAll(pending);
  }

  async retrySweep(): Promise<RetrySweepResult> {
    const retryable = await this.store.getRetryableStories(this.config.maxRetries);
    if (retryable.length > 0) {
      console.log(`[Lifecycle] Retrying ${retryable.length} failed story(ies)`);
    }

    const retried = await this.processAll(retryable);
    const exhausted = await this.store.getExhaustedStories(this.config.maxRetries);

    for (const story of exhausted) {
      console.warn(
        `[Lifecycle] Story ${story.id} (${story.title}) needs manual attention: ${story.errorMessage ?? "unknown error"}`
      );
    }

    return { retried, exhausted };
  }

  startRetrySweeps(): void {
    if (this.sweepTimer) {
      console.log("[Lifecycle] Retry sweeps already running");
      return;
    }

    const intervalMs = this.config.retryIntervalMinutes * 60 * 1000;
    this.sweepTimer = setInterval(() => {
      this.retrySweep().catch((error) => {
        console.error(`[Lifecycle] Retry sweep failed: ${errorMessage(error)}`);
      });
    }, intervalMs);

    console.log(
      `[Lifecycle] Retry sweeps started (every ${this.config.retryIntervalMinutes} minutes)`
    );
  }

  stopRetrySweeps(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
      console.log("[Lifecycle] Retry sweeps stopped");
    }
  }

  // Stories are independent; run them in small parallel batches.
  private async processAll(stories: Story[]): Promise<ProcessOutcome[]> {
    const outcomes: ProcessOutcome[] = [];
    const concurrency = Math.max(1, this.config.concurrency);

    for (let i = 0; i < stories.length; i += concurrency) {
      const batch = stories.slice(i, i + concurrency);
      const results = await Promise.all(
        batch.map(async (story): Promise<ProcessOutcome> => {
          try {
            return await this.process(story.id);
          } catch (error) {
            console.error(`[Lifecycle] Story ${story.id} errored: ${errorMessage(error)}`);
            return { storyId: story.id, status: "error", error: errorMessage(error) };
          }
        })
      );
      outcomes.push(...results);
    }

    return outcomes;
  }
}
