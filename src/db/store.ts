import type { Client, InStatement, ResultSet, Row } from "@libsql/client";
import { PersistenceError } from "../shared/errors.js";
import { integer, optionalInteger, optionalText, text } from "./rows.js";

// Types

export type StoryStatus = "pending" | "processing" | "chunked" | "failed";

export const STORY_STATUSES: readonly StoryStatus[] = [
  "pending",
  "processing",
  "chunked",
  "failed",
];

export interface Story {
  id: number;
  sourceRef: string;
  title: string;
  author: string | null;
  status: StoryStatus;
  wordCount: number | null;
  extractionMethod: string | null;
  chunkingStrategy: string | null;
  retryCount: number;
  errorMessage: string | null;
  rawInput: string;
  receivedAt: string;
  processedAt: string | null;
  updatedAt: string;
}

export interface StoryChunk {
  id: number;
  storyId: number;
  chunkNumber: number;
  totalChunks: number;
  wordCount: number;
  narrativeWordCount: number;
  text: string;
  storagePath: string;
  createdAt: string;
  deliveryStartedAt: string | null;
  sentAt: string | null;
}

export interface NewStory {
  sourceRef: string;
  title: string;
  author: string | null;
  rawInput: string;
}

export interface StoryMetadataUpdate {
  title: string;
  author: string | null;
  wordCount: number;
  extractionMethod: string;
}

export interface NewChunk {
  chunkNumber: number;
  totalChunks: number;
  wordCount: number;
  narrativeWordCount: number;
  text: string;
  storagePath: string;
}

export interface DeliveryCandidate {
  chunk: StoryChunk;
  story: Pick<Story, "id" | "title" | "author">;
}

export interface StoryProgress {
  storyId: number;
  totalChunks: number;
  sentChunks: number;
  nextChunkNumber: number | null;
  complete: boolean;
}

export interface QueueStats {
  stories: Record<StoryStatus, number>;
  unsentChunks: number;
}

function isStoryStatus(value: string): value is StoryStatus {
  return STORY_STATUSES.some((status) => status === value);
}

function toStory(row: Row): Story {
  const status = text(row, "status");
  if (!isStoryStatus(status)) {
    throw new Error(`Unknown story status: ${status}`);
  }

  return {
    id: integer(row, "id"),
    sourceRef: text(row, "source_ref"),
    title: text(row, "title"),
    author: optionalText(row, "author"),
    status,
    wordCount: optionalInteger(row, "word_count"),
    extractionMethod: optionalText(row, "extraction_method"),
    chunkingStrategy: optionalText(row, "chunking_strategy"),
    retryCount: integer(row, "retry_count"),
    errorMessage: optionalText(row, "error_message"),
    rawInput: text(row, "raw_input"),
    receivedAt: text(row, "received_at"),
    processedAt: optionalText(row, "processed_at"),
    updatedAt: text(row, "updated_at"),
  };
}

function toChunk(row: Row): StoryChunk {
  return {
    id: integer(row, "id"),
    storyId: integer(row, "story_id"),
    chunkNumber: integer(row, "chunk_number"),
    totalChunks: integer(row, "total_chunks"),
    wordCount: integer(row, "word_count"),
    narrativeWordCount: integer(row, "narrative_word_count"),
    text: text(row, "chunk_text"),
    storagePath: text(row, "storage_path"),
    createdAt: text(row, "created_at"),
    deliveryStartedAt: optionalText(row, "delivery_started_at"),
    sentAt: optionalText(row, "sent_at"),
  };
}

// Store class

export class Store {
  constructor(
    private readonly db: Client,
    private readonly clock: () => Date = () => new Date()
  ) {}

  private now(): string {
    return this.clock().toISOString();
  }

  private async execute(operation: string, statement: InStatement): Promise<ResultSet> {
    try {
      return await this.db.execute(statement);
    } catch (error) {
      throw new PersistenceError(operation, error);
    }
  }

  // ============ Stories ============

  /**
   * Insert a pending story. Returns the existing row, with created=false,
   * when the source reference was already ingested.
   */
  async createStory(story: NewStory): Promise<{ story: Story; created: boolean }> {
    const now = this.now();
    const result = await this.execute("createStory", {
      sql: `INSERT INTO stories (source_ref, title, author, status, raw_input, received_at, updated_at)
            VALUES (?, ?, ?, 'pending', ?, ?, ?)
            ON CONFLICT(source_ref) DO NOTHING`,
      args: [story.sourceRef, story.title, story.author, story.rawInput, now, now],
    });

    const stored = await this.getStoryBySource(story.sourceRef);
    if (!stored) {
      throw new PersistenceError("createStory", `story ${story.sourceRef} missing after insert`);
    }
    return { story: stored, created: result.rowsAffected > 0 };
  }

  async getStory(id: number): Promise<Story | null> {
    const result = await this.execute("getStory", {
      sql: "SELECT * FROM stories WHERE id = ?",
      args: [id],
    });
    return result.rows.length > 0 ? toStory(result.rows[0]) : null;
  }

  async getStoryBySource(sourceRef: string): Promise<Story | null> {
    const result = await this.execute("getStoryBySource", {
      sql: "SELECT * FROM stories WHERE source_ref = ?",
      args: [sourceRef],
    });
    return result.rows.length > 0 ? toStory(result.rows[0]) : null;
  }

  async getStoriesByStatus(status: StoryStatus, limit: number = 100): Promise<Story[]> {
    const result = await this.execute("getStoriesByStatus", {
      sql: `SELECT * FROM stories WHERE status = ?
            ORDER BY received_at ASC, id ASC LIMIT ?`,
      args: [status, limit],
    });
    return result.rows.map(toStory);
  }

  async getRetryableStories(maxRetries: number): Promise<Story[]> {
    const result = await this.execute("getRetryableStories", {
      sql: `SELECT * FROM stories WHERE status = 'failed' AND retry_count < ?
            ORDER BY updated_at ASC, id ASC`,
      args: [maxRetries],
    });
    return result.rows.map(toStory);
  }

  async getExhaustedStories(maxRetries: number): Promise<Story[]> {
    const result = await this.execute("getExhaustedStories", {
      sql: `SELECT * FROM stories WHERE status = 'failed' AND retry_count >= ?
            ORDER BY updated_at ASC, id ASC`,
      args: [maxRetries],
    });
    return result.rows.map(toStory);
  }

  /**
   * pending|failed -> processing. Only succeeds while the story is still in
   * the expected state and, coming from failed, under the retry cap.
   */
  async beginProcessing(
    id: number,
    from: "pending" | "failed",
    maxRetries: number
  ): Promise<boolean> {
    const result = await this.execute("beginProcessing", {
      sql: `UPDATE stories SET status = 'processing', updated_at = ?
            WHERE id = ? AND status = ? AND (status = 'pending' OR retry_count < ?)`,
      args: [this.now(), id, from, maxRetries],
    });
    return result.rowsAffected === 1;
  }

  async updateStoryMetadata(id: number, metadata: StoryMetadataUpdate): Promise<boolean> {
    const result = await this.execute("updateStoryMetadata", {
      sql: `UPDATE stories
            SET title = ?, author = ?, word_count = ?, extraction_method = ?, updated_at = ?
            WHERE id = ? AND status = 'processing'`,
      args: [
        metadata.title,
        metadata.author,
        metadata.wordCount,
        metadata.extractionMethod,
        this.now(),
        id,
      ],
    });
    return result.rowsAffected === 1;
  }

  /**
   * processing -> failed, counting the failure.
   */
  async markStoryFailed(id: number, errorMessage: string): Promise<boolean> {
    const result = await this.execute("markStoryFailed", {
      sql: `UPDATE stories
            SET status = 'failed', retry_count = retry_count + 1, error_message = ?, updated_at = ?
            WHERE id = ? AND status = 'processing'`,
      args: [errorMessage, this.now(), id],
    });
    return result.rowsAffected === 1;
  }

  /**
   * Insert every chunk and move processing -> chunked in one write batch.
   * The inserts are guarded on the same status as the update, so either the
   * whole set lands with the status change or nothing does.
   */
  async completeStory(
    id: number,
    chunkingStrategy: string,
    chunks: NewChunk[]
  ): Promise<boolean> {
    const now = this.now();
    const statements: InStatement[] = chunks.map((chunk) => ({
      sql: `INSERT INTO story_chunks
              (story_id, chunk_number, total_chunks, word_count, narrative_word_count,
               chunk_text, storage_path, created_at)
            SELECT ?, ?, ?, ?, ?, ?, ?, ?
            FROM stories WHERE id = ? AND status = 'processing'`,
      args: [
        id,
        chunk.chunkNumber,
        chunk.totalChunks,
        chunk.wordCount,
        chunk.narrativeWordCount,
        chunk.text,
        chunk.storagePath,
        now,
        id,
      ],
    }));

    statements.push({
      sql: `UPDATE stories
            SET status = 'chunked', chunking_strategy = ?, error_message = NULL,
                processed_at = ?, updated_at = ?
            WHERE id = ? AND status = 'processing'`,
      args: [chunkingStrategy, now, now, id],
    });

    let results: ResultSet[];
    try {
      results = await this.db.batch(statements, "write");
    } catch (error) {
      throw new PersistenceError("completeStory", error);
    }

    return results[results.length - 1].rowsAffected === 1;
  }

  // ============ Chunks ============

  async getStoryChunks(storyId: number): Promise<StoryChunk[]> {
    const result = await this.execute("getStoryChunks", {
      sql: "SELECT * FROM story_chunks WHERE story_id = ? ORDER BY chunk_number ASC",
      args: [storyId],
    });
    return result.rows.map(toChunk);
  }

  async getChunk(id: number): Promise<StoryChunk | null> {
    const result = await this.execute("getChunk", {
      sql: "SELECT * FROM story_chunks WHERE id = ?",
      args: [id],
    });
    return result.rows.length > 0 ? toChunk(result.rows[0]) : null;
  }

  /**
   * Earliest unsent chunk of a chunked story: oldest batch first, then
   * story id, then chunk number.
   */
  async getNextUnsentChunk(): Promise<DeliveryCandidate | null> {
    const result = await this.execute("getNextUnsentChunk", {
      sql: `SELECT c.*, s.title AS story_title, s.author AS story_author
            FROM story_chunks c
            JOIN stories s ON s.id = c.story_id
            WHERE c.sent_at IS NULL AND s.status = 'chunked'
            ORDER BY c.created_at ASC, c.story_id ASC, c.chunk_number ASC
            LIMIT 1`,
      args: [],
    });

    if (result.rows.length === 0) return null;
    const row = result.rows[0];
    const chunk = toChunk(row);

    return {
      chunk,
      story: {
        id: chunk.storyId,
        title: text(row, "story_title"),
        author: optionalText(row, "story_author"),
      },
    };
  }

  /**
   * Take the delivery lease on an unsent chunk. A lease started before
   * staleBefore is considered abandoned and can be taken over.
   */
  async claimChunk(id: number, staleBefore: Date): Promise<boolean> {
    const result = await this.execute("claimChunk", {
      sql: `UPDATE story_chunks SET delivery_started_at = ?
            WHERE id = ? AND sent_at IS NULL
              AND (delivery_started_at IS NULL OR delivery_started_at < ?)`,
      args: [this.now(), id, staleBefore.toISOString()],
    });
    return result.rowsAffected === 1;
  }

  async releaseChunk(id: number): Promise<void> {
    await this.execute("releaseChunk", {
      sql: `UPDATE story_chunks SET delivery_started_at = NULL
            WHERE id = ? AND sent_at IS NULL`,
      args: [id],
    });
  }

  /**
   * Set sent_at once. Returns false when another invocation got there first.
   */
  async markChunkSent(id: number): Promise<boolean> {
    const result = await this.execute("markChunkSent", {
      sql: `UPDATE story_chunks SET sent_at = ?, delivery_started_at = NULL
            WHERE id = ? AND sent_at IS NULL`,
      args: [this.now(), id],
    });
    return result.rowsAffected === 1;
  }

  // Administrative: makes a chunk eligible for delivery again.
  async resetChunk(id: number): Promise<boolean> {
    const result = await this.execute("resetChunk", {
      sql: `UPDATE story_chunks SET sent_at = NULL, delivery_started_at = NULL WHERE id = ?`,
      args: [id],
    });
    return result.rowsAffected === 1;
  }

  async getStoryProgress(storyId: number): Promise<StoryProgress> {
    const result = await this.execute("getStoryProgress", {
      sql: `SELECT COUNT(*) AS total,
                   COALESCE(SUM(CASE WHEN sent_at IS NOT NULL THEN 1 ELSE 0 END), 0) AS sent,
                   MIN(CASE WHEN sent_at IS NULL THEN chunk_number END) AS next_chunk
            FROM story_chunks WHERE story_id = ?`,
      args: [storyId],
    });

    const row = result.rows[0];
    const totalChunks = integer(row, "total");
    const sentChunks = integer(row, "sent");

    return {
      storyId,
      totalChunks,
      sentChunks,
      nextChunkNumber: optionalInteger(row, "next_chunk"),
      complete: totalChunks > 0 && sentChunks === totalChunks,
    };
  }

  async getQueueStats(): Promise<QueueStats> {
    const statuses = await this.execute("getQueueStats", {
      sql: "SELECT status, COUNT(*) AS count FROM stories GROUP BY status",
      args: [],
    });
    const unsent = await this.execute("getQueueStats", {
      sql: "SELECT COUNT(*) AS count FROM story_chunks WHERE sent_at IS NULL",
      args: [],
    });

    const stories: Record<StoryStatus, number> = {
      pending: 0,
      processing: 0,
      chunked: 0,
      failed: 0,
    };
    for (const row of statuses.rows) {
      const status = text(row, "status");
      if (isStoryStatus(status)) stories[status] = integer(row, "count");
    }

    return { stories, unsentChunks: integer(unsent.rows[0], "count") };
  }

  // ============ Sync State ============

  async getSyncState(key: string): Promise<string | null> {
    const result = await this.execute("getSyncState", {
      sql: "SELECT value FROM sync_state WHERE key = ?",
      args: [key],
    });

    if (result.rows.length === 0) return null;
    return text(result.rows[0], "value");
  }

  async setSyncState(key: string, value: string): Promise<void> {
    await this.execute("setSyncState", {
      sql: `INSERT OR REPLACE INTO sync_state (key, value, updated_at)
            VALUES (?, ?, ?)`,
      args: [key, value, this.now()],
    });
  }
}
