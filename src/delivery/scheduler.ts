import {
  chunkTitle,
  renderChunkDocument,
  type ArtifactStore,
} from "../artifacts/index.js";
import type { DeliveryCandidate, Store } from "../db/index.js";
import { notifySafely, type Notifier } from "../notify/index.js";
import { DeliveryError, errorMessage } from "../shared/errors.js";
import type { ChunkSender } from "./sender.js";

export interface DeliveryConfig {
  deliveryEmail: string | null;
  adminEmail: string | null;
  testMode: boolean;
  deliveryTime: string; // "12:00"
  leaseMinutes: number;
}

export type DeliveryOutcome =
  | { type: "queue-empty" }
  | { type: "in-flight"; chunkId: number }
  | { type: "already-sent"; chunkId: number }
  | {
      type: "delivered";
      chunkId: number;
      storyId: number;
      chunkNumber: number;
      totalChunks: number;
      recipient: string;
      messageId: string;
      storyComplete: boolean;
    };

function fileSlug(title: string): string {
  const slug = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 60);
  return slug || "story";
}

/**
 * Sends one chunk per run, earliest story first, and guarantees a chunk is
 * marked sent at most once even when runs overlap.
 */
export class DeliveryScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly store: Store,
    private readonly artifacts: ArtifactStore,
    private readonly sender: ChunkSender,
    private readonly notifier: Notifier,
    private readonly config: DeliveryConfig,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async deliverNext(): Promise<DeliveryOutcome> {
    const candidate = await this.store.getNextUnsentChunk();

    if (!candidate) {
      console.log("[Delivery] Queue is empty - no chunks to deliver");
      await notifySafely(this.notifier, { type: "delivery.queue-empty", details: {} });
      return { type: "queue-empty" };
    }

    const { chunk } = candidate;
    const staleBefore = new Date(this.clock().getTime() - this.config.leaseMinutes * 60 * 1000);
    const claimed = await this.store.claimChunk(chunk.id, staleBefore);

    if (!claimed) {
      console.log(`[Delivery] Chunk ${chunk.id} is already being delivered`);
      return { type: "in-flight", chunkId: chunk.id };
    }

    let recipient: string;
    let messageId: string;
    try {
      ({ recipient, messageId } = await this.send(candidate));
    } catch (error) {
      await this.store.releaseChunk(chunk.id);
      const message = errorMessage(error);
      console.error(`[Delivery] Failed to send chunk ${chunk.id}: ${message}`);

      await notifySafely(this.notifier, {
        type: "delivery.failed",
        storyId: chunk.storyId,
        chunkId: chunk.id,
        details: {
          title: candidate.story.title,
          chunkNumber: chunk.chunkNumber,
          totalChunks: chunk.totalChunks,
          error: message,
        },
      });

      throw new DeliveryError(chunk.id, `Delivery of chunk ${chunk.id} failed: ${message}`, {
        cause: error,
      });
    }

    const marked = await this.store.markChunkSent(chunk.id);
    if (!marked) {
      console.warn(`[Delivery] Chunk ${chunk.id} was marked sent by another run`);
      return { type: "already-sent", chunkId: chunk.id };
    }

    const progress = await this.store.getStoryProgress(chunk.storyId);
    console.log(
      `[Delivery] Sent "${candidate.story.title}" part ${chunk.chunkNumber}/${chunk.totalChunks} to ${recipient}`
    );

    await notifySafely(this.notifier, {
      type: "chunk.delivered",
      storyId: chunk.storyId,
      chunkId: chunk.id,
      details: {
        title: candidate.story.title,
        chunkNumber: chunk.chunkNumber,
        totalChunks: chunk.totalChunks,
        recipient,
        storyComplete: progress.complete,
      },
    });

    return {
      type: "delivered",
      chunkId: chunk.id,
      storyId: chunk.storyId,
      chunkNumber: chunk.chunkNumber,
      totalChunks: chunk.totalChunks,
      recipient,
      messageId,
      storyComplete: progress.complete,
    };
  }

  private async send(
    candidate: DeliveryCandidate
  ): Promise<{ recipient: string; messageId: string }> {
    const { chunk, story } = candidate;
    const testing = this.config.testMode && this.config.adminEmail !== null;
    const recipient = testing ? this.config.adminEmail : this.config.deliveryEmail;

    if (!recipient) {
      throw new Error("no delivery address configured");
    }

    let document = await this.artifacts.get(chunk.storagePath);
    if (document === null) {
      console.warn(`[Delivery] Artifact ${chunk.storagePath} missing, re-rendering`);
      document = renderChunkDocument(story, chunk);
      await this.artifacts.put(chunk.storagePath, document);
    }

    const title = chunkTitle(story, chunk);
    const messageId = await this.sender.send({
      to: recipient,
      subject: testing ? `[TEST] ${title}` : title,
      textBody: `${title}${story.author ? ` by ${story.author}` : ""}`,
      attachment: {
        fileName: `${fileSlug(story.title)}-part-${String(chunk.chunkNumber).padStart(3, "0")}.html`,
        contentType: "text/html",
        content: document,
      },
    });

    return { recipient, messageId };
  }

  // ============ Daily timer ============

  start(): void {
    if (this.running) {
      console.log("[Delivery] Scheduler already running");
      return;
    }

    const [hours, minutes] = this.config.deliveryTime.split(":").map(Number);
    if (isNaN(hours) || isNaN(minutes)) {
      throw new Error(`Invalid delivery time: ${this.config.deliveryTime}`);
    }

    this.running = true;
    this.scheduleNext(hours, minutes);
    console.log(`[Delivery] Scheduler started (daily at ${this.config.deliveryTime})`);
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    console.log("[Delivery] Scheduler stopped");
  }

  private scheduleNext(hours: number, minutes: number): void {
    if (!this.running) return;

    const now = this.clock();
    const nextRun = new Date(now);
    nextRun.setHours(hours, minutes, 0, 0);
    if (nextRun <= now) {
      nextRun.setDate(nextRun.getDate() + 1);
    }

    console.log(`[Delivery] Next delivery scheduled for ${nextRun.toLocaleString()}`);

    this.timer = setTimeout(() => {
      this.runScheduled().finally(() => this.scheduleNext(hours, minutes));
    }, nextRun.getTime() - now.getTime());
  }

  private async runScheduled(): Promise<void> {
    try {
      await this.deliverNext();
    } catch (error) {
      console.error(`[Delivery] Scheduled delivery failed: ${errorMessage(error)}`);
    }
  }

  // Manual trigger
  async triggerDelivery(): Promise<DeliveryOutcome> {
    console.log("[Delivery] Manually triggering delivery...");
    return this.deliverNext();
  }
}
