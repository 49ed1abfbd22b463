import { beforeEach, describe, it, expect } from "vitest";
import type { NewChunk, Store } from "../index.js";
import { PersistenceError } from "../../shared/errors.js";
import { TestClock, createMemoryStore } from "../../__tests__/support.js";

function chunks(count: number): NewChunk[] {
  return Array.from({ length: count }, (_, i) => ({
    chunkNumber: i + 1,
    totalChunks: count,
    wordCount: 100,
    narrativeWordCount: 90,
    text: `Part ${i + 1}.`,
    storagePath: `story-chunks/x/part-${i + 1}.html`,
  }));
}

async function chunkedStory(store: Store, sourceRef: string, count: number): Promise<number> {
  const { story } = await store.createStory({ sourceRef, title: sourceRef, author: null, rawInput: "{}" });
  await store.beginProcessing(story.id, "pending", 3);
  await store.completeStory(story.id, "simple", chunks(count));
  return story.id;
}

describe("Store", () => {
  let clock: TestClock;
  let store: Store;

  beforeEach(async () => {
    clock = new TestClock();
    store = await createMemoryStore(clock.now);
  });

  describe("createStory", () => {
    it("creates a pending story", async () => {
      const { story, created } = await store.createStory({
        sourceRef: "jmap:M1",
        title: "The Lighthouse",
        author: "Ana",
        rawInput: '{"text":"x"}',
      });

      expect(created).toBe(true);
      expect(story).toMatchObject({
        sourceRef: "jmap:M1",
        title: "The Lighthouse",
        author: "Ana",
        status: "pending",
        retryCount: 0,
        errorMessage: null,
        receivedAt: "2026-01-05T08:00:00.000Z",
      });
    });

    it("returns the existing story for a repeated source", async () => {
      const first = await store.createStory({ sourceRef: "jmap:M1", title: "One", author: null, rawInput: "{}" });
      const second = await store.createStory({ sourceRef: "jmap:M1", title: "Two", author: null, rawInput: "{}" });

      expect(second.created).toBe(false);
      expect(second.story.id).toBe(first.story.id);
      expect(second.story.title).toBe("One");
    });
  });

  describe("status transitions", () => {
    it("only begins processing from the expected state", async () => {
      const { story } = await store.createStory({ sourceRef: "a", title: "A", author: null, rawInput: "{}" });

      expect(await store.beginProcessing(story.id, "failed", 3)).toBe(false);
      expect(await store.beginProcessing(story.id, "pending", 3)).toBe(true);
      expect(await store.beginProcessing(story.id, "pending", 3)).toBe(false);
      expect((await store.getStory(story.id))?.status).toBe("processing");
    });

    it("counts failures and stops retries at the cap", async () => {
      const { story } = await store.createStory({ sourceRef: "a", title: "A", author: null, rawInput: "{}" });
      await store.beginProcessing(story.id, "pending", 3);

      for (let attempt = 1; attempt <= 3; attempt++) {
        expect(await store.markStoryFailed(story.id, `attempt ${attempt} failed`)).toBe(true);
        if (attempt < 3) expect(await store.beginProcessing(story.id, "failed", 3)).toBe(true);
      }

      const failed = await store.getStory(story.id);
      expect(failed).toMatchObject({ status: "failed", retryCount: 3, errorMessage: "attempt 3 failed" });
      expect(await store.beginProcessing(story.id, "failed", 3)).toBe(false);
      expect(await store.getRetryableStories(3)).toEqual([]);
      expect((await store.getExhaustedStories(3)).map((s) => s.id)).toEqual([story.id]);
    });

    it("does not mark a story failed unless it is processing", async () => {
      const { story } = await store.createStory({ sourceRef: "a", title: "A", author: null, rawInput: "{}" });
      expect(await store.markStoryFailed(story.id, "nope")).toBe(false);
      expect((await store.getStory(story.id))?.retryCount).toBe(0);
    });
  });

  describe("completeStory", () => {
    it("stores the chunks and marks the story chunked", async () => {
      const { story } = await store.createStory({ sourceRef: "a", title: "A", author: null, rawInput: "{}" });
      await store.beginProcessing(story.id, "pending", 3);
      clock.advance(5);

      expect(await store.completeStory(story.id, "llm", chunks(3))).toBe(true);

      const stored = await store.getStory(story.id);
      expect(stored).toMatchObject({
        status: "chunked",
        chunkingStrategy: "llm",
        processedAt: "2026-01-05T08:05:00.000Z",
      });
      const saved = await store.getStoryChunks(story.id);
      expect(saved.map((c) => [c.chunkNumber, c.totalChunks, c.text])).toEqual([
        [1, 3, "Part 1."],
        [2, 3, "Part 2."],
        [3, 3, "Part 3."],
      ]);
      expect(saved[0]).toMatchObject({ sentAt: null, deliveryStartedAt: null });
    });

    it("writes nothing for a story that is not processing", async () => {
      const { story } = await store.createStory({ sourceRef: "a", title: "A", author: null, rawInput: "{}" });

      expect(await store.completeStory(story.id, "simple", chunks(2))).toBe(false);
      expect(await store.getStoryChunks(story.id)).toEqual([]);
      expect((await store.getStory(story.id))?.status).toBe("pending");
    });

    it("rolls back every chunk when one insert fails", async () => {
      const { story } = await store.createStory({ sourceRef: "a", title: "A", author: null, rawInput: "{}" });
      await store.beginProcessing(story.id, "pending", 3);
      const duplicated = [...chunks(2), chunks(2)[1]];

      await expect(store.completeStory(story.id, "simple", duplicated)).rejects.toBeInstanceOf(
        PersistenceError
      );
      expect(await store.getStoryChunks(story.id)).toEqual([]);
      expect((await store.getStory(story.id))?.status).toBe("processing");
    });
  });

  describe("delivery queue", () => {
    it("serves the oldest story's chunks in order", async () => {
      const first = await chunkedStory(store, "first", 2);
      clock.advance(1);
      const second = await chunkedStory(store, "second", 1);

      const order: Array<[number, number]> = [];
      for (let next = await store.getNextUnsentChunk(); next; next = await store.getNextUnsentChunk()) {
        order.push([next.story.id, next.chunk.chunkNumber]);
        expect(await store.markChunkSent(next.chunk.id)).toBe(true);
      }

      expect(order).toEqual([
        [first, 1],
        [first, 2],
        [second, 1],
      ]);
    });

    it("includes the story title with the candidate", async () => {
      await chunkedStory(store, "The Lighthouse", 1);
      const next = await store.getNextUnsentChunk();
      expect(next?.story).toMatchObject({ title: "The Lighthouse", author: null });
    });

    it("sets sent_at only once", async () => {
      const id = await chunkedStory(store, "a", 1);
      const [chunk] = await store.getStoryChunks(id);

      expect(await store.markChunkSent(chunk.id)).toBe(true);
      expect(await store.markChunkSent(chunk.id)).toBe(false);
      expect((await store.getChunk(chunk.id))?.sentAt).toBe("2026-01-05T08:00:00.000Z");
    });

    it("leases a chunk to one sender until the lease goes stale", async () => {
      const id = await chunkedStory(store, "a", 1);
      const [chunk] = await store.getStoryChunks(id);
      const staleBefore = (): Date => new Date(clock.now().getTime() - 10 * 60_000);

      expect(await store.claimChunk(chunk.id, staleBefore())).toBe(true);
      clock.advance(5);
      expect(await store.claimChunk(chunk.id, staleBefore())).toBe(false);
      clock.advance(6);
      expect(await store.claimChunk(chunk.id, staleBefore())).toBe(true);

      await store.releaseChunk(chunk.id);
      expect(await store.claimChunk(chunk.id, staleBefore())).toBe(true);

      await store.markChunkSent(chunk.id);
      expect(await store.claimChunk(chunk.id, staleBefore())).toBe(false);
    });

    it("reports progress and lets an admin reset a chunk", async () => {
      const id = await chunkedStory(store, "a", 2);
      const [one, two] = await store.getStoryChunks(id);

      await store.markChunkSent(one.id);
      expect(await store.getStoryProgress(id)).toEqual({
        storyId: id,
        totalChunks: 2,
        sentChunks: 1,
        nextChunkNumber: 2,
        complete: false,
      });

      await store.markChunkSent(two.id);
      expect(await store.getStoryProgress(id)).toMatchObject({ sentChunks: 2, nextChunkNumber: null, complete: true });

      expect(await store.resetChunk(one.id)).toBe(true);
      expect((await store.getNextUnsentChunk())?.chunk.id).toBe(one.id);
    });

    it("counts stories by status and unsent chunks", async () => {
      await chunkedStory(store, "a", 2);
      await store.createStory({ sourceRef: "b", title: "B", author: null, rawInput: "{}" });

      expect(await store.getQueueStats()).toEqual({
        stories: { pending: 1, processing: 0, chunked: 1, failed: 0 },
        unsentChunks: 2,
      });
    });
  });

  it("stores sync state", async () => {
    expect(await store.getSyncState("intake:lastPoll")).toBeNull();
    await store.setSyncState("intake:lastPoll", "2026-01-05");
    await store.setSyncState("intake:lastPoll", "2026-01-06");
    expect(await store.getSyncState("intake:lastPoll")).toBe("2026-01-06");
  });
});
