import { beforeEach, describe, it, expect } from "vitest";
import {
  MemoryArtifactStore,
  chunkStoragePath,
  renderChunkDocument,
} from "../../artifacts/index.js";
import type { Store } from "../../db/index.js";
import { DeliveryError } from "../../shared/errors.js";
import { DeliveryScheduler, type DeliveryConfig } from "../scheduler.js";
import {
  RecordingNotifier,
  RecordingSender,
  TestClock,
  createMemoryStore,
} from "../../__tests__/support.js";

const config: DeliveryConfig = {
  deliveryEmail: "reader@kindle.example",
  adminEmail: "admin@example.com",
  testMode: false,
  deliveryTime: "12:00",
  leaseMinutes: 30,
};

describe("DeliveryScheduler", () => {
  let clock: TestClock;
  let store: Store;
  let artifacts: MemoryArtifactStore;
  let sender: RecordingSender;
  let notifier: RecordingNotifier;

  beforeEach(async () => {
    clock = new TestClock();
    store = await createMemoryStore(clock.now);
    artifacts = new MemoryArtifactStore();
    sender = new RecordingSender();
    notifier = new RecordingNotifier();
  });

  function scheduler(overrides: Partial<DeliveryConfig> = {}): DeliveryScheduler {
    return new DeliveryScheduler(store, artifacts, sender, notifier, { ...config, ...overrides }, clock.now);
  }

  async function seedStory(title: string, parts: number, author: string | null = "Ana"): Promise<number> {
    const { story } = await store.createStory({ sourceRef: title, title, author, rawInput: "{}" });
    await store.beginProcessing(story.id, "pending", 3);

    const chunks = Array.from({ length: parts }, (_, i) => ({
      chunkNumber: i + 1,
      totalChunks: parts,
      wordCount: 3,
      narrativeWordCount: 3,
      text: `Part ${i + 1} text.`,
      storagePath: chunkStoragePath(story.id, i + 1),
    }));
    for (const chunk of chunks) {
      await artifacts.put(chunk.storagePath, renderChunkDocument({ title, author }, chunk));
    }
    await store.completeStory(story.id, "simple", chunks);
    return story.id;
  }

  it("reports an empty queue without sending", async () => {
    expect(await scheduler().deliverNext()).toEqual({ type: "queue-empty" });
    expect(sender.sent).toEqual([]);
    expect(notifier.types()).toEqual(["delivery.queue-empty"]);
  });

  it("delivers one part per run in order", async () => {
    const storyId = await seedStory("The Lighthouse", 2);
    const delivery = scheduler();

    const first = await delivery.deliverNext();
    expect(first).toMatchObject({
      type: "delivered",
      storyId,
      chunkNumber: 1,
      totalChunks: 2,
      recipient: "reader@kindle.example",
      messageId: "submission-1",
      storyComplete: false,
    });
    expect(sender.sent[0]).toEqual({
      to: "reader@kindle.example",
      subject: "The Lighthouse - Part 1/2",
      textBody: "The Lighthouse - Part 1/2 by Ana",
      attachment: {
        fileName: "the-lighthouse-part-001.html",
        contentType: "text/html",
        content: artifacts.files.get(chunkStoragePath(storyId, 1)),
      },
    });

    const second = await delivery.deliverNext();
    expect(second).toMatchObject({ type: "delivered", chunkNumber: 2, storyComplete: true });
    expect(await delivery.deliverNext()).toEqual({ type: "queue-empty" });

    expect(sender.sent.map((m) => m.subject)).toEqual([
      "The Lighthouse - Part 1/2",
      "The Lighthouse - Part 2/2",
    ]);
    expect(notifier.types()).toEqual(["chunk.delivered", "chunk.delivered", "delivery.queue-empty"]);
  });

  it("sends a chunk only once when two runs overlap", async () => {
    await seedStory("Single", 1);
    const delivery = scheduler();

    const outcomes = await Promise.all([delivery.deliverNext(), delivery.deliverNext()]);

    expect(sender.sent).toHaveLength(1);
    expect(outcomes.filter((o) => o.type === "delivered")).toHaveLength(1);
    expect(await delivery.deliverNext()).toEqual({ type: "queue-empty" });
  });

  it("skips a chunk another run is already sending", async () => {
    const storyId = await seedStory("Busy", 1);
    const [chunk] = await store.getStoryChunks(storyId);
    await store.claimChunk(chunk.id, new Date(0));

    expect(await scheduler().deliverNext()).toEqual({ type: "in-flight", chunkId: chunk.id });
    expect(sender.sent).toEqual([]);
  });

  it("takes over a lease that has gone stale", async () => {
    const storyId = await seedStory("Stalled", 1);
    const [chunk] = await store.getStoryChunks(storyId);
    await store.claimChunk(chunk.id, new Date(0));
    clock.advance(31);

    expect(await scheduler().deliverNext()).toMatchObject({ type: "delivered", chunkId: chunk.id });
  });

  it("leaves the chunk unsent when sending fails", async () => {
    const storyId = await seedStory("Fragile", 1);
    const [chunk] = await store.getStoryChunks(storyId);
    sender.failWith = new Error("submission rejected");
    const delivery = scheduler();

    const error = await delivery.deliverNext().then(
      () => null,
      (e: unknown) => e
    );
    expect(error).toBeInstanceOf(DeliveryError);
    expect(error instanceof Error && error.message).toBe(
      `Delivery of chunk ${chunk.id} failed: submission rejected`
    );
    expect(await store.getChunk(chunk.id)).toMatchObject({ sentAt: null, deliveryStartedAt: null });
    expect(notifier.events).toEqual([
      {
        type: "delivery.failed",
        storyId,
        chunkId: chunk.id,
        details: { title: "Fragile", chunkNumber: 1, totalChunks: 1, error: "submission rejected" },
      },
    ]);

    sender.failWith = null;
    expect(await delivery.deliverNext()).toMatchObject({ type: "delivered", chunkId: chunk.id });
  });

  it("fails without a delivery address", async () => {
    await seedStory("Nowhere", 1);

    await expect(scheduler({ deliveryEmail: null }).deliverNext()).rejects.toThrow(
      /failed: no delivery address configured$/
    );
    expect(sender.sent).toEqual([]);
  });

  it("redirects to the admin in test mode", async () => {
    await seedStory("The Lighthouse", 2);

    const outcome = await scheduler({ testMode: true }).deliverNext();

    expect(outcome).toMatchObject({ type: "delivered", recipient: "admin@example.com" });
    expect(sender.sent[0]).toMatchObject({
      to: "admin@example.com",
      subject: "[TEST] The Lighthouse - Part 1/2",
    });
  });

  it("re-renders a missing artifact", async () => {
    const storyId = await seedStory("Lost & Found", 1, null);
    const path = chunkStoragePath(storyId, 1);
    artifacts.files.delete(path);

    await scheduler().deliverNext();

    const rendered = renderChunkDocument(
      { title: "Lost & Found", author: null },
      { chunkNumber: 1, totalChunks: 1, text: "Part 1 text." }
    );
    expect(artifacts.files.get(path)).toBe(rendered);
    expect(sender.sent[0]).toMatchObject({
      textBody: "Lost & Found - Part 1/1",
      attachment: { fileName: "lost-found-part-001.html", content: rendered },
    });
  });
});
