import { beforeEach, describe, it, expect } from "vitest";
import { MemoryArtifactStore } from "../../artifacts/index.js";
import { ChunkingOrchestrator, DEFAULT_CHUNKING_CONFIG } from "../../chunking/index.js";
import type { Store } from "../../db/index.js";
import {
  DEFAULT_EXTRACTION_CONFIG,
  ExtractionOrchestrator,
  type ContentDescriptor,
  type ExtractionResult,
} from "../../extraction/index.js";
import { ExtractionError, IllegalTransitionError } from "../../shared/errors.js";
import { StoryLifecycleManager, type Extractor } from "../manager.js";
import { canTransition } from "../transitions.js";
import {
  RecordingNotifier,
  ScriptedCompleter,
  createMemoryStore,
  story,
} from "../../__tests__/support.js";
import { FakeBlog, STORY_URL } from "../../__tests__/fake-blog.js";

const chunker = new ChunkingOrchestrator({
  ...DEFAULT_CHUNKING_CONFIG,
  targetWords: 1000,
  minChunkWords: 100,
});

const descriptor: ContentDescriptor = {
  text: story([600, 600, 600, 600]),
  html: "",
  subject: "Fwd: The Lighthouse",
  from: "Ana Lucia <ana@example.com>",
};

class FailingExtractor implements Extractor {
  calls = 0;

  async extract(_input: ContentDescriptor): Promise<ExtractionResult> {
    this.calls++;
    throw ExtractionError.exhausted([
      { strategy: "inline", kind: "below-minimum-length", message: "too short" },
    ]);
  }
}

describe("canTransition", () => {
  it("allows retries only under the cap", () => {
    expect(canTransition({ status: "failed", retryCount: 2 }, "processing", 3)).toBe(true);
    expect(canTransition({ status: "failed", retryCount: 3 }, "processing", 3)).toBe(false);
    expect(canTransition({ status: "chunked", retryCount: 0 }, "processing", 3)).toBe(false);
    expect(canTransition({ status: "pending", retryCount: 0 }, "chunked", 3)).toBe(false);
  });
});

describe("StoryLifecycleManager", () => {
  let store: Store;
  let artifacts: MemoryArtifactStore;
  let notifier: RecordingNotifier;

  beforeEach(async () => {
    store = await createMemoryStore();
    artifacts = new MemoryArtifactStore();
    notifier = new RecordingNotifier();
  });

  function manager(extractor: Extractor = new ExtractionOrchestrator(DEFAULT_EXTRACTION_CONFIG)) {
    return new StoryLifecycleManager(store, extractor, chunker, artifacts, notifier, {
      maxRetries: 3,
      retryIntervalMinutes: 60,
      concurrency: 2,
    });
  }

  it("ingests a story once per source", async () => {
    const lifecycle = manager();
    const first = await lifecycle.ingest(descriptor, "jmap:M1");
    const again = await lifecycle.ingest(descriptor, "jmap:M1");

    expect(first.created).toBe(true);
    expect(first.story).toMatchObject({ title: "The Lighthouse", author: "Ana Lucia", status: "pending" });
    expect(JSON.parse(first.story.rawInput)).toEqual(descriptor);
    expect(again).toMatchObject({ created: false, story: { id: first.story.id } });
  });

  it("extracts, chunks and stores a pending story", async () => {
    const lifecycle = manager();
    const { story: ingested } = await lifecycle.ingest(descriptor, "jmap:M1");

    const outcome = await lifecycle.process(ingested.id);

    expect(outcome).toEqual({
      storyId: ingested.id,
      status: "chunked",
      totalChunks: 4,
      chunkingStrategy: "simple",
    });
    expect(await store.getStory(ingested.id)).toMatchObject({
      status: "chunked",
      wordCount: 2400,
      extractionMethod: "inline",
      chunkingStrategy: "simple",
    });

    const chunks = await store.getStoryChunks(ingested.id);
    expect(chunks.map((c) => [c.chunkNumber, c.totalChunks, c.narrativeWordCount])).toEqual([
      [1, 4, 600],
      [2, 4, 600],
      [3, 4, 600],
      [4, 4, 600],
    ]);
    expect(chunks[0].storagePath).toBe(`story-chunks/${ingested.id}/part-001.html`);
    expect([...artifacts.files.keys()].sort()).toEqual(chunks.map((c) => c.storagePath));
    expect(artifacts.files.get(chunks[1].storagePath)).toContain(
      "<title>The Lighthouse - Part 2/4</title>"
    );
    expect(notifier.types()).toEqual(["story.chunked"]);
  });

  it("records why extraction failed", async () => {
    const extractor = new ExtractionOrchestrator(
      { ...DEFAULT_EXTRACTION_CONFIG, useAgent: true },
      { completer: new ScriptedCompleter([new Error("down")]) }
    );
    const lifecycle = manager(extractor);
    const { story: ingested } = await lifecycle.ingest(
      { text: "Short note.", html: "", subject: "Part 1", from: "" },
      "api:1"
    );

    const outcome = await lifecycle.process(ingested.id);
    const expected =
      "All extraction strategies failed: " +
      "agent (network): analysis call failed: down; " +
      "inline (below-minimum-length): body has 11 characters after cleaning, needs more than 500; " +
      "url (parse): no URL found in message";

    expect(outcome).toEqual({
      storyId: ingested.id,
      status: "failed",
      error: expected,
      retriesExhausted: false,
    });
    expect(await store.getStory(ingested.id)).toMatchObject({
      status: "failed",
      retryCount: 1,
      errorMessage: expected,
    });
    expect(await store.getStoryChunks(ingested.id)).toEqual([]);
    expect(notifier.events).toEqual([
      {
        type: "story.failed",
        storyId: ingested.id,
        details: { title: "Part 1", error: expected, retryCount: 1 },
      },
    ]);
  });

  it("names every strategy when a linked page rejects the password", async () => {
    const blog = new FakeBlog("lantern42");
    const extractor = new ExtractionOrchestrator(
      { ...DEFAULT_EXTRACTION_CONFIG, useAgent: true },
      {
        completer: new ScriptedCompleter([
          `STRATEGY: url\nURL: ${STORY_URL}\nPASSWORD: wrongpass\nCONFIDENCE: high\nREASONING: link only`,
        ]),
        fetch: blog.fetch,
      }
    );
    const lifecycle = manager(extractor);
    const { story: ingested } = await lifecycle.ingest(
      {
        text: `Chapter 4 is up! ${STORY_URL}\nPassword: wrongpass`,
        html: "",
        subject: "Chapter 4",
        from: "ana@example.com",
      },
      "api:2"
    );

    const outcome = await lifecycle.process(ingested.id);

    expect(outcome.status).toBe("failed");
    const failed = await store.getStory(ingested.id);
    expect(failed?.status).toBe("failed");
    expect(failed?.errorMessage).toMatch(
      new RegExp(
        "^All extraction strategies failed: " +
          "agent \\(missing-password\\): password was rejected by the page; " +
          "inline \\(below-minimum-length\\): body has \\d+ characters after cleaning, needs more than 500; " +
          "url \\(missing-password\\): password was rejected by the page$"
      )
    );
    expect(blog.calls.filter((c) => c.init.method === "POST")).toHaveLength(2);
  });

  it("retries failed stories until the cap and then leaves them alone", async () => {
    const extractor = new FailingExtractor();
    const lifecycle = manager(extractor);
    const { story: ingested } = await lifecycle.ingest(descriptor, "jmap:M2");

    await lifecycle.process(ingested.id);
    const second = await lifecycle.retrySweep();
    expect(second.retried).toMatchObject([{ status: "failed", retriesExhausted: false }]);
    expect(second.exhausted).toEqual([]);

    const third = await lifecycle.retrySweep();
    expect(third.retried).toMatchObject([{ status: "failed", retriesExhausted: true }]);
    expect(third.exhausted.map((s) => s.id)).toEqual([ingested.id]);

    const fourth = await lifecycle.retrySweep();
    expect(fourth.retried).toEqual([]);
    expect(fourth.exhausted.map((s) => [s.id, s.retryCount, s.status])).toEqual([
      [ingested.id, 3, "failed"],
    ]);

    expect(extractor.calls).toBe(3);
    expect(notifier.types()).toEqual([
      "story.failed",
      "story.failed",
      "story.failed",
      "story.retries-exhausted",
    ]);
    await expect(lifecycle.process(ingested.id)).rejects.toThrow(
      "Illegal story transition failed -> processing (retry limit reached (3/3))"
    );
  });

  it("refuses to reprocess a chunked story", async () => {
    const lifecycle = manager();
    const { story: ingested } = await lifecycle.ingest(descriptor, "jmap:M3");
    await lifecycle.process(ingested.id);

    await expect(lifecycle.process(ingested.id)).rejects.toBeInstanceOf(IllegalTransitionError);
    expect((await store.getStory(ingested.id))?.status).toBe("chunked");
  });

  it("processes every pending story", async () => {
    const lifecycle = manager();
    await lifecycle.ingest(descriptor, "a");
    await lifecycle.ingest(descriptor, "b");
    await lifecycle.ingest({ ...descriptor, text: "Too short." }, "c");

    const outcomes = await lifecycle.processPending();

    expect(outcomes.map((o) => o.status)).toEqual(["chunked", "chunked", "failed"]);
    expect(await store.getStoriesByStatus("pending")).toEqual([]);
  });

  it("rejects an unknown story id", async () => {
    await expect(manager().process(999)).rejects.toThrow("Story not found: 999");
  });
});
