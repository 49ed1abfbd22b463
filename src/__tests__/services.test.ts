import { createClient } from "@libsql/client";
import { describe, it, expect } from "vitest";
import { DatabaseArtifactStore, FileArtifactStore } from "../artifacts/index.js";
import { loadConfig } from "../config/index.js";
import { initializeDatabase } from "../db/index.js";
import { buildServices } from "../services.js";
import { story } from "./support.js";

async function memoryDb() {
  const db = createClient({ url: ":memory:" });
  await initializeDatabase(db);
  return db;
}

describe("buildServices", () => {
  it("keeps rendered chunks in the database when no directory is configured", async () => {
    const services = buildServices(loadConfig({ TARGET_WORDS: "1000" }), await memoryDb(), null);
    expect(services.artifacts).toBeInstanceOf(DatabaseArtifactStore);

    const { story: ingested } = await services.lifecycle.ingest(
      { text: story([600, 600]), html: "", subject: "The Lighthouse", from: "" },
      "api:1"
    );
    const outcome = await services.lifecycle.process(ingested.id);
    expect(outcome.status).toBe("chunked");

    const chunks = await services.store.getStoryChunks(ingested.id);
    expect(chunks).toHaveLength(2);
    expect(await services.artifacts.get(chunks[1].storagePath)).toContain(
      "<title>The Lighthouse - Part 2/2</title>"
    );
  });

  it("writes to disk only when a directory is configured", async () => {
    const services = buildServices(
      loadConfig({ ARTIFACT_DIR: "./artifacts" }),
      await memoryDb(),
      null
    );
    expect(services.artifacts).toBeInstanceOf(FileArtifactStore);
  });
});
