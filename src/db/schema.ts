import { createClient, type Client } from "@libsql/client";

export interface DatabaseConfig {
  url: string;
  authToken?: string;
}

export function createDbClient(config: DatabaseConfig): Client {
  return createClient({
    url: config.url,
    authToken: config.authToken,
  });
}

export async function initializeDatabase(client: Client): Promise<void> {
  await client.executeMultiple(`
    -- One row per submitted story
    CREATE TABLE IF NOT EXISTS stories (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      source_ref TEXT NOT NULL UNIQUE,
      title TEXT NOT NULL,
      author TEXT,
      status TEXT NOT NULL DEFAULT 'pending'
        CHECK (status IN ('pending', 'processing', 'chunked', 'failed')),
      word_count INTEGER,
      extraction_method TEXT,
      chunking_strategy TEXT,
      retry_count INTEGER NOT NULL DEFAULT 0,
      error_message TEXT,
      raw_input TEXT NOT NULL,
      received_at TEXT NOT NULL,
      processed_at TEXT,
      updated_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_stories_status ON stories(status);

    -- Delivery units; inserted once per story as a batch
    CREATE TABLE IF NOT EXISTS story_chunks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      story_id INTEGER NOT NULL REFERENCES stories(id) ON DELETE CASCADE,
      chunk_number INTEGER NOT NULL,
      total_chunks INTEGER NOT NULL,
      word_count INTEGER NOT NULL,
      narrative_word_count INTEGER NOT NULL,
      chunk_text TEXT NOT NULL,
      storage_path TEXT NOT NULL,
      created_at TEXT NOT NULL,
      delivery_started_at TEXT,
      sent_at TEXT,
      UNIQUE (story_id, chunk_number)
    );

    CREATE INDEX IF NOT EXISTS idx_story_chunks_unsent
      ON story_chunks(sent_at, created_at, story_id, chunk_number);

    -- Rendered chunk documents when no artifact directory is configured
    CREATE TABLE IF NOT EXISTS artifacts (
      storage_path TEXT PRIMARY KEY,
      content TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    -- Sync state for JMAP intake
    CREATE TABLE IF NOT EXISTS sync_state (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
  `);
}
