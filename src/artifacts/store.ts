import type { Client } from "@libsql/client";
import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import { PersistenceError } from "../shared/errors.js";

export interface ArtifactStore {
  put(storagePath: string, content: string): Promise<void>;
  get(storagePath: string): Promise<string | null>;
}

/**
 * Keeps artifacts under a root directory on disk.
 */
export class FileArtifactStore implements ArtifactStore {
  constructor(private readonly rootDir: string) {}

  private resolve(storagePath: string): string {
    const root = path.resolve(this.rootDir);
    const full = path.resolve(root, storagePath);
    if (!full.startsWith(root + path.sep)) {
      throw new Error(`Storage path escapes artifact directory: ${storagePath}`);
    }
    return full;
  }

  async put(storagePath: string, content: string): Promise<void> {
    const full = this.resolve(storagePath);
    await mkdir(path.dirname(full), { recursive: true });
    await writeFile(full, content, "utf8");
  }

  async get(storagePath: string): Promise<string | null> {
    try {
      return await readFile(this.resolve(storagePath), "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }
  }
}

/**
 * Keeps artifacts in the libSQL database, for hosts without a writable disk.
 */
export class DatabaseArtifactStore implements ArtifactStore {
  constructor(private readonly db: Client) {}

  async put(storagePath: string, content: string): Promise<void> {
    try {
      await this.db.execute({
        sql: `INSERT INTO artifacts (storage_path, content, updated_at) VALUES (?, ?, ?)
              ON CONFLICT(storage_path) DO UPDATE SET
                content = excluded.content, updated_at = excluded.updated_at`,
        args: [storagePath, content, new Date().toISOString()],
      });
    } catch (error) {
      throw new PersistenceError("putArtifact", error);
    }
  }

  async get(storagePath: string): Promise<string | null> {
    try {
      const result = await this.db.execute({
        sql: "SELECT content FROM artifacts WHERE storage_path = ?",
        args: [storagePath],
      });
      const content = result.rows[0]?.content;
      return typeof content === "string" ? content : null;
    } catch (error) {
      throw new PersistenceError("getArtifact", error);
    }
  }
}

export class MemoryArtifactStore implements ArtifactStore {
  readonly files = new Map<string, string>();

  async put(storagePath: string, content: string): Promise<void> {
    this.files.set(storagePath, content);
  }

  async get(storagePath: string): Promise<string | null> {
    return this.files.get(storagePath) ?? null;
  }
}
