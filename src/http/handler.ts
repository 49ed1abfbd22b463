import { randomUUID } from "crypto";
import type { IncomingMessage, ServerResponse } from "http";
import { z } from "zod";
import type { Store } from "../db/index.js";
import type { DeliveryScheduler } from "../delivery/index.js";
import { contentDescriptorSchema } from "../extraction/index.js";
import type { StoryLifecycleManager } from "../lifecycle/index.js";
import { DeliveryError, errorMessage } from "../shared/errors.js";

export interface ApiRequest {
  method: string;
  path: string;
  headers: Record<string, string | undefined>;
  body: string;
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

export interface ApiDependencies {
  store: Pick<Store, "getStory" | "getStoryChunks" | "getStoryProgress" | "getQueueStats" | "resetChunk">;
  lifecycle: Pick<StoryLifecycleManager, "ingest" | "process" | "retrySweep">;
  delivery: Pick<DeliveryScheduler, "triggerDelivery">;
  cronSecret: string | null;
  // Receives work that outlives the request, such as processing a new story.
  background?: (task: Promise<unknown>) => void;
}

const ingestSchema = z.intersection(
  contentDescriptorSchema,
  z.object({ sourceRef: z.string().min(1).max(200).optional() })
);

function json(status: number, body: unknown): ApiResponse {
  return { status, body };
}

export function isAuthorized(
  headers: Record<string, string | undefined>,
  cronSecret: string | null
): boolean {
  // Without a configured secret every caller is allowed (local development).
  if (!cronSecret) return true;
  return headers.authorization === `Bearer ${cronSecret}`;
}

function defaultBackground(task: Promise<unknown>): void {
  task.catch((error) => {
    console.error(`[HTTP] Background task failed: ${errorMessage(error)}`);
  });
}

/**
 * Route a request to the story and delivery operations. Kept free of the
 * socket so it can be driven directly.
 */
export async function handleApiRequest(
  request: ApiRequest,
  deps: ApiDependencies
): Promise<ApiResponse> {
  const { method, path } = request;
  const background = deps.background ?? defaultBackground;

  if (method === "GET" && path === "/health") {
    return json(200, { status: "ok", queue: await deps.store.getQueueStats() });
  }

  if (method === "POST" && path === "/stories") {
    let payload: unknown;
    try {
      payload = JSON.parse(request.body || "{}");
    } catch {
      return json(400, { error: "Body must be JSON" });
    }

    const parsed = ingestSchema.safeParse(payload);
    if (!parsed.success) {
      return json(400, {
        error: "Invalid story",
        issues: parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`),
      });
    }

    const { sourceRef, ...descriptor } = parsed.data;
    const { story, created } = await deps.lifecycle.ingest(
      descriptor,
      sourceRef ?? `api:${randomUUID()}`
    );

    if (story.status === "pending") {
      background(deps.lifecycle.process(story.id));
    }

    return json(202, { storyId: story.id, status: story.status, created });
  }

  const storyMatch = path.match(/^\/stories\/(\d+)$/);
  if (method === "GET" && storyMatch) {
    const storyId = parseInt(storyMatch[1], 10);
    const story = await deps.store.getStory(storyId);
    if (!story) {
      return json(404, { error: `Story ${storyId} not found` });
    }

    const [progress, chunks] = await Promise.all([
      deps.store.getStoryProgress(storyId),
      deps.store.getStoryChunks(storyId),
    ]);

    return json(200, {
      id: story.id,
      title: story.title,
      author: story.author,
      status: story.status,
      wordCount: story.wordCount,
      extractionMethod: story.extractionMethod,
      chunkingStrategy: story.chunkingStrategy,
      retryCount: story.retryCount,
      errorMessage: story.errorMessage,
      receivedAt: story.receivedAt,
      processedAt: story.processedAt,
      progress,
      chunks: chunks.map((c) => ({
        id: c.id,
        chunkNumber: c.chunkNumber,
        wordCount: c.wordCount,
        narrativeWordCount: c.narrativeWordCount,
        sentAt: c.sentAt,
      })),
    });
  }

  const adminRoute =
    method === "POST" &&
    (path === "/deliver" || path === "/retry" || /^\/chunks\/\d+\/reset$/.test(path));
  if (adminRoute && !isAuthorized(request.headers, deps.cronSecret)) {
    return json(401, { error: "Unauthorized" });
  }

  if (method === "POST" && path === "/deliver") {
    try {
      return json(200, await deps.delivery.triggerDelivery());
    } catch (error) {
      if (error instanceof DeliveryError) {
        return json(502, { error: error.message, chunkId: error.chunkId });
      }
      throw error;
    }
  }

  if (method === "POST" && path === "/retry") {
    const result = await deps.lifecycle.retrySweep();
    return json(200, {
      retried: result.retried,
      exhausted: result.exhausted.map((s) => ({
        id: s.id,
        title: s.title,
        retryCount: s.retryCount,
        errorMessage: s.errorMessage,
      })),
    });
  }

  const resetMatch = path.match(/^\/chunks\/(\d+)\/reset$/);
  if (method === "POST" && resetMatch) {
    const chunkId = parseInt(resetMatch[1], 10);
    const reset = await deps.store.resetChunk(chunkId);
    return reset
      ? json(200, { chunkId, reset: true })
      : json(404, { error: `Chunk ${chunkId} not found` });
  }

  return json(404, { error: "Not found" });
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const parts: Buffer[] = [];
    req.on("data", (part: Buffer) => parts.push(part));
    req.on("end", () => resolve(Buffer.concat(parts).toString("utf8")));
    req.on("error", reject);
  });
}

/**
 * Adapt handleApiRequest to a node:http request listener.
 */
export function createRequestListener(deps: ApiDependencies) {
  return async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
      const authorization = req.headers.authorization;
      const response = await handleApiRequest(
        {
          method: req.method ?? "GET",
          path: url.pathname.replace(/\/+$/, "") || "/",
          headers: { authorization },
          body: await readBody(req),
        },
        deps
      );

      res.writeHead(response.status, { "Content-Type": "application/json" });
      res.end(JSON.stringify(response.body));
    } catch (error) {
      console.error(`[HTTP] ${req.method} ${req.url} failed: ${errorMessage(error)}`);
      res.writeHead(500, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ error: errorMessage(error) }));
    }
  };
}
