import { z } from "zod";
import type { ChunkingConfig } from "../chunking/index.js";
import type { DatabaseConfig } from "../db/index.js";
import type { DeliveryConfig } from "../delivery/index.js";
import type { ExtractionConfig } from "../extraction/index.js";
import type { IntakeConfig } from "../intake/index.js";
import type { LifecycleConfig } from "../lifecycle/index.js";

const flag = (defaultValue: boolean) =>
  z
    .preprocess(
      (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
      z.enum(["true", "false", "1", "0", "yes", "no"]).default(defaultValue ? "true" : "false")
    )
    .transform((value) => value === "true" || value === "1" || value === "yes");

const envSchema = z
  .object({
    TURSO_DATABASE_URL: z.string().default("file:serial-drip.db"),
    TURSO_AUTH_TOKEN: z.string().optional(),

    JMAP_SESSION_URL: z.string().url().default("https://api.fastmail.com/jmap/session"),
    JMAP_TOKEN: z.string().optional(),
    INTAKE_MAILBOX: z.string().default("Stories"),
    POLL_INTERVAL: z.coerce.number().int().positive().default(300),

    KINDLE_EMAIL: z.string().email().optional(),
    ADMIN_EMAIL: z.string().email().optional(),
    DELIVERY_TIME: z
      .string()
      .regex(/^([01]?\d|2[0-3]):[0-5]\d$/, "expected HH:MM")
      .default("12:00"),
    DELIVERY_LEASE_MINUTES: z.coerce.number().positive().default(10),
    TEST_MODE: flag(false),

    ANTHROPIC_API_KEY: z.string().optional(),
    ANTHROPIC_MODEL: z.string().default("claude-haiku-4-5"),
    ANTHROPIC_AGENT_MODEL: z.string().default("claude-sonnet-4-5"),
    USE_AGENT_EXTRACTION: flag(false),
    USE_AGENT_CHUNKING: flag(false),
    USE_LLM_CHUNKING: flag(false),
    AGENT_MIN_CONFIDENCE: z.enum(["low", "medium", "high"]).default("medium"),

    TARGET_WORDS: z.coerce.number().int().min(100).default(5000),
    CHUNK_TOLERANCE: z.coerce.number().min(0).max(0.9).default(0.15),
    RECAP_WORDS: z.coerce.number().int().min(0).default(250),
    MIN_CHUNK_WORDS: z.coerce.number().int().min(0).default(500),

    MAX_RETRIES: z.coerce.number().int().min(0).default(3),
    RETRY_INTERVAL_MINUTES: z.coerce.number().positive().default(60),

    STRATEGY_TIMEOUT_SECONDS: z.coerce.number().positive().default(120),
    FETCH_TIMEOUT_SECONDS: z.coerce.number().positive().default(30),

    ARTIFACT_DIR: z.string().optional(),
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    CRON_SECRET: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    const modelFlags = [
      ["USE_AGENT_EXTRACTION", env.USE_AGENT_EXTRACTION],
      ["USE_AGENT_CHUNKING", env.USE_AGENT_CHUNKING],
      ["USE_LLM_CHUNKING", env.USE_LLM_CHUNKING],
    ] as const;

    for (const [name, enabled] of modelFlags) {
      if (enabled && !env.ANTHROPIC_API_KEY) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["ANTHROPIC_API_KEY"],
          message: `required when ${name} is enabled`,
        });
      }
    }
  });

export interface AppConfig {
  database: DatabaseConfig;
  jmap: { sessionUrl: string; token: string | null };
  anthropic: { apiKey: string | null; model: string; agentModel: string };
  extraction: ExtractionConfig;
  chunking: ChunkingConfig;
  lifecycle: LifecycleConfig;
  delivery: DeliveryConfig;
  intake: IntakeConfig;
  server: { port: number; cronSecret: string | null; artifactDir: string | null };
}

/**
 * Validate an environment and build the per-component config structs.
 * Blank values count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "env"}: ${issue.message}`
    );
    throw new Error(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }

  const e = parsed.data;
  const strategyTimeoutMs = e.STRATEGY_TIMEOUT_SECONDS * 1000;

  return {
    database: { url: e.TURSO_DATABASE_URL, authToken: e.TURSO_AUTH_TOKEN },
    jmap: { sessionUrl: e.JMAP_SESSION_URL, token: e.JMAP_TOKEN ?? null },
    anthropic: {
      apiKey: e.ANTHROPIC_API_KEY ?? null,
      model: e.ANTHROPIC_MODEL,
      agentModel: e.ANTHROPIC_AGENT_MODEL,
    },
    extraction: {
      useAgent: e.USE_AGENT_EXTRACTION,
      agentModel: e.ANTHROPIC_AGENT_MODEL,
      agentMinConfidence: e.AGENT_MIN_CONFIDENCE,
      minAgentWords: 100,
      minInlineChars: 500,
      minPageChars: 500,
      strategyTimeoutMs,
      fetchTimeoutMs: e.FETCH_TIMEOUT_SECONDS * 1000,
    },
    chunking: {
      targetWords: e.TARGET_WORDS,
      tolerance: e.CHUNK_TOLERANCE,
      minChunkWords: e.MIN_CHUNK_WORDS,
      recapWords: e.RECAP_WORDS,
      useAgent: e.USE_AGENT_CHUNKING,
      useLlm: e.USE_LLM_CHUNKING,
      llmModel: e.ANTHROPIC_MODEL,
      agentModel: e.ANTHROPIC_AGENT_MODEL,
      maxRevisionRounds: 2,
      maxSinglePassChars: 400_000,
      strategyTimeoutMs,
    },
    lifecycle: {
      maxRetries: e.MAX_RETRIES,
      retryIntervalMinutes: e.RETRY_INTERVAL_MINUTES,
      concurrency: 5,
    },
    delivery: {
      deliveryEmail: e.KINDLE_EMAIL ?? null,
      adminEmail: e.ADMIN_EMAIL ?? null,
      testMode: e.TEST_MODE,
      deliveryTime: e.DELIVERY_TIME,
      leaseMinutes: e.DELIVERY_LEASE_MINUTES,
    },
    intake: {
      mailboxName: e.INTAKE_MAILBOX,
      pollIntervalSeconds: e.POLL_INTERVAL,
      batchSize: 20,
    },
    server: {
      port: e.PORT,
      cronSecret: e.CRON_SECRET ?? null,
      artifactDir: e.ARTIFACT_DIR ?? null,
    },
  };
}
