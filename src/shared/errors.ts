import type { StoryStatus } from "../db/index.js";

export type ExtractionErrorKind =
  | "network"
  | "parse"
  | "below-minimum-length"
  | "missing-password"
  | "low-confidence"
  | "timeout"
  | "exhausted";

export interface ExtractionAttempt {
  strategy: string;
  kind: ExtractionErrorKind;
  message: string;
}

export class ExtractionError extends Error {
  name = "ExtractionError";

  constructor(
    readonly kind: ExtractionErrorKind,
    message: string,
    readonly attempts: ExtractionAttempt[] = []
  ) {
    super(message);
  }

  static exhausted(attempts: ExtractionAttempt[]): ExtractionError {
    const detail = attempts
      .map((a) => `${a.strategy} (${a.kind}): ${a.message}`)
      .join("; ");
    return new ExtractionError(
      "exhausted",
      `All extraction strategies failed: ${detail}`,
      attempts
    );
  }
}

export class ChunkingError extends Error {
  name = "ChunkingError";

  constructor(
    readonly strategy: string,
    message: string
  ) {
    super(`${strategy} chunker: ${message}`);
  }
}

export class DeliveryError extends Error {
  name = "DeliveryError";

  constructor(
    readonly chunkId: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class PersistenceError extends Error {
  name = "PersistenceError";

  constructor(
    readonly operation: string,
    cause: unknown
  ) {
    super(`${operation} failed: ${errorMessage(cause)}`, { cause });
  }
}

export class IllegalTransitionError extends Error {
  name = "IllegalTransitionError";

  constructor(
    readonly from: StoryStatus,
    readonly to: StoryStatus,
    reason?: string
  ) {
    super(
      `Illegal story transition ${from} -> ${to}${reason ? ` (${reason})` : ""}`
    );
  }
}

export class TimeoutError extends Error {
  name = "TimeoutError";

  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
