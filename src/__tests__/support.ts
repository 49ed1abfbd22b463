import { createClient } from "@libsql/client";
import { initializeDatabase, Store } from "../db/index.js";
import type { ChunkSender, OutgoingChunk } from "../delivery/index.js";
import type { CompletionRequest, TextCompleter } from "../llm/index.js";
import type { NotificationEvent, Notifier } from "../notify/index.js";

const VOCABULARY = [
  "rain", "lantern", "river", "glass", "harbor", "quiet", "ember", "stone",
  "letter", "window", "orchard", "signal", "thread", "compass", "winter", "candle",
];

/**
 * A paragraph of exactly `count` words, split into ten-word sentences.
 */
export function paragraph(count: number, seed: number = 0): string {
  const words: string[] = [];
  for (let i = 0; i < count; i++) {
    let word = VOCABULARY[(i + seed) % VOCABULARY.length];
    if (i % 10 === 0) word = word[0].toUpperCase() + word.slice(1);
    if (i % 10 === 9 || i === count - 1) word += ".";
    words.push(word);
  }
  return words.join(" ");
}

export function story(paragraphWords: Array<number | string>): string {
  return paragraphWords
    .map((entry, i) => (typeof entry === "number" ? paragraph(entry, i) : entry))
    .join("\n\n");
}

/**
 * Paragraph sizes for a 24,694-word serial: four 10-paragraph sections of
 * 500-word paragraphs each closed by a longer one, then a 2,797-word tail.
 */
export function serialLayout(): number[] {
  const layout: number[] = [];
  for (const closing of [996, 947, 985, 969]) {
    layout.push(...Array<number>(9).fill(500), closing);
  }
  layout.push(...Array<number>(5).fill(500), 297);
  return layout;
}

export class ScriptedCompleter implements TextCompleter {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push({ ...request, messages: [...request.messages] });
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error("no scripted reply left");
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

export class RecordingNotifier implements Notifier {
  readonly events: NotificationEvent[] = [];

  async emit(event: NotificationEvent): Promise<void> {
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map((e) => e.type);
  }
}

export class RecordingSender implements ChunkSender {
  readonly sent: OutgoingChunk[] = [];
  failWith: Error | null = null;

  async send(message: OutgoingChunk): Promise<string> {
    if (this.failWith) throw this.failWith;
    this.sent.push(message);
    return `submission-${this.sent.length}`;
  }
}

export async function createMemoryStore(clock?: () => Date): Promise<Store> {
  const client = createClient({ url: ":memory:" });
  await initializeDatabase(client);
  return new Store(client, clock);
}

export class TestClock {
  constructor(private current: Date = new Date("2026-01-05T08:00:00.000Z")) {}

  now = (): Date => new Date(this.current);

  advance(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60_000);
  }
}
