import type { JMAPClient } from "../jmap/index.js";
import { errorMessage } from "../shared/errors.js";

export type NotificationType =
  | "story.chunked"
  | "story.failed"
  | "story.retries-exhausted"
  | "chunk.delivered"
  | "delivery.queue-empty"
  | "delivery.failed";

export interface NotificationEvent {
  type: NotificationType;
  storyId?: number;
  chunkId?: number;
  details: Record<string, string | number | boolean | null>;
}

export interface Notifier {
  emit(event: NotificationEvent): Promise<void>;
}

/**
 * Emit without letting a notifier failure reach the caller.
 */
export async function notifySafely(notifier: Notifier, event: NotificationEvent): Promise<void> {
  try {
    await notifier.emit(event);
  } catch (error) {
    console.error(`[Notify] Failed to emit ${event.type}: ${errorMessage(error)}`);
  }
}

function describe(event: NotificationEvent): string {
  const parts = Object.entries(event.details).map(([key, value]) => `${key}=${value}`);
  const ids = [
    event.storyId !== undefined ? `story=${event.storyId}` : null,
    event.chunkId !== undefined ? `chunk=${event.chunkId}` : null,
  ].filter((p): p is string => p !== null);
  return [...ids, ...parts].join(" ");
}

export class ConsoleNotifier implements Notifier {
  async emit(event: NotificationEvent): Promise<void> {
    const line = `[Notify] ${event.type} ${describe(event)}`.trim();
    if (event.type.endsWith("failed") || event.type === "story.retries-exhausted") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

const SUBJECTS: Record<NotificationType, (event: NotificationEvent) => string> = {
  "story.chunked": (e) => `Story chunked: ${e.details.title ?? e.storyId} (${e.details.totalChunks ?? "?"} parts)`,
  "story.failed": (e) => `Story processing failed: ${e.details.title ?? e.storyId}`,
  "story.retries-exhausted": (e) => `Story needs attention: ${e.details.title ?? e.storyId}`,
  "chunk.delivered": (e) =>
    `Delivered: ${e.details.title ?? e.storyId} (Part ${e.details.chunkNumber}/${e.details.totalChunks})`,
  "delivery.queue-empty": () => "Story queue empty",
  "delivery.failed": (e) => `Delivery failed: ${e.details.title ?? `chunk ${e.chunkId}`}`,
};

/**
 * Mails every event to the admin address through the JMAP account.
 */
export class EmailNotifier implements Notifier {
  constructor(
    private readonly jmap: JMAPClient,
    private readonly adminEmail: string
  ) {}

  async emit(event: NotificationEvent): Promise<void> {
    const lines = [
      `Event: ${event.type}`,
      ...(event.storyId !== undefined ? [`Story: ${event.storyId}`] : []),
      ...(event.chunkId !== undefined ? [`Chunk: ${event.chunkId}`] : []),
      "",
      ...Object.entries(event.details).map(([key, value]) => `${key}: ${value}`),
      "",
      `Time: ${new Date().toISOString()}`,
    ];

    const draftId = await this.jmap.createDraft({
      to: [{ email: this.adminEmail }],
      subject: `[Serial Drip] ${SUBJECTS[event.type](event)}`,
      textBody: lines.join("\n"),
    });
    await this.jmap.sendEmail(draftId);
    console.log(`[Notify] Sent ${event.type} to ${this.adminEmail}`);
  }
}

/**
 * Fan an event out to several notifiers; one failing does not stop the rest.
 */
export class MultiNotifier implements Notifier {
  constructor(private readonly notifiers: Notifier[]) {}

  async emit(event: NotificationEvent): Promise<void> {
    await Promise.all(this.notifiers.map((n) => notifySafely(n, event)));
  }
}
