import type { Store } from "../db/index.js";
import type { JMAPClient } from "../jmap/index.js";
import type { StoryLifecycleManager } from "../lifecycle/index.js";
import { errorMessage } from "../shared/errors.js";
import { descriptorFromEmail } from "./descriptor.js";

export const QUEUED_KEYWORD = "$storyqueued";

export type IntakeMailClient = Pick<
  JMAPClient,
  "findMailboxByName" | "queryEmails" | "getEmailBody" | "addEmailKeyword"
>;

export type IntakeLifecycle = Pick<StoryLifecycleManager, "ingest" | "process">;

export interface IntakeConfig {
  mailboxName: string;
  pollIntervalSeconds: number;
  batchSize: number;
}

export interface IntakeSummary {
  seen: number;
  ingested: number;
  chunked: number;
  failed: number;
}

/**
 * Polls a mailbox for story emails, ingests each one once and tags it so
 * the next poll skips it.
 */
export class IntakeWatcher {
  private running = false;
  private pollTimeout: NodeJS.Timeout | null = null;
  private mailboxId: string | null = null;

  constructor(
    private readonly jmap: IntakeMailClient,
    private readonly lifecycle: IntakeLifecycle,
    private readonly store: Pick<Store, "setSyncState">,
    private readonly config: IntakeConfig
  ) {}

  async start(): Promise<void> {
    if (this.running) {
      console.log("[Intake] Watcher already running");
      return;
    }

    this.running = true;
    console.log(
      `[Intake] Watching "${this.config.mailboxName}" every ${this.config.pollIntervalSeconds}s`
    );

    await this.poll();
    this.scheduleNextPoll();
  }

  stop(): void {
    this.running = false;
    if (this.pollTimeout) {
      clearTimeout(this.pollTimeout);
      this.pollTimeout = null;
    }
    console.log("[Intake] Watcher stopped");
  }

  private scheduleNextPoll(): void {
    if (!this.running) return;

    this.pollTimeout = setTimeout(async () => {
      await this.poll();
      this.scheduleNextPoll();
    }, this.config.pollIntervalSeconds * 1000);
  }

  async poll(): Promise<IntakeSummary> {
    try {
      return await this.pollOnce();
    } catch (error) {
      console.error(`[Intake] Poll error: ${errorMessage(error)}`);
      return { seen: 0, ingested: 0, chunked: 0, failed: 0 };
    }
  }

  async pollOnce(): Promise<IntakeSummary> {
    const mailboxId = await this.resolveMailbox();
    const ids = await this.jmap.queryEmails(
      { inMailbox: mailboxId, notKeyword: QUEUED_KEYWORD },
      { limit: this.config.batchSize, ascending: true }
    );

    const summary: IntakeSummary = { seen: ids.length, ingested: 0, chunked: 0, failed: 0 };

    for (const id of ids) {
      const email = await this.jmap.getEmailBody(id);
      const { story, created } = await this.lifecycle.ingest(descriptorFromEmail(email), `jmap:${id}`);
      if (created) summary.ingested++;

      if (story.status === "pending") {
        try {
          const outcome = await this.lifecycle.process(story.id);
          if (outcome.status === "chunked") summary.chunked++;
          else summary.failed++;
        } catch (error) {
          // The story stays in the store; the retry sweep picks it up.
          console.error(`[Intake] Processing story ${story.id} errored: ${errorMessage(error)}`);
          summary.failed++;
        }
      }

      await this.jmap.addEmailKeyword(id, QUEUED_KEYWORD);
    }

    await this.store.setSyncState("intake:lastPoll", new Date().toISOString());
    if (ids.length > 0) {
      console.log(
        `[Intake] ${summary.seen} email(s): ${summary.ingested} new, ${summary.chunked} chunked, ${summary.failed} failed`
      );
    }

    return summary;
  }

  private async resolveMailbox(): Promise<string> {
    if (this.mailboxId) return this.mailboxId;

    const mailbox = await this.jmap.findMailboxByName(this.config.mailboxName);
    if (!mailbox) {
      throw new Error(`Intake mailbox not found: ${this.config.mailboxName}`);
    }

    this.mailboxId = mailbox.id;
    return mailbox.id;
  }
}
