import type { Client } from "@libsql/client";
import {
  DatabaseArtifactStore,
  FileArtifactStore,
  type ArtifactStore,
} from "./artifacts/index.js";
import { ChunkingOrchestrator } from "./chunking/index.js";
import type { AppConfig } from "./config/index.js";
import { Store } from "./db/index.js";
import { DeliveryScheduler, JmapChunkSender, type ChunkSender } from "./delivery/index.js";
import { ExtractionOrchestrator } from "./extraction/index.js";
import { IntakeWatcher } from "./intake/index.js";
import { JMAPClient } from "./jmap/index.js";
import { StoryLifecycleManager } from "./lifecycle/index.js";
import { AnthropicCompleter, type TextCompleter } from "./llm/index.js";
import {
  ConsoleNotifier,
  EmailNotifier,
  MultiNotifier,
  type Notifier,
} from "./notify/index.js";

export interface Services {
  config: AppConfig;
  store: Store;
  jmap: JMAPClient | null;
  artifacts: ArtifactStore;
  notifier: Notifier;
  extraction: ExtractionOrchestrator;
  chunking: ChunkingOrchestrator;
  lifecycle: StoryLifecycleManager;
  delivery: DeliveryScheduler;
  intake: IntakeWatcher | null;
}

class UnconfiguredSender implements ChunkSender {
  async send(): Promise<string> {
    throw new Error("JMAP_TOKEN is not configured, cannot send mail");
  }
}

/**
 * Wire every component from a validated config. The JMAP client, when
 * given, must already be connected.
 */
export function buildServices(
  config: AppConfig,
  dbClient: Client,
  jmap: JMAPClient | null
): Services {
  const store = new Store(dbClient);
  // Serverless hosts have no writable disk, so documents live in the database
  // unless a directory is configured.
  const artifacts: ArtifactStore = config.server.artifactDir
    ? new FileArtifactStore(config.server.artifactDir)
    : new DatabaseArtifactStore(dbClient);

  const completer: TextCompleter | undefined = config.anthropic.apiKey
    ? new AnthropicCompleter(config.anthropic.apiKey, config.anthropic.model)
    : undefined;

  const notifiers: Notifier[] = [new ConsoleNotifier()];
  if (jmap && config.delivery.adminEmail) {
    notifiers.push(new EmailNotifier(jmap, config.delivery.adminEmail));
  }
  const notifier = new MultiNotifier(notifiers);

  const extraction = new ExtractionOrchestrator(config.extraction, { completer });
  const chunking = new ChunkingOrchestrator(config.chunking, { completer });
  const lifecycle = new StoryLifecycleManager(
    store,
    extraction,
    chunking,
    artifacts,
    notifier,
    config.lifecycle
  );

  const sender = jmap ? new JmapChunkSender(jmap) : new UnconfiguredSender();
  const delivery = new DeliveryScheduler(store, artifacts, sender, notifier, config.delivery);
  const intake = jmap ? new IntakeWatcher(jmap, lifecycle, store, config.intake) : null;

  return {
    config,
    store,
    jmap,
    artifacts,
    notifier,
    extraction,
    chunking,
    lifecycle,
    delivery,
    intake,
  };
}
