import { config as loadEnv } from "dotenv";
loadEnv();

import http from "http";
import { loadConfig, type AppConfig } from "./config/index.js";
import { createDbClient, initializeDatabase } from "./db/index.js";
import { createRequestListener } from "./http/handler.js";
import { JMAPClient } from "./jmap/index.js";
import { buildServices } from "./services.js";

async function connectJmap(config: AppConfig): Promise<JMAPClient | null> {
  if (!config.jmap.token) {
    console.warn("JMAP_TOKEN not set: intake, delivery and email notifications are disabled");
    return null;
  }

  const jmap = new JMAPClient(config.jmap.sessionUrl, config.jmap.token);
  await jmap.connect();
  return jmap;
}

async function main(): Promise<void> {
  console.log("Serial Drip - one chapter a day");
  console.log("===============================\n");

  let config: AppConfig;
  try {
    config = loadConfig();
    console.log("Configuration validated");
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }

  console.log(`Target chunk size: ${config.chunking.targetWords} words`);
  console.log(`Delivery time: ${config.delivery.deliveryTime}${config.delivery.testMode ? " (TEST MODE)" : ""}`);

  const dbClient = createDbClient(config.database);
  await initializeDatabase(dbClient);
  console.log("Database initialized");

  let jmap: JMAPClient | null;
  try {
    jmap = await connectJmap(config);
  } catch (error) {
    console.error("JMAP connection failed:", error);
    process.exit(1);
  }

  const services = buildServices(config, dbClient, jmap);
  const { store, lifecycle, delivery, intake, extraction, chunking } = services;

  console.log(`Extraction strategies: ${extraction.strategyNames.join(" -> ")}`);
  console.log(`Chunking strategies: ${chunking.strategyNames.join(" -> ")}`);

  const stats = await store.getQueueStats();
  console.log(
    `Stories: ${stats.stories.pending} pending, ${stats.stories.chunked} chunked, ${stats.stories.failed} failed; ${stats.unsentChunks} chunk(s) queued`
  );

  // Pick up anything left pending by a previous run
  await lifecycle.processPending();

  lifecycle.startRetrySweeps();
  delivery.start();
  if (intake) {
    await intake.start();
  }

  const server = http.createServer(
    createRequestListener({
      store,
      lifecycle,
      delivery,
      cronSecret: config.server.cronSecret,
    })
  );

  server.listen(config.server.port, () => {
    console.log(`HTTP server listening on port ${config.server.port}`);
  });

  const shutdown = () => {
    console.log("\nShutting down...");
    intake?.stop();
    delivery.stop();
    lifecycle.stopRetrySweeps();
    server.close();
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  console.log("\nSerial Drip is running! Press Ctrl+C to stop.\n");
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
