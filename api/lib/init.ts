import type { VercelRequest } from "@vercel/node";
import { loadConfig } from "../../src/config/index.js";
import { createDbClient, initializeDatabase } from "../../src/db/index.js";
import { isAuthorized } from "../../src/http/handler.js";
import { JMAPClient } from "../../src/jmap/index.js";
import { buildServices, type Services } from "../../src/services.js";

export function verifyCronSecret(req: VercelRequest): boolean {
  return isAuthorized(
    { authorization: req.headers.authorization },
    process.env.CRON_SECRET || null
  );
}

let cachedServices: Services | null = null;

export async function initServices(): Promise<Services> {
  // Warm invocations reuse the connected clients
  if (cachedServices) {
    return cachedServices;
  }

  const config = loadConfig();

  const dbClient = createDbClient(config.database);
  await initializeDatabase(dbClient);

  let jmap: JMAPClient | null = null;
  if (config.jmap.token) {
    jmap = new JMAPClient(config.jmap.sessionUrl, config.jmap.token);
    await jmap.connect();
  }

  cachedServices = buildServices(config, dbClient, jmap);
  return cachedServices;
}
