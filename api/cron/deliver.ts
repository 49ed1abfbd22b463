import type { VercelRequest, VercelResponse } from "@vercel/node";
import { DeliveryError } from "../../src/shared/errors.js";
import { initServices, verifyCronSecret } from "../lib/init.js";

export const config = {
  maxDuration: 60,
};

export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  if (req.method !== "GET" && req.method !== "POST") {
    res.status(405).json({ error: "Method not allowed" });
    return;
  }

  if (!verifyCronSecret(req)) {
    res.status(401).json({ error: "Unauthorized" });
    return;
  }

  try {
    console.log("[Delivery] Cron triggered");
    const { delivery } = await initServices();
    const outcome = await delivery.deliverNext();

    res.status(200).json({ success: true, ...outcome });
  } catch (error) {
    console.error("[Delivery] Cron error:", error);
    res.status(error instanceof DeliveryError ? 502 : 500).json({
      error: error instanceof Error ? error.message : "Unknown error",
    });
  }
}
