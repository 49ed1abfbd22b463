import type { VercelRequest, VercelResponse } from "@vercel/node";
import { initServices, verifyCronSecret } from "../lib/init.js";

export const config = {
  maxDuration: 300,
};

export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  if (req.method !== "GET") {
    res.status(405).json({ error: "Method not allowed" });
    return;
  }

  if (!verifyCronSecret(req)) {
    res.status(401).json({ error: "Unauthorized" });
    return;
  }

  try {
    const { intake } = await initServices();
    if (!intake) {
      res.status(503).json({ error: "JMAP_TOKEN is not configured" });
      return;
    }

    const summary = await intake.pollOnce();
    res.status(200).json({ success: true, ...summary });
  } catch (error) {
    console.error("[Intake] Cron error:", error);
    res.status(500).json({
      error: error instanceof Error ? error.message : "Unknown error",
    });
  }
}
