import type { VercelRequest, VercelResponse } from "@vercel/node";
import { initServices, verifyCronSecret } from "../lib/init.js";

export const config = {
  maxDuration: 300,
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
    const { lifecycle } = await initServices();

    // Stories that never started (e.g. the process died mid-request) go first
    const pending = await lifecycle.processPending();
    const { retried, exhausted } = await lifecycle.retrySweep();

    res.status(200).json({
      success: true,
      pending: pending.length,
      retried: retried.map((o) => ({ storyId: o.storyId, status: o.status })),
      exhausted: exhausted.map((s) => ({ id: s.id, title: s.title, error: s.errorMessage })),
    });
  } catch (error) {
    console.error("[Lifecycle] Retry cron error:", error);
    res.status(500).json({
      error: error instanceof Error ? error.message : "Unknown error",
    });
  }
}
