import express from "express";
import type { CollectionResponse } from "../collector";
import { createSingleFlightRunner } from "./singleFlight";

export interface AppOptions {
  /** Runs one full collection and returns its status payload */
  collect: () => Promise<CollectionResponse>;
}

export function createApp({ collect }: AppOptions) {
  const app = express();
  const runCollection = createSingleFlightRunner(collect);

  app.get("/healthz", (_req, res) => {
    res.json({ status: "ok" });
  });

  // Scheduler hook: one run per request, never two at once in this process.
  app.post("/api/collect", async (_req, res) => {
    try {
      const outcome = await runCollection();
      if (outcome.status === "busy") {
        res.status(409).json({ error: "COLLECTION_IN_PROGRESS" });
        return;
      }
      res.status(outcome.value.statusCode).json(outcome.value.body);
    } catch (error) {
      console.error("Collection request failed:", error);
      res.status(500).json({ error: "Collection request failed" });
    }
  });

  return app;
}
