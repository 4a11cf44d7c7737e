import express from "express";
import type { RecordStore } from "../shared/store.js";

export type AppOptions = {
  store: RecordStore;
  apiKey: string;
};

const getApiKey = (req: express.Request): string | null => {
  const headerKey = req.header("x-api-key");
  if (headerKey) return headerKey;
  const auth = req.header("authorization");
  if (!auth) return null;
  const match = auth.match(/^Bearer\s+(.+)$/i);
  return match ? match[1] : null;
};

const createAuthMiddleware =
  (expected: string): express.RequestHandler =>
  (req, res, next) => {
    if (req.path === "/health") {
      return next();
    }
    if (!expected) {
      return res.status(500).json({ error: "API_KEY not configured" });
    }
    const provided = getApiKey(req);
    if (!provided || provided !== expected) {
      return res.status(401).json({ error: "Unauthorized" });
    }
    return next();
  };

export const parseLimit = (value: unknown, fallback: number) => {
  const parsed = Number(typeof value === "string" ? value : undefined);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return Math.min(Math.trunc(parsed), 200);
};

const sendError = (res: express.Response, error: unknown) => {
  const message = error instanceof Error ? error.message : "Database error";
  res.status(500).json({ error: message });
};

/** Read-only report API over the stored series. */
export const createApp = ({ store, apiKey }: AppOptions) => {
  const app = express();
  app.use(createAuthMiddleware(apiKey));

  app.get("/health", (_req, res) => {
    res.status(200).send("OK");
  });

  app.get("/records/latest", async (req, res) => {
    try {
      const records = await store.queryLatestTop(parseLimit(req.query.limit, 10));
      res.json({ count: records.length, records });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get("/records/history", async (req, res) => {
    const { title } = req.query;
    if (typeof title !== "string" || !title.trim()) {
      res.status(400).json({ error: "title query parameter is required" });
      return;
    }
    try {
      const records = await store.queryByTitle(title.trim());
      res.json({ count: records.length, records });
    } catch (error) {
      sendError(res, error);
    }
  });

  return app;
};
