import express, { type Express } from "express";
import type { PastNewsService } from "../../../services/news/src/fetchPastNews";
import { loggingMiddleware } from "./middleware/logging";
import { newsRouter } from "./routes/news";

export function createApp(service: PastNewsService): Express {
  const app = express();

  app.use(loggingMiddleware);
  app.use("/api", newsRouter(service));

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      cacheDay: service.cache.day,
      cachedEntries: service.cache.size,
    });
  });

  return app;
}
