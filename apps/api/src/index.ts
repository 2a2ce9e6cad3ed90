/**
 * Past News API
 *
 * Usage:
 *   npx tsx apps/api/src/index.ts
 *   curl "http://localhost:5001/api/index?option=one_week"
 */

import { loadConfig } from "../../../services/news/src/config";
import { createPastNewsService } from "../../../services/news/src/fetchPastNews";
import { createApp } from "./app";

const config = loadConfig();

if (!config.guardianApiKey) {
  console.warn("[api] GUARDIAN_API_KEY is not set; searches will fail");
}

const app = createApp(createPastNewsService(config));

app.listen(config.port, () => {
  console.log(`[api] past-news listening on http://localhost:${config.port}`);
  console.log(`[api] keyword "${config.keyword}", time zone ${config.timeZone}`);
});
