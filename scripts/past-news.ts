#!/usr/bin/env npx tsx
/**
 * One-shot lookup from the terminal.
 *
 * Usage:
 *   npx tsx scripts/past-news.ts             # one_week
 *   npx tsx scripts/past-news.ts one_month
 *   npx tsx scripts/past-news.ts random
 */
import { loadConfig } from "../services/news/src/config";
import { createPastNewsService } from "../services/news/src/fetchPastNews";
import { DATE_OPTIONS, isDateOption } from "../services/news/src/types";

const DIM = "\x1b[2m";
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";

async function main() {
  const arg = process.argv[2] ?? "one_week";
  if (!isDateOption(arg)) {
    console.error(`${RED}✗${RESET} unknown option "${arg}" (expected ${DATE_OPTIONS.join(" | ")})`);
    process.exit(1);
  }

  const service = createPastNewsService(loadConfig());
  const { targetDate, outcome } = await service.fetch(arg);

  console.log(`${DIM}${arg} → ${targetDate}${RESET}\n`);
  if (outcome.kind === "quiet") {
    console.log(`${YELLOW}${outcome.message}${RESET}`);
    return;
  }

  const { article } = outcome;
  console.log(`${BOLD}${article.headline}${RESET}`);
  console.log(`${DIM}${article.published}${RESET}\n`);
  console.log(article.excerpt);
  console.log(`\n${article.url}`);
}

main().catch((err: unknown) => {
  console.error(`${RED}✗${RESET}`, err instanceof Error ? err.message : err);
  process.exit(1);
});
