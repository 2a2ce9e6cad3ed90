/**
 * GET /api/index?option=<one of DATE_OPTIONS>
 *
 * Response shapes:
 *   article   → 200 { success: true, date, article, cached }
 *   quiet day → 200 { success: true, date, article: null, message, cached }
 *   error     → 4xx/5xx { success: false, error }
 */

import {
  Router,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import { z } from "zod";
import { PastNewsError } from "../../../../services/news/src/errors";
import type { PastNewsService } from "../../../../services/news/src/fetchPastNews";
import {
  DATE_OPTIONS,
  type ArticleSummary,
  type PastNewsResult,
} from "../../../../services/news/src/types";

const NewsQuerySchema = z.object({
  option: z.enum(DATE_OPTIONS, {
    errorMap: (issue, ctx) =>
      issue.code === "invalid_type" && ctx.data === undefined
        ? { message: "Missing required parameter: option" }
        : {
            message: `Invalid option: ${String(ctx.data)}. Must be one of: ${DATE_OPTIONS.join(", ")}`,
          },
  }),
});

export type NewsResponseBody =
  | {
      success: true;
      date: string;
      article: ArticleSummary;
      cached: boolean;
    }
  | {
      success: true;
      date: string;
      article: null;
      message: string;
      cached: boolean;
    }
  | { success: false; error: string };

export type NewsResponse = { status: number; body: NewsResponseBody };

function toBody(result: PastNewsResult): NewsResponseBody {
  const { outcome } = result;
  if (outcome.kind === "article") {
    return {
      success: true,
      date: outcome.targetDate,
      article: outcome.article,
      cached: result.cached,
    };
  }
  return {
    success: true,
    date: outcome.targetDate,
    article: null,
    message: outcome.message,
    cached: result.cached,
  };
}

function errorResponse(err: unknown): NewsResponse {
  if (err instanceof PastNewsError) {
    switch (err.code) {
      case "rate_limited":
        return {
          status: 429,
          body: { success: false, error: "API rate limit exceeded. Please try again later." },
        };
      case "unauthorized":
        return {
          status: 500,
          body: { success: false, error: `Server configuration error: ${err.message}` },
        };
      case "unavailable":
        return {
          status: 503,
          body: { success: false, error: `Unable to fetch articles: ${err.message}` },
        };
      case "invalid_range":
        return { status: 422, body: { success: false, error: err.message } };
    }
  }

  console.error("[api] unexpected failure", err);
  const message = err instanceof Error ? err.message : String(err);
  return {
    status: 500,
    body: { success: false, error: `Internal server error: ${message}` },
  };
}

export async function handleNewsRequest(
  query: unknown,
  service: PastNewsService
): Promise<NewsResponse> {
  const parsed = NewsQuerySchema.safeParse(query);
  if (!parsed.success) {
    return {
      status: 400,
      body: {
        success: false,
        error: parsed.error.issues[0]?.message ?? "Invalid request",
      },
    };
  }

  try {
    const result = await service.fetch(parsed.data.option);
    return { status: 200, body: toBody(result) };
  } catch (err) {
    return errorResponse(err);
  }
}

export function newsRouter(service: PastNewsService): Router {
  const router = Router();

  router.get("/index", (req: Request, res: Response, next: NextFunction) => {
    handleNewsRequest(req.query, service)
      .then(({ status, body }) => {
        res.status(status).json(body);
      })
      .catch(next);
  });

  return router;
}
