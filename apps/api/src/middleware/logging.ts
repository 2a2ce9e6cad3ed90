import type { Request, Response, NextFunction } from "express";

export function loggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const startTime = Date.now();
  const { method, originalUrl } = req;

  console.log(`[api] → ${method} ${originalUrl}`);

  res.on("finish", () => {
    const duration = Date.now() - startTime;
    console.log(`[api] ← ${method} ${originalUrl} ${res.statusCode} (${duration}ms)`);
  });

  next();
}
