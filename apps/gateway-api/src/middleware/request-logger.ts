import type { Request, Response, NextFunction } from "express";

/**
 * One line per request. Streams (SSE, media files) that the client drops before the end
 * are logged as aborted with the status that was already sent.
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();
  let logged = false;

  const log = (suffix: string) => {
    if (logged) return;
    logged = true;
    const durationMs = Date.now() - start;
    const requestId = req.requestId ?? "unknown";
    console.log(
      `[request] ${req.method} ${req.originalUrl} ${res.statusCode}${suffix} ${durationMs}ms request_id=${requestId}`
    );
  };

  res.on("finish", () => log(""));
  res.on("close", () => {
    if (!res.writableFinished) {
      log(" aborted");
    }
  });

  next();
};
