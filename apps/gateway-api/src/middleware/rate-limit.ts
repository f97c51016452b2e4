import rateLimit from "express-rate-limit";
import { ErrorCodes } from "@cellgate/shared";

type RateLimitOptions = {
  windowMs: number;
  max: number;
  message: string;
};

/** Per client IP; the app trusts one proxy hop, so `req.ip` is the caller behind it. */
export const createRateLimiter = (options: RateLimitOptions) => {
  return rateLimit({
    windowMs: options.windowMs,
    max: options.max,
    standardHeaders: true,
    legacyHeaders: false,
    message: options.message,
    keyGenerator: (req) => req.ip ?? "unknown",
    handler: (req, res, _next, opts) => {
      res.status(opts.statusCode).json({
        code: ErrorCodes.RATE_LIMITED,
        message: typeof opts.message === "string" ? opts.message : "Too many requests.",
        details: { request_id: req.requestId },
      });
    },
  });
};
