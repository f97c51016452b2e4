import type { Request, Response } from "express";
import type { GatewayContext } from "../context";

const SERVICE = "gateway-api";

/** A snapshot older than this many poll intervals makes the gateway not ready. */
const STALE_INTERVALS = 5;

export const createHealthHandlers = (context: GatewayContext, now: () => number = Date.now) => {
  const healthHandler = (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      service: SERVICE,
      uptime_sec: Math.floor((now() - context.startedAt) / 1000),
      time: new Date(now()).toISOString(),
    });
  };

  const readyHandler = (_req: Request, res: Response) => {
    const snapshot = context.poller.current();
    const lastError = context.poller.health().lastError;
    if (!snapshot) {
      res.status(503).json({ service: SERVICE, poller: "empty", last_error: lastError });
      return;
    }
    const ageMs = Math.max(0, now() - snapshot.capturedAt);
    if (ageMs > STALE_INTERVALS * context.config.poller.intervalMs) {
      res.status(503).json({ service: SERVICE, poller: "stale", age_ms: ageMs, last_error: lastError });
      return;
    }
    res.json({ service: SERVICE, poller: "ok", cycle: snapshot.cycle, age_ms: ageMs });
  };

  return { healthHandler, readyHandler };
};
