import { Router, type Response } from "express";
import type { GatewayContext } from "../context";
import { LIVE_STREAM, type StreamEvent } from "../services/streams";
import { toLiveResponse } from "../services/telemetry/poller";

const KEEPALIVE_MS = 15000;

const writeEvent = (res: Response, event: StreamEvent) => {
  res.write(`id: ${event.id}\n`);
  res.write(`event: ${event.type}\n`);
  res.write(`data: ${JSON.stringify(event.data)}\n\n`);
};

const parseLastEventId = (value: string | undefined) => {
  if (!value) return null;
  const n = Number(value);
  return Number.isNaN(n) ? null : n;
};

export const createLiveRouter = (context: GatewayContext) => {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json(toLiveResponse(context.poller.current(), context.poller.health().lastError, Date.now()));
  });

  router.get("/stream", (req, res) => {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    const lastEventId = parseLastEventId(req.header("Last-Event-ID"));
    const subscription = context.streams.subscribe(LIVE_STREAM, lastEventId, (event) =>
      writeEvent(res, event)
    );

    const heartbeat = setInterval(() => {
      res.write(": keepalive\n\n");
    }, KEEPALIVE_MS);

    res.on("close", () => {
      clearInterval(heartbeat);
      subscription.unsubscribe();
    });
  });

  return router;
};
