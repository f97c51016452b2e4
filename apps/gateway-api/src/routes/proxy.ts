import type { Response } from "express";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import type { ProxiedBody } from "../services/media/gateway";
import { createIdleGuard } from "../services/media/idle-guard";

/** Streams an upstream body to the client without buffering it; a stalled upstream ends the response. */
export const sendProxied = async (res: Response, proxied: ProxiedBody) => {
  res.status(proxied.status);
  res.set(proxied.headers);
  if (!proxied.body) {
    res.end();
    return;
  }
  try {
    await pipeline(Readable.fromWeb(proxied.body), createIdleGuard(proxied.idle), res);
  } catch (error) {
    if (!res.headersSent) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[media] stream to client ended early: ${message}`);
    res.destroy();
  }
};
