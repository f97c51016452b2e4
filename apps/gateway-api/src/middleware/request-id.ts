import type { Request, Response, NextFunction } from "express";
import { randomUUID } from "crypto";

const INBOUND_ID = /^[A-Za-z0-9._-]{1,64}$/;

/** Reuses a well-formed `X-Request-Id` from a fronting proxy, otherwise mints one. */
export const requestId = (req: Request, res: Response, next: NextFunction) => {
  const inbound = req.header("X-Request-Id");
  req.requestId = inbound && INBOUND_ID.test(inbound) ? inbound : randomUUID();
  res.setHeader("X-Request-Id", req.requestId);
  next();
};
