import { Router } from "express";
import type { GatewayContext } from "../context";
import { readHostInfo } from "../services/host-info";

/** Figures about the machine the gateway runs on. */
export const createBaseRouter = (context: GatewayContext) => {
  const router = Router();

  router.get("/info", (_req, res) => {
    res.json(readHostInfo(context.hostProbe));
  });

  return router;
};
