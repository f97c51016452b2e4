import { Router } from "express";
import type { GatewayContext } from "../context";
import { readDeviceInfo } from "../services/device-info";
import { asyncHandler } from "./async-handler";

const isVerbose = (value: unknown) => value === "1" || value === "true";

export const createInfoRouter = (context: GatewayContext) => {
  const router = Router();

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      res.json(await readDeviceInfo(context.transport, { verbose: isVerbose(req.query.verbose) }));
    })
  );

  return router;
};
