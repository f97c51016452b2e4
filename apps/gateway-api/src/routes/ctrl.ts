import { Router } from "express";
import {
  ErrorCodes,
  type BandPreferenceResponse,
  type NetworkModeResponse,
  type RoamingResponse,
} from "@cellgate/shared";
import type { GatewayContext } from "../context";
import { AppError } from "../errors/app-error";
import { createRateLimiter } from "../middleware/rate-limit";
import { findControlAction } from "../services/control/actions";
import {
  BAND_PREFERENCE_READ_BACK,
  NETWORK_MODE_READ_BACK,
  ROAMING_READ_BACK,
  runReadBack,
} from "../services/control/read-back";
import { LIVE_STREAM } from "../services/streams";
import { asyncHandler } from "./async-handler";

export const createCtrlRouter = (context: GatewayContext) => {
  const router = Router();
  const limiter = createRateLimiter({
    windowMs: 60 * 1000,
    max: context.config.control.rateLimitMax,
    message: "Too many control requests.",
  });

  router.get(
    "/roaming",
    asyncHandler(async (_req, res) => {
      const result = await runReadBack(context.transport, ROAMING_READ_BACK);
      const body: RoamingResponse = {
        ok: result.error === null,
        ts: Date.now(),
        error: result.error,
        roaming: result.state,
        raw: result.raw,
      };
      res.json(body);
    })
  );

  router.get(
    "/network_mode",
    asyncHandler(async (_req, res) => {
      const result = await runReadBack(context.transport, NETWORK_MODE_READ_BACK);
      const body: NetworkModeResponse = {
        ok: result.error === null,
        ts: Date.now(),
        error: result.error,
        mode: result.state,
        raw: result.raw,
      };
      res.json(body);
    })
  );

  router.get(
    "/band_preference",
    asyncHandler(async (_req, res) => {
      const result = await runReadBack(context.transport, BAND_PREFERENCE_READ_BACK);
      const body: BandPreferenceResponse = {
        ok: result.error === null,
        ts: Date.now(),
        error: result.error,
        bands: result.state ?? { lte_bands: null, nsa_nr5g_bands: null, nr5g_bands: null },
        raw: result.raw,
      };
      res.json(body);
    })
  );

  router.post(
    "/:action",
    limiter,
    asyncHandler(async (req, res) => {
      const action = findControlAction(req.params.action);
      if (!action) {
        throw new AppError(ErrorCodes.NOT_FOUND, `Unknown control action: ${req.params.action}.`, 404);
      }
      const response = await context.planner.run(action.name, req.body);
      context.streams.publish(LIVE_STREAM, {
        type: "control",
        action: response.action,
        executed: response.detail.executed,
        dry_run: response.detail.dry_run,
        blocked_reason: response.detail.blocked_reason,
        error: response.error,
        ts: response.timestamp,
      });
      res.json(response);
    })
  );

  return router;
};
