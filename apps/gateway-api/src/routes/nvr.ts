import { Router, type Request } from "express";
import type { GatewayContext } from "../context";
import { asyncHandler } from "./async-handler";
import { sendProxied } from "./proxy";

const originOf = (req: Request) => `${req.protocol}://${req.get("host") ?? "localhost"}`;

export const createNvrRouter = (context: GatewayContext) => {
  const router = Router();
  const { media } = context;

  router.get(
    "/health",
    asyncHandler(async (_req, res) => {
      res.json(await media.health());
    })
  );

  router.get(
    "/cameras",
    asyncHandler(async (_req, res) => {
      res.json(await media.cameras());
    })
  );

  router.get(
    "/cameras/:id/stream",
    asyncHandler(async (req, res) => {
      res.json(await media.cameraStream(req.params.id));
    })
  );

  router.get(
    "/cameras/:id/live-hls",
    asyncHandler(async (req, res) => {
      res.json(await media.liveHls(req.params.id, req.query.profile));
    })
  );

  router.get(
    "/recordings",
    asyncHandler(async (_req, res) => {
      res.json(await media.recordings());
    })
  );

  router.get(
    "/recordings/:id/days",
    asyncHandler(async (req, res) => {
      res.json(await media.recordingDays(req.params.id));
    })
  );

  router.get(
    "/recordings/:id/days/:date/segments",
    asyncHandler(async (req, res) => {
      res.json(await media.recordingSegments(req.params.id, req.params.date, originOf(req)));
    })
  );

  router.get(
    "/recordings/:id/files/:date/:file",
    asyncHandler(async (req, res) => {
      const proxied = await media.recordingFile(req.params.id, req.params.date, req.params.file, {
        range: req.header("Range"),
        ifRange: req.header("If-Range"),
      });
      await sendProxied(res, proxied);
    })
  );

  return router;
};
