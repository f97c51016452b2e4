import { Router } from "express";
import type { GatewayContext } from "../context";
import { asyncHandler } from "./async-handler";
import { sendProxied } from "./proxy";

/** Playlists and segments under `/live`, outside the JSON API prefix so players resolve relative URIs. */
export const createHlsRouter = (context: GatewayContext) => {
  const router = Router();

  router.get(
    "/:id/:profile/index.m3u8",
    asyncHandler(async (req, res) => {
      await sendProxied(res, await context.media.playlist(req.params.id, req.params.profile));
    })
  );

  // Segments may sit in subdirectories of the profile.
  router.get(
    /^\/([^/]+)\/([^/]+)\/(.+)$/,
    asyncHandler(async (req, res) => {
      await sendProxied(res, await context.media.segment(req.params[0], req.params[1], req.params[2]));
    })
  );

  return router;
};
