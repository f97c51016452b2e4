import { Router } from "express";
import type { GatewayContext } from "../context";
import { createBaseRouter } from "./base";
import { createCtrlRouter } from "./ctrl";
import { createInfoRouter } from "./info";
import { createLiveRouter } from "./live";
import { createNvrRouter } from "./nvr";
import packageJson from "../../package.json";

export const createApiRouter = (context: GatewayContext) => {
  const router = Router();

  router.use("/live", createLiveRouter(context));
  router.use("/info", createInfoRouter(context));
  router.use("/ctrl", createCtrlRouter(context));
  router.use("/nvr", createNvrRouter(context));
  router.use("/base", createBaseRouter(context));

  router.get("/version", (_req, res) => {
    res.json({
      service: "gateway-api",
      version: packageJson.version,
      serial_port: context.transport.session().path ?? context.config.serial.path,
      baud_rate: context.config.serial.baudRate,
      api_prefix: "/api/v1",
    });
  });

  return router;
};
