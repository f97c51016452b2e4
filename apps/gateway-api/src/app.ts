import express from "express";
import { ErrorCodes } from "@cellgate/shared";
import type { GatewayContext } from "./context";
import { errorHandler } from "./middleware/error-handler";
import { requestId } from "./middleware/request-id";
import { requestLogger } from "./middleware/request-logger";
import { createHealthHandlers } from "./routes/health";
import { createHlsRouter } from "./routes/hls";
import { createApiRouter } from "./routes";

export const createApp = (context: GatewayContext) => {
  const app = express();
  const { healthHandler, readyHandler } = createHealthHandlers(context);

  app.set("trust proxy", 1);

  app.use(express.json({ limit: "64kb" }));
  app.use(requestId);
  app.use(requestLogger);

  app.get("/healthz", healthHandler);
  app.get("/readyz", readyHandler);

  app.use("/api/v1", createApiRouter(context));
  app.use("/live", createHlsRouter(context));

  app.use((req, res) => {
    res.status(404).json({
      code: ErrorCodes.NOT_FOUND,
      message: "Route not found.",
      details: { request_id: req.requestId },
    });
  });

  app.use(errorHandler);

  return app;
};
