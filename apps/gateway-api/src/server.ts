import fs from "fs";
import path from "path";
import { config as loadEnv } from "dotenv";
import http from "http";
import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { createGatewayContext } from "./context";

const envCandidates = [
  path.resolve(__dirname, "..", ".env.local"),
  path.resolve(__dirname, "..", ".env"),
  path.resolve(__dirname, "..", "..", "..", ".env.local"),
  path.resolve(__dirname, "..", "..", "..", ".env"),
];

envCandidates.forEach((p) => {
  if (fs.existsSync(p)) {
    loadEnv({ path: p });
  }
});

const config = loadConfig();
const context = createGatewayContext(config);
const server = http.createServer(createApp(context));

const portCandidates =
  config.portExplicit && config.production
    ? [config.port]
    : Array.from({ length: 10 }, (_, idx) => config.port + idx);

const listenWithFallback = (index = 0) => {
  const port = portCandidates[index];
  server.removeAllListeners("error");
  server.removeAllListeners("listening");

  server.once("error", (error: NodeJS.ErrnoException) => {
    if (error.code === "EADDRINUSE" && index + 1 < portCandidates.length) {
      console.warn(`[gateway-api] port ${port} in use, trying ${portCandidates[index + 1]}`);
      listenWithFallback(index + 1);
      return;
    }
    throw error;
  });

  server.once("listening", () => {
    console.log(`[gateway-api] listening on http://localhost:${port}`);
    context.poller.start();
  });
  server.listen(port);
};

const shutdown = async (signal: string) => {
  console.log(`[gateway-api] ${signal} received, shutting down`);
  server.close();
  server.closeAllConnections();
  await context.poller.stop();
  await context.transport.close();
  process.exit(0);
};

(["SIGINT", "SIGTERM"] as const).forEach((signal) => {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error("[gateway-api] shutdown failed", error);
      process.exit(1);
    });
  });
});

listenWithFallback();
