export * from "./api/errors";
export * from "./api/telemetry";
export * from "./api/control";
export * from "./api/media";
export * from "./api/host";
export * from "./events/live";
