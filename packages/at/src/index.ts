export * from "./bands";
export * from "./carrier-aggregation";
export * from "./device-info";
export * from "./fields";
export * from "./framing";
export * from "./isolate";
export * from "./neighbours";
export * from "./netdev";
export * from "./network";
export * from "./preferences";
export * from "./queries";
export * from "./registration";
export * from "./serving-cell";
export * from "./session";
export * from "./signal";
export * from "./temperatures";
export * from "./telemetry";
