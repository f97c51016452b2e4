import { gatesFromConfig, type ControlGates, type GatewayConfig } from "./config/env";
import { createDeviceResolver } from "./serial/device";
import { createRetryPolicy } from "./serial/retry-policy";
import { createAtTransport, type AtTransport } from "./serial/transport";
import { createControlPlanner, type ControlPlanner } from "./services/control/planner";
import { nodeHostProbe, type HostProbe } from "./services/host-info";
import { createMediaGateway, type MediaGateway } from "./services/media/gateway";
import type { FetchLike } from "./services/media/upstream";
import { StreamManager } from "./services/streams";
import { createTelemetryPoller, type TelemetryPoller } from "./services/telemetry/poller";
import type { NetdevProbe } from "./services/telemetry/sysfs-netdev";

/** Everything a request handler may touch, built once at startup. */
export type GatewayContext = {
  config: GatewayConfig;
  gates: ControlGates;
  transport: AtTransport;
  streams: StreamManager;
  poller: TelemetryPoller;
  planner: ControlPlanner;
  media: MediaGateway;
  hostProbe: HostProbe;
  startedAt: number;
};

export type ContextOverrides = {
  transport?: AtTransport;
  gates?: ControlGates;
  fetchImpl?: FetchLike;
  netdevProbe?: NetdevProbe;
  hostProbe?: HostProbe;
  now?: () => number;
};

export const createGatewayContext = (
  config: GatewayConfig,
  overrides: ContextOverrides = {}
): GatewayContext => {
  const now = overrides.now ?? Date.now;
  const transport =
    overrides.transport ??
    createAtTransport({
      baudRate: config.serial.baudRate,
      deadlineMs: config.serial.deadlineMs,
      resolver: createDeviceResolver({
        configuredPath: config.serial.path,
        interfaceSuffix: config.serial.interfaceSuffix,
      }),
      retry: createRetryPolicy(config.serial.reconnectDelaysMs),
      debug: config.serial.debug,
    });
  const gates = overrides.gates ?? gatesFromConfig(config.control);
  const streams = new StreamManager(undefined, now);

  return {
    config,
    gates,
    transport,
    streams,
    poller: createTelemetryPoller({
      transport,
      intervalMs: config.poller.intervalMs,
      netdevInterfaces: config.poller.netdevInterfaces,
      streams,
      netdevProbe: overrides.netdevProbe,
      now,
    }),
    planner: createControlPlanner({ transport, gates }),
    media: createMediaGateway(config.media, overrides.fetchImpl),
    hostProbe: overrides.hostProbe ?? nodeHostProbe,
    startedAt: now(),
  };
};
