import {
  TELEMETRY_QUERIES,
  decodeTelemetry,
  withRates,
  type FieldFailure,
} from "@cellgate/at";
import type { LiveResponse, LiveTelemetry, NetdevStats } from "@cellgate/shared";
import type { AtTransport } from "../../serial/transport";
import { runQueryBattery } from "../query-battery";
import { LIVE_STREAM, type StreamManager } from "../streams";
import { nodeNetdevProbe, readSysfsNetdev, type NetdevProbe } from "./sysfs-netdev";

/** One complete poll cycle. Never modified after publication; the next cycle replaces it. */
export type TelemetrySnapshot = Readonly<{
  cycle: number;
  capturedAt: number;
  data: Readonly<LiveTelemetry>;
  /** Query and field failures of this cycle, for diagnostics. */
  failures: readonly string[];
}>;

export type PollerHealth = {
  lastError: string | null;
  lastAttemptAt: number | null;
  consecutiveFailures: number;
};

export type TelemetryPoller = {
  start: () => void;
  stop: () => Promise<void>;
  /** Runs one cycle; resolves with the published snapshot, or null when the cycle produced none. */
  pollOnce: () => Promise<TelemetrySnapshot | null>;
  current: () => TelemetrySnapshot | null;
  health: () => Readonly<PollerHealth>;
};

export type TelemetryPollerOptions = {
  transport: Pick<AtTransport, "exchange">;
  intervalMs: number;
  netdevInterfaces: readonly string[];
  streams?: StreamManager;
  netdevProbe?: NetdevProbe;
  now?: () => number;
};

const waitOrAbort = (ms: number, signal: AbortSignal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal.addEventListener("abort", onAbort, { once: true });
  });

const describeFieldFailure = (failure: FieldFailure) => `${failure.field}: ${failure.message}`;

export const toLiveResponse = (
  snapshot: TelemetrySnapshot | null,
  lastError: string | null,
  now: number
): LiveResponse => {
  if (!snapshot) {
    return {
      ok: false,
      ts: now,
      error: lastError ?? "No telemetry captured yet.",
      cycle: null,
      captured_at: null,
      stale_ms: null,
      data: null,
    };
  }
  return {
    ok: true,
    ts: now,
    error: lastError,
    cycle: snapshot.cycle,
    captured_at: new Date(snapshot.capturedAt).toISOString(),
    stale_ms: Math.max(0, now - snapshot.capturedAt),
    data: snapshot.data,
  };
};

export const createTelemetryPoller = (options: TelemetryPollerOptions): TelemetryPoller => {
  const now = options.now ?? Date.now;
  const probe = options.netdevProbe ?? nodeNetdevProbe;
  let snapshot: TelemetrySnapshot | null = null;
  let cycle = 0;
  const health: PollerHealth = { lastError: null, lastAttemptAt: null, consecutiveFailures: 0 };
  const failingQueries = new Map<string, string>();
  let controller: AbortController | null = null;
  let loop: Promise<void> | null = null;

  const publishLog = (level: "info" | "warn", message: string) => {
    options.streams?.publish(LIVE_STREAM, { type: "log", level, message, ts: new Date(now()).toISOString() });
  };

  // Logs only the edges: a query that starts failing, and one that recovers.
  const trackQueries = (failures: ReadonlyMap<string, string>) => {
    for (const [command, message] of failures) {
      if (!failingQueries.has(command)) {
        console.warn(`[poller] ${command} failing: ${message}`);
      }
    }
    for (const command of failingQueries.keys()) {
      if (!failures.has(command)) {
        console.log(`[poller] ${command} recovered`);
      }
    }
    failingQueries.clear();
    failures.forEach((message, command) => failingQueries.set(command, message));
  };

  const netdevOf = (decoded: NetdevStats | null, capturedAt: number): NetdevStats | null => {
    const current = decoded ?? readSysfsNetdev(options.netdevInterfaces, probe);
    if (!current) {
      return null;
    }
    const previous = snapshot?.data.netdev ?? null;
    return withRates(current, previous, snapshot ? capturedAt - snapshot.capturedAt : 0);
  };

  const pollOnce = async (): Promise<TelemetrySnapshot | null> => {
    health.lastAttemptAt = now();
    const battery = await runQueryBattery(options.transport, TELEMETRY_QUERIES);
    trackQueries(new Map(battery.failures.map((failure) => [failure.command, failure.message])));

    if (battery.answered === 0) {
      const reason = battery.channelError?.message ?? battery.failures[0]?.message ?? "no replies";
      if (health.consecutiveFailures === 0) {
        console.warn(`[poller] cycle failed, keeping previous snapshot: ${reason}`);
        publishLog("warn", `Telemetry poll failing: ${reason}`);
      }
      health.consecutiveFailures += 1;
      health.lastError = reason;
      return null;
    }

    if (health.consecutiveFailures > 0) {
      console.log(`[poller] recovered after ${health.consecutiveFailures} failed cycles`);
      publishLog("info", "Telemetry poll recovered.");
    }
    health.consecutiveFailures = 0;
    health.lastError = battery.channelError?.message ?? null;

    const fieldFailures: FieldFailure[] = [];
    const decoded = decodeTelemetry(battery.replies, fieldFailures);
    const capturedAt = now();
    const data: LiveTelemetry = { ...decoded, netdev: netdevOf(decoded.netdev, capturedAt) };
    cycle += 1;
    const next: TelemetrySnapshot = Object.freeze({
      cycle,
      capturedAt,
      data: Object.freeze(data),
      failures: Object.freeze([
        ...battery.failures.map((failure) => `${failure.command}: ${failure.message}`),
        ...fieldFailures.map(describeFieldFailure),
      ]),
    });
    snapshot = next;
    options.streams?.publish(LIVE_STREAM, {
      type: "snapshot",
      snapshot: toLiveResponse(next, health.lastError, capturedAt),
    });
    return next;
  };

  // A cycle that throws is recorded and the loop carries on with the next interval.
  const runCycle = async () => {
    try {
      await pollOnce();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      health.consecutiveFailures += 1;
      health.lastError = `Poll cycle failed: ${message}`;
      console.error("[poller] cycle failed on unexpected error", error);
    }
  };

  const run = async (signal: AbortSignal) => {
    while (!signal.aborted) {
      const started = now();
      await runCycle();
      await waitOrAbort(Math.max(0, options.intervalMs - (now() - started)), signal);
    }
  };

  const start = () => {
    if (controller) {
      return;
    }
    const current = new AbortController();
    controller = current;
    console.log(`[poller] started, interval ${options.intervalMs}ms`);
    loop = run(current.signal);
  };

  const stop = async () => {
    controller?.abort();
    controller = null;
    await loop;
    loop = null;
  };

  return {
    start,
    stop,
    pollOnce,
    current: () => snapshot,
    health: () => ({ ...health }),
  };
};
