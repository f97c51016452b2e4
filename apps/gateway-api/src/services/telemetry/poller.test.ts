import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TransportError } from "../../errors/transport";
import type { CommandExchange } from "../../serial/transport";
import { StreamManager } from "../streams";
import { createTelemetryPoller, toLiveResponse, type TelemetrySnapshot } from "./poller";
import type { NetdevProbe } from "./sysfs-netdev";

const noSysfs: NetdevProbe = {
  exists: () => false,
  readText: () => null,
  list: () => [],
  ipv4Of: () => null,
};

/**
 * Every reply carries the number of the battery it belongs to, so a snapshot mixing
 * two batteries would show two different tags.
 */
const createTaggedModem = (options: { netdev?: boolean } = {}) => {
  const modem = { batches: 0, exchanges: 0, down: false, onExchange: (): void => undefined };
  const replyFor = (command: string, tag: number) => {
    switch (command) {
      case "AT+CGREG?":
        return ["+CGREG: 0,1", "OK"];
      case "AT+COPS?":
        return [`+COPS: 0,0,"OP${tag}",7`, "OK"];
      case "AT+QTEMP":
        return [`+QTEMP:"modem-ambient-usr","${20 + tag}"`, "OK"];
      case "AT+QNETDEVSTATUS":
        return options.netdev === false
          ? ["OK"]
          : [`+QNETDEVSTATUS: "rmnet_data0",1,"10.0.0.${tag}",${tag * 1000},${tag * 2000}`, "OK"];
      case "AT+CGDCONT?":
        return [`+CGDCONT: 1,"IPV4V6","apn${tag}"`, "OK"];
      default:
        return ["OK"];
    }
  };
  const exchange = async (command: string): Promise<CommandExchange> => {
    if (modem.down) {
      throw new TransportError("io", "Serial I/O error on /dev/ttyUSB2; 4 reconnect attempts failed", {
        command,
      });
    }
    if (command === "AT+CGREG?") {
      modem.batches += 1;
    }
    modem.exchanges += 1;
    modem.onExchange();
    await Promise.resolve();
    return {
      command,
      deadlineMs: 1200,
      lines: [command, ...replyFor(command, modem.batches)],
      outcome: "ok",
      error: null,
      durationMs: 1,
    };
  };
  return { modem, transport: { exchange } };
};

const tagsOf = (snapshot: TelemetrySnapshot) => ({
  operator: snapshot.data.operator?.name,
  ambient: snapshot.data.temperatures?.ambient,
  apn: snapshot.data.session?.pdp[0]?.apn,
  rx: snapshot.data.netdev?.rx_bytes,
});

const expectedTags = (cycle: number) => ({
  operator: `OP${cycle}`,
  ambient: 20 + cycle,
  apn: `apn${cycle}`,
  rx: cycle * 1000,
});

describe("telemetry poller", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it("never exposes a snapshot mixing two cycles", async () => {
    const { modem, transport } = createTaggedModem();
    const poller = createTelemetryPoller({
      transport,
      intervalMs: 1000,
      netdevInterfaces: [],
      netdevProbe: noSysfs,
    });
    const observed: Array<{ batch: number; cycle: number | null }> = [];
    modem.onExchange = () => {
      const current = poller.current();
      observed.push({ batch: modem.batches, cycle: current ? current.cycle : null });
      if (current) {
        expect(tagsOf(current)).toEqual(expectedTags(current.cycle));
      }
    };

    for (let i = 0; i < 3; i += 1) {
      const snapshot = await poller.pollOnce();
      expect(snapshot).not.toBeNull();
      if (snapshot) {
        expect(snapshot.cycle).toBe(i + 1);
        expect(tagsOf(snapshot)).toEqual(expectedTags(i + 1));
      }
    }

    // while battery N runs, readers see cycle N-1 in full
    expect(observed.every(({ batch, cycle }) => cycle === (batch === 1 ? null : batch - 1))).toBe(true);
    expect(observed).toHaveLength(3 * 17);
  });

  it("computes interface rates from the previous snapshot", async () => {
    let clock = 10_000;
    const { transport } = createTaggedModem();
    const poller = createTelemetryPoller({
      transport,
      intervalMs: 1000,
      netdevInterfaces: [],
      netdevProbe: noSysfs,
      now: () => clock,
    });

    const first = await poller.pollOnce();
    clock += 1000;
    const second = await poller.pollOnce();

    expect(first?.data.netdev?.rx_rate_bps).toBeNull();
    expect(second?.data.netdev).toEqual({
      iface: "rmnet_data0",
      state: "1",
      ipv4: "10.0.0.2",
      rx_bytes: 2000,
      tx_bytes: 4000,
      rx_rate_bps: 8000,
      tx_rate_bps: 16000,
      source: "modem",
    });
  });

  it("falls back to sysfs counters when the modem reports no interface", async () => {
    const { transport } = createTaggedModem({ netdev: false });
    const files: Record<string, string> = {
      "/sys/class/net/usb0/statistics/rx_bytes": "500\n",
      "/sys/class/net/usb0/statistics/tx_bytes": "700\n",
    };
    const probe: NetdevProbe = {
      exists: (target) => target === "/sys/class/net/usb0" || target === "/sys/class/net/usb0/carrier",
      readText: (target) => files[target] ?? null,
      list: () => ["lo", "usb0"],
      ipv4Of: (iface) => (iface === "usb0" ? "192.168.8.100" : null),
    };
    const poller = createTelemetryPoller({
      transport,
      intervalMs: 1000,
      netdevInterfaces: ["wwan0", "usb0"],
      netdevProbe: probe,
    });

    const snapshot = await poller.pollOnce();

    expect(snapshot?.data.netdev).toEqual({
      iface: "usb0",
      state: "UP",
      ipv4: "192.168.8.100",
      rx_bytes: 500,
      tx_bytes: 700,
      rx_rate_bps: null,
      tx_rate_bps: null,
      source: "sysfs",
    });
  });

  it("keeps the previous snapshot while the channel is down and logs only transitions", async () => {
    const { modem, transport } = createTaggedModem();
    const poller = createTelemetryPoller({
      transport,
      intervalMs: 1000,
      netdevInterfaces: [],
      netdevProbe: noSysfs,
    });
    await poller.pollOnce();

    modem.down = true;
    expect(await poller.pollOnce()).toBeNull();
    const warnings = vi.mocked(console.warn).mock.calls.length;
    expect(await poller.pollOnce()).toBeNull();

    expect(vi.mocked(console.warn).mock.calls.length).toBe(warnings);
    expect(poller.current()?.cycle).toBe(1);
    expect(poller.health()).toMatchObject({
      consecutiveFailures: 2,
      lastError: "Serial I/O error on /dev/ttyUSB2; 4 reconnect attempts failed",
    });

    modem.down = false;
    const recovered = await poller.pollOnce();
    expect(recovered?.cycle).toBe(2);
    expect(poller.health().consecutiveFailures).toBe(0);
    expect(console.log).toHaveBeenCalledWith("[poller] recovered after 2 failed cycles");
  });

  it("publishes each snapshot to the live stream", async () => {
    const { transport } = createTaggedModem();
    const streams = new StreamManager();
    const types: string[] = [];
    streams.subscribe("live", null, (event) => types.push(event.type));
    const poller = createTelemetryPoller({
      transport,
      intervalMs: 1000,
      netdevInterfaces: [],
      netdevProbe: noSysfs,
      streams,
    });

    await poller.pollOnce();

    expect(types).toEqual(["snapshot"]);
  });

  it("polls on the interval until stopped", async () => {
    vi.useFakeTimers();
    const { modem, transport } = createTaggedModem();
    const poller = createTelemetryPoller({
      transport,
      intervalMs: 1000,
      netdevInterfaces: [],
      netdevProbe: noSysfs,
    });

    poller.start();
    await vi.advanceTimersByTimeAsync(1000);
    await poller.stop();

    expect(poller.current()?.cycle).toBe(2);
    expect(modem.exchanges).toBe(2 * 17);
  });

  it("keeps polling after a cycle throws", async () => {
    vi.useFakeTimers();
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { transport } = createTaggedModem({ netdev: false });
    let listings = 0;
    const flakyProbe: NetdevProbe = {
      ...noSysfs,
      list: () => {
        listings += 1;
        if (listings === 1) {
          throw new Error("sysfs unavailable");
        }
        return [];
      },
    };
    const poller = createTelemetryPoller({
      transport,
      intervalMs: 1000,
      netdevInterfaces: [],
      netdevProbe: flakyProbe,
    });

    poller.start();
    await vi.advanceTimersByTimeAsync(1000);
    await poller.stop();

    expect(errors).toHaveBeenCalledTimes(1);
    expect(errors.mock.calls[0]?.[0]).toBe("[poller] cycle failed on unexpected error");
    expect(console.log).toHaveBeenCalledWith("[poller] recovered after 1 failed cycles");
    expect(poller.current()?.cycle).toBe(1);
    expect(poller.health()).toMatchObject({ consecutiveFailures: 0, lastError: null });
  });

  it("reports the error of a cycle that threw", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { transport } = createTaggedModem({ netdev: false });
    const poller = createTelemetryPoller({
      transport,
      intervalMs: 60_000,
      netdevInterfaces: [],
      netdevProbe: {
        ...noSysfs,
        list: () => {
          throw new Error("sysfs unavailable");
        },
      },
    });

    poller.start();
    await vi.waitFor(() => expect(poller.health().consecutiveFailures).toBe(1));
    await poller.stop();

    expect(poller.current()).toBeNull();
    expect(poller.health().lastError).toBe("Poll cycle failed: sysfs unavailable");
  });
});

describe("toLiveResponse", () => {
  it("reports an empty cache before the first cycle", () => {
    expect(toLiveResponse(null, null, 5000)).toEqual({
      ok: false,
      ts: 5000,
      error: "No telemetry captured yet.",
      cycle: null,
      captured_at: null,
      stale_ms: null,
      data: null,
    });
  });
});
