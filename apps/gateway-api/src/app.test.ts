import http from "http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { createGatewayContext } from "./context";
import { ProtocolError, TransportError } from "./errors/transport";
import type { AtTransport, CommandExchange } from "./serial/transport";
import type { HostProbe } from "./services/host-info";
import type { FetchLike } from "./services/media/upstream";

const ROAM_QUERY = 'AT+QNWPREFCFG="roam_pref"';

/** Modem stand-in that remembers the roaming preference it was given. */
const fakeModem = (options: { unplugged?: boolean; answerAll?: boolean } = {}) => {
  const sent: string[] = [];
  let roamPref = 255;

  const reply = (command: string): string[] | null => {
    if (command === ROAM_QUERY) return [`+QNWPREFCFG: "roam_pref",${roamPref}`, "OK"];
    const write = /^AT\+QNWPREFCFG="roam_pref",(\d+)$/.exec(command);
    if (write) {
      roamPref = Number(write[1]);
      return ["OK"];
    }
    return options.answerAll ? ["OK"] : null;
  };

  const exchange = async (command: string): Promise<CommandExchange> => {
    sent.push(command);
    if (options.unplugged) {
      throw new TransportError("device_not_found", "Serial device /dev/ttyUSB2 not found.", { command });
    }
    const lines = reply(command);
    return lines
      ? { command, deadlineMs: 1200, lines, outcome: "ok", error: null, durationMs: 1 }
      : { command, deadlineMs: 1200, lines: ["ERROR"], outcome: "protocol_error", error: "ERROR", durationMs: 1 };
  };

  const transport: AtTransport = {
    exchange,
    send: async (command) => {
      const result = await exchange(command);
      if (result.outcome === "protocol_error") {
        throw new ProtocolError(command, result.error ?? "ERROR", result.lines);
      }
      return result.lines;
    },
    session: () => ({ path: "/dev/ttyUSB2", baudRate: 115200, state: "open", lastError: null, reconnectAttempts: 0 }),
    close: async () => undefined,
  };
  return { transport, sent };
};

const startTestServer = async (
  env: Record<string, string> = {},
  deps: { transport?: AtTransport; fetchImpl?: FetchLike; hostProbe?: HostProbe } = {}
) => {
  const config = loadConfig({ MEDIA_BASE_URL: "http://nvr.test", ...env });
  const context = createGatewayContext(config, {
    transport: deps.transport ?? fakeModem().transport,
    fetchImpl: deps.fetchImpl,
    hostProbe: deps.hostProbe,
  });
  const server = http.createServer(createApp(context));
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Failed to start test server");
  }
  return {
    context,
    url: (path: string) => `http://127.0.0.1:${address.port}${path}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
};

type TestServer = Awaited<ReturnType<typeof startTestServer>>;

const postJson = (url: string, body: unknown) =>
  fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });

describe("gateway http surface", () => {
  let server: TestServer | null = null;

  const start = async (...args: Parameters<typeof startTestServer>) => {
    server = await startTestServer(...args);
    return server;
  };

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await server?.close();
    server = null;
    vi.restoreAllMocks();
  });

  describe("health", () => {
    it("answers healthz with a request id header", async () => {
      const { url } = await start();

      const response = await fetch(url("/healthz"));

      expect(response.status).toBe(200);
      expect(response.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
      expect(await response.json()).toMatchObject({ status: "ok", service: "gateway-api" });
    });

    it("is not ready before the first poll cycle", async () => {
      const { url } = await start();

      const response = await fetch(url("/readyz"));

      expect(response.status).toBe(503);
      expect(await response.json()).toEqual({ service: "gateway-api", poller: "empty", last_error: null });
    });

    it("is ready once a poll cycle has published", async () => {
      const { url, context } = await start({}, { transport: fakeModem({ answerAll: true }).transport });

      await context.poller.pollOnce();
      const response = await fetch(url("/readyz"));

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ service: "gateway-api", poller: "ok", cycle: 1 });
    });

    it("renders unknown routes as NOT_FOUND with the caller's request id", async () => {
      const { url } = await start();

      const response = await fetch(url("/nope"), { headers: { "X-Request-Id": "req-42" } });

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({
        code: "NOT_FOUND",
        message: "Route not found.",
        details: { request_id: "req-42" },
      });
    });
  });

  describe("telemetry", () => {
    it("returns an empty envelope before the first cycle", async () => {
      const { url } = await start();

      const body = await (await fetch(url("/api/v1/live"))).json();

      expect(body).toMatchObject({
        ok: false,
        error: "No telemetry captured yet.",
        cycle: null,
        captured_at: null,
        data: null,
      });
    });

    it("reports version and serial settings", async () => {
      const { url } = await start({ SERIAL_BAUD_RATE: "9600" });

      const body = await (await fetch(url("/api/v1/version"))).json();

      expect(body).toEqual({
        service: "gateway-api",
        version: "0.1.0",
        serial_port: "/dev/ttyUSB2",
        baud_rate: 9600,
        api_prefix: "/api/v1",
      });
    });

    it("reports the gateway host", async () => {
      const hostProbe: HostProbe = {
        hostname: () => "edge-gw-01",
        osName: () => "Linux",
        osVersion: () => "6.1.0",
        arch: () => "aarch64",
        uptimeSec: () => 120,
        loadavg: () => [1, 2, 3],
        readText: (target) => (target === "/sys/class/thermal/thermal_zone0/temp" ? "51000" : null),
        diskUsage: () => ({ totalBytes: 8 * 1024 ** 3, usedBytes: 2 * 1024 ** 3, freeBytes: 6 * 1024 ** 3 }),
      };
      const { url } = await start({}, { hostProbe });

      const body = await (await fetch(url("/api/v1/base/info"))).json();

      expect(body).toMatchObject({
        ok: true,
        error: null,
        hostname: "edge-gw-01",
        arch: "aarch64",
        uptime_sec: 120,
        load_15: 3,
        mem_total_kb: null,
        disk_total_gb: 8,
        disk_used_gb: 2,
        soc_temp_c: 51,
      });
    });

    it("maps an unreachable modem to 503 on device info", async () => {
      const { url } = await start({}, { transport: fakeModem({ unplugged: true }).transport });

      const response = await fetch(url("/api/v1/info"));

      expect(response.status).toBe(503);
      expect(await response.json()).toMatchObject({
        code: "DEVICE_NOT_FOUND",
        message: "Serial device /dev/ttyUSB2 not found.",
      });
    });

    it("replays a stream reset to a client whose last event is gone", async () => {
      const { url } = await start();
      const controller = new AbortController();

      const response = await fetch(url("/api/v1/live/stream"), {
        headers: { "Last-Event-ID": "999" },
        signal: controller.signal,
      });
      const reader = response.body?.getReader();
      if (!reader) {
        throw new Error("SSE response has no body");
      }
      const decoder = new TextDecoder();
      let text = "";
      while (!text.includes("\n\n")) {
        const chunk = await reader.read();
        if (chunk.done) break;
        text += decoder.decode(chunk.value, { stream: true });
      }
      controller.abort();

      expect(response.headers.get("content-type")).toBe("text/event-stream");
      expect(text.startsWith("id: 1\nevent: stream_reset\ndata: ")).toBe(true);
    });
  });

  describe("control", () => {
    it("reads the roaming preference", async () => {
      const { url } = await start();

      const body = await (await fetch(url("/api/v1/ctrl/roaming"))).json();

      expect(body).toMatchObject({
        ok: true,
        error: null,
        roaming: { enabled: true },
        raw: { [ROAM_QUERY]: ['+QNWPREFCFG: "roam_pref",255', "OK"] },
      });
    });

    it("executes a safe action and confirms it by read-back", async () => {
      const modem = fakeModem();
      const { url } = await start({}, { transport: modem.transport });

      const response = await postJson(url("/api/v1/ctrl/roaming"), { enable: false });
      const body = await response.json();

      expect(response.status).toBe(200);
      expect(modem.sent).toEqual(['AT+QNWPREFCFG="roam_pref",1', ROAM_QUERY]);
      expect(body).toMatchObject({
        ok: true,
        action: "roaming",
        error: null,
        detail: {
          executed: true,
          dry_run: false,
          planned: ['AT+QNWPREFCFG="roam_pref",1'],
          extra: { state: { enabled: false } },
        },
      });
    });

    it("previews a dangerous action without touching the modem", async () => {
      const modem = fakeModem();
      const { url } = await start({}, { transport: modem.transport });

      const body = await (await postJson(url("/api/v1/ctrl/reboot"), { mode: "full" })).json();

      expect(modem.sent).toEqual([]);
      expect(body).toMatchObject({
        ok: true,
        detail: {
          executed: false,
          dangerous: true,
          blocked_reason: "dangerous-blocked",
          planned: ["AT+CFUN=4", "AT+CFUN=1,1"],
        },
      });
    });

    it("rejects a quoted APN before planning", async () => {
      const modem = fakeModem();
      const { url } = await start({ CTRL_ALLOW_DANGEROUS: "true" }, { transport: modem.transport });

      const response = await postJson(url("/api/v1/ctrl/apn"), { apn: 'internet"' });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ code: "VALIDATION_ERROR" });
      expect(modem.sent).toEqual([]);
    });

    it("answers 404 for an unknown action", async () => {
      const { url } = await start();

      const response = await postJson(url("/api/v1/ctrl/self_destruct"), {});

      expect(response.status).toBe(404);
      expect(await response.json()).toMatchObject({
        code: "NOT_FOUND",
        message: "Unknown control action: self_destruct.",
      });
    });

    it("answers 400 for a body that is not JSON", async () => {
      const { url } = await start();

      const response = await fetch(url("/api/v1/ctrl/roaming"), {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{enable:",
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ code: "VALIDATION_ERROR" });
    });

    it("rate limits control requests per client", async () => {
      const { url } = await start({ CTRL_RATE_LIMIT_MAX: "2" });

      const statuses: number[] = [];
      for (let i = 0; i < 3; i += 1) {
        const response = await postJson(url("/api/v1/ctrl/gnss"), { enable: true, dry_run: true });
        statuses.push(response.status);
        if (response.status === 429) {
          expect(await response.json()).toMatchObject({ code: "RATE_LIMITED" });
        } else {
          await response.arrayBuffer();
        }
      }

      expect(statuses).toEqual([200, 200, 429]);
    });
  });

  describe("media", () => {
    it("answers 503 on every media path when disabled", async () => {
      const fetchImpl = vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>();
      const { url } = await start({ MEDIA_ENABLED: "false" }, { fetchImpl });

      const responses = await Promise.all([
        fetch(url("/api/v1/nvr/cameras")),
        fetch(url("/live/cam1/sub/index.m3u8")),
      ]);

      for (const response of responses) {
        expect(response.status).toBe(503);
        expect(await response.json()).toMatchObject({ code: "UPSTREAM_DISABLED" });
      }
      expect(fetchImpl).not.toHaveBeenCalled();
    });

    it("rejects an unknown stream profile with 400", async () => {
      const { url } = await start();

      const response = await fetch(url("/live/cam1/hd/index.m3u8"));

      expect(response.status).toBe(400);
    });

    it("proxies a playlist", async () => {
      const fetchImpl = vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>(() =>
        Promise.resolve(
          new Response("#EXTM3U\n", { headers: { "content-type": "application/vnd.apple.mpegurl" } })
        )
      );
      const { url } = await start({}, { fetchImpl });

      const response = await fetch(url("/live/cam1/sub/index.m3u8"));

      expect(response.status).toBe(200);
      expect(response.headers.get("cache-control")).toBe("no-cache, no-store, must-revalidate");
      expect(await response.text()).toBe("#EXTM3U\n");
      expect(fetchImpl.mock.calls[0]?.[0]).toBe("http://nvr.test/live/cam1/sub/index.m3u8");
    });

    it("proxies a segment from a subdirectory of the profile", async () => {
      const fetchImpl = vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>(() =>
        Promise.resolve(new Response(new Uint8Array([0x47, 0x40, 0x11])))
      );
      const { url } = await start({}, { fetchImpl });

      const response = await fetch(url("/live/cam1/main/chunks/seg-2.ts"));

      expect(response.status).toBe(200);
      expect(response.headers.get("content-type")).toBe("video/mp2t");
      expect(new Uint8Array(await response.arrayBuffer())).toEqual(new Uint8Array([0x47, 0x40, 0x11]));
      expect(fetchImpl.mock.calls[0]?.[0]).toBe("http://nvr.test/live/cam1/main/chunks/seg-2.ts");
    });

    it("rejects a segment path that climbs out of the profile", async () => {
      const fetchImpl = vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>();
      const { url } = await start({}, { fetchImpl });

      const response = await fetch(url("/live/cam1/sub/chunks%2F..%2F..%2Fsecret.ts"));

      expect(response.status).toBe(400);
      expect(fetchImpl).not.toHaveBeenCalled();
    });

    it("streams a byte range of a recorded file", async () => {
      const fetchImpl = vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>(() =>
        Promise.resolve(
          new Response(new Uint8Array(1024).fill(7), {
            status: 206,
            headers: {
              "content-type": "video/mp4",
              "content-range": "bytes 0-1023/4096",
              "content-length": "1024",
              "accept-ranges": "bytes",
            },
          })
        )
      );
      const { url } = await start({}, { fetchImpl });

      const response = await fetch(url("/api/v1/nvr/recordings/cam1/files/2024-05-01/10-00-00.mp4"), {
        headers: { Range: "bytes=0-1023" },
      });
      const body = new Uint8Array(await response.arrayBuffer());

      expect(response.status).toBe(206);
      expect(response.headers.get("content-range")).toBe("bytes 0-1023/4096");
      expect(response.headers.get("accept-ranges")).toBe("bytes");
      expect(response.headers.get("content-length")).toBe("1024");
      expect(body.length).toBe(1024);
      expect(body[1023]).toBe(7);
      expect(fetchImpl.mock.calls[0]?.[1]?.headers).toEqual({ Range: "bytes=0-1023" });
    });

    it("rewrites segment urls against the request host", async () => {
      const fetchImpl = vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>(() =>
        Promise.resolve(
          new Response(JSON.stringify({ segments: [{ filename: "a.mp4", url: "http://10.0.0.2/a.mp4" }] }), {
            headers: { "content-type": "application/json" },
          })
        )
      );
      const { url } = await start({}, { fetchImpl });

      const body = await (await fetch(url("/api/v1/nvr/recordings/cam1/days/2024-05-01/segments"))).json();

      expect(body).toEqual({
        segments: [
          {
            filename: "a.mp4",
            origin_url: "http://10.0.0.2/a.mp4",
            url: url("/api/v1/nvr/recordings/cam1/files/2024-05-01/a.mp4"),
          },
        ],
      });
    });
  });
});
