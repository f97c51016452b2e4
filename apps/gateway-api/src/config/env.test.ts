import { describe, expect, it } from "vitest";
import { gatesFromConfig, loadConfig } from "./env";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.port).toBe(8000);
    expect(config.portExplicit).toBe(false);
    expect(config.serial.path).toBe("/dev/ttyUSB2");
    expect(config.serial.reconnectDelaysMs).toEqual([0, 2000, 5000, 10000]);
    expect(config.poller.netdevInterfaces).toEqual(["wwan0", "usb0", "eth1", "eth0"]);
    expect(config.control).toEqual({ enabled: true, allowDangerous: false, rateLimitMax: 30 });
    expect(config.media.baseUrl).toBe("http://192.168.99.11:8787");
    expect(config.media.apiPrefix).toBe("/v1");
    expect(config.media.publicHost).toBe("192.168.99.11");
  });

  it("normalises media urls and lists", () => {
    const config = loadConfig({
      MEDIA_BASE_URL: "http://nvr.local:9000/",
      MEDIA_API_PREFIX: "/api/v2/",
      NETDEV_INTERFACES: " wwan0 , ,rmnet0",
      AT_RECONNECT_DELAYS_MS: "0,500",
    });

    expect(config.media.baseUrl).toBe("http://nvr.local:9000");
    expect(config.media.apiPrefix).toBe("/api/v2");
    expect(config.media.publicHost).toBe("nvr.local");
    expect(config.poller.netdevInterfaces).toEqual(["wwan0", "rmnet0"]);
    expect(config.serial.reconnectDelaysMs).toEqual([0, 500]);
  });

  it("names the variable when a value is malformed", () => {
    expect(() => loadConfig({ PORT: "eighty" })).toThrow('PORT must be an integer >= 1, got "eighty".');
    expect(() => loadConfig({ CTRL_ALLOW_DANGEROUS: "maybe" })).toThrow(
      'CTRL_ALLOW_DANGEROUS must be a boolean, got "maybe".'
    );
    expect(() => loadConfig({ AT_RECONNECT_DELAYS_MS: "0,-1" })).toThrow(
      "AT_RECONNECT_DELAYS_MS must be a comma-separated list of non-negative integers."
    );
  });

  it("reads gates at call time", () => {
    const config = loadConfig({});
    const gates = gatesFromConfig(config.control);

    config.control.allowDangerous = true;

    expect(gates.allowDangerous()).toBe(true);
  });
});
