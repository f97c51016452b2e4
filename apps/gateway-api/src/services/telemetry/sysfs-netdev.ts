import fs from "fs";
import os from "os";
import path from "path";
import { toInt } from "@cellgate/at";
import type { NetdevStats } from "@cellgate/shared";

export type NetdevProbe = {
  exists: (target: string) => boolean;
  readText: (target: string) => string | null;
  list: (dir: string) => string[];
  ipv4Of: (iface: string) => string | null;
};

const SYS_NET = "/sys/class/net";

export const nodeNetdevProbe: NetdevProbe = {
  exists: (target) => fs.existsSync(target),
  readText: (target) => {
    try {
      return fs.readFileSync(target, "utf8");
    } catch {
      return null;
    }
  },
  list: (dir) => {
    try {
      return fs.readdirSync(dir);
    } catch {
      return [];
    }
  },
  ipv4Of: (iface) => {
    const address = (os.networkInterfaces()[iface] ?? []).find((entry) => entry.family === "IPv4");
    return address ? address.address : null;
  },
};

const pickInterface = (preferred: readonly string[], probe: NetdevProbe) => {
  const configured = preferred.find((iface) => probe.exists(path.posix.join(SYS_NET, iface)));
  if (configured) {
    return configured;
  }
  return (
    probe
      .list(SYS_NET)
      .find((iface) => iface !== "lo" && probe.exists(path.posix.join(SYS_NET, iface, "statistics"))) ?? null
  );
};

/**
 * Byte counters from `/sys/class/net/<iface>/statistics` for when the modem gives no
 * QNETDEVSTATUS. Preferred interfaces first, then any non-loopback interface.
 */
export const readSysfsNetdev = (
  preferred: readonly string[],
  probe: NetdevProbe = nodeNetdevProbe
): NetdevStats | null => {
  const iface = pickInterface(preferred, probe);
  if (!iface) {
    return null;
  }
  const base = path.posix.join(SYS_NET, iface);
  const counter = (name: string) => toInt(probe.readText(path.posix.join(base, "statistics", name)));
  return {
    iface,
    state: probe.exists(path.posix.join(base, "carrier")) ? "UP" : null,
    ipv4: probe.ipv4Of(iface),
    rx_bytes: counter("rx_bytes"),
    tx_bytes: counter("tx_bytes"),
    rx_rate_bps: null,
    tx_rate_bps: null,
    source: "sysfs",
  };
};
