import fs from "fs";
import os from "os";
import type { HostInfoResponse } from "@cellgate/shared";

export type DiskUsage = { totalBytes: number; usedBytes: number; freeBytes: number };

export type HostProbe = {
  hostname: () => string;
  osName: () => string;
  osVersion: () => string;
  arch: () => string;
  uptimeSec: () => number;
  loadavg: () => number[];
  readText: (target: string) => string | null;
  diskUsage: (target: string) => DiskUsage;
};

const MEMINFO = "/proc/meminfo";
const SOC_THERMAL_ZONE = "/sys/class/thermal/thermal_zone0/temp";
const GIB = 1024 ** 3;

export const nodeHostProbe: HostProbe = {
  hostname: () => os.hostname(),
  osName: () => os.type(),
  osVersion: () => os.release(),
  arch: () => os.machine(),
  uptimeSec: () => os.uptime(),
  loadavg: () => os.loadavg(),
  readText: (target) => {
    try {
      return fs.readFileSync(target, "utf8");
    } catch {
      return null;
    }
  },
  // Same figures as df: used counts reserved blocks, free is what an unprivileged user gets.
  diskUsage: (target) => {
    const stats = fs.statfsSync(target);
    return {
      totalBytes: stats.blocks * stats.bsize,
      usedBytes: (stats.blocks - stats.bfree) * stats.bsize,
      freeBytes: stats.bavail * stats.bsize,
    };
  },
};

/**
 * `MemTotal` and `MemAvailable` from /proc/meminfo, in kB. `MemFree` stands in when the
 * kernel predates `MemAvailable`.
 */
export const parseMeminfo = (text: string | null) => {
  if (!text) {
    return null;
  }
  const fields = new Map<string, number>();
  for (const line of text.split("\n")) {
    const match = /^(\w+):\s+(\d+)/.exec(line);
    if (match) {
      fields.set(match[1], Number.parseInt(match[2], 10));
    }
  }
  const total = fields.get("MemTotal");
  const free = fields.get("MemAvailable") ?? fields.get("MemFree");
  if (total === undefined || free === undefined) {
    return null;
  }
  return { total, used: total - free, free };
};

/** Thermal zones report millidegrees on most kernels, whole degrees on a few. */
export const parseThermalZone = (text: string | null) => {
  const raw = text?.trim();
  if (!raw) {
    return null;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    return null;
  }
  return value > 1000 ? value / 1000 : value;
};

const toGb = (bytes: number) => Math.round((bytes / GIB) * 10) / 10;

export const readHostInfo = (
  probe: HostProbe = nodeHostProbe,
  options: { diskPath?: string; now?: () => number } = {}
): HostInfoResponse => {
  const problems: string[] = [];
  const attempt = <T>(part: string, read: () => T): T | null => {
    try {
      return read();
    } catch (error) {
      problems.push(`${part}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  };

  const uptime = attempt("uptime", () => probe.uptimeSec());
  const load = attempt("load", () => probe.loadavg());
  const memory = attempt("memory", () => parseMeminfo(probe.readText(MEMINFO)));
  const disk = attempt("disk", () => probe.diskUsage(options.diskPath ?? "/"));
  if (problems.length > 0) {
    console.warn(`[host] incomplete host info: ${problems.join("; ")}`);
  }

  return {
    ok: true,
    ts: (options.now ?? Date.now)(),
    error: problems.length > 0 ? problems.join("; ") : null,
    hostname: probe.hostname(),
    os_name: probe.osName(),
    os_version: probe.osVersion(),
    arch: probe.arch(),
    uptime_sec: uptime,
    load_1: load?.[0] ?? null,
    load_5: load?.[1] ?? null,
    load_15: load?.[2] ?? null,
    mem_total_kb: memory?.total ?? null,
    mem_used_kb: memory?.used ?? null,
    mem_free_kb: memory?.free ?? null,
    disk_total_gb: disk ? toGb(disk.totalBytes) : null,
    disk_used_gb: disk ? toGb(disk.usedBytes) : null,
    disk_free_gb: disk ? toGb(disk.freeBytes) : null,
    soc_temp_c: parseThermalZone(probe.readText(SOC_THERMAL_ZONE)),
  };
};
