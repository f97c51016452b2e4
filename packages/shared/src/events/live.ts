import type { LiveResponse } from "../api/telemetry";
import type { ControlActionName } from "../api/control";

export type SnapshotEvent = {
  type: "snapshot";
  snapshot: LiveResponse;
};

export type ControlEvent = {
  type: "control";
  action: ControlActionName;
  executed: boolean;
  dry_run: boolean;
  blocked_reason: string | null;
  error: string | null;
  ts: string;
};

export type LogEvent = {
  type: "log";
  level: "info" | "warn" | "error";
  message: string;
  code?: string;
  ts: string;
};

export type StreamResetEvent = {
  type: "stream_reset";
  reason: "history_unavailable" | "buffer_cleared";
  ts: string;
};

export type LiveEvent = SnapshotEvent | ControlEvent | LogEvent | StreamResetEvent;
