import { STREAM_PROFILES, type StreamProfile } from "@cellgate/shared";
import { ValidationError } from "../../errors/app-error";

const IPV4 = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)(\.(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)){3}$/;
const PLAIN_ID = /^[A-Za-z0-9_-]+$/;
const DATE = /^\d{4}-\d{2}-\d{2}$/;

export const assertCameraId = (value: unknown): string => {
  if (typeof value !== "string" || !(IPV4.test(value) || PLAIN_ID.test(value))) {
    throw new ValidationError("Invalid camera id.", { field: "id" });
  }
  return value;
};

export const assertDate = (value: unknown): string => {
  if (typeof value !== "string" || !DATE.test(value)) {
    throw new ValidationError("Invalid date, expected YYYY-MM-DD.", { field: "date" });
  }
  return value;
};

export const assertFileName = (value: unknown): string => {
  if (
    typeof value !== "string" ||
    value.length === 0 ||
    value.includes("/") ||
    value.includes("\\") ||
    value.includes("..")
  ) {
    throw new ValidationError("Invalid file name.", { field: "file" });
  }
  return value;
};

/** Relative path below a stream's profile directory, e.g. `seg-17.ts` or `chunks/seg-17.ts`. */
export const assertSegmentPath = (value: unknown): string => {
  if (typeof value !== "string" || value.length === 0) {
    throw new ValidationError("Invalid file name.", { field: "file" });
  }
  return value.split("/").map(assertFileName).join("/");
};

export const assertProfile = (value: unknown): StreamProfile => {
  const profile = STREAM_PROFILES.find((candidate) => candidate === value);
  if (!profile) {
    throw new ValidationError(`Invalid profile: expected one of ${STREAM_PROFILES.join(", ")}.`, {
      field: "profile",
    });
  }
  return profile;
};

/** Trailing number of a dotted id (`192.168.11.103` → 103), or null. */
export const lastOctetOf = (id: string) => {
  const last = id.split(".").pop() ?? "";
  return /^\d+$/.test(last) ? Number.parseInt(last, 10) : null;
};
