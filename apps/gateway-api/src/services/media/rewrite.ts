import { lastOctetOf } from "./paths";

export type JsonObject = Record<string, unknown>;

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export type PublicEndpoint = {
  host: string;
  basePort: number;
  offsetBase: number;
};

/**
 * Public port of a camera: `basePort + lastOctet(id) - offsetBase`.
 * Null when the id has no numeric last octet or the offset is below 1.
 */
export const publicPortOf = (id: string, endpoint: PublicEndpoint) => {
  const octet = lastOctetOf(id);
  if (octet === null) {
    return null;
  }
  const offset = octet - endpoint.offsetBase;
  return offset < 1 ? null : endpoint.basePort + offset;
};

const STREAM_LOCATIONS = ["url", "main_url"] as const;

/** Null when the location does not parse, so an internal address is never handed on. */
const withPublicAddress = (location: string, host: string, port: number) => {
  let url: URL;
  try {
    url = new URL(location);
  } catch {
    return null;
  }
  url.hostname = host;
  url.port = String(port);
  return url.toString();
};

/**
 * Points `stream.url` and `stream.main_url` at the public forwarding address. User info is kept.
 * A location with no public counterpart becomes null.
 */
export const rewriteStreamDescriptor = (data: unknown, id: string, endpoint: PublicEndpoint) => {
  if (!isJsonObject(data) || !isJsonObject(data.stream)) {
    return data;
  }
  const port = publicPortOf(id, endpoint);
  const stream: JsonObject = { ...data.stream };
  for (const key of STREAM_LOCATIONS) {
    const location = stream[key];
    if (typeof location === "string" && location.length > 0) {
      stream[key] = port === null ? null : withPublicAddress(location, endpoint.host, port);
    }
  }
  return { ...data, stream };
};

/** A successful live-hls answer proves the camera is reachable and authenticated. */
export const markCameraOnline = (data: unknown) => {
  if (!isJsonObject(data) || !isJsonObject(data.camera)) {
    return data;
  }
  const camera: JsonObject = { ...data.camera, online: true, auth: "ok" };
  if ("auth_status" in camera) {
    camera.auth_status = "ok";
  }
  return { ...data, camera };
};

const fileNameOf = (segment: JsonObject) => {
  if (typeof segment.filename === "string" && segment.filename.length > 0) {
    return segment.filename;
  }
  if (typeof segment.url !== "string") {
    return null;
  }
  let pathname: string;
  try {
    pathname = new URL(segment.url, "http://upstream.invalid").pathname;
  } catch {
    return null;
  }
  const last = pathname.split("/").filter((part) => part.length > 0).pop();
  return last ?? null;
};

/** Moves each segment `url` to `origin_url` and points `url` at this gateway's file path. */
export const rewriteSegmentUrls = (data: unknown, fileBase: string) => {
  if (!isJsonObject(data) || !Array.isArray(data.segments)) {
    return data;
  }
  const segments = data.segments.map((entry: unknown) => {
    if (!isJsonObject(entry) || !("url" in entry)) {
      return entry;
    }
    const segment: JsonObject = { ...entry };
    if (typeof entry.url === "string" && entry.url.length > 0) {
      segment.origin_url = entry.url;
    }
    const fileName = fileNameOf(entry);
    if (fileName) {
      segment.url = `${fileBase}/${encodeURIComponent(fileName)}`;
    }
    return segment;
  });
  return { ...data, segments };
};
