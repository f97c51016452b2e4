import type { MediaHealthResponse, StreamDescriptor } from "@cellgate/shared";
import type { MediaConfig } from "../../config/env";
import { UpstreamError } from "../../errors/upstream";
import { assertCameraId, assertDate, assertFileName, assertProfile, assertSegmentPath } from "./paths";
import {
  isJsonObject,
  markCameraOnline,
  rewriteSegmentUrls,
  rewriteStreamDescriptor,
  type PublicEndpoint,
} from "./rewrite";
import { fetchUpstream, fetchUpstreamJson, type FetchLike, type IdleLimit } from "./upstream";

/** Upstream answer to hand on to the client as a stream. */
export type ProxiedBody = {
  status: number;
  headers: Record<string, string>;
  body: Response["body"];
  /** Longest gap allowed between body chunks. */
  idle: IdleLimit;
};

export type RangeHeaders = { range?: string; ifRange?: string };

export type MediaGateway = {
  health: () => Promise<MediaHealthResponse>;
  cameras: () => Promise<unknown>;
  cameraStream: (id: unknown) => Promise<unknown>;
  liveHls: (id: unknown, profile: unknown) => Promise<unknown>;
  recordings: () => Promise<unknown>;
  recordingDays: (id: unknown) => Promise<unknown>;
  /** `origin` is this gateway's public origin, e.g. `http://10.0.0.1:8000`. */
  recordingSegments: (id: unknown, date: unknown, origin: string) => Promise<unknown>;
  recordingFile: (id: unknown, date: unknown, file: unknown, headers: RangeHeaders) => Promise<ProxiedBody>;
  playlist: (id: unknown, profile: unknown) => Promise<ProxiedBody>;
  /** `file` may name a nested path below the profile directory. */
  segment: (id: unknown, profile: unknown, file: unknown) => Promise<ProxiedBody>;
};

export const RECORDING_FILES_PATH = "/api/v1/nvr/recordings";

const PLAYLIST_TYPE = "application/vnd.apple.mpegurl";
const SEGMENT_TYPE = "video/mp2t";
const RECORDING_TYPE = "video/mp4";

const PLAYLIST_CACHE = "no-cache, no-store, must-revalidate";
const SEGMENT_CACHE = "public, max-age=3600";

const MIRRORED_FILE_HEADERS = ["content-length", "content-range", "accept-ranges", "etag"] as const;

const FILE_HEADER_NAMES: Record<(typeof MIRRORED_FILE_HEADERS)[number], string> = {
  "content-length": "Content-Length",
  "content-range": "Content-Range",
  "accept-ranges": "Accept-Ranges",
  etag: "ETag",
};

export const describeStream = (config: MediaConfig, id: unknown, profile: unknown): StreamDescriptor => {
  const cameraId = assertCameraId(id);
  const streamProfile = assertProfile(profile);
  return {
    camera_id: cameraId,
    profile: streamProfile,
    playlist: `/live/${cameraId}/${streamProfile}/index.m3u8`,
    upstream: config.baseUrl,
  };
};

export const createMediaGateway = (
  config: MediaConfig,
  fetchImpl: FetchLike = (input, init) => fetch(input, init)
): MediaGateway => {
  const endpoint: PublicEndpoint = {
    host: config.publicHost,
    basePort: config.publicBasePort,
    offsetBase: config.portOffsetBase,
  };

  const ensureEnabled = () => {
    if (!config.enabled) {
      throw new UpstreamError("disabled", "Media integration disabled.");
    }
  };

  const api = async (path: string, label: string) => {
    ensureEnabled();
    return fetchUpstreamJson(fetchImpl, {
      url: `${config.baseUrl}${config.apiPrefix}${path}`,
      timeoutMs: config.timeoutMs,
      label,
    });
  };

  const proxy = async (
    path: string,
    label: string,
    fallbackType: string,
    cacheControl: string
  ): Promise<ProxiedBody> => {
    const request = { url: `${config.baseUrl}${path}`, timeoutMs: config.timeoutMs, label };
    const response = await fetchUpstream(fetchImpl, request);
    return {
      status: 200,
      headers: {
        "Content-Type": response.headers.get("content-type") ?? fallbackType,
        "Cache-Control": cacheControl,
      },
      body: response.body,
      idle: request,
    };
  };

  return {
    health: async () => {
      const data = await api("/health", "NVR health");
      const ts = isJsonObject(data) && typeof data.ts === "number" ? data.ts : Date.now();
      return { ok: true, ts, nvr: data };
    },

    cameras: () => api("/cameras", "NVR cameras"),

    cameraStream: async (id) => {
      ensureEnabled();
      const cameraId = assertCameraId(id);
      const data = await api(`/cameras/${cameraId}/stream`, "NVR stream");
      return rewriteStreamDescriptor(data, cameraId, endpoint);
    },

    liveHls: async (id, profile) => {
      ensureEnabled();
      const cameraId = assertCameraId(id);
      const streamProfile = assertProfile(profile ?? "sub");
      const data = await api(`/cameras/${cameraId}/live-hls?profile=${streamProfile}`, "NVR live-hls");
      return markCameraOnline(data);
    },

    recordings: () => api("/recordings", "NVR recordings list"),

    recordingDays: async (id) => {
      ensureEnabled();
      return api(`/recordings/${assertCameraId(id)}/days`, "NVR recordings days");
    },

    recordingSegments: async (id, date, origin) => {
      ensureEnabled();
      const cameraId = assertCameraId(id);
      const day = assertDate(date);
      const data = await api(`/recordings/${cameraId}/days/${day}/segments`, "NVR recordings segments");
      return rewriteSegmentUrls(data, `${origin}${RECORDING_FILES_PATH}/${cameraId}/files/${day}`);
    },

    recordingFile: async (id, date, file, headers) => {
      ensureEnabled();
      const cameraId = assertCameraId(id);
      const day = assertDate(date);
      const fileName = assertFileName(file);
      const forwarded: Record<string, string> = {};
      if (headers.range) forwarded.Range = headers.range;
      if (headers.ifRange) forwarded["If-Range"] = headers.ifRange;
      const request = {
        url: `${config.baseUrl}${config.apiPrefix}/recordings/${cameraId}/files/${day}/${encodeURIComponent(fileName)}`,
        timeoutMs: config.fileTimeoutMs,
        timeoutStatus: 504,
        headers: forwarded,
        label: "NVR recording file",
      };
      const response = await fetchUpstream(fetchImpl, request);
      const mirrored: Record<string, string> = {
        "Content-Type": response.headers.get("content-type") ?? RECORDING_TYPE,
      };
      for (const name of MIRRORED_FILE_HEADERS) {
        const value = response.headers.get(name);
        if (value !== null) {
          mirrored[FILE_HEADER_NAMES[name]] = value;
        }
      }
      return { status: response.status, headers: mirrored, body: response.body, idle: request };
    },

    playlist: async (id, profile) => {
      ensureEnabled();
      const stream = describeStream(config, id, profile);
      return proxy(stream.playlist, "NVR HLS playlist", PLAYLIST_TYPE, PLAYLIST_CACHE);
    },

    segment: async (id, profile, file) => {
      ensureEnabled();
      const stream = describeStream(config, id, profile);
      const segmentPath = assertSegmentPath(file).split("/").map(encodeURIComponent).join("/");
      return proxy(
        `/live/${stream.camera_id}/${stream.profile}/${segmentPath}`,
        "NVR HLS segment",
        SEGMENT_TYPE,
        SEGMENT_CACHE
      );
    },
  };
};
