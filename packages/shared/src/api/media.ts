export const STREAM_PROFILES = ["sub", "main"] as const;

export type StreamProfile = (typeof STREAM_PROFILES)[number];

export type StreamDescriptor = {
  camera_id: string;
  profile: StreamProfile;
  playlist: string;
  upstream: string;
};

export type MediaHealthResponse = {
  ok: boolean;
  ts: number;
  nvr: unknown;
};
