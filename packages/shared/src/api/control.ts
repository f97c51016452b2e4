export type ControlActionName =
  | "reboot"
  | "usbnet"
  | "apn"
  | "roaming"
  | "band"
  | "cell_lock"
  | "ca"
  | "gnss"
  | "network_mode"
  | "band_preference"
  | "reset_profile";

export type BlockedReason = "disabled" | "dangerous-blocked";

export type ControlActionDetail = {
  dry_run: boolean;
  dangerous: boolean;
  executed: boolean;
  blocked_reason: BlockedReason | null;
  planned: string[];
  errors: string[];
  extra: Record<string, unknown> | null;
};

export type ControlActionResponse = {
  ok: boolean;
  timestamp: string;
  action: ControlActionName;
  error: string | null;
  detail: ControlActionDetail;
};

export type RoamingState = { enabled: boolean };

export type NetworkModeState = { mode_pref: string | null };

export type BandPreferenceState = {
  lte_bands: number[] | null;
  nsa_nr5g_bands: number[] | null;
  nr5g_bands: number[] | null;
};

type ReadBackEnvelope = {
  ok: boolean;
  ts: number;
  error: string | null;
  raw: Record<string, string[]> | null;
};

export type RoamingResponse = ReadBackEnvelope & { roaming: RoamingState | null };

export type NetworkModeResponse = ReadBackEnvelope & { mode: NetworkModeState | null };

export type BandPreferenceResponse = ReadBackEnvelope & { bands: BandPreferenceState };
