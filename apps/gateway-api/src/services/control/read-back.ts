import {
  decodeBandPreference,
  decodeNetworkMode,
  decodeRoaming,
  preferenceQuery,
} from "@cellgate/at";
import type { BandPreferenceState, NetworkModeState, RoamingState } from "@cellgate/shared";
import type { AtTransport } from "../../serial/transport";

export type ReadBackSpec<S> = {
  queries: readonly string[];
  decode: (raw: Readonly<Record<string, string[]>>) => S | null;
  /** Error text when the modem answered without the value. */
  missing: string;
};

export type ReadBackResult<S> = {
  state: S | null;
  raw: Record<string, string[]>;
  error: string | null;
};

const ROAM_QUERY = preferenceQuery("roam_pref");
const MODE_QUERY = preferenceQuery("mode_pref");
const LTE_BAND_QUERY = preferenceQuery("lte_band");
const NSA_BAND_QUERY = preferenceQuery("nsa_nr5g_band");
const SA_BAND_QUERY = preferenceQuery("nr5g_band");

export const ROAMING_READ_BACK: ReadBackSpec<RoamingState> = {
  queries: [ROAM_QUERY],
  decode: (raw) => decodeRoaming(raw[ROAM_QUERY]),
  missing: `Modem did not return a roam_pref value (${ROAM_QUERY}).`,
};

export const NETWORK_MODE_READ_BACK: ReadBackSpec<NetworkModeState> = {
  queries: [MODE_QUERY],
  decode: (raw) => decodeNetworkMode(raw[MODE_QUERY]),
  missing: `Modem did not return a mode_pref value (${MODE_QUERY}).`,
};

export const BAND_PREFERENCE_READ_BACK: ReadBackSpec<BandPreferenceState> = {
  queries: [LTE_BAND_QUERY, NSA_BAND_QUERY, SA_BAND_QUERY],
  decode: (raw) => {
    const bands = decodeBandPreference({
      lte_band: raw[LTE_BAND_QUERY],
      nsa_nr5g_band: raw[NSA_BAND_QUERY],
      nr5g_band: raw[SA_BAND_QUERY],
    });
    const anyValue = bands.lte_bands !== null || bands.nsa_nr5g_bands !== null || bands.nr5g_bands !== null;
    return anyValue ? bands : null;
  },
  missing: "Modem did not return any band preference value.",
};

/**
 * Issues the read-only queries in order. A device-reported error ends the read-back with
 * `error` set; transport failures propagate.
 */
export const runReadBack = async <S>(
  transport: Pick<AtTransport, "exchange">,
  spec: ReadBackSpec<S>
): Promise<ReadBackResult<S>> => {
  const raw: Record<string, string[]> = {};
  for (const query of spec.queries) {
    const result = await transport.exchange(query);
    raw[query] = result.lines;
    if (result.outcome === "protocol_error") {
      return { state: null, raw, error: `${query} failed: ${result.error ?? "ERROR"}` };
    }
  }
  const state = spec.decode(raw);
  return { state, raw, error: state === null ? spec.missing : null };
};
