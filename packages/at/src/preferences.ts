import type { BandPreferenceState, NetworkModeState, RoamingState } from "@cellgate/shared";
import { linesWithPrefix, splitFields, toInt, toText } from "./fields";

export type BandPreferenceKey = "lte_band" | "nsa_nr5g_band" | "nr5g_band";

export const preferenceQuery = (name: "roam_pref" | "mode_pref" | BandPreferenceKey) =>
  `AT+QNWPREFCFG="${name}"`;

/** Value text of `+QNWPREFCFG: "<name>",<value>`, or null when the reply lacks that entry. */
export const preferenceValue = (lines: readonly string[] | undefined, name: string) => {
  for (const line of linesWithPrefix(lines, "+QNWPREFCFG:")) {
    const colon = line.indexOf(":");
    const [key] = splitFields(line);
    if (key?.toLowerCase() !== name) continue;
    const rest = line.slice(colon + 1);
    const comma = rest.indexOf(",");
    return comma < 0 ? "" : rest.slice(comma + 1).trim();
  }
  return null;
};

/** roam_pref 1 is home network only; every other value allows roaming. */
export const decodeRoaming = (lines: readonly string[] | undefined): RoamingState | null => {
  const value = toInt(preferenceValue(lines, "roam_pref"));
  return value === null ? null : { enabled: value !== 1 };
};

export const decodeNetworkMode = (lines: readonly string[] | undefined): NetworkModeState | null => {
  const value = toText(preferenceValue(lines, "mode_pref"));
  return value === null ? null : { mode_pref: value };
};

/** Colon-separated band list; an empty value is an empty list. */
export const decodeBandList = (lines: readonly string[] | undefined, name: BandPreferenceKey) => {
  const value = preferenceValue(lines, name);
  if (value === null) {
    return null;
  }
  if (value.length === 0) {
    return [];
  }
  const bands = value
    .split(":")
    .map(toInt)
    .filter((band): band is number => band !== null && band > 0);
  return bands.length > 0 ? bands : null;
};

export const decodeBandPreference = (replies: {
  lte_band?: readonly string[];
  nsa_nr5g_band?: readonly string[];
  nr5g_band?: readonly string[];
}): BandPreferenceState => ({
  lte_bands: decodeBandList(replies.lte_band, "lte_band"),
  nsa_nr5g_bands: decodeBandList(replies.nsa_nr5g_band, "nsa_nr5g_band"),
  nr5g_bands: decodeBandList(replies.nr5g_band, "nr5g_band"),
});
