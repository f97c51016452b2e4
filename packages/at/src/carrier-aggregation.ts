import type { CarrierAggregation, CarrierComponent, SecondaryCarrier } from "@cellgate/shared";
import { describeBand, inferBandRat } from "./bands";
import { linesWithPrefix, splitFields, toInt, toMeasurement } from "./fields";

const LTE_RESOURCE_BLOCKS_MHZ: Record<number, number> = {
  6: 1.4,
  15: 3,
  25: 5,
  50: 10,
  75: 15,
  100: 20,
};

const NR_BANDWIDTH_MHZ: readonly number[] = [5, 10, 15, 20, 25, 30, 40, 50, 60, 70, 80, 90, 100, 200, 400];

const bandwidthOf = (rat: "LTE" | "NR", value: string | undefined) => {
  const code = toInt(value);
  if (code === null) {
    return null;
  }
  if (rat === "LTE") {
    return LTE_RESOURCE_BLOCKS_MHZ[code] ?? null;
  }
  return code >= 0 && code < NR_BANDWIDTH_MHZ.length ? NR_BANDWIDTH_MHZ[code] : null;
};

/**
 * LTE rows: `<tag>,<arfcn>,<bw>,<band>,<state>,<pci>,<rsrp>,<rsrq>,<rssi>,<sinr>`.
 * NR primary rows omit the state: `<tag>,<arfcn>,<bw>,<band>,<pci>,<rsrp>,<rsrq>,<sinr>`.
 */
const componentOf = (tokens: readonly string[], primary: boolean): CarrierComponent => {
  const bandText = tokens[3] ?? "";
  const rat = inferBandRat(bandText);
  const band = describeBand(rat, bandText);
  if (rat === "NR" && primary) {
    return {
      rat,
      arfcn: toInt(tokens[1]),
      dl_bw_mhz: bandwidthOf(rat, tokens[2]),
      band,
      pci: toInt(tokens[4]),
      rsrp: toMeasurement(tokens[5]),
      rsrq: toMeasurement(tokens[6]),
      rssi: null,
      sinr: toMeasurement(tokens[7]),
    };
  }
  return {
    rat,
    arfcn: toInt(tokens[1]),
    dl_bw_mhz: bandwidthOf(rat, tokens[2]),
    band,
    pci: toInt(tokens[5]),
    rsrp: toMeasurement(tokens[6]),
    rsrq: toMeasurement(tokens[7]),
    rssi: rat === "LTE" ? toMeasurement(tokens[8]) : null,
    sinr: rat === "LTE" ? toMeasurement(tokens[9]) : toMeasurement(tokens[8]),
  };
};

const carrierLabel = (component: CarrierComponent) => {
  const band = component.band?.name ?? "?";
  return component.arfcn === null ? band : `${band}@${component.arfcn}`;
};

export const summarizeCarriers = (
  primary: CarrierComponent | null,
  secondary: readonly SecondaryCarrier[]
) => {
  if (!primary && secondary.length === 0) {
    return null;
  }
  const primaryText = primary
    ? [
        `${primary.rat} PCC ${carrierLabel(primary)}`,
        primary.dl_bw_mhz === null ? null : `(BW ${primary.dl_bw_mhz}MHz)`,
      ]
        .filter((part): part is string => part !== null)
        .join(" ")
    : "PCC n/a";
  const secondaryText =
    secondary.length === 0
      ? "SCC×0"
      : `SCC×${secondary.length}: ${secondary.map(carrierLabel).join(", ")}`;
  return `${primaryText}, ${secondaryText}`;
};

/** Decodes `AT+QCAINFO`; secondary carriers are numbered from 1 in reply order. */
export const decodeCarrierAggregation = (
  lines: readonly string[] | undefined
): CarrierAggregation | null => {
  const rows = linesWithPrefix(lines, "+QCAINFO:").map(splitFields);
  if (rows.length === 0) {
    return null;
  }
  let primary: CarrierComponent | null = null;
  const secondary: SecondaryCarrier[] = [];
  for (const tokens of rows) {
    const tag = tokens[0]?.toUpperCase() ?? "";
    if (tokens.length < 4) {
      throw new Error(`Short carrier-aggregation row: ${tokens.join(",")}`);
    }
    if (tag === "PCC") {
      primary = componentOf(tokens, true);
    } else if (tag.startsWith("SCC")) {
      secondary.push({ ...componentOf(tokens, false), index: secondary.length + 1 });
    }
  }
  return { primary, secondary, summary: summarizeCarriers(primary, secondary) };
};
