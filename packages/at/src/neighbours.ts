import type { LteNeighbour, NeighbourCells, NrNeighbour } from "@cellgate/shared";
import { guessLteBand, guessNrBand } from "./bands";
import { linesWithPrefix, splitFields, toInt, toMeasurement } from "./fields";

const NR_SCS_KHZ: readonly number[] = [15, 30, 60, 120, 240];

const scopeOf = (tag: string): LteNeighbour["scope"] => {
  const lower = tag.toLowerCase();
  if (lower.includes("intra")) return "intra";
  if (lower.includes("inter")) return "inter";
  return null;
};

/** `"neighbourcell intra","LTE",<earfcn>,<pci>,<rsrq>,<rsrp>,<rssi>,<sinr>,<srxlev>,...` */
const lteNeighbour = (tokens: readonly string[]): LteNeighbour | null => {
  const earfcn = toInt(tokens[2]);
  const pci = toInt(tokens[3]);
  if (earfcn === null || pci === null) {
    return null;
  }
  return {
    scope: scopeOf(tokens[0] ?? ""),
    earfcn,
    pci,
    rsrq: toMeasurement(tokens[4]),
    rsrp: toMeasurement(tokens[5]),
    rssi: toMeasurement(tokens[6]),
    sinr: toMeasurement(tokens[7]),
    srxlev: toMeasurement(tokens[8]),
    band: guessLteBand(earfcn),
  };
};

/**
 * `"neighbourcell","NR5G",<nrarfcn>,<pci>,<rsrp>,<rsrq>[,<sinr>]`; some firmware inserts the
 * SCS code right after the RAT tag, recognisable as a value below 5.
 */
const nrNeighbour = (tokens: readonly string[]): NrNeighbour | null => {
  let offset = 2;
  let scs: number | null = null;
  const first = toInt(tokens[2]);
  if (first !== null && first >= 0 && first < NR_SCS_KHZ.length && tokens.length >= 6) {
    scs = NR_SCS_KHZ[first];
    offset = 3;
  }
  const nrarfcn = toInt(tokens[offset]);
  const pci = toInt(tokens[offset + 1]);
  if (nrarfcn === null || pci === null) {
    return null;
  }
  return {
    nrarfcn,
    pci,
    rsrp: toMeasurement(tokens[offset + 2]),
    rsrq: toMeasurement(tokens[offset + 3]),
    sinr: toMeasurement(tokens[offset + 4]),
    scs_khz: scs,
    band: guessNrBand(nrarfcn),
  };
};

/** Decodes `AT+QENG="neighbourcell"`; a reply with only `OK` is an empty list. */
export const decodeNeighbours = (lines: readonly string[] | undefined): NeighbourCells | null => {
  if (lines === undefined) {
    return null;
  }
  const cells: NeighbourCells = { lte: [], nr: [] };
  for (const tokens of linesWithPrefix(lines, "+QENG:").map(splitFields)) {
    if (!tokens[0]?.toLowerCase().startsWith("neighbourcell")) {
      continue;
    }
    const rat = tokens[1]?.toUpperCase() ?? "";
    if (rat === "LTE") {
      const cell = lteNeighbour(tokens);
      if (cell) cells.lte.push(cell);
    } else if (rat.startsWith("NR")) {
      const cell = nrNeighbour(tokens);
      if (cell) cells.nr.push(cell);
    }
  }
  return cells;
};
