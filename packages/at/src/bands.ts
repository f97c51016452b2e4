import type { BandInfo, BandRat } from "@cellgate/shared";
import bandTable from "../data/bands.json";

type BandEntry = readonly string[];

const LTE_BANDS: Record<string, BandEntry> = bandTable.lte;
const NR_BANDS: Record<string, BandEntry> = bandTable.nr;
const EARFCN_RANGES: readonly (readonly number[])[] = bandTable.earfcnRanges;
const NRARFCN_RANGES: readonly (readonly number[])[] = bandTable.nrarfcnRanges;

const bandNumberOf = (raw: string | number) => {
  if (typeof raw === "number") {
    return Number.isInteger(raw) && raw > 0 ? raw : null;
  }
  const match = raw.trim().match(/(\d+)\s*$/);
  if (!match) {
    return null;
  }
  const value = Number.parseInt(match[1], 10);
  return value > 0 ? value : null;
};

export const inferBandRat = (raw: string): BandRat => (/NR|^n\d/i.test(raw.trim()) ? "NR" : "LTE");

/**
 * Accepts `3`, `"B3"`, `"LTE BAND 3"`, `"n78"` or `"NR5G BAND 78"`.
 */
export const describeBand = (
  rat: BandRat,
  raw: string | number | null | undefined
): BandInfo | null => {
  if (raw === null || raw === undefined) {
    return null;
  }
  const number = bandNumberOf(raw);
  if (number === null) {
    return null;
  }
  const entry = (rat === "NR" ? NR_BANDS : LTE_BANDS)[String(number)];
  return {
    rat,
    number,
    name: rat === "NR" ? `n${number}` : `B${number}`,
    label: rat === "NR" ? `NR5G BAND ${number}` : `LTE BAND ${number}`,
    frequency: entry?.[0] ?? null,
    duplex: entry?.[1] ?? null,
  };
};

const lookupRange = (ranges: readonly (readonly number[])[], channel: number | null) => {
  if (channel === null) {
    return null;
  }
  for (const [low, high, band] of ranges) {
    if (channel >= low && channel <= high) {
      return band;
    }
  }
  return null;
};

export const guessLteBand = (earfcn: number | null) => {
  const band = lookupRange(EARFCN_RANGES, earfcn);
  return band === null ? null : `B${band}`;
};

export const guessNrBand = (nrarfcn: number | null) => {
  const band = lookupRange(NRARFCN_RANGES, nrarfcn);
  return band === null ? null : `n${band}`;
};
