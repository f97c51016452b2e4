import type { BandRat, ServingCell, SignalBlock, SignalInfo, SignalQuality } from "@cellgate/shared";
import { linesWithPrefix, splitFields, toMeasurement, toText } from "./fields";

const SINR_BOOST: Record<BandRat, number> = { LTE: 20, NR: 15 };

const bucketRsrp = (rsrp: number): SignalQuality => {
  if (rsrp >= -80) return "excellent";
  if (rsrp >= -90) return "good";
  if (rsrp >= -100) return "fair";
  return "poor";
};

/**
 * RSRP sets the bucket; a strong SINR lifts good/fair to excellent and a negative SINR
 * drops good/excellent to fair. Without RSRP the bucket starts at fair.
 */
export const rateQuality = (
  rat: BandRat,
  rsrp: number | null,
  sinr: number | null
): SignalQuality | null => {
  if (rsrp === null && sinr === null) {
    return null;
  }
  let quality: SignalQuality = rsrp === null ? "fair" : bucketRsrp(rsrp);
  if (sinr !== null) {
    if (sinr >= SINR_BOOST[rat] && (quality === "good" || quality === "fair")) {
      quality = "excellent";
    } else if (sinr < 0 && (quality === "good" || quality === "excellent")) {
      quality = "fair";
    }
  }
  return quality;
};

export const signalBlock = (
  rat: BandRat,
  rsrp: number | null,
  rsrq: number | null,
  sinr: number | null
): SignalBlock => ({ rsrp, rsrq, sinr, quality: rateQuality(rat, rsrp, sinr) });

type PathReading = {
  value: number | null;
  sysmode: string | null;
};

/** `+QRSRP: <prx>,<drx>,<rx2>,<rx3>,<sysmode>`, one line per active RAT. */
const decodePathReadings = (lines: readonly string[] | undefined, prefix: string): PathReading[] =>
  linesWithPrefix(lines, prefix).map((line) => {
    const fields = splitFields(line);
    const last = fields[fields.length - 1];
    const hasSysmode = fields.length > 1 && toText(last) !== null && !/^[-+]?\d+$/.test(last);
    const paths = hasSysmode ? fields.slice(0, -1) : fields;
    const value = paths.map((field) => toMeasurement(field)).find((entry) => entry !== null) ?? null;
    return { value, sysmode: hasSysmode ? toText(last) : null };
  });

const ratOfSysmode = (sysmode: string | null): BandRat | null => {
  if (!sysmode) return null;
  if (/NR/i.test(sysmode)) return "NR";
  if (/LTE/i.test(sysmode)) return "LTE";
  return null;
};

const readingFor = (readings: PathReading[], rat: BandRat) =>
  readings.find((reading) => ratOfSysmode(reading.sysmode) === rat)?.value ?? null;

const servingBlocks = (serving: ServingCell | null) => {
  if (!serving) {
    return { lte: null, nr: null };
  }
  switch (serving.rat) {
    case "LTE":
      return { lte: serving.signal, nr: null };
    case "NR5G-SA":
      return { lte: null, nr: serving.signal };
    case "NR5G-NSA":
      return { lte: serving.lte?.signal ?? null, nr: serving.nr?.signal ?? null };
  }
};

const blockFromReadings = (
  rat: BandRat,
  rsrp: PathReading[],
  rsrq: PathReading[],
  sinr: PathReading[]
): SignalBlock | null => {
  const block = signalBlock(rat, readingFor(rsrp, rat), readingFor(rsrq, rat), readingFor(sinr, rat));
  return block.rsrp === null && block.rsrq === null && block.sinr === null ? null : block;
};

export const decodeSignal = (
  replies: { qrsrp?: readonly string[]; qrsrq?: readonly string[]; qsinr?: readonly string[] },
  serving: ServingCell | null
): SignalInfo | null => {
  const rsrp = decodePathReadings(replies.qrsrp, "+QRSRP:");
  const rsrq = decodePathReadings(replies.qrsrq, "+QRSRQ:");
  const sinr = decodePathReadings(replies.qsinr, "+QSINR:");
  const fromServing = servingBlocks(serving);
  const lte = fromServing.lte ?? blockFromReadings("LTE", rsrp, rsrq, sinr);
  const nr = fromServing.nr ?? blockFromReadings("NR", rsrp, rsrq, sinr);
  const info: SignalInfo = {
    rsrp: rsrp[0]?.value ?? null,
    rsrq: rsrq[0]?.value ?? null,
    sinr: sinr[0]?.value ?? null,
    sysmode: rsrp[0]?.sysmode ?? rsrq[0]?.sysmode ?? sinr[0]?.sysmode ?? null,
    lte,
    nr,
  };
  if (info.rsrp === null && info.rsrq === null && info.sinr === null && !lte && !nr) {
    return null;
  }
  return info;
};
