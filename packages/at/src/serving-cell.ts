import type {
  CellIdentity,
  LteCellDetail,
  NrNsaLeg,
  NrSaServingCell,
  ServingCell,
  SignalBlock,
} from "@cellgate/shared";
import { describeBand } from "./bands";
import { linesWithPrefix, splitFields, toHexInt, toInt, toMeasurement, toText } from "./fields";
import { duplexOf } from "./network";
import { signalBlock } from "./signal";

const LTE_BANDWIDTH_MHZ: readonly number[] = [1.4, 3, 5, 10, 15, 20];
const NR_BANDWIDTH_MHZ: readonly number[] = [5, 10, 15, 20, 25, 30, 40, 50, 60, 70, 80, 90, 100, 200, 400];
const NR_SCS_KHZ: readonly number[] = [15, 30, 60, 120, 240];

const fromCodeTable = (table: readonly number[], value: string | undefined) => {
  const code = toInt(value);
  if (code === null || code < 0 || code >= table.length) {
    return null;
  }
  return table[code];
};

const splitCellId = (value: number | null) => {
  if (value === null) {
    return { node: null, local: null };
  }
  return { node: Math.floor(value / 256), local: value % 256 };
};

export const cellIdentity = (tacHex: string | undefined, cellIdHex: string | undefined): CellIdentity => {
  const tac = toHexInt(tacHex);
  const cellId = toHexInt(cellIdHex);
  const split = splitCellId(cellId);
  return {
    tac_hex: tac === null ? null : (tacHex ?? "").trim().toUpperCase(),
    tac,
    cell_id_hex: cellId === null ? null : (cellIdHex ?? "").trim().toUpperCase(),
    cell_id: cellId,
    node_id: split.node,
    local_cell_id: split.local,
  };
};

/** Reads the LTE field run that starts at the `"LTE"` tag. */
const lteDetail = (tokens: readonly string[], at: number): LteCellDetail & { signal: SignalBlock } => {
  const field = (offset: number) => tokens[at + offset];
  const rsrp = toMeasurement(field(11));
  const rsrq = toMeasurement(field(12));
  const sinr = toMeasurement(field(14));
  return {
    duplex: duplexOf(field(1)),
    mcc: toText(field(2)),
    mnc: toText(field(3)),
    identity: cellIdentity(field(10), field(4)),
    pci: toInt(field(5)),
    earfcn: toInt(field(6)),
    band: describeBand("LTE", toInt(field(7))),
    ul_bw_mhz: fromCodeTable(LTE_BANDWIDTH_MHZ, field(8)),
    dl_bw_mhz: fromCodeTable(LTE_BANDWIDTH_MHZ, field(9)),
    rsrp,
    rsrq,
    rssi: toMeasurement(field(13)),
    sinr,
    cqi: toMeasurement(field(15)),
    tx_power: toMeasurement(field(16)),
    srxlev: toMeasurement(field(17)),
    signal: signalBlock("LTE", rsrp, rsrq, sinr),
  };
};

const nrSa = (tokens: readonly string[], state: string | null): NrSaServingCell => {
  const rsrp = toMeasurement(tokens[12]);
  const rsrq = toMeasurement(tokens[13]);
  const sinr = toMeasurement(tokens[14]);
  return {
    rat: "NR5G-SA",
    state,
    duplex: duplexOf(tokens[3]),
    mcc: toText(tokens[4]),
    mnc: toText(tokens[5]),
    identity: cellIdentity(tokens[8], tokens[6]),
    pci: toInt(tokens[7]),
    nrarfcn: toInt(tokens[9]),
    band: describeBand("NR", toInt(tokens[10])),
    dl_bw_mhz: fromCodeTable(NR_BANDWIDTH_MHZ, tokens[11]),
    rsrp,
    rsrq,
    sinr,
    scs_khz: fromCodeTable(NR_SCS_KHZ, tokens[15]),
    srxlev: toMeasurement(tokens[16]),
    signal: signalBlock("NR", rsrp, rsrq, sinr),
  };
};

/** `+QENG: "NR5G-NSA",<mcc>,<mnc>,<pci>,<rsrp>,<sinr>,<rsrq>,<arfcn>,<band>,<dl_bw>,<scs>` */
const nrNsaLeg = (tokens: readonly string[]): NrNsaLeg => {
  const rsrp = toMeasurement(tokens[4]);
  const sinr = toMeasurement(tokens[5]);
  const rsrq = toMeasurement(tokens[6]);
  return {
    mcc: toText(tokens[1]),
    mnc: toText(tokens[2]),
    pci: toInt(tokens[3]),
    rsrp,
    sinr,
    rsrq,
    nrarfcn: toInt(tokens[7]),
    band: describeBand("NR", toInt(tokens[8])),
    dl_bw_mhz: fromCodeTable(NR_BANDWIDTH_MHZ, tokens[9]),
    scs_khz: fromCodeTable(NR_SCS_KHZ, tokens[10]),
    signal: signalBlock("NR", rsrp, rsrq, sinr),
  };
};

/**
 * Decodes `AT+QENG="servingcell"`. The record variant is chosen by the RAT tag:
 * SA and LTE arrive on the `servingcell` line, NSA as separate `"LTE"` and `"NR5G-NSA"` lines.
 */
export const decodeServingCell = (lines: readonly string[] | undefined): ServingCell | null => {
  const rows = linesWithPrefix(lines, "+QENG:").map(splitFields);
  const header = rows.find((tokens) => tokens[0]?.toLowerCase() === "servingcell");
  if (!header) {
    return null;
  }
  const state = toText(header[1]);
  const tag = header[2]?.toUpperCase();

  if (tag === "NR5G-SA") {
    return nrSa(header, state);
  }
  if (tag === "LTE") {
    const detail = lteDetail(header, 2);
    return { rat: "LTE", state, ...detail };
  }

  const lteRow = rows.find((tokens) => tokens[0]?.toUpperCase() === "LTE");
  const nrRow = rows.find((tokens) => tokens[0]?.toUpperCase() === "NR5G-NSA");
  if (!lteRow && !nrRow) {
    if (tag !== undefined && tag.length > 0) {
      throw new Error(`Unknown serving-cell tag: ${tag}`);
    }
    return null;
  }
  if (!nrRow && lteRow) {
    return { rat: "LTE", state, ...lteDetail(lteRow, 0) };
  }
  return {
    rat: "NR5G-NSA",
    state,
    lte: lteRow ? lteDetail(lteRow, 0) : null,
    nr: nrRow ? nrNsaLeg(nrRow) : null,
  };
};
