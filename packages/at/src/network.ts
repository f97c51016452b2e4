import type { AccessMode, Duplex, OperatorInfo, ServingCell } from "@cellgate/shared";
import { firstLineWithPrefix, splitFields, toInt, toText } from "./fields";

type NetworkInfo = {
  technology: string | null;
  operatorCode: string | null;
  band: string | null;
  channel: number | null;
};

export const duplexOf = (value: string | null | undefined): Duplex | null => {
  if (!value) {
    return null;
  }
  const upper = value.toUpperCase();
  if (upper.includes("TDD")) {
    return "TDD";
  }
  if (upper.includes("FDD")) {
    return "FDD";
  }
  return null;
};

/** `+QNWINFO: "FDD LTE","46001","LTE BAND 3",1650` */
export const decodeNetworkInfo = (lines: readonly string[] | undefined): NetworkInfo | null => {
  const line = firstLineWithPrefix(lines, "+QNWINFO:");
  if (!line) {
    return null;
  }
  const [technology, operatorCode, band, channel] = splitFields(line);
  if (technology === undefined) {
    throw new Error(`Unreadable network info: ${line}`);
  }
  return {
    technology: toText(technology),
    operatorCode: toText(operatorCode),
    band: toText(band),
    channel: toInt(channel),
  };
};

const splitOperatorCode = (code: string | null) => {
  if (!code || !/^\d{5,6}$/.test(code)) {
    return { mcc: null, mnc: null };
  }
  return { mcc: code.slice(0, 3), mnc: code.slice(3) };
};

/** `+COPS: 0,0,"CHINA MOBILE",13` */
export const decodeOperatorName = (lines: readonly string[] | undefined) => {
  const line = firstLineWithPrefix(lines, "+COPS:");
  if (!line) {
    return null;
  }
  const fields = splitFields(line);
  return fields.length >= 3 ? toText(fields[2]) : null;
};

export const decodeOperator = (replies: {
  cops?: readonly string[];
  qnwinfo?: readonly string[];
}): OperatorInfo | null => {
  const name = decodeOperatorName(replies.cops);
  const network = decodeNetworkInfo(replies.qnwinfo);
  if (name === null && network === null) {
    return null;
  }
  return {
    name,
    ...splitOperatorCode(network?.operatorCode ?? null),
    band: network?.band ?? null,
    channel: network?.channel ?? null,
  };
};

const ratOfTechnology = (technology: string | null) => {
  if (!technology) {
    return null;
  }
  const upper = technology.toUpperCase();
  if (upper.includes("NR5G") || upper.includes("NR")) {
    return "SA";
  }
  if (upper.includes("LTE")) {
    return "LTE";
  }
  if (/WCDMA|HSPA|UMTS|HSDPA|HSUPA/.test(upper)) {
    return "WCDMA";
  }
  if (/GSM|EDGE|GPRS/.test(upper)) {
    return "GSM";
  }
  if (upper.includes("NO SERVICE")) {
    return "NONE";
  }
  return technology;
};

const RAT_OF_SERVING: Record<ServingCell["rat"], string> = {
  LTE: "LTE",
  "NR5G-SA": "SA",
  "NR5G-NSA": "NSA",
};

const duplexOfServing = (serving: ServingCell | null): Duplex | null => {
  if (!serving) {
    return null;
  }
  if (serving.rat === "NR5G-NSA") {
    return serving.lte?.duplex ?? null;
  }
  return serving.duplex;
};

/** The serving-cell tag takes precedence over the QNWINFO access technology. */
export const decodeMode = (
  qnwinfo: readonly string[] | undefined,
  serving: ServingCell | null
): AccessMode | null => {
  const network = decodeNetworkInfo(qnwinfo);
  if (network === null && serving === null) {
    return null;
  }
  const technology = network?.technology ?? null;
  return {
    rat: serving ? RAT_OF_SERVING[serving.rat] : ratOfTechnology(technology),
    duplex: duplexOfServing(serving) ?? duplexOf(technology),
    technology,
  };
};
