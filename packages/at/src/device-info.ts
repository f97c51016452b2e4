import type { DeviceInfo, UsbSpeed } from "@cellgate/shared";
import { firstLineWithPrefix, splitFields, toInt, toText } from "./fields";
import { payloadLines } from "./framing";
import { isolate, type FieldFailure } from "./isolate";

export const DEVICE_INFO_QUERIES = {
  gmi: "AT+GMI",
  cgmm: "AT+CGMM",
  gmr: "AT+GMR",
  gsn: "AT+GSN",
  cimi: "AT+CIMI",
  iccid: "AT+ICCID",
  cnum: "AT+CNUM",
  qsimstat: "AT+QSIMSTAT?",
  usbspeed: 'AT+QCFG="usbspeed"',
} as const;

export type DeviceInfoQuery = keyof typeof DEVICE_INFO_QUERIES;

export type DeviceInfoReplies = Partial<Record<DeviceInfoQuery, readonly string[]>>;

const USB_SPEED_LABELS: Record<number, string> = {
  20: "USB 2.0 high speed, 480 Mbps",
  311: "USB 3.1 Gen1, 5 Gbps",
  312: "USB 3.1 Gen2, 10 Gbps",
};

/** First line that is neither echo, terminator nor blank; plain replies such as `AT+GSN` carry no tag. */
export const firstPayloadLine = (lines: readonly string[] | undefined) => {
  const line = payloadLines(lines ?? [])[0];
  return line === undefined ? null : toText(line);
};

export const decodeIccid = (lines: readonly string[] | undefined) => {
  const line = firstLineWithPrefix(lines, "+ICCID:");
  if (!line) {
    return null;
  }
  const value = splitFields(line)[0] ?? "";
  return /^[0-9A-Fa-f]+$/.test(value) ? value : null;
};

/**
 * Own number from `+CNUM`. Accepted shapes:
 * `"alpha","+number",145`, `,"+number",145` and `"+number",145`.
 */
export const decodeMsisdn = (lines: readonly string[] | undefined) => {
  const line = firstLineWithPrefix(lines, "+CNUM:");
  if (!line) {
    return null;
  }
  const fields = splitFields(line);
  if (fields.length >= 3) {
    return toText(fields[1]);
  }
  if (fields.length === 2 && toInt(fields[1]) !== null) {
    return toText(fields[0]);
  }
  return null;
};

/** `+QSIMSTAT: <enable>,<inserted>` */
export const decodeSimStatus = (lines: readonly string[] | undefined) => {
  const line = firstLineWithPrefix(lines, "+QSIMSTAT:");
  if (!line) {
    return { enabled: null, inserted: null };
  }
  const [enable, inserted] = splitFields(line).map(toInt);
  if (enable === undefined || enable === null || inserted === undefined || inserted === null) {
    throw new Error(`Unreadable SIM status: ${line}`);
  }
  return { enabled: enable === 1, inserted: inserted === 1 };
};

/** `+QCFG: "usbspeed","312"` */
export const decodeUsbSpeed = (lines: readonly string[] | undefined): UsbSpeed | null => {
  const line = firstLineWithPrefix(lines, "+QCFG:");
  if (!line) {
    return null;
  }
  const [name, value] = splitFields(line);
  if (name?.toLowerCase() !== "usbspeed") {
    return null;
  }
  const code = toInt(value);
  if (code === null) {
    return null;
  }
  return { code, label: USB_SPEED_LABELS[code] ?? null };
};

export const decodeDeviceInfo = (
  replies: DeviceInfoReplies,
  failures: FieldFailure[] = []
): DeviceInfo => {
  const simStatus = isolate("sim_status", () => decodeSimStatus(replies.qsimstat), failures);
  return {
    info: {
      manufacturer: isolate("manufacturer", () => firstPayloadLine(replies.gmi), failures),
      model: isolate("model", () => firstPayloadLine(replies.cgmm), failures),
      revision: isolate("revision", () => firstPayloadLine(replies.gmr), failures),
      imei: isolate("imei", () => firstPayloadLine(replies.gsn), failures),
    },
    sim: {
      imsi: isolate("imsi", () => firstPayloadLine(replies.cimi), failures),
      iccid: isolate("iccid", () => decodeIccid(replies.iccid), failures),
      msisdn: isolate("msisdn", () => decodeMsisdn(replies.cnum), failures),
      enabled: simStatus?.enabled ?? null,
      inserted: simStatus?.inserted ?? null,
    },
    modem: { usb: isolate("usb", () => decodeUsbSpeed(replies.usbspeed), failures) },
  };
};
