import type { PdpContext, SessionInfo } from "@cellgate/shared";
import { firstLineWithPrefix, linesWithPrefix, splitFields, toAddress, toInt, toText } from "./fields";
import { isolate, type FieldFailure } from "./isolate";

type PartialContext = Partial<Omit<PdpContext, "cid">>;

/** `+CGDCONT: <cid>,"<pdp_type>","<apn>",...` */
const decodeContextDefinitions = (lines: readonly string[] | undefined) => {
  const out = new Map<number, PartialContext>();
  for (const line of linesWithPrefix(lines, "+CGDCONT:")) {
    const [cid, type, apn] = splitFields(line);
    const id = toInt(cid);
    if (id === null) continue;
    out.set(id, { type: toText(type), apn: toText(apn) });
  }
  return out;
};

/** `+CGACT: <cid>,<state>` */
const decodeActivation = (lines: readonly string[] | undefined) => {
  const out = new Map<number, number>();
  for (const line of linesWithPrefix(lines, "+CGACT:")) {
    const [cid, state] = splitFields(line);
    const id = toInt(cid);
    const value = toInt(state);
    if (id === null || value === null) continue;
    out.set(id, value);
  }
  return out;
};

// IPv4 CGCONTRDP packs address and mask into one dotted 8-octet field.
const stripMask = (value: string | null) => {
  if (value === null) return null;
  const octets = value.split(".");
  if (octets.length === 8 && octets.every((octet) => /^\d+$/.test(octet))) {
    return octets.slice(0, 4).join(".");
  }
  return value;
};

/** `+CGCONTRDP: <cid>,<bearer>,<apn>,<addr_mask>,<gw>,<dns1>,<dns2>,...` */
const decodeDynamicParameters = (lines: readonly string[] | undefined) => {
  const out = new Map<number, PartialContext>();
  for (const line of linesWithPrefix(lines, "+CGCONTRDP:")) {
    const fields = splitFields(line);
    const id = toInt(fields[0]);
    if (id === null) continue;
    const entry: PartialContext = {};
    const apn = toText(fields[2]);
    if (apn !== null && apn.toUpperCase() !== "N/A") entry.apn = apn;
    const ip = stripMask(toAddress(fields[3]));
    if (ip !== null) entry.ip = ip;
    const dns1 = toAddress(fields[5]);
    if (dns1 !== null) entry.dns1 = dns1;
    const dns2 = toAddress(fields[6]);
    if (dns2 !== null) entry.dns2 = dns2;
    out.set(id, { ...out.get(id), ...entry });
  }
  return out;
};

/** `+QIDNSCFG: <cid>,"<dns1>","<dns2>"` or the older `"IP","<dns1>","<dns2>"`. */
const decodeDnsConfig = (lines: readonly string[] | undefined) => {
  const line = firstLineWithPrefix(lines, "+QIDNSCFG:");
  if (!line) {
    return { dns1: null, dns2: null };
  }
  const fields = splitFields(line);
  return { dns1: toAddress(fields[1]), dns2: toAddress(fields[2]) };
};

export const decodeSession = (
  replies: {
    cgdcont?: readonly string[];
    cgact?: readonly string[];
    cgcontrdp?: readonly string[];
    qidnscfg?: readonly string[];
  },
  failures: FieldFailure[] = []
): SessionInfo | null => {
  const definitions =
    isolate("session.cgdcont", () => decodeContextDefinitions(replies.cgdcont), failures) ??
    new Map<number, PartialContext>();
  const activation =
    isolate("session.cgact", () => decodeActivation(replies.cgact), failures) ?? new Map<number, number>();
  const dynamic =
    isolate("session.cgcontrdp", () => decodeDynamicParameters(replies.cgcontrdp), failures) ??
    new Map<number, PartialContext>();
  const dns = isolate("session.qidnscfg", () => decodeDnsConfig(replies.qidnscfg), failures) ?? {
    dns1: null,
    dns2: null,
  };

  const cids = [...new Set([...definitions.keys(), ...activation.keys(), ...dynamic.keys()])].sort(
    (a, b) => a - b
  );
  if (cids.length === 0) {
    return null;
  }
  const pdp = cids.map((cid): PdpContext => {
    const merged = { ...definitions.get(cid), ...dynamic.get(cid) };
    return {
      cid,
      type: merged.type ?? null,
      apn: merged.apn ?? null,
      state: activation.get(cid) ?? null,
      ip: merged.ip ?? null,
      dns1: merged.dns1 ?? dns.dns1,
      dns2: merged.dns2 ?? dns.dns2,
    };
  });
  const active = pdp.find((context) => context.state === 1);
  return { default_cid: active ? active.cid : null, pdp };
};
