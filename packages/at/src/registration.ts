import type { RegistrationInfo, RegistrationState, RegistrationStatus } from "@cellgate/shared";
import { firstLineWithPrefix, splitFields, toInt } from "./fields";
import { isolate, type FieldFailure } from "./isolate";

const REGISTRATION_CODES: Record<number, { state: RegistrationState; text: string }> = {
  0: { state: "not_registered", text: "not registered, not searching" },
  1: { state: "registered_home", text: "registered (home)" },
  2: { state: "searching", text: "searching" },
  3: { state: "denied", text: "registration denied" },
  4: { state: "unknown", text: "unknown" },
  5: { state: "registered_roaming", text: "registered (roaming)" },
  6: { state: "sms_only", text: "registered for SMS only" },
  7: { state: "csfb_or_sms_only", text: "registered for CSFB or SMS only" },
  8: { state: "emergency_only", text: "attached for emergency only" },
  9: { state: "csfb_not_preferred", text: "registered (CSFB not preferred)" },
  10: { state: "home_emergency_only", text: "registered (home, emergency only)" },
};

export const describeRegistration = (code: number): RegistrationStatus => {
  const known = REGISTRATION_CODES[code];
  if (!known) {
    return { code, state: "other", text: `stat=${code}` };
  }
  return { code, ...known };
};

/**
 * `+CEREG: <n>,<stat>[,...]`. A lone field is the unsolicited `<stat>` form.
 */
export const decodeRegistrationReply = (
  lines: readonly string[] | undefined,
  prefix: "+CREG" | "+CGREG" | "+CEREG" | "+C5GREG"
): RegistrationStatus | null => {
  const line = firstLineWithPrefix(lines, `${prefix}:`);
  if (!line) {
    return null;
  }
  const fields = splitFields(line);
  const code = toInt(fields.length >= 2 ? fields[1] : fields[0]);
  if (code === null) {
    throw new Error(`Unreadable registration reply: ${line}`);
  }
  return describeRegistration(code);
};

/** Each domain is decoded on its own, so one unreadable reply leaves only that domain null. */
export const decodeRegistration = (
  replies: {
    cgreg?: readonly string[];
    cereg?: readonly string[];
    c5greg?: readonly string[];
  },
  failures: FieldFailure[] = []
): RegistrationInfo | null => {
  const info: RegistrationInfo = {
    ps: isolate("registration.ps", () => decodeRegistrationReply(replies.cgreg, "+CGREG"), failures),
    eps: isolate("registration.eps", () => decodeRegistrationReply(replies.cereg, "+CEREG"), failures),
    nr5g: isolate("registration.nr5g", () => decodeRegistrationReply(replies.c5greg, "+C5GREG"), failures),
  };
  if (info.ps === null && info.eps === null && info.nr5g === null) {
    return null;
  }
  return info;
};
