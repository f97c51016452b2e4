import type {
  BandPreferenceState,
  ControlActionName,
  NetworkModeState,
  RoamingState,
} from "@cellgate/shared";
import {
  BAND_PREFERENCE_READ_BACK,
  NETWORK_MODE_READ_BACK,
  ROAMING_READ_BACK,
  type ReadBackSpec,
} from "./read-back";
import {
  bandList,
  modeToken,
  oneOf,
  optionalBoolean,
  optionalInteger,
  quotedText,
  readBody,
  readObject,
  requireBoolean,
  type Body,
} from "./validation";

export type ControlState = RoamingState | NetworkModeState | BandPreferenceState;

type ActionSpec<P> = {
  name: ControlActionName;
  dangerous: boolean;
  parse: (body: Body) => P;
  plan: (params: P) => string[];
  readBack?: ReadBackSpec<ControlState>;
  notes?: (params: P) => Record<string, string>;
};

export type PreparedAction = {
  plan: string[];
  notes: Record<string, string>;
};

export type ControlAction = {
  name: ControlActionName;
  dangerous: boolean;
  readBack: ReadBackSpec<ControlState> | null;
  /** Validates the body and builds the full command plan; throws ValidationError. */
  prepare: (body: unknown) => PreparedAction;
};

const defineAction = <P>(spec: ActionSpec<P>): ControlAction => ({
  name: spec.name,
  dangerous: spec.dangerous,
  readBack: spec.readBack ?? null,
  prepare: (body) => {
    const params = spec.parse(readBody(body));
    return { plan: spec.plan(params), notes: spec.notes ? spec.notes(params) : {} };
  },
});

const flag = (value: boolean) => (value ? 1 : 0);

const REBOOT_MODES = ["soft", "full", "rf_off"] as const;

const REBOOT_PLANS: Record<(typeof REBOOT_MODES)[number], string[]> = {
  soft: ["AT+CFUN=1,1"],
  full: ["AT+CFUN=4", "AT+CFUN=1,1"],
  rf_off: ["AT+CFUN=4"],
};

const USBNET_MODES = ["ecm", "rndis", "ncm", "mbim", "auto"] as const;

// mbim shares the ncm composition; auto falls back to ecm.
const USBNET_VALUES: Record<(typeof USBNET_MODES)[number], number> = {
  ecm: 0,
  rndis: 1,
  ncm: 2,
  mbim: 2,
  auto: 0,
};

const PDP_TYPES = ["IP", "IPV6", "IPV4V6"] as const;

const AUTH_TYPES = ["none", "pap", "chap"] as const;

const AUTH_VALUES: Record<(typeof AUTH_TYPES)[number], number> = { none: 0, pap: 1, chap: 2 };

const LOCK_RATS = ["lte", "nr5g", "nr", "5g", "LTE", "NR5G", "NR", "5G"] as const;

const lockRatOf = (rat: (typeof LOCK_RATS)[number]) => (rat.toLowerCase() === "lte" ? "LTE" : "NR5G");

const BAND_RATS = ["LTE", "NR5G", "BOTH"] as const;

const bandLockCommand = (rat: "LTE" | "NR5G", bands: readonly number[]) =>
  `AT+QCFG="band","${rat}","${bands.join(",")}"`;

const BAND_RESET = {
  LTE: 'AT+QCFG="lte/band","0"',
  NR5G: 'AT+QCFG="nr5g/band","0"',
} as const;

const ROAM_PREF_ANY = 255;
const ROAM_PREF_HOME_ONLY = 1;

const preferenceList = (name: string, bands: readonly number[] | undefined) =>
  bands && bands.length > 0 ? [`AT+QNWPREFCFG="${name}",${bands.join(":")}`] : [];

const reboot = defineAction({
  name: "reboot",
  dangerous: true,
  parse: (body) => ({ mode: oneOf(body, "mode", REBOOT_MODES, "soft") }),
  plan: ({ mode }) => [...REBOOT_PLANS[mode]],
});

const usbnet = defineAction({
  name: "usbnet",
  dangerous: true,
  parse: (body) => ({
    mode: oneOf(body, "mode", USBNET_MODES),
    rebootModem: optionalBoolean(body, "reboot_modem") ?? false,
  }),
  plan: ({ mode, rebootModem }) => [
    `AT+QCFG="usbnet",${USBNET_VALUES[mode]}`,
    ...(rebootModem ? ["AT+CFUN=1,1"] : []),
  ],
});

const apn = defineAction({
  name: "apn",
  dangerous: true,
  parse: (body) => {
    const auth = readObject(body, "auth") ?? {};
    return {
      cid: optionalInteger(body, "cid", 1) ?? 1,
      apn: quotedText(body, "apn", { required: true }) ?? "",
      pdpType: oneOf(body, "pdp_type", PDP_TYPES, "IPV4V6"),
      authType: oneOf(auth, "type", AUTH_TYPES, "none"),
      user: quotedText(auth, "user"),
      password: quotedText(auth, "password"),
      activate: optionalBoolean(body, "activate") ?? true,
    };
  },
  plan: (params) => {
    const cmds = [`AT+CGDCONT=${params.cid},"${params.pdpType}","${params.apn}"`];
    if (params.authType !== "none" && params.user && params.password) {
      cmds.push(
        `AT+CGAUTH=${params.cid},${AUTH_VALUES[params.authType]},"${params.user}","${params.password}"`
      );
    }
    if (params.activate) {
      cmds.push(`AT+CGACT=1,${params.cid}`);
    }
    return cmds;
  },
});

const roaming = defineAction({
  name: "roaming",
  dangerous: false,
  parse: (body) => ({ enable: requireBoolean(body, "enable") }),
  plan: ({ enable }) => [
    `AT+QNWPREFCFG="roam_pref",${enable ? ROAM_PREF_ANY : ROAM_PREF_HOME_ONLY}`,
  ],
  readBack: ROAMING_READ_BACK,
});

const band = defineAction({
  name: "band",
  dangerous: true,
  parse: (body) => ({
    rat: oneOf(body, "rat", BAND_RATS, "BOTH"),
    lteBands: bandList(body, "lte_bands") ?? [],
    nrBands: bandList(body, "nr_bands") ?? [],
    reset: optionalBoolean(body, "reset") ?? false,
  }),
  plan: ({ rat, lteBands, nrBands, reset }) => {
    const lte = rat === "LTE" || rat === "BOTH";
    const nr = rat === "NR5G" || rat === "BOTH";
    if (reset) {
      return [...(lte ? [BAND_RESET.LTE] : []), ...(nr ? [BAND_RESET.NR5G] : [])];
    }
    const cmds: string[] = [];
    if (lte && lteBands.length > 0) cmds.push(bandLockCommand("LTE", lteBands));
    if (nr && nrBands.length > 0) cmds.push(bandLockCommand("NR5G", nrBands));
    return cmds;
  },
});

const cellLock = defineAction({
  name: "cell_lock",
  dangerous: true,
  parse: (body) => {
    const enable = requireBoolean(body, "enable");
    const ratValue = body.rat;
    return {
      enable,
      rat: ratValue === undefined || ratValue === null ? null : oneOf(body, "rat", LOCK_RATS),
      cellFields: ["pci", "tac", "cell_id"].filter(
        (name) => optionalInteger(body, name) !== undefined
      ),
    };
  },
  plan: ({ enable, rat }) => {
    if (!enable) {
      return ["AT+QNWLOCK=0"];
    }
    return rat === null ? [] : [`AT+QNWLOCK=1,"${lockRatOf(rat)}"`];
  },
  notes: ({ enable, cellFields }): Record<string, string> =>
    enable && cellFields.length > 0
      ? { note: `${cellFields.join(", ")} not applied: the lock is per RAT only.` }
      : {},
});

const ca = defineAction({
  name: "ca",
  dangerous: false,
  parse: (body) => ({
    lte: optionalBoolean(body, "lte_ca_enable"),
    nr: optionalBoolean(body, "nr_ca_enable"),
  }),
  plan: ({ lte, nr }) => {
    const cmds: string[] = [];
    if (lte !== undefined) cmds.push(`AT+QCFG="lte/ca",${flag(lte)}`);
    if (nr !== undefined) cmds.push(`AT+QCFG="nr5g/ca",${flag(nr)}`);
    // With one flag (or none) the global switch follows it; none at all means enable.
    if (lte === undefined || nr === undefined) {
      cmds.push(`AT+QCFG="ca",${flag(lte ?? nr ?? true)}`);
    }
    return cmds;
  },
  notes: () => ({
    classification_note:
      "Carrier aggregation is classified safe here; product documentation disagrees on whether it is dangerous.",
  }),
});

const gnss = defineAction({
  name: "gnss",
  dangerous: false,
  parse: (body) => ({ enable: requireBoolean(body, "enable"), mode: modeToken(body, "mode") }),
  plan: ({ enable, mode }) => [`AT+QCFG="gnss",${mode ?? '"all"'},${flag(enable)}`],
});

const networkMode = defineAction({
  name: "network_mode",
  dangerous: false,
  parse: (body) => ({ modePref: modeToken(body, "mode_pref") }),
  plan: ({ modePref }) => (modePref === undefined ? [] : [`AT+QNWPREFCFG="mode_pref",${modePref}`]),
  readBack: NETWORK_MODE_READ_BACK,
});

const bandPreference = defineAction({
  name: "band_preference",
  dangerous: false,
  parse: (body) => ({
    lte: bandList(body, "lte_bands"),
    nsa: bandList(body, "nsa_nr5g_bands"),
    sa: bandList(body, "nr5g_bands"),
  }),
  plan: ({ lte, nsa, sa }) => [
    ...preferenceList("lte_band", lte),
    ...preferenceList("nsa_nr5g_band", nsa),
    ...preferenceList("nr5g_band", sa),
  ],
  readBack: BAND_PREFERENCE_READ_BACK,
});

const resetProfile = defineAction({
  name: "reset_profile",
  dangerous: true,
  parse: (body) => ({ profile: oneOf(body, "profile", ["modem_safe"] as const, "modem_safe") }),
  plan: () => [
    BAND_RESET.LTE,
    BAND_RESET.NR5G,
    "AT+QNWLOCK=0",
    'AT+QCFG="lte/ca",1',
    'AT+QCFG="nr5g/ca",1',
    `AT+QNWPREFCFG="roam_pref",${ROAM_PREF_ANY}`,
    `AT+QCFG="usbnet",${USBNET_VALUES.rndis}`,
  ],
});

export const CONTROL_ACTIONS: Record<ControlActionName, ControlAction> = {
  reboot,
  usbnet,
  apn,
  roaming,
  band,
  cell_lock: cellLock,
  ca,
  gnss,
  network_mode: networkMode,
  band_preference: bandPreference,
  reset_profile: resetProfile,
};

const isActionName = (name: string): name is ControlActionName =>
  Object.prototype.hasOwnProperty.call(CONTROL_ACTIONS, name);

export const findControlAction = (name: string) =>
  isActionName(name) ? CONTROL_ACTIONS[name] : null;
