import { describe, expect, it } from "vitest";
import { ValidationError } from "../../errors/app-error";
import { ProtocolError, TransportError } from "../../errors/transport";
import type { CommandExchange } from "../../serial/transport";
import { findControlAction } from "./actions";
import { createControlPlanner } from "./planner";

const FIXED_NOW = new Date("2026-03-01T08:00:00.000Z");

/** Keeps roam_pref/mode_pref in memory and answers like the modem does. */
const createModem = () => {
  const prefs: Record<string, string> = { roam_pref: "1", mode_pref: "AUTO" };
  const modem = {
    sent: [] as string[],
    rejects: new Set<string>(),
    unreachable: new Set<string>(),
  };

  const exchange = async (command: string): Promise<CommandExchange> => {
    modem.sent.push(command);
    if (modem.unreachable.has(command)) {
      throw new TransportError("timeout", `${command} timed out after 1200ms (no reply).`, { command });
    }
    const base = { command, deadlineMs: 1200, durationMs: 3 };
    if (modem.rejects.has(command)) {
      return { ...base, lines: [command, "+CME ERROR: 3"], outcome: "protocol_error", error: "+CME ERROR: 3" };
    }
    const match = command.match(/^AT\+QNWPREFCFG="(\w+)"(?:,(.+))?$/);
    if (match && match[2] === undefined) {
      const value = prefs[match[1]];
      const lines = value === undefined ? [command, "OK"] : [command, `+QNWPREFCFG: "${match[1]}",${value}`, "OK"];
      return { ...base, lines, outcome: "ok", error: null };
    }
    if (match && match[2] !== undefined) {
      prefs[match[1]] = match[2];
    }
    return { ...base, lines: [command, "OK"], outcome: "ok", error: null };
  };

  const send = async (command: string) => {
    const result = await exchange(command);
    if (result.outcome === "protocol_error") {
      throw new ProtocolError(command, result.error ?? "ERROR", result.lines);
    }
    return result.lines;
  };

  return { modem, transport: { exchange, send } };
};

const gates = (enabled: boolean, allowDangerous: boolean) => ({
  enabled: () => enabled,
  allowDangerous: () => allowDangerous,
});

const setup = (options: { enabled?: boolean; allowDangerous?: boolean } = {}) => {
  const { modem, transport } = createModem();
  const planner = createControlPlanner({
    transport,
    gates: gates(options.enabled ?? true, options.allowDangerous ?? false),
    now: () => FIXED_NOW,
  });
  return { modem, planner };
};

describe("control planner", () => {
  it("enables roaming and confirms it with a read-back", async () => {
    const { modem, planner } = setup();

    const response = await planner.run("roaming", { enable: true });

    expect(response.ok).toBe(true);
    expect(response.timestamp).toBe("2026-03-01T08:00:00.000Z");
    expect(response.detail.executed).toBe(true);
    expect(response.detail.dry_run).toBe(false);
    expect(response.detail.planned).toEqual(['AT+QNWPREFCFG="roam_pref",255']);
    expect(response.detail.extra?.state).toEqual({ enabled: true });
    expect(modem.sent).toEqual(['AT+QNWPREFCFG="roam_pref",255', 'AT+QNWPREFCFG="roam_pref"']);
  });

  it("previews a dual-flag carrier aggregation request without sending", async () => {
    const { modem, planner } = setup();

    const response = await planner.run("ca", { lte_ca_enable: true, nr_ca_enable: true, dry_run: true });

    expect(response.ok).toBe(true);
    expect(response.detail.planned).toEqual(['AT+QCFG="lte/ca",1', 'AT+QCFG="nr5g/ca",1']);
    expect(response.detail.executed).toBe(false);
    expect(response.detail.dry_run).toBe(true);
    expect(response.detail.blocked_reason).toBeNull();
    expect(response.detail.extra?.classification_note).toEqual(expect.stringContaining("disagrees"));
    expect(modem.sent).toEqual([]);
  });

  it("falls back to the global carrier aggregation switch when no flag is given", async () => {
    const { planner } = setup();

    const response = await planner.run("ca", { dry_run: true });

    expect(response.detail.planned).toEqual(['AT+QCFG="ca",1']);
  });

  it("follows a single carrier aggregation flag with the global switch", async () => {
    const { planner } = setup();

    const response = await planner.run("ca", { nr_ca_enable: false, dry_run: true });

    expect(response.detail.planned).toEqual(['AT+QCFG="nr5g/ca",0', 'AT+QCFG="ca",0']);
  });

  it.each([true, false])("blocks dangerous actions when not allowed (dry_run=%s)", async (dryRun) => {
    const { modem, planner } = setup({ allowDangerous: false });

    const response = await planner.run("reboot", { mode: "full", dry_run: dryRun });

    expect(response.ok).toBe(true);
    expect(response.detail).toEqual({
      dry_run: true,
      dangerous: true,
      executed: false,
      blocked_reason: "dangerous-blocked",
      planned: ["AT+CFUN=4", "AT+CFUN=1,1"],
      errors: [],
      extra: null,
    });
    expect(modem.sent).toEqual([]);
  });

  it("reports disabled before any other gate", async () => {
    const { modem, planner } = setup({ enabled: false, allowDangerous: true });

    const response = await planner.run("roaming", { enable: false });

    expect(response.detail.blocked_reason).toBe("disabled");
    expect(response.detail.executed).toBe(false);
    expect(response.detail.planned).toEqual(['AT+QNWPREFCFG="roam_pref",1']);
    expect(modem.sent).toEqual([]);
  });

  it("returns an empty plan as a preview without touching the modem", async () => {
    const { modem, planner } = setup();

    const response = await planner.run("network_mode", {});

    expect(response.ok).toBe(true);
    expect(response.detail.planned).toEqual([]);
    expect(response.detail.blocked_reason).toBeNull();
    expect(response.detail.dry_run).toBe(true);
    expect(modem.sent).toEqual([]);
  });

  it("stops at the first rejected command", async () => {
    const { modem, planner } = setup({ allowDangerous: true });
    modem.rejects.add('AT+CGAUTH=2,2,"user","test-secret"');

    const response = await planner.run("apn", {
      cid: 2,
      apn: "internet",
      auth: { type: "chap", user: "user", password: "test-secret" },
    });

    expect(response.ok).toBe(false);
    expect(response.error).toBe("ctrl apn aborted: command rejected by modem");
    expect(response.detail.executed).toBe(false);
    expect(response.detail.errors).toEqual(['AT+CGAUTH=2,2,"user","test-secret" failed: +CME ERROR: 3']);
    expect(modem.sent).toEqual(['AT+CGDCONT=2,"IPV4V6","internet"', 'AT+CGAUTH=2,2,"user","test-secret"']);
  });

  it("surfaces transport failures as action errors", async () => {
    const { modem, planner } = setup();
    modem.unreachable.add('AT+QCFG="gnss","all",1');

    const response = await planner.run("gnss", { enable: true });

    expect(response.ok).toBe(false);
    expect(response.error).toBe("ctrl gnss aborted: transport failure");
    expect(response.detail.errors).toEqual([
      'AT+QCFG="gnss","all",1: AT+QCFG="gnss","all",1 timed out after 1200ms (no reply).',
    ]);
  });

  it("writes the network mode and reads it back", async () => {
    const { planner } = setup();

    const response = await planner.run("network_mode", { mode_pref: "LTE:NR5G" });

    expect(response.detail.planned).toEqual(['AT+QNWPREFCFG="mode_pref",LTE:NR5G']);
    expect(response.detail.extra?.state).toEqual({ mode_pref: "LTE:NR5G" });
  });

  it("rejects an APN with quotes before planning", async () => {
    const { modem, planner } = setup({ allowDangerous: true });

    await expect(planner.run("apn", { apn: 'bad"apn' })).rejects.toThrow(ValidationError);
    expect(modem.sent).toEqual([]);
  });
});

describe("control action table", () => {
  const plan = (name: string, body: unknown) => findControlAction(name)?.prepare(body).plan;

  it("maps usb network modes", () => {
    expect(plan("usbnet", { mode: "mbim", reboot_modem: true })).toEqual([
      'AT+QCFG="usbnet",2',
      "AT+CFUN=1,1",
    ]);
    expect(() => plan("usbnet", { mode: "ppp" })).toThrow(ValidationError);
  });

  it("locks bands per RAT and resets them", () => {
    expect(plan("band", { rat: "BOTH", lte_bands: [1, "3"], nr_bands: [78] })).toEqual([
      'AT+QCFG="band","LTE","1,3"',
      'AT+QCFG="band","NR5G","78"',
    ]);
    expect(plan("band", { rat: "NR5G", reset: true })).toEqual(['AT+QCFG="nr5g/band","0"']);
    expect(() => plan("band", { lte_bands: [0] })).toThrow(ValidationError);
  });

  it("rejects band numbers outside the assignable range", () => {
    expect(() => plan("band", { lte_bands: [1e20] })).toThrow(
      "Invalid lte_bands: 100000000000000000000 is not a band number."
    );
    expect(() => plan("band", { nr_bands: ["99999999999999999999"] })).toThrow(ValidationError);
    expect(() => plan("band_preference", { nr5g_bands: [1025] })).toThrow(ValidationError);
    expect(plan("band_preference", { nr5g_bands: [1024, "261"] })).toEqual([
      'AT+QNWPREFCFG="nr5g_band",1024:261',
    ]);
  });

  it("joins band preferences with colons and skips empty lists", () => {
    expect(plan("band_preference", { lte_bands: [3, 7], nsa_nr5g_bands: [], nr5g_bands: [78] })).toEqual([
      'AT+QNWPREFCFG="lte_band",3:7',
      'AT+QNWPREFCFG="nr5g_band",78',
    ]);
  });

  it("locks and unlocks the cell RAT", () => {
    expect(plan("cell_lock", { enable: true, rat: "5g" })).toEqual(['AT+QNWLOCK=1,"NR5G"']);
    expect(plan("cell_lock", { enable: false })).toEqual(["AT+QNWLOCK=0"]);
  });

  it("restores the safe profile", () => {
    expect(plan("reset_profile", {})).toEqual([
      'AT+QCFG="lte/band","0"',
      'AT+QCFG="nr5g/band","0"',
      "AT+QNWLOCK=0",
      'AT+QCFG="lte/ca",1',
      'AT+QCFG="nr5g/ca",1',
      'AT+QNWPREFCFG="roam_pref",255',
      'AT+QCFG="usbnet",1',
    ]);
  });

  it("does not know unlisted actions", () => {
    expect(findControlAction("factory_reset")).toBeNull();
    expect(findControlAction("toString")).toBeNull();
  });
});
