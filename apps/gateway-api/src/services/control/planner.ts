import type {
  BlockedReason,
  ControlActionDetail,
  ControlActionName,
  ControlActionResponse,
} from "@cellgate/shared";
import type { ControlGates } from "../../config/env";
import { ProtocolError, TransportError } from "../../errors/transport";
import type { AtTransport } from "../../serial/transport";
import { CONTROL_ACTIONS, type ControlAction } from "./actions";
import { runReadBack } from "./read-back";
import { readBody, readDryRun } from "./validation";

export type ControlPlanner = {
  run: (name: ControlActionName, body: unknown) => Promise<ControlActionResponse>;
};

type Gate = { execute: true } | { execute: false; blockedReason: BlockedReason | null };

const decideGate = (
  action: ControlAction,
  plan: readonly string[],
  dryRun: boolean,
  gates: ControlGates
): Gate => {
  if (!gates.enabled()) {
    return { execute: false, blockedReason: "disabled" };
  }
  if (plan.length === 0) {
    return { execute: false, blockedReason: null };
  }
  if (action.dangerous && !gates.allowDangerous()) {
    return { execute: false, blockedReason: "dangerous-blocked" };
  }
  if (dryRun) {
    return { execute: false, blockedReason: null };
  }
  return { execute: true };
};

export const createControlPlanner = (deps: {
  transport: Pick<AtTransport, "exchange" | "send">;
  gates: ControlGates;
  now?: () => Date;
}): ControlPlanner => {
  const now = deps.now ?? (() => new Date());

  const execute = async (action: ControlAction, plan: readonly string[]) => {
    const raw: Record<string, string[]> = {};
    for (const command of plan) {
      try {
        console.log(`[ctrl] ${action.name}: sending ${command}`);
        raw[command] = await deps.transport.send(command);
      } catch (error) {
        if (error instanceof ProtocolError) {
          raw[command] = error.lines;
          return { raw, failure: error.message, transportFailure: false };
        }
        if (error instanceof TransportError) {
          raw[command] = error.partial;
          return { raw, failure: `${command}: ${error.message}`, transportFailure: true };
        }
        throw error;
      }
    }
    return { raw, failure: null, transportFailure: false };
  };

  const confirm = async (action: ControlAction) => {
    if (!action.readBack) {
      return {};
    }
    try {
      const result = await runReadBack(deps.transport, action.readBack);
      return result.error === null
        ? { state: result.state, read_back_raw: result.raw }
        : { state: result.state, read_back_raw: result.raw, read_back_error: result.error };
    } catch (error) {
      if (!(error instanceof TransportError)) {
        throw error;
      }
      console.warn(`[ctrl] ${action.name}: read-back failed: ${error.message}`);
      return { state: null, read_back_error: error.message };
    }
  };

  const run = async (name: ControlActionName, body: unknown): Promise<ControlActionResponse> => {
    const action = CONTROL_ACTIONS[name];
    const { plan, notes } = action.prepare(body);
    const dryRun = readDryRun(readBody(body));
    const gate = decideGate(action, plan, dryRun, deps.gates);
    const timestamp = now().toISOString();
    const detail: ControlActionDetail = {
      dry_run: true,
      dangerous: action.dangerous,
      executed: false,
      blocked_reason: null,
      planned: plan,
      errors: [],
      extra: Object.keys(notes).length > 0 ? { ...notes } : null,
    };

    if (!gate.execute) {
      detail.blocked_reason = gate.blockedReason;
      if (gate.blockedReason) {
        console.log(`[ctrl] ${name}: preview only (${gate.blockedReason})`);
      }
      return { ok: true, timestamp, action: name, error: null, detail };
    }

    detail.dry_run = false;
    const outcome = await execute(action, plan);
    if (outcome.failure !== null) {
      console.warn(`[ctrl] ${name}: stopped after ${outcome.failure}`);
      detail.errors.push(outcome.failure);
      detail.extra = { ...notes, raw: outcome.raw };
      const error = outcome.transportFailure
        ? `ctrl ${name} aborted: transport failure`
        : `ctrl ${name} aborted: command rejected by modem`;
      return { ok: false, timestamp, action: name, error, detail };
    }

    detail.executed = true;
    detail.extra = { ...notes, raw: outcome.raw, ...(await confirm(action)) };
    return { ok: true, timestamp, action: name, error: null, detail };
  };

  return { run };
};
