import { DEVICE_INFO_QUERIES, decodeDeviceInfo, type FieldFailure } from "@cellgate/at";
import type { InfoResponse } from "@cellgate/shared";
import type { AtTransport } from "../serial/transport";
import { runQueryBattery } from "./query-battery";

/**
 * Identity battery, run on demand. Throws the transport error when the modem could not be
 * reached at all; partial answers come back with the unanswered fields null.
 */
export const readDeviceInfo = async (
  transport: Pick<AtTransport, "exchange">,
  options: { verbose?: boolean; now?: () => number } = {}
): Promise<InfoResponse> => {
  const battery = await runQueryBattery(transport, DEVICE_INFO_QUERIES);
  if (battery.answered === 0 && battery.channelError) {
    throw battery.channelError;
  }
  const fieldFailures: FieldFailure[] = [];
  const info = decodeDeviceInfo(battery.replies, fieldFailures);
  const problems = [
    ...battery.failures.map((failure) => `${failure.command}: ${failure.message}`),
    ...fieldFailures.map((failure) => `${failure.field}: ${failure.message}`),
  ];
  if (problems.length > 0) {
    console.warn(`[info] incomplete device info: ${problems.join("; ")}`);
  }
  return {
    ok: battery.answered > 0,
    ts: (options.now ?? Date.now)(),
    error: problems.length > 0 ? problems.join("; ") : null,
    ...info,
    ...(options.verbose ? { raw: battery.raw } : {}),
  };
};
