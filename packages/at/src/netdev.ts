import type { NetdevStats } from "@cellgate/shared";
import { firstLineWithPrefix, splitFields, toAddress, toInt, toText } from "./fields";

/** `+QNETDEVSTATUS: <iface>,<state>,<ipv4>,<rx_bytes>,<tx_bytes>` */
export const decodeNetdev = (lines: readonly string[] | undefined): NetdevStats | null => {
  const line = firstLineWithPrefix(lines, "+QNETDEVSTATUS:");
  if (!line) {
    return null;
  }
  const [iface, state, ipv4, rx, tx] = splitFields(line);
  const rxBytes = toInt(rx);
  const txBytes = toInt(tx);
  if (rxBytes === null || txBytes === null) {
    throw new Error(`Unreadable netdev status: ${line}`);
  }
  return {
    iface: toText(iface),
    state: toText(state),
    ipv4: toAddress(ipv4),
    rx_bytes: rxBytes,
    tx_bytes: txBytes,
    rx_rate_bps: null,
    tx_rate_bps: null,
    source: "modem",
  };
};

/**
 * Fills bit rates from the counters of the previous reading of the same interface.
 * Counter resets (a smaller value than before) yield a zero rate.
 */
export const withRates = (
  current: NetdevStats,
  previous: NetdevStats | null,
  elapsedMs: number
): NetdevStats => {
  if (
    !previous ||
    previous.iface !== current.iface ||
    current.rx_bytes === null ||
    current.tx_bytes === null ||
    previous.rx_bytes === null ||
    previous.tx_bytes === null
  ) {
    return current;
  }
  const seconds = Math.max(0.001, elapsedMs / 1000);
  const rate = (now: number, before: number) =>
    now >= before ? Math.floor(((now - before) * 8) / seconds) : 0;
  return {
    ...current,
    rx_rate_bps: rate(current.rx_bytes, previous.rx_bytes),
    tx_rate_bps: rate(current.tx_bytes, previous.tx_bytes),
  };
};
