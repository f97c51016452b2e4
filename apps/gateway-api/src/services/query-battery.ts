import { queryEntries } from "@cellgate/at";
import { TransportError } from "../errors/transport";
import type { AtTransport } from "../serial/transport";

export type QueryFailure = { query: string; command: string; message: string };

export type BatteryResult<K extends string> = {
  replies: Partial<Record<K, string[]>>;
  raw: Record<string, string[]>;
  failures: QueryFailure[];
  answered: number;
  /** Set when the channel went away and the remaining queries were skipped. */
  channelError: TransportError | null;
};

/**
 * Issues every query of the table in order. A device error or a timeout only loses that
 * reply; an I/O failure (after the transport's own reconnect sequence) ends the battery.
 */
export const runQueryBattery = async <K extends string>(
  transport: Pick<AtTransport, "exchange">,
  table: Readonly<Record<K, string>>
): Promise<BatteryResult<K>> => {
  const result: BatteryResult<K> = { replies: {}, raw: {}, failures: [], answered: 0, channelError: null };
  for (const [query, command] of queryEntries(table)) {
    if (result.channelError) {
      result.failures.push({ query, command, message: "skipped: serial channel unavailable" });
      continue;
    }
    try {
      const exchange = await transport.exchange(command);
      result.raw[command] = exchange.lines;
      if (exchange.outcome === "protocol_error") {
        result.failures.push({ query, command, message: exchange.error ?? "ERROR" });
        continue;
      }
      result.replies[query] = exchange.lines;
      result.answered += 1;
    } catch (error) {
      if (!(error instanceof TransportError)) {
        throw error;
      }
      result.failures.push({ query, command, message: error.message });
      if (error.kind !== "timeout") {
        result.channelError = error;
      }
    }
  }
  return result;
};
