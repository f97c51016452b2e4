import type { LiveTelemetry } from "@cellgate/shared";
import { decodeCarrierAggregation } from "./carrier-aggregation";
import { isolate, type FieldFailure } from "./isolate";
import { decodeNeighbours } from "./neighbours";
import { decodeNetdev } from "./netdev";
import { decodeMode, decodeOperator } from "./network";
import { decodeRegistration } from "./registration";
import { decodeServingCell } from "./serving-cell";
import { decodeSession } from "./session";
import { decodeSignal } from "./signal";
import { decodeTemperatures } from "./temperatures";

/** Read-only battery issued once per poll cycle, in this order. */
export const TELEMETRY_QUERIES = {
  cgreg: "AT+CGREG?",
  cereg: "AT+CEREG?",
  c5greg: "AT+C5GREG?",
  cops: "AT+COPS?",
  qnwinfo: "AT+QNWINFO",
  qrsrp: "AT+QRSRP",
  qrsrq: "AT+QRSRQ",
  qsinr: "AT+QSINR",
  serving: 'AT+QENG="servingcell"',
  neighbours: 'AT+QENG="neighbourcell"',
  qcainfo: "AT+QCAINFO",
  qtemp: "AT+QTEMP",
  qnetdev: "AT+QNETDEVSTATUS",
  cgdcont: "AT+CGDCONT?",
  cgact: "AT+CGACT?",
  cgcontrdp: "AT+CGCONTRDP?",
  qidnscfg: "AT+QIDNSCFG?",
} as const;

export type TelemetryQuery = keyof typeof TELEMETRY_QUERIES;

/** Reply lines per query; a query that failed on the wire is simply missing. */
export type TelemetryReplies = Partial<Record<TelemetryQuery, readonly string[]>>;

export const emptyTelemetry = (): LiveTelemetry => ({
  registration: null,
  mode: null,
  operator: null,
  signal: null,
  serving: null,
  carrier_aggregation: null,
  neighbours: null,
  netdev: null,
  session: null,
  temperatures: null,
});

/**
 * Decodes one batch of replies. Every field is decoded on its own: a reply that
 * cannot be read leaves only that field null and is reported through `failures`.
 */
export const decodeTelemetry = (
  replies: TelemetryReplies,
  failures: FieldFailure[] = []
): LiveTelemetry => {
  const serving = isolate("serving", () => decodeServingCell(replies.serving), failures);
  return {
    registration: decodeRegistration(
      { cgreg: replies.cgreg, cereg: replies.cereg, c5greg: replies.c5greg },
      failures
    ),
    mode: isolate("mode", () => decodeMode(replies.qnwinfo, serving), failures),
    operator: isolate(
      "operator",
      () => decodeOperator({ cops: replies.cops, qnwinfo: replies.qnwinfo }),
      failures
    ),
    signal: isolate(
      "signal",
      () => decodeSignal({ qrsrp: replies.qrsrp, qrsrq: replies.qrsrq, qsinr: replies.qsinr }, serving),
      failures
    ),
    serving,
    carrier_aggregation: isolate(
      "carrier_aggregation",
      () => decodeCarrierAggregation(replies.qcainfo),
      failures
    ),
    neighbours: isolate("neighbours", () => decodeNeighbours(replies.neighbours), failures),
    netdev: isolate("netdev", () => decodeNetdev(replies.qnetdev), failures),
    session: decodeSession(
      {
        cgdcont: replies.cgdcont,
        cgact: replies.cgact,
        cgcontrdp: replies.cgcontrdp,
        qidnscfg: replies.qidnscfg,
      },
      failures
    ),
    temperatures: isolate("temperatures", () => decodeTemperatures(replies.qtemp), failures),
  };
};
