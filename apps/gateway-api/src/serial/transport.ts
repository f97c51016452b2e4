import { detectTerminal, formatCommand, splitResponseLines, type TerminalMarker } from "@cellgate/at";
import { ProtocolError, TransportError } from "../errors/transport";
import { openSerialChannel, type ChannelOpener, type SerialChannel } from "./channel";
import type { DeviceResolver } from "./device";
import { createChannelLock } from "./lock";
import { DEFAULT_RETRY_POLICY, runWithRetry, type RetryPolicy, type Sleep } from "./retry-policy";

export type ExchangeOutcome = "ok" | "protocol_error";

export type CommandExchange = {
  command: string;
  deadlineMs: number;
  lines: string[];
  outcome: ExchangeOutcome;
  /** Device error line (`ERROR`, `+CME ERROR: 10`) when the outcome is a protocol error. */
  error: string | null;
  durationMs: number;
};

export type ChannelSession = {
  path: string | null;
  baudRate: number;
  state: "open" | "closed";
  lastError: string | null;
  reconnectAttempts: number;
};

export type AtTransport = {
  /** One serialized exchange; device-reported errors come back as an outcome. */
  exchange: (command: string, deadlineMs?: number) => Promise<CommandExchange>;
  /** Like `exchange`, but a device-reported error throws `ProtocolError`. */
  send: (command: string, deadlineMs?: number) => Promise<string[]>;
  session: () => Readonly<ChannelSession>;
  close: () => Promise<void>;
};

export type AtTransportOptions = {
  baudRate: number;
  deadlineMs: number;
  resolver: DeviceResolver;
  retry?: RetryPolicy;
  debug?: boolean;
  openChannel?: ChannelOpener;
  wait?: Sleep;
};

const messageOf = (error: unknown) => (error instanceof Error ? error.message : String(error));

const isIoError = (error: unknown): error is TransportError =>
  error instanceof TransportError && error.kind === "io";

const toExchange = (
  command: string,
  deadlineMs: number,
  lines: string[],
  marker: TerminalMarker,
  durationMs: number
): CommandExchange => ({
  command,
  deadlineMs,
  lines,
  outcome: marker.kind === "ok" ? "ok" : "protocol_error",
  error: marker.kind === "error" ? marker.text : null,
  durationMs,
});

export const createAtTransport = (options: AtTransportOptions): AtTransport => {
  const lock = createChannelLock();
  const openChannel = options.openChannel ?? openSerialChannel;
  const retry = options.retry ?? DEFAULT_RETRY_POLICY;
  const state: ChannelSession = {
    path: null,
    baudRate: options.baudRate,
    state: "closed",
    lastError: null,
    reconnectAttempts: 0,
  };
  let channel: SerialChannel | null = null;
  let shutDown = false;

  const logDebug = (message: string) => {
    if (options.debug) {
      console.log(`[transport] ${message}`);
    }
  };

  const drop = async (reason: string) => {
    const current = channel;
    channel = null;
    state.state = "closed";
    state.lastError = reason;
    if (!current) {
      return;
    }
    try {
      await current.close();
    } catch (error) {
      logDebug(`close of ${current.path} failed: ${messageOf(error)}`);
    }
  };

  const open = async () => {
    let path: string;
    let opened: SerialChannel;
    try {
      path = options.resolver.resolve();
    } catch (error) {
      state.lastError = messageOf(error);
      throw error;
    }
    try {
      opened = await openChannel(path, options.baudRate);
    } catch (error) {
      state.lastError = messageOf(error);
      throw new TransportError("io", `Failed to open ${path}: ${messageOf(error)}`, { cause: error });
    }
    options.resolver.remember(path);
    channel = opened;
    state.path = path;
    state.state = "open";
    state.lastError = null;
    console.log(`[transport] serial port opened: ${path} @ ${options.baudRate}`);
    return opened;
  };

  const exchangeOn = (target: SerialChannel, command: string, deadlineMs: number) =>
    new Promise<CommandExchange>((resolve, reject) => {
      const started = Date.now();
      let buffer = "";
      let settled = false;
      const cleanups: Array<() => void> = [];
      const finish = (settle: () => void) => {
        if (settled) return;
        settled = true;
        cleanups.forEach((cleanup) => cleanup());
        settle();
      };
      const ioError = (error: unknown) =>
        new TransportError("io", `Serial I/O error during ${command}: ${messageOf(error)}`, {
          command,
          cause: error,
        });

      const timer = setTimeout(() => {
        const partial = splitResponseLines(buffer);
        const detail = partial.length > 0 ? "reply incomplete" : "no reply";
        finish(() =>
          reject(
            new TransportError("timeout", `${command} timed out after ${deadlineMs}ms (${detail}).`, {
              command,
              partial,
            })
          )
        );
      }, deadlineMs);
      cleanups.push(() => clearTimeout(timer));
      cleanups.push(
        target.onData((chunk) => {
          buffer += chunk;
          const marker = detectTerminal(buffer);
          if (marker) {
            const lines = splitResponseLines(buffer);
            finish(() => resolve(toExchange(command, deadlineMs, lines, marker, Date.now() - started)));
          }
        })
      );
      cleanups.push(target.onFailure((error) => finish(() => reject(ioError(error)))));

      target
        .discardInput()
        .then(() => target.write(formatCommand(command)))
        .catch((error: unknown) => finish(() => reject(ioError(error))));
    });

  const reconnectAndReplay = async (command: string, deadlineMs: number) => {
    let reopened: SerialChannel;
    try {
      reopened = await runWithRetry(
        retry,
        (attempt) => {
          state.reconnectAttempts = attempt;
          return open();
        },
        {
          wait: options.wait,
          onFailure: ({ attempt, delayMs, error }) =>
            console.warn(
              `[transport] reconnect attempt ${attempt}/${retry.delaysMs.length} after ${delayMs}ms failed: ${messageOf(error)}`
            ),
        }
      );
    } catch (error) {
      state.lastError = messageOf(error);
      throw new TransportError(
        "io",
        `Serial I/O error on ${state.path ?? "modem"}; ${retry.delaysMs.length} reconnect attempts failed: ${messageOf(error)}`,
        { command, cause: error }
      );
    }
    state.reconnectAttempts = 0;
    console.log(`[transport] reconnected on ${reopened.path}, replaying ${command}`);
    try {
      return await exchangeOn(reopened, command, deadlineMs);
    } catch (error) {
      if (!isIoError(error)) {
        throw error;
      }
      await drop(error.message);
      throw new TransportError("io", `Replay of ${command} after reconnect failed: ${error.message}`, {
        command,
        cause: error,
      });
    }
  };

  const runLocked = async (command: string, deadlineMs: number) => {
    if (shutDown) {
      throw new TransportError("io", "Transport is closed.", { command });
    }
    const target = channel ?? (await open());
    try {
      return await exchangeOn(target, command, deadlineMs);
    } catch (error) {
      if (!isIoError(error)) {
        throw error;
      }
      console.warn(`[transport] ${error.message}; reconnecting`);
      await drop(error.message);
      return reconnectAndReplay(command, deadlineMs);
    }
  };

  const exchange = (command: string, deadlineMs = options.deadlineMs) =>
    lock.run(async () => {
      logDebug(`>> ${command}`);
      const result = await runLocked(command, deadlineMs);
      logDebug(`<< ${result.lines.join(" | ")} (${result.durationMs}ms)`);
      return result;
    });

  const send = async (command: string, deadlineMs?: number) => {
    const result = await exchange(command, deadlineMs);
    if (result.outcome === "protocol_error") {
      throw new ProtocolError(command, result.error ?? "ERROR", result.lines);
    }
    return result.lines;
  };

  const close = async () => {
    shutDown = true;
    await lock.run(() => drop("transport closed"));
  };

  return {
    exchange,
    send,
    session: () => ({ ...state }),
    close,
  };
};
