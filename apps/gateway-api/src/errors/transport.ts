import { ErrorCodes, type ErrorCode } from "@cellgate/shared";

export type TransportErrorKind = "timeout" | "io" | "device_not_found";

const CODE_OF_KIND: Record<TransportErrorKind, ErrorCode> = {
  timeout: ErrorCodes.TRANSPORT_TIMEOUT,
  io: ErrorCodes.TRANSPORT_IO_ERROR,
  device_not_found: ErrorCodes.DEVICE_NOT_FOUND,
};

export class TransportError extends Error {
  public readonly kind: TransportErrorKind;
  public readonly command: string | null;
  /** Lines received before a timeout; kept for logging only. */
  public readonly partial: string[];

  constructor(
    kind: TransportErrorKind,
    message: string,
    options: { command?: string; partial?: string[]; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "TransportError";
    this.kind = kind;
    this.command = options.command ?? null;
    this.partial = options.partial ?? [];
  }

  get code(): ErrorCode {
    return CODE_OF_KIND[this.kind];
  }
}

/** The modem answered with `ERROR` or `+CME ERROR`. */
export class ProtocolError extends Error {
  public readonly command: string;
  public readonly deviceError: string;
  public readonly lines: string[];

  constructor(command: string, deviceError: string, lines: string[] = []) {
    super(`${command} failed: ${deviceError}`);
    this.name = "ProtocolError";
    this.command = command;
    this.deviceError = deviceError;
    this.lines = lines;
  }
}
