import { ErrorCodes, type ErrorCode } from "@cellgate/shared";

export type UpstreamErrorKind = "unreachable" | "timeout" | "disabled" | "status";

export class UpstreamError extends Error {
  public readonly kind: UpstreamErrorKind;
  public readonly upstreamStatus: number | null;
  private readonly timeoutStatus: number;

  constructor(
    kind: UpstreamErrorKind,
    message: string,
    options: { upstreamStatus?: number; timeoutStatus?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "UpstreamError";
    this.kind = kind;
    this.upstreamStatus = options.upstreamStatus ?? null;
    this.timeoutStatus = options.timeoutStatus ?? 502;
  }

  get code(): ErrorCode {
    if (this.kind === "disabled") return ErrorCodes.UPSTREAM_DISABLED;
    if (this.upstreamStatus === 404) return ErrorCodes.NOT_FOUND;
    if (this.kind === "timeout") return ErrorCodes.UPSTREAM_TIMEOUT;
    return ErrorCodes.UPSTREAM_UNREACHABLE;
  }

  /**
   * Timeouts answer 502 unless the request asked for another status (the recorded-file path uses 504).
   * A missing resource or an unsatisfiable range keeps the upstream status.
   */
  get httpStatus() {
    if (this.kind === "disabled") return 503;
    if (this.kind === "timeout") return this.timeoutStatus;
    if (this.upstreamStatus === 404 || this.upstreamStatus === 416) return this.upstreamStatus;
    return 502;
  }
}
