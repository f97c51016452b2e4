import { UpstreamError } from "../../errors/upstream";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type UpstreamRequest = {
  url: string;
  timeoutMs: number;
  headers?: Record<string, string>;
  label: string;
  /** HTTP status reported when the upstream times out. */
  timeoutStatus?: number;
};

const messageOf = (error: unknown) => (error instanceof Error ? error.message : String(error));

export type IdleLimit = Pick<UpstreamRequest, "label" | "timeoutMs" | "timeoutStatus">;

export const upstreamTimeout = (request: IdleLimit, cause?: unknown) =>
  new UpstreamError("timeout", `${request.label} timed out after ${request.timeoutMs}ms`, {
    timeoutStatus: request.timeoutStatus,
    cause,
  });

const startDeadline = (timeoutMs: number) => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  return { signal: controller.signal, clear: () => clearTimeout(timer) };
};

/** Settles with `work`, or rejects as soon as `signal` aborts. */
const untilAborted = <T>(work: Promise<T>, signal: AbortSignal) =>
  new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });

const open = async (fetchImpl: FetchLike, request: UpstreamRequest, signal: AbortSignal) => {
  let response: Response;
  try {
    response = await untilAborted(fetchImpl(request.url, { headers: request.headers, signal }), signal);
  } catch (error) {
    if (signal.aborted) {
      throw upstreamTimeout(request, error);
    }
    throw new UpstreamError("unreachable", `${request.label} failed: ${messageOf(error)}`, { cause: error });
  }
  if (!response.ok) {
    await response.body?.cancel();
    throw new UpstreamError("status", `${request.label} failed: upstream answered ${response.status}`, {
      upstreamStatus: response.status,
    });
  }
  return response;
};

/**
 * Fetches from the media service. The timeout covers the wait for response headers; a
 * streamed body is bounded by the idle guard on the way to the client instead.
 */
export const fetchUpstream = async (fetchImpl: FetchLike, request: UpstreamRequest) => {
  const deadline = startDeadline(request.timeoutMs);
  try {
    return await open(fetchImpl, request, deadline.signal);
  } finally {
    deadline.clear();
  }
};

/** Headers and body share one deadline. */
export const fetchUpstreamJson = async (fetchImpl: FetchLike, request: UpstreamRequest): Promise<unknown> => {
  const deadline = startDeadline(request.timeoutMs);
  try {
    const response = await open(fetchImpl, request, deadline.signal);
    try {
      const data: unknown = await untilAborted(response.json(), deadline.signal);
      return data;
    } catch (error) {
      if (deadline.signal.aborted) {
        throw upstreamTimeout(request, error);
      }
      throw new UpstreamError("unreachable", `${request.label} returned invalid JSON`, { cause: error });
    }
  } finally {
    deadline.clear();
  }
};
