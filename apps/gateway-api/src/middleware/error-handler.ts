import type { Request, Response, NextFunction } from "express";
import { ErrorCodes, type ErrorCode } from "@cellgate/shared";
import { AppError } from "../errors/app-error";
import { ProtocolError, TransportError } from "../errors/transport";
import { UpstreamError } from "../errors/upstream";

type Rendered = { status: number; code: ErrorCode; message: string; details?: Record<string, unknown> };

const isBodyParseError = (err: Error) => err instanceof SyntaxError && "body" in err;

const render = (err: Error): Rendered | null => {
  if (err instanceof AppError) {
    return { status: err.status, code: err.code, message: err.message, details: err.details };
  }
  if (err instanceof TransportError) {
    return {
      status: 503,
      code: err.code,
      message: err.message,
      details: err.command ? { command: err.command } : undefined,
    };
  }
  if (err instanceof ProtocolError) {
    return {
      status: 502,
      code: ErrorCodes.PROTOCOL_ERROR,
      message: err.message,
      details: { command: err.command, device_error: err.deviceError },
    };
  }
  if (err instanceof UpstreamError) {
    return { status: err.httpStatus, code: err.code, message: err.message };
  }
  if (isBodyParseError(err)) {
    return { status: 400, code: ErrorCodes.VALIDATION_ERROR, message: "Request body is not valid JSON." };
  }
  return null;
};

export const errorHandler = (err: Error, req: Request, res: Response, next: NextFunction) => {
  const requestId = req.requestId ?? "unknown";

  if (res.headersSent) {
    console.warn(`[error] request_id=${requestId} failed mid-response: ${err.message}`);
    next(err);
    return;
  }

  const rendered = render(err);
  if (rendered) {
    if (rendered.status >= 500) {
      console.warn(`[error] request_id=${requestId} ${rendered.code}: ${rendered.message}`);
    }
    const details = { ...rendered.details, request_id: requestId };
    res.status(rendered.status).json({ code: rendered.code, message: rendered.message, details });
    return;
  }

  console.error(`[error] request_id=${requestId}`, err);
  res.status(500).json({
    code: ErrorCodes.INTERNAL_ERROR,
    message: "Unexpected error.",
    details: { request_id: requestId },
  });
};
