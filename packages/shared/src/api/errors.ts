export const ErrorCodes = {
  VALIDATION_ERROR: "VALIDATION_ERROR",
  NOT_FOUND: "NOT_FOUND",
  RATE_LIMITED: "RATE_LIMITED",
  INTERNAL_ERROR: "INTERNAL_ERROR",
  DEVICE_NOT_FOUND: "DEVICE_NOT_FOUND",
  TRANSPORT_TIMEOUT: "TRANSPORT_TIMEOUT",
  TRANSPORT_IO_ERROR: "TRANSPORT_IO_ERROR",
  PROTOCOL_ERROR: "PROTOCOL_ERROR",
  UPSTREAM_UNREACHABLE: "UPSTREAM_UNREACHABLE",
  UPSTREAM_TIMEOUT: "UPSTREAM_TIMEOUT",
  UPSTREAM_DISABLED: "UPSTREAM_DISABLED",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type ErrorResponse = {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown> & { request_id?: string };
};
