import type { AddinCallResult, JsonObject } from "./types.js";

export type ErrorKind =
  | "ValidationError"
  | "HostUnreachable"
  | "HostError"
  | "Timeout"
  | "Cancelled"
  | "InternalError";

export interface ErrorDetail extends JsonObject {
  kind:    ErrorKind;
  message: string;
}

/**
 * An error that is allowed to cross the bridge boundary. Anything else thrown
 * inside a handler is reported as InternalError with a generic message.
 */
export class BridgeError extends Error {
  readonly kind:  ErrorKind;
  readonly extra: JsonObject;

  constructor(kind: ErrorKind, message: string, extra: JsonObject = {}) {
    super(message);
    this.name  = kind;
    this.kind  = kind;
    this.extra = extra;
  }

  toDetail(): ErrorDetail {
    return { ...this.extra, kind: this.kind, message: this.message };
  }
}

/** Duplicate tool names and similar wiring mistakes; fatal at startup. */
export class RegistryError extends Error {
  override name = "RegistryError";
}

/** Raised when the session table sees an impossible transition. */
export class ConsistencyError extends Error {
  override name = "ConsistencyError";
}

export class ConfigError extends Error {
  override name = "ConfigError";
}

export function normalizeError(err: unknown): ErrorDetail {
  if (err instanceof BridgeError) return err.toDetail();
  return { kind: "InternalError", message: "internal error while running the tool" };
}

/** Turn a non-ok add-in result into the taxonomy entry the caller sees. */
export function addinFailure(
  result: Exclude<AddinCallResult, { status: "ok" }>,
  opts: { keepTraceback?: boolean } = {},
): BridgeError {
  const extra: JsonObject = {};
  if (result.error.status !== undefined) extra["host_status"] = result.error.status;
  if (opts.keepTraceback && result.error.traceback) extra["traceback"] = result.error.traceback;

  switch (result.status) {
    case "host_unreachable":
      return new BridgeError("HostUnreachable", result.error.message, extra);
    case "timeout":
      return new BridgeError("Timeout", result.error.message, extra);
    case "host_error":
      return new BridgeError("HostError", result.error.message, extra);
  }
}

const HTTP_STATUS: Record<ErrorKind, number> = {
  ValidationError: 400,
  HostUnreachable: 503,
  HostError:       502,
  Timeout:         504,
  Cancelled:       499,
  InternalError:   500,
};

export function httpStatusFor(kind: ErrorKind): number {
  return HTTP_STATUS[kind];
}

export function isErrorKind(v: unknown): v is ErrorKind {
  return typeof v === "string" && Object.hasOwn(HTTP_STATUS, v);
}
