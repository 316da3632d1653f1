import type { RelayDirection } from "./types";

export type ProxyErrorCode = "BIND_FAILED" | "CONNECT_FAILED" | "RELAY_IO" | "LIMITER_MISUSE" | "NOT_CONFIGURED" | "INVALID_STATE";

export class ProxyError extends Error {
  readonly code: ProxyErrorCode;

  constructor(code: ProxyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

function errnoCode(cause: unknown): string | undefined {
  if (cause instanceof Error && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return undefined;
}

/** The listening port could not be bound. */
export class BindError extends ProxyError {
  readonly port: number;
  readonly errno: string | undefined;

  constructor(port: number, cause: unknown) {
    const errno = errnoCode(cause);
    const reason =
      errno === "EADDRINUSE" ? "port is already in use"
      : errno === "EACCES" ? "permission denied"
      : cause instanceof Error ? cause.message
      : String(cause);
    super("BIND_FAILED", `Cannot listen on port ${port}: ${reason}`, { cause });
    this.port = port;
    this.errno = errno;
  }
}

/** The destination could not be reached for one client connection. */
export class ConnectError extends ProxyError {
  readonly host: string;
  readonly port: number;

  constructor(host: string, port: number, cause: unknown) {
    const reason = errnoCode(cause) ?? (cause instanceof Error ? cause.message : String(cause));
    super("CONNECT_FAILED", `Cannot connect to ${host}:${port}: ${reason}`, { cause });
    this.host = host;
    this.port = port;
  }
}

/** A read or write failed part way through a relay. */
export class RelayIOError extends ProxyError {
  readonly direction: RelayDirection;
  readonly side: "source" | "sink";

  constructor(direction: RelayDirection, side: "source" | "sink", cause: unknown) {
    const reason = errnoCode(cause) ?? (cause instanceof Error ? cause.message : String(cause));
    super("RELAY_IO", `${direction} relay failed on ${side}: ${reason}`, { cause });
    this.direction = direction;
    this.side = side;
  }
}

export class RateLimiterMisuseError extends ProxyError {
  constructor(message: string) {
    super("LIMITER_MISUSE", message);
  }
}

export class NotConfiguredError extends ProxyError {
  constructor(message = "No destination configured") {
    super("NOT_CONFIGURED", message);
  }
}

export class ProxyStateError extends ProxyError {
  constructor(message: string) {
    super("INVALID_STATE", message);
  }
}
