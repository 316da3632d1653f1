/** Diagnostic sink the proxy core writes to. Return values are ignored. */
export interface ProxyLog {
  debug(message: string): void;
  error(message: string, cause?: unknown): void;
}

export interface Destination {
  /** The URL as configured, e.g. "http://localhost:8080/". */
  url: string;
  host: string;
  port: number;
}

/** Immutable snapshot handed to the server at start. */
export interface ProxySettings {
  readonly listenPort: number;
  readonly destination: Destination | null;
  /** 0 means unlimited. */
  readonly bytesPerSecond: number;
}

export type RelayDirection = "upstream" | "downstream";

export type ThrottleScope = "shared" | "per-connection";

export type ThrottledDirections = "both" | RelayDirection;

export type ProxyState = "stopped" | "starting" | "running" | "stopping";

export interface ProxyStats {
  totalConnections: number;
  activeConnections: number;
  failedConnections: number;
  bytesUpstream: number;
  bytesDownstream: number;
}

/** Anything that can pace a byte transfer. */
export interface ByteLimiter {
  acquire(bytes: number): Promise<void>;
}

/** Limiters applied to each direction of a connection; null leaves it unthrottled. */
export interface DirectionalLimiters {
  upstream: ByteLimiter | null;
  downstream: ByteLimiter | null;
}
