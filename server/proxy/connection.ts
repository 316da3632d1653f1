import net from "net";
import { v4 as uuidv4 } from "uuid";
import { DEFAULT_CONNECT_TIMEOUT_MS, DEFAULT_STOP_GRACE_MS } from "../../shared/const";
import { ConnectError, type RelayIOError } from "./errors";
import { RelayLink, type RelayResult } from "./relay";
import type { Destination, DirectionalLimiters, ProxyLog, RelayDirection } from "./types";

export interface ConnectionHandlerOptions {
  destination: Destination;
  limiters: DirectionalLimiters;
  log: ProxyLog;
  chunkSize?: number;
  connectTimeoutMs?: number;
  /** After `stop()`, how long in-flight writes may wait on the peer before both sockets are destroyed. */
  stopGraceMs?: number;
  onBytes?: (direction: RelayDirection, bytes: number) => void;
}

export type ConnectionOutcome =
  | { id: string; status: "connect-failed"; error: ConnectError }
  | { id: string; status: "stopped-before-connect" }
  | { id: string; status: "completed"; upstream: RelayResult; downstream: RelayResult }
  | { id: string; status: "failed"; upstream: RelayResult; downstream: RelayResult; error: RelayIOError };

function connectUpstream(destination: Destination, timeoutMs: number, signal: AbortSignal): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host: destination.host, port: destination.port, allowHalfOpen: true });

    const cleanup = () => {
      clearTimeout(timer);
      socket.off("connect", onConnect);
      socket.off("error", onError);
      signal.removeEventListener("abort", onAbort);
    };
    const fail = (err: unknown) => {
      cleanup();
      socket.destroy();
      reject(err);
    };
    const onConnect = () => {
      cleanup();
      resolve(socket);
    };
    const onError = (err: Error) => fail(err);
    const onAbort = () => fail(signal.reason);

    const timer = setTimeout(() => fail(new Error(`timed out after ${timeoutMs}ms`)), timeoutMs);
    socket.once("connect", onConnect);
    socket.once("error", onError);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Serves one accepted client: dials the destination, relays both directions
 * until each has ended, then closes both sockets.
 */
export class ConnectionHandler {
  readonly id = uuidv4();
  private readonly client: net.Socket;
  private readonly options: ConnectionHandlerOptions;
  private readonly controller = new AbortController();
  private upstream: net.Socket | null = null;
  private running: Promise<ConnectionOutcome> | null = null;
  private done = false;
  private graceTimer: NodeJS.Timeout | null = null;

  constructor(client: net.Socket, options: ConnectionHandlerOptions) {
    this.client = client;
    this.options = options;
    // Relays attach their own listeners; this covers the window before they exist
    this.client.on("error", (err) => {
      this.options.log.debug(`${this.id} client socket error: ${err.message}`);
    });
  }

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Lets in-flight chunks finish, then closes the connection. A peer that has
   * stopped reading gets `stopGraceMs` before both sockets are destroyed.
   */
  stop() {
    if (this.controller.signal.aborted) return;
    this.controller.abort();
    if (this.done) return;

    const graceMs = this.options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
    this.graceTimer = setTimeout(() => {
      this.graceTimer = null;
      this.options.log.debug(`${this.id} not drained ${graceMs}ms after stop, closing`);
      this.client.destroy();
      this.upstream?.destroy();
    }, graceMs);
  }

  run(): Promise<ConnectionOutcome> {
    this.running ??= this.serve().finally(() => {
      this.done = true;
      if (this.graceTimer) {
        clearTimeout(this.graceTimer);
        this.graceTimer = null;
      }
    });
    return this.running;
  }

  private async serve(): Promise<ConnectionOutcome> {
    const { destination, log } = this.options;
    const signal = this.controller.signal;
    log.debug(`${this.id} accepted from ${this.client.remoteAddress ?? "unknown"}:${this.client.remotePort ?? "?"}`);

    let upstream: net.Socket;
    try {
      upstream = await connectUpstream(
        destination,
        this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
        signal,
      );
    } catch (err) {
      this.client.destroy();
      if (signal.aborted) {
        log.debug(`${this.id} stopped while connecting to ${destination.host}:${destination.port}`);
        return { id: this.id, status: "stopped-before-connect" };
      }
      const error = new ConnectError(destination.host, destination.port, err);
      log.error(`${this.id} ${error.message}`, error);
      return { id: this.id, status: "connect-failed", error };
    }

    this.upstream = upstream;
    upstream.setNoDelay(true);
    this.client.setNoDelay(true);
    log.debug(`${this.id} connected to ${destination.host}:${destination.port}`);

    const links = {
      upstream: this.link("upstream", this.client, upstream),
      downstream: this.link("downstream", upstream, this.client),
    };

    // One direction ending leaves the other running; one failing ends both
    const tearDownOnError = (result: RelayResult) => {
      if (result.reason === "error") this.tearDown();
      return result;
    };
    const [up, down] = await Promise.all([
      links.upstream.run().then(tearDownOnError),
      links.downstream.run().then(tearDownOnError),
    ]);

    await this.closeSockets();

    const error = up.error ?? down.error;
    log.debug(`${this.id} closed (${up.bytes} bytes up, ${down.bytes} bytes down)`);
    return error
      ? { id: this.id, status: "failed", upstream: up, downstream: down, error }
      : { id: this.id, status: "completed", upstream: up, downstream: down };
  }

  private link(direction: RelayDirection, source: net.Socket, sink: net.Socket): RelayLink {
    const { limiters, log, chunkSize, onBytes } = this.options;
    return new RelayLink({
      direction,
      source,
      sink,
      limiter: limiters[direction],
      chunkSize,
      signal: this.controller.signal,
      log,
      label: this.id,
      onChunk: onBytes ? (bytes) => onBytes(direction, bytes) : undefined,
    });
  }

  private tearDown() {
    this.stop();
    this.client.destroy();
    this.upstream?.destroy();
  }

  private async closeSockets() {
    const sockets = [this.client, this.upstream].filter((s): s is net.Socket => s !== null);
    await Promise.all(
      sockets.map(
        (socket) =>
          new Promise<void>((resolve) => {
            if (socket.closed) {
              resolve();
              return;
            }
            socket.once("close", () => resolve());
            socket.destroy();
          }),
      ),
    );
  }
}
