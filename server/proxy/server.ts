import net, { type AddressInfo } from "net";
import { DEFAULT_CHUNK_SIZE } from "../../shared/const";
import { RateLimiter } from "../utils/throttle";
import { ConnectionHandler, type ConnectionOutcome } from "./connection";
import { BindError, NotConfiguredError, ProxyStateError } from "./errors";
import type {
  Destination,
  DirectionalLimiters,
  ProxyLog,
  ProxySettings,
  ProxyState,
  ProxyStats,
  RelayDirection,
  ThrottledDirections,
  ThrottleScope,
} from "./types";

export interface ProxyServerOptions {
  log: ProxyLog;
  /** Interface to bind; all interfaces when omitted. */
  host?: string;
  /** One ceiling for all connections, or a fresh one for each. */
  scope?: ThrottleScope;
  throttle?: ThrottledDirections;
  chunkSize?: number;
  connectTimeoutMs?: number;
  stopGraceMs?: number;
  onConnectionClosed?: (outcome: ConnectionOutcome) => void;
}

const emptyStats = (): ProxyStats => ({
  totalConnections: 0,
  activeConnections: 0,
  failedConnections: 0,
  bytesUpstream: 0,
  bytesDownstream: 0,
});

export class ProxyServer {
  readonly settings: ProxySettings;
  private readonly options: ProxyServerOptions;
  private readonly chunkSize: number;

  private _state: ProxyState = "stopped";
  private listener: net.Server | null = null;
  private sharedLimiters: DirectionalLimiters | null = null;
  private readonly handlers = new Map<ConnectionHandler, Promise<ConnectionOutcome | null>>();
  private starting: Promise<AddressInfo> | null = null;
  private stopping: Promise<void> | null = null;
  private stats: ProxyStats = emptyStats();

  constructor(settings: ProxySettings, options: ProxyServerOptions) {
    this.settings = Object.freeze({ ...settings });
    this.options = options;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  }

  get state(): ProxyState {
    return this._state;
  }

  isRunning(): boolean {
    return this._state === "running";
  }

  /** The port actually bound, which differs from the setting when it is 0. */
  get port(): number | null {
    const address = this.listener?.address();
    return address && typeof address === "object" ? address.port : null;
  }

  getStats(): ProxyStats {
    return { ...this.stats, activeConnections: this.handlers.size };
  }

  start(): Promise<AddressInfo> {
    if (this._state !== "stopped") {
      return Promise.reject(new ProxyStateError(`Cannot start while ${this._state}`));
    }
    const destination = this.settings.destination;
    if (!destination) {
      return Promise.reject(new NotConfiguredError());
    }

    this._state = "starting";
    this.starting = this.bind(destination).finally(() => {
      this.starting = null;
    });
    return this.starting;
  }

  private async bind(destination: Destination): Promise<AddressInfo> {
    this.stats = emptyStats();
    this.sharedLimiters = this.options.scope === "per-connection" ? null : this.createLimiters();

    const listener = net.createServer({ allowHalfOpen: true }, (socket) => this.accept(socket, destination));
    try {
      const address = await this.listen(listener);
      this.listener = listener;
      this._state = "running";
      listener.on("error", (err) => this.options.log.error("Listener error", err));
      this.options.log.debug(
        `Listening on port ${address.port}, forwarding to ${destination.host}:${destination.port} at ${
          this.settings.bytesPerSecond > 0 ? `${this.settings.bytesPerSecond} bytes/s` : "full speed"
        }`,
      );
      return address;
    } catch (err) {
      this._state = "stopped";
      this.sharedLimiters = null;
      const error = new BindError(this.settings.listenPort, err);
      this.options.log.error(error.message, error);
      throw error;
    }
  }

  /**
   * Stops accepting, signals every open connection and resolves once all of
   * them have closed.
   */
  stop(): Promise<void> {
    if (this._state === "stopped") return Promise.resolve();
    this.stopping ??= this.shutdown().finally(() => {
      this.stopping = null;
    });
    return this.stopping;
  }

  private async shutdown() {
    // A bind in flight is let finish so that its listener is the one closed below
    if (this.starting) {
      await Promise.allSettled([this.starting]);
    }
    if (this._state === "stopped") return;
    this._state = "stopping";
    const listener = this.listener;

    const closed = new Promise<void>((resolve) => {
      if (!listener) {
        resolve();
        return;
      }
      // The callback carries ERR_SERVER_NOT_RUNNING when already closed, which is fine here
      listener.close(() => resolve());
    });

    const pending = [...this.handlers.entries()];
    this.options.log.debug(`Stopping with ${pending.length} open connection(s)`);
    for (const [handler] of pending) {
      handler.stop();
    }

    await Promise.all([closed, ...pending.map(([, done]) => done)]);

    this.listener = null;
    this.sharedLimiters = null;
    this._state = "stopped";
    this.options.log.debug("Stopped");
  }

  private listen(listener: net.Server): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        listener.off("listening", onListening);
        reject(err);
      };
      const onListening = () => {
        listener.off("error", onError);
        const address = listener.address();
        if (address && typeof address === "object") {
          resolve(address);
        } else {
          listener.close();
          reject(new Error(`Unexpected listen address ${String(address)}`));
        }
      };
      listener.once("error", onError);
      listener.once("listening", onListening);
      listener.listen(this.settings.listenPort, this.options.host);
    });
  }

  private accept(socket: net.Socket, destination: Destination) {
    if (this._state !== "running") {
      socket.destroy();
      return;
    }

    this.stats.totalConnections++;
    const handler = new ConnectionHandler(socket, {
      destination,
      limiters: this.sharedLimiters ?? this.createLimiters(),
      log: this.options.log,
      chunkSize: this.chunkSize,
      connectTimeoutMs: this.options.connectTimeoutMs,
      stopGraceMs: this.options.stopGraceMs,
      onBytes: (direction, bytes) => this.count(direction, bytes),
    });

    const done = handler.run().then(
      (outcome) => {
        this.handlers.delete(handler);
        if (outcome.status === "connect-failed" || outcome.status === "failed") {
          this.stats.failedConnections++;
        }
        this.options.onConnectionClosed?.(outcome);
        return outcome;
      },
      (err: unknown) => {
        this.handlers.delete(handler);
        this.stats.failedConnections++;
        socket.destroy();
        this.options.log.error(`${handler.id} handler failed unexpectedly`, err);
        return null;
      },
    );
    this.handlers.set(handler, done);
  }

  private count(direction: RelayDirection, bytes: number) {
    if (direction === "upstream") {
      this.stats.bytesUpstream += bytes;
    } else {
      this.stats.bytesDownstream += bytes;
    }
  }

  private createLimiters(): DirectionalLimiters {
    const { bytesPerSecond } = this.settings;
    if (bytesPerSecond <= 0) {
      return { upstream: null, downstream: null };
    }
    const throttle = this.options.throttle ?? "both";
    const make = () => new RateLimiter({ bytesPerSecond, burstBytes: Math.min(bytesPerSecond, this.chunkSize) });
    return {
      upstream: throttle === "downstream" ? null : make(),
      downstream: throttle === "upstream" ? null : make(),
    };
  }
}
