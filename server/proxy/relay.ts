import { finished, type Readable, type Writable } from "stream";
import { DEFAULT_CHUNK_SIZE } from "../../shared/const";
import { RelayIOError } from "./errors";
import type { ByteLimiter, ProxyLog, RelayDirection } from "./types";

export type RelayEndReason = "end" | "stopped" | "error";

export interface RelayResult {
  direction: RelayDirection;
  bytes: number;
  reason: RelayEndReason;
  error?: RelayIOError;
}

export interface RelayLinkOptions {
  direction: RelayDirection;
  source: Readable;
  sink: Writable;
  limiter?: ByteLimiter | null;
  chunkSize?: number;
  /** Once aborted, no further reads are started. */
  signal?: AbortSignal;
  log: ProxyLog;
  /** Prefix for log lines, usually the connection id. */
  label?: string;
  onChunk?: (bytes: number) => void;
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof Uint8Array) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  return Buffer.from(String(data));
}

/**
 * Copies bytes one way, chunk by chunk: read, wait for the limiter, write,
 * wait for the write to reach the transport. Stream order is preserved and a
 * chunk that has been read is always written, even after a stop signal.
 */
export class RelayLink {
  readonly direction: RelayDirection;
  private readonly source: Readable;
  private readonly sink: Writable;
  private readonly limiter: ByteLimiter | null;
  private readonly chunkSize: number;
  private readonly signal: AbortSignal | undefined;
  private readonly log: ProxyLog;
  private readonly label: string;
  private readonly onChunk: ((bytes: number) => void) | undefined;

  private bytes = 0;
  private sourceError: Error | null = null;
  private sinkError: Error | null = null;
  private running: Promise<RelayResult> | null = null;

  constructor(options: RelayLinkOptions) {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }

    this.direction = options.direction;
    this.source = options.source;
    this.sink = options.sink;
    this.limiter = options.limiter ?? null;
    this.chunkSize = chunkSize;
    this.signal = options.signal;
    this.log = options.log;
    this.label = options.label ? `${options.label} ` : "";
    this.onChunk = options.onChunk;

    // An error can be emitted while no read is pending
    this.source.on("error", (err) => {
      this.sourceError ??= err;
    });
    this.sink.on("error", (err) => {
      this.sinkError ??= err;
    });
  }

  get bytesRelayed(): number {
    return this.bytes;
  }

  /** Runs the relay to completion. Calling it again returns the same result. */
  run(): Promise<RelayResult> {
    this.running ??= this.pump();
    return this.running;
  }

  private async pump(): Promise<RelayResult> {
    try {
      while (!this.signal?.aborted) {
        const chunk = await this.read();
        if (chunk === null) break;

        if (this.limiter) {
          await this.limiter.acquire(chunk.length);
        }
        await this.write(chunk);

        this.bytes += chunk.length;
        this.onChunk?.(chunk.length);
      }
    } catch (err) {
      // A torn-down sibling shows up here as a destroyed socket
      if (this.signal?.aborted) {
        return this.result("stopped");
      }
      const error = err instanceof RelayIOError ? err : new RelayIOError(this.direction, "source", err);
      this.log.error(`${this.label}${this.direction} relay failed after ${this.bytes} bytes`, error);
      return this.result("error", error);
    }

    const reason: RelayEndReason = this.signal?.aborted ? "stopped" : "end";
    await this.endSink();
    this.log.debug(`${this.label}${this.direction} relay finished (${reason}, ${this.bytes} bytes)`);
    return this.result(reason);
  }

  private result(reason: RelayEndReason, error?: RelayIOError): RelayResult {
    return error
      ? { direction: this.direction, bytes: this.bytes, reason, error }
      : { direction: this.direction, bytes: this.bytes, reason };
  }

  /** Next chunk from the source, or null once it has ended, closed or the relay was stopped. */
  private read(): Promise<Buffer | null> {
    const pending = this.sourceError ?? this.source.errored;
    if (pending) {
      return Promise.reject(new RelayIOError(this.direction, "source", pending));
    }

    const data: unknown = this.source.read();
    if (data !== null) {
      return Promise.resolve(this.take(toBuffer(data)));
    }
    if (this.source.readableEnded || this.source.destroyed || this.signal?.aborted) {
      return Promise.resolve(null);
    }

    return new Promise((resolve, reject) => {
      const cleanup = () => {
        this.source.off("readable", onReadable);
        this.source.off("end", onDone);
        this.source.off("close", onDone);
        this.source.off("error", onError);
        this.signal?.removeEventListener("abort", onDone);
      };
      const onReadable = () => {
        cleanup();
        this.read().then(resolve, reject);
      };
      const onDone = () => {
        cleanup();
        resolve(null);
      };
      const onError = (err: Error) => {
        cleanup();
        reject(new RelayIOError(this.direction, "source", err));
      };

      this.source.on("readable", onReadable);
      this.source.on("end", onDone);
      this.source.on("close", onDone);
      this.source.on("error", onError);
      this.signal?.addEventListener("abort", onDone);
    });
  }

  private take(chunk: Buffer): Buffer {
    if (chunk.length <= this.chunkSize) return chunk;
    this.source.unshift(chunk.subarray(this.chunkSize));
    return chunk.subarray(0, this.chunkSize);
  }

  private write(chunk: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.sink.destroyed || this.sink.writableEnded) {
        reject(new RelayIOError(this.direction, "sink", this.sinkError ?? new Error("sink is closed")));
        return;
      }
      this.sink.write(chunk, (err) => {
        if (err) {
          reject(new RelayIOError(this.direction, "sink", err));
        } else {
          resolve();
        }
      });
    });
  }

  /** Half-closes the sink and waits until the end has been flushed. */
  private endSink(): Promise<void> {
    if (this.sink.destroyed || this.sink.writableEnded) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      // Settles on finish or on close; the handler closes the socket either way
      finished(this.sink, { readable: false }, () => resolve());
      this.sink.end();
    });
  }
}
