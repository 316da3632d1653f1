import { PassThrough, Writable } from "stream";
import { describe, expect, it, vi } from "vitest";
import { RelayLink } from "./relay";
import { RelayIOError } from "./errors";
import type { ByteLimiter, ProxyLog } from "./types";
import { silentLog } from "../_core/logger";

function createLog() {
  return { debug: vi.fn(), error: vi.fn() } satisfies ProxyLog;
}

function collector(events?: string[]) {
  const chunks: Buffer[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      events?.push(`write:${chunk.length}`);
      callback();
    },
  });
  return { sink, received: () => Buffer.concat(chunks) };
}

describe("RelayLink", () => {
  it("forwards every byte in order, split into bounded chunks", async () => {
    const source = new PassThrough();
    const { sink, received } = collector();
    const limiter = { acquire: vi.fn(async (_bytes: number) => {}) };

    source.end(Buffer.from("abcdefghij"));
    const result = await new RelayLink({
      direction: "upstream",
      source,
      sink,
      limiter,
      chunkSize: 4,
      log: createLog(),
    }).run();

    expect(received().toString()).toBe("abcdefghij");
    expect(limiter.acquire.mock.calls.map(([bytes]) => bytes)).toEqual([4, 4, 2]);
    expect(result).toEqual({ direction: "upstream", bytes: 10, reason: "end" });
    expect(sink.writableFinished).toBe(true);
  });

  it("waits for the limiter before writing each chunk", async () => {
    const events: string[] = [];
    const source = new PassThrough();
    const { sink } = collector(events);
    const limiter: ByteLimiter = {
      acquire: async (bytes) => {
        events.push(`acquire:${bytes}`);
      },
    };

    source.end(Buffer.from("0123456789"));
    await new RelayLink({ direction: "downstream", source, sink, limiter, chunkSize: 4, log: createLog() }).run();

    expect(events).toEqual(["acquire:4", "write:4", "acquire:4", "write:4", "acquire:2", "write:2"]);
  });

  it("passes large payloads through untouched without a limiter", async () => {
    const payload = Buffer.alloc(200_000);
    for (let i = 0; i < payload.length; i++) payload[i] = (i * 31) % 251;
    const source = new PassThrough();
    const { sink, received } = collector();

    source.end(payload);
    const result = await new RelayLink({ direction: "upstream", source, sink, log: silentLog }).run();

    expect(result.bytes).toBe(payload.length);
    expect(received().equals(payload)).toBe(true);
  });

  it("ends with an error when the source fails", async () => {
    const source = new PassThrough();
    const { sink, received } = collector();
    const log = createLog();
    const relay = new RelayLink({ direction: "upstream", source, sink, log, label: "conn-1" });

    source.write("abc");
    const running = relay.run();
    setTimeout(() => source.destroy(new Error("boom")), 20);
    const result = await running;

    expect(result.reason).toBe("error");
    expect(result.bytes).toBe(3);
    expect(result.error).toBeInstanceOf(RelayIOError);
    expect(result.error?.side).toBe("source");
    expect(result.error?.message).toBe("upstream relay failed on source: boom");
    expect(received().toString()).toBe("abc");
    expect(log.error).toHaveBeenCalledTimes(1);
    expect(log.error.mock.calls[0][0]).toBe("conn-1 upstream relay failed after 3 bytes");
  });

  it("ends with an error when the sink rejects a write", async () => {
    const source = new PassThrough();
    const sink = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error("broken pipe"));
      },
    });

    source.end("data");
    const result = await new RelayLink({ direction: "downstream", source, sink, log: createLog() }).run();

    expect(result.reason).toBe("error");
    expect(result.bytes).toBe(0);
    expect(result.error?.side).toBe("sink");
    expect(result.error?.message).toBe("downstream relay failed on sink: broken pipe");
  });

  it("does not read once stopped and still half-closes the sink", async () => {
    const controller = new AbortController();
    const source = new PassThrough();
    const { sink, received } = collector();

    controller.abort();
    source.write("never read");
    const result = await new RelayLink({
      direction: "upstream",
      source,
      sink,
      signal: controller.signal,
      log: createLog(),
    }).run();

    expect(result).toEqual({ direction: "upstream", bytes: 0, reason: "stopped" });
    expect(received().length).toBe(0);
    expect(sink.writableEnded).toBe(true);
  });

  it("stops while idle waiting for data", async () => {
    const controller = new AbortController();
    const source = new PassThrough();
    const { sink } = collector();
    const relay = new RelayLink({ direction: "downstream", source, sink, signal: controller.signal, log: createLog() });

    const running = relay.run();
    setTimeout(() => controller.abort(), 20);

    await expect(running).resolves.toEqual({ direction: "downstream", bytes: 0, reason: "stopped" });
  });

  it("flushes a chunk that was already read when the stop arrives", async () => {
    const controller = new AbortController();
    const source = new PassThrough();
    const { sink, received } = collector();
    const limiter: ByteLimiter = {
      acquire: async () => {
        controller.abort();
      },
    };

    source.write("abcdefgh");
    const result = await new RelayLink({
      direction: "upstream",
      source,
      sink,
      limiter,
      chunkSize: 4,
      signal: controller.signal,
      log: createLog(),
    }).run();

    expect(result).toEqual({ direction: "upstream", bytes: 4, reason: "stopped" });
    expect(received().toString()).toBe("abcd");
  });

  it("returns the same result when run twice", async () => {
    const source = new PassThrough();
    const { sink } = collector();
    const relay = new RelayLink({ direction: "upstream", source, sink, log: createLog() });

    source.end("xy");
    const [first, second] = await Promise.all([relay.run(), relay.run()]);

    expect(first).toBe(second);
    expect(relay.bytesRelayed).toBe(2);
  });

  it("rejects a chunk size that is not a positive integer", () => {
    const source = new PassThrough();
    const { sink } = collector();

    expect(() => new RelayLink({ direction: "upstream", source, sink, chunkSize: 0, log: createLog() })).toThrow(RangeError);
  });
});
