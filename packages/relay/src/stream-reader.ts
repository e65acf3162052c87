import type { Readable } from "node:stream";
import type { LineSource } from "@ws-intercept/shared";
import { StreamClosedError } from "./errors.js";

/** Buffered bytes above which the underlying stream is paused (1 MiB) */
export const DEFAULT_HIGH_WATER_MARK = 1024 * 1024;

export interface StreamReaderOptions {
  /** Bytes that were read off the stream before the reader took over */
  initialData?: Uint8Array;
  highWaterMark?: number;
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }
  return Buffer.from(String(chunk));
}

/**
 * Pull-style reader over a Node readable stream.
 *
 * Data events are buffered here; consumers await exact byte counts or a
 * delimiter. `isReadable` / `whenReadable()` give the readiness signal the
 * relay loop multiplexes on: a reader is readable when bytes are buffered,
 * the stream has ended, or the stream has failed.
 */
export class StreamReader implements LineSource {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private ended = false;
  private failure: Error | null = null;
  private paused = false;
  private waiter: { promise: Promise<void>; resolve: () => void } | null =
    null;
  private readonly highWaterMark: number;

  constructor(
    private readonly stream: Readable,
    options: StreamReaderOptions = {},
  ) {
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
    if (options.initialData && options.initialData.length > 0) {
      this.append(toBuffer(options.initialData));
    }
    if (stream.destroyed || stream.readableEnded) {
      this.ended = true;
    }

    stream.on("data", (chunk: unknown) => {
      this.append(toBuffer(chunk));
      this.notify();
    });
    stream.on("end", () => this.onEnd());
    stream.on("close", () => this.onEnd());
    stream.on("error", (err: Error) => {
      this.failure ??= err;
      this.notify();
    });
  }

  /** Bytes buffered and not yet consumed */
  get bufferedLength(): number {
    return this.buffered;
  }

  /** Whether the next read will make progress without waiting */
  get isReadable(): boolean {
    return this.buffered > 0 || this.ended || this.failure !== null;
  }

  get isClosed(): boolean {
    return this.ended || this.failure !== null;
  }

  /**
   * Resolve once the reader is readable. Never rejects: failures surface from
   * the next read.
   */
  whenReadable(): Promise<void> {
    if (this.isReadable) return Promise.resolve();
    return this.nextEvent();
  }

  async readExactly(length: number): Promise<Buffer> {
    while (this.buffered < length) {
      this.throwIfClosed(length);
      this.demand();
      await this.nextEvent();
    }
    return this.take(length);
  }

  async readUntil(delimiter: Uint8Array, maxLength: number): Promise<Buffer> {
    for (;;) {
      if (this.buffered > 0) {
        const all = this.consolidate();
        const index = all.indexOf(delimiter);
        if (index !== -1 && index + delimiter.length <= maxLength) {
          return this.take(index + delimiter.length);
        }
        if (index !== -1 || this.buffered >= maxLength) {
          throw new RangeError(
            `Delimiter not found within ${maxLength} bytes`,
          );
        }
      }
      this.throwIfClosed(maxLength);
      this.demand();
      await this.nextEvent();
    }
  }

  private throwIfClosed(wanted: number): void {
    if (this.failure) {
      throw new StreamClosedError(
        `Stream failed: ${this.failure.message}`,
        { cause: this.failure },
      );
    }
    if (this.ended) {
      throw new StreamClosedError(
        `Stream ended with ${this.buffered} of ${wanted} bytes available`,
      );
    }
  }

  /** A pending read needs more than is buffered, so let data flow again. */
  private demand(): void {
    if (this.paused) {
      this.paused = false;
      this.stream.resume();
    }
  }

  private nextEvent(): Promise<void> {
    if (!this.waiter) {
      let resolve: () => void = () => {};
      const promise = new Promise<void>((r) => {
        resolve = r;
      });
      this.waiter = { promise, resolve };
    }
    return this.waiter.promise;
  }

  private notify(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.resolve();
  }

  private onEnd(): void {
    if (this.ended) return;
    this.ended = true;
    this.notify();
  }

  private append(chunk: Buffer): void {
    if (chunk.length === 0) return;
    this.chunks.push(chunk);
    this.buffered += chunk.length;
    if (!this.paused && this.buffered >= this.highWaterMark) {
      this.paused = true;
      this.stream.pause();
    }
  }

  private consolidate(): Buffer {
    const first = this.chunks[0];
    if (this.chunks.length === 1 && first) return first;
    const all = Buffer.concat(this.chunks, this.buffered);
    this.chunks = [all];
    return all;
  }

  private take(length: number): Buffer {
    const first = this.chunks[0];
    let out: Buffer;
    if (length === 0) {
      out = Buffer.alloc(0);
    } else if (first && first.length >= length) {
      out = first.subarray(0, length);
      if (first.length === length) {
        this.chunks.shift();
      } else {
        this.chunks[0] = first.subarray(length);
      }
    } else {
      const all = Buffer.concat(this.chunks, this.buffered);
      out = all.subarray(0, length);
      const rest = all.subarray(length);
      this.chunks = rest.length > 0 ? [rest] : [];
    }
    this.buffered -= length;

    if (this.paused && this.buffered < this.highWaterMark) {
      this.paused = false;
      this.stream.resume();
    }
    return out;
  }
}
