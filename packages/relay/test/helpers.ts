import { Duplex } from "node:stream";
import {
  type Frame,
  HttpHeaders,
  type HttpRequest,
  encodeFrame,
} from "@ws-intercept/shared";
import pino, { type Logger } from "pino";

/**
 * One end of an in-memory socket pair. Writes arrive as reads on the peer;
 * ending or destroying one end ends the peer's readable side.
 */
export class PairedSocket extends Duplex {
  peer: PairedSocket | null = null;
  private eofDelivered = false;

  _read(): void {}

  _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    const peer = this.peer;
    if (!peer || peer.destroyed || peer.eofDelivered) {
      callback(Object.assign(new Error("write EPIPE"), { code: "EPIPE" }));
      return;
    }
    peer.push(chunk);
    callback();
  }

  _final(callback: (error?: Error | null) => void): void {
    this.peer?.deliverEof();
    callback();
  }

  _destroy(
    error: Error | null,
    callback: (error?: Error | null) => void,
  ): void {
    this.peer?.deliverEof();
    callback(error);
  }

  private deliverEof(): void {
    if (this.eofDelivered || this.destroyed) return;
    this.eofDelivered = true;
    this.push(null);
  }
}

/** Two connected sockets: `[proxySide, testSide]` */
export function socketPair(): [PairedSocket, PairedSocket] {
  const a = new PairedSocket();
  const b = new PairedSocket();
  a.peer = b;
  b.peer = a;
  return [a, b];
}

export interface LogRecord {
  level: number;
  msg: string;
  [key: string]: unknown;
}

function isLogRecord(value: unknown): value is LogRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number" &&
    "msg" in value &&
    typeof value.msg === "string"
  );
}

/** Pino logger that keeps every record in memory */
export function captureLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(line: string) {
        const record: unknown = JSON.parse(line);
        if (isLogRecord(record)) records.push(record);
      },
    },
  );
  return { logger, records };
}

export const SAMPLE_KEY = "dGhlIHNhbXBsZSBub25jZQ==";
export const SAMPLE_ACCEPT = "s3pPLMBiTxaQ9kYGzzhZRbK+xOo=";

export function upgradeRequest(
  extra: [string, string][] = [],
  target = "/chat",
): HttpRequest {
  return {
    method: "GET",
    target,
    httpVersion: "1.1",
    headers: new HttpHeaders([
      ["Host", "origin.test"],
      ["Upgrade", "websocket"],
      ["Connection", "Upgrade"],
      ["Sec-WebSocket-Key", SAMPLE_KEY],
      ["Sec-WebSocket-Version", "13"],
      ...extra,
    ]),
  };
}

export function writeFrame(socket: Duplex, frame: Frame): void {
  socket.write(encodeFrame(frame));
}

/** Promise outcome that never rejects, so later assertions can inspect it */
export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

export function settle<T>(promise: Promise<T>): Promise<Settled<T>> {
  return promise.then(
    (value): Settled<T> => ({ ok: true, value }),
    (error: unknown): Settled<T> => ({ ok: false, error }),
  );
}
