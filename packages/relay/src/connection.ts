import type { Duplex } from "node:stream";
import {
  type DecodeOptions,
  type Frame,
  type HttpResponse,
  type ReadResponseOptions,
  encodeFrame,
  readFrame,
  readResponse,
} from "@ws-intercept/shared";
import { type Side, StreamClosedError, TransportError } from "./errors.js";
import { StreamReader, type StreamReaderOptions } from "./stream-reader.js";

/**
 * One end of a relayed WebSocket session.
 *
 * Every read and write is tagged with the connection's side: socket errors and
 * premature end of stream come out as `TransportError` carrying that side,
 * while decode errors (malformed frames or HTTP heads) pass through untouched.
 */
export class Connection {
  readonly reader: StreamReader;

  constructor(
    readonly side: Side,
    readonly socket: Duplex,
    options: StreamReaderOptions = {},
  ) {
    this.reader = new StreamReader(socket, options);
  }

  get isReadable(): boolean {
    return this.reader.isReadable;
  }

  whenReadable(): Promise<void> {
    return this.reader.whenReadable();
  }

  /** Decode exactly one frame, waiting until all of it has arrived */
  readFrame(options: DecodeOptions = {}): Promise<Frame> {
    return this.tag(readFrame(this.reader, options));
  }

  /** Read one HTTP response from this connection */
  readResponse(options: ReadResponseOptions = {}): Promise<HttpResponse> {
    return this.tag(readResponse(this.reader, options));
  }

  /** Encode and write a frame, resolving once the socket accepted it */
  sendFrame(frame: Frame): Promise<void> {
    return this.send(encodeFrame(frame));
  }

  send(data: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.socket.destroyed || this.socket.writableEnded) {
        reject(
          new TransportError(
            this.side,
            new StreamClosedError("Write after socket closed"),
          ),
        );
        return;
      }
      this.socket.write(data, (err) => {
        if (err) {
          reject(new TransportError(this.side, err));
        } else {
          resolve();
        }
      });
    });
  }

  /** Half-close after flushing pending writes */
  end(): void {
    if (!this.socket.destroyed && !this.socket.writableEnded) {
      this.socket.end();
    }
  }

  destroy(): void {
    if (!this.socket.destroyed) {
      this.socket.destroy();
    }
  }

  private async tag<T>(operation: Promise<T>): Promise<T> {
    try {
      return await operation;
    } catch (err) {
      if (err instanceof StreamClosedError) {
        throw new TransportError(this.side, err.cause ?? err);
      }
      throw err;
    }
  }
}
