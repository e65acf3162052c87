/** Which end of the relay an I/O operation belongs to */
export type Side = "client" | "server";

/**
 * Failure surfaced to whoever runs a session. Carries the original error as
 * `cause`.
 */
export class ProtocolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProtocolError";
  }
}

/**
 * The origin did not complete the WebSocket upgrade. Raised before any frame
 * is relayed.
 */
export class HandshakeError extends ProtocolError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HandshakeError";
  }
}

/**
 * A socket ended before a read could be satisfied, or a write was attempted
 * on a socket that is no longer writable.
 */
export class StreamClosedError extends Error {
  readonly code = "ECONNCLOSED";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StreamClosedError";
  }
}

/**
 * Transport-level failure (reset, TLS error, premature end of stream) on one
 * side of the relay. The relay loop treats these as the peer going away.
 */
export class TransportError extends Error {
  constructor(
    public readonly side: Side,
    cause: unknown,
  ) {
    super(`${side} connection failed: ${describeError(cause)}`, { cause });
    this.name = "TransportError";
  }
}

export function isTransportError(err: unknown): err is TransportError {
  return err instanceof TransportError;
}

/** `code` of a Node system error, e.g. ECONNRESET */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Short `Name: message (CODE)` description for log lines and wrapped errors.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const code = errorCode(err);
    const suffix = code ? ` (${code})` : "";
    return `${err.name}: ${err.message}${suffix}`;
  }
  return String(err);
}

/** Structured error fields for log records */
export function formatError(err: unknown): {
  message: string;
  name?: string;
  code?: string;
} {
  if (err instanceof Error) {
    const code = errorCode(err);
    return {
      name: err.name,
      message: err.message,
      ...(code ? { code } : {}),
    };
  }
  return { message: String(err) };
}
