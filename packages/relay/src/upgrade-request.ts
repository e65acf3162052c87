import type { Duplex } from "node:stream";
import {
  type HttpHeaders,
  WEBSOCKET_VERSION,
  getClientKey,
  headerHasToken,
  statusText,
} from "@ws-intercept/shared";

export type UpgradeDecision =
  | { ok: true; clientKey: string }
  | { ok: false; status: 400; message: string };

// Handshake header values are client-controlled; bound them before use.
const MAX_HANDSHAKE_HEADER_LEN = 256;

function singleHeader(headers: HttpHeaders, name: string): string | null {
  const values = headers.getAll(name);
  // Repeated handshake headers are ambiguous; treat them as invalid
  if (values.length !== 1) return null;
  const value = values[0];
  if (value === undefined || value.length > MAX_HANDSHAKE_HEADER_LEN) {
    return null;
  }
  return value;
}

/**
 * Check that a client request is a WebSocket version 13 upgrade.
 */
export function validateUpgradeRequest(headers: HttpHeaders): UpgradeDecision {
  const upgrade = singleHeader(headers, "upgrade");
  if (!upgrade || !headerHasToken(upgrade, "websocket")) {
    return { ok: false, status: 400, message: "Invalid WebSocket upgrade" };
  }

  const connection = singleHeader(headers, "connection");
  if (!connection || !headerHasToken(connection, "upgrade")) {
    return { ok: false, status: 400, message: "Invalid WebSocket upgrade" };
  }

  const version = singleHeader(headers, "sec-websocket-version");
  if (!version || version.trim() !== WEBSOCKET_VERSION) {
    return {
      ok: false,
      status: 400,
      message: "Unsupported Sec-WebSocket-Version (only 13 is supported)",
    };
  }

  const key = singleHeader(headers, "sec-websocket-key");
  const clientKey = key === null ? undefined : getClientKey(headers);
  if (!clientKey) {
    return {
      ok: false,
      status: 400,
      message: "Missing required header: Sec-WebSocket-Key",
    };
  }

  return { ok: true, clientKey };
}

/**
 * Answer an upgrade with a plain-text error and close the socket.
 */
export function rejectUpgrade(
  socket: Duplex,
  status: number,
  message: string,
): void {
  const body = `${message}\n`;
  const response = [
    `HTTP/1.1 ${status} ${statusText(status)}`,
    "Content-Type: text/plain; charset=utf-8",
    `Content-Length: ${Buffer.byteLength(body)}`,
    "Connection: close",
    "",
    body,
  ].join("\r\n");

  if (socket.destroyed || socket.writableEnded) return;
  socket.end(response);
}
