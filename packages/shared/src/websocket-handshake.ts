/**
 * Header-level helpers for the RFC 6455 opening handshake (version 13 only).
 */

import { createHash } from "node:crypto";
import type { HeaderPair, HttpHeaders } from "./http1.js";

/** Magic GUID appended to the client key when deriving the accept token */
export const WEBSOCKET_GUID = "258EAFA5-E914-47DA-95CA-C5AB0DC85B11";

export const WEBSOCKET_VERSION = "13";

/**
 * Derive `Sec-WebSocket-Accept` from `Sec-WebSocket-Key`:
 * base64(SHA-1(key + GUID)).
 */
export function createAcceptKey(clientKey: string): string {
  return createHash("sha1")
    .update(clientKey + WEBSOCKET_GUID)
    .digest("base64");
}

/**
 * Check whether a comma-separated header value contains `token`
 * (case-insensitive, surrounding whitespace ignored).
 */
export function headerHasToken(value: string, token: string): boolean {
  const needle = token.toLowerCase();
  return value.split(",").some((part) => part.trim().toLowerCase() === needle);
}

/**
 * Split a header list on commas that are not inside a quoted string.
 * Extension offers carry `;`-separated parameters whose quoted values may
 * contain commas.
 */
export function splitHeaderList(value: string): string[] {
  const items: string[] = [];
  let current = "";
  let quoted = false;

  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === '"' && value[i - 1] !== "\\") {
      quoted = !quoted;
    }
    if (ch === "," && !quoted) {
      items.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  items.push(current);

  return items.map((item) => item.trim()).filter((item) => item.length > 0);
}

export function getClientKey(headers: HttpHeaders): string | undefined {
  return headers.get("sec-websocket-key")?.trim() || undefined;
}

export function getServerAccept(headers: HttpHeaders): string | undefined {
  return headers.get("sec-websocket-accept")?.trim() || undefined;
}

/**
 * `Sec-WebSocket-Protocol` as sent. From a client this is the offered list,
 * from a server the single selected protocol.
 */
export function getProtocol(headers: HttpHeaders): string | undefined {
  const values = headers.getAll("sec-websocket-protocol");
  if (values.length === 0) return undefined;
  return values.map((v) => v.trim()).join(", ") || undefined;
}

/**
 * Every `Sec-WebSocket-Extensions` entry, across repeated header lines. The
 * entries are kept as opaque strings, parameters included.
 */
export function getExtensions(headers: HttpHeaders): string[] {
  return headers.getAll("sec-websocket-extensions").flatMap(splitHeaderList);
}

export type ServerHandshakeCheck = { ok: true } | { ok: false; reason: string };

export interface HandshakeResponseLike {
  status: number;
  headers: HttpHeaders;
}

/**
 * Validate an origin's handshake response against the client key that was
 * sent with the request.
 */
export function checkServerHandshake(
  response: HandshakeResponseLike,
  clientKey: string,
): ServerHandshakeCheck {
  if (response.status !== 101) {
    return { ok: false, reason: `unexpected status ${response.status}` };
  }

  const upgrade = response.headers.get("upgrade");
  if (!upgrade || !headerHasToken(upgrade, "websocket")) {
    return { ok: false, reason: "missing Upgrade: websocket" };
  }

  const connection = response.headers.get("connection");
  if (!connection || !headerHasToken(connection, "upgrade")) {
    return { ok: false, reason: "missing Connection: Upgrade" };
  }

  const accept = getServerAccept(response.headers);
  if (!accept) {
    return { ok: false, reason: "missing Sec-WebSocket-Accept" };
  }
  if (accept !== createAcceptKey(clientKey)) {
    return { ok: false, reason: "Sec-WebSocket-Accept does not match key" };
  }

  return { ok: true };
}

/**
 * Headers for a 101 response completing a handshake with a client.
 * Protocol and extensions are included only when negotiated.
 */
export function serverHandshakeHeaders(
  accept: string,
  protocol?: string,
  extensions: readonly string[] = [],
): HeaderPair[] {
  const headers: HeaderPair[] = [
    ["Upgrade", "websocket"],
    ["Connection", "Upgrade"],
    ["Sec-WebSocket-Accept", accept],
  ];
  if (protocol) {
    headers.push(["Sec-WebSocket-Protocol", protocol]);
  }
  if (extensions.length > 0) {
    headers.push(["Sec-WebSocket-Extensions", extensions.join(", ")]);
  }
  return headers;
}
