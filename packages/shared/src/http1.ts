/**
 * Minimal HTTP/1.1 message codec for the upgrade exchange.
 *
 * Only what relaying a handshake needs: serialize a request head, read one
 * response (head plus body), and serialize a response.
 */

import { STATUS_CODES } from "node:http";
import type { ByteSource } from "./websocket-frame.js";

export type HeaderPair = readonly [name: string, value: string];

/** Largest response head accepted from an origin (64 KiB) */
export const DEFAULT_MAX_HEAD_BYTES = 64 * 1024;

const CRLF = "\r\n";
const HEAD_TERMINATOR = new TextEncoder().encode("\r\n\r\n");
const LINE_TERMINATOR = new TextEncoder().encode("\r\n");

/** Error thrown when an HTTP message cannot be parsed */
export class HttpParseError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "INVALID_STATUS_LINE"
      | "INVALID_HEADER"
      | "INVALID_CHUNK"
      | "BODY_TOO_LARGE",
  ) {
    super(message);
    this.name = "HttpParseError";
  }
}

/**
 * Byte source that can also read up to a delimiter. Used for header lines and
 * chunk-size lines.
 */
export interface LineSource extends ByteSource {
  /**
   * Resolve with everything up to and including `delimiter`.
   * Rejects if `maxLength` bytes pass without finding it.
   */
  readUntil(delimiter: Uint8Array, maxLength: number): Promise<Uint8Array>;
}

/**
 * Ordered, case-insensitive header list. Keeps names as they were written so
 * a serialized message matches the one that was received.
 */
export class HttpHeaders {
  private readonly pairs: HeaderPair[];

  constructor(pairs: Iterable<HeaderPair> = []) {
    this.pairs = [...pairs];
  }

  /**
   * Build from a flat `[name, value, name, value, ...]` list such as
   * `IncomingMessage.rawHeaders`.
   */
  static fromRaw(raw: readonly string[]): HttpHeaders {
    const pairs: HeaderPair[] = [];
    for (let i = 0; i + 1 < raw.length; i += 2) {
      const name = raw[i];
      const value = raw[i + 1];
      if (name !== undefined && value !== undefined) {
        pairs.push([name, value]);
      }
    }
    return new HttpHeaders(pairs);
  }

  /** First value for `name` */
  get(name: string): string | undefined {
    const lower = name.toLowerCase();
    return this.pairs.find(([n]) => n.toLowerCase() === lower)?.[1];
  }

  getAll(name: string): string[] {
    const lower = name.toLowerCase();
    return this.pairs
      .filter(([n]) => n.toLowerCase() === lower)
      .map(([, v]) => v);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  entries(): HeaderPair[] {
    return [...this.pairs];
  }

  get size(): number {
    return this.pairs.length;
  }
}

export interface HttpRequest {
  method: string;
  /** Request target as it appears on the request line */
  target: string;
  /** e.g. "1.1" */
  httpVersion: string;
  headers: HttpHeaders;
  body?: Uint8Array;
}

export interface HttpResponse {
  httpVersion: string;
  status: number;
  reason: string;
  headers: HttpHeaders;
  body: Uint8Array;
}

export interface ReadResponseOptions {
  /** Cap on the status line plus headers (default: 64 KiB) */
  maxHeadBytes?: number;
  /** Cap on the body; null means unlimited (default: null) */
  bodySizeLimit?: number | null;
}

function concat(parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, p) => sum + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

function latin1(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(
    "latin1",
  );
}

function serializeHead(startLine: string, headers: HttpHeaders): string {
  let head = startLine + CRLF;
  for (const [name, value] of headers.entries()) {
    head += `${name}: ${value}${CRLF}`;
  }
  return head + CRLF;
}

/**
 * Serialize a request to HTTP/1.1 wire form.
 */
export function serializeRequest(request: HttpRequest): Uint8Array {
  const head = serializeHead(
    `${request.method} ${request.target} HTTP/${request.httpVersion}`,
    request.headers,
  );
  return concat([
    new TextEncoder().encode(head),
    request.body ?? new Uint8Array(0),
  ]);
}

/**
 * Serialize a response to HTTP/1.1 wire form. The body is written as given;
 * framing headers are the caller's responsibility.
 */
export function serializeResponse(response: HttpResponse): Uint8Array {
  const head = serializeHead(
    `HTTP/${response.httpVersion} ${response.status} ${response.reason}`,
    response.headers,
  );
  return concat([new TextEncoder().encode(head), response.body]);
}

/** Standard reason phrase for a status code */
export function statusText(status: number): string {
  return STATUS_CODES[status] ?? "Unknown";
}

/**
 * Parse a response head (status line and headers, CRLF-terminated).
 *
 * @throws HttpParseError on a malformed status line or header
 */
export function parseResponseHead(
  head: Uint8Array | string,
): Omit<HttpResponse, "body"> {
  const text = typeof head === "string" ? head : latin1(head);
  const lines = text.split(CRLF);
  const statusLine = lines[0] ?? "";

  const match = /^HTTP\/(\d+\.\d+) (\d{3})(?: (.*))?$/.exec(statusLine);
  if (!match || match[1] === undefined || match[2] === undefined) {
    throw new HttpParseError(
      `Invalid status line: ${JSON.stringify(statusLine.slice(0, 128))}`,
      "INVALID_STATUS_LINE",
    );
  }

  const pairs: HeaderPair[] = [];
  for (const line of lines.slice(1)) {
    if (line === "") continue;
    const colon = line.indexOf(":");
    if (colon <= 0) {
      throw new HttpParseError(
        `Invalid header line: ${JSON.stringify(line.slice(0, 128))}`,
        "INVALID_HEADER",
      );
    }
    pairs.push([line.slice(0, colon).trim(), line.slice(colon + 1).trim()]);
  }

  return {
    httpVersion: match[1],
    status: Number.parseInt(match[2], 10),
    reason: match[3] ?? "",
    headers: new HttpHeaders(pairs),
  };
}

/**
 * How the body of a response is delimited. Responses that frame their body
 * neither by length nor by chunking are treated as empty.
 */
export function responseBodyFraming(
  status: number,
  headers: HttpHeaders,
): { type: "none" } | { type: "length"; length: number } | { type: "chunked" } {
  if ((status >= 100 && status < 200) || status === 204 || status === 304) {
    return { type: "none" };
  }
  const transferEncoding = headers.get("transfer-encoding");
  if (transferEncoding && /(^|,)\s*chunked\s*$/i.test(transferEncoding)) {
    return { type: "chunked" };
  }
  const contentLength = headers.get("content-length");
  if (contentLength !== undefined) {
    const length = Number.parseInt(contentLength, 10);
    if (!/^\d+$/.test(contentLength.trim()) || Number.isNaN(length)) {
      throw new HttpParseError(
        `Invalid Content-Length: ${JSON.stringify(contentLength)}`,
        "INVALID_HEADER",
      );
    }
    return { type: "length", length };
  }
  return { type: "none" };
}

function checkBodySize(size: number, limit: number | null): void {
  if (limit !== null && size > limit) {
    throw new HttpParseError(
      `Response body of ${size} bytes exceeds limit of ${limit} bytes`,
      "BODY_TOO_LARGE",
    );
  }
}

async function readChunkedBody(
  source: LineSource,
  limit: number | null,
): Promise<Uint8Array> {
  const parts: Uint8Array[] = [];
  let total = 0;

  for (;;) {
    const sizeLine = latin1(
      await source.readUntil(LINE_TERMINATOR, 1024),
    ).trim();
    const sizeField = sizeLine.split(";")[0]?.trim() ?? "";
    if (!/^[0-9a-fA-F]+$/.test(sizeField)) {
      throw new HttpParseError(
        `Invalid chunk size: ${JSON.stringify(sizeLine)}`,
        "INVALID_CHUNK",
      );
    }
    const size = Number.parseInt(sizeField, 16);
    if (size === 0) break;

    total += size;
    checkBodySize(total, limit);
    parts.push(await source.readExactly(size));
    await source.readExactly(2);
  }

  // Trailer section ends with an empty line
  for (;;) {
    const line = await source.readUntil(LINE_TERMINATOR, 8192);
    if (line.length === 2) break;
  }

  return concat(parts);
}

/**
 * Read one HTTP response from a byte source. Bytes after the response stay in
 * the source.
 *
 * @throws HttpParseError on a malformed head or body
 */
export async function readResponse(
  source: LineSource,
  options: ReadResponseOptions = {},
): Promise<HttpResponse> {
  const head = await source.readUntil(
    HEAD_TERMINATOR,
    options.maxHeadBytes ?? DEFAULT_MAX_HEAD_BYTES,
  );
  const parsed = parseResponseHead(head);
  const limit = options.bodySizeLimit ?? null;

  const framing = responseBodyFraming(parsed.status, parsed.headers);
  let body: Uint8Array;
  switch (framing.type) {
    case "none":
      body = new Uint8Array(0);
      break;
    case "length":
      checkBodySize(framing.length, limit);
      body =
        framing.length > 0
          ? await source.readExactly(framing.length)
          : new Uint8Array(0);
      break;
    case "chunked":
      body = await readChunkedBody(source, limit);
      break;
  }

  return { ...parsed, body };
}
