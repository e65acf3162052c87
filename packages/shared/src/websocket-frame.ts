/**
 * RFC 6455 frame codec.
 *
 * Wire layout:
 * [1 bit: FIN][3 bits: RSV1-3][4 bits: opcode]
 * [1 bit: MASK][7 bits: length]
 * [0, 2 or 8 bytes: extended length, big-endian]
 * [0 or 4 bytes: masking key]
 * [payload]
 *
 * Decoded frames keep their masking key and hold the unmasked payload, so
 * encoding a decoded frame reproduces the bytes it was read from.
 */

import { randomBytes } from "node:crypto";

/** Opcode values defined by RFC 6455 */
export const Opcode = {
  CONTINUATION: 0x0,
  TEXT: 0x1,
  BINARY: 0x2,
  CLOSE: 0x8,
  PING: 0x9,
  PONG: 0xa,
} as const;

export type OpcodeValue = (typeof Opcode)[keyof typeof Opcode];

/** Largest payload a frame may declare unless the caller says otherwise (100 MiB) */
export const DEFAULT_MAX_PAYLOAD_LENGTH = 100 * 1024 * 1024;

export interface FrameHeader {
  fin: boolean;
  rsv1: boolean;
  rsv2: boolean;
  rsv3: boolean;
  /** 4-bit opcode, including reserved values */
  opcode: number;
  masked: boolean;
  /** 4-byte key, present when `masked` is set */
  maskingKey?: Uint8Array;
  payloadLength: number;
}

export interface Frame {
  header: FrameHeader;
  /** Unmasked payload bytes */
  payload: Uint8Array;
}

/** Error thrown when a frame cannot be decoded or encoded */
export class FrameError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "INVALID_LENGTH"
      | "PAYLOAD_TOO_LARGE"
      | "MISSING_MASKING_KEY",
  ) {
    super(message);
    this.name = "FrameError";
  }
}

/**
 * Pull-based byte source the decoder reads from. Implementations wait until
 * `length` bytes are available and reject if the stream ends first.
 */
export interface ByteSource {
  readExactly(length: number): Promise<Uint8Array>;
}

export interface DecodeOptions {
  /** Reject frames declaring a longer payload (default: 100 MiB) */
  maxPayloadLength?: number;
}

const OPCODE_NAMES: Record<number, string> = {
  [Opcode.CONTINUATION]: "CONTINUATION",
  [Opcode.TEXT]: "TEXT",
  [Opcode.BINARY]: "BINARY",
  [Opcode.CLOSE]: "CLOSE",
  [Opcode.PING]: "PING",
  [Opcode.PONG]: "PONG",
};

/**
 * Name of an opcode, or `RESERVED(0x3)` style for values RFC 6455 leaves open.
 */
export function opcodeName(opcode: number): string {
  return OPCODE_NAMES[opcode] ?? `RESERVED(0x${opcode.toString(16)})`;
}

/** Control frames have the high opcode bit set */
export function isControlOpcode(opcode: number): boolean {
  return (opcode & 0x8) !== 0;
}

/** XOR `payload` with a 4-byte masking key. Masking is its own inverse. */
export function applyMask(payload: Uint8Array, key: Uint8Array): Uint8Array {
  const out = new Uint8Array(payload.length);
  for (let i = 0; i < payload.length; i++) {
    out[i] = (payload[i] ?? 0) ^ (key[i % 4] ?? 0);
  }
  return out;
}

interface HeaderPrefix {
  fin: boolean;
  rsv1: boolean;
  rsv2: boolean;
  rsv3: boolean;
  opcode: number;
  masked: boolean;
  /** The 7-bit length field: 0-125 literal, 126 = 16-bit, 127 = 64-bit */
  lengthCode: number;
}

function parsePrefix(b0: number, b1: number): HeaderPrefix {
  return {
    fin: (b0 & 0x80) !== 0,
    rsv1: (b0 & 0x40) !== 0,
    rsv2: (b0 & 0x20) !== 0,
    rsv3: (b0 & 0x10) !== 0,
    opcode: b0 & 0x0f,
    masked: (b1 & 0x80) !== 0,
    lengthCode: b1 & 0x7f,
  };
}

function extendedLengthSize(lengthCode: number): number {
  if (lengthCode === 126) return 2;
  if (lengthCode === 127) return 8;
  return 0;
}

function readExtendedLength(bytes: Uint8Array, lengthCode: number): number {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (lengthCode === 126) {
    return view.getUint16(0);
  }
  const high = view.getUint32(0);
  const low = view.getUint32(4);
  if (high & 0x80000000) {
    throw new FrameError(
      "Most significant bit of 64-bit payload length is set",
      "INVALID_LENGTH",
    );
  }
  // 2^53 - 1 is the largest length a JS number represents exactly
  if (high > 0x1fffff) {
    throw new FrameError(
      `Payload length exceeds ${Number.MAX_SAFE_INTEGER} bytes`,
      "INVALID_LENGTH",
    );
  }
  return high * 0x100000000 + low;
}

function checkPayloadLength(length: number, options: DecodeOptions): void {
  const max = options.maxPayloadLength ?? DEFAULT_MAX_PAYLOAD_LENGTH;
  if (length > max) {
    throw new FrameError(
      `Frame payload of ${length} bytes exceeds limit of ${max} bytes`,
      "PAYLOAD_TOO_LARGE",
    );
  }
}

/**
 * Read exactly one frame from a byte source.
 *
 * Issues several reads (prefix, extended length, masking key, payload) and
 * resolves only once the whole frame has arrived.
 *
 * @throws FrameError if the header declares an invalid or oversized length
 */
export async function readFrame(
  source: ByteSource,
  options: DecodeOptions = {},
): Promise<Frame> {
  const prefixBytes = await source.readExactly(2);
  const prefix = parsePrefix(prefixBytes[0] ?? 0, prefixBytes[1] ?? 0);

  let payloadLength = prefix.lengthCode;
  const extSize = extendedLengthSize(prefix.lengthCode);
  if (extSize > 0) {
    payloadLength = readExtendedLength(
      await source.readExactly(extSize),
      prefix.lengthCode,
    );
  }
  checkPayloadLength(payloadLength, options);

  const maskingKey = prefix.masked ? await source.readExactly(4) : undefined;
  const raw =
    payloadLength > 0
      ? await source.readExactly(payloadLength)
      : new Uint8Array(0);

  return {
    header: {
      fin: prefix.fin,
      rsv1: prefix.rsv1,
      rsv2: prefix.rsv2,
      rsv3: prefix.rsv3,
      opcode: prefix.opcode,
      masked: prefix.masked,
      maskingKey,
      payloadLength,
    },
    payload: maskingKey ? applyMask(raw, maskingKey) : raw,
  };
}

/**
 * Encode a frame to its wire form. The payload length is taken from
 * `frame.payload` and written in the shortest form RFC 6455 allows.
 *
 * @throws FrameError if the frame is masked but carries no masking key
 */
export function encodeFrame(frame: Frame): Uint8Array {
  const { header, payload } = frame;
  const length = payload.length;

  let maskingKey: Uint8Array | undefined;
  if (header.masked) {
    if (!header.maskingKey || header.maskingKey.length !== 4) {
      throw new FrameError(
        "Masked frame has no 4-byte masking key",
        "MISSING_MASKING_KEY",
      );
    }
    maskingKey = header.maskingKey;
  }

  const extSize = length < 126 ? 0 : length <= 0xffff ? 2 : 8;
  const headerSize = 2 + extSize + (maskingKey ? 4 : 0);
  const out = new Uint8Array(headerSize + length);
  const view = new DataView(out.buffer);

  out[0] =
    (header.fin ? 0x80 : 0) |
    (header.rsv1 ? 0x40 : 0) |
    (header.rsv2 ? 0x20 : 0) |
    (header.rsv3 ? 0x10 : 0) |
    (header.opcode & 0x0f);

  const maskBit = maskingKey ? 0x80 : 0;
  if (extSize === 0) {
    out[1] = maskBit | length;
  } else if (extSize === 2) {
    out[1] = maskBit | 126;
    view.setUint16(2, length);
  } else {
    out[1] = maskBit | 127;
    view.setUint32(2, Math.floor(length / 0x100000000));
    view.setUint32(6, length >>> 0);
  }

  let offset = 2 + extSize;
  if (maskingKey) {
    out.set(maskingKey, offset);
    offset += 4;
    out.set(applyMask(payload, maskingKey), offset);
  } else {
    out.set(payload, offset);
  }

  return out;
}

export interface CreateFrameOptions {
  fin?: boolean;
  /** Mask with this key, or with a random key when `true` */
  mask?: Uint8Array | boolean;
}

/**
 * Build a frame from an opcode and unmasked payload.
 */
export function createFrame(
  opcode: number,
  payload: Uint8Array | string = new Uint8Array(0),
  options: CreateFrameOptions = {},
): Frame {
  const bytes =
    typeof payload === "string" ? new TextEncoder().encode(payload) : payload;
  const maskingKey =
    options.mask === true
      ? new Uint8Array(randomBytes(4))
      : options.mask instanceof Uint8Array
        ? options.mask
        : undefined;

  return {
    header: {
      fin: options.fin ?? true,
      rsv1: false,
      rsv2: false,
      rsv3: false,
      opcode: opcode & 0x0f,
      masked: maskingKey !== undefined,
      maskingKey,
      payloadLength: bytes.length,
    },
    payload: bytes,
  };
}

/** Structured, log-friendly view of a frame */
export interface FrameSummary {
  opcode: string;
  fin: boolean;
  rsv: string;
  masked: boolean;
  length: number;
}

export function summarizeFrame(frame: Frame): FrameSummary {
  const { header } = frame;
  return {
    opcode: opcodeName(header.opcode),
    fin: header.fin,
    rsv: `${header.rsv1 ? 1 : 0}${header.rsv2 ? 1 : 0}${header.rsv3 ? 1 : 0}`,
    masked: header.masked,
    length: frame.payload.length,
  };
}

/**
 * One-line description, e.g. `TEXT fin=1 rsv=000 masked=1 length=5`.
 */
export function formatFrame(frame: Frame): string {
  const s = summarizeFrame(frame);
  return `${s.opcode} fin=${s.fin ? 1 : 0} rsv=${s.rsv} masked=${s.masked ? 1 : 0} length=${s.length}`;
}
