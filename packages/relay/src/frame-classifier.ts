import {
  type Frame,
  Opcode,
  closeCodeName,
  isControlOpcode,
} from "@ws-intercept/shared";

export const STATUS_CODE_MISSING = "(status code missing)";
export const UNKNOWN_STATUS_CODE = "unknown status code";
export const MESSAGE_MISSING = "(message missing)";

/** Status and reason carried by a CLOSE frame */
export interface CloseInfo {
  /** Absent when the payload is shorter than two bytes */
  code?: number;
  statusName: string;
  /** Absent when the payload holds nothing after the status code */
  reason?: string;
}

export type FrameKind = "data" | "ping" | "pong" | "close" | "unknown";

/**
 * What the relay does with a frame. Every frame is forwarded; `terminate`
 * says whether the session ends after forwarding it.
 */
export type FrameDisposition =
  | { kind: "data" | "ping" | "pong" | "unknown"; terminate: false }
  | { kind: "close"; terminate: true; close: CloseInfo };

/**
 * Decode the status code and reason of a CLOSE payload.
 *
 * - fewer than 2 bytes: no code, status name "(status code missing)", no reason
 * - exactly 2 bytes: big-endian code and its name, no reason
 * - more: code, name, and the remaining bytes as UTF-8
 */
export function parseCloseInfo(payload: Uint8Array): CloseInfo {
  if (payload.length < 2) {
    return { statusName: STATUS_CODE_MISSING };
  }

  const code = ((payload[0] ?? 0) << 8) | (payload[1] ?? 0);
  const info: CloseInfo = {
    code,
    statusName: closeCodeName(code) ?? UNKNOWN_STATUS_CODE,
  };
  if (payload.length > 2) {
    info.reason = new TextDecoder().decode(payload.subarray(2));
  }
  return info;
}

/**
 * Render close info the way it is logged: `1000 NORMAL_CLOSURE, bye`.
 * A CLOSE without a status code carries no reason either, so it renders as
 * the missing-code placeholder alone.
 */
export function formatCloseInfo(info: CloseInfo): string {
  if (info.code === undefined) return STATUS_CODE_MISSING;
  return `${info.code} ${info.statusName}, ${info.reason ?? MESSAGE_MISSING}`;
}

/**
 * Decide how to relay a frame. Pure: the same frame always yields an equal
 * disposition.
 *
 * Reserved control opcodes (0xB-0xF) are forwarded like any other frame.
 */
export function classifyFrame(frame: Frame): FrameDisposition {
  const { opcode } = frame.header;

  if (!isControlOpcode(opcode)) {
    return { kind: "data", terminate: false };
  }
  switch (opcode) {
    case Opcode.PING:
      return { kind: "ping", terminate: false };
    case Opcode.PONG:
      return { kind: "pong", terminate: false };
    case Opcode.CLOSE:
      return {
        kind: "close",
        terminate: true,
        close: parseCloseInfo(frame.payload),
      };
    default:
      return { kind: "unknown", terminate: false };
  }
}
