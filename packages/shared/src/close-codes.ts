/**
 * WebSocket close status codes (RFC 6455 section 7.4 and the IANA registry).
 */
export const CloseCode = {
  NORMAL_CLOSURE: 1000,
  GOING_AWAY: 1001,
  PROTOCOL_ERROR: 1002,
  UNSUPPORTED_DATA: 1003,
  RESERVED: 1004,
  NO_STATUS_RECEIVED: 1005,
  ABNORMAL_CLOSURE: 1006,
  INVALID_PAYLOAD_DATA: 1007,
  POLICY_VIOLATION: 1008,
  MESSAGE_TOO_BIG: 1009,
  MANDATORY_EXTENSION: 1010,
  INTERNAL_ERROR: 1011,
  SERVICE_RESTART: 1012,
  TRY_AGAIN_LATER: 1013,
  BAD_GATEWAY: 1014,
  TLS_HANDSHAKE_FAILED: 1015,
} as const;

export type CloseCodeName = keyof typeof CloseCode;

const namesByCode = new Map<number, string>(
  Object.entries(CloseCode).map(([name, code]) => [code, name]),
);

/**
 * Look up the registered name of a close status code.
 */
export function closeCodeName(code: number): string | undefined {
  return namesByCode.get(code);
}
