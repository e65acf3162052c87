export {
  Opcode,
  type OpcodeValue,
  type Frame,
  type FrameHeader,
  type FrameSummary,
  type ByteSource,
  type DecodeOptions,
  type CreateFrameOptions,
  DEFAULT_MAX_PAYLOAD_LENGTH,
  FrameError,
  applyMask,
  createFrame,
  encodeFrame,
  formatFrame,
  isControlOpcode,
  opcodeName,
  readFrame,
  summarizeFrame,
} from "./websocket-frame.js";

export { CloseCode, type CloseCodeName, closeCodeName } from "./close-codes.js";

export {
  type HeaderPair,
  type HttpRequest,
  type HttpResponse,
  type LineSource,
  type ReadResponseOptions,
  DEFAULT_MAX_HEAD_BYTES,
  HttpHeaders,
  HttpParseError,
  parseResponseHead,
  readResponse,
  responseBodyFraming,
  serializeRequest,
  serializeResponse,
  statusText,
} from "./http1.js";

export {
  type HandshakeResponseLike,
  type ServerHandshakeCheck,
  WEBSOCKET_GUID,
  WEBSOCKET_VERSION,
  checkServerHandshake,
  createAcceptKey,
  getClientKey,
  getExtensions,
  getProtocol,
  getServerAccept,
  headerHasToken,
  serverHandshakeHeaders,
  splitHeaderList,
} from "./websocket-handshake.js";
