import { describe, expect, it } from "vitest";
import {
  HandshakeError,
  ProtocolError,
  StreamClosedError,
  TransportError,
  describeError,
  errorCode,
  formatError,
  isTransportError,
} from "../src/errors.js";

describe("Relay errors", () => {
  const reset = Object.assign(new Error("read ECONNRESET"), {
    code: "ECONNRESET",
  });

  it("names the failing side in transport errors", () => {
    const error = new TransportError("client", reset);
    expect(error.side).toBe("client");
    expect(error.cause).toBe(reset);
    expect(error.message).toBe(
      "client connection failed: Error: read ECONNRESET (ECONNRESET)",
    );
    expect(isTransportError(error)).toBe(true);
    expect(isTransportError(reset)).toBe(false);
  });

  it("makes handshake errors protocol errors", () => {
    const error = new HandshakeError("refused");
    expect(error).toBeInstanceOf(ProtocolError);
    expect(error.name).toBe("HandshakeError");
  });

  it("reads string error codes only", () => {
    expect(errorCode(reset)).toBe("ECONNRESET");
    expect(errorCode(new StreamClosedError("gone"))).toBe("ECONNCLOSED");
    expect(errorCode(Object.assign(new Error("x"), { code: 5 }))).toBeUndefined();
    expect(errorCode("ECONNRESET")).toBeUndefined();
  });

  it("describes errors and non-errors", () => {
    expect(describeError(new ProtocolError("bad frame"))).toBe(
      "ProtocolError: bad frame",
    );
    expect(describeError("plain")).toBe("plain");
  });

  it("formats structured error fields", () => {
    expect(formatError(reset)).toEqual({
      name: "Error",
      message: "read ECONNRESET",
      code: "ECONNRESET",
    });
    expect(formatError(new RangeError("too long"))).toEqual({
      name: "RangeError",
      message: "too long",
    });
    expect(formatError(42)).toEqual({ message: "42" });
  });
});
