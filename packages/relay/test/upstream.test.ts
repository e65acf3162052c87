import net from "node:net";
import { afterEach, describe, expect, it } from "vitest";
import {
  createUpstreamConnector,
  formatTarget,
  isSecureScheme,
  parseTargetUrl,
  resolveTarget,
  toOriginForm,
} from "../src/upstream.js";

describe("Upstream targets", () => {
  describe("parseTargetUrl", () => {
    it("applies default ports per scheme", () => {
      expect(parseTargetUrl("ws://origin.test")).toEqual({
        scheme: "ws",
        host: "origin.test",
        port: 80,
      });
      expect(parseTargetUrl("wss://origin.test/path")).toEqual({
        scheme: "wss",
        host: "origin.test",
        port: 443,
      });
      expect(parseTargetUrl("http://origin.test:8081")).toEqual({
        scheme: "http",
        host: "origin.test",
        port: 8081,
      });
    });

    it("strips brackets from IPv6 literals", () => {
      expect(parseTargetUrl("ws://[::1]:9000")).toEqual({
        scheme: "ws",
        host: "::1",
        port: 9000,
      });
    });

    it("returns null for other schemes and invalid URLs", () => {
      expect(parseTargetUrl("ftp://origin.test")).toBeNull();
      expect(parseTargetUrl("not a url")).toBeNull();
    });
  });

  describe("formatTarget", () => {
    it("brackets IPv6 hosts", () => {
      expect(formatTarget({ scheme: "ws", host: "::1", port: 9000 })).toBe(
        "ws://[::1]:9000",
      );
      expect(formatTarget({ scheme: "wss", host: "a.test", port: 443 })).toBe(
        "wss://a.test:443",
      );
    });
  });

  describe("isSecureScheme", () => {
    it("is true for wss and https", () => {
      expect(isSecureScheme("wss")).toBe(true);
      expect(isSecureScheme("https")).toBe(true);
      expect(isSecureScheme("ws")).toBe(false);
      expect(isSecureScheme("http")).toBe(false);
    });
  });

  describe("resolveTarget", () => {
    it("prefers the configured upstream", () => {
      expect(
        resolveTarget("ws://other.test/x", "host.test", "wss://fixed.test"),
      ).toEqual({ scheme: "wss", host: "fixed.test", port: 443 });
    });

    it("uses an absolute-form request target", () => {
      expect(resolveTarget("ws://other.test:81/x", "host.test")).toEqual({
        scheme: "ws",
        host: "other.test",
        port: 81,
      });
    });

    it("falls back to the Host header", () => {
      expect(resolveTarget("/chat", " host.test:3000 ")).toEqual({
        scheme: "ws",
        host: "host.test",
        port: 3000,
      });
    });

    it("returns null when nothing names an origin", () => {
      expect(resolveTarget("/chat", undefined)).toBeNull();
    });
  });

  describe("toOriginForm", () => {
    it("keeps origin-form targets", () => {
      expect(toOriginForm("/chat?room=1")).toBe("/chat?room=1");
    });

    it("converts absolute-form targets", () => {
      expect(toOriginForm("ws://other.test/chat?room=1")).toBe("/chat?room=1");
      expect(toOriginForm("http://other.test")).toBe("/");
    });
  });
});

describe("createUpstreamConnector", () => {
  let server: net.Server | null = null;

  afterEach(async () => {
    const current = server;
    server = null;
    if (current) {
      await new Promise<void>((resolve) => current.close(() => resolve()));
    }
  });

  async function listen(): Promise<number> {
    const current = net.createServer((socket) => {
      socket.end("ready");
    });
    server = current;
    await new Promise<void>((resolve) => {
      current.listen(0, "127.0.0.1", () => resolve());
    });
    const address = current.address();
    if (!address || typeof address === "string") {
      throw new Error("Server has no port");
    }
    return address.port;
  }

  it("connects over plain TCP for ws targets", async () => {
    const port = await listen();
    const connect = createUpstreamConnector();

    const socket = await connect({ scheme: "ws", host: "127.0.0.1", port });
    const received = await new Promise<string>((resolve) => {
      let data = "";
      socket.on("data", (chunk: Buffer) => {
        data += chunk.toString();
      });
      socket.on("end", () => resolve(data));
    });
    socket.destroy();

    expect(received).toBe("ready");
  });

  it("rejects when the origin refuses the connection", async () => {
    const port = await listen();
    await new Promise<void>((resolve) => {
      server?.close(() => resolve());
    });
    server = null;

    const connect = createUpstreamConnector();
    await expect(
      connect({ scheme: "ws", host: "127.0.0.1", port }),
    ).rejects.toMatchObject({ code: "ECONNREFUSED" });
  });
});
