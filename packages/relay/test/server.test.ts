import { once } from "node:events";
import type { IncomingMessage } from "node:http";
import net from "node:net";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import WebSocket, { WebSocketServer } from "ws";
import { type ProxyServer, createProxyServer } from "../src/server.js";
import { type LogRecord, captureLogger } from "./helpers.js";

/**
 * End-to-end tests: a ws client talks through the proxy to a ws echo origin,
 * all on loopback.
 */
describe("Proxy server", () => {
  let origin: WebSocketServer;
  let originPort: number;
  let proxy: ProxyServer;
  let records: LogRecord[];
  const clients: WebSocket[] = [];

  beforeEach(async () => {
    origin = new WebSocketServer({
      port: 0,
      host: "127.0.0.1",
      verifyClient: (info: { req: IncomingMessage }) =>
        info.req.url !== "/forbidden",
    });
    origin.on("connection", (ws) => {
      ws.on("message", (data, isBinary) => {
        ws.send(data, { binary: isBinary });
      });
    });
    await once(origin, "listening");
    const address = origin.address();
    if (typeof address === "string") throw new Error("Origin has no port");
    originPort = address.port;

    const capture = captureLogger();
    records = capture.records;
    proxy = await createProxyServer({
      port: 0,
      upstream: `ws://127.0.0.1:${originPort}`,
      pollIntervalMs: 20,
      logger: capture.logger,
    });
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) {
      client.terminate();
    }
    await proxy.close();
    for (const ws of origin.clients) {
      ws.terminate();
    }
    await new Promise<void>((resolve) => origin.close(() => resolve()));
  });

  function connect(path = "/echo", protocols?: string[]): WebSocket {
    const client = new WebSocket(
      `ws://127.0.0.1:${proxy.port}${path}`,
      protocols,
    );
    client.on("error", () => {});
    clients.push(client);
    return client;
  }

  function findLog(msg: string): LogRecord | undefined {
    return records.find((r) => r.msg === msg);
  }

  describe("HTTP endpoints", () => {
    it("serves /health", async () => {
      const res = await proxy.app.request("/health", {
        headers: { Origin: "http://dashboard.test" },
      });
      expect(res.status).toBe(200);
      expect(res.headers.get("access-control-allow-origin")).toBe("*");
      expect(await res.json()).toMatchObject({ status: "ok", sessions: 0 });
    });

    it("answers /health over the listening socket", async () => {
      const res = await fetch(`http://127.0.0.1:${proxy.port}/health`);
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: "ok" });
    });

    it("lists live sessions on /status", async () => {
      const client = connect();
      await once(client, "open");

      await vi.waitFor(async () => {
        const res = await proxy.app.request("/status");
        const body: unknown = await res.json();
        expect(body).toMatchObject({
          status: "ok",
          upstream: `ws://127.0.0.1:${originPort}`,
          sessions: [
            { target: `ws://127.0.0.1:${originPort}`, state: "relaying" },
          ],
        });
      });
    });
  });

  describe("WebSocket relaying", () => {
    it("relays messages to the origin and back", async () => {
      const client = connect();
      await once(client, "open");

      client.send("hello");
      const [text] = await once(client, "message");
      expect(String(text)).toBe("hello");

      client.send(Buffer.from([1, 2, 3]));
      const [binary, isBinary] = await once(client, "message");
      expect(isBinary).toBe(true);
      expect(Buffer.from(binary)).toEqual(Buffer.from([1, 2, 3]));
    });

    it("passes the negotiated subprotocol through", async () => {
      const client = connect("/echo", ["chat", "superchat"]);
      await once(client, "open");
      expect(client.protocol).toBe("chat");
    });

    it("ends the session after a close frame", async () => {
      const client = connect();
      await once(client, "open");

      client.close(1000, "done");
      await once(client, "close");

      await vi.waitFor(() => {
        expect(
          findLog("WebSocket connection closed: 1000 NORMAL_CLOSURE, done"),
        ).toMatchObject({ direction: "client", code: 1000 });
        expect(findLog("WebSocket session ended")).toMatchObject({
          reason: "close-frame",
        });
      });
      expect(proxy.sessions.getActiveCount()).toBe(0);
    });

    it("closes the client when the origin refuses the upgrade", async () => {
      const client = connect("/forbidden");
      const [code] = await once(client, "close");
      expect(code).toBe(1006);

      await vi.waitFor(() => {
        const failure = records.find((r) =>
          r.msg.startsWith(
            "HandshakeError: Establishing WebSocket connection with server failed: unexpected status 401",
          ),
        );
        expect(failure).toMatchObject({ level: 40 });
      });
    });

    it("rejects upgrades with an unsupported version", async () => {
      const socket = net.connect(proxy.port, "127.0.0.1");
      await once(socket, "connect");
      socket.write(
        [
          "GET /echo HTTP/1.1",
          `Host: 127.0.0.1:${proxy.port}`,
          "Upgrade: websocket",
          "Connection: Upgrade",
          "Sec-WebSocket-Version: 8",
          "Sec-WebSocket-Key: dGhlIHNhbXBsZSBub25jZQ==",
          "",
          "",
        ].join("\r\n"),
      );

      let response = "";
      socket.on("data", (chunk: Buffer) => {
        response += chunk.toString("latin1");
      });
      await once(socket, "end");
      socket.destroy();

      expect(response).toBe(
        [
          "HTTP/1.1 400 Bad Request",
          "Content-Type: text/plain; charset=utf-8",
          "Content-Length: 57",
          "Connection: close",
          "",
          "Unsupported Sec-WebSocket-Version (only 13 is supported)\n",
        ].join("\r\n"),
      );
    });

    it("stops live sessions when the proxy closes", async () => {
      const client = connect();
      await once(client, "open");
      await vi.waitFor(() => expect(proxy.sessions.getActiveCount()).toBe(1));

      const closed = once(client, "close");
      await proxy.close();
      await closed;

      expect(proxy.sessions.getActiveCount()).toBe(0);
      expect(
        findLog("Shutdown requested, ending WebSocket session"),
      ).toBeDefined();
    });
  });
});

describe("Proxy server with an origin that never answers", () => {
  let silent: net.Server;
  const accepted: net.Socket[] = [];

  beforeEach(async () => {
    silent = net.createServer((socket) => {
      accepted.push(socket);
    });
    silent.listen(0, "127.0.0.1");
    await once(silent, "listening");
  });

  afterEach(async () => {
    for (const socket of accepted.splice(0)) {
      socket.destroy();
    }
    await new Promise<void>((resolve) => silent.close(() => resolve()));
  });

  it("closes while a session is still waiting for the upgrade response", async () => {
    const address = silent.address();
    if (address === null || typeof address === "string") {
      throw new Error("Origin has no port");
    }
    const { logger, records } = captureLogger();
    const proxy = await createProxyServer({
      port: 0,
      upstream: `ws://127.0.0.1:${address.port}`,
      pollIntervalMs: 20,
      logger,
    });

    const requested = new Promise<void>((resolve) => {
      silent.once("connection", (socket: net.Socket) => {
        socket.once("data", () => resolve());
      });
    });
    const client = new WebSocket(`ws://127.0.0.1:${proxy.port}/echo`);
    client.on("error", () => {});
    const closed = once(client, "close");

    await requested;
    expect(proxy.sessions.getActiveCount()).toBe(1);

    await proxy.close();
    const [code] = await closed;

    expect(code).toBe(1006);
    expect(proxy.sessions.getActiveCount()).toBe(0);
    expect(
      records.find(
        (r) => r.msg === "HandshakeError: Shutdown requested during WebSocket handshake",
      ),
    ).toMatchObject({ level: 40 });
  });
});

