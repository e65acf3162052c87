/**
 * Proxy server factory for both production and testing use.
 *
 * Exports a createProxyServer function that returns a listening HTTP server:
 * upgrade requests become relayed WebSocket sessions, everything else is
 * served by a small Hono app with health and status endpoints.
 */

import { type IncomingMessage, type Server, createServer } from "node:http";
import type { Duplex } from "node:stream";
import { getRequestListener } from "@hono/node-server";
import { type HttpRequest, HttpHeaders } from "@ws-intercept/shared";
import { Hono } from "hono";
import { cors } from "hono/cors";
import pino, { type Logger } from "pino";
import { describeError, formatError } from "./errors.js";
import { WebSocketSession } from "./session.js";
import { SessionManager } from "./sessions.js";
import { rejectUpgrade, validateUpgradeRequest } from "./upgrade-request.js";
import {
  type UpstreamConnector,
  createUpstreamConnector,
  formatTarget,
  resolveTarget,
  toOriginForm,
} from "./upstream.js";

export interface ProxyServerOptions {
  /** Port to listen on (default: 0 for random available port) */
  port?: number;
  /** Interface to listen on (default: 127.0.0.1) */
  host?: string;
  /** Send every upgrade to this origin instead of the requested one */
  upstream?: string;
  /** Longest wait on socket readiness before re-checking for shutdown in ms (default: 1000) */
  pollIntervalMs?: number;
  /** Origin connect timeout in ms (default: 10000) */
  connectTimeoutMs?: number;
  /** Largest frame payload relayed, in bytes (default: 100 MiB) */
  maxFramePayload?: number;
  /** Logger to use; when absent one is created from `logLevel` */
  logger?: Logger;
  /** Log level for the created logger (default: warn) */
  logLevel?: string;
  /** Disable pretty printing of the created logger (for tests) */
  disablePrettyPrint?: boolean;
  /** Replaces the default TCP/TLS connector */
  connect?: UpstreamConnector;
}

export interface ProxyServer {
  /** The underlying HTTP server */
  server: Server;
  /** The port the server is listening on */
  port: number;
  /** The Hono app instance */
  app: Hono;
  /** Live WebSocket sessions */
  sessions: SessionManager;
  /** The logger instance */
  logger: Logger;
  /** Stop every session, then close the server */
  close(): Promise<void>;
}

function createDefaultLogger(options: ProxyServerOptions): Logger {
  const level = options.logLevel ?? "warn";
  return pino({
    level,
    ...(options.disablePrettyPrint
      ? {}
      : {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
            },
          },
        }),
  });
}

/**
 * Creates a proxy server instance.
 *
 * @param options - Server configuration options
 * @returns A promise that resolves once the server is listening
 */
export async function createProxyServer(
  options: ProxyServerOptions = {},
): Promise<ProxyServer> {
  const logger = options.logger ?? createDefaultLogger(options);
  const connect =
    options.connect ??
    createUpstreamConnector({ connectTimeoutMs: options.connectTimeoutMs });
  const sessions = new SessionManager();
  const running = new Set<Promise<void>>();

  // Create Hono app for HTTP endpoints
  const app = new Hono();

  // Status endpoints are readable from browser dashboards
  app.use(
    "*",
    cors({
      origin: "*",
      allowMethods: ["GET", "OPTIONS"],
      allowHeaders: ["Content-Type"],
    }),
  );

  app.get("/health", (c) => {
    return c.json({
      status: "ok",
      uptime: process.uptime(),
      sessions: sessions.getActiveCount(),
    });
  });

  app.get("/status", (c) => {
    return c.json({
      status: "ok",
      uptime: process.uptime(),
      upstream: options.upstream ?? null,
      sessions: sessions.list(),
      memory: process.memoryUsage(),
    });
  });

  async function handleUpgrade(
    req: IncomingMessage,
    socket: Duplex,
    head: Buffer,
  ): Promise<void> {
    const requestTarget = req.url ?? "/";
    const headers = HttpHeaders.fromRaw(req.rawHeaders);
    logger.debug(
      { url: requestTarget, headers: req.headers },
      "Received upgrade request",
    );

    const decision = validateUpgradeRequest(headers);
    if (!decision.ok) {
      logger.info(
        { url: requestTarget, reason: decision.message },
        "Rejected upgrade request",
      );
      rejectUpgrade(socket, decision.status, decision.message);
      return;
    }

    const target = resolveTarget(
      requestTarget,
      headers.get("host"),
      options.upstream,
    );
    if (!target) {
      logger.info({ url: requestTarget }, "No upstream for upgrade request");
      rejectUpgrade(socket, 400, "Unable to determine upstream target");
      return;
    }

    const request: HttpRequest = {
      method: req.method ?? "GET",
      target: toOriginForm(requestTarget),
      httpVersion: req.httpVersion,
      headers,
    };

    const controller = new AbortController();
    const session = new WebSocketSession({
      client: socket,
      head,
      request,
      target,
      connect,
      logger,
      signal: controller.signal,
      pollIntervalMs: options.pollIntervalMs,
      maxFramePayload: options.maxFramePayload,
    });
    sessions.add(session, controller);
    logger.info(
      { sessionId: session.id, target: formatTarget(target) },
      "WebSocket session started",
    );

    try {
      const result = await session.run();
      logger.info(
        { sessionId: session.id, reason: result.reason },
        "WebSocket session ended",
      );
    } catch (err) {
      logger.warn(
        { sessionId: session.id, err: formatError(err) },
        describeError(err),
      );
    } finally {
      sessions.remove(session);
    }
  }

  // Create HTTP server with Hono
  const requestListener = getRequestListener(app.fetch);
  const server = createServer(requestListener);

  server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const task: Promise<void> = handleUpgrade(req, socket, head)
      .catch((err: unknown) => {
        logger.error(
          { err: formatError(err) },
          "Failed to handle upgrade request",
        );
        socket.destroy();
      })
      .finally(() => {
        running.delete(task);
      });
    running.add(task);
  });

  // Start server and wait for it to be ready
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port ?? 0, options.host ?? "127.0.0.1", () => {
      server.off("error", reject);
      const address = server.address();
      const port =
        typeof address === "object" && address
          ? address.port
          : (options.port ?? 0);

      logger.info({ port }, `Proxy listening on http://localhost:${port}`);

      resolve({
        server,
        port,
        app,
        sessions,
        logger,
        async close() {
          const stopped = sessions.stopAll();
          if (stopped > 0) {
            logger.info({ count: stopped }, "Stopping WebSocket sessions");
          }
          await Promise.allSettled(running);

          return new Promise<void>((resolveClose) => {
            server.close(() => resolveClose());
            server.closeAllConnections();
          });
        },
      });
    });
  });
}
