import { randomUUID } from "node:crypto";
import type { Duplex } from "node:stream";
import {
  DEFAULT_MAX_PAYLOAD_LENGTH,
  type Frame,
  type HttpRequest,
  formatFrame,
  getClientKey,
  getExtensions,
  getProtocol,
  summarizeFrame,
} from "@ws-intercept/shared";
import type { Logger } from "pino";
import { Connection } from "./connection.js";
import {
  HandshakeError,
  ProtocolError,
  type Side,
  type TransportError,
  describeError,
  formatError,
  isTransportError,
} from "./errors.js";
import {
  type CloseInfo,
  classifyFrame,
  formatCloseInfo,
} from "./frame-classifier.js";
import {
  type NegotiatedParameters,
  completeClientHandshake,
  negotiateWithServer,
} from "./handshake.js";
import {
  type UpstreamConnector,
  type UpstreamTarget,
  formatTarget,
} from "./upstream.js";

export type CloseReason =
  | "close-frame"
  | "shutdown"
  | "peer-disconnect"
  | "handshake-failed"
  | "error";

export type SessionState =
  | { status: "handshaking" }
  | { status: "relaying" }
  | { status: "closed"; reason: CloseReason };

/** How a session that got past the handshake ended */
export type SessionResult =
  | { reason: "close-frame"; side: Side; close: CloseInfo }
  | { reason: "shutdown" }
  | { reason: "peer-disconnect"; side: Side; error: TransportError };

export interface SessionOptions {
  /** Client socket, already past its HTTP request head */
  client: Duplex;
  /** Bytes the client sent after its request head */
  head?: Uint8Array;
  /** Upgrade request exactly as it should be sent to the origin */
  request: HttpRequest;
  target: UpstreamTarget;
  connect: UpstreamConnector;
  logger: Logger;
  /** Shutdown signal, polled once per multiplexing cycle */
  signal?: AbortSignal;
  /** Longest wait on socket readiness before re-checking `signal` (default: 1000) */
  pollIntervalMs?: number;
  /** Largest frame payload relayed (default: 100 MiB) */
  maxFramePayload?: number;
  id?: string;
}

interface Route {
  source: Connection;
  target: Connection;
}

type FrameStep = { type: "continue" } | { type: "stop"; close: CloseInfo };

function shutdownDuringHandshake(): HandshakeError {
  return new HandshakeError("Shutdown requested during WebSocket handshake");
}

/**
 * A single relayed WebSocket session.
 *
 * `run()` forwards the client's upgrade request to the origin, completes the
 * client's handshake with what the origin negotiated, then relays frames in
 * both directions until a CLOSE frame passes, a peer goes away, or the
 * shutdown signal is raised. Both sockets are closed when it returns.
 */
export class WebSocketSession {
  readonly id: string;
  readonly target: UpstreamTarget;
  readonly request: HttpRequest;
  readonly clientKey: string;
  readonly clientProtocol: string | undefined;
  readonly clientExtensions: string[];
  readonly startedAt = new Date();

  private state: SessionState = { status: "handshaking" };
  private started = false;
  private negotiated: NegotiatedParameters | null = null;
  private readonly client: Connection;
  private server: Connection | null = null;
  private readonly connect: UpstreamConnector;
  private readonly logger: Logger;
  private readonly signal: AbortSignal | undefined;
  private readonly pollIntervalMs: number;
  private readonly maxFramePayload: number;

  /**
   * @throws HandshakeError if the request carries no Sec-WebSocket-Key
   */
  constructor(options: SessionOptions) {
    const clientKey = getClientKey(options.request.headers);
    if (!clientKey) {
      throw new HandshakeError("Upgrade request has no Sec-WebSocket-Key");
    }

    this.id = options.id ?? randomUUID();
    this.target = options.target;
    this.request = options.request;
    this.clientKey = clientKey;
    this.clientProtocol = getProtocol(options.request.headers);
    this.clientExtensions = getExtensions(options.request.headers);
    this.client = new Connection("client", options.client, {
      initialData: options.head,
    });
    this.connect = options.connect;
    this.signal = options.signal;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.maxFramePayload =
      options.maxFramePayload ?? DEFAULT_MAX_PAYLOAD_LENGTH;
    this.logger = options.logger.child({
      sessionId: this.id,
      target: formatTarget(options.target),
    });
  }

  get currentState(): SessionState {
    return this.state;
  }

  /** Parameters the origin selected; null until the handshake succeeds */
  get negotiatedParameters(): NegotiatedParameters | null {
    return this.negotiated;
  }

  /**
   * Run the handshake and the relay loop.
   *
   * Peer disconnects and shutdown end the session normally and are reported
   * through the result.
   *
   * @throws HandshakeError if the origin does not complete the upgrade
   * @throws ProtocolError on any other failure while relaying
   */
  async run(): Promise<SessionResult> {
    if (this.started) {
      throw new Error(`Session ${this.id} has already been run`);
    }
    this.started = true;

    let server: Connection;
    try {
      server = await this.untilAborted(this.handshake());
    } catch (err) {
      this.finish("handshake-failed", false);
      if (err instanceof ProtocolError) throw err;
      throw new HandshakeError(
        `Establishing WebSocket connection with server failed: ${describeError(err)}`,
        { cause: err },
      );
    }

    this.state = { status: "relaying" };

    let result: SessionResult;
    try {
      result = await this.relay(server);
    } catch (err) {
      this.finish("error", false);
      throw err;
    }

    this.finish(result.reason, result.reason !== "peer-disconnect");
    return result;
  }

  private async handshake(): Promise<Connection> {
    this.logger.debug(
      {
        protocol: this.clientProtocol,
        extensions: this.clientExtensions,
      },
      "Connecting to origin for WebSocket upgrade",
    );

    const socket = await this.connect(this.target);
    if (this.signal?.aborted) {
      socket.destroy();
      throw shutdownDuringHandshake();
    }
    const server = new Connection("server", socket);
    this.server = server;

    const negotiated = await negotiateWithServer(
      server,
      this.request,
      this.clientKey,
    );
    await completeClientHandshake(
      this.client,
      this.request.httpVersion,
      negotiated,
    );
    this.negotiated = negotiated;

    this.logger.debug(
      { protocol: negotiated.protocol, extensions: negotiated.extensions },
      "WebSocket handshake completed",
    );
    return server;
  }

  /** Settle with `work`, or reject as soon as the shutdown signal is raised */
  private untilAborted<T>(work: Promise<T>): Promise<T> {
    const signal = this.signal;
    if (!signal) return work;
    if (signal.aborted) {
      work.catch(() => undefined);
      return Promise.reject(shutdownDuringHandshake());
    }

    let onAbort: () => void = () => {};
    const aborted = new Promise<never>((_, reject) => {
      onAbort = () => reject(shutdownDuringHandshake());
      signal.addEventListener("abort", onAbort, { once: true });
    });
    return Promise.race([work, aborted]).finally(() => {
      signal.removeEventListener("abort", onAbort);
    });
  }

  private async relay(server: Connection): Promise<SessionResult> {
    const routes: Route[] = [
      { source: this.client, target: server },
      { source: server, target: this.client },
    ];

    try {
      while (!this.signal?.aborted) {
        const ready = await this.waitReadable(routes);
        if (this.signal?.aborted) break;

        for (const route of ready) {
          const frame = await route.source.readFrame({
            maxPayloadLength: this.maxFramePayload,
          });
          const step = await this.handleFrame(frame, route);
          if (step.type === "stop") {
            return {
              reason: "close-frame",
              side: route.source.side,
              close: step.close,
            };
          }
        }
      }
    } catch (err) {
      if (isTransportError(err)) {
        this.logger.info(
          { side: err.side, err: formatError(err.cause) },
          `WebSocket connection closed unexpectedly by ${err.side}: ${describeError(err.cause)}`,
        );
        return { reason: "peer-disconnect", side: err.side, error: err };
      }
      throw new ProtocolError(
        `Error in WebSocket connection: ${describeError(err)}`,
        { cause: err },
      );
    }

    this.logger.info("Shutdown requested, ending WebSocket session");
    return { reason: "shutdown" };
  }

  /**
   * Wait until at least one connection is readable or the poll interval
   * passes, and return the routes whose source is readable, client first.
   */
  private async waitReadable(routes: Route[]): Promise<Route[]> {
    if (!routes.some((route) => route.source.isReadable)) {
      let timer: NodeJS.Timeout | undefined;
      const interval = new Promise<void>((resolve) => {
        timer = setTimeout(resolve, this.pollIntervalMs);
      });
      try {
        await Promise.race([
          ...routes.map((route) => route.source.whenReadable()),
          interval,
        ]);
      } finally {
        clearTimeout(timer);
      }
    }
    return routes.filter((route) => route.source.isReadable);
  }

  private async handleFrame(frame: Frame, route: Route): Promise<FrameStep> {
    const direction = route.source.side;
    this.logger.debug(
      { direction, frame: summarizeFrame(frame) },
      `WebSocket frame received from ${direction}: ${formatFrame(frame)}`,
    );

    const disposition = classifyFrame(frame);
    await route.target.sendFrame(frame);

    if (!disposition.terminate) {
      return { type: "continue" };
    }

    const { close } = disposition;
    this.logger.info(
      {
        direction,
        code: close.code,
        statusName: close.statusName,
        reason: close.reason,
      },
      `WebSocket connection closed: ${formatCloseInfo(close)}`,
    );
    return { type: "stop", close };
  }

  private finish(reason: CloseReason, graceful: boolean): void {
    this.state = { status: "closed", reason };
    for (const connection of [this.client, this.server]) {
      if (!connection) continue;
      if (graceful) {
        connection.end();
      } else {
        connection.destroy();
      }
    }
  }
}
