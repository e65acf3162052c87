import net from "node:net";
import type { Duplex } from "node:stream";
import tls from "node:tls";

export type UpstreamScheme = "ws" | "wss" | "http" | "https";

/** Origin server a session connects to */
export interface UpstreamTarget {
  scheme: UpstreamScheme;
  host: string;
  port: number;
}

/**
 * Opens the raw connection to an origin. Resolves once the socket is
 * connected (and, for secure schemes, the TLS handshake is done).
 */
export type UpstreamConnector = (target: UpstreamTarget) => Promise<Duplex>;

const DEFAULT_PORTS: Record<UpstreamScheme, number> = {
  ws: 80,
  http: 80,
  wss: 443,
  https: 443,
};

function isUpstreamScheme(value: string): value is UpstreamScheme {
  return value in DEFAULT_PORTS;
}

export function isSecureScheme(scheme: UpstreamScheme): boolean {
  return scheme === "wss" || scheme === "https";
}

export function formatTarget(target: UpstreamTarget): string {
  const host = target.host.includes(":") ? `[${target.host}]` : target.host;
  return `${target.scheme}://${host}:${target.port}`;
}

/**
 * Parse `ws://host:port`-style URLs (also http/https/wss). Returns null for
 * anything else.
 */
export function parseTargetUrl(value: string): UpstreamTarget | null {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return null;
  }
  const scheme = url.protocol.replace(/:$/, "");
  if (!isUpstreamScheme(scheme) || !url.hostname) return null;

  return {
    scheme,
    // URL keeps brackets around IPv6 literals
    host: url.hostname.replace(/^\[(.*)\]$/, "$1"),
    port: url.port ? Number.parseInt(url.port, 10) : DEFAULT_PORTS[scheme],
  };
}

/**
 * Work out where an upgrade request should go.
 *
 * A configured upstream wins (reverse-proxy mode). Otherwise an absolute-form
 * request target is used, then the Host header over plain `ws`.
 */
export function resolveTarget(
  requestTarget: string,
  hostHeader: string | undefined,
  upstream?: string,
): UpstreamTarget | null {
  if (upstream) {
    return parseTargetUrl(upstream);
  }
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(requestTarget)) {
    return parseTargetUrl(requestTarget);
  }
  if (hostHeader) {
    return parseTargetUrl(`ws://${hostHeader.trim()}`);
  }
  return null;
}

/**
 * Convert an absolute-form request target to origin form (`/path?query`).
 * Origin-form targets are returned unchanged.
 */
export function toOriginForm(requestTarget: string): string {
  if (requestTarget.startsWith("/")) return requestTarget;
  try {
    const url = new URL(requestTarget);
    return `${url.pathname || "/"}${url.search}`;
  } catch {
    return requestTarget;
  }
}

export interface UpstreamConnectorOptions {
  /** Give up on connecting after this long (default: 10000) */
  connectTimeoutMs?: number;
  /** Verify the origin's certificate for secure schemes (default: true) */
  rejectUnauthorized?: boolean;
}

/**
 * Default connector: plain TCP for ws/http, TLS with SNI for wss/https.
 */
export function createUpstreamConnector(
  options: UpstreamConnectorOptions = {},
): UpstreamConnector {
  const timeoutMs = options.connectTimeoutMs ?? 10_000;

  return (target) =>
    new Promise<Duplex>((resolve, reject) => {
      const secure = isSecureScheme(target.scheme);
      const socket: net.Socket = secure
        ? tls.connect({
            host: target.host,
            port: target.port,
            servername: net.isIP(target.host) ? undefined : target.host,
            rejectUnauthorized: options.rejectUnauthorized ?? true,
          })
        : net.connect({ host: target.host, port: target.port });

      const timer = setTimeout(() => {
        socket.destroy(
          new Error(
            `Connect to ${formatTarget(target)} timed out after ${timeoutMs}ms`,
          ),
        );
      }, timeoutMs);

      const onError = (err: Error) => {
        clearTimeout(timer);
        reject(err);
      };
      socket.once("error", onError);
      socket.once(secure ? "secureConnect" : "connect", () => {
        clearTimeout(timer);
        socket.off("error", onError);
        socket.setNoDelay(true);
        resolve(socket);
      });
    });
}
