import {
  type HttpRequest,
  HttpHeaders,
  checkServerHandshake,
  getExtensions,
  getProtocol,
  getServerAccept,
  serializeRequest,
  serializeResponse,
  serverHandshakeHeaders,
  statusText,
} from "@ws-intercept/shared";
import type { Connection } from "./connection.js";
import { HandshakeError } from "./errors.js";

/** What the origin agreed to, as read from its 101 response */
export interface NegotiatedParameters {
  accept: string;
  protocol?: string;
  extensions: string[];
}

/**
 * Forward the client's upgrade request to the origin and validate the reply.
 *
 * The origin's response is read with no body size limit. Bytes the origin
 * sends after its response head stay buffered on `server` for the relay.
 *
 * @throws HandshakeError if the response is not a valid 101 for `clientKey`
 */
export async function negotiateWithServer(
  server: Connection,
  request: HttpRequest,
  clientKey: string,
): Promise<NegotiatedParameters> {
  await server.send(serializeRequest(request));
  const response = await server.readResponse({ bodySizeLimit: null });

  const check = checkServerHandshake(response, clientKey);
  if (!check.ok) {
    const headers = response.headers
      .entries()
      .map(([name, value]) => `${name}: ${value}`)
      .join("; ");
    throw new HandshakeError(
      `Establishing WebSocket connection with server failed: ${check.reason} (HTTP ${response.status}; ${headers})`,
    );
  }

  const accept = getServerAccept(response.headers);
  if (!accept) {
    throw new HandshakeError(
      "Establishing WebSocket connection with server failed: missing Sec-WebSocket-Accept",
    );
  }

  return {
    accept,
    protocol: getProtocol(response.headers),
    extensions: getExtensions(response.headers),
  };
}

/**
 * Send the 101 that completes the client's handshake, carrying the accept
 * token and whatever protocol and extensions the origin selected.
 */
export async function completeClientHandshake(
  client: Connection,
  httpVersion: string,
  negotiated: NegotiatedParameters,
): Promise<void> {
  await client.send(
    serializeResponse({
      httpVersion,
      status: 101,
      reason: statusText(101),
      headers: new HttpHeaders(
        serverHandshakeHeaders(
          negotiated.accept,
          negotiated.protocol,
          negotiated.extensions,
        ),
      ),
      body: new Uint8Array(0),
    }),
  );
}
