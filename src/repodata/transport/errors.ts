import type { TransportResponse } from "./types";

/**
 * Base class for failures raised by an HttpTransport.
 */
export class TransportError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = this.constructor.name;
  }
}

/**
 * The proxy could not be reached, refused the connection, or asked for
 * authentication.
 */
export class ProxyTransportError extends TransportError {}

/**
 * The URL or proxy uses a scheme the transport cannot handle.
 */
export class InvalidSchemaError extends TransportError {}

/**
 * The TLS handshake failed, usually on certificate verification.
 */
export class TlsTransportError extends TransportError {}

/**
 * No response was received: refused or reset connections, DNS failures,
 * timeouts.
 */
export class ConnectionTransportError extends TransportError {}

/**
 * The server answered with a status that is neither 2xx nor 304.
 */
export class HttpStatusError extends TransportError {
  constructor(
    message: string,
    public readonly response: TransportResponse,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

/**
 * Throws an {@link HttpStatusError} unless the status is 2xx or 304.
 */
export function raiseForStatus(response: TransportResponse): void {
  const { status } = response;
  if ((status >= 200 && status < 300) || status === 304) {
    return;
  }
  const category =
    status >= 500 ? "Server Error" : status >= 400 ? "Client Error" : "Unexpected Status";
  throw new HttpStatusError(
    `${status} ${category}: ${response.statusText} for url: ${response.url}`,
    response,
  );
}
