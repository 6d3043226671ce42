/**
 * Options for one GET issued through an {@link HttpTransport}.
 */
export interface TransportRequestOptions {
  headers: Record<string, string>;
  /** Upper bound for establishing the connection, in milliseconds */
  connectTimeoutMs: number;
  /** Upper bound for socket inactivity once connected, in milliseconds */
  readTimeoutMs: number;
  /** `http(s)://` or `socks*://` proxy; no proxy when absent */
  proxyUrl?: string;
  verifyTls: boolean;
  /**
   * Skip the warning normally logged for requests made without certificate
   * verification.
   */
  suppressInsecureWarning: boolean;
}

export interface TransportResponse {
  /** URL that was requested */
  url: string;
  status: number;
  statusText: string;
  /** Header names are lower-cased */
  headers: Record<string, string>;
  body: string;
  elapsedMs: number;
}

/**
 * Capability that performs a single HTTP GET.
 *
 * Implementations resolve with responses whose status is 2xx or 304 and
 * reject with a {@link TransportError} subclass for everything else.
 */
export interface HttpTransport {
  get(url: string, options: TransportRequestOptions): Promise<TransportResponse>;
}

/**
 * Case-insensitive header lookup.
 */
export function getHeader(response: TransportResponse, name: string): string | undefined {
  return response.headers[name.toLowerCase()];
}
