import type { Agent } from "node:http";
import https from "node:https";
import axios, { type AxiosProxyConfig, type AxiosResponse } from "axios";
import { logger } from "../../utils/logger";
import {
  ConnectionTransportError,
  HttpStatusError,
  InvalidSchemaError,
  ProxyTransportError,
  TlsTransportError,
  TransportError,
} from "./errors";
import type { HttpTransport, TransportRequestOptions, TransportResponse } from "./types";

/**
 * Node.js / OpenSSL error codes raised for failed TLS handshakes.
 */
const TLS_ERROR_CODES = new Set([
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "CERT_UNTRUSTED",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_GET_ISSUER_CERT",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "ERR_TLS_CERT_ALTNAME_INVALID",
  "ERR_SSL_WRONG_VERSION_NUMBER",
  "EPROTO",
]);

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT", "ERR_CANCELED"]);

interface AgentSettings {
  /** Left unset so axios applies `*_PROXY` and `NO_PROXY` for the request URL */
  proxy?: AxiosProxyConfig | false;
  httpAgent?: Agent;
  httpsAgent: Agent;
}

/**
 * Lower-cases header names and flattens multi-valued headers.
 */
export function normalizeHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === "string") {
      result[name.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      result[name.toLowerCase()] = value.join(", ");
    } else if (typeof value === "number" || typeof value === "boolean") {
      result[name.toLowerCase()] = String(value);
    }
  }
  return result;
}

function toTransportResponse(
  url: string,
  response: AxiosResponse<unknown>,
  elapsedMs: number,
): TransportResponse {
  return {
    url,
    status: response.status,
    statusText: response.statusText,
    headers: normalizeHeaders(response.headers),
    body: typeof response.data === "string" ? response.data : "",
    elapsedMs,
  };
}

function errorCode(error: { code?: string; cause?: unknown }): string | undefined {
  if (error.code) {
    return error.code;
  }
  const { cause } = error;
  if (typeof cause === "object" && cause !== null && "code" in cause) {
    return typeof cause.code === "string" ? cause.code : undefined;
  }
  return undefined;
}

/**
 * Performs GET requests with axios.
 *
 * Proxies given as `http(s)://` go through axios' own proxy support; `socks*://`
 * proxies need the optional socks-proxy-agent package. Without an explicit
 * proxy, axios picks one from the environment per URL, honoring `NO_PROXY`.
 */
export class AxiosTransport implements HttpTransport {
  async get(url: string, options: TransportRequestOptions): Promise<TransportResponse> {
    if (!options.verifyTls && !options.suppressInsecureWarning) {
      logger.warn(
        `⚠️  Unverified HTTPS request to ${url}. Adding certificate verification is strongly advised.`,
      );
    }

    const agents = await this.createAgents(options);
    const startedAt = Date.now();
    try {
      const response = await axios.get<string>(url, {
        headers: options.headers,
        timeout: options.readTimeoutMs,
        signal: AbortSignal.timeout(options.connectTimeoutMs + options.readTimeoutMs),
        responseType: "text",
        validateStatus: (status) => (status >= 200 && status < 300) || status === 304,
        ...agents,
      });
      return toTransportResponse(url, response, Date.now() - startedAt);
    } catch (error) {
      throw this.classifyError(error, url, options, Date.now() - startedAt);
    }
  }

  private async createAgents(options: TransportRequestOptions): Promise<AgentSettings> {
    const httpsAgent = new https.Agent({ rejectUnauthorized: options.verifyTls });
    if (!options.proxyUrl) {
      return { httpsAgent };
    }

    let proxy: URL;
    try {
      proxy = new URL(options.proxyUrl);
    } catch (error) {
      throw new ProxyTransportError(`Invalid proxy URL: ${options.proxyUrl}`, error);
    }

    const protocol = proxy.protocol.replace(/:$/, "");
    if (protocol.startsWith("socks")) {
      const agent = await this.createSocksAgent(options.proxyUrl);
      return { proxy: false, httpAgent: agent, httpsAgent: agent };
    }
    if (protocol !== "http" && protocol !== "https") {
      throw new InvalidSchemaError(
        `No connection adapters were found for proxy '${options.proxyUrl}'`,
      );
    }

    const config: AxiosProxyConfig = {
      protocol,
      host: proxy.hostname,
      port: proxy.port ? Number(proxy.port) : protocol === "https" ? 443 : 80,
    };
    if (proxy.username) {
      config.auth = {
        username: decodeURIComponent(proxy.username),
        password: decodeURIComponent(proxy.password),
      };
    }
    return { proxy: config, httpsAgent };
  }

  private async createSocksAgent(proxyUrl: string): Promise<Agent> {
    let SocksProxyAgent: typeof import("socks-proxy-agent").SocksProxyAgent;
    try {
      ({ SocksProxyAgent } = await import("socks-proxy-agent"));
    } catch (error) {
      throw new InvalidSchemaError("Missing dependencies for SOCKS support.", error);
    }
    return new SocksProxyAgent(proxyUrl);
  }

  private classifyError(
    error: unknown,
    url: string,
    options: TransportRequestOptions,
    elapsedMs: number,
  ): Error {
    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new TransportError(String(error));
    }

    if (error.response) {
      const response = toTransportResponse(url, error.response, elapsedMs);
      if (response.status === 407) {
        return new ProxyTransportError(
          `Proxy authentication required for ${options.proxyUrl ?? url}`,
          error,
        );
      }
      return new HttpStatusError(
        `${response.status} ${response.statusText} for url: ${url}`,
        response,
        error,
      );
    }

    const code = errorCode(error);
    if ((code && TLS_ERROR_CODES.has(code)) || /certificate|SSL routines/i.test(error.message)) {
      return new TlsTransportError(error.message, error);
    }
    if (code === "ERR_INVALID_URL" || error.message.startsWith("Unsupported protocol")) {
      return new InvalidSchemaError(error.message, error);
    }
    if (options.proxyUrl && this.isProxyConnectionFailure(error.message, options.proxyUrl)) {
      return new ProxyTransportError(`Unable to connect to proxy: ${error.message}`, error);
    }
    if (code && TIMEOUT_CODES.has(code)) {
      return new ConnectionTransportError(`Request to ${url} timed out: ${error.message}`, error);
    }
    return new ConnectionTransportError(error.message, error);
  }

  private isProxyConnectionFailure(message: string, proxyUrl: string): boolean {
    try {
      const proxy = new URL(proxyUrl);
      return (
        message.includes(proxy.hostname) ||
        (proxy.port !== "" && message.includes(`:${proxy.port}`))
      );
    } catch {
      return false;
    }
  }
}
