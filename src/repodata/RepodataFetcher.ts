import { type FetchConfig, loadFetchConfig, RESPONSE_LOG_BODY_LENGTH } from "../utils/config";
import { logger } from "../utils/logger";
import { joinUrl } from "../utils/url";
import { EmptyChannelError } from "./errors";
import { translateHttpError } from "./translateHttpError";
import { AxiosTransport } from "./transport/AxiosTransport";
import { raiseForStatus } from "./transport/errors";
import {
  getHeader,
  type HttpTransport,
  type TransportRequestOptions,
  type TransportResponse,
} from "./transport/types";
import { RepodataFetchStatus, type RepodataFetchResult, type ValidatorRecord } from "./types";

export interface RepodataFetcherOptions {
  transport?: HttpTransport;
  config?: FetchConfig;
}

/**
 * Formats a response for debug logs, truncating the body.
 */
export function describeResponse(response: TransportResponse, bodyLength: number): string {
  const headerLines = Object.entries(response.headers).map(
    ([name, value]) => `  ${name}: ${value}`,
  );
  const body =
    response.body.length > bodyLength
      ? `${response.body.slice(0, bodyLength)}... (${response.body.length} chars)`
      : response.body;
  return [
    `GET ${response.url}`,
    `${response.status} ${response.statusText} (${response.elapsedMs}ms)`,
    ...headerLines,
    "",
    body,
  ].join("\n");
}

/**
 * Issues conditional GET requests for channel index documents.
 *
 * Validators from the record become `If-None-Match` / `If-Modified-Since`
 * headers. A 304 leaves the record alone; a fresh download repopulates it
 * from the response headers so the caller can save it after writing the
 * document to disk.
 */
export class RepodataFetcher {
  private readonly transport: HttpTransport;
  private readonly config: FetchConfig;

  constructor(options: RepodataFetcherOptions = {}) {
    this.transport = options.transport ?? new AxiosTransport();
    this.config = options.config ?? loadFetchConfig();
  }

  /**
   * Fetches `filename` below the channel subdirectory `url`.
   *
   * @throws {RepodataError} for every failure other than an empty channel.
   */
  async fetch(
    url: string,
    filename: string,
    record: ValidatorRecord,
  ): Promise<RepodataFetchResult> {
    const headers: Record<string, string> = {};
    if (record.etag) {
      headers["If-None-Match"] = record.etag;
    }
    if (record.lastModified) {
      headers["If-Modified-Since"] = record.lastModified;
    }

    const target = joinUrl(url, filename);
    let response: TransportResponse;
    try {
      response = await this.transport.get(target, this.requestOptions(headers));
      logger.debug(describeResponse(response, RESPONSE_LOG_BODY_LENGTH));
      raiseForStatus(response);
    } catch (error) {
      const translated = translateHttpError(error, { url, repodataFn: filename }, this.config);
      if (translated instanceof EmptyChannelError) {
        return { status: RepodataFetchStatus.EMPTY, url: target, reason: translated };
      }
      throw translated;
    }

    if (response.status === 304) {
      logger.debug(`${target} not modified`);
      return { status: RepodataFetchStatus.NOT_MODIFIED, url: target };
    }

    record.etag = getHeader(response, "Etag") ?? "";
    record.lastModified = getHeader(response, "Last-Modified") ?? "";
    record.cacheControl = getHeader(response, "Cache-Control") ?? "";
    record.size = 0;
    record.mtimeNs = 0n;
    record.sourceUrl = url;
    record.extra = {};

    return { status: RepodataFetchStatus.FRESH, url: target, content: response.body };
  }

  private requestOptions(headers: Record<string, string>): TransportRequestOptions {
    return {
      headers,
      connectTimeoutMs: this.config.connectTimeoutSecs * 1000,
      readTimeoutMs: this.config.readTimeoutSecs * 1000,
      proxyUrl: this.config.proxyUrl,
      verifyTls: this.config.sslVerify,
      suppressInsecureWarning: !this.config.sslVerify,
    };
  }
}
