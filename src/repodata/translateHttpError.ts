import { DISTRIBUTION_HOMEPAGE_URL, type FetchConfig } from "../utils/config";
import { logger } from "../utils/logger";
import { isTlsSupported } from "../utils/platform";
import { extractToken, joinUrl, maybeUnquote, urlDirname, urlLocation } from "../utils/url";
import {
  ChannelHttpError,
  EmptyChannelError,
  InvalidChannelError,
  MissingDependencyError,
  ProxyError,
  type RepodataErrorDetails,
  ServerError,
  TlsUnavailableError,
  TlsVerificationError,
  UnauthorizedError,
} from "./errors";
import {
  ConnectionTransportError,
  HttpStatusError,
  InvalidSchemaError,
  ProxyTransportError,
  TlsTransportError,
} from "./transport/errors";

export type TranslationConfig = Pick<
  FetchConfig,
  "allowNonChannelUrls" | "channelAlias" | "defaultDistributionHost" | "helpUrl"
>;

export interface TranslationTarget {
  /** Channel subdirectory URL, e.g. `https://host/channel/noarch` */
  url: string;
  repodataFn: string;
}

export const SOCKS_DEPENDENCY = "socks-proxy-agent";

const NOARCH_SUFFIX = "/noarch";

/**
 * Converts a transport failure into the matching domain error.
 *
 * Errors that are not transport failures, and schema failures unrelated to
 * SOCKS proxies, are returned unchanged so callers can rethrow them as-is.
 */
export function translateHttpError(
  error: unknown,
  target: TranslationTarget,
  config: TranslationConfig,
): Error {
  const { url, repodataFn } = target;
  const fullUrl = joinUrl(url, repodataFn);

  if (error instanceof ProxyTransportError) {
    return new ProxyError({ url: fullUrl, cause: error });
  }

  if (error instanceof InvalidSchemaError) {
    if (error.message.includes("SOCKS")) {
      return new MissingDependencyError(
        SOCKS_DEPENDENCY,
        [
          "Your current working environment is configured to use a SOCKS proxy, but",
          `${SOCKS_DEPENDENCY} is not installed. To proceed, remove your proxy configuration,`,
          `install ${SOCKS_DEPENDENCY}, and then you can re-enable your proxy configuration.`,
        ].join("\n"),
        { url: fullUrl, cause: error },
      );
    }
    return error;
  }

  if (error instanceof TlsTransportError) {
    return isTlsSupported()
      ? new TlsVerificationError({ url: fullUrl, cause: error })
      : new TlsUnavailableError({ url: fullUrl, cause: error });
  }

  if (error instanceof HttpStatusError || error instanceof ConnectionTransportError) {
    const response = error instanceof HttpStatusError ? error.response : undefined;
    const details: RepodataErrorDetails = {
      url: fullUrl,
      statusCode: response?.status,
      reason: response?.statusText,
      elapsedMs: response?.elapsedMs,
      cause: error,
    };
    return translateStatus(details, target, config);
  }

  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}

function translateStatus(
  details: RepodataErrorDetails,
  target: TranslationTarget,
  config: TranslationConfig,
): Error {
  const { url } = target;
  const status = details.statusCode;

  if (status === 403 || status === 404) {
    const channelDetails = { ...details, channelUrl: urlDirname(url) };
    const message = `Unable to retrieve repodata (response: ${status}) for ${details.url}`;
    if (!url.replace(/\/+$/, "").endsWith(NOARCH_SUFFIX)) {
      logger.info(message);
      return new InvalidChannelError(channelDetails, config.helpUrl);
    }
    if (config.allowNonChannelUrls) {
      logger.warn(`⚠️  ${message}`);
      return new EmptyChannelError(channelDetails);
    }
    return new InvalidChannelError(channelDetails, config.helpUrl);
  }

  if (status === 401) {
    return unauthorized(details, url, config);
  }

  if (status !== undefined && status >= 500 && status < 600) {
    return new ServerError(
      [
        "A remote server error occurred when trying to retrieve this URL.",
        "",
        "A 500-type error (e.g. 500, 501, 502, 503, etc.) indicates the server failed to",
        "fulfill a valid request. The problem may be spurious, and will resolve itself if you",
        "try your request again. If the problem persists, consider notifying the maintainer",
        "of the remote server.",
      ].join("\n"),
      details,
    );
  }

  const lines = [
    "An HTTP error occurred when trying to retrieve this URL.",
    "HTTP errors are often intermittent, and a simple retry will get you on your way.",
  ];
  if (url.startsWith(config.defaultDistributionHost)) {
    lines.push(
      "",
      `If your current network has ${DISTRIBUTION_HOMEPAGE_URL} blocked, please file`,
      "a support request with your network engineering team.",
      "",
    );
  }
  lines.push(`'${maybeUnquote(url)}'`);
  return new ChannelHttpError(lines.join("\n"), details);
}

function unauthorized(
  details: RepodataErrorDetails,
  url: string,
  config: TranslationConfig,
): UnauthorizedError {
  const helpFooter = `Further configuration help can be found at <${config.helpUrl}>.`;

  const token = extractToken(url);
  if (token) {
    return new UnauthorizedError(
      "token",
      [
        `The token '${token}' given for the URL is invalid.`,
        "",
        "If this token was issued by your channel provider's client tool, you will need",
        "to use that tool to reauthenticate.",
        "",
        "If you supplied this token directly, you will need to adjust your",
        "configuration to proceed.",
        "",
        helpFooter,
      ].join("\n"),
      details,
      token,
    );
  }

  // Only matches when the URL was built from the configured alias.
  if (url.includes(urlLocation(config.channelAlias))) {
    return new UnauthorizedError(
      "channel-alias",
      [
        "The remote server has indicated you are using invalid credentials for this channel.",
        "",
        "If the remote site is anaconda.org or follows the Anaconda Server API, you",
        "will need to",
        "    (a) remove the invalid token from your system with `anaconda logout`, optionally",
        "        followed by collecting a new token with `anaconda login`, or",
        "    (b) provide a valid token directly.",
        "",
        helpFooter,
      ].join("\n"),
      details,
    );
  }

  return new UnauthorizedError(
    "credentials",
    [
      "The credentials you have provided for this URL are invalid.",
      "",
      "You will need to modify your configuration to proceed.",
      helpFooter,
    ].join("\n"),
    details,
  );
}
