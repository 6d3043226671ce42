import { maybeUnquote, stripToken } from "../utils/url";

export type RepodataErrorKind =
  | "proxy"
  | "missing-dependency"
  | "tls-unavailable"
  | "tls-verification"
  | "unauthorized"
  | "server-error"
  | "http-error"
  | "invalid-channel"
  | "empty-channel";

/**
 * Structured context shared by every translated error.
 */
export interface RepodataErrorDetails {
  /** Requested URL (channel subdirectory joined with the document filename) */
  url: string;
  statusCode?: number;
  /** HTTP reason phrase */
  reason?: string;
  elapsedMs?: number;
  cause?: unknown;
}

/**
 * Base class for failures surfaced by the repodata layer.
 *
 * `message` is the full rendering for terminals; `helpMessage` is the
 * explanation alone, for callers that render the structured fields
 * themselves.
 */
export abstract class RepodataError extends Error {
  abstract readonly kind: RepodataErrorKind;
  readonly url: string;
  readonly statusCode: number | undefined;
  readonly reason: string | undefined;
  readonly elapsedMs: number | undefined;

  constructor(
    message: string,
    public readonly helpMessage: string,
    details: RepodataErrorDetails,
  ) {
    super(message, { cause: details.cause });
    this.name = this.constructor.name;
    this.url = details.url;
    this.statusCode = details.statusCode;
    this.reason = details.reason;
    this.elapsedMs = details.elapsedMs;
  }
}

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function formatElapsed(elapsedMs: number | undefined): string {
  return elapsedMs === undefined ? "-" : `${(elapsedMs / 1000).toFixed(2)}s`;
}

export class ProxyError extends RepodataError {
  readonly kind = "proxy" as const;

  constructor(details: RepodataErrorDetails) {
    const help = [
      `The proxy configured for ${maybeUnquote(details.url)} could not be used.`,
      "Check for typos and other configuration errors in any environment variables",
      "ending in '_PROXY' and in any other system-wide proxy configuration settings.",
    ].join("\n");
    super(help, help, details);
  }
}

/**
 * An optional package needed by the current configuration is not installed.
 */
export class MissingDependencyError extends RepodataError {
  readonly kind = "missing-dependency" as const;

  constructor(
    public readonly dependency: string,
    help: string,
    details: RepodataErrorDetails,
  ) {
    super(help, help, details);
  }
}

export class TlsUnavailableError extends RepodataError {
  readonly kind = "tls-unavailable" as const;

  constructor(details: RepodataErrorDetails) {
    const help = [
      "OpenSSL appears to be unavailable on this machine. OpenSSL is required to",
      "download channel index documents.",
      "",
      `Exception: ${causeMessage(details.cause)}`,
    ].join("\n");
    super(help, help, details);
  }
}

export class TlsVerificationError extends RepodataError {
  readonly kind = "tls-verification" as const;

  constructor(details: RepodataErrorDetails) {
    const help = [
      "Encountered an SSL error. Most likely a certificate verification issue.",
      "",
      `Exception: ${causeMessage(details.cause)}`,
    ].join("\n");
    super(help, help, details);
  }
}

/**
 * Renders the common `HTTP <status> <reason> for url <...>` header above a
 * help text.
 */
export function formatHttpMessage(help: string, details: RepodataErrorDetails): string {
  return [
    `HTTP ${details.statusCode ?? "000"} ${details.reason ?? "CONNECTION FAILED"} for url <${maybeUnquote(details.url)}>`,
    `Elapsed: ${formatElapsed(details.elapsedMs)}`,
    "",
    help,
  ].join("\n");
}

export type UnauthorizedVariant = "token" | "channel-alias" | "credentials";

export class UnauthorizedError extends RepodataError {
  readonly kind = "unauthorized" as const;

  constructor(
    public readonly variant: UnauthorizedVariant,
    help: string,
    details: RepodataErrorDetails,
    public readonly token?: string,
  ) {
    super(formatHttpMessage(help, details), help, details);
  }
}

export class ServerError extends RepodataError {
  readonly kind = "server-error" as const;

  constructor(help: string, details: RepodataErrorDetails) {
    super(formatHttpMessage(help, details), help, details);
  }
}

/**
 * Any HTTP or connection failure without a more specific kind.
 */
export class ChannelHttpError extends RepodataError {
  readonly kind = "http-error" as const;

  constructor(help: string, details: RepodataErrorDetails) {
    super(formatHttpMessage(help, details), help, details);
  }
}

export interface ChannelErrorDetails extends RepodataErrorDetails {
  /** URL of the channel the subdirectory belongs to */
  channelUrl: string;
}

function channelNameOf(channelUrl: string): string {
  const segments = stripToken(channelUrl).replace(/\/+$/, "").split("/");
  return segments[segments.length - 1] ?? channelUrl;
}

/**
 * The channel does not exist or refuses access. Not recoverable by retrying.
 */
export class InvalidChannelError extends RepodataError {
  readonly kind = "invalid-channel" as const;
  readonly channelUrl: string;

  constructor(details: ChannelErrorDetails, helpUrl: string) {
    const help = [
      "The channel is not accessible or is invalid.",
      "",
      "You will need to adjust your channel configuration to proceed.",
      `Further configuration help can be found at <${helpUrl}>.`,
    ].join("\n");
    const header = `HTTP ${details.statusCode ?? "000"} ${details.reason ?? "CONNECTION FAILED"} for channel ${channelNameOf(details.channelUrl)} <${maybeUnquote(stripToken(details.channelUrl))}>`;
    super(`${header}\n\n${help}`, help, details);
    this.channelUrl = details.channelUrl;
  }
}

/**
 * The channel is usable but publishes no document for this subdirectory.
 * Returned as an outcome by the fetcher; callers cache an empty document.
 */
export class EmptyChannelError extends RepodataError {
  readonly kind = "empty-channel" as const;
  readonly channelUrl: string;

  constructor(details: ChannelErrorDetails) {
    const help = `Unable to retrieve repodata (response: ${details.statusCode ?? "000"}) for ${maybeUnquote(details.url)}`;
    super(help, help, details);
    this.channelUrl = details.channelUrl;
  }
}
