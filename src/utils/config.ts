/**
 * Default configuration values for fetching and caching channel index documents
 */

import { z } from "zod";

/** Filename of the index document inside a channel subdirectory */
export const DEFAULT_REPODATA_FN = "repodata.json";

/** Base URL that bare channel names resolve against */
export const DEFAULT_CHANNEL_ALIAS = "https://conda.anaconda.org";

/**
 * Well-known default distribution host. HTTP failures against it get an extra
 * note about network policies blocking the vendor's domains.
 */
export const DEFAULT_DISTRIBUTION_HOST = "https://repo.anaconda.com/";

/** Homepage referenced when a network blocks the default distribution host */
export const DISTRIBUTION_HOMEPAGE_URL = "https://www.anaconda.com";

/** Where credential and channel configuration help lives */
export const CONFIG_HELP_URL = "https://conda.io/docs/config.html";

/** Seconds allowed for establishing a connection */
export const DEFAULT_CONNECT_TIMEOUT_SECS = 9.15;

/** Seconds allowed between bytes once connected */
export const DEFAULT_READ_TIMEOUT_SECS = 60;

/** Characters of the response body included in debug logs */
export const RESPONSE_LOG_BODY_LENGTH = 256;

export interface FetchConfig {
  /** Verify TLS certificates */
  sslVerify: boolean;
  connectTimeoutSecs: number;
  readTimeoutSecs: number;
  /**
   * Treat a missing `noarch` index as an empty channel instead of an invalid one.
   */
  allowNonChannelUrls: boolean;
  channelAlias: string;
  defaultDistributionHost: string;
  helpUrl: string;
  /** Proxy for every request; `socks5://` and friends need socks-proxy-agent */
  proxyUrl?: string;
}

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const envSchema = z.object({
  REPODATA_SSL_VERIFY: booleanFlag.optional(),
  REPODATA_CONNECT_TIMEOUT_SECS: z.coerce.number().positive().optional(),
  REPODATA_READ_TIMEOUT_SECS: z.coerce.number().positive().optional(),
  REPODATA_ALLOW_NON_CHANNEL_URLS: booleanFlag.optional(),
  REPODATA_CHANNEL_ALIAS: z.string().url().optional(),
  REPODATA_PROXY: z.string().min(1).optional(),
});

export function defaultFetchConfig(): FetchConfig {
  return {
    sslVerify: true,
    connectTimeoutSecs: DEFAULT_CONNECT_TIMEOUT_SECS,
    readTimeoutSecs: DEFAULT_READ_TIMEOUT_SECS,
    allowNonChannelUrls: false,
    channelAlias: DEFAULT_CHANNEL_ALIAS,
    defaultDistributionHost: DEFAULT_DISTRIBUTION_HOST,
    helpUrl: CONFIG_HELP_URL,
  };
}

/**
 * Builds the fetch configuration from environment variables, with explicit
 * overrides (usually CLI flags) taking precedence.
 *
 * Only `REPODATA_PROXY` and the `proxyUrl` override set a proxy here. The
 * standard `*_PROXY` and `NO_PROXY` variables are left to axios, which
 * resolves them for each request URL.
 * @throws Error when an environment variable holds an invalid value.
 */
export function loadFetchConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<FetchConfig> = {},
): FetchConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  const defaults = defaultFetchConfig();

  return {
    sslVerify: overrides.sslVerify ?? vars.REPODATA_SSL_VERIFY ?? defaults.sslVerify,
    connectTimeoutSecs:
      overrides.connectTimeoutSecs ??
      vars.REPODATA_CONNECT_TIMEOUT_SECS ??
      defaults.connectTimeoutSecs,
    readTimeoutSecs:
      overrides.readTimeoutSecs ?? vars.REPODATA_READ_TIMEOUT_SECS ?? defaults.readTimeoutSecs,
    allowNonChannelUrls:
      overrides.allowNonChannelUrls ??
      vars.REPODATA_ALLOW_NON_CHANNEL_URLS ??
      defaults.allowNonChannelUrls,
    channelAlias: overrides.channelAlias ?? vars.REPODATA_CHANNEL_ALIAS ?? defaults.channelAlias,
    defaultDistributionHost:
      overrides.defaultDistributionHost ?? defaults.defaultDistributionHost,
    helpUrl: overrides.helpUrl ?? defaults.helpUrl,
    proxyUrl: overrides.proxyUrl ?? vars.REPODATA_PROXY,
  };
}
