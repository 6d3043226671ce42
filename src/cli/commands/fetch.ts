/**
 * Fetch command - Refreshes the cached index document of a channel subdirectory.
 */

import type { Command } from "commander";
import { RepodataCache } from "../../repodata/RepodataCache";
import { RepodataFetcher } from "../../repodata/RepodataFetcher";
import { DEFAULT_REPODATA_FN, loadFetchConfig } from "../../utils/config";
import { formatOutput, getGlobalOptions } from "../utils";

export interface FetchCommandOptions {
  repodataFn: string;
  /** false when `--no-ssl-verify` is given */
  sslVerify: boolean;
  allowNonChannelUrls?: boolean;
  proxy?: string;
  print?: boolean;
}

export async function fetchAction(
  channelUrl: string,
  options: FetchCommandOptions,
  command?: Command,
) {
  const globalOptions = getGlobalOptions(command);

  // Flags only override the environment when they were given
  const config = loadFetchConfig(process.env, {
    sslVerify: options.sslVerify ? undefined : false,
    allowNonChannelUrls: options.allowNonChannelUrls ? true : undefined,
    proxyUrl: options.proxy,
  });

  const cache = new RepodataCache(globalOptions.cacheDir, new RepodataFetcher({ config }));
  const result = await cache.refresh(channelUrl, options.repodataFn);

  if (options.print) {
    console.log(result.content);
    return;
  }

  console.log(
    formatOutput({
      status: result.status,
      url: result.url,
      cachePath: result.cachePath,
      etag: result.record.etag,
      lastModified: result.record.lastModified,
      cacheControl: result.record.cacheControl,
    }),
  );
}

export function createFetchCommand(program: Command): Command {
  return program
    .command("fetch <channel-url>")
    .description(
      "Download the index document of a channel subdirectory unless the cached copy is current",
    )
    .option("--repodata-fn <filename>", "Index document to fetch", DEFAULT_REPODATA_FN)
    .option("--no-ssl-verify", "Skip TLS certificate verification")
    .option(
      "--allow-non-channel-urls",
      "Treat a missing noarch index as an empty channel instead of an error",
    )
    .option("--proxy <url>", "Proxy URL (http, https or socks5)")
    .option("--print", "Print the cached document instead of a summary")
    .action(fetchAction);
}
