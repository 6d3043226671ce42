/**
 * State command - Shows the cache validators stored for a channel subdirectory.
 */

import type { Command } from "commander";
import { RepodataCache } from "../../repodata/RepodataCache";
import { DEFAULT_REPODATA_FN } from "../../utils/config";
import { formatOutput, getGlobalOptions } from "../utils";

export async function stateAction(
  channelUrl: string,
  options: { repodataFn: string },
  command?: Command,
) {
  const globalOptions = getGlobalOptions(command);
  const cache = new RepodataCache(globalOptions.cacheDir);
  const { json } = cache.paths(channelUrl, options.repodataFn);
  const record = await cache.readState(channelUrl, options.repodataFn);

  console.log(formatOutput({ cachePath: json, ...record }));
}

export function createStateCommand(program: Command): Command {
  return program
    .command("state <channel-url>")
    .description("Show the cache validators currently trusted for a channel subdirectory")
    .option("--repodata-fn <filename>", "Index document name", DEFAULT_REPODATA_FN)
    .action(stateAction);
}
