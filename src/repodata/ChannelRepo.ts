import { DEFAULT_REPODATA_FN } from "../utils/config";
import { RepodataFetcher } from "./RepodataFetcher";
import type { RepodataFetchResult, RepoInterface, ValidatorRecord } from "./types";

/**
 * A channel subdirectory served over HTTP.
 */
export class ChannelRepo implements RepoInterface {
  readonly repodataFn: string;

  constructor(
    readonly url: string,
    repodataFn?: string,
    private readonly fetcher: RepodataFetcher = new RepodataFetcher(),
  ) {
    this.repodataFn = repodataFn || DEFAULT_REPODATA_FN;
  }

  repodata(record: ValidatorRecord): Promise<RepodataFetchResult> {
    return this.fetcher.fetch(this.url, this.repodataFn, record);
  }
}
