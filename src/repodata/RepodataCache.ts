import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import envPaths from "env-paths";
import { DEFAULT_REPODATA_FN } from "../utils/config";
import { logger } from "../utils/logger";
import { ChannelRepo } from "./ChannelRepo";
import { RepodataFetcher } from "./RepodataFetcher";
import { createEmptyRecord, RepodataStateStore } from "./RepodataState";
import { RepodataFetchStatus, type ValidatorRecord } from "./types";

/** Document cached when a channel has nothing for a subdirectory */
const EMPTY_REPODATA = "{}";

export interface CachePaths {
  /** Cached index document */
  json: string;
  /** Validator state beside it */
  state: string;
}

export interface RefreshResult {
  status: RepodataFetchStatus;
  /** Requested document URL */
  url: string;
  /** Document as stored in the cache */
  content: string;
  record: ValidatorRecord;
  cachePath: string;
  statePath: string;
}

/**
 * First eight hex digits of the MD5 of the channel subdirectory URL (with a
 * trailing slash), followed by the document filename when it is not the
 * default one.
 */
export function cacheKey(url: string, repodataFn: string = DEFAULT_REPODATA_FN): string {
  let key = url.endsWith("/") ? url : `${url}/`;
  if (repodataFn !== DEFAULT_REPODATA_FN) {
    key += repodataFn;
  }
  return createHash("md5").update(key, "utf8").digest("hex").slice(0, 8);
}

export function cachePaths(
  cacheDir: string,
  url: string,
  repodataFn: string = DEFAULT_REPODATA_FN,
): CachePaths {
  const key = cacheKey(url, repodataFn);
  return {
    json: path.join(cacheDir, `${key}.json`),
    state: path.join(cacheDir, `${key}.state.json`),
  };
}

export function defaultCacheDir(): string {
  return envPaths("repodata-cache", { suffix: "" }).cache;
}

/**
 * Keeps a directory of cached index documents current.
 *
 * Each refresh loads the stored validators, asks the channel for the document
 * conditionally, and writes whatever came back before saving the validators,
 * so the recorded size and mtime always describe the file on disk.
 *
 * Without an injected fetcher, one is built from the environment on the first
 * refresh, so reading state never depends on the fetch configuration.
 */
export class RepodataCache {
  constructor(
    public readonly cacheDir: string = defaultCacheDir(),
    private fetcher?: RepodataFetcher,
  ) {}

  paths(url: string, repodataFn: string = DEFAULT_REPODATA_FN): CachePaths {
    return cachePaths(this.cacheDir, url, repodataFn);
  }

  /**
   * Returns the validators currently trusted for `url`.
   */
  async readState(url: string, repodataFn: string = DEFAULT_REPODATA_FN): Promise<ValidatorRecord> {
    const { json, state } = this.paths(url, repodataFn);
    return new RepodataStateStore(json, state, repodataFn).load();
  }

  async refresh(url: string, repodataFn: string = DEFAULT_REPODATA_FN): Promise<RefreshResult> {
    const { json, state } = this.paths(url, repodataFn);
    const store = new RepodataStateStore(json, state, repodataFn);
    const record = await store.load();
    this.fetcher ??= new RepodataFetcher();
    const repo = new ChannelRepo(url, repodataFn, this.fetcher);

    const result = await repo.repodata(record);
    const base = { status: result.status, url: result.url, cachePath: json, statePath: state };

    switch (result.status) {
      case RepodataFetchStatus.FRESH: {
        await this.writeDocument(json, result.content);
        await store.save(record);
        logger.info(`Cached ${result.url} (${record.size} bytes)`);
        return { ...base, content: result.content, record };
      }
      case RepodataFetchStatus.NOT_MODIFIED: {
        const content = await fs.readFile(json, "utf8");
        logger.info(`${result.url} is up to date`);
        return { ...base, content, record };
      }
      case RepodataFetchStatus.EMPTY: {
        Object.assign(record, createEmptyRecord(), { sourceUrl: url });
        await this.writeDocument(json, EMPTY_REPODATA);
        await store.save(record);
        return { ...base, content: EMPTY_REPODATA, record };
      }
    }
  }

  private async writeDocument(filePath: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, content, "utf8");
    await fs.rename(tempPath, filePath);
  }
}
