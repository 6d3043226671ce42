import type { EmptyChannelError } from "./errors";

/**
 * Cache validators and bookkeeping for one cached index document.
 * Persisted as `<cache>.state.json` next to the cached `<cache>.json`.
 */
export interface ValidatorRecord {
  /** ETag header of the last successful download, or "" */
  etag: string;
  /** Last-Modified header of the last successful download, or "" (stored as `mod`) */
  lastModified: string;
  /** Cache-Control header of the last successful download, or "" */
  cacheControl: string;
  /** Size in bytes of the cached artifact when the record was saved */
  size: number;
  /**
   * Modification time of the cached artifact in nanoseconds when the record
   * was saved (stored as `mtime_ns`).
   */
  mtimeNs: bigint;
  /** Channel URL the document was fetched from (stored as `url`) */
  sourceUrl: string;
  /** Unknown keys found in the state file, written back untouched */
  extra: Record<string, unknown>;
}

/**
 * Semantic result of a conditional fetch.
 */
export enum RepodataFetchStatus {
  /**
   * The server sent a new document. The record has been repopulated from the
   * response headers and should be saved once the content is on disk.
   */
  FRESH = "fresh",

  /**
   * The server answered 304. The cached document is still current and the
   * record was not touched.
   */
  NOT_MODIFIED = "not_modified",

  /**
   * The channel exists but has nothing for this subdirectory. Callers cache
   * an empty document.
   */
  EMPTY = "empty",
}

export type RepodataFetchResult =
  | { status: RepodataFetchStatus.FRESH; url: string; content: string }
  | { status: RepodataFetchStatus.NOT_MODIFIED; url: string }
  | { status: RepodataFetchStatus.EMPTY; url: string; reason: EmptyChannelError };

/**
 * Anything that can produce the index document for a given record.
 */
export interface RepoInterface {
  /**
   * Fetches the document, updating `record` in place when new content
   * arrives. The caller persists the record.
   */
  repodata(record: ValidatorRecord): Promise<RepodataFetchResult>;
}
