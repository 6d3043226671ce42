import type { BigIntStats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { isInteger, isSafeNumber, parse, stringify } from "lossless-json";
import { z } from "zod";
import { DEFAULT_REPODATA_FN } from "../utils/config";
import { logger } from "../utils/logger";
import type { ValidatorRecord } from "./types";

/**
 * Keys written by older releases, mapped to their current names.
 */
const LEGACY_KEYS: Readonly<Record<string, string>> = {
  _mod: "mod",
  _etag: "etag",
  _cache_control: "cache_control",
  _url: "url",
};

const KNOWN_KEYS = new Set(["etag", "mod", "cache_control", "size", "mtime_ns", "url"]);

/**
 * On-disk shape of `.state.json`. Known keys with an unexpected type fall back
 * to their defaults; everything else passes through.
 */
const storedStateSchema = z
  .object({
    etag: z.string().catch(""),
    mod: z.string().catch(""),
    cache_control: z.string().catch(""),
    size: z.number().int().nonnegative().catch(0),
    mtime_ns: z
      .union([z.bigint(), z.number().int()])
      .catch(0n)
      .transform((value) => BigInt(value)),
    url: z.string().catch(""),
  })
  .passthrough();

export function createEmptyRecord(): ValidatorRecord {
  return {
    etag: "",
    lastModified: "",
    cacheControl: "",
    size: 0,
    mtimeNs: 0n,
    sourceUrl: "",
    extra: {},
  };
}

/**
 * Normalizes a parsed state object into a {@link ValidatorRecord}, renaming
 * legacy underscore-prefixed keys. When a legacy and a current key are both
 * present, whichever appears later wins.
 */
export function migrateRecord(raw: Record<string, unknown>): ValidatorRecord {
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    normalized[LEGACY_KEYS[key] ?? key] = value;
  }

  const parsed = storedStateSchema.parse(normalized);
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!KNOWN_KEYS.has(key)) {
      extra[key] = value;
    }
  }

  return {
    etag: parsed.etag,
    lastModified: parsed.mod,
    cacheControl: parsed.cache_control,
    size: parsed.size,
    mtimeNs: parsed.mtime_ns,
    sourceUrl: parsed.url,
    extra,
  };
}

/**
 * Converts a record to its on-disk JSON object. Extra keys come first so the
 * known keys always reflect the record. Validators the server did not send are
 * left out rather than written empty.
 */
export function serializeRecord(record: ValidatorRecord): Record<string, unknown> {
  const state: Record<string, unknown> = { ...record.extra };
  if (record.etag) {
    state.etag = record.etag;
  }
  if (record.lastModified) {
    state.mod = record.lastModified;
  }
  if (record.cacheControl) {
    state.cache_control = record.cacheControl;
  }
  state.size = record.size;
  state.mtime_ns = record.mtimeNs;
  state.url = record.sourceUrl;
  return state;
}

/**
 * Integers beyond 2^53 (nanosecond mtimes) are read as `bigint`.
 */
function parseStateNumber(value: string): number | bigint {
  return isInteger(value) && !isSafeNumber(value) ? BigInt(value) : Number.parseFloat(value);
}

/**
 * Parses state file text without losing precision on large integers.
 */
export function parseStateJson(text: string): unknown {
  return parse(text, null, parseStateNumber);
}

/**
 * Renders a state object with two-space indentation; `bigint` values are
 * written as plain JSON integers.
 */
export function stringifyStateJson(state: Record<string, unknown>): string {
  const text = stringify(state, undefined, 2);
  if (text === undefined) {
    throw new TypeError("State is not serializable to JSON");
  }
  return text;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Loads and saves the `.state.json` file that accompanies a cached
 * `repodata.json`.
 *
 * The state is only trusted while the recorded `size` and `mtime_ns` match the
 * cached artifact. If the artifact was replaced behind our back, the
 * validators are reset so the next fetch downloads the document again.
 */
export class RepodataStateStore {
  constructor(
    public readonly cachePathJson: string,
    public readonly cachePathState: string,
    public readonly repodataFn: string = DEFAULT_REPODATA_FN,
  ) {}

  /**
   * Reads the state file. Missing, unreadable or corrupt state, or a missing
   * artifact, yields an empty record.
   */
  async load(): Promise<ValidatorRecord> {
    logger.debug(`Load ${this.repodataFn} cache from ${this.cachePathState}`);

    let text: string;
    let stats: BigIntStats;
    try {
      text = await fs.readFile(this.cachePathState, "utf8");
      stats = await fs.stat(this.cachePathJson, { bigint: true });
    } catch (error) {
      if (isErrnoException(error)) {
        logger.debug(`Could not load state from ${this.cachePathState}: ${error.message}`);
        return createEmptyRecord();
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = parseStateJson(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.debug(`Ignoring corrupt state in ${this.cachePathState}: ${reason}`);
      return createEmptyRecord();
    }

    if (!isPlainObject(raw)) {
      logger.debug(`Ignoring state in ${this.cachePathState}: not a JSON object`);
      return createEmptyRecord();
    }

    const record = migrateRecord(raw);
    if (record.mtimeNs !== stats.mtimeNs || record.size !== Number(stats.size)) {
      logger.debug(
        `State in ${this.cachePathState} does not match ${this.cachePathJson}; clearing cache validators`,
      );
      record.etag = "";
      record.lastModified = "";
      record.cacheControl = "";
      record.size = 0;
    }
    return record;
  }

  /**
   * Stamps the artifact's current size and mtime into `record` and writes the
   * state file. Must run after the artifact has been written.
   */
  async save(record: ValidatorRecord): Promise<ValidatorRecord> {
    const stats = await fs.stat(this.cachePathJson, { bigint: true });
    record.size = Number(stats.size);
    record.mtimeNs = stats.mtimeNs;

    await fs.mkdir(path.dirname(this.cachePathState), { recursive: true });
    const tempPath = `${this.cachePathState}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, stringifyStateJson(serializeRecord(record)), "utf8");
    await fs.rename(tempPath, this.cachePathState);
    logger.debug(`Saved ${this.repodataFn} state to ${this.cachePathState}`);
    return record;
  }
}
