import type { ChangeSummary, EntryCache, EntryPredicate } from "./entry-cache.js";
import type { GenerationSource } from "./file-tailer.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { QueryValidationError } from "./errors.js";
import { categoryOf, levelOf, toEntryView, type LogEntryView } from "./parsers/index.js";
import {
  parseCursorId,
  parseFilter,
  parseLogQuery,
  parseStreamQuery,
  type EntryFilter,
  type FilterParams,
  type LogQueryParams,
  type StreamQueryParams,
} from "./query-params.js";
import { ReadCursor } from "./read-cursor.js";
import { streamEntries, type StreamEvent } from "./stream.js";

const log = createSubsystemLogger("log-window/query");

/**
 * One page of entries, shaped for a request layer to serialize as-is.
 */
export type LogPage = {
  logs: LogEntryView[];
  /** Resident entries matching the filter */
  total: number;
  /** First id the page was requested from */
  start: number;
  limit: number;
  /** True when the last returned id is older than the newest entry */
  hasMore: boolean;
};

export type StatsReport = {
  totalEntries: number;
  levelCounts: Record<string, number>;
  categoryCounts: Record<string, number>;
};

export type StreamOptions = StreamQueryParams & {
  signal?: AbortSignal;
};

export type LogQuerySettings = {
  defaultPageSize: number;
  streamIntervalMs: number;
  heartbeatIntervalMs: number;
};

/**
 * Builds a predicate for level/category filters; undefined matches all.
 */
export function filterPredicate(filter: EntryFilter): EntryPredicate | undefined {
  const { levels, categories } = filter;
  if (levels.size === 0 && categories.size === 0) {
    return undefined;
  }
  return (entry) => {
    if (levels.size > 0 && !levels.has(levelOf(entry.record))) {
      return false;
    }
    if (categories.size > 0) {
      const category = categoryOf(entry.record);
      return category !== undefined && categories.has(category);
    }
    return true;
  };
}

/**
 * Read-side facade over the entry cache: pages, stats, the category tree
 * and live streams. Parameters are validated here and never reach the
 * cache when malformed.
 */
export class LogQuery {
  private readonly cache: EntryCache;
  private readonly generations: GenerationSource;
  private readonly settings: LogQuerySettings;

  constructor(cache: EntryCache, generations: GenerationSource, settings: LogQuerySettings) {
    this.cache = cache;
    this.generations = generations;
    this.settings = settings;
  }

  getLogs(params: LogQueryParams = {}): LogPage {
    const { startId, count, filter } = this.validate(() => parseLogQuery(params));
    const limit = count ?? this.settings.defaultPageSize;
    // no start id: the most recent `limit` entries
    const start = startId ?? Math.max(0, this.cache.newestId - limit + 1);
    const predicate = filterPredicate(filter);

    const entries = this.cache.get(start, limit, predicate);
    const last = entries.at(-1);
    return {
      logs: entries.map((entry) => toEntryView(entry.id, entry.record)),
      total: this.cache.count(predicate),
      start,
      limit,
      hasMore: last !== undefined && last.id < this.cache.newestId,
    };
  }

  getModuleHierarchy(): Record<string, string[]> {
    return this.cache.hierarchySnapshot();
  }

  getStats(params: FilterParams = {}): StatsReport {
    const predicate = filterPredicate(this.validate(() => parseFilter(params)));
    const report: StatsReport = { totalEntries: 0, levelCounts: {}, categoryCounts: {} };

    this.cache.forEach((entry) => {
      if (predicate && !predicate(entry)) {
        return;
      }
      report.totalEntries++;
      const level = levelOf(entry.record);
      report.levelCounts[level] = (report.levelCounts[level] ?? 0) + 1;
      const category = categoryOf(entry.record);
      if (category) {
        report.categoryCounts[category] = (report.categoryCounts[category] ?? 0) + 1;
      }
    });
    return report;
  }

  changesSince(lastKnownId: number | string): ChangeSummary {
    return this.cache.changesSince(this.validate(() => parseCursorId(lastKnownId)));
  }

  openCursor(lastKnownId?: number | string): ReadCursor {
    const anchorId =
      lastKnownId === undefined ? undefined : this.validate(() => parseCursorId(lastKnownId));
    return ReadCursor.open(this.cache, this.generations, anchorId);
  }

  /**
   * Opens a live stream. Parameters are checked now, not on first `next()`.
   */
  stream(options: StreamOptions = {}): AsyncGenerator<StreamEvent> {
    const { signal, ...params } = options;
    const { lastKnownId, batchSize, backlog } = this.validate(() => parseStreamQuery(params));
    const anchorId = lastKnownId ?? Math.max(-1, this.cache.newestId - backlog);

    return streamEntries({
      cursor: ReadCursor.open(this.cache, this.generations, anchorId),
      intervalMs: this.settings.streamIntervalMs,
      heartbeatIntervalMs: this.settings.heartbeatIntervalMs,
      batchSize: batchSize ?? this.settings.defaultPageSize,
      signal,
    });
  }

  private validate<T>(parse: () => T): T {
    try {
      return parse();
    } catch (err) {
      if (err instanceof QueryValidationError) {
        log.debug(`Rejected query: ${err.message}`);
      }
      throw err;
    }
  }
}
