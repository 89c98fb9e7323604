import type { FSWatcher } from "chokidar";
import type { ChangeSummary } from "./entry-cache.js";
import type { FilterParams, LogQueryParams } from "./query-params.js";
import type { ReadCursor } from "./read-cursor.js";
import type { StreamEvent } from "./stream.js";
import {
  resolveLogWindowConfig,
  type LogWindowConfig,
  type LogWindowConfigInput,
} from "../config/log-window-config.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { EntryCache } from "./entry-cache.js";
import { LogWindowError } from "./errors.js";
import { FileTailer } from "./file-tailer.js";
import { LogQuery, type LogPage, type StatsReport, type StreamOptions } from "./query.js";
import { createFileWatcher } from "./watcher.js";

const log = createSubsystemLogger("log-window/engine");

export type LogWindowOptions = LogWindowConfigInput;

export type LogWindowStatus = {
  path: string;
  generation: number;
  offset: number;
  fingerprint: string | null;
  size: number;
  entries: number;
  newestId: number;
  oldestId: number | undefined;
  pollIntervalMs: number;
  running: boolean;
};

/**
 * Tails one log file into a bounded, id-indexed window and serves reads
 * from it.
 */
export class LogWindow {
  readonly config: LogWindowConfig;
  private readonly cache: EntryCache;
  private readonly tailer: FileTailer;
  private readonly query: LogQuery;
  private watcher: FSWatcher | null = null;
  private started = false;
  private closed = false;

  constructor(options: LogWindowOptions = {}) {
    this.config = resolveLogWindowConfig(options);
    this.cache = new EntryCache(this.config.capacity);
    this.tailer = new FileTailer(this.cache, {
      path: this.config.filePath,
      minPollMs: this.config.minPollMs,
      maxPollMs: this.config.maxPollMs,
      backoffFactor: this.config.backoffFactor,
      missingFileRetryMs: this.config.missingFileRetryMs,
      errorCooldownMs: this.config.errorCooldownMs,
      stopTimeoutMs: this.config.stopTimeoutMs,
    });
    this.query = new LogQuery(this.cache, this.tailer, {
      defaultPageSize: this.config.defaultPageSize,
      streamIntervalMs: this.config.streamIntervalMs,
      heartbeatIntervalMs: this.config.heartbeatIntervalMs,
    });
  }

  /**
   * Loads the file's current tail and starts following it.
   */
  async start(): Promise<void> {
    if (this.closed) {
      throw new LogWindowError("Log window is stopped");
    }
    if (this.started) {
      log.warn("Log window already started");
      return;
    }
    this.started = true;

    let admitted = 0;
    try {
      admitted = await this.tailer.loadInitial();
    } catch (err) {
      // the poll loop retries; an unknown fingerprint makes its first read a reload
      log.warn(`Initial load failed for ${this.config.filePath}: ${String(err)}`);
    }
    log.info(`Following ${this.config.filePath}`, {
      capacity: this.config.capacity,
      admitted,
    });

    if (this.config.watch) {
      this.watcher = await createFileWatcher(this.config.filePath, () => this.tailer.wake());
    }
    this.tailer.start();
  }

  /**
   * Stops watching and polling. The window keeps serving what it holds.
   */
  async stop(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
    await this.tailer.stop();
    log.info("Log window stopped");
  }

  getLogs(params: LogQueryParams = {}): LogPage {
    return this.query.getLogs(params);
  }

  getModuleHierarchy(): Record<string, string[]> {
    return this.query.getModuleHierarchy();
  }

  getStats(params: FilterParams = {}): StatsReport {
    return this.query.getStats(params);
  }

  stream(options: StreamOptions = {}): AsyncGenerator<StreamEvent> {
    return this.query.stream(options);
  }

  openCursor(lastKnownId?: number | string): ReadCursor {
    return this.query.openCursor(lastKnownId);
  }

  changesSince(lastKnownId: number | string): ChangeSummary {
    return this.query.changesSince(lastKnownId);
  }

  status(): LogWindowStatus {
    const state = this.tailer.state;
    return {
      path: state.path,
      generation: state.generation,
      offset: state.offset,
      fingerprint: state.fingerprint,
      size: this.tailer.size,
      entries: this.cache.size,
      newestId: this.cache.newestId,
      oldestId: this.cache.oldestId,
      pollIntervalMs: this.tailer.pollIntervalMs,
      running: this.tailer.isRunning,
    };
  }
}

/**
 * Creates a log window; call `start()` to begin tailing.
 */
export function createLogWindow(options: LogWindowOptions = {}): LogWindow {
  return new LogWindow(options);
}
