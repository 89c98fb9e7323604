/**
 * Log window: a rotation-aware tail of one log file, held in memory.
 *
 * Lines are decoded into records, given monotonic ids and kept in a bounded
 * ring buffer. Readers page through it, stream from it with a cursor, or
 * inspect the category tree. Rotation, truncation and deletion of the file
 * reset the window without stopping the tail.
 *
 * @example
 * ```ts
 * import { createLogWindow } from "log-window";
 *
 * const window = createLogWindow({ filePath: "/var/log/app.jsonl", capacity: 5000 });
 * await window.start();
 *
 * const page = window.getLogs({ count: 50, level: ["ERROR"] });
 * console.log(page.logs, page.hasMore);
 *
 * const controller = new AbortController();
 * for await (const event of window.stream({ signal: controller.signal })) {
 *   if (event.type === "entries") {
 *     console.log(event.entries);
 *   }
 * }
 *
 * await window.stop();
 * ```
 */

// Engine
export {
  LogWindow,
  createLogWindow,
  type LogWindowOptions,
  type LogWindowStatus,
} from "./engine.js";

// Cache
export {
  EntryCache,
  type CacheEntry,
  type ChangeSummary,
  type EntryPredicate,
} from "./entry-cache.js";
export { HIERARCHY_ROOT, ModuleHierarchy } from "./module-hierarchy.js";

// Tailing
export {
  FileTailer,
  type FileState,
  type FileTailerOptions,
  type GenerationSource,
  type PollOutcome,
} from "./file-tailer.js";
export {
  fingerprintOf,
  readAppendedLines,
  readLastLines,
  statFile,
  type TailReadResult,
} from "./tail-reader.js";
export { createFileWatcher, type FileChangeCallback, type FileChangeType } from "./watcher.js";

// Readers
export { ReadCursor, type CursorState } from "./read-cursor.js";
export {
  LogQuery,
  filterPredicate,
  type LogPage,
  type LogQuerySettings,
  type StatsReport,
  type StreamOptions,
} from "./query.js";
export {
  KNOWN_LEVELS,
  MAX_PAGE_SIZE,
  parseCursorId,
  parseFilter,
  parseLogQuery,
  parseStreamQuery,
  type EntryFilter,
  type FilterParams,
  type KnownLevel,
  type LogQueryParams,
  type StreamQueryParams,
} from "./query-params.js";
export { streamEntries, type StreamEvent, type StreamSettings } from "./stream.js";

// Records
export {
  categoryOf,
  decodeLine,
  decodeLines,
  fieldOf,
  levelOf,
  toEntryView,
  type JsonObject,
  type JsonValue,
  type LogEntryView,
  type LogRecord,
  type RawRecord,
  type StructuredRecord,
} from "./parsers/index.js";

// Errors
export {
  ConfigError,
  LogWindowError,
  QueryValidationError,
  type ValidationIssue,
} from "./errors.js";
