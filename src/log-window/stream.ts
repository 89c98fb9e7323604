import { setTimeout as sleep } from "node:timers/promises";
import type { ReadCursor } from "./read-cursor.js";
import { toEntryView, type LogEntryView } from "./parsers/index.js";

export type StreamEvent =
  | { type: "entries"; entries: LogEntryView[]; lastId: number }
  | { type: "heartbeat" };

export type StreamSettings = {
  /** Entries after the cursor's position are delivered */
  cursor: ReadCursor;
  intervalMs: number;
  heartbeatIntervalMs: number;
  batchSize: number;
  signal?: AbortSignal;
};

/**
 * Resolves false instead of throwing when the signal aborts the pause.
 */
async function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (signal?.aborted) {
      return false;
    }
    throw err;
  }
}

/**
 * Polls the cache through a cursor and yields new entries as they arrive,
 * with a heartbeat after `heartbeatIntervalMs` of silence.
 *
 * Runs until the signal aborts or the consumer stops iterating. A rotation
 * rebases the cursor, so the consumer sees a gap rather than an error.
 */
export async function* streamEntries(settings: StreamSettings): AsyncGenerator<StreamEvent> {
  const { cursor, signal } = settings;
  let lastEmit = Date.now();

  while (!signal?.aborted) {
    if (cursor.hasUpdates()) {
      const entries = cursor.readNew(settings.batchSize);
      const last = entries.at(-1);
      if (last) {
        lastEmit = Date.now();
        yield {
          type: "entries",
          entries: entries.map((entry) => toEntryView(entry.id, entry.record)),
          lastId: last.id,
        };
      }
    }

    if (Date.now() - lastEmit >= settings.heartbeatIntervalMs) {
      lastEmit = Date.now();
      yield { type: "heartbeat" };
    }

    if (!(await pause(settings.intervalMs, signal))) {
      return;
    }
  }
}
