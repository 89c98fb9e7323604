import chokidar, { type FSWatcher } from "chokidar";
import path from "node:path";
import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("log-window/watcher");

export type FileChangeType = "add" | "change" | "unlink";

export type FileChangeCallback = (eventType: FileChangeType) => void;

/**
 * Watches a single log file for change notifications.
 *
 * The parent directory is watched rather than the file itself, so a file
 * that is replaced by rotation or created later still reports events.
 * Events only nudge the poller; the poller stays the source of truth.
 */
export async function createFileWatcher(
  filePath: string,
  onChange: FileChangeCallback,
): Promise<FSWatcher> {
  const target = path.resolve(filePath);
  const dir = path.dirname(target);

  const watcher = chokidar.watch(dir, {
    ignoreInitial: true,
    depth: 0,
    ignored: (candidate: string) => {
      const resolved = path.resolve(candidate);
      return resolved !== dir && resolved !== target;
    },
  });

  const emit = (eventType: FileChangeType, changed: string) => {
    if (path.resolve(changed) !== target) {
      return;
    }
    log.debug(`File ${eventType}: ${changed}`);
    onChange(eventType);
  };

  watcher.on("add", (changed) => emit("add", changed));
  watcher.on("change", (changed) => emit("change", changed));
  watcher.on("unlink", (changed) => emit("unlink", changed));
  watcher.on("error", (error) => {
    log.error(`Watcher error: ${String(error)}`);
  });

  await new Promise<void>((resolve) => watcher.once("ready", () => resolve()));
  return watcher;
}
