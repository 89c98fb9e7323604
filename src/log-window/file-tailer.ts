import type { EntryCache } from "./entry-cache.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { decodeLines } from "./parsers/index.js";
import { readAppendedLines, readLastLines, statFile, type TailReadResult } from "./tail-reader.js";

const log = createSubsystemLogger("log-window/tailer");

/**
 * Anything that can report the current rotation epoch.
 */
export interface GenerationSource {
  readonly generation: number;
}

/**
 * What a single poll step observed.
 */
export type PollOutcome = "missing" | "rotated" | "truncated" | "grew" | "idle";

export type FileState = {
  readonly path: string;
  /** Bytes consumed so far, always at a line boundary */
  readonly offset: number;
  /** "<dev>:<ino>" of the tracked file, null while it is absent */
  readonly fingerprint: string | null;
  /** Bumped on every rotation, truncation or disappearance */
  readonly generation: number;
};

export type FileTailerOptions = {
  path: string;
  minPollMs: number;
  maxPollMs: number;
  backoffFactor: number;
  missingFileRetryMs: number;
  errorCooldownMs: number;
  stopTimeoutMs: number;
};

/**
 * Keeps an {@link EntryCache} in sync with one log file.
 *
 * Each poll step compares the file's identity and size against what was
 * consumed and either reads the new lines, resets on rotation or
 * truncation, or backs off. Each batch is admitted in one synchronous step,
 * so readers never see a partial batch.
 */
export class FileTailer implements GenerationSource {
  private readonly cache: EntryCache;
  private readonly options: FileTailerOptions;
  private offset = 0;
  private fingerprint: string | null = null;
  private lastSize = 0;
  private generationCounter = 0;
  private interval: number;
  private idlePolls = 0;
  private running = false;
  private loop: Promise<void> | null = null;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wakeSleeper: (() => void) | null = null;
  private wakePending = false;

  constructor(cache: EntryCache, options: FileTailerOptions) {
    this.cache = cache;
    this.options = options;
    this.interval = options.minPollMs;
  }

  get generation(): number {
    return this.generationCounter;
  }

  get state(): FileState {
    return {
      path: this.options.path,
      offset: this.offset,
      fingerprint: this.fingerprint,
      generation: this.generationCounter,
    };
  }

  get size(): number {
    return this.lastSize;
  }

  get pollIntervalMs(): number {
    return this.interval;
  }

  get consecutiveIdlePolls(): number {
    return this.idlePolls;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Loads the file's current tail, if the file exists.
   */
  async loadInitial(): Promise<number> {
    const stat = await statFile(this.options.path);
    if (!stat) {
      log.info(`Log file not present yet: ${this.options.path}`);
      return 0;
    }
    return this.reload(false);
  }

  /**
   * Runs one poll step against the file.
   */
  async pollOnce(): Promise<PollOutcome> {
    const stat = await statFile(this.options.path);

    if (!stat) {
      if (this.fingerprint !== null || this.cache.size > 0) {
        this.reset();
        log.info(`Log file disappeared: ${this.options.path}`, {
          generation: this.generationCounter,
        });
      }
      return "missing";
    }

    if (stat.fingerprint !== this.fingerprint) {
      const admitted = await this.reload(true);
      log.info(`Log file rotated: ${this.options.path}`, {
        generation: this.generationCounter,
        admitted,
      });
      return "rotated";
    }

    if (stat.size < this.offset) {
      const admitted = await this.reload(true);
      log.info(`Log file truncated: ${this.options.path}`, {
        generation: this.generationCounter,
        admitted,
      });
      return "truncated";
    }

    if (stat.size > this.offset) {
      const slice = await readAppendedLines({ file: this.options.path, offset: this.offset });
      if (slice.fingerprint !== this.fingerprint) {
        // replaced between stat and open; the next step sees the new identity
        return "idle";
      }
      const admitted = this.admit(slice);
      if (slice.lines.length === 0) {
        // only a partial line so far
        return "idle";
      }
      log.debug(`Read ${slice.lines.length} lines`, {
        admitted,
        offset: this.offset,
        newestId: this.cache.newestId,
      });
      return "grew";
    }

    this.lastSize = stat.size;
    return "idle";
  }

  /**
   * Starts the background poll loop. Call {@link loadInitial} first.
   */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.loop = this.run();
  }

  /**
   * Cuts the current sleep short so the next poll happens now.
   */
  wake(): void {
    this.interval = this.options.minPollMs;
    if (this.wakeSleeper) {
      this.wakeSleeper();
    } else {
      this.wakePending = true;
    }
  }

  /**
   * Stops the poll loop, waiting at most `stopTimeoutMs` for it to finish.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.wakeSleeper?.();

    const loop = this.loop;
    this.loop = null;
    if (!loop) {
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.options.stopTimeoutMs);
    });
    const outcome = await Promise.race([loop.then(() => "stopped" as const), timedOut]);
    clearTimeout(timer);
    if (outcome === "timeout") {
      log.warn(`Tailer did not stop within ${this.options.stopTimeoutMs}ms`);
    }
  }

  private async run(): Promise<void> {
    while (this.running) {
      let delay: number;
      try {
        const outcome = await this.pollOnce();
        delay = this.nextDelay(outcome);
      } catch (err) {
        log.warn(`Poll failed for ${this.options.path}: ${String(err)}`);
        delay = this.options.errorCooldownMs;
      }
      if (!this.running) {
        break;
      }
      await this.sleep(delay);
    }
  }

  private nextDelay(outcome: PollOutcome): number {
    switch (outcome) {
      case "missing":
        return this.options.missingFileRetryMs;
      case "idle":
        this.idlePolls++;
        this.interval = Math.min(
          this.interval * this.options.backoffFactor,
          this.options.maxPollMs,
        );
        return this.interval;
      default:
        this.idlePolls = 0;
        this.interval = this.options.minPollMs;
        return this.interval;
    }
  }

  private sleep(ms: number): Promise<void> {
    if (this.wakePending) {
      this.wakePending = false;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const done = () => {
        if (this.sleepTimer) {
          clearTimeout(this.sleepTimer);
          this.sleepTimer = null;
        }
        this.wakeSleeper = null;
        resolve();
      };
      this.wakeSleeper = done;
      this.sleepTimer = setTimeout(done, ms);
    });
  }

  private reset(): void {
    this.generationCounter++;
    this.cache.clear();
    this.offset = 0;
    this.lastSize = 0;
    this.fingerprint = null;
  }

  /**
   * Reads the file's tail first, then resets (when asked) and admits it in
   * one synchronous step. A failed read leaves the window untouched.
   */
  private async reload(resetFirst: boolean): Promise<number> {
    const slice = await readLastLines({
      file: this.options.path,
      maxLines: this.cache.capacity,
    });
    if (resetFirst) {
      this.reset();
    }
    this.fingerprint = slice.fingerprint;
    const admitted = this.admit(slice);
    log.info(`Loaded ${admitted} entries from ${this.options.path}`, {
      offset: this.offset,
      generation: this.generationCounter,
    });
    return admitted;
  }

  private admit(slice: TailReadResult): number {
    const records = decodeLines(slice.lines);
    this.cache.admitBatch(records);
    this.offset = slice.offset;
    this.lastSize = slice.size;
    return records.length;
  }
}
