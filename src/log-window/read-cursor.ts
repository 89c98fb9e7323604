import type { CacheEntry, EntryCache, EntryPredicate } from "./entry-cache.js";
import type { GenerationSource } from "./file-tailer.js";

export type CursorState = "fresh" | "advanced";

/**
 * A reader's bookmark into the entry stream.
 *
 * The position is the last id handed to the reader. When the file is
 * rotated or truncated after the cursor was made, the cursor jumps to the
 * newest id of the new generation; nothing from before the reset is served.
 */
export class ReadCursor {
  private readonly cache: EntryCache;
  private readonly generations: GenerationSource;
  private anchorId: number;
  private offset = 0;
  private generationAtAnchor: number;
  private currentState: CursorState = "fresh";

  private constructor(cache: EntryCache, generations: GenerationSource, anchorId: number) {
    this.cache = cache;
    this.generations = generations;
    this.anchorId = anchorId;
    this.generationAtAnchor = generations.generation;
  }

  /**
   * Opens a cursor after `lastKnownId`, or after the newest entry when omitted.
   */
  static open(cache: EntryCache, generations: GenerationSource, lastKnownId?: number): ReadCursor {
    return new ReadCursor(cache, generations, lastKnownId ?? cache.newestId);
  }

  /** Last id delivered through this cursor (or its anchor). */
  get position(): number {
    return this.anchorId + this.offset;
  }

  get generation(): number {
    return this.generationAtAnchor;
  }

  get state(): CursorState {
    return this.currentState;
  }

  /**
   * Rebases onto the live generation if the file was reset since the anchor
   * was taken. Returns true when it did.
   */
  recover(): boolean {
    const live = this.generations.generation;
    if (live === this.generationAtAnchor) {
      return false;
    }
    this.anchorId = this.cache.newestId;
    this.offset = 0;
    this.generationAtAnchor = live;
    this.currentState = "fresh";
    return true;
  }

  hasUpdates(): boolean {
    this.recover();
    return this.cache.changesSince(this.position).hasUpdates;
  }

  /**
   * Entries after the current position, advancing past what is returned.
   * With a predicate, skipped entries are consumed only up to the last
   * match returned.
   */
  readNew(maxCount: number, predicate?: EntryPredicate): CacheEntry[] {
    this.recover();
    const entries = this.cache.get(this.position + 1, maxCount, predicate);
    const last = entries.at(-1);
    if (last) {
      this.offset = last.id - this.anchorId;
      this.currentState = "advanced";
    }
    return entries;
  }

  /**
   * Reads `count` entries starting `offset + 1` ids after the anchor, without
   * moving the cursor. Ids outside the resident window yield nothing.
   */
  readHistory(offset: number, count: number): CacheEntry[] {
    this.recover();
    const requested = this.anchorId + offset + 1;
    const oldest = this.cache.oldestId;
    if (oldest === undefined || requested < oldest || requested > this.cache.newestId) {
      return [];
    }
    return this.cache.get(requested, count);
  }
}
