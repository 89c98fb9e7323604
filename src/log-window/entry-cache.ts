import { ModuleHierarchy } from "./module-hierarchy.js";
import { categoryOf, type LogRecord } from "./parsers/index.js";

/**
 * A record admitted to the cache under its permanent id.
 */
export type CacheEntry = {
  readonly id: number;
  readonly record: LogRecord;
};

export type EntryPredicate = (entry: CacheEntry) => boolean;

/**
 * Result of {@link EntryCache.changesSince}.
 */
export type ChangeSummary = {
  hasUpdates: boolean;
  /** Resident entries newer than the given id */
  newCount: number;
  minId: number;
  maxId: number;
};

/**
 * Sliding window of the most recent records, keyed by a monotonic id.
 *
 * Ids start at 0, grow by one per admitted record and are never reused:
 * `clear()` empties the window but keeps counting. While non-empty the
 * resident ids form one contiguous run, so an id maps straight to a slot.
 *
 * A capacity of 0 keeps every record.
 */
export class EntryCache {
  readonly capacity: number;
  private slots: CacheEntry[] = [];
  private head = 0;
  private length = 0;
  private nextId = 0;
  private readonly hierarchy = new ModuleHierarchy();

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`capacity must be a non-negative integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.length;
  }

  /** Id of the most recently admitted record, or -1 before the first one. */
  get newestId(): number {
    return this.nextId - 1;
  }

  /** Id of the oldest resident record, or undefined when empty. */
  get oldestId(): number | undefined {
    return this.length > 0 ? this.at(0).id : undefined;
  }

  admit(record: LogRecord): CacheEntry {
    const entry: CacheEntry = { id: this.nextId++, record };
    if (this.capacity === 0) {
      this.slots.push(entry);
      this.length++;
    } else if (this.length < this.capacity) {
      this.slots[(this.head + this.length) % this.capacity] = entry;
      this.length++;
    } else {
      // full: overwrite the oldest slot
      this.slots[this.head] = entry;
      this.head = (this.head + 1) % this.capacity;
    }

    const category = categoryOf(record);
    if (category) {
      this.hierarchy.add(category);
    }
    return entry;
  }

  admitBatch(records: LogRecord[]): CacheEntry[] {
    return records.map((record) => this.admit(record));
  }

  /**
   * Up to `maxCount` entries with `id >= startId` that satisfy `predicate`,
   * in ascending id order. A `startId` below the window starts at the oldest
   * resident entry.
   */
  get(startId: number, maxCount: number, predicate?: EntryPredicate): CacheEntry[] {
    const result: CacheEntry[] = [];
    if (this.length === 0 || maxCount <= 0) {
      return result;
    }
    const minId = this.at(0).id;
    let index = Math.max(0, startId - minId);
    for (; index < this.length && result.length < maxCount; index++) {
      const entry = this.at(index);
      if (!predicate || predicate(entry)) {
        result.push(entry);
      }
    }
    return result;
  }

  count(predicate?: EntryPredicate): number {
    if (!predicate) {
      return this.length;
    }
    let total = 0;
    for (let i = 0; i < this.length; i++) {
      if (predicate(this.at(i))) {
        total++;
      }
    }
    return total;
  }

  forEach(fn: (entry: CacheEntry) => void): void {
    for (let i = 0; i < this.length; i++) {
      fn(this.at(i));
    }
  }

  changesSince(lastKnownId: number): ChangeSummary {
    if (this.length === 0) {
      return { hasUpdates: false, newCount: 0, minId: 0, maxId: 0 };
    }
    const minId = this.at(0).id;
    const maxId = this.at(this.length - 1).id;
    const newCount = Math.max(0, maxId - Math.max(minId - 1, lastKnownId));
    return { hasUpdates: newCount > 0, newCount, minId, maxId };
  }

  hierarchySnapshot(): Record<string, string[]> {
    return this.hierarchy.snapshot();
  }

  /**
   * Drops every resident entry and the hierarchy. The id counter keeps going.
   */
  clear(): void {
    this.slots = [];
    this.head = 0;
    this.length = 0;
    this.hierarchy.clear();
  }

  private at(index: number): CacheEntry {
    const slot = this.capacity === 0 ? index : (this.head + index) % this.capacity;
    const entry = this.slots[slot];
    if (!entry) {
      throw new RangeError(`no cache entry at index ${index}`);
    }
    return entry;
  }
}
