export const HIERARCHY_ROOT = "root";

/**
 * Parent → children index of every dotted category seen since the last reset.
 *
 * Grows only. Entries leaving the ring buffer do not remove their
 * categories; a rotation clears the whole index.
 */
export class ModuleHierarchy {
  private readonly children = new Map<string, Set<string>>();
  private readonly seen = new Set<string>();

  /**
   * Records `a.b.c` as the edges root→a, a→a.b, a.b→a.b.c.
   */
  add(path: string): void {
    if (this.seen.has(path)) {
      return;
    }
    this.seen.add(path);

    const parts = path.split(".");
    let parent = HIERARCHY_ROOT;
    for (let i = 1; i <= parts.length; i++) {
      const child = parts.slice(0, i).join(".");
      let set = this.children.get(parent);
      if (!set) {
        set = new Set();
        this.children.set(parent, set);
      }
      set.add(child);
      parent = child;
    }
  }

  has(path: string): boolean {
    return this.seen.has(path);
  }

  clear(): void {
    this.children.clear();
    this.seen.clear();
  }

  get size(): number {
    return this.children.size;
  }

  /**
   * Detached copy; later additions do not show up in it.
   */
  snapshot(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const [parent, set] of this.children) {
      out[parent] = [...set];
    }
    return out;
  }
}
