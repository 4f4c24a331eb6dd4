import path from "path";
import type { StatTable } from "@/lib/domain/types";

/**
 * Memoizes loaded tables by key (normally the resolved file path).
 *
 * Entries hold the load promise, so concurrent callers share a single read.
 * Failed loads are evicted so the next call retries.
 */
export class TableCache {
  private readonly entries = new Map<string, Promise<StatTable>>();

  get(key: string, load: () => Promise<StatTable>): Promise<StatTable> {
    const hit = this.entries.get(key);
    if (hit) return hit;
    const pending = load().catch((e: unknown) => {
      if (this.entries.get(key) === pending) this.entries.delete(key);
      throw e;
    });
    this.entries.set(key, pending);
    return pending;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  // Drops every entry for a file, whatever parse options it was loaded with
  invalidate(file: string): void {
    const resolved = path.resolve(file);
    for (const key of [...this.entries.keys()]) {
      if (key === file || key === resolved || key.startsWith(`${resolved}?`)) this.entries.delete(key);
    }
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
