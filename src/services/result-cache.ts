// In-memory TTL cache for successful tool invocation results.

import { QueryFilters, RawRecord, ToolOperation } from '../interfaces';

interface CacheEntry {
  records: RawRecord[];
  expiresAt: number;
}

const DEFAULT_MAX_ENTRIES = 200;

export class ResultCache {
  private readonly map = new Map<string, CacheEntry>();

  constructor(
    private readonly ttlMs: number,
    private readonly maxEntries = DEFAULT_MAX_ENTRIES,
  ) {}

  get enabled(): boolean {
    return this.ttlMs > 0;
  }

  get(key: string): RawRecord[] | undefined {
    const entry = this.map.get(key);
    if (!entry) return undefined;

    if (Date.now() > entry.expiresAt) {
      this.map.delete(key);
      return undefined;
    }

    // LRU: move to end
    this.map.delete(key);
    this.map.set(key, entry);
    return entry.records;
  }

  set(key: string, records: RawRecord[]): void {
    if (!this.enabled) return;

    while (this.map.size >= this.maxEntries) {
      const oldest = this.map.keys().next().value;
      if (oldest === undefined) break;
      this.map.delete(oldest);
    }

    this.map.set(key, { records, expiresAt: Date.now() + this.ttlMs });
  }

  /** Drop every entry for one tool, e.g. when it is deregistered */
  invalidateTool(tool: string): void {
    for (const key of [...this.map.keys()]) {
      if (key.startsWith(`${tool}|`)) this.map.delete(key);
    }
  }

  get size(): number {
    return this.map.size;
  }

  clear(): void {
    this.map.clear();
  }
}

/**
 * Key over every dimension that affects a tool's response. Filter keys are
 * sorted so equivalent filter objects share an entry.
 */
export function buildCacheKey(tool: string, operation: ToolOperation, filters: QueryFilters): string {
  const ordered = Object.keys(filters)
    .sort()
    .map((key) => [key, filters[key]]);
  return [tool, operation, JSON.stringify(ordered)].join('|');
}
