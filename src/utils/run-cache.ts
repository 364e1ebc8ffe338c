/**
 * Run Cache
 *
 * Ephemeral per-run memo of derived values (parsed frontmatter, expanded
 * bodies, rendered HTML). Nothing here is read back as state: a cache is
 * created by a pipeline run and dropped with it. `dump` writes the entries
 * as JSON for debugging.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface RunCacheStats {
  entries: number;
  hits: number;
  misses: number;
}

export class RunCache<V> {
  private readonly entries = new Map<string, V>();
  private hits = 0;
  private misses = 0;

  constructor(readonly name: string) {}

  get(key: string): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      this.misses++;
    } else {
      this.hits++;
    }
    return value;
  }

  set(key: string, value: V): void {
    this.entries.set(key, value);
  }

  async getOrCompute(key: string, compute: () => Promise<V>): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const value = await compute();
    this.entries.set(key, value);
    return value;
  }

  stats(): RunCacheStats {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses };
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  /** Write `{ name, stats, entries }` to `filePath` */
  async dump(filePath: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    const payload = {
      name: this.name,
      stats: this.stats(),
      entries: Object.fromEntries(this.entries),
    };
    await fs.promises.writeFile(filePath, JSON.stringify(payload, null, 2), 'utf-8');
  }
}
