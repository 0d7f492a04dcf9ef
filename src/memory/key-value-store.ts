import { EventEmitter } from 'events';
import { CriticalSection } from './critical-section';
import { InvalidKeyError } from './errors';
import { CacheEntry, CacheLogEvent, CacheStats, StoreOptions, SyncKeyValueCache } from '../types';

export const DEFAULT_MAX_KEY_LENGTH = 256;

/**
 * ConcurrentKeyValueStore: string-to-string mapping with serialized access
 *
 * Every read and write of the mapping happens inside one CriticalSection, so no
 * caller ever sees a half-applied mutation. `log` events are emitted only after
 * the section is released: listeners are external collaborators and must never
 * run while the mapping is held. A throwing listener never fails the operation.
 *
 * ABSENCE:
 * `get` returns `null` for a key that was never added or was removed. A stored
 * empty string is returned as `""`, never conflated with absence.
 *
 * KEYS:
 * - `add` throws InvalidKeyError for a non-string, empty, or over-long key
 *   and mutates nothing
 * - `get`, `has` and `remove` treat such a key as absent
 *
 * USAGE EXAMPLE:
 *
 * const store = new ConcurrentKeyValueStore();
 * store.add('username', 'john_doe');
 * store.get('username'); // 'john_doe'
 * store.get('email');    // null
 *
 * Most callers want the process-wide instance from `SharedCache.instance`
 * instead; constructing a store directly gives an isolated one (tests, DI).
 */
export class ConcurrentKeyValueStore extends EventEmitter implements SyncKeyValueCache {
  private readonly entries = new Map<string, string>();
  private readonly section = new CriticalSection();
  private readonly maxKeyLength: number;
  private readonly counters = {
    hits: 0,
    misses: 0,
    writes: 0,
    replacements: 0,
    removals: 0,
    rejected: 0,
  };

  constructor(options: StoreOptions = {}) {
    super();
    this.maxKeyLength = options.maxKeyLength ?? DEFAULT_MAX_KEY_LENGTH;
  }

  /**
   * Insert or replace the value for `key`.
   *
   * @throws InvalidKeyError if the key is not a non-empty string within the length limit
   */
  add(key: string, value: string): void {
    const problem = this.describeInvalidKey(key);
    if (problem !== null) {
      this.section.run('add', () => {
        this.counters.rejected += 1;
      });
      this.log({ event: 'add_rejected', reason: problem });
      throw new InvalidKeyError(`Invalid cache key: ${problem}`, key);
    }

    const replaced = this.section.run('add', () => {
      const existed = this.entries.has(key);
      this.entries.set(key, value);
      this.counters.writes += 1;
      if (existed) {
        this.counters.replacements += 1;
      }
      return existed;
    });

    this.log({ event: replaced ? 'add_replace' : 'add', key });
  }

  get(key: string): string | null {
    if (this.describeInvalidKey(key) !== null) {
      return null;
    }

    const value = this.section.run('get', () => {
      const current = this.entries.get(key);
      if (current === undefined) {
        this.counters.misses += 1;
        return null;
      }
      this.counters.hits += 1;
      return current;
    });

    this.log({ event: value === null ? 'get_miss' : 'get_hit', key });
    return value;
  }

  /**
   * Delete `key` if present.
   *
   * @returns true if an entry was removed, false if there was nothing to remove
   */
  remove(key: string): boolean {
    if (this.describeInvalidKey(key) !== null) {
      return false;
    }

    const removed = this.section.run('remove', () => {
      const deleted = this.entries.delete(key);
      if (deleted) {
        this.counters.removals += 1;
      }
      return deleted;
    });

    this.log({ event: removed ? 'remove' : 'remove_miss', key });
    return removed;
  }

  has(key: string): boolean {
    if (this.describeInvalidKey(key) !== null) {
      return false;
    }
    return this.section.run('has', () => this.entries.has(key));
  }

  size(): number {
    return this.section.run('size', () => this.entries.size);
  }

  /** Snapshot of the current keys; later mutations do not show up in it. */
  keys(): string[] {
    return this.section.run('keys', () => Array.from(this.entries.keys()));
  }

  clear(): void {
    const cleared = this.section.run('clear', () => {
      const count = this.entries.size;
      this.entries.clear();
      this.counters.removals += count;
      return count;
    });

    this.log({ event: 'clear', entryCount: cleared });
  }

  getStats(): CacheStats {
    return this.section.run('stats', () => ({
      entryCount: this.entries.size,
      ...this.counters,
    }));
  }

  /** Copy of every entry, in insertion order. */
  exportState(): CacheEntry[] {
    return this.section.run('export', () =>
      Array.from(this.entries, ([key, value]) => ({ key, value }))
    );
  }

  /**
   * Load entries into this store, replacing values of keys that already exist.
   *
   * All keys are validated first; if any is invalid nothing is written.
   *
   * @throws InvalidKeyError naming the first invalid key
   */
  importState(state: readonly CacheEntry[]): void {
    for (const entry of state) {
      const problem = this.describeInvalidKey(entry.key);
      if (problem !== null) {
        this.log({ event: 'add_rejected', reason: `import: ${problem}` });
        throw new InvalidKeyError(`Invalid cache key in imported state: ${problem}`, entry.key);
      }
    }

    const entryCount = this.section.run('import', () => {
      for (const { key, value } of state) {
        this.entries.set(key, value);
      }
      this.counters.writes += state.length;
      return this.entries.size;
    });

    this.log({ event: 'import', entryCount });
  }

  /**
   * Emit a `log` event. A listener that throws is reported on the console and
   * does not fail the operation that produced the event.
   */
  log(details: Omit<CacheLogEvent, 'timestamp'>): void {
    const event: CacheLogEvent = { ...details, timestamp: Date.now() };
    try {
      this.emit('log', event);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`⚠️  [cache] log listener failed on ${event.event}: ${message}`);
    }
  }

  // ============== PRIVATE HELPERS ==============

  private describeInvalidKey(key: unknown): string | null {
    if (typeof key !== 'string') {
      return `expected a string, got ${key === null ? 'null' : typeof key}`;
    }
    if (key.length === 0) {
      return 'key must not be empty';
    }
    if (key.length > this.maxKeyLength) {
      return `key length ${key.length} exceeds ${this.maxKeyLength}`;
    }
    return null;
  }
}
