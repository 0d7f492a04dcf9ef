import { loadCacheConfig } from '../config';
import { CloneNotSupportedError, DuplicateInstantiationError } from './errors';
import { InstanceRegistry } from './instance-registry';
import { ConcurrentKeyValueStore } from './key-value-store';
import { CacheEntry, StoreOptions } from '../types';

// Set only while the registry factory runs; any other construction is a bypass.
let buildingFromRegistry = false;

export interface SharedCacheSnapshot {
  type: 'SharedCache';
  entries: CacheEntry[];
}

/**
 * SharedCache: the one ConcurrentKeyValueStore for this process
 *
 * Reach it through `SharedCache.instance` (or `getSharedCache()`). The first
 * access builds it from the environment config; every later access returns the
 * same object.
 *
 * FORBIDDEN:
 * - constructing it outside the registry, before or after first access
 *   -> DuplicateInstantiationError
 * - `clone()` -> CloneNotSupportedError
 * - `SharedCache.fromJSON(...)` -> DuplicateInstantiationError
 *   (restore data with `SharedCache.instance.importState(...)`)
 *
 * Code that only needs "a store" should take a ConcurrentKeyValueStore
 * parameter and be handed this instance by the entry point, so tests can pass
 * an isolated store instead.
 */
export class SharedCache extends ConcurrentKeyValueStore {
  private static created = false;

  private static readonly registry = new InstanceRegistry<SharedCache>('SharedCache', () => {
    const config = loadCacheConfig();
    buildingFromRegistry = true;
    try {
      return new SharedCache({ maxKeyLength: config.maxKeyLength });
    } finally {
      buildingFromRegistry = false;
    }
  });

  private constructor(options: StoreOptions) {
    if (!buildingFromRegistry || SharedCache.created) {
      throw new DuplicateInstantiationError('SharedCache', 'use SharedCache.instance');
    }
    super(options);
    SharedCache.created = true;
  }

  static get instance(): SharedCache {
    return SharedCache.registry.getInstance();
  }

  static isInitialized(): boolean {
    return SharedCache.registry.isInitialized();
  }

  static fromJSON(_json: unknown): never {
    throw new DuplicateInstantiationError(
      'SharedCache',
      'deserialization cannot create a cache; use SharedCache.instance.importState'
    );
  }

  clone(): never {
    throw new CloneNotSupportedError('SharedCache');
  }

  toJSON(): SharedCacheSnapshot {
    return { type: 'SharedCache', entries: this.exportState() };
  }
}

export function getSharedCache(): SharedCache {
  return SharedCache.instance;
}
