/**
 * Test Suite for SharedCache
 *
 * Each test loads a fresh copy of the module so "first access" really is the
 * first access for that test.
 */
import type * as SharedCacheExports from '../shared-cache';
import type * as ErrorExports from '../errors';

// Error classes come from the same isolated module registry as the cache,
// otherwise instanceof checks would compare against a different class.
type SharedCacheModule = typeof SharedCacheExports & typeof ErrorExports;

async function loadFreshModule(): Promise<SharedCacheModule> {
  const loaded: SharedCacheModule[] = [];
  await jest.isolateModulesAsync(async () => {
    const cacheModule = await import('../shared-cache');
    const errorsModule = await import('../errors');
    loaded.push({ ...cacheModule, ...errorsModule });
  });
  return loaded[0];
}

describe('SharedCache', () => {
  let mod: SharedCacheModule;

  beforeEach(async () => {
    mod = await loadFreshModule();
  });

  describe('Single Instance', () => {
    test('should not exist before first access', () => {
      expect(mod.SharedCache.isInitialized()).toBe(false);
      mod.getSharedCache();
      expect(mod.SharedCache.isInitialized()).toBe(true);
    });

    test('should give 100 concurrent first callers the same instance', async () => {
      const results = await Promise.all(
        Array.from({ length: 100 }, async (_, i) => {
          await new Promise<void>((resolve) => setImmediate(resolve));
          return i % 2 === 0 ? mod.SharedCache.instance : mod.getSharedCache();
        })
      );

      expect(new Set(results).size).toBe(1);
      expect(results[0]).toBeInstanceOf(mod.SharedCache);
    });

    test('should run the example round trip', () => {
      mod.SharedCache.instance.add('username', 'john_doe');
      expect(mod.getSharedCache().get('username')).toBe('john_doe');
      expect(mod.getSharedCache().get('email')).toBeNull();
    });
  });

  describe('Contract Enforcement', () => {
    test('should reject construction that bypasses the registry', () => {
      mod.getSharedCache();
      expect(() => Reflect.construct(mod.SharedCache, [{}])).toThrow(mod.DuplicateInstantiationError);
    });

    test('should reject a bypass made before first access and still build the instance', () => {
      expect(() => Reflect.construct(mod.SharedCache, [{}])).toThrow(mod.DuplicateInstantiationError);
      expect(mod.SharedCache.isInitialized()).toBe(false);

      const cache = mod.SharedCache.instance;
      expect(cache).toBeInstanceOf(mod.SharedCache);
      expect(mod.getSharedCache()).toBe(cache);
    });

    test('should reject cloning', () => {
      const cache = mod.getSharedCache();
      expect(() => cache.clone()).toThrow(mod.CloneNotSupportedError);
      expect(() => cache.clone()).toThrow('Cloning of SharedCache is not allowed');
    });

    test('should reject deserialization into a new cache', () => {
      const cache = mod.getSharedCache();
      cache.add('username', 'john_doe');
      const json = JSON.stringify(cache);

      expect(() => mod.SharedCache.fromJSON(JSON.parse(json))).toThrow(mod.DuplicateInstantiationError);
    });

    test('should serialize a snapshot and restore it through importState', () => {
      const cache = mod.getSharedCache();
      cache.add('username', 'john_doe');
      const snapshot = cache.toJSON();
      expect(JSON.parse(JSON.stringify(cache))).toEqual({
        type: 'SharedCache',
        entries: [{ key: 'username', value: 'john_doe' }],
      });

      cache.clear();
      cache.importState(snapshot.entries);
      expect(cache.get('username')).toBe('john_doe');
    });
  });

  describe('Configuration', () => {
    const original = process.env.CACHE_MAX_KEY_LENGTH;

    afterEach(() => {
      if (original === undefined) {
        delete process.env.CACHE_MAX_KEY_LENGTH;
      } else {
        process.env.CACHE_MAX_KEY_LENGTH = original;
      }
    });

    test('should read the key length limit from the environment on first access', async () => {
      process.env.CACHE_MAX_KEY_LENGTH = '3';
      const fresh = await loadFreshModule();
      const cache = fresh.getSharedCache();
      cache.add('abc', 'ok');
      expect(() => cache.add('abcd', 'too long')).toThrow('key length 4 exceeds 3');
    });
  });
});
