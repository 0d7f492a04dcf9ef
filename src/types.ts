export type CacheLogEventName =
    | 'add'
    | 'add_replace'
    | 'add_rejected'
    | 'get_hit'
    | 'get_miss'
    | 'remove'
    | 'remove_miss'
    | 'clear'
    | 'import'
    | 'protocol_error';

export interface CacheLogEvent {
    event: CacheLogEventName;
    key?: string;
    timestamp: number;
    reason?: string;
    entryCount?: number;
}

export interface CacheEntry {
    key: string;
    value: string;
}

export interface CacheStats {
    entryCount: number;
    hits: number;
    misses: number;
    writes: number;
    replacements: number;
    removals: number;
    rejected: number;
}

export interface StoreOptions {
    maxKeyLength?: number;
}

// Shape shared by ConcurrentKeyValueStore (sync) and RemoteCacheClient (async)
export interface KeyValueCache<R = void, V = string | null, B = boolean, N = number> {
    add(key: string, value: string): R;
    get(key: string): V;
    remove(key: string): B;
    has(key: string): B;
    size(): N;
}

export type SyncKeyValueCache = KeyValueCache;

export type AsyncKeyValueCache = KeyValueCache<
    Promise<void>,
    Promise<string | null>,
    Promise<boolean>,
    Promise<number>
>;
