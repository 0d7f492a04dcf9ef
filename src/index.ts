import { isMainThread, Worker, workerData } from 'worker_threads';
import { loadCacheConfig } from './config';
import { CacheHost } from './memory/cache-bridge';
import { attachConsoleLogger } from './memory/cache-logger';
import { getSharedCache } from './memory/shared-cache';
import { getWorkerCache } from './memory/worker-cache';

export { loadCacheConfig } from './config';
export type { CacheConfig } from './config';
export * from './memory/errors';
export { CriticalSection } from './memory/critical-section';
export { ConcurrentKeyValueStore, DEFAULT_MAX_KEY_LENGTH } from './memory/key-value-store';
export { InstanceRegistry, AsyncInstanceRegistry } from './memory/instance-registry';
export { SharedCache, getSharedCache } from './memory/shared-cache';
export type { SharedCacheSnapshot } from './memory/shared-cache';
export { CacheHost, RemoteCacheClient } from './memory/cache-bridge';
export type { CacheChannel, CacheRequest, CacheResponse } from './memory/cache-bridge';
export { getWorkerCache, createWorkerCacheRegistry } from './memory/worker-cache';
export { attachConsoleLogger, formatCacheEvent } from './memory/cache-logger';
export * from './types';

const WRITES_PER_WORKER = 5;

async function main() {
    const config = loadCacheConfig();
    const cache = getSharedCache();
    attachConsoleLogger(cache, { verbose: config.verboseLogging });

    cache.add('username', 'john_doe');
    console.log(`Username from cache: ${cache.get('username')}`);
    console.log(`Email from cache: ${cache.get('email') ?? '(not found)'}`);

    console.log(`\n🧵 Starting ${config.demoWorkers} workers against the shared cache\n`);
    const host = new CacheHost(cache);
    const exits = Array.from({ length: config.demoWorkers }, (_, workerId) => {
        const worker = new Worker(__filename, { workerData: { workerId } });
        host.attach(worker);
        return new Promise<void>((resolve, reject) => {
            worker.once('error', reject);
            worker.once('exit', (code) => {
                if (code === 0) {
                    resolve();
                } else {
                    reject(new Error(`Worker ${workerId} exited with code ${code}`));
                }
            });
        });
    });
    await Promise.all(exits);

    const stats = cache.getStats();
    console.log(`\n✅ Shared cache holds ${stats.entryCount} entries (${stats.writes} writes, ${stats.replacements} replacements)`);
}

async function runWorker() {
    const workerId: unknown = workerData?.workerId;
    const client = await getWorkerCache();
    try {
        for (let i = 0; i < WRITES_PER_WORKER; i++) {
            await client.add(`worker:${String(workerId)}:${i}`, `written by worker ${String(workerId)}`);
        }
        await client.add('last-writer', `worker ${String(workerId)}`);
        const username = await client.get('username');
        console.log(`   worker ${String(workerId)} sees username=${username ?? '(not found)'}`);
    } finally {
        client.close();
    }
}

if (require.main === module) {
    const run = isMainThread ? main : runWorker;
    run().catch((error) => {
        console.error('❌ Cache demo failed:', error);
        process.exitCode = 1;
    });
}
