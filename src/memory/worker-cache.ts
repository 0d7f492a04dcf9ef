import { isMainThread, parentPort } from 'worker_threads';
import { loadCacheConfig } from '../config';
import { CacheChannel, RemoteCacheClient } from './cache-bridge';
import { AsyncInstanceRegistry } from './instance-registry';

/**
 * Build the registry a worker uses to reach the shared cache.
 *
 * All tasks in the worker that call `getInstance()` before the handshake
 * finishes share one connection attempt.
 */
export function createWorkerCacheRegistry(
  channel: CacheChannel,
  requestTimeoutMs: number
): AsyncInstanceRegistry<RemoteCacheClient> {
  return new AsyncInstanceRegistry('RemoteCacheClient', () =>
    RemoteCacheClient.connect(channel, { requestTimeoutMs })
  );
}

let workerRegistry: AsyncInstanceRegistry<RemoteCacheClient> | undefined;

/**
 * The shared cache as seen from inside a worker thread. The main thread must
 * have attached a CacheHost to this worker.
 */
export function getWorkerCache(): Promise<RemoteCacheClient> {
  if (isMainThread || parentPort === null) {
    return Promise.reject(new Error('getWorkerCache() is only available inside a worker thread; use SharedCache.instance'));
  }

  if (workerRegistry === undefined) {
    workerRegistry = createWorkerCacheRegistry(parentPort, loadCacheConfig().requestTimeoutMs);
  }
  return workerRegistry.getInstance();
}
