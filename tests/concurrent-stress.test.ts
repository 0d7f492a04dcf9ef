/**
 * Concurrent stress runs against one store.
 *
 * 8 tasks x 10,000 operations over 50 keys, interleaved on the event loop, and
 * the same shape (smaller) through the worker bridge. Every write is recorded
 * in an external log at the moment it is applied; afterwards each key's value
 * must be the last logged write for it, and no read may ever return a value
 * that was not the latest logged write at that moment.
 */
import { MessageChannel, MessagePort } from 'worker_threads';
import { CacheHost, RemoteCacheClient } from '../src/memory/cache-bridge';
import { ConcurrentKeyValueStore } from '../src/memory/key-value-store';

const KEY_COUNT = 50;
const KEYS = Array.from({ length: KEY_COUNT }, (_, i) => `key-${i}`);

interface WriteRecord {
  key: string;
  value: string;
}

/** Store that appends to an external log inside `add`, right after the write lands. */
class LoggedStore extends ConcurrentKeyValueStore {
  readonly writes: WriteRecord[] = [];
  readonly latest = new Map<string, string>();

  add(key: string, value: string): void {
    super.add(key, value);
    this.writes.push({ key, value });
    this.latest.set(key, value);
  }
}

// Deterministic PRNG so a failing run can be reproduced.
function mulberry32(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function lastWrites(writes: readonly WriteRecord[]): Map<string, string> {
  const latest = new Map<string, string>();
  for (const { key, value } of writes) {
    latest.set(key, value);
  }
  return latest;
}

describe('concurrent stress', () => {
  test('8 tasks x 10,000 add/get operations over 50 keys', async () => {
    const TASKS = 8;
    const OPS_PER_TASK = 10_000;
    const store = new LoggedStore();
    const written = new Map<string, Set<string>>(KEYS.map((key) => [key, new Set<string>()]));
    const violations: string[] = [];

    const runTask = async (taskId: number): Promise<void> => {
      const random = mulberry32(taskId + 1);
      for (let op = 0; op < OPS_PER_TASK; op++) {
        const key = KEYS[Math.floor(random() * KEY_COUNT)];
        if (random() < 0.5) {
          const value = `t${taskId}-op${op}`;
          written.get(key)?.add(value);
          store.add(key, value);
        } else {
          const seen = store.get(key);
          const expected = store.latest.get(key) ?? null;
          if (seen !== expected) {
            violations.push(`${key}: read ${String(seen)}, latest write ${String(expected)}`);
          }
          if (seen !== null && !written.get(key)?.has(seen)) {
            violations.push(`${key}: read ${seen}, which was never written`);
          }
        }
        // Yield so the tasks interleave.
        await Promise.resolve();
      }
    };

    await Promise.all(Array.from({ length: TASKS }, (_, taskId) => runTask(taskId)));

    expect(violations).toEqual([]);
    const expectedFinal = lastWrites(store.writes);
    for (const [key, value] of expectedFinal) {
      expect(store.get(key)).toBe(value);
    }
    expect(store.size()).toBe(expectedFinal.size);
  }, 60_000);

  test('8 worker clients through the bridge', async () => {
    const CLIENTS = 8;
    const OPS_PER_CLIENT = 500;
    const store = new LoggedStore();
    const host = new CacheHost(store);
    const ports: MessagePort[] = [];
    const clients: RemoteCacheClient[] = [];
    const writtenValues = new Map<string, Set<string>>(KEYS.map((key) => [key, new Set<string>()]));
    const badReads: string[] = [];

    for (let i = 0; i < CLIENTS; i++) {
      const { port1, port2 } = new MessageChannel();
      ports.push(port1, port2);
      host.attach(port1);
      clients.push(new RemoteCacheClient(port2, { requestTimeoutMs: 10_000 }));
    }

    try {
      await Promise.all(
        clients.map(async (client, clientId) => {
          const random = mulberry32(1000 + clientId);
          for (let op = 0; op < OPS_PER_CLIENT; op++) {
            const key = KEYS[Math.floor(random() * KEY_COUNT)];
            if (random() < 0.5) {
              const value = `c${clientId}-op${op}`;
              writtenValues.get(key)?.add(value);
              await client.add(key, value);
            } else {
              const seen = await client.get(key);
              if (seen !== null && !writtenValues.get(key)?.has(seen)) {
                badReads.push(`${key}: ${seen}`);
              }
            }
          }
        })
      );

      expect(badReads).toEqual([]);
      const expectedFinal = lastWrites(store.writes);
      for (const [key, value] of expectedFinal) {
        expect(await clients[0].get(key)).toBe(value);
      }
    } finally {
      clients.forEach((client) => client.close());
      ports.forEach((port) => port.close());
    }
  }, 60_000);

  test('same-key overwrites never produce a mixed value', () => {
    const store = new ConcurrentKeyValueStore();
    const v1 = 'a'.repeat(1000);
    const v2 = 'b'.repeat(1000);

    for (let i = 0; i < 1000; i++) {
      store.add('k', i % 2 === 0 ? v1 : v2);
      const seen = store.get('k');
      expect(seen === v1 || seen === v2).toBe(true);
    }
    expect(store.get('k')).toBe(v2);
  });
});
