import { EventEmitter } from 'events';
import { z } from 'zod';
import {
  CacheClosedError,
  CacheTimeoutError,
  InvalidKeyError,
  ProtocolError,
} from './errors';
import { ConcurrentKeyValueStore } from './key-value-store';
import { AsyncKeyValueCache, CacheLogEvent } from '../types';

/**
 * Cache bridge: lets worker threads use the main thread's store.
 *
 * Worker threads do not share heap objects, so the single store lives on the
 * main thread and a CacheHost serves it over a MessagePort. Each request is
 * applied synchronously by the host, inside the store's critical section, in
 * the order the host receives it. Workers only ever see structured-clone
 * copies of values.
 *
 *   main thread                         worker
 *   CacheHost.attach(worker) <-------> RemoteCacheClient(parentPort)
 *
 * Wire format:
 *   request  { id, op, key?, value? }
 *   response { id, ok: true, result } | { id, ok: false, error: { name, message } }
 */

/** The part of MessagePort / Worker the bridge needs. */
export interface CacheChannel {
  postMessage(message: unknown): void;
  on(event: 'message', listener: (message: unknown) => void): unknown;
  off(event: 'message', listener: (message: unknown) => void): unknown;
}

const keyField = z.string();

export const cacheRequestSchema = z.discriminatedUnion('op', [
  z.object({ id: z.number().int(), op: z.literal('add'), key: keyField, value: z.string() }),
  z.object({ id: z.number().int(), op: z.literal('get'), key: keyField }),
  z.object({ id: z.number().int(), op: z.literal('remove'), key: keyField }),
  z.object({ id: z.number().int(), op: z.literal('has'), key: keyField }),
  z.object({ id: z.number().int(), op: z.literal('size') }),
  z.object({ id: z.number().int(), op: z.literal('ping') }),
]);

export type CacheRequest = z.infer<typeof cacheRequestSchema>;
export type CacheOperation = CacheRequest['op'];

const resultField = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const cacheResponseSchema = z.union([
  z.object({ id: z.number().int(), ok: z.literal(true), result: resultField }),
  z.object({
    id: z.number().int(),
    ok: z.literal(false),
    error: z.object({ name: z.string(), message: z.string() }),
  }),
]);

export type CacheResponse = z.infer<typeof cacheResponseSchema>;
type CacheResult = z.infer<typeof resultField>;

const requestIdSchema = z.object({ id: z.number().int() });

// ============== HOST (main thread) ==============

export class CacheHost {
  constructor(private readonly store: ConcurrentKeyValueStore) {}

  /**
   * Serve requests arriving on `channel` until the returned function is called.
   */
  attach(channel: CacheChannel): () => void {
    const listener = (message: unknown): void => {
      const response = this.handle(message);
      if (response !== null) {
        channel.postMessage(response);
      }
    };
    channel.on('message', listener);
    return () => {
      channel.off('message', listener);
    };
  }

  /**
   * Apply one request to the store and build its response. Exposed so the
   * host logic can be driven without a channel.
   *
   * Every request that carries an id gets a response, including one whose
   * operation threw. A malformed message without an id is only logged, since
   * there is no caller to answer; `null` is returned for it.
   */
  handle(message: unknown): CacheResponse | null {
    const parsed = cacheRequestSchema.safeParse(message);
    if (!parsed.success) {
      const id = requestIdSchema.safeParse(message);
      const reason = parsed.error.issues.map((issue) => issue.message).join('; ');
      this.store.log({ event: 'protocol_error', reason });
      if (!id.success) {
        return null;
      }
      return {
        id: id.data.id,
        ok: false,
        error: { name: 'ProtocolError', message: `Malformed cache request: ${reason}` },
      };
    }

    const request = parsed.data;
    try {
      return { id: request.id, ok: true, result: this.apply(request) };
    } catch (error) {
      if (error instanceof Error) {
        return { id: request.id, ok: false, error: { name: error.name, message: error.message } };
      }
      return { id: request.id, ok: false, error: { name: 'Error', message: String(error) } };
    }
  }

  private apply(request: CacheRequest): CacheResult {
    switch (request.op) {
      case 'add':
        this.store.add(request.key, request.value);
        return null;
      case 'get':
        return this.store.get(request.key);
      case 'remove':
        return this.store.remove(request.key);
      case 'has':
        return this.store.has(request.key);
      case 'size':
        return this.store.size();
      case 'ping':
        return 'pong';
    }
  }
}

// ============== CLIENT (worker thread) ==============

export interface RemoteCacheClientOptions {
  requestTimeoutMs: number;
}

interface PendingRequest {
  operation: CacheOperation;
  resolve: (result: CacheResult) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

type RequestBody =
  | { op: 'add'; key: string; value: string }
  | { op: 'get' | 'remove' | 'has'; key: string }
  | { op: 'size' | 'ping' };

/**
 * Promise-based view of a CacheHost's store.
 *
 * Errors the host reports come back as the matching CacheError subclass;
 * `add` with an invalid key rejects with InvalidKeyError just like the local
 * store throws it.
 */
export class RemoteCacheClient extends EventEmitter implements AsyncKeyValueCache {
  private nextId = 1;
  private closed = false;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly listener = (message: unknown): void => this.onMessage(message);

  constructor(
    private readonly channel: CacheChannel,
    private readonly options: RemoteCacheClientOptions
  ) {
    super();
    channel.on('message', this.listener);
  }

  /**
   * Build a client and wait for the host to answer a ping.
   */
  static async connect(channel: CacheChannel, options: RemoteCacheClientOptions): Promise<RemoteCacheClient> {
    const client = new RemoteCacheClient(channel, options);
    await client.ping();
    return client;
  }

  async add(key: string, value: string): Promise<void> {
    await this.request({ op: 'add', key, value });
  }

  async get(key: string): Promise<string | null> {
    const result = await this.request({ op: 'get', key });
    if (result === null || typeof result === 'string') {
      return result;
    }
    throw new ProtocolError(`Expected a string or null for get, got ${typeof result}`);
  }

  async remove(key: string): Promise<boolean> {
    return this.expectBoolean(await this.request({ op: 'remove', key }), 'remove');
  }

  async has(key: string): Promise<boolean> {
    return this.expectBoolean(await this.request({ op: 'has', key }), 'has');
  }

  async size(): Promise<number> {
    const result = await this.request({ op: 'size' });
    if (typeof result === 'number') {
      return result;
    }
    throw new ProtocolError(`Expected a number for size, got ${typeof result}`);
  }

  async ping(): Promise<void> {
    const result = await this.request({ op: 'ping' });
    if (result !== 'pong') {
      throw new ProtocolError('Cache host did not answer the handshake');
    }
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Stop listening and reject everything still in flight.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.channel.off('message', this.listener);
    for (const [id, entry] of this.pending) {
      clearTimeout(entry.timer);
      entry.reject(new CacheClosedError(`Cache client closed before ${entry.operation} completed`));
      this.pending.delete(id);
    }
  }

  private request(body: RequestBody): Promise<CacheResult> {
    if (this.closed) {
      return Promise.reject(new CacheClosedError());
    }

    const id = this.nextId++;
    return new Promise<CacheResult>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new CacheTimeoutError(body.op, this.options.requestTimeoutMs));
      }, this.options.requestTimeoutMs);
      timer.unref();

      this.pending.set(id, { operation: body.op, resolve, reject, timer });
      this.channel.postMessage({ id, ...body });
    });
  }

  private onMessage(message: unknown): void {
    const parsed = cacheResponseSchema.safeParse(message);
    if (!parsed.success) {
      const event: CacheLogEvent = {
        event: 'protocol_error',
        reason: 'malformed cache response',
        timestamp: Date.now(),
      };
      this.emit('log', event);
      return;
    }

    const response = parsed.data;
    const entry = this.pending.get(response.id);
    if (entry === undefined) {
      // Late reply to a request that already timed out.
      return;
    }
    this.pending.delete(response.id);
    clearTimeout(entry.timer);

    if (response.ok) {
      entry.resolve(response.result);
    } else {
      entry.reject(rebuildError(response.error.name, response.error.message));
    }
  }

  private expectBoolean(result: CacheResult, operation: string): boolean {
    if (typeof result === 'boolean') {
      return result;
    }
    throw new ProtocolError(`Expected a boolean for ${operation}, got ${typeof result}`);
  }
}

function rebuildError(name: string, message: string): Error {
  switch (name) {
    case 'InvalidKeyError':
      return new InvalidKeyError(message, undefined);
    case 'ProtocolError':
      return new ProtocolError(message);
    default: {
      const error = new Error(message);
      error.name = name;
      return error;
    }
  }
}
