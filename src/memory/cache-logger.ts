/**
 * Console sink for the cache's `log` events.
 */
import { EventEmitter } from 'events';
import { CacheLogEvent } from '../types';

export interface CacheLoggerOptions {
  verbose: boolean;
  prefix?: string;
}

const QUIET_EVENTS = new Set<CacheLogEvent['event']>(['get_hit', 'get_miss', 'remove_miss']);
const WARNING_EVENTS = new Set<CacheLogEvent['event']>(['add_rejected', 'protocol_error']);

export function formatCacheEvent(event: CacheLogEvent, prefix = '[cache]'): string {
  const parts = [prefix, event.event];
  if (event.key !== undefined) {
    parts.push(`key=${JSON.stringify(event.key)}`);
  }
  if (event.entryCount !== undefined) {
    parts.push(`entries=${event.entryCount}`);
  }
  if (event.reason !== undefined) {
    parts.push(`(${event.reason})`);
  }
  return parts.join(' ');
}

/**
 * Print cache events to the console. Hits and misses are skipped unless
 * `verbose` is set.
 *
 * @returns a function that detaches the logger
 */
export function attachConsoleLogger(source: EventEmitter, options: CacheLoggerOptions): () => void {
  const listener = (event: CacheLogEvent): void => {
    if (!options.verbose && QUIET_EVENTS.has(event.event)) {
      return;
    }
    const line = formatCacheEvent(event, options.prefix);
    if (WARNING_EVENTS.has(event.event)) {
      console.warn(`⚠️  ${line}`);
    } else {
      console.log(line);
    }
  };

  source.on('log', listener);
  return () => {
    source.off('log', listener);
  };
}
