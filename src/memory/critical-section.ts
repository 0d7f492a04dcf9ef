import { LockReentryError } from './errors';

/**
 * Exclusive section guarding one piece of shared state.
 *
 * Store operations are synchronous, so on a single event loop two sections can
 * only overlap by re-entry: a callback run from inside `fn` calling back into
 * the store. That is rejected with LockReentryError instead of letting the
 * nested call observe a half-applied mutation.
 *
 * The section is released in `finally`, so a throwing `fn` never leaves it held.
 */
export class CriticalSection {
  private holder: string | null = null;

  get isHeld(): boolean {
    return this.holder !== null;
  }

  run<T>(operation: string, fn: () => T): T {
    if (this.holder !== null) {
      throw new LockReentryError(this.holder, operation);
    }

    this.holder = operation;
    try {
      return fn();
    } finally {
      this.holder = null;
    }
  }
}
