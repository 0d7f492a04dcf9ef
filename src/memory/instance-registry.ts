import { DuplicateInstantiationError } from './errors';

/**
 * InstanceRegistry: builds one instance lazily and hands out that same
 * reference for the lifetime of the registry.
 *
 * The factory runs synchronously on the first `getInstance()` call. Since
 * JavaScript runs it to completion before any other caller on this thread can
 * look at the registry, no caller can see a half-built instance; the only way
 * to race it is re-entry from inside the factory, which is rejected.
 *
 * A throwing factory is fatal: the error reaches the caller and nothing is
 * recorded.
 *
 * @example
 * const registry = new InstanceRegistry('Catalog', () => new Catalog());
 * registry.getInstance() === registry.getInstance(); // true
 */
export class InstanceRegistry<T extends object> {
  private instance: T | undefined;
  private building = false;

  constructor(
    private readonly name: string,
    private readonly factory: () => T
  ) {}

  getInstance(): T {
    if (this.instance !== undefined) {
      return this.instance;
    }

    if (this.building) {
      throw new DuplicateInstantiationError(this.name, 'factory requested the instance while building it');
    }

    this.building = true;
    try {
      const created = this.factory();
      this.instance = created;
      return created;
    } finally {
      this.building = false;
    }
  }

  isInitialized(): boolean {
    return this.instance !== undefined;
  }
}

/**
 * Async counterpart of InstanceRegistry for factories that must await
 * something (a handshake, a config fetch) before the instance is usable.
 *
 * Every caller that arrives while the build is in flight joins the same
 * promise, so the factory runs exactly once no matter how many callers race on
 * first access. A rejected build stays rejected: later callers get the same
 * error, prefixed with the registry name and carrying the factory's error as
 * `cause`, instead of triggering a second build.
 */
export class AsyncInstanceRegistry<T extends object> {
  private pending: Promise<T> | undefined;
  private resolved: T | undefined;

  constructor(
    private readonly name: string,
    private readonly factory: () => Promise<T>
  ) {}

  getInstance(): Promise<T> {
    if (this.pending === undefined) {
      this.pending = Promise.resolve()
        .then(() => this.factory())
        .then(
          (created) => {
            this.resolved = created;
            return created;
          },
          (error: unknown) => {
            const message = error instanceof Error ? error.message : String(error);
            throw new Error(`${this.name} could not be built: ${message}`, { cause: error });
          }
        );
    }
    return this.pending;
  }

  /** The built instance, or undefined while it is still being built (or failed). */
  peek(): T | undefined {
    return this.resolved;
  }

  isInitialized(): boolean {
    return this.resolved !== undefined;
  }
}
