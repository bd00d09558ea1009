import { createLogger, retry } from '@sensor-registry/shared-utils';
import { PoolClosedError, PoolExhaustedError } from '../lib/errors';

const logger = createLogger('Pool');

export interface ConnectionFactory<C> {
  create(): Promise<C>;
  destroy(connection: C): Promise<void>;
}

export interface PoolOptions {
  minSize: number;
  maxSize: number;
  acquireTimeoutMs: number;
  /** Extra acquisition attempts after exhaustion or a failed connect. */
  acquireRetries?: number;
  retryDelayMs?: number;
  /**
   * Decides whether an error raised while a lease was held poisoned the
   * connection. Poisoned connections are destroyed instead of reused.
   */
  isConnectionError?: (error: unknown) => boolean;
}

export interface Lease<C> {
  readonly id: number;
  readonly connection: C;
}

export interface PoolStats {
  size: number;
  idle: number;
  leased: number;
  waiting: number;
}

interface Waiter<C> {
  resolve: (lease: Lease<C>) => void;
  reject: (error: unknown) => void;
  timer: ReturnType<typeof setTimeout>;
}

export function validatePoolSize(minSize: number, maxSize: number): void {
  if (!Number.isInteger(minSize) || minSize < 1) {
    throw new RangeError(`Pool minSize must be a positive integer, got ${minSize}`);
  }
  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new RangeError(`Pool maxSize must be a positive integer, got ${maxSize}`);
  }
  if (minSize > maxSize) {
    throw new RangeError(`Pool minSize (${minSize}) must not exceed maxSize (${maxSize})`);
  }
}

export class ConnectionPool<C> {
  private readonly idle: C[] = [];
  private readonly leased = new Map<number, C>();
  private readonly waiters: Waiter<C>[] = [];
  private pending = 0;
  private nextLeaseId = 1;
  private closed = false;

  private readonly minSize: number;
  private readonly maxSize: number;
  private readonly acquireTimeoutMs: number;
  private readonly acquireRetries: number;
  private readonly retryDelayMs: number;
  private readonly isConnectionError: (error: unknown) => boolean;

  constructor(
    private readonly factory: ConnectionFactory<C>,
    options: PoolOptions
  ) {
    validatePoolSize(options.minSize, options.maxSize);
    this.minSize = options.minSize;
    this.maxSize = options.maxSize;
    this.acquireTimeoutMs = options.acquireTimeoutMs;
    this.acquireRetries = options.acquireRetries ?? 1;
    this.retryDelayMs = options.retryDelayMs ?? 50;
    this.isConnectionError = options.isConnectionError ?? (() => true);
  }

  /** Live connections, including ones being opened. */
  get size(): number {
    return this.idle.length + this.leased.size + this.pending;
  }

  stats(): PoolStats {
    return {
      size: this.size,
      idle: this.idle.length,
      leased: this.leased.size,
      waiting: this.waiters.length,
    };
  }

  async start(): Promise<void> {
    const missing = this.minSize - this.size;
    if (missing <= 0) return;

    this.pending += missing;
    const results = await Promise.allSettled(
      Array.from({ length: missing }, () => this.factory.create())
    );
    this.pending -= missing;

    const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    for (const result of results) {
      if (result.status === 'fulfilled') {
        this.idle.push(result.value);
      }
    }
    if (failure) {
      throw failure.reason;
    }

    logger.debug(`Pre-warmed ${missing} connection(s)`);
  }

  async acquire(): Promise<Lease<C>> {
    return retry(() => this.acquireOnce(), {
      maxAttempts: 1 + this.acquireRetries,
      baseDelayMs: this.retryDelayMs,
      maxDelayMs: this.retryDelayMs * 4,
      shouldRetry: () => !this.closed,
      onRetry: (error, attempt, delayMs) => {
        logger.warn(`Acquire attempt ${attempt} failed, retrying in ${Math.round(delayMs)}ms`, error);
      },
    });
  }

  release(lease: Lease<C>, error?: unknown): void {
    const connection = this.leased.get(lease.id);
    if (connection === undefined) {
      throw new Error(`Lease ${lease.id} is not held`);
    }
    this.leased.delete(lease.id);

    const poisoned = error !== undefined && this.isConnectionError(error);
    if (this.closed || poisoned) {
      if (poisoned) {
        logger.warn(`Discarding connection from lease ${lease.id}`, error);
      }
      void this.destroyConnection(connection);
      this.replenish();
      return;
    }

    this.handOff(connection);
  }

  /** Runs `fn` on a leased connection and releases it on every exit path. */
  async withConnection<T>(fn: (connection: C) => T | Promise<T>): Promise<T> {
    const lease = await this.acquire();
    let result: T;
    try {
      result = await fn(lease.connection);
    } catch (error) {
      this.release(lease, error);
      throw error;
    }
    this.release(lease);
    return result;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(new PoolClosedError());
    }

    const idle = this.idle.splice(0);
    await Promise.all(idle.map((connection) => this.destroyConnection(connection)));
    logger.debug(`Closed pool (${this.leased.size} lease(s) still out)`);
  }

  private async acquireOnce(): Promise<Lease<C>> {
    if (this.closed) {
      throw new PoolClosedError();
    }

    const connection = this.idle.pop();
    if (connection !== undefined) {
      return this.lease(connection);
    }

    if (this.size < this.maxSize) {
      let opened: C;
      try {
        opened = await this.open();
      } catch (error) {
        // the slot this caller held is free again
        this.openFor(Math.min(this.waiters.length, this.maxSize - this.size));
        throw error;
      }
      return this.lease(opened);
    }

    return new Promise<Lease<C>>((resolve, reject) => {
      const waiter: Waiter<C> = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          reject(new PoolExhaustedError(this.acquireTimeoutMs));
        }, this.acquireTimeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  private lease(connection: C): Lease<C> {
    const id = this.nextLeaseId++;
    this.leased.set(id, connection);
    return { id, connection };
  }

  private async open(): Promise<C> {
    this.pending++;
    let connection: C;
    try {
      connection = await this.factory.create();
    } finally {
      this.pending--;
    }
    if (this.closed) {
      await this.destroyConnection(connection);
      throw new PoolClosedError();
    }
    return connection;
  }

  private handOff(connection: C): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(this.lease(connection));
      return;
    }
    this.idle.push(connection);
  }

  // Refill after a discard: back up to minSize, or enough to serve whoever is waiting
  private replenish(): void {
    this.openFor(Math.max(this.minSize - this.size, Math.min(this.waiters.length, this.maxSize - this.size)));
  }

  // Background opens; a failure goes to the head waiter, which retries on its own
  private openFor(count: number): void {
    if (this.closed) return;
    for (let i = 0; i < count; i++) {
      void this.open().then(
        (connection) => this.handOff(connection),
        (error: unknown) => {
          logger.error('Failed to open replacement connection', error);
          const waiter = this.waiters.shift();
          if (waiter) {
            clearTimeout(waiter.timer);
            waiter.reject(error);
          }
        }
      );
    }
  }

  private async destroyConnection(connection: C): Promise<void> {
    try {
      await this.factory.destroy(connection);
    } catch (error) {
      logger.error('Failed to close connection', error);
    }
  }
}
