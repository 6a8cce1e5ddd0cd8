import { Logger } from '@nestjs/common';
import { storeOperationsTotal } from '../observability/metrics';
import { withTimeout } from '../reliability-patterns/reliability-patterns.utils';
import {
  parseConnectionDescriptor,
  type ConnectionDescriptor,
} from './connection-descriptor';
import { ConnectionSlot } from './connection-slot';
import {
  ReconnectionCoordinator,
  type ReconnectionOptions,
  type ReconnectionState,
} from './reconnection-coordinator';
import {
  DEFAULT_SCAN_COUNT,
  HEALTH_CHECK_TIMEOUT_MS,
} from './resilient-store.constants';
import {
  StoreClosedError,
  describeError,
  isTransientStoreError,
} from './resilient-store.errors';
import { buildSecureTransport } from './secure-transport';
import {
  IoredisConnectionFactory,
  type ConnectionFactory,
  type StoreConnection,
} from './store-connection';
import { TopologyResolver } from './topology-resolver';
import { jsonEncoder, type ValueEncoder } from './value-codec';

export type StoreOperation = 'set' | 'setIfAbsent' | 'get' | 'delete' | 'scan';

export interface ResilientStoreOptions<T> {
  /** Defaults to JSON */
  encoder?: ValueEncoder<T>;
  /** Defaults to ioredis */
  connectionFactory?: ConnectionFactory;
  connectTimeoutMs?: number;
  commandTimeoutMs?: number;
  /** COUNT hint sent with every SCAN page */
  scanCount?: number;
  healthCheckTimeoutMs?: number;
  reconnection?: Partial<ReconnectionOptions>;
}

/**
 * Key/value persistence over a direct or sentinel-managed store.
 *
 * Every operation runs once against the live connection. A transient
 * (connection-level) failure hands over to the reconnection coordinator,
 * then the operation runs exactly once more; a second failure is thrown
 * as is. Application-level errors are thrown straight away.
 *
 * @example
 * const store = new ResilientStore<Policy>(
 *   'redis+sentinel://s1,s2/policies?password=secret',
 * );
 * await store.connect();
 * await store.set('policy:1', policy);
 * for await (const bytes of store.scan('policy:*')) { ... }
 * await store.close();
 */
export class ResilientStore<T = unknown> {
  private readonly logger = new Logger(ResilientStore.name);
  private readonly slot = new ConnectionSlot();
  private readonly resolver: TopologyResolver;
  private readonly coordinator: ReconnectionCoordinator;
  private readonly encode: ValueEncoder<T>;
  private readonly scanCount: number;
  private readonly healthCheckTimeoutMs: number;

  readonly descriptor: ConnectionDescriptor;

  /**
   * @throws MalformedDescriptorError for an invalid connection string
   * @throws TransportConfigError when TLS is on and the CA bundle is unusable
   */
  constructor(url: string, options: ResilientStoreOptions<T> = {}) {
    this.descriptor = parseConnectionDescriptor(url);
    if (this.descriptor.kind === 'discovery' && this.descriptor.tls) {
      buildSecureTransport(this.descriptor.verifyMode, this.descriptor.caPath);
    }

    this.resolver = new TopologyResolver(
      this.descriptor,
      options.connectionFactory ?? new IoredisConnectionFactory(),
      {
        connectTimeoutMs: options.connectTimeoutMs,
        commandTimeoutMs: options.commandTimeoutMs,
      },
    );
    this.coordinator = new ReconnectionCoordinator(
      this.resolver,
      this.slot,
      options.reconnection,
    );
    this.encode = options.encoder ?? jsonEncoder;
    this.scanCount = options.scanCount ?? DEFAULT_SCAN_COUNT;
    this.healthCheckTimeoutMs =
      options.healthCheckTimeoutMs ?? HEALTH_CHECK_TIMEOUT_MS;
  }

  get reconnectionState(): ReconnectionState {
    return this.coordinator.state;
  }

  get target(): string {
    return this.resolver.describe();
  }

  /**
   * Open the initial connection. A transient failure here is logged and
   * left to the first operation to recover.
   */
  async connect(): Promise<void> {
    if (this.slot.isClosed) {
      throw new StoreClosedError();
    }
    if (this.slot.peek()) {
      return;
    }

    try {
      const connection = await this.resolver.resolve();
      if (this.slot.isClosed) {
        await connection.close().catch((error: unknown) => {
          this.logger.debug(
            `Ignoring close error on ${connection.label}: ${describeError(error)}`,
          );
        });
        throw new StoreClosedError();
      }
      this.slot.replace(connection);
    } catch (error) {
      if (!isTransientStoreError(error)) {
        throw error;
      }
      this.logger.warn(
        `Initial connection to ${this.target} failed: ${describeError(error)}. Recovery deferred to the first operation`,
      );
    }
  }

  async set(key: string, value: T): Promise<void> {
    const bytes = this.encode(value);
    await this.execute('set', (connection) => connection.set(key, bytes));
  }

  /**
   * @returns true if the value was written, false if the key already existed
   */
  async setIfAbsent(key: string, value: T): Promise<boolean> {
    const bytes = this.encode(value);
    return this.execute('setIfAbsent', (connection) =>
      connection.setIfAbsent(key, bytes),
    );
  }

  async get(key: string): Promise<Buffer | null> {
    return this.execute('get', (connection) => connection.get(key));
  }

  async delete(key: string): Promise<void> {
    await this.execute('delete', (connection) => connection.delete(key));
  }

  /**
   * Yield the value of every key matching a glob-style pattern, in no
   * particular order. Keys removed between SCAN and GET are skipped.
   *
   * Not resumable: after a transient failure the scan starts over from the
   * first page on the recovered connection, so values already yielded can
   * be yielded again.
   */
  async *scan(pattern: string): AsyncGenerator<Buffer, void, undefined> {
    try {
      yield* this.scanOnce(pattern);
      storeOperationsTotal.inc({ operation: 'scan', outcome: 'ok' });
      return;
    } catch (error) {
      if (!isTransientStoreError(error)) {
        storeOperationsTotal.inc({ operation: 'scan', outcome: 'failed' });
        throw error;
      }
      await this.recover('scan', error);
    }

    try {
      yield* this.scanOnce(pattern);
      storeOperationsTotal.inc({ operation: 'scan', outcome: 'retried' });
    } catch (error) {
      storeOperationsTotal.inc({ operation: 'scan', outcome: 'failed' });
      throw error;
    }
  }

  /**
   * Ping the live connection without triggering recovery
   */
  async healthCheck(): Promise<boolean> {
    try {
      await withTimeout(
        this.slot.current().ping(),
        this.healthCheckTimeoutMs,
        'Store ping timeout',
      );
      return true;
    } catch (error) {
      this.logger.warn(`Store health check failed: ${describeError(error)}`);
      return false;
    }
  }

  /** Release the connection. Safe to call more than once. */
  async close(): Promise<void> {
    if (this.slot.isClosed) {
      return;
    }

    const connection = this.slot.close();
    if (connection) {
      await connection.close();
    }
    this.logger.log('Store connection closed');
  }

  private async *scanOnce(pattern: string): AsyncGenerator<Buffer, void, undefined> {
    const connection = this.slot.current();
    let cursor = '0';

    do {
      const page = await connection.scan(cursor, pattern, this.scanCount);
      cursor = page.cursor;

      for (const key of page.keys) {
        const value = await connection.get(key);
        if (value !== null) {
          yield value;
        }
      }
    } while (cursor !== '0');
  }

  private async execute<R>(
    operation: StoreOperation,
    run: (connection: StoreConnection) => Promise<R>,
  ): Promise<R> {
    try {
      const result = await run(this.slot.current());
      storeOperationsTotal.inc({ operation, outcome: 'ok' });
      return result;
    } catch (error) {
      if (!isTransientStoreError(error)) {
        storeOperationsTotal.inc({ operation, outcome: 'failed' });
        throw error;
      }
      await this.recover(operation, error);
    }

    try {
      const result = await run(this.slot.current());
      storeOperationsTotal.inc({ operation, outcome: 'retried' });
      return result;
    } catch (error) {
      storeOperationsTotal.inc({ operation, outcome: 'failed' });
      throw error;
    }
  }

  private async recover(operation: StoreOperation, cause: unknown): Promise<void> {
    this.logger.warn(
      `Store ${operation} failed: ${describeError(cause)}. Reconnecting...`,
    );
    try {
      await this.coordinator.reconnect();
    } catch (error) {
      storeOperationsTotal.inc({ operation, outcome: 'failed' });
      throw error;
    }
  }
}
