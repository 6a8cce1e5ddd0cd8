import { Logger } from '@nestjs/common';
import Redis, { type RedisOptions } from 'ioredis';
import type { ConnectionOptions as TlsOptions } from 'tls';
import {
  formatEndpoint,
  maskCredentials,
  type StoreEndpoint,
} from './connection-descriptor';
import { TransientStoreError, describeError } from './resilient-store.errors';

export interface ScanPage {
  cursor: string;
  keys: string[];
}

/**
 * One live transport-level connection to the store. Replaced wholesale on
 * reconnect, never repaired in place.
 */
export interface StoreConnection {
  readonly label: string;
  ping(): Promise<void>;
  get(key: string): Promise<Buffer | null>;
  set(key: string, value: Buffer): Promise<void>;
  /** @returns true when the key was absent and has been written */
  setIfAbsent(key: string, value: Buffer): Promise<boolean>;
  delete(key: string): Promise<void>;
  scan(cursor: string, pattern: string, count: number): Promise<ScanPage>;
  close(): Promise<void>;
}

export interface SentinelConnection {
  readonly label: string;
  /** @returns null when the sentinel does not know the group */
  getPrimaryAddress(groupName: string): Promise<StoreEndpoint | null>;
  close(): Promise<void>;
}

export interface StoreConnectionOptions {
  password?: string;
  tls?: TlsOptions;
  connectTimeoutMs?: number;
  commandTimeoutMs?: number;
}

export interface ConnectionFactory {
  fromUrl(url: string, options: StoreConnectionOptions): StoreConnection;
  connect(
    endpoint: StoreEndpoint,
    options: StoreConnectionOptions,
  ): StoreConnection;
  connectSentinel(
    endpoint: StoreEndpoint,
    options: StoreConnectionOptions,
  ): SentinelConnection;
}

/** The part of an ioredis client the adapters use */
export type StoreClient = Pick<
  Redis,
  | 'status'
  | 'ping'
  | 'getBuffer'
  | 'set'
  | 'del'
  | 'scan'
  | 'call'
  | 'quit'
  | 'disconnect'
>;

async function closeClient(client: StoreClient): Promise<void> {
  if (client.status === 'end') {
    return;
  }
  if (client.status === 'ready') {
    await client.quit();
    return;
  }
  client.disconnect();
}

export class IoredisConnection implements StoreConnection {
  constructor(
    private readonly client: StoreClient,
    readonly label: string,
  ) {}

  async ping(): Promise<void> {
    await this.client.ping();
  }

  get(key: string): Promise<Buffer | null> {
    return this.client.getBuffer(key);
  }

  async set(key: string, value: Buffer): Promise<void> {
    await this.client.set(key, value);
  }

  async setIfAbsent(key: string, value: Buffer): Promise<boolean> {
    const reply = await this.client.set(key, value, 'NX');
    return reply === 'OK';
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  async scan(cursor: string, pattern: string, count: number): Promise<ScanPage> {
    const [next, keys] = await this.client.scan(
      cursor,
      'MATCH',
      pattern,
      'COUNT',
      count,
    );
    return { cursor: next, keys };
  }

  close(): Promise<void> {
    return closeClient(this.client);
  }
}

export class IoredisSentinelConnection implements SentinelConnection {
  constructor(
    private readonly client: StoreClient,
    readonly label: string,
  ) {}

  async getPrimaryAddress(groupName: string): Promise<StoreEndpoint | null> {
    const reply: unknown = await this.client.call(
      'SENTINEL',
      'get-master-addr-by-name',
      groupName,
    );
    if (reply === null) {
      return null;
    }

    if (Array.isArray(reply) && reply.length === 2) {
      const [host, port]: unknown[] = reply;
      const portNumber =
        typeof port === 'string' && /^\d+$/.test(port) ? Number(port) : NaN;
      if (
        typeof host === 'string' &&
        host !== '' &&
        portNumber >= 1 &&
        portNumber <= 65535
      ) {
        return { host, port: portNumber };
      }
    }

    throw new TransientStoreError(
      `Unexpected reply from sentinel ${this.label} for group '${groupName}'`,
    );
  }

  close(): Promise<void> {
    return closeClient(this.client);
  }
}

/**
 * ioredis options with the client's own reconnection and command retries
 * turned off
 */
export function buildClientOptions(
  options: StoreConnectionOptions,
): RedisOptions {
  const clientOptions: RedisOptions = {
    retryStrategy: () => null,
    maxRetriesPerRequest: 0,
  };
  if (options.connectTimeoutMs !== undefined) {
    clientOptions.connectTimeout = options.connectTimeoutMs;
  }
  if (options.commandTimeoutMs !== undefined) {
    clientOptions.commandTimeout = options.commandTimeoutMs;
  }
  if (options.password) {
    clientOptions.password = options.password;
  }
  if (options.tls) {
    clientOptions.tls = options.tls;
  }
  return clientOptions;
}

/**
 * Opens ioredis clients with their own reconnection turned off: a dropped
 * connection fails pending commands instead of queueing them, and the
 * reconnection coordinator decides what happens next.
 */
export class IoredisConnectionFactory implements ConnectionFactory {
  private readonly logger = new Logger(IoredisConnectionFactory.name);

  fromUrl(url: string, options: StoreConnectionOptions): StoreConnection {
    const label = maskCredentials(url);
    const client = new Redis(url, buildClientOptions(options));
    return new IoredisConnection(this.watch(client, label), label);
  }

  connect(
    endpoint: StoreEndpoint,
    options: StoreConnectionOptions,
  ): StoreConnection {
    const label = formatEndpoint(endpoint);
    const client = new Redis({
      ...buildClientOptions(options),
      host: endpoint.host,
      port: endpoint.port,
    });
    return new IoredisConnection(this.watch(client, label), label);
  }

  connectSentinel(
    endpoint: StoreEndpoint,
    options: StoreConnectionOptions,
  ): SentinelConnection {
    const label = formatEndpoint(endpoint);
    const client = new Redis({
      ...buildClientOptions(options),
      host: endpoint.host,
      port: endpoint.port,
      enableReadyCheck: false,
    });
    return new IoredisSentinelConnection(this.watch(client, label), label);
  }

  private watch(client: Redis, label: string): Redis {
    client.on('error', (error: unknown) => {
      this.logger.debug(`Client error on ${label}: ${describeError(error)}`);
    });
    return client;
  }
}
