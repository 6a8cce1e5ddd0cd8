import { Logger } from '@nestjs/common';
import {
  formatEndpoint,
  maskCredentials,
  type ConnectionDescriptor,
  type DiscoveryDescriptor,
  type StoreEndpoint,
} from './connection-descriptor';
import {
  PrimaryNotFoundError,
  describeError,
  isFatalStoreError,
} from './resilient-store.errors';
import { buildSecureTransport } from './secure-transport';
import type {
  ConnectionFactory,
  StoreConnection,
  StoreConnectionOptions,
} from './store-connection';

export interface ConnectionResolver {
  /** Open a fresh connection to the endpoint currently accepting writes */
  resolve(): Promise<StoreConnection>;
  describe(): string;
}

export interface TopologyResolverOptions {
  connectTimeoutMs?: number;
  commandTimeoutMs?: number;
}

/**
 * Turns a descriptor into live connections. Direct topologies reopen the
 * same URL; discovery topologies ask the sentinels for the current primary
 * every time, since it may have moved since the last call.
 */
export class TopologyResolver implements ConnectionResolver {
  private readonly logger = new Logger(TopologyResolver.name);
  private readonly sentinels: StoreEndpoint[];

  constructor(
    private readonly descriptor: ConnectionDescriptor,
    private readonly factory: ConnectionFactory,
    private readonly options: TopologyResolverOptions = {},
  ) {
    this.sentinels =
      descriptor.kind === 'discovery' ? [...descriptor.sentinels] : [];
  }

  describe(): string {
    return this.descriptor.kind === 'direct'
      ? maskCredentials(this.descriptor.url)
      : `sentinel group '${this.descriptor.groupName}'`;
  }

  /** Sentinels in the order the next resolution will query them */
  get sentinelOrder(): readonly StoreEndpoint[] {
    return this.sentinels;
  }

  async resolve(): Promise<StoreConnection> {
    if (this.descriptor.kind === 'direct') {
      this.logger.log(
        `Connecting to store: ${maskCredentials(this.descriptor.url)}`,
      );
      return this.factory.fromUrl(this.descriptor.url, this.baseOptions());
    }
    return this.resolveDiscovery(this.descriptor);
  }

  private async resolveDiscovery(
    descriptor: DiscoveryDescriptor,
  ): Promise<StoreConnection> {
    // Rebuilt on every resolution so a rotated CA bundle is picked up
    const tls = descriptor.tls
      ? buildSecureTransport(descriptor.verifyMode, descriptor.caPath).tls
      : undefined;

    this.logger.log(
      `Discovering primary via sentinels: hosts=${this.sentinels
        .map((endpoint) => formatEndpoint(endpoint))
        .join(',')}, group=${descriptor.groupName}, ssl=${descriptor.tls}`,
    );

    const primary = await this.discoverPrimary(descriptor, {
      ...this.baseOptions(),
      password: descriptor.sentinelPassword,
      tls,
    });

    this.logger.log(
      `Connecting to primary ${formatEndpoint(primary)} of group '${descriptor.groupName}'`,
    );
    return this.factory.connect(primary, {
      ...this.baseOptions(),
      password: descriptor.password,
      tls,
    });
  }

  private async discoverPrimary(
    descriptor: DiscoveryDescriptor,
    sentinelOptions: StoreConnectionOptions,
  ): Promise<StoreEndpoint> {
    const failures: unknown[] = [];

    for (const [index, sentinel] of this.sentinels.entries()) {
      const connection = this.factory.connectSentinel(sentinel, sentinelOptions);
      try {
        const primary = await connection.getPrimaryAddress(
          descriptor.groupName,
        );
        if (primary) {
          this.promote(index);
          return primary;
        }
        this.logger.warn(
          `Sentinel ${connection.label} does not know group '${descriptor.groupName}'`,
        );
      } catch (error) {
        if (isFatalStoreError(error)) {
          throw error;
        }
        failures.push(error);
        this.logger.warn(
          `Sentinel ${connection.label} unavailable: ${describeError(error)}`,
        );
      } finally {
        await connection.close().catch((error: unknown) => {
          this.logger.debug(
            `Ignoring sentinel close error: ${describeError(error)}`,
          );
        });
      }
    }

    throw new PrimaryNotFoundError(descriptor.groupName, failures);
  }

  // The sentinel that answered is asked first next time
  private promote(index: number): void {
    if (index > 0) {
      const [sentinel] = this.sentinels.splice(index, 1);
      this.sentinels.unshift(sentinel);
    }
  }

  private baseOptions(): StoreConnectionOptions {
    return {
      connectTimeoutMs: this.options.connectTimeoutMs,
      commandTimeoutMs: this.options.commandTimeoutMs,
    };
  }
}
