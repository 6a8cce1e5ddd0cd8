import { Logger } from '@nestjs/common';
import {
  storeReconnectAttemptsTotal,
  storeReconnectInProgress,
  storeReconnectionsTotal,
} from '../observability/metrics';
import {
  linearBackoff,
  sleep,
} from '../reliability-patterns/reliability-patterns.utils';
import type { ConnectionSlot } from './connection-slot';
import {
  RECONNECT_BASE_INTERVAL_MS,
  RECONNECT_DEFERRED_WAIT_MS,
  RECONNECT_MAX_INTERVAL_MS,
} from './resilient-store.constants';
import {
  ReconnectionExhaustedError,
  StoreClosedError,
  describeError,
  isFatalStoreError,
} from './resilient-store.errors';
import type { StoreConnection } from './store-connection';
import type { ConnectionResolver } from './topology-resolver';

export type ReconnectionState = 'idle' | 'in-progress';

/**
 * - recovered: this caller ran the episode and a new connection is live
 * - deferred: another episode was running; the caller waited briefly
 */
export type ReconnectOutcome = 'recovered' | 'deferred';

export interface ReconnectionOptions {
  baseIntervalMs: number;
  maxIntervalMs: number;
  deferredWaitMs: number;
  sleep: (ms: number) => Promise<void>;
}

const DEFAULT_RECONNECTION_OPTIONS: ReconnectionOptions = {
  baseIntervalMs: RECONNECT_BASE_INTERVAL_MS,
  maxIntervalMs: RECONNECT_MAX_INTERVAL_MS,
  deferredWaitMs: RECONNECT_DEFERRED_WAIT_MS,
  sleep,
};

/**
 * Replaces a store's connection after a transient failure.
 *
 * Only one episode per store runs at a time. Callers that detect a failure
 * while an episode is running wait `deferredWaitMs` and return, leaving the
 * retry of their own operation to them.
 *
 * An episode retries without limit, backing off `min(n * base, max)` after
 * the n-th failed attempt, and gives up only on a fatal (configuration
 * class) error, which is rethrown as ReconnectionExhaustedError. Callers that
 * need an upper bound wrap the operation in their own timeout; an abandoned
 * caller does not cancel the episode.
 */
export class ReconnectionCoordinator {
  private readonly logger = new Logger(ReconnectionCoordinator.name);
  private readonly options: ReconnectionOptions;
  private inProgress = false;

  constructor(
    private readonly resolver: ConnectionResolver,
    private readonly slot: ConnectionSlot,
    options: Partial<ReconnectionOptions> = {},
  ) {
    this.options = { ...DEFAULT_RECONNECTION_OPTIONS, ...options };
  }

  get state(): ReconnectionState {
    return this.inProgress ? 'in-progress' : 'idle';
  }

  async reconnect(): Promise<ReconnectOutcome> {
    if (this.inProgress) {
      this.logger.debug(
        `Reconnection already in progress, waiting ${this.options.deferredWaitMs}ms`,
      );
      storeReconnectionsTotal.inc({ outcome: 'deferred' });
      await this.options.sleep(this.options.deferredWaitMs);
      return 'deferred';
    }

    this.inProgress = true;
    storeReconnectInProgress.inc();
    try {
      await this.runEpisode();
      storeReconnectionsTotal.inc({ outcome: 'recovered' });
      return 'recovered';
    } catch (error) {
      storeReconnectionsTotal.inc({ outcome: 'aborted' });
      this.logger.error(
        `Failed to reconnect to store: ${describeError(error)}`,
      );
      throw error;
    } finally {
      this.inProgress = false;
      storeReconnectInProgress.dec();
    }
  }

  private async runEpisode(): Promise<void> {
    this.logger.warn('Store connection lost, attempting to reconnect...');

    let prior = this.slot.peek();
    let attempt = 0;

    for (;;) {
      if (this.slot.isClosed) {
        throw new StoreClosedError();
      }

      this.logger.log(
        `Reconnecting to ${this.resolver.describe()} (attempt ${attempt + 1})`,
      );

      try {
        if (prior) {
          await this.closeQuietly(prior);
          prior = null;
        }

        const next = await this.resolver.resolve();
        await this.verify(next);
        await this.install(next);

        this.logger.log(`Reconnected to store at ${next.label}`);
        return;
      } catch (error) {
        if (error instanceof StoreClosedError) {
          throw error;
        }
        if (isFatalStoreError(error)) {
          throw new ReconnectionExhaustedError(
            `Reconnection to ${this.resolver.describe()} abandoned: ${describeError(error)}`,
            { cause: error },
          );
        }

        attempt += 1;
        const delay = linearBackoff(
          attempt,
          this.options.baseIntervalMs,
          this.options.maxIntervalMs,
        );
        storeReconnectAttemptsTotal.inc();
        this.logger.warn(
          `Reconnection attempt ${attempt} failed: ${describeError(error)}. Retrying in ${delay / 1000}s...`,
        );
        await this.options.sleep(delay);
      }
    }
  }

  private async verify(connection: StoreConnection): Promise<void> {
    try {
      await connection.ping();
    } catch (error) {
      await this.closeQuietly(connection);
      throw error;
    }
  }

  private async install(connection: StoreConnection): Promise<void> {
    if (this.slot.isClosed) {
      await this.closeQuietly(connection);
      throw new StoreClosedError();
    }
    this.slot.replace(connection);
  }

  private async closeQuietly(connection: StoreConnection): Promise<void> {
    try {
      await connection.close();
    } catch (error) {
      this.logger.debug(
        `Ignoring close error on ${connection.label}: ${describeError(error)}`,
      );
    }
  }
}
