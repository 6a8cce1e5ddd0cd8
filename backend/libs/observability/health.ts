import { Inject, Injectable, Optional } from '@nestjs/common';
import { RESILIENT_STORE } from '../resilient-store/resilient-store.constants';
import { ResilientStore } from '../resilient-store/resilient-store';

export type CheckStatus = 'ok' | 'degraded' | 'down';

export interface HealthCheck {
  status: CheckStatus;
  [detail: string]: unknown;
}

export interface ReadinessReport {
  status: 'ok' | 'degraded';
  timestamp: string;
  checks: Record<string, HealthCheck>;
}

/**
 * Health check service
 */
@Injectable()
export class HealthService {
  constructor(
    @Optional()
    @Inject(RESILIENT_STORE)
    private readonly store?: ResilientStore,
  ) {}

  /**
   * Liveness: is the process up?
   */
  getLiveness() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  }

  /**
   * Readiness: event loop lag plus a ping of the injected store
   */
  async getReadiness(): Promise<ReadinessReport> {
    const checks: Record<string, HealthCheck> = {};

    // Check event loop lag
    const eventLoopLag = await this.measureEventLoopLag();
    checks.eventLoop = {
      status: eventLoopLag < 100 ? 'ok' : 'degraded',
      lag: eventLoopLag,
    };

    if (this.store) {
      const healthy = await this.store.healthCheck();
      checks.store = {
        status: healthy ? 'ok' : 'down',
        target: this.store.target,
        reconnection: this.store.reconnectionState,
      };
    }

    const allOk = Object.values(checks).every((check) => check.status === 'ok');

    return {
      status: allOk ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      checks,
    };
  }

  /**
   * Measure event loop lag
   */
  private measureEventLoopLag(): Promise<number> {
    return new Promise((resolve) => {
      const start = Date.now();
      setImmediate(() => {
        resolve(Date.now() - start);
      });
    });
  }
}
