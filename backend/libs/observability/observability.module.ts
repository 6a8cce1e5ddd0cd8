import { Module, Global } from '@nestjs/common';
import { HealthService } from './health';
import { HealthController } from './health.controller';

/**
 * Serves /health, /ready and /metrics. Readiness pings the store registered
 * under RESILIENT_STORE when one is present and reports 503 while it is down.
 */
@Global()
@Module({
  controllers: [HealthController],
  providers: [HealthService],
  exports: [HealthService],
})
export class ObservabilityModule {}
