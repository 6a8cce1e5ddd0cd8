export * from './metrics';
export * from './logger';
export { PinoLoggerService } from './pino-logger.service';
export { HealthService } from './health';
export type { CheckStatus, HealthCheck, ReadinessReport } from './health';
export { HealthController } from './health.controller';
export { ObservabilityModule } from './observability.module';
