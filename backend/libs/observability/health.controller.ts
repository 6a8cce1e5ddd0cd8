import {
  Controller,
  Get,
  Header,
  ServiceUnavailableException,
} from '@nestjs/common';
import { HealthService } from './health';
import { register } from './metrics';

/**
 * Health and metrics controller
 */
@Controller()
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get('/health')
  getLiveness() {
    return this.healthService.getLiveness();
  }

  /**
   * Answers 503 while the store is unreachable so the
   * instance is taken out of rotation until reconnection succeeds
   */
  @Get('/ready')
  async getReadiness() {
    const report = await this.healthService.getReadiness();
    if (report.checks.store?.status === 'down') {
      throw new ServiceUnavailableException(report);
    }
    return report;
  }

  /**
   * Prometheus metrics endpoint
   */
  @Get('/metrics')
  @Header('Content-Type', register.contentType)
  async getMetrics() {
    return register.metrics();
  }
}
