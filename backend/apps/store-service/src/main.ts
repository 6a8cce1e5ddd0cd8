import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import {
  PinoLoggerService,
  createChildLogger,
  enableDefaultMetrics,
} from '../../../libs/observability';
import { AppModule } from './app.module';
import { loadStoreConfig } from './store.config';

const log = createChildLogger({ component: 'bootstrap' });

async function bootstrap() {
  const config = loadStoreConfig();

  const app = await NestFactory.create(AppModule.register(config), {
    bufferLogs: true,
  });
  app.useLogger(new PinoLoggerService());
  app.enableShutdownHooks();
  enableDefaultMetrics();

  await app.listen(config.port);
  log.info(`Store service running on http://localhost:${config.port}`);
}

bootstrap().catch((error: unknown) => {
  log.fatal({ err: error }, 'Store service failed to start');
  process.exitCode = 1;
});
