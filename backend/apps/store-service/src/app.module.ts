import { DynamicModule, Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ObservabilityModule } from '../../../libs/observability';
import { ResilientStoreModule } from '../../../libs/resilient-store';
import { StoreController } from './store.controller';
import { StoreExceptionFilter } from './store-exception.filter';
import type { StoreServiceConfig } from './store.config';

@Module({})
export class AppModule {
  static register(config: StoreServiceConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [ObservabilityModule, ResilientStoreModule.forRoot(config.store)],
      controllers: [StoreController],
      providers: [{ provide: APP_FILTER, useClass: StoreExceptionFilter }],
    };
  }
}
