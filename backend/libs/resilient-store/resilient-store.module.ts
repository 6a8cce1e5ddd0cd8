import {
  DynamicModule,
  Inject,
  Module,
  OnModuleDestroy,
} from '@nestjs/common';
import { RESILIENT_STORE } from './resilient-store.constants';
import { ResilientStore, type ResilientStoreOptions } from './resilient-store';

export interface ResilientStoreModuleOptions<T = unknown>
  extends ResilientStoreOptions<T> {
  url: string;
  /** Register the store for every module (default: true) */
  isGlobal?: boolean;
}

/**
 * Resilient Store Module
 *
 * Provides a connected ResilientStore under the RESILIENT_STORE token and
 * closes it when the application shuts down.
 *
 * @example
 * ResilientStoreModule.forRoot({ url: 'redis+sentinel://s1,s2/mymaster' })
 */
@Module({})
export class ResilientStoreModule implements OnModuleDestroy {
  constructor(
    @Inject(RESILIENT_STORE) private readonly store: ResilientStore,
  ) {}

  static forRoot<T>(options: ResilientStoreModuleOptions<T>): DynamicModule {
    const { url, isGlobal = true, ...storeOptions } = options;

    return {
      module: ResilientStoreModule,
      global: isGlobal,
      providers: [
        {
          provide: RESILIENT_STORE,
          useFactory: async () => {
            const store = new ResilientStore<T>(url, storeOptions);
            await store.connect();
            return store;
          },
        },
      ],
      exports: [RESILIENT_STORE],
    };
  }

  async onModuleDestroy() {
    await this.store.close();
  }
}
