export * from './connection-descriptor';
export * from './connection-slot';
export * from './reconnection-coordinator';
export * from './resilient-store';
export * from './resilient-store.constants';
export * from './resilient-store.errors';
export { ResilientStoreModule } from './resilient-store.module';
export type { ResilientStoreModuleOptions } from './resilient-store.module';
export * from './secure-transport';
export * from './store-connection';
export * from './topology-resolver';
export * from './value-codec';
