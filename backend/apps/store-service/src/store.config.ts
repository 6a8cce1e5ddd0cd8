import type { ResilientStoreModuleOptions } from '../../../libs/resilient-store';

export interface StoreServiceConfig {
  port: number;
  store: ResilientStoreModuleOptions;
}

const DEFAULT_PORT = 3000;
const DEFAULT_STORE_URL = 'redis://localhost:6379';

/**
 * Read service configuration from the environment
 *
 * - PORT: HTTP port (default 3000)
 * - STORE_URL: redis://, rediss://, redis+sentinel:// or rediss+sentinel://
 * - STORE_CONNECT_TIMEOUT_MS / STORE_COMMAND_TIMEOUT_MS: client timeouts
 * - STORE_SCAN_COUNT: COUNT hint for SCAN pages
 *
 * Numbers that are missing or not positive integers fall back to defaults.
 */
export function loadStoreConfig(
  env: NodeJS.ProcessEnv = process.env,
): StoreServiceConfig {
  return {
    port: readPositiveInt(env.PORT) ?? DEFAULT_PORT,
    store: {
      url: env.STORE_URL || DEFAULT_STORE_URL,
      connectTimeoutMs: readPositiveInt(env.STORE_CONNECT_TIMEOUT_MS),
      commandTimeoutMs: readPositiveInt(env.STORE_COMMAND_TIMEOUT_MS),
      scanCount: readPositiveInt(env.STORE_SCAN_COUNT),
    },
  };
}

function readPositiveInt(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return parsed > 0 ? parsed : undefined;
}
