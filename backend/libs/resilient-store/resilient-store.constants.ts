export const RESILIENT_STORE = 'RESILIENT_STORE';

export const DIRECT_SCHEMES = ['redis', 'rediss'] as const;
export const DISCOVERY_SCHEMES = ['redis+sentinel', 'rediss+sentinel'] as const;

export const DEFAULT_SENTINEL_PORT = 26379;
export const DEFAULT_GROUP_NAME = 'mymaster';

export const CREDENTIAL_MASK = '****';

// Reconnection backoff: min(attempt * base, max)
export const RECONNECT_BASE_INTERVAL_MS = 2000;
export const RECONNECT_MAX_INTERVAL_MS = 10000;
// Wait applied by callers that find an episode already running
export const RECONNECT_DEFERRED_WAIT_MS = 100;

export const DEFAULT_SCAN_COUNT = 100;
export const HEALTH_CHECK_TIMEOUT_MS = 1000;
