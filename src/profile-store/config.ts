/**
 * Profile store configuration: defaults, merging and environment loading
 */

import type { Environment, ProfileStoreConfig } from './types';

export const DEFAULT_CONFIG: ProfileStoreConfig = {
  storeName: 'profiles',
  storeVersion: '1',
  saveIntervalMs: 60 * 1000,
  keysToIgnore: [],
  template: {},
  persistenceEnabled: true,
  allowInNonProductionEnv: false,
  environment: 'production',
  maxConnectionAttempts: 5,
  connectionAttemptDelayMs: 1000,
  sessionLockTimeoutMs: 30 * 60 * 1000,
  sessionCheckIntervalMs: 10 * 1000,
  autosaveCheckIntervalMs: 1000,
};

/**
 * Merge overrides onto the defaults
 */
export function resolveConfig(config: Partial<ProfileStoreConfig> = {}): ProfileStoreConfig {
  const merged: ProfileStoreConfig = { ...DEFAULT_CONFIG, ...config };

  if (merged.maxConnectionAttempts < 1) {
    throw new RangeError('maxConnectionAttempts must be at least 1');
  }
  if (merged.sessionCheckIntervalMs <= 0 || merged.autosaveCheckIntervalMs <= 0) {
    throw new RangeError('check intervals must be positive');
  }

  return merged;
}

/**
 * Persistence is on only when enabled, the backend answered the startup
 * probe, and either this is production or non-production use is allowed.
 */
export function isPersistenceAllowed(config: ProfileStoreConfig): boolean {
  if (!config.persistenceEnabled) {
    return false;
  }
  if (config.backend && !config.backend.reachable) {
    return false;
  }
  return config.environment === 'production' || config.allowInNonProductionEnv;
}

/**
 * Read overrides from environment variables
 *
 * PROFILE_STORE_NAME, PROFILE_STORE_VERSION, PROFILE_SAVE_INTERVAL_MS,
 * PROFILE_KEYS_TO_IGNORE (comma-separated), PROFILE_PERSISTENCE_ENABLED,
 * PROFILE_ALLOW_NON_PRODUCTION, PROFILE_SINK_URL, NODE_ENV
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ProfileStoreConfig> {
  const config: Partial<ProfileStoreConfig> = {};

  if (env.PROFILE_STORE_NAME) config.storeName = env.PROFILE_STORE_NAME;
  if (env.PROFILE_STORE_VERSION) config.storeVersion = env.PROFILE_STORE_VERSION;

  const saveInterval = parseInt(env.PROFILE_SAVE_INTERVAL_MS || '', 10);
  if (Number.isFinite(saveInterval) && saveInterval > 0) {
    config.saveIntervalMs = saveInterval;
  }

  if (env.PROFILE_KEYS_TO_IGNORE) {
    config.keysToIgnore = env.PROFILE_KEYS_TO_IGNORE
      .split(',')
      .map(key => key.trim())
      .filter(Boolean);
  }

  if (env.PROFILE_PERSISTENCE_ENABLED !== undefined) {
    config.persistenceEnabled = env.PROFILE_PERSISTENCE_ENABLED !== 'false';
  }
  if (env.PROFILE_ALLOW_NON_PRODUCTION !== undefined) {
    config.allowInNonProductionEnv = env.PROFILE_ALLOW_NON_PRODUCTION === 'true';
  }
  if (env.PROFILE_SINK_URL) config.externalSinkUrl = env.PROFILE_SINK_URL;

  const environment = parseEnvironment(env.NODE_ENV);
  if (environment) config.environment = environment;

  return config;
}

function parseEnvironment(value: string | undefined): Environment | undefined {
  switch (value) {
    case 'production':
    case 'development':
    case 'test':
      return value;
    default:
      return undefined;
  }
}
