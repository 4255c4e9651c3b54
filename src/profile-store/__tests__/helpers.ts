/**
 * Shared fixtures for profile store tests
 */

import { MessageBus } from '../../message-bus';
import { InMemoryRemoteStore, sortKeys } from '../../remote-store';
import { resolveConfig } from '../config';
import { Profile } from '../Profile';
import { decodeProfile } from '../ProfileCodec';
import type { ProfileEvents, ProfileMetadata, ProfileStoreConfig, StoredProfile } from '../types';
import { VersionLedger } from '../VersionLedger';

export const DOCUMENT_STORE = 'profiles@1';

export const TEST_CONFIG: Partial<ProfileStoreConfig> = {
  environment: 'test',
  allowInNonProductionEnv: true,
  maxConnectionAttempts: 2,
  connectionAttemptDelayMs: 1,
  sessionLockTimeoutMs: 50,
  sessionCheckIntervalMs: 10,
  autosaveCheckIntervalMs: 10,
  template: { coins: 0, inventory: { weapons: [] } },
};

export function silentLogger() {
  return { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

export type TestLogger = ReturnType<typeof silentLogger>;

export interface Harness {
  store: InMemoryRemoteStore;
  bus: MessageBus<ProfileEvents>;
  ledger: VersionLedger;
  config: ProfileStoreConfig;
  logger: TestLogger;
  createProfile(ownerId: string, options?: { ownerToken?: string; controller?: AbortController }): Profile;
}

export function createHarness(
  overrides: Partial<ProfileStoreConfig> = {},
  store: InMemoryRemoteStore = new InMemoryRemoteStore()
): Harness {
  const config = resolveConfig({ ...TEST_CONFIG, ...overrides });
  const logger = silentLogger();
  const bus = new MessageBus<ProfileEvents>();
  const ledger = new VersionLedger(store, {
    storeName: config.storeName,
    storeVersion: config.storeVersion,
    maxConnectionAttempts: config.maxConnectionAttempts,
    connectionAttemptDelayMs: config.connectionAttemptDelayMs,
    logger,
  });

  return {
    store,
    bus,
    ledger,
    config,
    logger,
    createProfile(ownerId, options = {}) {
      const controller = options.controller ?? new AbortController();
      return new Profile(
        { id: ownerId, signal: controller.signal },
        { ledger, bus, config, ownerToken: options.ownerToken ?? 'srv_test_a', logger }
      );
    },
  };
}

/**
 * Write a version document and append it, as another process would
 */
export async function seedVersion(
  store: InMemoryRemoteStore,
  ownerId: string,
  version: number,
  document: StoredProfile | string
): Promise<void> {
  const raw = typeof document === 'string' ? document : JSON.stringify(document);
  await store.put(DOCUMENT_STORE, `${ownerId}/${version}`, raw);
  await store.put(`${DOCUMENT_STORE}/ledger/${ownerId}`, String(version), String(version));
}

export function ledgerKeys(store: InMemoryRemoteStore, ownerId: string): string[] {
  return sortKeys(store.keys(`${DOCUMENT_STORE}/ledger/${ownerId}`), false, Infinity);
}

/**
 * Decoded document of the highest appended version
 */
export function latestDocument(store: InMemoryRemoteStore, ownerId: string): ProfileMetadata {
  const keys = ledgerKeys(store, ownerId);
  const latest = keys[keys.length - 1];
  const raw = latest === undefined ? undefined : store.peek(DOCUMENT_STORE, `${ownerId}/${latest}`);
  if (raw === undefined) {
    throw new Error(`No stored version for ${ownerId}`);
  }
  return decodeProfile(raw);
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
