/**
 * Profile Store Module
 * Session-locked, version-chained profile documents on a plain key-value store
 */

export { Profile, type ProfileDependencies } from './Profile';
export { ProfileManager, type ProfileManagerOptions } from './ProfileManager';
export { ProfileAdmin, type ProfileInspection, type UnlockResult } from './admin';
export { VersionLedger, type VersionLedgerConfig } from './VersionLedger';
export { ExternalSink, type ExternalSinkConfig } from './ExternalSink';
export { checkBackend, type BackendHealth, type BackendCheckOptions } from './health-check';
export { DEFAULT_CONFIG, resolveConfig, configFromEnv, isPersistenceAllowed } from './config';
export { encodeProfile, decodeProfile, toStoredProfile } from './ProfileCodec';
export {
  generateOwnerToken,
  createSessionData,
  isLockStale,
  decideLock,
  type LockDecision,
} from './SessionLock';
export { getPath, setPath, parsePath, APPEND_SEGMENT, REMOVE_SEGMENT } from './DocumentPath';
export { withRetry, sleep, type RetryOptions } from './retry';
export {
  ProfileStoreError,
  RemoteStoreError,
  RetryExhaustedError,
  ProfileDecodeError,
  AbortedError,
  OwnerMissingError,
  type ProfileErrorCode,
} from './errors';

export type {
  JsonValue,
  JsonObject,
  ProfileData,
  ProfileTemplate,
  SessionData,
  ProfileMetadata,
  StoredProfile,
  LockState,
  DegradedReason,
  LoadResult,
  ProfileSnapshot,
  ProfileOwner,
  ProfileEventPayload,
  ProfileEvents,
  SetOptions,
  SaveOptions,
  ProfileLogger,
  Environment,
  ProfileStoreConfig,
} from './types';
