/**
 * Profile Store - Type Definitions
 */

import type { BackendHealth } from './health-check';

// ============================================================================
// Documents
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * The caller's document
 */
export type ProfileData = JsonObject;

/**
 * Template used for new and degraded profiles, and for reconcile
 */
export type ProfileTemplate = ProfileData | ((ownerId: string) => ProfileData);

/**
 * Session lock recorded inside the stored document
 */
export interface SessionData {
  lastUpdate: number;   // ms since epoch, refreshed by every save
  ownerToken: string;   // token of the process holding the lock
}

/**
 * In-memory profile metadata
 */
export interface ProfileMetadata {
  data: ProfileData;
  createdAt: number;
  lastSeen: number;
  sessions: number;
  sessionData?: SessionData;
}

/**
 * Stored document, one per version (wire field names)
 */
export interface StoredProfile {
  data: ProfileData;
  created: number;
  last_seen: number;
  sessions: number;
  sessionData?: SessionData;
}

// ============================================================================
// Lock state
// ============================================================================

export type LockState = 'unlocked' | 'acquiring' | 'locked' | 'releasing' | 'degraded';

export type DegradedReason =
  | 'persistence-disabled'
  | 'owner-detached'
  | 'connection'
  | 'decode'
  | 'orphaned-write';

/**
 * Outcome of a load
 */
export interface LoadResult {
  state: LockState;
  isNew: boolean;
  version?: number;
  reason?: DegradedReason;
}

/**
 * Diagnostics record returned by Profile.snapshot()
 */
export interface ProfileSnapshot {
  ownerId: string;
  state: LockState;
  isNew: boolean;
  persistent: boolean;
  sessions: number;
  createdAt: number;
  lastSeen: number;
  lastSave: number;
  version?: number;
  degradedReason?: DegradedReason;
}

// ============================================================================
// Owner
// ============================================================================

/**
 * Live owner reference. The signal aborts when the owner detaches.
 */
export interface ProfileOwner {
  readonly id: string;
  readonly signal: AbortSignal;
}

// ============================================================================
// Events
// ============================================================================

export interface ProfileEventPayload {
  ownerId: string;
  data: ProfileData;
}

export interface ProfileEvents {
  'profile.changed': ProfileEventPayload;
  'profile.saved': ProfileEventPayload;
}

// ============================================================================
// Options
// ============================================================================

export interface SetOptions {
  /** Do not fire profile.changed */
  silent?: boolean;
}

export interface SaveOptions {
  /** Omit sessionData so a waiting loader can take the lock at once */
  releaseSession?: boolean;
}

/**
 * Logger accepted by store components; defaults to the console
 */
export type ProfileLogger = Pick<Console, 'log' | 'warn' | 'error'>;

export type Environment = 'production' | 'development' | 'test';

/**
 * Profile store configuration
 */
export interface ProfileStoreConfig {
  storeName: string;
  storeVersion: string;
  /** Autosave interval */
  saveIntervalMs: number;
  /** Top-level data keys never written to the store */
  keysToIgnore: string[];
  template: ProfileTemplate;
  persistenceEnabled: boolean;
  allowInNonProductionEnv: boolean;
  environment: Environment;
  /** Best-effort forwarding target for each successful save */
  externalSinkUrl?: string;
  maxConnectionAttempts: number;
  connectionAttemptDelayMs: number;
  sessionLockTimeoutMs: number;
  sessionCheckIntervalMs: number;
  /** How often the autosave task checks elapsed time */
  autosaveCheckIntervalMs: number;
  /** Result of the startup backend probe */
  backend?: BackendHealth;
}
