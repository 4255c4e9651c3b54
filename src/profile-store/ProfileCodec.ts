/**
 * Serialisation of profile metadata to and from the stored document
 */

import { ProfileDecodeError } from './errors';
import type { JsonObject, JsonValue, ProfileMetadata, SessionData, StoredProfile } from './types';

export interface EncodeOptions {
  keysToIgnore?: readonly string[];
  /** Leave sessionData out of the document */
  releaseSession?: boolean;
}

/**
 * Build the stored document for `metadata`
 */
export function toStoredProfile(metadata: ProfileMetadata, options: EncodeOptions = {}): StoredProfile {
  const ignored = new Set(options.keysToIgnore ?? []);
  const data: JsonObject = {};

  for (const [key, value] of Object.entries(metadata.data)) {
    if (!ignored.has(key)) {
      data[key] = value;
    }
  }

  const stored: StoredProfile = {
    data,
    created: metadata.createdAt,
    last_seen: metadata.lastSeen,
    sessions: metadata.sessions,
  };

  if (metadata.sessionData && !options.releaseSession) {
    stored.sessionData = { ...metadata.sessionData };
  }

  return stored;
}

/**
 * Serialise `metadata` to the text written under a version key
 */
export function encodeProfile(metadata: ProfileMetadata, options: EncodeOptions = {}): string {
  return JSON.stringify(toStoredProfile(metadata, options));
}

/**
 * Parse a stored document. Throws ProfileDecodeError on malformed input.
 */
export function decodeProfile(raw: string): ProfileMetadata {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ProfileDecodeError('Stored profile is not valid JSON', { length: raw.length }, error);
  }

  if (!isPlainObject(parsed)) {
    throw new ProfileDecodeError('Stored profile is not an object');
  }

  const { data, created, last_seen: lastSeen, sessions, sessionData } = parsed;

  if (!isJsonObject(data)) {
    throw new ProfileDecodeError('Stored profile has no data object', { field: 'data' });
  }
  if (!isFiniteNumber(created)) {
    throw new ProfileDecodeError('Stored profile has an invalid creation time', { field: 'created' });
  }
  if (!isFiniteNumber(lastSeen)) {
    throw new ProfileDecodeError('Stored profile has an invalid last_seen time', { field: 'last_seen' });
  }
  if (!isFiniteNumber(sessions) || sessions < 0) {
    throw new ProfileDecodeError('Stored profile has an invalid session count', { field: 'sessions' });
  }

  const metadata: ProfileMetadata = {
    data,
    createdAt: created,
    lastSeen,
    sessions,
  };

  if (sessionData !== undefined && sessionData !== null) {
    if (!isSessionData(sessionData)) {
      throw new ProfileDecodeError('Stored profile has a malformed session lock', { field: 'sessionData' });
    }
    metadata.sessionData = { lastUpdate: sessionData.lastUpdate, ownerToken: sessionData.ownerToken };
  }

  return metadata;
}

// ============================================================================
// Guards
// ============================================================================

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return isJsonObject(value);
    default:
      return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return isPlainObject(value) && Object.values(value).every(isJsonValue);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isSessionData(value: unknown): value is SessionData {
  return (
    isPlainObject(value) &&
    isFiniteNumber(value.lastUpdate) &&
    typeof value.ownerToken === 'string' &&
    value.ownerToken.length > 0
  );
}
