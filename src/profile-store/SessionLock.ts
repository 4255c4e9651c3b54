/**
 * Session lock: a timestamp lease stored inside the profile document
 */

import { customAlphabet } from 'nanoid';
import type { SessionData } from './types';

const TOKEN_PREFIX = 'srv_';
const RANDOM_LENGTH = 12;
const ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyz';

const nanoid = customAlphabet(ALPHABET, RANDOM_LENGTH);

/**
 * Generate a process owner token: srv_<timestamp>_<random>
 */
export function generateOwnerToken(): string {
  return `${TOKEN_PREFIX}${Date.now()}_${nanoid()}`;
}

export interface LockTiming {
  sessionLockTimeoutMs: number;
}

/**
 * What a loader should do with the lock it just read
 */
export type LockDecision =
  | { action: 'acquire'; forced: boolean }
  | { action: 'wait'; holder: string; ageMs: number };

/**
 * Stamp a fresh lock for `ownerToken`
 */
export function createSessionData(ownerToken: string, now: number = Date.now()): SessionData {
  return { lastUpdate: now, ownerToken };
}

/**
 * Refresh an existing lock's lastUpdate
 */
export function touchSessionData(sessionData: SessionData, now: number = Date.now()): SessionData {
  return { ...sessionData, lastUpdate: now };
}

/**
 * True when the lock has not been refreshed for longer than the timeout
 */
export function isLockStale(sessionData: SessionData, timing: LockTiming, now: number = Date.now()): boolean {
  return now - sessionData.lastUpdate > timing.sessionLockTimeoutMs;
}

/**
 * Decide whether a loader may claim the profile.
 *
 * A foreign lock is only taken over when it is stale AND this acquisition has
 * itself been waiting longer than the timeout, so a clock-skewed lastUpdate
 * alone never steals a live session.
 */
export function decideLock(
  sessionData: SessionData | undefined,
  ownerToken: string,
  acquisitionStartedAt: number,
  timing: LockTiming,
  now: number = Date.now()
): LockDecision {
  if (!sessionData || sessionData.ownerToken === ownerToken) {
    return { action: 'acquire', forced: false };
  }

  const waitedMs = now - acquisitionStartedAt;
  if (isLockStale(sessionData, timing, now) && waitedMs > timing.sessionLockTimeoutMs) {
    return { action: 'acquire', forced: true };
  }

  return {
    action: 'wait',
    holder: sessionData.ownerToken,
    ageMs: now - sessionData.lastUpdate,
  };
}
