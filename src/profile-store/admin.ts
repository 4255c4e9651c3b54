/**
 * Administrative operations on stored profiles
 *
 * These bypass the session lock protocol; forceUnlock in particular must only
 * be used when the holder is known to be gone.
 */

import type { RemoteStore } from '../remote-store';
import { resolveConfig } from './config';
import { encodeProfile, decodeProfile } from './ProfileCodec';
import { isLockStale } from './SessionLock';
import type { ProfileMetadata, ProfileStoreConfig } from './types';
import { VersionLedger } from './VersionLedger';

export interface ProfileInspection {
  ownerId: string;
  version: number;
  metadata: ProfileMetadata;
  locked: boolean;
  lockAgeMs?: number;
  lockStale?: boolean;
}

export interface UnlockResult {
  ownerId: string;
  /** False when the latest version carried no lock */
  unlocked: boolean;
  previousOwner?: string;
  version?: number;
}

export class ProfileAdmin {
  private ledger: VersionLedger;
  private config: ProfileStoreConfig;

  constructor(store: RemoteStore, config: Partial<ProfileStoreConfig> = {}) {
    this.config = resolveConfig(config);
    this.ledger = new VersionLedger(store, {
      storeName: this.config.storeName,
      storeVersion: this.config.storeVersion,
      maxConnectionAttempts: this.config.maxConnectionAttempts,
      connectionAttemptDelayMs: this.config.connectionAttemptDelayMs,
    });
  }

  /**
   * Latest version of a profile, or undefined if it has none
   */
  async inspect(ownerId: string, now: number = Date.now()): Promise<ProfileInspection | undefined> {
    const version = await this.ledger.latestVersion(ownerId);
    if (version === undefined) {
      return undefined;
    }

    const metadata = await this.readMetadata(ownerId, version);
    const { sessionData } = metadata;

    return {
      ownerId,
      version,
      metadata,
      locked: sessionData !== undefined,
      lockAgeMs: sessionData ? now - sessionData.lastUpdate : undefined,
      lockStale: sessionData ? isLockStale(sessionData, this.config, now) : undefined,
    };
  }

  /**
   * Version ids, newest first
   */
  listVersions(ownerId: string, limit = 20): Promise<number[]> {
    return this.ledger.listVersions(ownerId, limit);
  }

  /**
   * Publish a copy of the latest version without its session lock
   */
  async forceUnlock(ownerId: string): Promise<UnlockResult> {
    const latest = await this.ledger.latestVersion(ownerId);
    if (latest === undefined) {
      return { ownerId, unlocked: false };
    }

    const metadata = await this.readMetadata(ownerId, latest);
    if (!metadata.sessionData) {
      return { ownerId, unlocked: false, version: latest };
    }

    const version = Math.max(Date.now(), latest + 1);
    await this.ledger.writeVersion(ownerId, version, encodeProfile(metadata, { releaseSession: true }));
    await this.ledger.append(ownerId, version);

    return {
      ownerId,
      unlocked: true,
      previousOwner: metadata.sessionData.ownerToken,
      version,
    };
  }

  private async readMetadata(ownerId: string, version: number): Promise<ProfileMetadata> {
    const raw = await this.ledger.readVersion(ownerId, version);
    if (raw === undefined) {
      throw new Error(`Version ${version} of ${ownerId} has no document`);
    }
    return decodeProfile(raw);
  }
}
