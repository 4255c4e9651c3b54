/**
 * Version ledger over a RemoteStore
 *
 * Documents live under `<store>@<version>`, keyed `<ownerId>/<versionId>`.
 * The ledger for an owner lives under `<store>@<version>/ledger/<ownerId>`,
 * one key per appended version id. The latest version is the highest numeric
 * id in the ledger, not the most recently appended one.
 */

import type { RemoteStore } from '../remote-store';
import { ProfileDecodeError } from './errors';
import { withRetry } from './retry';
import type { ProfileLogger } from './types';

export interface VersionLedgerConfig {
  storeName: string;
  storeVersion: string;
  maxConnectionAttempts: number;
  connectionAttemptDelayMs: number;
  logger?: ProfileLogger;
}

export class VersionLedger {
  constructor(
    private store: RemoteStore,
    private config: VersionLedgerConfig
  ) {}

  /**
   * Name under which version documents are stored
   */
  get documentStoreName(): string {
    return `${this.config.storeName}@${this.config.storeVersion}`;
  }

  ledgerName(ownerId: string): string {
    return `${this.documentStoreName}/ledger/${ownerId}`;
  }

  documentKey(ownerId: string, version: number): string {
    return `${ownerId}/${version}`;
  }

  /**
   * Latest version id, undefined if the owner has none. A ledger whose top
   * key is not a version id is corrupt.
   */
  async latestVersion(ownerId: string, signal?: AbortSignal): Promise<number | undefined> {
    const keys = await this.retry(
      () => this.store.listSorted(this.ledgerName(ownerId), true, 1),
      `latest version of ${ownerId}`,
      signal
    );

    if (keys.length === 0) {
      return undefined;
    }

    const version = Number(keys[0]);
    if (!/^\d+$/.test(keys[0]) || !Number.isSafeInteger(version)) {
      throw new ProfileDecodeError(`Ledger of ${ownerId} has a malformed entry`, { ownerId, key: keys[0] });
    }
    return version;
  }

  /**
   * Up to `limit` version ids, newest first
   */
  async listVersions(ownerId: string, limit: number, signal?: AbortSignal): Promise<number[]> {
    const keys = await this.retry(
      () => this.store.listSorted(this.ledgerName(ownerId), true, limit),
      `versions of ${ownerId}`,
      signal
    );

    return keys.map(Number).filter(version => Number.isSafeInteger(version));
  }

  /**
   * Raw document stored for a version, undefined if missing
   */
  async readVersion(ownerId: string, version: number, signal?: AbortSignal): Promise<string | undefined> {
    return this.retry(
      () => this.store.get(this.documentStoreName, this.documentKey(ownerId, version)),
      `read ${ownerId}@${version}`,
      signal
    );
  }

  /**
   * Write a version document. It stays unreachable until appended.
   */
  async writeVersion(ownerId: string, version: number, document: string): Promise<void> {
    await this.retry(
      () => this.store.put(this.documentStoreName, this.documentKey(ownerId, version), document),
      `write ${ownerId}@${version}`
    );
  }

  /**
   * Append a version id to the owner's ledger
   */
  async append(ownerId: string, version: number): Promise<void> {
    const key = String(version);
    await this.retry(
      () => this.store.put(this.ledgerName(ownerId), key, key),
      `append ${ownerId}@${version}`
    );
  }

  private retry<T>(operation: () => Promise<T>, label: string, signal?: AbortSignal): Promise<T> {
    return withRetry(operation, {
      attempts: this.config.maxConnectionAttempts,
      delayMs: this.config.connectionAttemptDelayMs,
      label,
      signal,
      logger: this.config.logger,
    });
  }
}
