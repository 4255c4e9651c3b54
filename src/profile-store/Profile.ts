/**
 * Profile - one owner's document, its session lock and version chain
 *
 * Lifecycle: construct with a live owner → load() (acquire the session lock,
 * polling while another process holds it) → mutate through the path API →
 * save() periodically → destroy() (release save, then teardown).
 *
 * Storage failures never surface as exceptions: a profile that cannot load
 * falls back to a fresh template with persistence disabled ("degraded") and
 * keeps working in memory.
 */

import { Scope } from '../lifecycle';
import type { EventHandler, MessageBus, UnsubscribeFn } from '../message-bus';
import { isPersistenceAllowed } from './config';
import {
  cloneJson,
  getPath,
  incrementAt,
  insertAt,
  mergeMissing,
  removeFrom,
  setPath,
} from './DocumentPath';
import { isAbortedError, OwnerMissingError, ProfileDecodeError } from './errors';
import type { ExternalSink } from './ExternalSink';
import { decodeProfile, encodeProfile } from './ProfileCodec';
import { sleep } from './retry';
import { createSessionData, decideLock, touchSessionData } from './SessionLock';
import type {
  DegradedReason,
  JsonValue,
  LoadResult,
  LockState,
  ProfileData,
  ProfileEventPayload,
  ProfileEvents,
  ProfileLogger,
  ProfileMetadata,
  ProfileOwner,
  ProfileSnapshot,
  ProfileStoreConfig,
  SaveOptions,
  SetOptions,
} from './types';
import type { VersionLedger } from './VersionLedger';

export interface ProfileDependencies {
  ledger: VersionLedger;
  bus: MessageBus<ProfileEvents>;
  config: ProfileStoreConfig;
  /** This process's lock token */
  ownerToken: string;
  sink?: ExternalSink;
  logger?: ProfileLogger;
}

export class Profile {
  readonly ownerId: string;
  readonly scope: Scope;

  private owner: ProfileOwner;
  private metadata: ProfileMetadata;
  private lockState: LockState = 'unlocked';
  private persistent: boolean;
  private created = false;
  private released = false;
  private degradedReason?: DegradedReason;
  private currentVersion?: number;
  private lastSaveAt = 0;
  private loadPromise?: Promise<LoadResult>;
  private saveQueue: Promise<unknown> = Promise.resolve();
  private logger: ProfileLogger;

  constructor(owner: ProfileOwner | undefined, private deps: ProfileDependencies) {
    if (!owner || !owner.id) {
      throw new OwnerMissingError();
    }
    if (owner.signal.aborted) {
      throw new OwnerMissingError(`Owner ${owner.id} has already detached`);
    }

    this.owner = owner;
    this.ownerId = owner.id;
    this.logger = deps.logger ?? console;
    this.scope = new Scope(`Profile:${owner.id}`, this.logger);
    this.persistent = isPersistenceAllowed(deps.config);
    this.metadata = this.freshMetadata();
  }

  // ==========================================================================
  // State
  // ==========================================================================

  get state(): LockState {
    return this.lockState;
  }

  /** True when no stored version existed at load */
  get isNew(): boolean {
    return this.created;
  }

  /** True while saves can reach the store */
  get isPersistent(): boolean {
    return this.persistent && !this.released && (this.lockState === 'locked' || this.lockState === 'releasing');
  }

  get lastSave(): number {
    return this.lastSaveAt;
  }

  get version(): number | undefined {
    return this.currentVersion;
  }

  get sessions(): number {
    return this.metadata.sessions;
  }

  get createdAt(): number {
    return this.metadata.createdAt;
  }

  get lastSeen(): number {
    return this.metadata.lastSeen;
  }

  snapshot(): ProfileSnapshot {
    return {
      ownerId: this.ownerId,
      state: this.lockState,
      isNew: this.created,
      persistent: this.isPersistent,
      sessions: this.metadata.sessions,
      createdAt: this.metadata.createdAt,
      lastSeen: this.metadata.lastSeen,
      lastSave: this.lastSaveAt,
      version: this.currentVersion,
      degradedReason: this.degradedReason,
    };
  }

  // ==========================================================================
  // Load
  // ==========================================================================

  /**
   * Acquire the session lock and load the latest version. Runs once; later
   * calls return the same result.
   */
  load(): Promise<LoadResult> {
    if (!this.loadPromise) {
      this.loadPromise = this.acquire();
    }
    return this.loadPromise;
  }

  private async acquire(): Promise<LoadResult> {
    if (!this.persistent) {
      return this.degrade('persistence-disabled');
    }

    const { ledger, config, ownerToken } = this.deps;
    const { signal } = this.owner;
    const startedAt = Date.now();
    this.lockState = 'acquiring';

    try {
      for (;;) {
        if (signal.aborted) {
          return this.degrade('owner-detached');
        }

        const latest = await ledger.latestVersion(this.ownerId, signal);

        if (latest === undefined) {
          if (signal.aborted) {
            return this.degrade('owner-detached');
          }
          return await this.claim(this.freshMetadata(), undefined, true);
        }

        const raw = await ledger.readVersion(this.ownerId, latest, signal);
        if (raw === undefined) {
          throw new ProfileDecodeError(`Version ${latest} is in the ledger but has no document`, { version: latest });
        }

        const stored = decodeProfile(raw);
        const decision = decideLock(stored.sessionData, ownerToken, startedAt, config);

        if (decision.action === 'wait') {
          this.logger.log(
            `[Profile:${this.ownerId}] Locked by ${decision.holder} (${decision.ageMs}ms old), ` +
            `checking again in ${config.sessionCheckIntervalMs}ms`
          );
          await sleep(config.sessionCheckIntervalMs, signal);
          continue;
        }

        if (signal.aborted) {
          return this.degrade('owner-detached');
        }
        if (decision.forced) {
          this.logger.warn(`[Profile:${this.ownerId}] Taking over abandoned session lock of version ${latest}`);
        }
        return await this.claim(stored, latest, false);
      }
    } catch (error) {
      if (isAbortedError(error)) {
        return this.degrade('owner-detached');
      }
      if (error instanceof ProfileDecodeError) {
        this.logger.error(`[Profile:${this.ownerId}] Stored profile is corrupt:`, error.message);
        return this.degrade('decode');
      }
      this.logger.error(
        `[Profile:${this.ownerId}] Store unreachable:`,
        error instanceof Error ? error.message : error
      );
      return this.degrade('connection');
    }
  }

  /**
   * Stamp the lock, count the session and publish the claim
   */
  private async claim(metadata: ProfileMetadata, version: number | undefined, isNew: boolean): Promise<LoadResult> {
    this.metadata = {
      ...metadata,
      sessions: metadata.sessions + 1,
      sessionData: createSessionData(this.deps.ownerToken),
    };
    this.currentVersion = version;
    this.created = isNew;
    this.lockState = 'locked';

    // The lock is only held once the claim is in the ledger
    if (!(await this.save())) {
      return this.degrade(this.degradedReason ?? 'connection');
    }

    return this.loadResult();
  }

  private degrade(reason: DegradedReason): LoadResult {
    this.metadata = this.freshMetadata();
    this.disablePersistence(reason);
    return this.loadResult();
  }

  private disablePersistence(reason: DegradedReason): void {
    this.persistent = false;
    this.lockState = 'degraded';
    this.degradedReason = reason;

    if (reason !== 'persistence-disabled') {
      this.logger.warn(`[Profile:${this.ownerId}] Persistence disabled (${reason})`);
    }
  }

  private loadResult(): LoadResult {
    return {
      state: this.lockState,
      isNew: this.created,
      version: this.currentVersion,
      reason: this.degradedReason,
    };
  }

  // ==========================================================================
  // Save
  // ==========================================================================

  /**
   * Write the current document as a new version and append it to the ledger.
   * Saves are queued; each publishes the state current when it starts.
   */
  save(options: SaveOptions = {}): Promise<boolean> {
    const run = this.saveQueue.then(() => this.writeVersion(options));
    this.saveQueue = run;
    return run;
  }

  private async writeVersion(options: SaveOptions): Promise<boolean> {
    if (!this.isPersistent) {
      return false;
    }

    const { ledger, config } = this.deps;
    const releaseSession = options.releaseSession ?? false;
    const now = Date.now();
    const version = Math.max(now, (this.currentVersion ?? 0) + 1);

    const sessionData = !releaseSession && this.metadata.sessionData
      ? touchSessionData(this.metadata.sessionData, now)
      : undefined;

    let document: string;
    try {
      document = encodeProfile(
        { ...this.metadata, lastSeen: now, sessionData },
        { keysToIgnore: config.keysToIgnore, releaseSession }
      );
    } catch (error) {
      this.logger.error(
        `[Profile:${this.ownerId}] Document cannot be serialised:`,
        error instanceof Error ? error.message : error
      );
      return false;
    }

    try {
      await ledger.writeVersion(this.ownerId, version, document);
    } catch (error) {
      this.logger.error(
        `[Profile:${this.ownerId}] Failed to write version ${version}:`,
        error instanceof Error ? error.message : error
      );
      return false;
    }

    try {
      await ledger.append(this.ownerId, version);
    } catch (error) {
      this.logger.error(
        `[Profile:${this.ownerId}] Version ${version} written but not appended:`,
        error instanceof Error ? error.message : error
      );
      this.disablePersistence('orphaned-write');
      return false;
    }

    this.currentVersion = version;
    this.lastSaveAt = now;
    this.metadata.lastSeen = now;
    this.metadata.sessionData = sessionData;

    this.deps.bus.emitSync('profile.saved', this.eventPayload());

    if (this.deps.sink) {
      this.deps.sink.forward(this.ownerId, version, document).catch(error => {
        this.logger.warn(`[Profile:${this.ownerId}] External sink error:`, error);
      });
    }

    return true;
  }

  // ==========================================================================
  // Release
  // ==========================================================================

  /**
   * Final save with the lock cleared. Waits for a pending load first.
   */
  async release(): Promise<boolean> {
    if (this.loadPromise) {
      await this.loadPromise;
    }
    if (this.released) {
      return false;
    }
    if (this.lockState !== 'locked') {
      this.released = true;
      return false;
    }

    this.lockState = 'releasing';
    const saved = await this.save({ releaseSession: true });
    this.released = true;

    if (this.lockState === 'releasing') {
      this.lockState = 'unlocked';
    }
    return saved;
  }

  /**
   * Release, then tear down subscriptions registered on this profile
   */
  async destroy(): Promise<void> {
    await this.release();
    await this.scope.dispose();
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  onChanged(handler: EventHandler<ProfileEventPayload>): UnsubscribeFn {
    return this.subscribe('profile.changed', handler);
  }

  onSaved(handler: EventHandler<ProfileEventPayload>): UnsubscribeFn {
    return this.subscribe('profile.saved', handler);
  }

  private subscribe(event: keyof ProfileEvents, handler: EventHandler<ProfileEventPayload>): UnsubscribeFn {
    const filtered: EventHandler<ProfileEventPayload> = payload => {
      if (payload.ownerId === this.ownerId) {
        return handler(payload);
      }
    };

    const unsubscribe = this.deps.bus.on(event, filtered);
    this.scope.addSubscription(unsubscribe, event);
    return unsubscribe;
  }

  private notifyChanged(): void {
    this.deps.bus.emitSync('profile.changed', this.eventPayload());
  }

  private eventPayload(): ProfileEventPayload {
    return { ownerId: this.ownerId, data: this.metadata.data };
  }

  // ==========================================================================
  // Data
  // ==========================================================================

  /**
   * Whole document, or the value at a dot path
   */
  get(): ProfileData;
  get(path: string): JsonValue | undefined;
  get(path?: string): JsonValue | undefined {
    if (path === undefined) {
      return this.metadata.data;
    }
    return getPath(this.metadata.data, path);
  }

  /**
   * Assign a value. A last segment of `++` appends, `--` removes the element
   * at the given 1-based position, and an undefined value deletes the key.
   */
  set(path: string, value: JsonValue | undefined, options: SetOptions = {}): boolean {
    const ok = setPath(this.metadata.data, path, value);
    if (ok && !options.silent) {
      this.notifyChanged();
    }
    return ok;
  }

  /**
   * Apply several sets, firing one change event. True if all succeeded.
   */
  setMultiple(entries: Record<string, JsonValue | undefined>): boolean {
    let changed = false;
    let allOk = true;

    for (const [path, value] of Object.entries(entries)) {
      if (this.set(path, value, { silent: true })) {
        changed = true;
      } else {
        allOk = false;
      }
    }

    if (changed) {
      this.notifyChanged();
    }
    return allOk;
  }

  insert(path: string, value: JsonValue): boolean {
    const ok = insertAt(this.metadata.data, path, value);
    if (ok) {
      this.notifyChanged();
    }
    return ok;
  }

  removeValue(path: string, value: JsonValue): boolean {
    const ok = removeFrom(this.metadata.data, path, value);
    if (ok) {
      this.notifyChanged();
    }
    return ok;
  }

  /**
   * Remove several values, firing one change event. True if all were found.
   */
  removeValues(path: string, values: readonly JsonValue[]): boolean {
    let changed = false;
    let allOk = true;

    for (const value of values) {
      if (removeFrom(this.metadata.data, path, value)) {
        changed = true;
      } else {
        allOk = false;
      }
    }

    if (changed) {
      this.notifyChanged();
    }
    return allOk;
  }

  increment(path: string, delta: number): boolean {
    const ok = incrementAt(this.metadata.data, path, delta);
    if (ok) {
      this.notifyChanged();
    }
    return ok;
  }

  /**
   * Add template keys missing from the document. Never overwrites.
   */
  reconcile(): boolean {
    const changed = mergeMissing(this.metadata.data, this.buildTemplate());
    if (changed) {
      this.notifyChanged();
    }
    return changed;
  }

  /**
   * Replace the document with a fresh template
   */
  reset(): void {
    this.metadata.data = this.buildTemplate();
    this.notifyChanged();
  }

  // ==========================================================================
  // Template
  // ==========================================================================

  private buildTemplate(): ProfileData {
    const { template } = this.deps.config;
    return cloneJson(typeof template === 'function' ? template(this.ownerId) : template);
  }

  private freshMetadata(): ProfileMetadata {
    const now = Date.now();
    return {
      data: this.buildTemplate(),
      createdAt: now,
      lastSeen: now,
      sessions: 0,
    };
  }
}
