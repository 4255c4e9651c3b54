/**
 * ProfileManager - registry of live profiles for one process
 *
 * Owns the only map of ownerId → Profile, the per-owner abort controllers
 * that cancel a pending lock wait on detach, and the autosave tasks.
 */

import { Scope } from '../lifecycle';
import { MessageBus } from '../message-bus';
import type { RemoteStore } from '../remote-store';
import { createAutosaveTask, Scheduler } from '../scheduler';
import { resolveConfig } from './config';
import { ExternalSink } from './ExternalSink';
import { checkBackend, type BackendCheckOptions } from './health-check';
import { Profile } from './Profile';
import { generateOwnerToken } from './SessionLock';
import type { ProfileEvents, ProfileLogger, ProfileStoreConfig } from './types';
import { VersionLedger } from './VersionLedger';

export interface ProfileManagerOptions {
  config?: Partial<ProfileStoreConfig>;
  bus?: MessageBus<ProfileEvents>;
  /** Shared scheduler; when omitted the manager creates and starts its own */
  scheduler?: Scheduler;
  logger?: ProfileLogger;
  /** Lock token for this process; generated when omitted */
  ownerToken?: string;
}

interface ProfileEntry {
  profile: Profile;
  controller: AbortController;
  ready: Promise<Profile>;
  detaching?: Promise<void>;
}

export class ProfileManager {
  readonly config: ProfileStoreConfig;
  readonly bus: MessageBus<ProfileEvents>;
  readonly scheduler: Scheduler;
  readonly ownerToken: string;

  private profiles = new Map<string, ProfileEntry>();
  private ledger: VersionLedger;
  private sink?: ExternalSink;
  private logger: ProfileLogger;
  private scope: Scope;
  private ownsScheduler: boolean;
  private closed = false;

  /**
   * Probe the backend once, then build a manager whose configuration carries
   * the result
   */
  static async connect(
    store: RemoteStore,
    options: ProfileManagerOptions = {},
    checkOptions: BackendCheckOptions = {}
  ): Promise<ProfileManager> {
    const backend = await checkBackend(store, { logger: options.logger, ...checkOptions });
    return new ProfileManager(store, { ...options, config: { ...options.config, backend } });
  }

  constructor(store: RemoteStore, options: ProfileManagerOptions = {}) {
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? console;
    this.bus = options.bus ?? new MessageBus<ProfileEvents>();
    this.ownerToken = options.ownerToken ?? generateOwnerToken();
    this.scope = new Scope('ProfileManager', this.logger);

    this.ledger = new VersionLedger(store, {
      storeName: this.config.storeName,
      storeVersion: this.config.storeVersion,
      maxConnectionAttempts: this.config.maxConnectionAttempts,
      connectionAttemptDelayMs: this.config.connectionAttemptDelayMs,
      logger: this.logger,
    });

    if (this.config.externalSinkUrl) {
      this.sink = new ExternalSink({ url: this.config.externalSinkUrl, logger: this.logger });
    }

    this.ownsScheduler = !options.scheduler;
    this.scheduler = options.scheduler ?? new Scheduler({ logger: this.logger });
    if (this.ownsScheduler) {
      this.scheduler.start();
      this.scope.onDispose(() => this.scheduler.stop(), 'scheduler');
    }
  }

  get size(): number {
    return this.profiles.size;
  }

  ownerIds(): string[] {
    return Array.from(this.profiles.keys());
  }

  get(ownerId: string): Profile | undefined {
    return this.profiles.get(ownerId)?.profile;
  }

  /**
   * Create and load the profile for `ownerId`. Attaching an owner that is
   * already attached returns the same profile.
   */
  async attach(ownerId: string): Promise<Profile> {
    if (this.closed) {
      throw new Error('ProfileManager is shut down');
    }

    const existing = this.profiles.get(ownerId);
    if (existing?.detaching) {
      await existing.detaching;
      return this.attach(ownerId);
    }
    if (existing) {
      return existing.ready;
    }

    const controller = new AbortController();
    const profile = new Profile(
      { id: ownerId, signal: controller.signal },
      {
        ledger: this.ledger,
        bus: this.bus,
        config: this.config,
        ownerToken: this.ownerToken,
        sink: this.sink,
        logger: this.logger,
      }
    );

    const ready = profile.load().then(result => {
      if (!controller.signal.aborted && result.state === 'locked') {
        this.startAutosave(profile);
      }
      return profile;
    });

    this.profiles.set(ownerId, { profile, controller, ready });
    return ready;
  }

  /**
   * Cancel a pending load, stop autosave, issue the release save and forget
   * the profile
   */
  detach(ownerId: string): Promise<void> {
    const entry = this.profiles.get(ownerId);
    if (!entry) {
      return Promise.resolve();
    }
    if (entry.detaching) {
      return entry.detaching;
    }

    entry.controller.abort();
    this.scheduler.unregisterTask(autosaveTaskId(ownerId));

    entry.detaching = entry.ready
      .then(profile => profile.destroy())
      .finally(() => {
        this.profiles.delete(ownerId);
      });

    return entry.detaching;
  }

  /**
   * Detach every profile and stop the owned scheduler
   */
  async shutdown(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    await Promise.all(this.ownerIds().map(ownerId => this.detach(ownerId)));
    await this.scope.dispose();
  }

  /**
   * Shut down on SIGINT/SIGTERM. Handlers are removed on shutdown.
   */
  installSignalHandlers(exit: (code: number) => void = code => process.exit(code)): void {
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

    for (const signal of signals) {
      const handler = () => {
        this.logger.log(`[ProfileManager] Received ${signal}, releasing ${this.size} profiles`);
        this.shutdown()
          .then(() => exit(0))
          .catch(error => {
            this.logger.error('[ProfileManager] Shutdown error:', error);
            exit(1);
          });
      };

      process.on(signal, handler);
      this.scope.onDispose(() => {
        process.removeListener(signal, handler);
      }, signal);
    }
  }

  private startAutosave(profile: Profile): void {
    this.scheduler.registerTask({
      id: autosaveTaskId(profile.ownerId),
      name: `autosave ${profile.ownerId}`,
      interval: this.config.autosaveCheckIntervalMs,
      handler: createAutosaveTask(profile, { saveIntervalMs: this.config.saveIntervalMs }),
      enabled: true,
    });
  }
}

function autosaveTaskId(ownerId: string): string {
  return `autosave:${ownerId}`;
}
