/**
 * profile-store
 *
 * Main entry point: session-locked profile documents on a key-value store.
 */

export * from './profile-store';

// Supporting modules
export { MessageBus } from './message-bus';
export type { EventHandler, SubscribeOptions, UnsubscribeFn, ErrorHandler } from './message-bus';
export { InMemoryRemoteStore, FileRemoteStore, compareKeys, sortKeys } from './remote-store';
export type { RemoteStore, RemoteStoreOperation, RemoteStoreCall, FailureRule } from './remote-store';
export { Scheduler, createAutosaveTask } from './scheduler';
export type { ScheduledTask, AutosaveTarget, AutosaveConfig } from './scheduler';
export { Scope } from './lifecycle';
export type { Disposable, DisposeFailure } from './lifecycle';

export { VERSION } from './version';
