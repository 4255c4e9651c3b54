/**
 * Lifecycle Module
 * Ordered teardown of callbacks, subscriptions and nested scopes
 */

export { Scope } from './Scope';
export type { Disposable, DisposableKind, DisposeFailure } from './types';
