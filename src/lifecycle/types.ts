/**
 * Lifecycle - Type Definitions
 */

import type { UnsubscribeFn } from '../message-bus';
import type { Scope } from './Scope';

/**
 * Something a scope tears down
 */
export type Disposable =
  | { kind: 'callback'; label?: string; dispose: () => void | Promise<void> }
  | { kind: 'subscription'; label?: string; unsubscribe: UnsubscribeFn }
  | { kind: 'scope'; label?: string; scope: Scope };

export type DisposableKind = Disposable['kind'];

/**
 * Failure collected while disposing
 */
export interface DisposeFailure {
  kind: DisposableKind;
  label?: string;
  error: unknown;
}
