/**
 * Scope - teardown list executed in reverse registration order
 */

import type { UnsubscribeFn } from '../message-bus';
import type { ProfileLogger } from '../profile-store/types';
import type { Disposable, DisposeFailure } from './types';

export class Scope {
  private disposables: Disposable[] = [];
  private disposed = false;
  private logger: ProfileLogger;

  constructor(
    readonly name: string,
    logger?: ProfileLogger
  ) {
    this.logger = logger ?? console;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get size(): number {
    return this.disposables.length;
  }

  /**
   * Register a disposable. Adding to a disposed scope disposes it at once.
   */
  add(disposable: Disposable): void {
    if (this.disposed) {
      this.disposeOne(disposable).catch(error => {
        this.logger.error(`[Scope:${this.name}] Late ${disposable.kind} failed:`, error);
      });
      return;
    }
    this.disposables.push(disposable);
  }

  onDispose(dispose: () => void | Promise<void>, label?: string): void {
    this.add({ kind: 'callback', dispose, label });
  }

  addSubscription(unsubscribe: UnsubscribeFn, label?: string): void {
    this.add({ kind: 'subscription', unsubscribe, label });
  }

  /**
   * Create a nested scope torn down with this one
   */
  child(name: string): Scope {
    const scope = new Scope(`${this.name}/${name}`, this.logger);
    this.add({ kind: 'scope', scope, label: name });
    return scope;
  }

  /**
   * Dispose everything, last registered first. Failures are collected and
   * logged; they never stop the remaining teardown.
   */
  async dispose(): Promise<DisposeFailure[]> {
    if (this.disposed) {
      return [];
    }
    this.disposed = true;

    const failures: DisposeFailure[] = [];
    const pending = this.disposables.reverse();
    this.disposables = [];

    for (const disposable of pending) {
      try {
        await this.disposeOne(disposable);
      } catch (error) {
        failures.push({ kind: disposable.kind, label: disposable.label, error });
        this.logger.error(
          `[Scope:${this.name}] Failed to dispose ${disposable.kind}${disposable.label ? ` (${disposable.label})` : ''}:`,
          error
        );
      }
    }

    return failures;
  }

  private async disposeOne(disposable: Disposable): Promise<void> {
    switch (disposable.kind) {
      case 'callback':
        await disposable.dispose();
        return;
      case 'subscription':
        disposable.unsubscribe();
        return;
      case 'scope':
        await disposable.scope.dispose();
        return;
    }
  }
}
