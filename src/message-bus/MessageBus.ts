/**
 * MessageBus - typed event bus
 *
 * Features:
 * - Pub/sub over a typed event map
 * - Wildcard subscriptions (profile.*, *)
 * - Handler priorities and once-handlers
 * - Async handling with per-handler error isolation
 */

import type {
  AnyPayload,
  ErrorHandler,
  EventHandler,
  EventName,
  ListenerEntry,
  SubscribeOptions,
  UnsubscribeFn,
} from './types';

export class MessageBus<Events extends object = Record<string, unknown>> {
  /** Exact event matches */
  private exactListeners = new Map<string, ListenerEntry<unknown>[]>();

  /** Wildcard pattern listeners */
  private wildcardListeners: ListenerEntry<unknown>[] = [];

  private errorHandler?: ErrorHandler;

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends EventName<Events>>(
    event: K,
    handler: EventHandler<Events[K]>,
    options: SubscribeOptions = {}
  ): UnsubscribeFn {
    const entry: ListenerEntry<Events[K]> = this.createEntry(event, handler, options);

    let listeners = this.exactListeners.get(event);
    if (!listeners) {
      listeners = [];
      this.exactListeners.set(event, listeners);
    }
    listeners.push(entry);
    listeners.sort(byPriority);

    return () => this.off(event, handler);
  }

  /**
   * Subscribe to every event matching a wildcard pattern.
   * `*` alone matches everything; `profile.*` matches one level below `profile`.
   */
  onPattern(
    pattern: string,
    handler: EventHandler<AnyPayload<Events>>,
    options: SubscribeOptions = {}
  ): UnsubscribeFn {
    if (!pattern.includes('*')) {
      throw new Error(`Not a wildcard pattern: ${pattern}`);
    }

    this.wildcardListeners.push(this.createEntry(pattern, handler, options));
    this.wildcardListeners.sort(byPriority);

    return () => this.off(pattern, handler);
  }

  /**
   * Subscribe to event once (auto-unsubscribe after first trigger)
   */
  once<K extends EventName<Events>>(
    event: K,
    handler: EventHandler<Events[K]>,
    options: SubscribeOptions = {}
  ): UnsubscribeFn {
    return this.on(event, handler, { ...options, once: true });
  }

  /**
   * Unsubscribe a handler from an event or pattern
   */
  off(event: string, handler: unknown): void {
    if (this.isWildcard(event)) {
      const index = this.wildcardListeners.findIndex(
        entry => entry.identity === handler && entry.pattern === event
      );
      if (index !== -1) {
        this.wildcardListeners.splice(index, 1);
      }
      return;
    }

    const listeners = this.exactListeners.get(event);
    if (!listeners) return;

    const index = listeners.findIndex(entry => entry.identity === handler);
    if (index !== -1) {
      listeners.splice(index, 1);
    }
    if (listeners.length === 0) {
      this.exactListeners.delete(event);
    }
  }

  /**
   * Emit an event and wait for every handler, sync or async
   */
  async emit<K extends EventName<Events>>(event: K, payload: Events[K]): Promise<void> {
    const pending: Promise<void>[] = [];

    for (const entry of this.takeListeners(event)) {
      try {
        const result = entry.handler(payload);
        if (result instanceof Promise) {
          pending.push(result.catch(error => this.handleError(error, event, payload)));
        }
      } catch (error) {
        this.handleError(error, event, payload);
      }
    }

    await Promise.all(pending);
  }

  /**
   * Emit without waiting. Async handler rejections still reach the error handler.
   */
  emitSync<K extends EventName<Events>>(event: K, payload: Events[K]): void {
    for (const entry of this.takeListeners(event)) {
      try {
        const result = entry.handler(payload);
        if (result instanceof Promise) {
          result.catch(error => this.handleError(error, event, payload));
        }
      } catch (error) {
        this.handleError(error, event, payload);
      }
    }
  }

  /**
   * Set global error handler
   */
  onError(handler: ErrorHandler): void {
    this.errorHandler = handler;
  }

  /**
   * Count listeners for an event name or pattern
   */
  listenerCount(event: string): number {
    if (this.isWildcard(event)) {
      return this.wildcardListeners.filter(l => l.pattern === event).length;
    }
    return this.exactListeners.get(event)?.length ?? 0;
  }

  /**
   * Remove all listeners for an event (or all events if not specified)
   */
  removeAllListeners(event?: string): void {
    if (event === undefined) {
      this.exactListeners.clear();
      this.wildcardListeners = [];
    } else if (this.isWildcard(event)) {
      this.wildcardListeners = this.wildcardListeners.filter(l => l.pattern !== event);
    } else {
      this.exactListeners.delete(event);
    }
  }

  private createEntry<T>(pattern: string, handler: EventHandler<T>, options: SubscribeOptions): ListenerEntry<T> {
    return {
      handler,
      identity: handler,
      priority: options.priority ?? 0,
      once: options.once ?? false,
      pattern,
    };
  }

  /**
   * Matching listeners in priority order; once-listeners are removed up front
   * so a handler that re-emits cannot trigger them twice
   */
  private takeListeners(event: string): ListenerEntry<unknown>[] {
    const listeners = [
      ...(this.exactListeners.get(event) ?? []),
      ...this.wildcardListeners.filter(entry => this.matchesPattern(event, entry.pattern)),
    ].sort(byPriority);

    for (const entry of listeners) {
      if (entry.once) {
        this.off(entry.pattern, entry.identity);
      }
    }

    return listeners;
  }

  private isWildcard(pattern: string): boolean {
    return pattern.includes('*');
  }

  private matchesPattern(event: string, pattern: string): boolean {
    if (pattern === '*') {
      return true;
    }

    // "profile.*" matches exactly one level
    const regexPattern = pattern
      .replace(/\./g, '\\.')
      .replace(/\*/g, '[^.]+');

    return new RegExp(`^${regexPattern}$`).test(event);
  }

  private handleError(error: unknown, event: string, payload: unknown): void {
    const err = error instanceof Error ? error : new Error(String(error));

    if (this.errorHandler) {
      try {
        this.errorHandler(err, event, payload);
      } catch (handlerError) {
        console.error('[MessageBus] Error in error handler:', handlerError);
        console.error('[MessageBus] Original error:', err);
      }
    } else {
      console.error(`[MessageBus] Error in event handler for "${event}":`, err);
    }
  }
}

function byPriority(a: { priority: number }, b: { priority: number }): number {
  return b.priority - a.priority;
}
