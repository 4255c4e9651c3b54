/**
 * Type definitions for Message Bus
 */

/**
 * Event handler function
 */
export type EventHandler<T> = (payload: T) => void | Promise<void>;

/**
 * Event names of an event map
 */
export type EventName<Events> = Extract<keyof Events, string>;

/**
 * Union of all payloads of an event map
 */
export type AnyPayload<Events> = Events[EventName<Events>];

/**
 * Subscribe options
 */
export interface SubscribeOptions {
  /** Handler priority (higher = called earlier) */
  priority?: number;
  /** Auto-unsubscribe after first trigger */
  once?: boolean;
}

/**
 * Unsubscribe function returned by on()
 */
export type UnsubscribeFn = () => void;

/**
 * Error handler callback
 */
export type ErrorHandler = (error: Error, event: string, payload: unknown) => void;

/**
 * Internal listener entry
 */
export interface ListenerEntry<T> {
  handler(payload: T): void | Promise<void>;
  /** Original handler, used to find the entry on off() */
  identity: unknown;
  priority: number;
  once: boolean;
  pattern: string;
}
