/**
 * Message Bus Module
 * Typed pub/sub used for profile change and save notifications
 */

export { MessageBus } from './MessageBus';
export type {
  EventHandler,
  EventName,
  AnyPayload,
  SubscribeOptions,
  UnsubscribeFn,
  ErrorHandler,
} from './types';
