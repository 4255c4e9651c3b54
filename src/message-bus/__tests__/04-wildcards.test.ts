/**
 * MessageBus Tests - Wildcard Patterns
 */

import { MessageBus } from '../MessageBus';

interface TestEvents {
  'profile.changed': { ownerId: string };
  'profile.saved': { ownerId: string };
  'scheduler.tick': { ownerId: string };
}

describe('MessageBus - Wildcards', () => {
  let bus: MessageBus<TestEvents>;

  beforeEach(() => {
    bus = new MessageBus<TestEvents>();
  });

  it('"*" should match every event', async () => {
    const handler = jest.fn();
    bus.onPattern('*', handler);

    await bus.emit('profile.changed', { ownerId: 'a' });
    await bus.emit('scheduler.tick', { ownerId: 'b' });

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it('"profile.*" should match one level below profile', async () => {
    const handler = jest.fn();
    bus.onPattern('profile.*', handler);

    await bus.emit('profile.changed', { ownerId: 'a' });
    await bus.emit('profile.saved', { ownerId: 'a' });
    await bus.emit('scheduler.tick', { ownerId: 'a' });

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it('should order wildcard and exact listeners together by priority', async () => {
    const order: string[] = [];

    bus.on('profile.saved', () => { order.push('exact'); });
    bus.onPattern('profile.*', () => { order.push('pattern'); }, { priority: 5 });

    await bus.emit('profile.saved', { ownerId: 'a' });

    expect(order).toEqual(['pattern', 'exact']);
  });

  it('should unsubscribe pattern listeners', async () => {
    const handler = jest.fn();
    const unsubscribe = bus.onPattern('profile.*', handler);

    expect(bus.listenerCount('profile.*')).toBe(1);
    unsubscribe();
    await bus.emit('profile.saved', { ownerId: 'a' });

    expect(handler).not.toHaveBeenCalled();
    expect(bus.listenerCount('profile.*')).toBe(0);
  });

  it('should reject patterns without a wildcard', () => {
    expect(() => bus.onPattern('profile.saved', jest.fn())).toThrow('Not a wildcard pattern: profile.saved');
  });
});
