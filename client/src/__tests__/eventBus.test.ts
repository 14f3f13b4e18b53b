import { describe, it, expect, vi } from 'vitest';
import { EventBus, type SessionEventMap } from '../core/eventBus';

type TestEvents = {
  greet: string;
  count: number;
};

describe('EventBus', () => {
  it('delivers the payload to every listener in registration order', () => {
    const bus = new EventBus<TestEvents>();
    const calls: string[] = [];
    bus.on('greet', (name) => calls.push(`a:${name}`));
    bus.on('greet', (name) => calls.push(`b:${name}`));
    bus.emit('greet', 'hello');
    expect(calls).toEqual(['a:hello', 'b:hello']);
  });

  it('unsubscribes via returned function', () => {
    const bus = new EventBus<TestEvents>();
    const fn = vi.fn();
    const unsub = bus.on('greet', fn);
    unsub();
    bus.emit('greet', 'hello');
    expect(fn).not.toHaveBeenCalled();
  });

  it('once fires only once', () => {
    const bus = new EventBus<TestEvents>();
    const fn = vi.fn();
    bus.once('count', fn);
    bus.emit('count', 1);
    bus.emit('count', 2);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith(1);
  });

  it('a listener removed during emit still sees the current event', () => {
    const bus = new EventBus<TestEvents>();
    const second = vi.fn();
    let unsubSecond = (): void => undefined;
    bus.on('count', () => unsubSecond());
    unsubSecond = bus.on('count', second);

    bus.emit('count', 1);
    bus.emit('count', 2);

    expect(second).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledWith(1);
  });

  it('off and clear remove listeners', () => {
    const bus = new EventBus<TestEvents>();
    const greet = vi.fn();
    const count = vi.fn();
    bus.on('greet', greet);
    bus.on('count', count);

    bus.off('greet');
    bus.emit('greet', 'hello');
    bus.emit('count', 1);
    bus.clear();
    bus.emit('count', 2);

    expect(greet).not.toHaveBeenCalled();
    expect(count).toHaveBeenCalledTimes(1);
  });

  it('carries session events', () => {
    const bus = new EventBus<SessionEventMap>();
    const received = vi.fn();
    const disconnected = vi.fn();
    bus.on('chunk_received', received);
    bus.on('disconnected', disconnected);

    bus.emit('chunk_received', { px: 1, py: -2, pz: 3 });
    bus.emit('disconnected', undefined);

    expect(received).toHaveBeenCalledWith({ px: 1, py: -2, pz: 3 });
    expect(disconnected).toHaveBeenCalledTimes(1);
  });

  it('emitting with no listeners is safe', () => {
    const bus = new EventBus<TestEvents>();
    expect(() => bus.emit('greet', 'hello')).not.toThrow();
  });
});
