import { describe, test, expect, vi } from 'vitest';
import { EventEmitter, EventEmitterProtected } from './event-emitter';

interface TestEventMap {
  test: string;
  test1: string;
  test2: string;
  count: number;
}

describe('EventEmitter', () => {
  test('basic event subscription and emission', () => {
    const emitter = new EventEmitter<TestEventMap>();
    const callback = vi.fn();

    emitter.on('test', callback);
    emitter.emit('test', 'hello');

    expect(callback).toHaveBeenCalledWith('hello');
  });

  test('unsubscribe from event', () => {
    const emitter = new EventEmitter<TestEventMap>();
    const callback = vi.fn();

    const unsubscribe = emitter.on('test', callback);
    unsubscribe();
    emitter.emit('test', 'hello');

    expect(callback).not.toHaveBeenCalled();
    expect(emitter.hasListeners('test')).toBe(false);
  });

  test('once subscription', () => {
    const emitter = new EventEmitter<TestEventMap>();
    const callback = vi.fn();

    emitter.once('test', callback);
    emitter.emit('test', 'first');
    emitter.emit('test', 'second');

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledWith('first');
  });

  test('once does not skip the next listener', () => {
    const emitter = new EventEmitter<TestEventMap>();
    const calls: string[] = [];

    emitter.once('test', (data) => {
      calls.push(`once:${data}`);
    });
    emitter.on('test', (data) => {
      calls.push(`on:${data}`);
    });

    emitter.emit('test', 'a');
    emitter.emit('test', 'b');

    expect(calls).toEqual(['once:a', 'on:a', 'on:b']);
  });

  test('multiple subscribers', () => {
    const emitter = new EventEmitter<TestEventMap>();
    const callback1 = vi.fn();
    const callback2 = vi.fn();

    emitter.on('test', callback1);
    emitter.on('test', callback2);
    emitter.emit('test', 'hello');

    expect(callback1).toHaveBeenCalledWith('hello');
    expect(callback2).toHaveBeenCalledWith('hello');
  });

  test('hasListeners and listenerCount', () => {
    const emitter = new EventEmitter<TestEventMap>();

    expect(emitter.hasListeners('test')).toBe(false);
    expect(emitter.listenerCount('test')).toBe(0);

    emitter.on('test', vi.fn());
    emitter.on('test', vi.fn());

    expect(emitter.hasListeners('test')).toBe(true);
    expect(emitter.listenerCount('test')).toBe(2);
  });

  test('clear all listeners', () => {
    const emitter = new EventEmitter<TestEventMap>();
    const callback1 = vi.fn();
    const callback2 = vi.fn();

    emitter.on('test1', callback1);
    emitter.on('test2', callback2);
    emitter.clear();

    emitter.emit('test1', 'hello');
    emitter.emit('test2', 'hello');

    expect(callback1).not.toHaveBeenCalled();
    expect(callback2).not.toHaveBeenCalled();
  });

  test('clear specific event listeners', () => {
    const emitter = new EventEmitter<TestEventMap>();
    const callback1 = vi.fn();
    const callback2 = vi.fn();

    emitter.on('test1', callback1);
    emitter.on('test2', callback2);
    emitter.clear('test1');

    emitter.emit('test1', 'hello');
    emitter.emit('test2', 'hello');

    expect(callback1).not.toHaveBeenCalled();
    expect(callback2).toHaveBeenCalledWith('hello');
  });

  test('async event handlers', async () => {
    const emitter = new EventEmitter<TestEventMap>();
    const result: string[] = [];

    emitter.on('test', async (data) => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      result.push(data);
    });

    emitter.emit('test', 'hello');

    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(result).toEqual(['hello']);
  });

  test('sync listener errors go to onListenerError and later listeners still run', () => {
    const onListenerError = vi.fn();
    const emitter = new EventEmitter<TestEventMap>({ onListenerError });
    const after = vi.fn();
    const error = new Error('Test error');

    emitter.on('test', () => {
      throw error;
    });
    emitter.on('test', after);

    expect(() => emitter.emit('test', 'hello')).not.toThrow();
    expect(onListenerError).toHaveBeenCalledWith('test', error);
    expect(after).toHaveBeenCalledWith('hello');
  });

  test('async listener rejections go to onListenerError', async () => {
    const onListenerError = vi.fn();
    const emitter = new EventEmitter<TestEventMap>({ onListenerError });
    const error = new Error('Async error');

    emitter.on('count', async () => {
      await Promise.resolve();
      throw error;
    });

    emitter.emit('count', 1);

    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(onListenerError).toHaveBeenCalledWith('count', error);
  });

  test('listener errors fall back to console.error', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const emitter = new EventEmitter<TestEventMap>();
    const error = new Error('Test error');

    emitter.on('test', () => {
      throw error;
    });
    emitter.emit('test', 'hello');

    expect(consoleError).toHaveBeenCalledWith(
      'Error in event handler for test:',
      error,
    );

    consoleError.mockRestore();
  });
});

describe('EventEmitterProtected', () => {
  class Counter extends EventEmitterProtected<TestEventMap> {
    private value = 0;

    public increment(): void {
      this.value++;
      this.emit('count', this.value);
    }
  }

  test('derived classes emit, subscribers receive', () => {
    const counter = new Counter();
    const values: number[] = [];

    counter.on('count', (value) => {
      values.push(value);
    });

    counter.increment();
    counter.increment();

    expect(values).toEqual([1, 2]);
  });
});
