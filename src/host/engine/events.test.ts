/**
 * Event Manager Tests
 */

import { describe, expect, test, vi } from 'vitest';
import { EventManager } from './events';

describe('EventManager', () => {
  test('should stop delivering to an unsubscribed listener', () => {
    const events = new EventManager({ warn: vi.fn(), error: vi.fn() });
    const listener = vi.fn();
    const off = events.on('scriptError', listener);

    events.emit('scriptError', { source: 'tick', description: 'first' });
    off();
    events.emit('scriptError', { source: 'tick', description: 'second' });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ source: 'tick', description: 'first' });
  });

  test('should keep delivering after a listener throws', () => {
    const logger = { warn: vi.fn(), error: vi.fn() };
    const events = new EventManager(logger);
    const after = vi.fn();
    events.on('stateChange', () => {
      throw new Error('listener failed');
    });
    events.on('stateChange', after);

    events.emit('stateChange', { from: 'uninitialized', to: 'ready' });

    expect(after).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      '[blueprint] Event listener error:',
      expect.any(Error)
    );
  });

  test('should warn once about too many listeners in debug mode', () => {
    const logger = { warn: vi.fn(), error: vi.fn() };
    const events = new EventManager(logger, true);
    for (let i = 0; i < 12; i++) {
      events.on('scriptError', () => {});
    }

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      '[blueprint] Possible EventEmitter memory leak detected. ' +
        '11 listeners added for event "scriptError".'
    );
  });
});
