/**
 * Event System for the Root Controller
 * Manages event listeners with memory leak detection
 */

import type { ControllerEvents, EventListener, Logger } from './types';

type ListenerTable = {
  [K in keyof ControllerEvents]: Set<EventListener<ControllerEvents[K]>>;
};

export class EventManager {
  private listeners: ListenerTable = {
    scriptError: new Set(),
    stateChange: new Set(),
  };
  private readonly maxListeners = 10;
  private warnedEvents = new Set<keyof ControllerEvents>();

  constructor(
    private logger: Pick<Logger, 'warn' | 'error'>,
    private debug = false
  ) {}

  /**
   * Emit event to all registered listeners
   */
  emit<K extends keyof ControllerEvents>(event: K, data: ControllerEvents[K]): void {
    const listeners: Set<EventListener<ControllerEvents[K]>> = this.listeners[event];
    for (const listener of listeners) {
      try {
        listener(data);
      } catch (error) {
        this.logger.error('[blueprint] Event listener error:', error);
      }
    }
  }

  /**
   * Register event listener
   * Returns unsubscribe function
   */
  on<K extends keyof ControllerEvents>(
    event: K,
    listener: EventListener<ControllerEvents[K]>
  ): () => void {
    const listeners: Set<EventListener<ControllerEvents[K]>> = this.listeners[event];
    listeners.add(listener);

    // Memory leak detection - warn if listener count exceeds threshold
    if (this.debug && listeners.size > this.maxListeners && !this.warnedEvents.has(event)) {
      this.logger.warn(
        `[blueprint] Possible EventEmitter memory leak detected. ` +
          `${listeners.size} listeners added for event "${event}".`
      );
      this.warnedEvents.add(event);
    }

    return () => {
      listeners.delete(listener);
      if (this.warnedEvents.has(event) && listeners.size <= this.maxListeners) {
        this.warnedEvents.delete(event);
      }
    };
  }

  removeAllListeners(): void {
    this.listeners.scriptError.clear();
    this.listeners.stateChange.clear();
    this.warnedEvents.clear();
  }
}
