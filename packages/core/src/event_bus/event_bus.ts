import { EventEmitter } from 'events';

import type { EventHandler, EventOf, EventSelector, MediaLedgerEvent } from './types';
import { createLogger } from '../logger';
import type { Logger } from '../logger';

const ALL_EVENTS = '*';

/**
 * Event Stream interface - what the registry publishes to and subscribers
 * listen on.
 */
export interface IEventStream {
  publish(event: MediaLedgerEvent): void;

  /**
   * Registers `handler` for one event type, or for every event with '*'.
   * Returns a function that removes the subscription.
   */
  subscribe<K extends EventSelector>(eventType: K, handler: EventHandler<EventOf<K>>): () => void;

  /**
   * Resolves once every handler started so far has settled.
   */
  waitForIdle(options?: { timeout?: number }): Promise<void>;
}

function selects<K extends EventSelector>(eventType: K, event: MediaLedgerEvent): event is EventOf<K> {
  return eventType === ALL_EVENTS || event.type === eventType;
}

/**
 * In-process EventBus built on Node.js EventEmitter.
 *
 * Handlers start synchronously inside publish(). A rejected or throwing
 * handler is logged and never reaches the publisher.
 */
export class EventBus implements IEventStream {
  private readonly emitter = new EventEmitter();
  private readonly pending = new Set<Promise<void>>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createLogger('[EventBus] ');
  }

  publish(event: MediaLedgerEvent): void {
    this.emitter.emit(event.type, event);
    this.emitter.emit(ALL_EVENTS, event);
  }

  subscribe<K extends EventSelector>(eventType: K, handler: EventHandler<EventOf<K>>): () => void {
    const listener = (event: MediaLedgerEvent): void => {
      if (!selects(eventType, event)) return;
      const selected = event;
      this.track(eventType, async () => handler(selected));
    };
    this.emitter.on(eventType, listener);
    return () => {
      this.emitter.off(eventType, listener);
    };
  }

  /**
   * @param options.timeout - ms to wait before giving up with a warning (default 5000)
   */
  async waitForIdle(options: { timeout?: number } = {}): Promise<void> {
    const timeout = options.timeout ?? 5000;
    const deadline = Date.now() + timeout;

    while (this.pending.size > 0) {
      if (Date.now() > deadline) {
        this.logger.warn(`waitForIdle() gave up after ${timeout}ms with ${this.pending.size} handlers pending`);
        return;
      }
      await Promise.race([
        Promise.all(this.pending),
        new Promise((resolve) => setTimeout(resolve, 10)),
      ]);
    }
  }

  private track(eventType: string, run: () => Promise<void>): void {
    const settled = run().catch((error: unknown) => {
      this.logger.error(`Error in event handler for ${eventType}:`, error);
    });
    this.pending.add(settled);
    void settled.finally(() => {
      this.pending.delete(settled);
    });
  }
}
