/**
 * In-process EventBus for domain events.
 *
 * Typed EventEmitter, one per engine instance. Observers subscribe to a
 * single event type or to '*' for every event.
 */

import { EventEmitter } from 'node:events';
import { getErrorMessage, type DomainEvent, type DomainEventOf, type DomainEventType } from '@tierpay/core';
import { createLogger, type Logger } from './logger.js';

export type DomainEventListener<T extends DomainEventType> = (event: DomainEventOf<T>) => void;

/**
 * Typed event bus for registry observers.
 * Wraps Node.js EventEmitter with type safety.
 */
export class EventBus {
  private emitter = new EventEmitter();
  private readonly log: Logger;

  constructor(logger?: Logger) {
    // Indexers and test spies may stack up
    this.emitter.setMaxListeners(100);
    this.log = logger ?? createLogger('EventBus');
  }

  /**
   * Deliver to the listeners of the event's type, then to '*' listeners.
   * A listener that throws is logged and the rest still receive the event.
   */
  emit(event: DomainEvent): void {
    for (const name of [event.type, '*']) {
      for (const listener of this.emitter.listeners(name)) {
        try {
          listener(event);
        } catch (err) {
          this.log.error('event listener threw', { type: event.type, error: getErrorMessage(err) });
        }
      }
    }
  }

  on<T extends DomainEventType>(type: T, listener: DomainEventListener<T>): void;
  on(type: '*', listener: (event: DomainEvent) => void): void;
  on(type: string, listener: (event: DomainEvent) => void): void {
    this.emitter.on(type, listener);
  }

  off<T extends DomainEventType>(type: T, listener: DomainEventListener<T>): void;
  off(type: '*', listener: (event: DomainEvent) => void): void;
  off(type: string, listener: (event: DomainEvent) => void): void {
    this.emitter.off(type, listener);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
