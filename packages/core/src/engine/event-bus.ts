// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { EngineEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: EngineEvent) => void;
}

type Unstamped<E> = E extends EngineEvent ? Omit<E, 'timestamp'> : never;

/** An engine event before the bus stamps it. */
export type EngineEventInput = Unstamped<EngineEvent>;

/**
 * Typed event bus shared by the workflow manager and the package manager.
 * Wraps eventemitter3; every event is stamped on emission.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  emitEvent(event: EngineEventInput): void {
    this.emit('event', { ...event, timestamp: new Date().toISOString() });
  }

  /** Subscribe to a single event type. Returns an unsubscribe function. */
  onType<T extends EngineEvent['type']>(
    type: T,
    listener: (event: Extract<EngineEvent, { type: T }>) => void,
  ): () => void {
    const handler = (event: EngineEvent) => {
      if (isType(event, type)) listener(event);
    };
    this.on('event', handler);
    return () => {
      this.off('event', handler);
    };
  }
}

function isType<T extends EngineEvent['type']>(
  event: EngineEvent,
  type: T,
): event is Extract<EngineEvent, { type: T }> {
  return event.type === type;
}
