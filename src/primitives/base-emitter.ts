/**
 * @module primitives/base-emitter
 * @description Base implementation of the typed event emitter.
 * The parser and the decoder extend this to gain event capabilities.
 */

import type {
  IBitPacketEmitter,
  EventListener,
} from "../interfaces/event-emitter.js";
import type {
  BitPacketEvent,
  BitPacketEventType,
} from "../types/events.js";

type ListenerRegistry = {
  [K in BitPacketEventType]: Set<EventListener<K>>;
};

/**
 * Concrete typed event emitter for decoder events.
 * One Set per event type for O(1) listener registration and removal.
 */
export class BitPacketEmitter implements IBitPacketEmitter {
  private readonly listeners: ListenerRegistry = {
    PACKET_DECODED: new Set(),
    DECODE_COMPLETE: new Set(),
  };

  on<T extends BitPacketEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    this.listeners[eventType].add(listener);
  }

  once<T extends BitPacketEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const wrapper: EventListener<T> = (event) => {
      this.off(eventType, wrapper);
      listener(event);
    };
    this.on(eventType, wrapper);
  }

  off<T extends BitPacketEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    this.listeners[eventType].delete(listener);
  }

  emit(event: BitPacketEvent): void {
    switch (event.type) {
      case "PACKET_DECODED":
        dispatch(this.listeners.PACKET_DECODED, event);
        break;
      case "DECODE_COMPLETE":
        dispatch(this.listeners.DECODE_COMPLETE, event);
        break;
    }
  }

  /** Whether anything is listening for the given event type. */
  protected hasListeners(eventType: BitPacketEventType): boolean {
    return this.listeners[eventType].size > 0;
  }
}

function dispatch<E>(listeners: Set<(event: E) => void>, event: E): void {
  // Copy so a listener may remove itself (see once()) mid-dispatch.
  for (const listener of [...listeners]) {
    listener(event);
  }
}
