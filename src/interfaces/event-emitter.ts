/**
 * @module interfaces/event-emitter
 * @description Typed event emitter interface for decoder events.
 *
 * The event map ensures that listeners receive correctly-typed payloads
 * without runtime type checking.
 */

import type {
  BitPacketEvent,
  BitPacketEventMap,
  BitPacketEventType,
} from "../types/events.js";

/**
 * Listener function signature for a specific event type.
 */
export type EventListener<T extends BitPacketEventType> = (
  event: BitPacketEventMap[T]
) => void;

/**
 * @interface IBitPacketEmitter
 * @description Typed event emitter with compile-time checked event names
 * and payloads.
 */
export interface IBitPacketEmitter {
  /**
   * Register a listener for a specific event type.
   */
  on<T extends BitPacketEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  /**
   * Register a one-time listener that auto-removes after first invocation.
   */
  once<T extends BitPacketEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  /**
   * Remove a previously registered listener.
   */
  off<T extends BitPacketEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  /**
   * Emit an event, invoking all registered listeners synchronously.
   */
  emit(event: BitPacketEvent): void;
}
