/**
 * @module event-bus
 * In-process event bus carrying engine lifecycle events and log records.
 *
 * Two typed channels:
 * - `events` — test/step lifecycle ({@link EngineEvent})
 * - `log`    — log records from every component ({@link LogEvent})
 *
 * Subscribers only observe; a throwing subscriber never affects execution.
 */

import type { EngineEvent, LogEvent } from './types.js';

/** Message type carried by each channel */
export interface BusChannels {
  events: EngineEvent;
  log: LogEvent;
}

export type BusChannel = keyof BusChannels;

type Handler<C extends BusChannel> = (msg: BusChannels[C]) => void;

/**
 * Typed pub/sub bus.
 *
 * Usage:
 * ```ts
 * const bus = createEventBus();
 * const unsub = bus.subscribe('events', (evt) => console.log(evt.type));
 * unsub();
 * ```
 */
export class EventBus {
  private listeners: { [C in BusChannel]: Set<Handler<C>> } = {
    events: new Set(),
    log: new Set(),
  };

  /**
   * Emit a message to all subscribers of a channel.
   *
   * @param channel - Channel name
   * @param message - Message to deliver
   */
  emit<C extends BusChannel>(channel: C, message: BusChannels[C]): void {
    const subs: Set<Handler<C>> = this.listeners[channel];
    for (const handler of subs) {
      try {
        handler(message);
      } catch (err) {
        console.error(`[event-bus] subscriber on "${channel}" failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  /**
   * Subscribe to a channel.
   *
   * @returns An unsubscribe function
   */
  subscribe<C extends BusChannel>(channel: C, handler: Handler<C>): () => void {
    const subs: Set<Handler<C>> = this.listeners[channel];
    subs.add(handler);
    return () => {
      subs.delete(handler);
    };
  }

  /**
   * Get the number of subscribers for a channel.
   */
  subscriberCount(channel: BusChannel): number {
    return this.listeners[channel].size;
  }

  /**
   * Remove all subscriptions from all channels.
   */
  clear(): void {
    this.listeners.events.clear();
    this.listeners.log.clear();
  }
}

/**
 * Create a new {@link EventBus} instance.
 */
export function createEventBus(): EventBus {
  return new EventBus();
}
