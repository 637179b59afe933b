/**
 * Unit tests for event-bus and logger modules.
 *
 * Tests cover:
 * - Subscribe / emit / unsubscribe per channel
 * - Throwing subscribers are isolated
 * - Bus logger records
 */

import { describe, it, expect, vi } from 'vitest';
import { createEventBus } from '../../src/event-bus.js';
import { createBusLogger } from '../../src/logger.js';
import type { LogEvent } from '../../src/types.js';

describe('event-bus', () => {
  it('should deliver messages to subscribers of the channel only', () => {
    const bus = createEventBus();
    const onEvents = vi.fn();
    const onLog = vi.fn();
    bus.subscribe('events', onEvents);
    bus.subscribe('log', onLog);

    bus.emit('events', { type: 'test_start', testName: 't', totalSteps: 0, timestamp: 1 });
    expect(onEvents).toHaveBeenCalledTimes(1);
    expect(onLog).not.toHaveBeenCalled();
  });

  it('should stop delivering after unsubscribe', () => {
    const bus = createEventBus();
    const handler = vi.fn();
    const off = bus.subscribe('events', handler);
    expect(bus.subscriberCount('events')).toBe(1);
    off();
    bus.emit('events', { type: 'test_start', testName: 't', totalSteps: 0, timestamp: 1 });
    expect(handler).not.toHaveBeenCalled();
    expect(bus.subscriberCount('events')).toBe(0);
  });

  it('should keep delivering when a subscriber throws', () => {
    const bus = createEventBus();
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const after = vi.fn();
    bus.subscribe('events', () => {
      throw new Error('broken reporter');
    });
    bus.subscribe('events', after);
    bus.emit('events', { type: 'test_start', testName: 't', totalSteps: 0, timestamp: 1 });
    expect(after).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('[event-bus] subscriber on "events" failed: broken reporter');
    errorSpy.mockRestore();
  });

  it('should clear every channel', () => {
    const bus = createEventBus();
    bus.subscribe('events', vi.fn());
    bus.subscribe('log', vi.fn());
    bus.clear();
    expect(bus.subscriberCount('events')).toBe(0);
    expect(bus.subscriberCount('log')).toBe(0);
  });

  describe('createBusLogger', () => {
    it('should publish records on the log channel', () => {
      const bus = createEventBus();
      const records: LogEvent[] = [];
      bus.subscribe('log', (r) => records.push(r));
      createBusLogger(bus, 'executor').warn('careful', { step: 'a' });
      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({ type: 'log', level: 'warn', source: 'executor', message: 'careful', data: { step: 'a' } });
    });
  });
});
