/**
 * Event Bus Unit Tests
 * Tests pub/sub functionality and event handling
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBus, createEventBus } from '../src/core/event-bus';

describe('EventBus', () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = createEventBus();
  });

  describe('Basic Functionality', () => {
    it('should subscribe and receive events', async () => {
      const handler = vi.fn();
      eventBus.on('simulation:started', handler);

      await eventBus.emit('simulation:started', { antCount: 3, colonyCount: 9 });

      expect(handler).toHaveBeenCalledWith({ antCount: 3, colonyCount: 9 });
    });

    it('should support multiple listeners for same event', async () => {
      let count = 0;
      eventBus.on('colony:destroyed', () => { count++; });
      eventBus.on('colony:destroyed', () => { count++; });
      eventBus.on('colony:destroyed', () => { count++; });

      await eventBus.emit('colony:destroyed', { tick: 1, colony: 'Foo', agents: [0, 1] });

      expect(count).toBe(3);
    });

    it('should only deliver to listeners of the emitted event', async () => {
      const loaded = vi.fn();
      eventBus.on('map:loaded', loaded);

      await eventBus.emit('map:implicit-colony', { colony: 'Bee', line: 2 });

      expect(loaded).not.toHaveBeenCalled();
    });

    it('should support once listeners', async () => {
      let count = 0;
      eventBus.once('map:loaded', () => { count++; });

      await eventBus.emit('map:loaded', { source: 'a.map', colonies: 1, edges: 0 });
      await eventBus.emit('map:loaded', { source: 'a.map', colonies: 1, edges: 0 });

      expect(count).toBe(1);
    });

    it('should return unsubscribe function', async () => {
      let count = 0;
      const unsubscribe = eventBus.on('map:implicit-colony', () => { count++; });

      await eventBus.emit('map:implicit-colony', { colony: 'Bee', line: 2 });
      unsubscribe();
      unsubscribe();
      await eventBus.emit('map:implicit-colony', { colony: 'Bee', line: 2 });

      expect(count).toBe(1);
    });

    it('should emit to no listeners without error', async () => {
      await expect(eventBus.emit('tick:completed', {
        report: { tick: 1, moved: 0, destroyed: [], activeAgents: 0, colonies: 0, state: 'terminated' },
      })).resolves.toBeUndefined();
    });
  });

  describe('Ordering', () => {
    it('should await async handlers in subscription order', async () => {
      const order: string[] = [];
      eventBus.on('simulation:terminated', async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        order.push('slow');
      });
      eventBus.on('simulation:terminated', () => { order.push('fast'); });

      await eventBus.emit('simulation:terminated', { reason: 'no-ants', ticks: 3, survivors: 0, colonies: 2 });

      expect(order).toEqual(['slow', 'fast']);
    });

    it('should hold handlers subscribed during emit until the next emit', async () => {
      let late = 0;
      eventBus.once('colony:destroyed', () => {
        eventBus.on('colony:destroyed', () => { late++; });
      });

      await eventBus.emit('colony:destroyed', { tick: 0, colony: 'A', agents: [0, 1] });
      expect(late).toBe(0);

      await eventBus.emit('colony:destroyed', { tick: 1, colony: 'B', agents: [2, 3] });
      expect(late).toBe(1);
    });
  });

  describe('Error Handling', () => {
    it('should run every handler and then rethrow the first failure', async () => {
      const after = vi.fn();
      eventBus.on('map:loaded', () => { throw new Error('first failure'); });
      eventBus.on('map:loaded', () => { throw new Error('second failure'); });
      eventBus.on('map:loaded', after);

      await expect(eventBus.emit('map:loaded', { source: 'a.map', colonies: 1, edges: 0 }))
        .rejects.toThrow('first failure');
      expect(after).toHaveBeenCalledTimes(1);
    });

    it('should drop a once handler even when it throws', async () => {
      let calls = 0;
      eventBus.once('map:loaded', () => { calls++; throw new Error('once failure'); });

      await expect(eventBus.emit('map:loaded', { source: 'a.map', colonies: 1, edges: 0 })).rejects.toThrow();
      await eventBus.emit('map:loaded', { source: 'a.map', colonies: 1, edges: 0 });

      expect(calls).toBe(1);
    });
  });
});
