/**
 * Availability Scheduler Tests
 * Ranking, lazy deletion and registry synchronisation
 */

import { describe, it, expect } from 'vitest';
import { OrderRegistry } from '../../src/systems/orders.js';
import { AvailabilityScheduler } from '../../src/systems/scheduler.js';
import { createSpec } from '../fixtures.js';

function setup(): { registry: OrderRegistry; scheduler: AvailabilityScheduler } {
  const registry = new OrderRegistry();
  const scheduler = new AvailabilityScheduler(registry);
  scheduler.attach();
  return { registry, scheduler };
}

describe('AvailabilityScheduler', () => {
  it('should rank by priority, then deadline, then payout, then arrival', () => {
    const { registry, scheduler } = setup();
    registry.registerAll(
      [
        createSpec('low', { priority: 0, deadline: 10 }),
        createSpec('late', { priority: 2, deadline: 200, payout: 99 }),
        createSpec('soon', { priority: 2, deadline: 100, payout: 10 }),
        createSpec('rich', { priority: 2, deadline: 100, payout: 20 }),
        createSpec('twin', { priority: 2, deadline: 100, payout: 20 }),
      ],
      0
    );

    const order: string[] = [];
    for (let next = scheduler.pop(); next; next = scheduler.pop()) order.push(next.id);

    expect(order).toEqual(['rich', 'twin', 'soon', 'late', 'low']);
  });

  it('should list available orders in pop order without consuming them', () => {
    const { registry, scheduler } = setup();
    registry.register(createSpec('a', { priority: 1 }), 0);
    registry.register(createSpec('b', { priority: 3 }), 0);

    expect(scheduler.listAvailable().map((o) => o.id)).toEqual(['b', 'a']);
    expect(scheduler.size).toBe(2);
  });

  it('should queue orders when they are released', () => {
    const { registry, scheduler } = setup();
    registry.register(createSpec('later', { releaseTime: 10 }), 0);
    expect(scheduler.peek()).toBeNull();

    registry.tick(10);
    expect(scheduler.peek()?.id).toBe('later');
  });

  it('should drop entries lazily once orders leave available', () => {
    const { registry, scheduler } = setup();
    registry.register(createSpec('a', { priority: 5, deadline: 10 }), 0);
    registry.register(createSpec('b', { priority: 1 }), 0);

    registry.tick(11);
    expect(scheduler.size).toBe(1);
    expect(scheduler.rawSize).toBe(2);

    expect(scheduler.peek()?.id).toBe('b');
    expect(scheduler.rawSize).toBe(1);
    expect(scheduler.staleDiscards).toBe(1);
  });

  it('should re-queue an order that becomes available again', () => {
    const { registry, scheduler } = setup();
    registry.register(createSpec('a'), 0);
    scheduler.pop();
    registry.transition('a', 'accepted', 1);
    expect(scheduler.peek()).toBeNull();

    registry.restore('a', { status: 'available', acceptedAt: null, pickedUpAt: null, resolvedAt: null }, 2);
    expect(scheduler.peek()?.id).toBe('a');
  });

  it('should supersede the old entry when an order is pushed twice', () => {
    const { registry, scheduler } = setup();
    registry.register(createSpec('a'), 0);
    scheduler.push(registry.get('a'));

    expect(scheduler.size).toBe(1);
    expect(scheduler.pop()?.id).toBe('a');
    expect(scheduler.pop()).toBeNull();
  });

  it('should repair an entry the registry no longer considers available', () => {
    const registry = new OrderRegistry();
    const scheduler = new AvailabilityScheduler(registry);
    registry.register(createSpec('a'), 0);
    scheduler.attach();
    scheduler.detach();

    registry.transition('a', 'accepted', 1);
    expect(scheduler.peek()).toBeNull();
    expect(scheduler.lastConsistencyRepair?.message).toBe('Queued order a is no longer available; entry dropped');
  });

  it('should rebuild from saved ids keeping the tie-break order', () => {
    const { registry, scheduler } = setup();
    registry.registerAll([createSpec('x'), createSpec('y'), createSpec('z')], 0);
    registry.transition('y', 'accepted', 1);

    const queued = scheduler.queuedIds();
    expect(queued).toEqual(['x', 'z']);

    scheduler.rebuild(['z', 'x'], 10);
    expect(scheduler.pop()?.id).toBe('z');
    expect(scheduler.getSequenceCounter()).toBe(10);
  });

  it('should keep the original arrival rank when an order comes back', () => {
    const { registry, scheduler } = setup();
    registry.registerAll([createSpec('first'), createSpec('second')], 0);

    registry.transition('first', 'accepted', 1);
    expect(scheduler.listAvailable().map((o) => o.id)).toEqual(['second']);

    registry.restore('first', { status: 'available', acceptedAt: null, pickedUpAt: null, resolvedAt: null }, 2);
    expect(scheduler.listAvailable().map((o) => o.id)).toEqual(['first', 'second']);
    expect(scheduler.getSequenceCounter()).toBe(2);
  });

  it('should reuse saved sequences on rebuild', () => {
    const { registry, scheduler } = setup();
    registry.registerAll([createSpec('x'), createSpec('y')], 0);
    const saved = scheduler.getSequences();
    expect(saved).toEqual([
      ['x', 0],
      ['y', 1],
    ]);

    // y was saved behind x, so queue order on rebuild does not matter
    scheduler.rebuild(['y', 'x'], 2, saved);
    expect(scheduler.pop()?.id).toBe('x');
    expect(scheduler.getSequenceCounter()).toBe(2);
  });
});
