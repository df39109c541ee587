/**
 * Core Scenarios
 * End-to-end behavior across registry, scheduler, inventory, history and weather
 */

import { describe, it, expect } from 'vitest';
import { GameSession } from '../../src/core/simulation.js';
import { OrderRegistry } from '../../src/systems/orders.js';
import { AvailabilityScheduler } from '../../src/systems/scheduler.js';
import { WeatherEngine, DEFAULT_TRANSITION } from '../../src/systems/weather.js';
import { SeededRNG } from '../../src/core/rng.js';
import { DEFAULT_WEATHER_TIMING } from '../../src/core/world.js';
import { createSessionData, createSpec } from '../fixtures.js';

describe('Scenario: earlier deadline wins a priority tie', () => {
  it('should pop O2 before O1', () => {
    const session = new GameSession(
      createSessionData([
        createSpec('O1', { priority: 1, deadline: 100, payout: 50 }),
        createSpec('O2', { priority: 1, deadline: 50, payout: 80 }),
      ])
    );

    expect(session.registry.get('O1').status).toBe('available');
    expect(session.registry.get('O2').status).toBe('available');
    expect(session.scheduler.pop()?.id).toBe('O2');
  });
});

describe('Scenario: accept then undo', () => {
  it('should hide an accepted order from the scheduler and bring it back on undo', () => {
    const session = new GameSession(createSessionData([createSpec('O1', { priority: 1, deadline: 100, payout: 50 })]));

    const accepted = session.dispatch({ type: 'accept' });
    expect(accepted).toMatchObject({ ok: true, details: { orderId: 'O1' } });
    expect(session.registry.get('O1').status).toBe('accepted');
    expect(session.scheduler.peek()).toBeNull();
    expect(session.inventory.focusedId()).toBe('O1');

    const undone = session.dispatch({ type: 'undo' });
    expect(undone).toMatchObject({ ok: true, details: { label: 'accept O1' } });
    expect(session.registry.get('O1').status).toBe('available');
    expect(session.scheduler.peek()?.id).toBe('O1');
    expect(session.inventory.count).toBe(0);
  });
});

describe('Scenario: expiry removes an order from the queue', () => {
  it('should expire an order at t=31 whose deadline was 30', () => {
    const registry = new OrderRegistry();
    const scheduler = new AvailabilityScheduler(registry);
    scheduler.attach();
    registry.register(createSpec('late', { deadline: 30 }), 0);
    registry.register(createSpec('pending', { deadline: 30, releaseTime: 40 }), 0);

    const { expired } = registry.tick(31);

    expect(expired).toEqual(['late', 'pending']);
    expect(registry.get('late').status).toBe('expired');
    expect(scheduler.pop()).toBeNull();
  });
});

describe('Scenario: storm slows the courier', () => {
  it('should give a storm at 0.8 a multiplier below clear weather', () => {
    const storm = new WeatherEngine(
      { initial: { condition: 'storm', intensity: 0.8 }, transition: DEFAULT_TRANSITION },
      DEFAULT_WEATHER_TIMING,
      new SeededRNG(1)
    );
    const clear = new WeatherEngine(
      { initial: { condition: 'clear', intensity: 0.8 }, transition: DEFAULT_TRANSITION },
      DEFAULT_WEATHER_TIMING,
      new SeededRNG(1)
    );

    expect(clear.currentMultiplier()).toBe(1);
    expect(storm.currentMultiplier()).toBeLessThan(1);
    expect(storm.currentMultiplier()).toBeCloseTo(0.8, 10);
  });
});
