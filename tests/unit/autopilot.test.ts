/**
 * Autopilot Tests
 */

import { describe, it, expect } from 'vitest';
import { Autopilot, firstStepTowards } from '../../src/runner/autopilot.js';
import { GameSession } from '../../src/core/simulation.js';
import { CityMap } from '../../src/systems/city.js';
import { createSessionData, createSpec, createTestCity } from '../fixtures.js';

describe('firstStepTowards', () => {
  const city = new CityMap(createTestCity());

  it('should route around walls', () => {
    // both detours are six steps; up is searched first
    expect(firstStepTowards(city, { x: 2, y: 2 }, { x: 4, y: 2 }, 0)).toBe('up');
    expect(firstStepTowards(city, { x: 2, y: 4 }, { x: 4, y: 2 }, 0)).toBe('right');
  });

  it('should return null when already in range', () => {
    expect(firstStepTowards(city, { x: 1, y: 0 }, { x: 2, y: 0 }, 1)).toBeNull();
  });

  it('should return null for an unreachable target', () => {
    expect(firstStepTowards(city, { x: 0, y: 0 }, { x: 3, y: 2 }, 0)).toBeNull();
  });
});

describe('Autopilot', () => {
  it('should accept, pick up, walk and deliver', () => {
    const session = new GameSession(createSessionData([createSpec('o1')]));
    const pilot = new Autopilot();
    const issued: string[] = [];

    for (let i = 0; i < 5; i++) {
      const command = pilot.decide(session);
      if (!command) break;
      issued.push(command.type === 'move' ? `move ${command.direction}` : command.type);
      expect(session.dispatch(command).ok).toBe(true);
    }

    expect(issued).toEqual(['accept', 'pickup', 'move right', 'deliver']);
    expect(session.registry.get('o1').status).toBe('delivered');
  });

  it('should rest when stamina is low', () => {
    const session = new GameSession(createSessionData([createSpec('far', { pickup: { x: 7, y: 4 } })]));
    session.dispatch({ type: 'accept' });

    expect(new Autopilot({ restBelow: 150, resumeStamina: 150 }).decide(session)).toBeNull();
    expect(new Autopilot().decide(session)).toEqual({ type: 'move', direction: 'down' });
  });

  it('should idle once the game is over', () => {
    const session = new GameSession(createSessionData([]), { gameDuration: 1 });
    session.tick();
    expect(new Autopilot().decide(session)).toBeNull();
  });
});
