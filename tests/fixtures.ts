/**
 * Shared test fixtures: a small open city and an order factory
 */

import type { OrderSpec } from '../src/core/types.js';
import type { CityData } from '../src/systems/city.js';
import type { SessionData } from '../src/core/simulation.js';

/**
 * 8x5 grid, all street except a wall segment at (3,1)-(3,3)
 */
export function createTestCity(overrides: Partial<CityData> = {}): CityData {
  const rows = ['........', '...#....', '...#....', '...#....', '........'];
  return {
    name: 'Test Town',
    width: 8,
    height: 5,
    tiles: rows.map((r) => Array.from(r)),
    legend: {
      '.': { name: 'street' },
      '#': { name: 'wall', blocked: true },
    },
    goal: 1000,
    ...overrides,
  };
}

export function createSpec(id: string, overrides: Partial<Omit<OrderSpec, 'id'>> = {}): OrderSpec {
  return {
    id,
    pickup: { x: 1, y: 0 },
    dropoff: { x: 2, y: 0 },
    payout: 50,
    deadline: 300,
    priority: 1,
    weight: 1,
    releaseTime: 0,
    ...overrides,
  };
}

export function createSessionData(jobs: OrderSpec[], city: CityData = createTestCity()): SessionData {
  return { city, jobs };
}
