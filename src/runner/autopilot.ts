/**
 * Autopilot
 * Greedy courier for headless runs: takes the best available order, walks to
 * the pickup, then to the dropoff, one command per tick
 */

import type { Direction, GridPoint } from '../core/types.js';
import type { Command, GameSession } from '../core/simulation.js';
import { manhattan, type CityMap } from '../systems/city.js';

const DIRECTIONS: Array<[Direction, GridPoint]> = [
  ['up', { x: 0, y: -1 }],
  ['down', { x: 0, y: 1 }],
  ['left', { x: -1, y: 0 }],
  ['right', { x: 1, y: 0 }],
];

function posKey(pos: GridPoint): string {
  return `${pos.x},${pos.y}`;
}

/**
 * Breadth-first search to the nearest walkable cell within `radius` of the target.
 * Returns the first step, or null if already there or unreachable.
 */
export function firstStepTowards(
  city: CityMap,
  start: GridPoint,
  target: GridPoint,
  radius: number
): Direction | null {
  if (manhattan(start, target) <= radius) return null;

  const visited = new Set<string>([posKey(start)]);
  const queue: Array<{ pos: GridPoint; first: Direction }> = [];

  for (const [direction, delta] of DIRECTIONS) {
    const next = { x: start.x + delta.x, y: start.y + delta.y };
    if (!city.isWalkable(next)) continue;
    visited.add(posKey(next));
    queue.push({ pos: next, first: direction });
  }

  for (let head = 0; head < queue.length; head++) {
    const { pos, first } = queue[head];
    if (manhattan(pos, target) <= radius) return first;

    for (const [, delta] of DIRECTIONS) {
      const next = { x: pos.x + delta.x, y: pos.y + delta.y };
      const key = posKey(next);
      if (visited.has(key) || !city.isWalkable(next)) continue;
      visited.add(key);
      queue.push({ pos: next, first });
    }
  }

  return null;
}

export interface AutopilotOptions {
  /** Stand still below this stamina until recovered to resumeStamina */
  restBelow?: number;
  resumeStamina?: number;
}

export class Autopilot {
  private resting = false;
  private readonly restBelow: number;
  private readonly resumeStamina: number;

  constructor(options: AutopilotOptions = {}) {
    this.restBelow = options.restBelow ?? 10;
    this.resumeStamina = options.resumeStamina ?? 60;
  }

  /**
   * Next command for the session, or null to idle this tick
   */
  decide(session: GameSession): Command | null {
    if (session.getStatus() !== 'playing') return null;

    const player = session.getPlayer();
    const radius = session.config.interactionRadius;
    const order = session.inventory.focused();

    if (!order) {
      const next = session.scheduler.peek();
      return next && session.inventory.canAdd(next) ? { type: 'accept' } : null;
    }

    const target = order.status === 'accepted' ? order.pickup : order.dropoff;
    if (manhattan(player.position, target) <= radius) {
      return { type: order.status === 'accepted' ? 'pickup' : 'deliver' };
    }

    if (this.resting || player.stamina < this.restBelow) {
      this.resting = player.stamina < this.resumeStamina;
      if (this.resting) return null;
    }

    const step = firstStepTowards(session.city, player.position, target, radius);
    return step ? { type: 'move', direction: step } : { type: 'cancel' };
  }
}
