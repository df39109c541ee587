/**
 * World Defaults
 * Default tuning and config merging
 */

import type { GameConfig, GridPoint, InventoryLimits, ScoreRules, WeatherTiming } from './types.js';

export const DEFAULT_WEATHER_TIMING: WeatherTiming = {
  burstSeconds: [60, 90],
  transitionSeconds: [3, 5],
  minDurations: {},
};

export const DEFAULT_INVENTORY_LIMITS: InventoryLimits = {
  maxOrders: 3,
  maxWeight: 10,
};

export const DEFAULT_SCORING: ScoreRules = {
  penalties: { mode: 'flat', cancelled: 50, expired: 100 },
  timeBonusPoints: 500,
  earlyThreshold: 0.2, // fraction of the duration left to earn a time bonus
};

/**
 * Default session configuration
 */
export const DEFAULT_CONFIG: GameConfig = {
  seed: 12345,
  debug: false,
  gameDuration: 900, // 15 minutes
  goal: null, // city goal
  startPosition: { x: 0, y: 0 },
  historyDepth: 20,
  inventory: DEFAULT_INVENTORY_LIMITS,
  interactionRadius: 1,

  // Player tuning
  maxStamina: 100,
  tiredThreshold: 30,
  baseSpeed: 3,
  baseMoveCost: 0.5,
  weightPenaltyThreshold: 3,
  weightPenaltyPerUnit: 0.2,
  staminaRecoveryRate: 2,
  movementCooldown: 1,

  // Reputation
  initialReputation: 70,
  reputationLoseThreshold: 20,
  earlyDeliveryFraction: 0.2,

  weather: DEFAULT_WEATHER_TIMING,
  scoring: DEFAULT_SCORING,
};

export interface ConfigOverrides
  extends Partial<Omit<GameConfig, 'inventory' | 'weather' | 'scoring' | 'startPosition'>> {
  startPosition?: GridPoint;
  inventory?: Partial<InventoryLimits>;
  weather?: Partial<WeatherTiming>;
  scoring?: Partial<ScoreRules>;
}

/**
 * Merge overrides onto DEFAULT_CONFIG. Nested groups merge one level deep.
 */
export function resolveConfig(overrides: ConfigOverrides = {}): GameConfig {
  return {
    ...DEFAULT_CONFIG,
    ...overrides,
    startPosition: { ...(overrides.startPosition ?? DEFAULT_CONFIG.startPosition) },
    inventory: { ...DEFAULT_CONFIG.inventory, ...overrides.inventory },
    weather: {
      ...DEFAULT_CONFIG.weather,
      ...overrides.weather,
      minDurations: { ...DEFAULT_CONFIG.weather.minDurations, ...overrides.weather?.minDurations },
    },
    scoring: { ...DEFAULT_CONFIG.scoring, ...overrides.scoring },
  };
}
