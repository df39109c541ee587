/**
 * Environment configuration
 * Reads .env.local and maps it onto session overrides
 */

import dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });

import type { ConfigOverrides } from '../core/world.js';

export const config = {
  DB_PATH: process.env.DB_PATH || 'courier.db',
  DB_ENABLED: process.env.DB_ENABLED !== 'false',
  DATA_DIR: process.env.DATA_DIR || 'data',
  DEBUG: process.env.DEBUG === 'true',
};

function finiteOr(value: number, fallback: number): number {
  return Number.isFinite(value) ? value : fallback;
}

/**
 * Session overrides from an env-style map. Unparseable values fall back to the defaults.
 */
export function overridesFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  return {
    seed: finiteOr(parseInt(env.SEED || '12345', 10), 12345),
    gameDuration: finiteOr(parseFloat(env.GAME_DURATION || '900'), 900),
    historyDepth: finiteOr(parseInt(env.HISTORY_DEPTH || '20', 10), 20),
    debug: env.DEBUG === 'true',
    inventory: {
      maxOrders: finiteOr(parseInt(env.MAX_ORDERS || '3', 10), 3),
      maxWeight: finiteOr(parseFloat(env.MAX_WEIGHT || '10'), 10),
    },
  };
}
