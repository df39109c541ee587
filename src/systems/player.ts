/**
 * Player System
 * Stamina, movement cost, speed and reputation rules for the courier
 *
 * All functions are pure: they take a PlayerState and return a new one.
 */

import type { GameConfig, GridPoint, Order, PlayerCondition, PlayerState } from '../core/types.js';

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function createPlayer(config: GameConfig): PlayerState {
  return {
    position: { ...config.startPosition },
    stamina: config.maxStamina,
    earnings: 0,
    reputation: config.initialReputation,
    onTimeStreak: 0,
    speed: config.baseSpeed,
    lastMoveTime: -config.movementCooldown,
  };
}

// ============================================================================
// Stamina
// ============================================================================

export function classifyStamina(stamina: number, config: GameConfig): PlayerCondition {
  if (stamina <= 0) return 'exhausted';
  if (stamina <= config.tiredThreshold) return 'tired';
  return 'normal';
}

export function canMove(player: PlayerState): boolean {
  return player.stamina > 0;
}

/**
 * Extra stamina per cell for weight carried above the threshold
 */
export function weightPenalty(carriedWeight: number, config: GameConfig): number {
  if (carriedWeight <= config.weightPenaltyThreshold) return 0;
  return config.weightPenaltyPerUnit * (carriedWeight - config.weightPenaltyThreshold);
}

/**
 * Stamina spent moving one cell
 */
export function moveCost(carriedWeight: number, weatherPenalty: number, config: GameConfig): number {
  return config.baseMoveCost + weightPenalty(carriedWeight, config) + weatherPenalty;
}

export function staminaFactor(condition: PlayerCondition): number {
  switch (condition) {
    case 'normal':
      return 1;
    case 'tired':
      return 0.8;
    case 'exhausted':
      return 0;
  }
}

export interface SpeedInputs {
  weatherMultiplier: number;
  surfaceWeight: number;
  carriedWeight: number;
  stamina: number;
}

/**
 * Cells per second after weather, surface, load and fatigue
 */
export function computeSpeed(inputs: SpeedInputs, config: GameConfig): number {
  const weightFactor = Math.max(0.8, 1 - 0.03 * inputs.carriedWeight);
  return (
    config.baseSpeed *
    inputs.weatherMultiplier *
    inputs.surfaceWeight *
    weightFactor *
    staminaFactor(classifyStamina(inputs.stamina, config))
  );
}

/**
 * Move one cell. Caller checks walkability and canMove first.
 */
export function applyMove(
  player: PlayerState,
  target: GridPoint,
  cost: number,
  speedInputs: Omit<SpeedInputs, 'stamina'>,
  time: number,
  config: GameConfig
): PlayerState {
  const stamina = clamp(player.stamina - cost, 0, config.maxStamina);
  return {
    ...player,
    position: { ...target },
    stamina,
    speed: computeSpeed({ ...speedInputs, stamina }, config),
    lastMoveTime: time,
  };
}

/**
 * Idle recovery, only once the movement cooldown has passed
 */
export function recoverStamina(
  player: PlayerState,
  dt: number,
  currentTime: number,
  config: GameConfig
): PlayerState {
  if (player.stamina >= config.maxStamina) return player;
  if (currentTime - player.lastMoveTime < config.movementCooldown) return player;

  return {
    ...player,
    stamina: clamp(player.stamina + config.staminaRecoveryRate * dt, 0, config.maxStamina),
  };
}

// ============================================================================
// Reputation
// ============================================================================

export const REPUTATION_EARLY = 5;
export const REPUTATION_ON_TIME = 3;
export const REPUTATION_STREAK_BONUS = 2;
export const REPUTATION_CANCEL = -4;
export const REPUTATION_EXPIRED = -6;

export function applyReputation(player: PlayerState, delta: number): PlayerState {
  return { ...player, reputation: clamp(player.reputation + delta, 0, 100) };
}

/**
 * Pay bonus for a high reputation
 */
export function payMultiplier(reputation: number): number {
  return reputation >= 90 ? 1.05 : 1.0;
}

/**
 * Early when at least earlyDeliveryFraction of the order's window remains
 */
export function isEarlyDelivery(order: Readonly<Order>, time: number, config: GameConfig): boolean {
  const window = order.deadline - order.releaseTime;
  if (window <= 0) return false;
  return order.deadline - time >= config.earlyDeliveryFraction * window;
}

export interface DeliveryOutcome {
  player: PlayerState;
  early: boolean;
  reputationDelta: number;
  credited: number;
}

/**
 * Credit a delivery and adjust reputation. Every third good delivery in a row earns a bonus.
 */
export function registerDelivery(
  player: PlayerState,
  order: Readonly<Order>,
  time: number,
  config: GameConfig
): DeliveryOutcome {
  const early = isEarlyDelivery(order, time, config);
  const streak = player.onTimeStreak + 1;
  const delta = (early ? REPUTATION_EARLY : REPUTATION_ON_TIME) + (streak % 3 === 0 ? REPUTATION_STREAK_BONUS : 0);
  const credited = Math.round(order.payout * payMultiplier(player.reputation) * 100) / 100;

  const next = applyReputation({ ...player, earnings: player.earnings + credited, onTimeStreak: streak }, delta);
  return {
    player: next,
    early,
    reputationDelta: next.reputation - player.reputation,
    credited,
  };
}

export function registerCancellation(player: PlayerState): PlayerState {
  return applyReputation({ ...player, onTimeStreak: 0 }, REPUTATION_CANCEL);
}

export function registerExpiry(player: PlayerState): PlayerState {
  return applyReputation({ ...player, onTimeStreak: 0 }, REPUTATION_EXPIRED);
}
