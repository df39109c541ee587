/**
 * Score Calculator
 * Pure function over the final session state
 */

import type { Order, ScoreBreakdown, ScoreRules } from '../core/types.js';
import { payMultiplier } from './player.js';
import { DEFAULT_SCORING } from '../core/world.js';

export interface FinalState {
  orders: readonly Readonly<Order>[];
  reputation: number;
  completionTime: number; // seconds elapsed when the game ended
  duration: number;
}

/**
 * Bonus proportional to time left, only when at least earlyThreshold of the duration remains
 */
export function computeTimeBonus(completionTime: number, duration: number, rules: ScoreRules): number {
  if (duration <= 0) return 0;
  const remaining = duration - completionTime;
  if (remaining < rules.earlyThreshold * duration) return 0;
  return (remaining / duration) * rules.timeBonusPoints;
}

export function computePenalties(orders: readonly Readonly<Order>[], rules: ScoreRules): number {
  const { penalties } = rules;
  let total = 0;
  for (const order of orders) {
    if (order.status !== 'cancelled' && order.status !== 'expired') continue;
    const rate = order.status === 'cancelled' ? penalties.cancelled : penalties.expired;
    total += penalties.mode === 'flat' ? rate : rate * order.payout;
  }
  return total;
}

export function computeScore(state: FinalState, rules: ScoreRules = DEFAULT_SCORING): ScoreBreakdown {
  let deliveredPayouts = 0;
  let delivered = 0;
  let cancelled = 0;
  let expired = 0;

  for (const order of state.orders) {
    switch (order.status) {
      case 'delivered':
        delivered++;
        deliveredPayouts += order.payout;
        break;
      case 'cancelled':
        cancelled++;
        break;
      case 'expired':
        expired++;
        break;
    }
  }

  const reputationMultiplier = payMultiplier(state.reputation);
  const baseScore = deliveredPayouts * reputationMultiplier;
  const timeBonus = computeTimeBonus(state.completionTime, state.duration, rules);
  const penalties = computePenalties(state.orders, rules);

  return {
    baseScore,
    timeBonus,
    penalties,
    finalScore: Math.max(0, baseScore + timeBonus - penalties),
    deliveredPayouts,
    reputationMultiplier,
    completionTime: state.completionTime,
    delivered,
    cancelled,
    expired,
  };
}
