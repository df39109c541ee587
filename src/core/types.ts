/**
 * Core types for the City Courier simulation
 * Canonical data structures shared by every system
 */

// ============================================================================
// Primitive Types
// ============================================================================

export type OrderId = string;

export interface GridPoint {
  x: number;
  y: number;
}

export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTION_DELTAS: Record<Direction, GridPoint> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

// ============================================================================
// Orders
// ============================================================================

/**
 * Order lifecycle states.
 * delivered, cancelled and expired are terminal.
 */
export type OrderStatus =
  | 'pending_release'
  | 'available'
  | 'accepted'
  | 'picked_up'
  | 'delivered'
  | 'cancelled'
  | 'expired';

/**
 * Mutable part of an order. This is what undo snapshots copy.
 */
export interface OrderProgress {
  status: OrderStatus;
  acceptedAt: number | null;
  pickedUpAt: number | null;
  resolvedAt: number | null; // delivered, cancelled or expired
}

/**
 * Immutable job description as delivered by the jobs provider.
 * Priority: higher number = more urgent.
 */
export interface OrderSpec {
  id: OrderId;
  pickup: GridPoint;
  dropoff: GridPoint;
  payout: number;
  deadline: number; // absolute game seconds
  priority: number;
  weight: number;
  releaseTime: number; // game seconds
}

export interface Order extends OrderSpec, OrderProgress {}

export type TransitionCause = 'register' | 'tick' | 'action' | 'restore';

export interface OrderTransition {
  orderId: OrderId;
  from: OrderStatus;
  to: OrderStatus;
  previous: OrderProgress;
  time: number;
  cause: TransitionCause;
}

export type OrderListener = (transition: OrderTransition) => void;

// ============================================================================
// Inventory
// ============================================================================

export type SortMode = 'priority' | 'deadline' | 'payout';

export const SORT_MODES: readonly SortMode[] = ['priority', 'deadline', 'payout'];

export interface InventoryLimits {
  maxOrders: number;
  maxWeight: number;
}

// ============================================================================
// Weather
// ============================================================================

export type WeatherCondition =
  | 'clear'
  | 'clouds'
  | 'rain_light'
  | 'rain'
  | 'storm'
  | 'fog'
  | 'wind'
  | 'heat'
  | 'cold';

export const WEATHER_CONDITIONS: readonly WeatherCondition[] = [
  'clear',
  'clouds',
  'rain_light',
  'rain',
  'storm',
  'fog',
  'wind',
  'heat',
  'cold',
];

/** Row-stochastic transition table. Row key order is the sampling order. */
export type TransitionTable = Record<WeatherCondition, Partial<Record<WeatherCondition, number>>>;

export interface WeatherSample {
  condition: WeatherCondition;
  intensity: number; // 0..1
}

export interface WeatherTiming {
  burstSeconds: [number, number]; // stable spell length, drawn per burst
  transitionSeconds: [number, number]; // blend length, drawn per transition
  minDurations: Partial<Record<WeatherCondition, number>>;
}

export interface WeatherConfig {
  initial: WeatherSample;
  transition: TransitionTable;
}

// ============================================================================
// Player
// ============================================================================

export type PlayerCondition = 'normal' | 'tired' | 'exhausted';

export interface PlayerState {
  position: GridPoint;
  stamina: number; // 0..maxStamina
  earnings: number;
  reputation: number; // 0..100
  onTimeStreak: number;
  speed: number;
  lastMoveTime: number;
}

// ============================================================================
// Scoring
// ============================================================================

export type PenaltyRules =
  | { mode: 'flat'; cancelled: number; expired: number }
  | { mode: 'payout_fraction'; cancelled: number; expired: number };

export interface ScoreRules {
  penalties: PenaltyRules;
  timeBonusPoints: number;
  earlyThreshold: number; // fraction of total duration that must remain
}

export interface ScoreBreakdown {
  baseScore: number;
  timeBonus: number;
  penalties: number;
  finalScore: number;
  deliveredPayouts: number;
  reputationMultiplier: number;
  completionTime: number;
  delivered: number;
  cancelled: number;
  expired: number;
}

// ============================================================================
// Session
// ============================================================================

export type SessionStatus = 'playing' | 'victory' | 'defeat';
export type EndReason = 'goal_reached' | 'timeout' | 'reputation';

// ============================================================================
// Game Config
// ============================================================================

export interface GameConfig {
  seed: number;
  debug: boolean;
  gameDuration: number; // seconds
  goal: number | null; // null = use the city's goal
  startPosition: GridPoint;
  historyDepth: number;
  inventory: InventoryLimits;
  interactionRadius: number;

  // Player tuning
  maxStamina: number;
  tiredThreshold: number;
  baseSpeed: number;
  baseMoveCost: number;
  weightPenaltyThreshold: number;
  weightPenaltyPerUnit: number;
  staminaRecoveryRate: number; // per second while idle
  movementCooldown: number; // seconds before recovery starts

  // Reputation
  initialReputation: number;
  reputationLoseThreshold: number;
  earlyDeliveryFraction: number;

  weather: WeatherTiming;
  scoring: ScoreRules;
}
