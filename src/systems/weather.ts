/**
 * Weather Engine
 * Markov-chain condition generator with smoothed intensity
 *
 * Each condition holds for a burst (60-90 s by default). At the end of a burst the
 * next condition is sampled from the current row of the transition table and the
 * state blends towards it over a short transition (3-5 s).
 */

import type {
  TransitionTable,
  WeatherCondition,
  WeatherConfig,
  WeatherSample,
  WeatherTiming,
} from '../core/types.js';
import { WEATHER_CONDITIONS } from '../core/types.js';
import type { RNGState, SeededRNG } from '../core/rng.js';

// ============================================================================
// Tables
// ============================================================================

/**
 * Fallback rows for conditions the provider leaves empty or self-loop only
 */
export const DEFAULT_TRANSITION: TransitionTable = {
  clear: { clear: 0.2, clouds: 0.2, wind: 0.2, heat: 0.2, cold: 0.2 },
  clouds: { clear: 0.2, clouds: 0.2, rain_light: 0.2, wind: 0.2, fog: 0.2 },
  rain_light: { clouds: 0.333, rain_light: 0.333, rain: 0.333 },
  rain: { rain_light: 0.25, rain: 0.25, storm: 0.25, clouds: 0.25 },
  storm: { rain: 0.5, clouds: 0.5 },
  fog: { clouds: 0.333, fog: 0.333, clear: 0.333 },
  wind: { wind: 0.333, clouds: 0.333, clear: 0.333 },
  heat: { heat: 0.333, clear: 0.333, clouds: 0.333 },
  cold: { cold: 0.333, clear: 0.333, clouds: 0.333 },
};

/** Speed multiplier at full intensity */
export const SPEED_MULT: Record<WeatherCondition, number> = {
  clear: 1.0,
  clouds: 0.98,
  rain_light: 0.9,
  rain: 0.85,
  storm: 0.75,
  fog: 0.88,
  wind: 0.92,
  heat: 0.9,
  cold: 0.92,
};

/** Extra stamina per cell at full intensity */
export const STAMINA_PENALTY: Partial<Record<WeatherCondition, number>> = {
  storm: 0.3,
  heat: 0.2,
  rain: 0.1,
  wind: 0.1,
};

export const INTENSITY_RANGES: Record<WeatherCondition, [number, number]> = {
  clear: [0.1, 0.6],
  clouds: [0.1, 0.6],
  rain_light: [0.3, 0.95],
  rain: [0.3, 0.95],
  storm: [0.3, 0.95],
  fog: [0.2, 0.7],
  wind: [0.2, 0.7],
  heat: [0.2, 0.8],
  cold: [0.2, 0.8],
};

export const DEFAULT_WEATHER_CONFIG: WeatherConfig = {
  initial: { condition: 'clear', intensity: 0.1 },
  transition: DEFAULT_TRANSITION,
};

// ============================================================================
// Helpers
// ============================================================================

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * clamp(t, 0, 1);
}

export function toWeatherCondition(value: string): WeatherCondition | null {
  const lowered = value.trim().toLowerCase();
  return WEATHER_CONDITIONS.find((c) => c === lowered) ?? null;
}

/**
 * Speed multiplier for a condition at an intensity: 1 at intensity 0, SPEED_MULT at 1
 */
export function speedMultiplier(condition: WeatherCondition, intensity: number): number {
  return lerp(1, SPEED_MULT[condition], intensity);
}

/**
 * Scale a row to sum to 1. Key order is kept: it is the sampling order.
 */
function renormalize(row: Partial<Record<WeatherCondition, number>>): Partial<Record<WeatherCondition, number>> {
  const total = Object.values(row).reduce((sum, p) => sum + (p ?? 0), 0);
  const result: Partial<Record<WeatherCondition, number>> = {};
  for (const [key, p] of Object.entries(row)) {
    const condition = toWeatherCondition(key);
    if (condition && p !== undefined && total > 0) result[condition] = p / total;
  }
  return result;
}

/**
 * Build a row-stochastic table from provider data.
 * Names are lower-cased, unknown destinations and non-positive weights dropped,
 * rows renormalized. Empty or self-loop-only rows fall back to DEFAULT_TRANSITION.
 */
export function normalizeTransitionTable(
  raw: Readonly<Record<string, Readonly<Record<string, number>>>> = {}
): TransitionTable {
  const rows = new Map<WeatherCondition, Partial<Record<WeatherCondition, number>>>();

  for (const [source, destinations] of Object.entries(raw)) {
    const from = toWeatherCondition(source);
    if (!from) continue;

    const row: Partial<Record<WeatherCondition, number>> = rows.get(from) ?? {};
    for (const [destination, probability] of Object.entries(destinations)) {
      const to = toWeatherCondition(destination);
      if (!to || !Number.isFinite(probability) || probability <= 0) continue;
      row[to] = probability;
    }
    rows.set(from, row);
  }

  const table: TransitionTable = { ...DEFAULT_TRANSITION };
  for (const condition of WEATHER_CONDITIONS) {
    const row = rows.get(condition) ?? {};
    const keys = Object.keys(row);
    const degenerate = keys.length === 0 || (keys.length === 1 && row[condition] !== undefined);
    table[condition] = renormalize(degenerate ? DEFAULT_TRANSITION[condition] : row);
  }
  return table;
}

// ============================================================================
// Engine
// ============================================================================

export interface WeatherState {
  condition: WeatherCondition;
  intensity: number;
  target: WeatherSample | null;
  transitionElapsed: number;
  transitionDuration: number;
  burstElapsed: number;
  burstDuration: number;
  lastTransitionTime: number;
  clock: number;
  rng: RNGState;
}

export interface WeatherView {
  condition: WeatherCondition;
  intensity: number;
  inTransition: boolean;
  multiplier: number;
}

export interface WeatherEngineOptions {
  debug?: boolean;
}

export class WeatherEngine {
  private condition: WeatherCondition;
  private intensity: number;
  private target: WeatherSample | null = null;
  private transitionElapsed = 0;
  private transitionDuration = 0;
  private burstElapsed = 0;
  private burstDuration: number;
  private lastTransitionTime = 0;
  private clock = 0;
  private readonly table: TransitionTable;
  private readonly debug: boolean;

  constructor(
    config: WeatherConfig,
    private readonly timing: WeatherTiming,
    private readonly rng: SeededRNG,
    options: WeatherEngineOptions = {}
  ) {
    this.table = config.transition;
    this.condition = config.initial.condition;
    this.intensity = clamp(config.initial.intensity, 0, 1);
    this.debug = options.debug ?? false;
    this.burstDuration = this.drawBurst();

    if (this.debug) {
      console.log(
        `[Weather] init=${this.condition} intensity=${this.intensity} row=[${Object.keys(this.table[this.condition]).join(',')}]`
      );
    }
  }

  /**
   * Advance the engine by dt seconds
   */
  tick(dt: number): void {
    if (dt <= 0) return;
    this.clock += dt;

    if (this.target) {
      this.transitionElapsed += dt;
      if (this.transitionElapsed >= this.transitionDuration) {
        this.condition = this.target.condition;
        this.intensity = this.target.intensity;
        this.target = null;
        this.burstElapsed = 0;
        this.burstDuration = this.drawBurst();
        this.lastTransitionTime = this.clock;
      }
      return;
    }

    this.burstElapsed += dt;
    if (this.burstElapsed < this.burstDuration) return;

    const minDuration = this.timing.minDurations[this.condition] ?? 0;
    if (this.clock - this.lastTransitionTime < minDuration) return;

    const next = this.sampleNextCondition();
    const intensity = this.sampleIntensity(next);
    this.target = { condition: next, intensity };
    this.transitionElapsed = 0;
    this.transitionDuration = this.drawTransition();

    if (this.debug) {
      console.log(`[Weather] ${this.condition} -> ${next} (intensity=${intensity})`);
    }
  }

  /**
   * Sample the next condition from the current row by normalized cumulative distribution
   */
  sampleNextCondition(from: WeatherCondition = this.condition): WeatherCondition {
    const row = this.table[from];
    const conditions: WeatherCondition[] = [];
    const weights: number[] = [];
    for (const [key, p] of Object.entries(row)) {
      const condition = toWeatherCondition(key);
      if (condition && p !== undefined) {
        conditions.push(condition);
        weights.push(p);
      }
    }
    if (conditions.length === 0) return from;
    return this.rng.weightedPick(conditions, weights);
  }

  private sampleIntensity(condition: WeatherCondition): number {
    const [lo, hi] = INTENSITY_RANGES[condition];
    return Math.round(this.rng.randomRange(lo, hi) * 100) / 100;
  }

  private drawBurst(): number {
    const [min, max] = this.timing.burstSeconds;
    return this.rng.randomInt(min, max);
  }

  private drawTransition(): number {
    const [min, max] = this.timing.transitionSeconds;
    return this.rng.randomInt(min, max);
  }

  // ==========================================================================
  // Readouts
  // ==========================================================================

  private alpha(): number {
    if (!this.target || this.transitionDuration <= 0) return 0;
    return clamp(this.transitionElapsed / this.transitionDuration, 0, 1);
  }

  /**
   * Condition and intensity as felt right now. The reported condition flips halfway through a blend.
   */
  effective(): WeatherSample {
    if (!this.target) {
      return { condition: this.condition, intensity: this.intensity };
    }
    const alpha = this.alpha();
    return {
      condition: alpha > 0.5 ? this.target.condition : this.condition,
      intensity: clamp(lerp(this.intensity, this.target.intensity, alpha), 0, 1),
    };
  }

  /**
   * Speed multiplier, blended between the from- and to-state during a transition
   */
  currentMultiplier(): number {
    const current = speedMultiplier(this.condition, this.intensity);
    if (!this.target) return current;
    return lerp(current, speedMultiplier(this.target.condition, this.target.intensity), this.alpha());
  }

  /**
   * Extra stamina cost per cell moved
   */
  staminaPenalty(): number {
    const { condition, intensity } = this.effective();
    return (STAMINA_PENALTY[condition] ?? 0) * intensity;
  }

  view(): WeatherView {
    const { condition, intensity } = this.effective();
    return {
      condition,
      intensity,
      inTransition: this.target !== null,
      multiplier: this.currentMultiplier(),
    };
  }

  // ==========================================================================
  // Serialization
  // ==========================================================================

  getState(): WeatherState {
    return {
      condition: this.condition,
      intensity: this.intensity,
      target: this.target ? { ...this.target } : null,
      transitionElapsed: this.transitionElapsed,
      transitionDuration: this.transitionDuration,
      burstElapsed: this.burstElapsed,
      burstDuration: this.burstDuration,
      lastTransitionTime: this.lastTransitionTime,
      clock: this.clock,
      rng: this.rng.getState(),
    };
  }

  setState(state: WeatherState): void {
    this.condition = state.condition;
    this.intensity = clamp(state.intensity, 0, 1);
    this.target = state.target
      ? { condition: state.target.condition, intensity: clamp(state.target.intensity, 0, 1) }
      : null;
    this.transitionElapsed = state.transitionElapsed;
    this.transitionDuration = state.transitionDuration;
    this.burstElapsed = state.burstElapsed;
    this.burstDuration = state.burstDuration;
    this.lastTransitionTime = state.lastTransitionTime;
    this.clock = state.clock;
    this.rng.setState(state.rng);
  }
}
