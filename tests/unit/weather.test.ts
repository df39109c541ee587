/**
 * Weather Engine Tests
 * Markov sampling, blended transitions and table normalization
 */

import { describe, it, expect } from 'vitest';
import {
  WeatherEngine,
  DEFAULT_WEATHER_CONFIG,
  INTENSITY_RANGES,
  normalizeTransitionTable,
  speedMultiplier,
  toWeatherCondition,
} from '../../src/systems/weather.js';
import { SeededRNG } from '../../src/core/rng.js';
import { DEFAULT_WEATHER_TIMING } from '../../src/core/world.js';
import type { WeatherConfig, WeatherTiming } from '../../src/core/types.js';

function createEngine(
  config: WeatherConfig = DEFAULT_WEATHER_CONFIG,
  timing: WeatherTiming = DEFAULT_WEATHER_TIMING,
  seed = 12345
): WeatherEngine {
  return new WeatherEngine(config, timing, new SeededRNG(seed));
}

const FIXED_TIMING: WeatherTiming = { burstSeconds: [60, 60], transitionSeconds: [4, 4], minDurations: {} };

describe('normalizeTransitionTable', () => {
  it('should lower-case names, drop unknown or non-positive entries and renormalize', () => {
    const table = normalizeTransitionTable({
      Clear: { RAIN: 2, clouds: 2, hail: 5, fog: -1, wind: 0 },
    });

    expect(table.clear).toEqual({ rain: 0.5, clouds: 0.5 });
    expect(Object.keys(table.clear)).toEqual(['rain', 'clouds']);
  });

  it('should fall back to the default row for empty or self-loop-only rows', () => {
    const table = normalizeTransitionTable({ fog: { fog: 1 }, storm: {} });

    expect(Object.keys(table.fog)).toEqual(['clouds', 'fog', 'clear']);
    expect(table.fog.clouds).toBeCloseTo(1 / 3, 10);
    expect(table.storm).toEqual({ rain: 0.5, clouds: 0.5 });
  });

  it('should give every condition a row summing to one', () => {
    const table = normalizeTransitionTable({ rain: { storm: 3, rain: 1 } });
    for (const row of Object.values(table)) {
      const total = Object.values(row).reduce((sum, p) => sum + (p ?? 0), 0);
      expect(total).toBeCloseTo(1, 10);
    }
  });
});

describe('toWeatherCondition', () => {
  it('should accept known names in any case', () => {
    expect(toWeatherCondition(' Storm ')).toBe('storm');
    expect(toWeatherCondition('RAIN_LIGHT')).toBe('rain_light');
    expect(toWeatherCondition('hail')).toBeNull();
  });
});

describe('speedMultiplier', () => {
  it('should scale from 1 at zero intensity to the condition multiplier at full', () => {
    expect(speedMultiplier('storm', 0)).toBe(1);
    expect(speedMultiplier('storm', 1)).toBeCloseTo(0.75, 10);
    expect(speedMultiplier('rain', 0.5)).toBeCloseTo(0.925, 10);
  });
});

describe('WeatherEngine', () => {
  it('should sample a row matching its probabilities (chi-square, 10,000 draws)', () => {
    const table = normalizeTransitionTable({ clear: { clear: 0.5, clouds: 0.3, rain: 0.2 } });
    const engine = createEngine({ initial: { condition: 'clear', intensity: 0.1 }, transition: table });

    const counts = { clear: 0, clouds: 0, rain: 0 };
    const n = 10000;
    for (let i = 0; i < n; i++) {
      const next = engine.sampleNextCondition('clear');
      if (next === 'clear' || next === 'clouds' || next === 'rain') counts[next]++;
      else throw new Error(`Sampled ${next} outside the row`);
    }

    const expected = { clear: 0.5 * n, clouds: 0.3 * n, rain: 0.2 * n };
    const chiSquare =
      (counts.clear - expected.clear) ** 2 / expected.clear +
      (counts.clouds - expected.clouds) ** 2 / expected.clouds +
      (counts.rain - expected.rain) ** 2 / expected.rain;

    // 2 degrees of freedom, p = 0.001
    expect(chiSquare).toBeLessThan(13.82);
  });

  it('should hold a condition for the burst, then blend into the next one', () => {
    const table = normalizeTransitionTable({ clear: { rain: 1 } });
    const engine = createEngine({ initial: { condition: 'clear', intensity: 0.1 }, transition: table }, FIXED_TIMING);

    for (let i = 0; i < 59; i++) engine.tick(1);
    expect(engine.view().inTransition).toBe(false);

    engine.tick(1);
    const target = engine.getState().target;
    expect(target?.condition).toBe('rain');
    expect(engine.view()).toMatchObject({ condition: 'clear', inTransition: true });

    engine.tick(1);
    engine.tick(1);
    // alpha 0.5: the reported condition has not flipped yet
    expect(engine.view().condition).toBe('clear');
    const targetIntensity = target?.intensity ?? 0;
    expect(engine.currentMultiplier()).toBeCloseTo((1 + speedMultiplier('rain', targetIntensity)) / 2, 10);

    engine.tick(1);
    expect(engine.view().condition).toBe('rain');

    engine.tick(1);
    expect(engine.view()).toMatchObject({ condition: 'rain', intensity: targetIntensity, inTransition: false });
  });

  it('should draw target intensities within the condition range at two decimals', () => {
    const engine = createEngine(DEFAULT_WEATHER_CONFIG, { burstSeconds: [1, 1], transitionSeconds: [1, 1], minDurations: {} });

    for (let i = 0; i < 2000; i++) {
      engine.tick(1);
      const { target } = engine.getState();
      if (target) {
        const [lo, hi] = INTENSITY_RANGES[target.condition];
        expect(target.intensity).toBeGreaterThanOrEqual(lo);
        expect(target.intensity).toBeLessThanOrEqual(hi);
        expect(Math.round(target.intensity * 100)).toBeCloseTo(target.intensity * 100, 8);
      }
      const { intensity } = engine.effective();
      expect(intensity).toBeGreaterThanOrEqual(0);
      expect(intensity).toBeLessThanOrEqual(1);
    }
  });

  it('should not leave a condition before its minimum duration', () => {
    const table = normalizeTransitionTable({ clear: { rain: 1 } });
    const timing: WeatherTiming = { ...FIXED_TIMING, minDurations: { clear: 100 } };
    const engine = createEngine({ initial: { condition: 'clear', intensity: 0.1 }, transition: table }, timing);

    for (let i = 0; i < 99; i++) engine.tick(1);
    expect(engine.view().inTransition).toBe(false);

    engine.tick(1);
    expect(engine.view().inTransition).toBe(true);
  });

  it('should charge stamina only for taxing conditions', () => {
    const clear = createEngine({ initial: { condition: 'clear', intensity: 0.8 }, transition: DEFAULT_WEATHER_CONFIG.transition });
    const storm = createEngine({ initial: { condition: 'storm', intensity: 0.5 }, transition: DEFAULT_WEATHER_CONFIG.transition });

    expect(clear.staminaPenalty()).toBe(0);
    expect(storm.staminaPenalty()).toBeCloseTo(0.15, 10);
  });

  it('should ignore non-positive time steps', () => {
    const engine = createEngine();
    const before = engine.getState();
    engine.tick(0);
    engine.tick(-5);
    expect(engine.getState()).toEqual(before);
  });

  it('should be deterministic for a seed and resumable from saved state', () => {
    const a = createEngine(DEFAULT_WEATHER_CONFIG, DEFAULT_WEATHER_TIMING, 99);
    const b = createEngine(DEFAULT_WEATHER_CONFIG, DEFAULT_WEATHER_TIMING, 99);
    for (let i = 0; i < 400; i++) {
      a.tick(1);
      b.tick(1);
    }
    expect(a.getState()).toEqual(b.getState());

    const resumed = createEngine(DEFAULT_WEATHER_CONFIG, DEFAULT_WEATHER_TIMING, 1);
    resumed.setState(a.getState());
    for (let i = 0; i < 300; i++) {
      a.tick(1);
      resumed.tick(1);
    }
    expect(resumed.getState()).toEqual(a.getState());
  });
});
