/**
 * Session Serializer
 * Versioned, JSON-safe save format for a whole game session
 */

import type { GameConfig, WeatherConfig } from '../core/types.js';
import { GameSession, type SessionState } from '../core/simulation.js';
import { UnsupportedSaveError } from '../core/errors.js';
import type { CityData } from '../systems/city.js';

export const SAVE_VERSION = 1;

export interface SaveFile {
  version: number;
  savedAt: string;
  config: GameConfig;
  city: CityData;
  weatherConfig: WeatherConfig;
  state: SessionState;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Structural check of a parsed save. Deeper fields are trusted once the version matches.
 */
function isSaveFile(value: Record<string, unknown>): value is Record<string, unknown> & SaveFile {
  const { state } = value;
  return (
    typeof value.savedAt === 'string' &&
    isRecord(value.config) &&
    isRecord(value.city) &&
    Array.isArray(value.city.tiles) &&
    isRecord(value.weatherConfig) &&
    isRecord(state) &&
    typeof state.elapsed === 'number' &&
    isRecord(state.player) &&
    Array.isArray(state.orders) &&
    Array.isArray(state.pendingOrders) &&
    isRecord(state.scheduler) &&
    Array.isArray(state.scheduler.sequences) &&
    isRecord(state.inventory) &&
    isRecord(state.weather) &&
    Array.isArray(state.history)
  );
}

export function serializeSession(session: GameSession): SaveFile {
  return {
    version: SAVE_VERSION,
    savedAt: new Date().toISOString(),
    config: session.config,
    city: session.city.toData(),
    weatherConfig: session.getWeatherConfig(),
    state: session.exportState(),
  };
}

/**
 * Rebuild a session from a save. Throws UnsupportedSaveError for foreign or newer formats.
 */
export function deserializeSession(raw: unknown): GameSession {
  if (!isRecord(raw)) {
    throw new UnsupportedSaveError('Save is not an object');
  }
  if (raw.version !== SAVE_VERSION) {
    throw new UnsupportedSaveError(`Unsupported save version ${String(raw.version)} (expected ${SAVE_VERSION})`);
  }
  if (!isSaveFile(raw)) {
    throw new UnsupportedSaveError('Save is missing required sections');
  }

  const session = new GameSession({ city: raw.city, jobs: [], weather: raw.weatherConfig }, raw.config);
  session.importState(raw.state);
  return session;
}

export function sessionToJson(session: GameSession): string {
  return JSON.stringify(serializeSession(session));
}

export function sessionFromJson(json: string): GameSession {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new UnsupportedSaveError(`Save is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return deserializeSession(parsed);
}
