/**
 * Data Loaders
 * Turn raw provider records (city map, jobs, weather) into typed values
 *
 * Jobs are parsed record by record: a malformed record is reported and skipped,
 * the rest of the batch still loads. A malformed city map is fatal to that load.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';

import type { GridPoint, OrderSpec, WeatherConfig } from '../core/types.js';
import { MalformedRecordError } from '../core/errors.js';
import type { CityData, TileInfo } from '../systems/city.js';
import { DEFAULT_WEATHER_CONFIG, normalizeTransitionTable, toWeatherCondition } from '../systems/weather.js';

export const DEFAULT_CITY_GOAL = 3000;

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Providers wrap payloads as {data: ...}; some also nest the list one level deeper
 */
function unwrap(raw: unknown): unknown {
  return isRecord(raw) && 'data' in raw ? raw.data : raw;
}

export function parsePoint(value: unknown): GridPoint | null {
  if (Array.isArray(value) && value.length === 2 && isFiniteNumber(value[0]) && isFiniteNumber(value[1])) {
    return { x: value[0], y: value[1] };
  }
  if (isRecord(value) && isFiniteNumber(value.x) && isFiniteNumber(value.y)) {
    return { x: value.x, y: value.y };
  }
  return null;
}

// ============================================================================
// Jobs
// ============================================================================

export interface JobParseOptions {
  /** Game start as an ISO timestamp or epoch milliseconds; needed for ISO deadlines */
  epoch?: string | number;
}

export interface JobParseResult {
  orders: OrderSpec[];
  errors: MalformedRecordError[];
}

function epochMillis(epoch: string | number | undefined): number | null {
  if (epoch === undefined) return null;
  const ms = typeof epoch === 'number' ? epoch : Date.parse(epoch);
  return Number.isFinite(ms) ? ms : null;
}

function parseDeadline(value: unknown, epochMs: number | null): number | string {
  if (isFiniteNumber(value)) return value;
  if (typeof value !== 'string') return 'deadline must be a number of seconds or an ISO timestamp';
  if (epochMs === null) return 'ISO deadline needs an epoch';
  const ms = Date.parse(value);
  if (!Number.isFinite(ms)) return `deadline "${value}" is not a valid timestamp`;
  return (ms - epochMs) / 1000;
}

function jobList(raw: unknown): unknown[] | null {
  const payload = unwrap(raw);
  if (Array.isArray(payload)) return payload;
  if (isRecord(payload)) {
    if (Array.isArray(payload.orders)) return payload.orders;
    if (Array.isArray(payload.jobs)) return payload.jobs;
  }
  return null;
}

/**
 * Parse one job record. Returns a reason string on failure.
 */
function parseJob(record: unknown, epochMs: number | null): OrderSpec | string {
  if (!isRecord(record)) return 'record is not an object';

  const id = typeof record.id === 'number' ? String(record.id) : record.id;
  if (typeof id !== 'string' || id.trim() === '') return 'missing id';

  const pickup = parsePoint(record.pickup);
  if (!pickup) return 'pickup must be [x, y] or {x, y}';
  const dropoff = parsePoint(record.dropoff);
  if (!dropoff) return 'dropoff must be [x, y] or {x, y}';

  if (!isFiniteNumber(record.payout) || record.payout < 0) return 'payout must be a number >= 0';
  if (!isFiniteNumber(record.weight) || record.weight < 0) return 'weight must be a number >= 0';

  const deadline = parseDeadline(record.deadline, epochMs);
  if (typeof deadline === 'string') return deadline;

  const priority = record.priority ?? 0;
  if (!isFiniteNumber(priority) || !Number.isInteger(priority)) return 'priority must be an integer';

  const releaseTime = record.release_time ?? record.releaseTime ?? 0;
  if (!isFiniteNumber(releaseTime) || releaseTime < 0) return 'release_time must be a number >= 0';

  return {
    id,
    pickup,
    dropoff,
    payout: record.payout,
    deadline,
    priority,
    weight: record.weight,
    releaseTime,
  };
}

/**
 * Accepts a bare array or a {data: [...]}, {orders: [...]} or {data: {orders: [...]}} wrapper
 */
export function parseJobRecords(raw: unknown, options: JobParseOptions = {}): JobParseResult {
  const result: JobParseResult = { orders: [], errors: [] };
  const list = jobList(raw);
  if (!list) {
    result.errors.push(new MalformedRecordError('Jobs payload has no order list'));
    return result;
  }

  const epochMs = epochMillis(options.epoch);
  list.forEach((record, index) => {
    const parsed = parseJob(record, epochMs);
    if (typeof parsed === 'string') {
      const recordId = isRecord(record) && (typeof record.id === 'string' || typeof record.id === 'number')
        ? String(record.id)
        : null;
      result.errors.push(
        new MalformedRecordError(`Job #${index}${recordId ? ` (${recordId})` : ''}: ${parsed}`, index, recordId)
      );
      return;
    }
    result.orders.push(parsed);
  });

  return result;
}

// ============================================================================
// City
// ============================================================================

function parseTileInfo(value: unknown): TileInfo {
  if (!isRecord(value)) return {};
  const info: TileInfo = {};
  if (typeof value.name === 'string') info.name = value.name;
  if (typeof value.blocked === 'boolean') info.blocked = value.blocked;
  if (typeof value.walkable === 'boolean') info.walkable = value.walkable;
  const weight = value.surface_weight ?? value.surfaceWeight;
  if (isFiniteNumber(weight)) info.surfaceWeight = weight;
  return info;
}

function parseTileRows(value: unknown): string[][] {
  if (!Array.isArray(value)) {
    throw new MalformedRecordError('City tiles must be a list of strings or a list of lists');
  }
  return value.map((row, y) => {
    if (typeof row === 'string') return Array.from(row);
    if (Array.isArray(row)) return row.map((cell) => String(cell));
    throw new MalformedRecordError(`City tile row ${y} must be a string or a list`);
  });
}

/**
 * Validate a city map payload. Throws MalformedRecordError.
 */
export function parseCityData(raw: unknown): CityData {
  const payload = unwrap(raw);
  if (!isRecord(payload)) {
    throw new MalformedRecordError('City payload is not an object');
  }

  const legend: Record<string, TileInfo> = {};
  if (payload.legend !== undefined) {
    if (!isRecord(payload.legend)) throw new MalformedRecordError('City legend must be an object');
    for (const [code, info] of Object.entries(payload.legend)) {
      legend[code] = parseTileInfo(info);
    }
  }

  if (payload.tiles === undefined) throw new MalformedRecordError('City has no tiles');
  const tiles = parseTileRows(payload.tiles);
  if (tiles.length === 0) throw new MalformedRecordError('City tiles are empty');

  const rowLength = tiles[0].length;
  if (tiles.some((row) => row.length !== rowLength)) {
    throw new MalformedRecordError('City tile rows must all have the same length');
  }

  const width = payload.width ?? rowLength;
  const height = payload.height ?? tiles.length;
  if (width !== rowLength || height !== tiles.length) {
    throw new MalformedRecordError(
      `City size ${String(width)}x${String(height)} does not match tiles ${rowLength}x${tiles.length}`
    );
  }

  if (Object.keys(legend).length > 0) {
    tiles.forEach((row, y) =>
      row.forEach((tile, x) => {
        if (!(tile in legend)) throw new MalformedRecordError(`Tile '${tile}' at (${x},${y}) is not in the legend`);
      })
    );
  }

  const goal = payload.goal ?? DEFAULT_CITY_GOAL;
  if (!isFiniteNumber(goal) || goal < 0) throw new MalformedRecordError('City goal must be a number >= 0');

  return {
    name: typeof payload.name === 'string' ? payload.name : 'City',
    width: rowLength,
    height: tiles.length,
    tiles,
    legend,
    goal,
  };
}

// ============================================================================
// Weather
// ============================================================================

function parseTransitionRows(value: unknown): Record<string, Record<string, number>> {
  const rows: Record<string, Record<string, number>> = {};
  if (!isRecord(value)) return rows;

  for (const [source, row] of Object.entries(value)) {
    if (!isRecord(row)) continue;
    const parsed: Record<string, number> = {};
    for (const [destination, probability] of Object.entries(row)) {
      if (isFiniteNumber(probability)) parsed[destination] = probability;
    }
    rows[source] = parsed;
  }
  return rows;
}

/**
 * Absent or unusable payloads fall back to the default table
 */
export function parseWeatherConfig(raw: unknown): WeatherConfig {
  const payload = unwrap(raw);
  if (!isRecord(payload)) return DEFAULT_WEATHER_CONFIG;

  const initial: Record<string, unknown> = isRecord(payload.initial) ? payload.initial : {};
  const condition =
    (typeof initial.condition === 'string' ? toWeatherCondition(initial.condition) : null) ??
    DEFAULT_WEATHER_CONFIG.initial.condition;
  const intensity = isFiniteNumber(initial.intensity)
    ? Math.max(0, Math.min(1, initial.intensity))
    : DEFAULT_WEATHER_CONFIG.initial.intensity;

  return {
    initial: { condition, intensity },
    transition: normalizeTransitionTable(parseTransitionRows(payload.transition)),
  };
}

// ============================================================================
// Files
// ============================================================================

export function readJsonFile(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

export interface LoadedData {
  city: CityData;
  jobs: OrderSpec[];
  weather: WeatherConfig;
  errors: MalformedRecordError[];
}

/**
 * Load city.json, jobs.json and (optionally) weather.json from a directory
 */
export function loadDataDirectory(dir: string, options: JobParseOptions = {}): LoadedData {
  const city = parseCityData(readJsonFile(join(dir, 'city.json')));
  const { orders, errors } = parseJobRecords(readJsonFile(join(dir, 'jobs.json')), options);

  const weatherPath = join(dir, 'weather.json');
  const weather = existsSync(weatherPath) ? parseWeatherConfig(readJsonFile(weatherPath)) : DEFAULT_WEATHER_CONFIG;

  for (const error of errors) {
    console.warn(`[Data] Skipped record: ${error.message}`);
  }

  return { city, jobs: orders, weather, errors };
}
