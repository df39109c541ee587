/**
 * SQLite Save Store
 * Save slots and a high-score table on better-sqlite3
 */

import Database from 'better-sqlite3';
import type { ScoreBreakdown } from '../core/types.js';
import type { GameSession } from '../core/simulation.js';
import { sessionFromJson, sessionToJson, SAVE_VERSION } from './serializer.js';

// ============================================================================
// Types
// ============================================================================

export interface SaveInfo {
  slot: string;
  version: number;
  savedAt: string;
  elapsed: number;
  status: string;
  earnings: number;
  stateHash: string;
}

export interface ScoreRecord {
  id: number;
  name: string;
  finalScore: number;
  baseScore: number;
  timeBonus: number;
  penalties: number;
  delivered: number;
  cancelled: number;
  expired: number;
  completionTime: number;
  recordedAt: string;
}

interface SaveRow {
  slot: string;
  version: number;
  saved_at: string;
  elapsed: number;
  status: string;
  earnings: number;
  state_hash: string;
}

interface ScoreRow {
  id: number;
  name: string;
  final_score: number;
  base_score: number;
  time_bonus: number;
  penalties: number;
  delivered: number;
  cancelled: number;
  expired: number;
  completion_time: number;
  recorded_at: string;
}

// ============================================================================
// Schema
// ============================================================================

const SCHEMA = `
-- One row per save slot; data holds the serialized session
CREATE TABLE IF NOT EXISTS saves (
  slot TEXT PRIMARY KEY,
  version INTEGER NOT NULL,
  saved_at TEXT NOT NULL DEFAULT (datetime('now')),
  elapsed REAL NOT NULL,
  status TEXT NOT NULL,
  earnings REAL NOT NULL,
  state_hash TEXT NOT NULL,
  data TEXT NOT NULL
);

-- Finished games
CREATE TABLE IF NOT EXISTS scores (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  final_score REAL NOT NULL,
  base_score REAL NOT NULL,
  time_bonus REAL NOT NULL,
  penalties REAL NOT NULL,
  delivered INTEGER NOT NULL,
  cancelled INTEGER NOT NULL,
  expired INTEGER NOT NULL,
  completion_time REAL NOT NULL,
  recorded_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_scores_final ON scores(final_score DESC);
`;

// ============================================================================
// SaveDatabase Class
// ============================================================================

/**
 * All methods are synchronous, as better-sqlite3 is
 */
export class SaveDatabase {
  private db: Database.Database;

  private stmtUpsertSave: Database.Statement<[string, number, number, string, number, string, string]>;
  private stmtLoadSave: Database.Statement<[string], { data: string }>;
  private stmtListSaves: Database.Statement<[], SaveRow>;
  private stmtDeleteSave: Database.Statement<[string]>;
  private stmtInsertScore: Database.Statement<
    [string, number, number, number, number, number, number, number, number]
  >;
  private stmtTopScores: Database.Statement<[number], ScoreRow>;

  /**
   * @param dbPath SQLite file, or ':memory:'
   */
  constructor(dbPath: string = 'courier.db') {
    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.exec(SCHEMA);

    this.stmtUpsertSave = this.db.prepare<[string, number, number, string, number, string, string]>(`
      INSERT INTO saves (slot, version, elapsed, status, earnings, state_hash, data)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(slot) DO UPDATE SET
        version = excluded.version,
        saved_at = datetime('now'),
        elapsed = excluded.elapsed,
        status = excluded.status,
        earnings = excluded.earnings,
        state_hash = excluded.state_hash,
        data = excluded.data
    `);
    this.stmtLoadSave = this.db.prepare<[string], { data: string }>('SELECT data FROM saves WHERE slot = ?');
    this.stmtListSaves = this.db.prepare<[], SaveRow>(`
      SELECT slot, version, saved_at, elapsed, status, earnings, state_hash
      FROM saves ORDER BY slot ASC
    `);
    this.stmtDeleteSave = this.db.prepare<[string]>('DELETE FROM saves WHERE slot = ?');
    this.stmtInsertScore = this.db.prepare<
      [string, number, number, number, number, number, number, number, number]
    >(`
      INSERT INTO scores (name, final_score, base_score, time_bonus, penalties, delivered, cancelled, expired, completion_time)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.stmtTopScores = this.db.prepare<[number], ScoreRow>(`
      SELECT id, name, final_score, base_score, time_bonus, penalties, delivered, cancelled, expired, completion_time, recorded_at
      FROM scores ORDER BY final_score DESC, id ASC LIMIT ?
    `);
  }

  // ============================================================================
  // Save slots
  // ============================================================================

  /**
   * Write a session to a slot, replacing what was there
   */
  saveGame(slot: string, session: GameSession): void {
    const player = session.getPlayer();
    this.stmtUpsertSave.run(
      slot,
      SAVE_VERSION,
      session.getElapsed(),
      session.getStatus(),
      player.earnings,
      session.hash(),
      sessionToJson(session)
    );
  }

  /**
   * Rebuild the session stored in a slot, or null if the slot is empty
   */
  loadGame(slot: string): GameSession | null {
    const row = this.stmtLoadSave.get(slot);
    if (!row) return null;
    return sessionFromJson(row.data);
  }

  listSaves(): SaveInfo[] {
    return this.stmtListSaves.all().map((row) => ({
      slot: row.slot,
      version: row.version,
      savedAt: row.saved_at,
      elapsed: row.elapsed,
      status: row.status,
      earnings: row.earnings,
      stateHash: row.state_hash,
    }));
  }

  deleteSave(slot: string): boolean {
    return this.stmtDeleteSave.run(slot).changes > 0;
  }

  // ============================================================================
  // Scores
  // ============================================================================

  recordScore(name: string, breakdown: ScoreBreakdown): number {
    const result = this.stmtInsertScore.run(
      name,
      breakdown.finalScore,
      breakdown.baseScore,
      breakdown.timeBonus,
      breakdown.penalties,
      breakdown.delivered,
      breakdown.cancelled,
      breakdown.expired,
      breakdown.completionTime
    );
    return Number(result.lastInsertRowid);
  }

  topScores(limit: number = 10): ScoreRecord[] {
    return this.stmtTopScores.all(limit).map((row) => ({
      id: row.id,
      name: row.name,
      finalScore: row.final_score,
      baseScore: row.base_score,
      timeBonus: row.time_bonus,
      penalties: row.penalties,
      delivered: row.delivered,
      cancelled: row.cancelled,
      expired: row.expired,
      completionTime: row.completion_time,
      recordedAt: row.recorded_at,
    }));
  }

  close(): void {
    this.db.close();
  }
}

/**
 * Create a database, or null if SQLite cannot be opened
 */
export function createDatabase(dbPath: string = 'courier.db'): SaveDatabase | null {
  try {
    return new SaveDatabase(dbPath);
  } catch (error) {
    console.warn('[Database] Failed to create database:', error);
    return null;
  }
}
