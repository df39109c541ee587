/**
 * Storage Module
 * Session serialization and SQLite save/score storage
 */

export { SaveDatabase, createDatabase } from './database.js';
export type { SaveInfo, ScoreRecord } from './database.js';

export {
  SAVE_VERSION,
  serializeSession,
  deserializeSession,
  sessionToJson,
  sessionFromJson,
} from './serializer.js';
export type { SaveFile } from './serializer.js';
