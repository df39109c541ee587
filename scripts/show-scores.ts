/**
 * Show high scores and save slots
 * Usage: npm run scores -- [limit]
 */

import { config } from '../src/config/index.js';
import { createDatabase } from '../src/storage/database.js';

// ANSI colors
const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RESET = '\x1b[0m';

function main() {
  const limit = parseInt(process.argv[2] ?? '10', 10);

  const db = createDatabase(config.DB_PATH);
  if (!db) {
    console.error('Failed to open database');
    process.exit(1);
  }

  console.log(`${BOLD}High Scores${RESET} (${config.DB_PATH})\n`);
  const scores = db.topScores(Number.isFinite(limit) ? limit : 10);
  if (scores.length === 0) {
    console.log('  No scores recorded yet');
  }
  scores.forEach((s, i) => {
    console.log(
      `  ${String(i + 1).padStart(2)}. ${s.name.padEnd(16)} ${GREEN}${s.finalScore.toFixed(0).padStart(6)}${RESET}` +
        `  delivered ${s.delivered}, cancelled ${s.cancelled}, expired ${s.expired}` +
        `  (t=${s.completionTime.toFixed(0)}s, ${s.recordedAt})`
    );
  });

  console.log(`\n${BOLD}Save Slots${RESET}\n`);
  const saves = db.listSaves();
  if (saves.length === 0) {
    console.log('  No saves');
  }
  for (const save of saves) {
    console.log(
      `  ${YELLOW}${save.slot.padEnd(12)}${RESET} t=${save.elapsed.toFixed(0)}s ${save.status.padEnd(8)} $${save.earnings.toFixed(2)}  hash ${save.stateHash}  (${save.savedAt})`
    );
  }

  db.close();
}

main();
