#!/usr/bin/env node
/**
 * Headless Runner
 * CLI that plays a session with the autopilot and prints periodic summaries
 */

import { resolve } from 'path';

import { config, overridesFromEnv } from '../config/index.js';
import { GameSession } from '../core/simulation.js';
import { isGameError } from '../core/errors.js';
import { loadDataDirectory } from '../data/loaders.js';
import { createDatabase, type SaveDatabase } from '../storage/index.js';
import { Autopilot } from './autopilot.js';

interface RunOptions {
  seed: number;
  ticks: number | null;
  dataDir: string;
  verbose: boolean;
  logInterval: number;
  epoch: string | undefined;
  save: string | null;
  load: string | null;
  record: string | null;
}

function parseArgs(): RunOptions {
  const args = process.argv.slice(2);
  const envOverrides = overridesFromEnv();
  const options: RunOptions = {
    seed: envOverrides.seed ?? 12345,
    ticks: null,
    dataDir: config.DATA_DIR,
    verbose: config.DEBUG,
    logInterval: 60,
    epoch: undefined,
    save: null,
    load: null,
    record: null,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--seed':
        options.seed = parseInt(next, 10);
        i++;
        break;
      case '--ticks':
        options.ticks = parseInt(next, 10);
        i++;
        break;
      case '--data':
        options.dataDir = next;
        i++;
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--log-interval':
        options.logInterval = parseInt(next, 10);
        i++;
        break;
      case '--epoch':
        options.epoch = next;
        i++;
        break;
      case '--save':
        options.save = next;
        i++;
        break;
      case '--load':
        options.load = next;
        i++;
        break;
      case '--record':
        options.record = next;
        i++;
        break;
      case '--help':
      case '-h':
        console.log(`
City Courier Runner

Usage: npm run simulate -- [options]

Options:
  --seed <number>        Random seed (default: SEED or 12345)
  --ticks <number>       Ticks of one second to run (default: until the game ends)
  --data <dir>           Directory with city.json, jobs.json, weather.json (default: ${config.DATA_DIR})
  --epoch <iso>          Game start, for jobs with ISO deadlines
  --verbose, -v          Log every system event
  --log-interval <n>     Print a summary every N ticks (default: 60)
  --save <slot>          Save the session to a slot when the run stops
  --load <slot>          Resume from a saved slot instead of the data directory
  --record <name>        Record the final score under a name
  --help, -h             Show this help

Examples:
  npm run simulate -- --seed 7
  npm run simulate -- --ticks 120 --save quick
  npm run simulate -- --load quick --record courier
        `);
        process.exit(0);
    }
  }

  return options;
}

function openDatabase(options: RunOptions): SaveDatabase | null {
  const needed = options.save !== null || options.load !== null || options.record !== null;
  if (!needed || !config.DB_ENABLED) return null;
  return createDatabase(config.DB_PATH);
}

function createSession(options: RunOptions, db: SaveDatabase | null): GameSession {
  if (options.load !== null) {
    const loaded = db?.loadGame(options.load) ?? null;
    if (!loaded) {
      throw new Error(`No save in slot "${options.load}"`);
    }
    console.log(`Loaded slot "${options.load}" at t=${loaded.getElapsed()}s`);
    return loaded;
  }

  const data = loadDataDirectory(resolve(options.dataDir), { epoch: options.epoch });
  if (data.errors.length > 0) {
    console.log(`Skipped ${data.errors.length} malformed job record(s)`);
  }
  return new GameSession(
    { city: data.city, jobs: data.jobs, weather: data.weather },
    { ...overridesFromEnv(), seed: options.seed, debug: options.verbose }
  );
}

function main() {
  const options = parseArgs();
  const db = openDatabase(options);

  console.log('='.repeat(60));
  console.log('City Courier');
  console.log('='.repeat(60));

  const session = createSession(options, db);
  const pilot = new Autopilot();
  const maxTicks = options.ticks ?? Math.ceil(session.config.gameDuration - session.getElapsed());

  console.log(`Seed: ${session.config.seed}`);
  console.log(`City: ${session.city.name} (${session.city.width}x${session.city.height})`);
  console.log(`Goal: $${session.goal} in ${session.config.gameDuration}s`);
  console.log('');
  console.log('Initial State:');
  console.log('-'.repeat(60));
  printSummary(session);

  const startTime = Date.now();
  let ticks = 0;

  while (ticks < maxTicks && session.getStatus() === 'playing') {
    const command = pilot.decide(session);
    if (command) session.enqueue(command);

    const metrics = session.tick(1);
    ticks++;

    if (options.verbose) {
      for (const result of metrics.commands) {
        if (!result.ok) console.log(`  [t=${metrics.time}] ${result.command} failed: ${result.error}`);
      }
    }
    if (metrics.expired.length > 0) {
      console.log(`  [t=${metrics.time}] Expired: ${metrics.expired.join(', ')}`);
    }
    if (ticks % options.logInterval === 0) {
      console.log(`\nTick ${metrics.tick} (t=${metrics.time}s):`);
      console.log('-'.repeat(60));
      printSummary(session);
    }
  }

  const elapsed = Date.now() - startTime;

  console.log('');
  console.log('='.repeat(60));
  console.log('Run Complete');
  console.log('='.repeat(60));
  console.log(`Ticks: ${ticks}`);
  console.log(`Elapsed time: ${elapsed}ms`);
  console.log('');
  console.log('Final State:');
  console.log('-'.repeat(60));
  printSummary(session);

  const score = session.getScore();
  if (score) {
    console.log('');
    console.log(`Result: ${session.getStatus()} (${session.getEndReason()})`);
    console.log(
      `Score: ${score.finalScore.toFixed(0)} = base ${score.baseScore.toFixed(0)} + bonus ${score.timeBonus.toFixed(0)} - penalties ${score.penalties.toFixed(0)}`
    );
    if (db && options.record !== null) {
      db.recordScore(options.record, score);
      console.log(`Recorded score for ${options.record}`);
    }
  }

  if (db && options.save !== null) {
    db.saveGame(options.save, session);
    console.log(`Saved to slot "${options.save}"`);
  }
  db?.close();

  console.log('');
  console.log('Determinism Check:');
  const history = session.getTickHistory();
  console.log(`  State hashes collected: ${history.length}`);
  console.log(`  Final hash: ${session.hash()}`);
}

function printSummary(session: GameSession) {
  const summary = session.getSummary();
  const { player, weather, orders, inventory } = summary;

  console.log(
    `  Courier: (${player.position.x},${player.position.y}) | Stamina ${player.stamina.toFixed(1).padStart(5)} (${player.condition}) | Rep ${player.reputation}`
  );
  console.log(`  Earnings: $${player.earnings.toFixed(2)} / $${summary.goal}`);
  console.log(
    `  Weather: ${weather.condition} (${weather.intensity.toFixed(2)})${weather.inTransition ? ' *' : ''} | Speed x${weather.multiplier.toFixed(2)}`
  );
  console.log(
    `  Orders: ${orders.available} available | ${orders.accepted} accepted | ${orders.picked_up} carried | ${orders.delivered} delivered | ${orders.expired} expired | ${orders.cancelled} cancelled`
  );
  if (inventory.ids.length > 0) {
    console.log(`  Inventory [${inventory.sortMode}]: ${inventory.ids.map((id) => (id === inventory.focusedId ? `>${id}` : id)).join(' ')}`);
  }
}

try {
  main();
} catch (error) {
  if (isGameError(error)) {
    console.error(`Run failed [${error.code}]: ${error.message}`);
  } else {
    console.error('Run failed:', error);
  }
  process.exit(1);
}
