#!/usr/bin/env node
import { SimulationParams } from './models/types';
import { createDefaultSolverConfig } from './core/configs';
import { SimulationEngine } from './core/engine';
import { formatResultReport } from './core/report';
import { isGameEngineError } from './models/errors';

// ─── Parse CLI args ─────────────────────────────────────────────────────────────

const args = process.argv.slice(2);
const gameId = args.find((a) => a.startsWith('--game='))?.split('=')[1];
const strict = args.includes('--strict');

const params: SimulationParams = {};
for (const arg of args.filter((a) => a.startsWith('--param.'))) {
  const [key, ...rest] = arg.slice('--param.'.length).split('=');
  // Numbers pass through as strings; each game's schema coerces them.
  params[key] = rest.join('=');
}

const engine = new SimulationEngine(createDefaultSolverConfig({ strict_convergence: strict }));

// ─── Catalog ────────────────────────────────────────────────────────────────────

if (args.includes('--list') || gameId === undefined) {
  console.log(`\nAvailable games`);
  for (const info of engine.listGames()) {
    console.log(`  ${info.id.padEnd(26)} tier ${info.tier}  ${info.category.padEnd(11)} ${info.name}`);
  }
  if (gameId === undefined && !args.includes('--list')) {
    console.log(`\nUsage: game-engine --game=<id> [--param.<name>=<value> ...] [--json] [--strict]`);
  }
  process.exit(0);
}

// ─── Run ────────────────────────────────────────────────────────────────────────

try {
  const result = engine.simulate({ game_id: gameId, params });
  if (args.includes('--json')) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(formatResultReport(result));
  }
} catch (err) {
  if (isGameEngineError(err)) {
    console.error(`  ${err.name} [${err.code}]: ${err.message}`);
    process.exit(1);
  }
  throw err;
}
