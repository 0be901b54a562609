import { loadConfig, resultsDirFrom } from './config.js';
import { createAgents } from './agent.js';
import { logger } from './logger.js';
import { EventBus } from './events/index.js';
import { ResultsWriter } from './export/resultsWriter.js';
import { formatTournamentReport, loadTournamentResult, resolveResultsPath } from './report/loadResults.js';
import { rosterFromConfig, runTournament } from './tournament/runTournament.js';
import type { TournamentResult } from './types.js';
import * as path from 'path';
import * as dotenv from 'dotenv';

const DEFAULT_CONFIG_FILE = 'game-config.yaml';

interface CliArgs {
  // Undefined when no config was named on the command line.
  configFile?: string;
  dryRun: boolean;
  seed?: number;
  games?: number;
  ui: boolean;
  report?: string;
}

function parseNumber(arg: string, next: string | undefined, integer = false): number {
  if (!next) throw new Error(`Missing value for ${arg}`);
  const n = Number(next);
  if (!Number.isFinite(n) || (integer && (!Number.isInteger(n) || n < 1))) {
    throw new Error(`Invalid value "${next}" for ${arg}`);
  }
  return n;
}

function parseArgs(argv: string[]): CliArgs {
  let configFile: string | undefined;
  let dryRun = false;
  let seed: number | undefined;
  let games: number | undefined;
  let ui = true;
  let report: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]!;

    // Package managers often forward a literal `--`; ignore it.
    if (arg === '--') continue;

    if (arg === '--dry-run' || arg === '--dryrun') {
      dryRun = true;
      continue;
    }

    if (arg === '--no-ui' || arg === '--no-tui') {
      ui = false;
      continue;
    }

    if (arg === '--seed') {
      seed = Math.trunc(parseNumber(arg, argv[i + 1]));
      i++;
      continue;
    }

    if (arg === '--games') {
      games = parseNumber(arg, argv[i + 1], true);
      i++;
      continue;
    }

    if (arg === '--config') {
      const next = argv[i + 1];
      if (!next) throw new Error('Missing value for --config');
      configFile = next;
      i++;
      continue;
    }

    if (arg === '--report') {
      const next = argv[i + 1];
      report = next && !next.startsWith('-') ? next : 'latest';
      if (next === report) i++;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    // First positional arg is the config file.
    if (!configFile) configFile = arg;
  }

  return { configFile, dryRun, seed, games, ui, report };
}

function printReport(target: string, resultsDir: string) {
  const file = resolveResultsPath(target, resultsDir);
  console.log(formatTournamentReport(loadTournamentResult(file)));
}

async function main() {
  // Load local environment variables from .env
  dotenv.config();

  const args = parseArgs(process.argv.slice(2));

  if (args.report) {
    logger.setPersistenceEnabled(false);
    const configPath = path.resolve(process.cwd(), args.configFile ?? DEFAULT_CONFIG_FILE);
    printReport(args.report, resultsDirFrom(configPath, process.cwd(), args.configFile !== undefined));
    return;
  }

  if (args.ui) {
    // Rendered through the Ink TUI instead of raw lines; logs still go to disk.
    logger.setConsoleOutputEnabled(false);
  }

  if (args.dryRun) {
    process.env.IMPOSTOR_ARENA_DRY_RUN = '1';
    if (args.seed !== undefined) process.env.IMPOSTOR_ARENA_DRY_RUN_SEED = String(args.seed);
    logger.log({
      type: 'SYSTEM',
      content: `Dry-run mode enabled (seed: ${process.env.IMPOSTOR_ARENA_DRY_RUN_SEED ?? 'default'})`,
    });
  }

  // Fail fast on missing auth for the AI Gateway, except in dry-run mode.
  if (!args.dryRun && !process.env.AI_GATEWAY_API_KEY) {
    throw new Error(
      'Missing AI_GATEWAY_API_KEY. Add it to your .env file to authenticate with Vercel AI Gateway, or run with --dry-run.'
    );
  }

  const loaded = loadConfig(path.resolve(process.cwd(), args.configFile ?? DEFAULT_CONFIG_FILE));
  const config = {
    ...loaded,
    games: args.games ?? loaded.games,
    seed: args.seed ?? loaded.seed,
  };
  logger.setVerbose(config.verbose);
  logger.setShowProgress(config.show_progress);

  const roster = rosterFromConfig(config);
  const agents = createAgents(roster, { dryRun: args.dryRun, logThoughts: config.log_thoughts });
  const writer = new ResultsWriter({ dir: path.resolve(process.cwd(), config.results_dir) });

  const controller = new AbortController();
  const onSigint = () => {
    logger.log({ type: 'SYSTEM', content: 'Interrupted; finishing with the games completed so far.' });
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  const standings = new EventBus<TournamentResult>();
  const ui = args.ui
    ? (await import('./ui/runUi.js')).runUi({
        players: roster.map(p => p.name),
        plannedGames: config.games,
        standings,
      })
    : null;

  const tournament = runTournament(config, {
    agents,
    signal: controller.signal,
    onGameComplete: (game, snapshot) => {
      writer.appendGame(game);
      standings.emit(snapshot);
    },
  });

  let result: TournamentResult;
  if (!ui) {
    result = await tournament;
  } else {
    const uiDone = ui.waitUntilExit().then(() => {
      // Leaving the UI early stops the run instead of letting it continue silently.
      logger.setConsoleOutputEnabled(true);
      controller.abort();
    });
    try {
      [result] = await Promise.all([tournament, uiDone]);
    } finally {
      ui.unmount();
    }
  }
  process.off('SIGINT', onSigint);

  const file = writer.writeTournament(result);
  console.log(formatTournamentReport(result));
  console.log(`\nResults written to ${file}`);
  if (result.status === 'partial') process.exitCode = 1;
}

main().catch(error => {
  console.error('Fatal Error:', error);
  process.exit(1);
});
