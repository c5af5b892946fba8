/**
 * CLI definition using Commander.js
 */

import { isSideFilter, SIDE_FILTERS } from '@slipfinder/core';
import { PERF_TYPES } from '@slipfinder/lichess';
import { Command, InvalidArgumentError, Option } from 'commander';

import type { AnalysisProfile, CliOptions } from './config/schema.js';

export const VERSION = '0.1.0';

const PROFILES: readonly AnalysisProfile[] = ['quick', 'standard', 'deep'];

/**
 * Profile descriptions for help text
 */
const PROFILE_HELP = `Analysis profile:
    quick    - depth 10
    standard - depth 12 [default]
    deep     - depth 18`;

/**
 * Side filter descriptions for help text
 */
const SIDE_HELP = `Moves to analyze:
    both   - every move [default]
    white  - White's moves only
    black  - Black's moves only
    player - the moves of --user`;

function isAnalysisProfile(value: unknown): value is AnalysisProfile {
  return PROFILES.some((profile) => profile === value);
}

/**
 * Commander parser for integer options
 */
export function parseInteger(value: string): number {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || value.trim() === '') {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * Split a comma-separated speed list, e.g. "blitz, rapid"
 */
export function parsePerfList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('slipfinder')
    .description('Find the mistakes in your Lichess games and turn them into training positions')
    .version(VERSION);

  program
    .command('analyze')
    .description("Download a user's games and report the errors in them")
    .option('-u, --user <name>', 'Lichess username')
    .option('-i, --input <file>', 'Analyze a local PGN file instead of downloading')
    .option('-o, --output <file>', 'Output file for the JSON report (default: stdout)')
    .option('-c, --config <file>', 'Path to config file')
    .option('-n, --max-games <n>', 'Maximum number of games to analyze', parseInteger)
    .option('--since <date>', 'First day to include (YYYY-MM-DD)')
    .option('--until <date>', 'Last day to include (YYYY-MM-DD)')
    .option('--perf <list>', `Comma-separated speeds (${PERF_TYPES.join(', ')})`, parsePerfList)
    .addOption(new Option('-p, --profile <profile>', PROFILE_HELP).choices(PROFILES))
    .option('-d, --depth <n>', 'Search depth (overrides the profile)', parseInteger)
    .option('--threads <n>', 'Engine threads', parseInteger)
    .option('--hash-mb <n>', 'Engine hash size in MB', parseInteger)
    .option('--min-cp <n>', 'Smallest centipawn loss to report', parseInteger)
    .option('--inaccuracy <n>', 'Inaccuracy threshold in centipawns', parseInteger)
    .option('--mistake <n>', 'Mistake threshold in centipawns', parseInteger)
    .option('--blunder <n>', 'Blunder threshold in centipawns', parseInteger)
    .addOption(new Option('-s, --side <side>', SIDE_HELP).choices(SIDE_FILTERS))
    .option('-e, --engine <path>', 'Path to the UCI engine binary')
    .option('--token <token>', 'Lichess API token')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--dry-run', 'Check the engine and the account without analyzing')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .option('-q, --quiet', 'Suppress progress output')
    .action(async (options: Record<string, unknown>) => {
      // Import dynamically to avoid circular dependencies
      const { analyzeCommand } = await import('./commands/analyze.js');
      await analyzeCommand(options);
    });

  return program;
}

function readString(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

function readNumber(options: Record<string, unknown>, key: string): number | undefined {
  const value = options[key];
  return typeof value === 'number' ? value : undefined;
}

function readFlag(options: Record<string, unknown>, key: string): boolean | undefined {
  const value = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const user = readString(options, 'user');
  if (user !== undefined) result.user = user;
  const input = readString(options, 'input');
  if (input !== undefined) result.input = input;
  const output = readString(options, 'output');
  if (output !== undefined) result.output = output;
  const config = readString(options, 'config');
  if (config !== undefined) result.config = config;
  const since = readString(options, 'since');
  if (since !== undefined) result.since = since;
  const until = readString(options, 'until');
  if (until !== undefined) result.until = until;
  const engine = readString(options, 'engine');
  if (engine !== undefined) result.engine = engine;
  const token = readString(options, 'token');
  if (token !== undefined) result.token = token;

  const maxGames = readNumber(options, 'maxGames');
  if (maxGames !== undefined) result.maxGames = maxGames;
  const depth = readNumber(options, 'depth');
  if (depth !== undefined) result.depth = depth;
  const threads = readNumber(options, 'threads');
  if (threads !== undefined) result.threads = threads;
  const hashMb = readNumber(options, 'hashMb');
  if (hashMb !== undefined) result.hashMb = hashMb;
  const minCp = readNumber(options, 'minCp');
  if (minCp !== undefined) result.minCp = minCp;
  const inaccuracy = readNumber(options, 'inaccuracy');
  if (inaccuracy !== undefined) result.inaccuracy = inaccuracy;
  const mistake = readNumber(options, 'mistake');
  if (mistake !== undefined) result.mistake = mistake;
  const blunder = readNumber(options, 'blunder');
  if (blunder !== undefined) result.blunder = blunder;

  const perf = options['perf'];
  if (Array.isArray(perf)) {
    result.perf = perf.filter((item): item is string => typeof item === 'string');
  }
  const profile = options['profile'];
  if (isAnalysisProfile(profile)) result.profile = profile;
  const side = options['side'];
  if (typeof side === 'string' && isSideFilter(side)) result.side = side;

  const showConfig = readFlag(options, 'showConfig');
  if (showConfig !== undefined) result.showConfig = showConfig;
  const dryRun = readFlag(options, 'dryRun');
  if (dryRun !== undefined) result.dryRun = dryRun;
  const quiet = readFlag(options, 'quiet');
  if (quiet !== undefined) result.quiet = quiet;
  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (options['color'] === false) result.noColor = true;

  return result;
}
