/**
 * Main orchestrator: retrieval, then a sequential walk of every game
 */

import {
  buildTrainerCards,
  GameWalker,
  type AnalyzedGame,
  type Severity,
  type TrainerCard,
} from '@slipfinder/core';
import { isFatalEngineError } from '@slipfinder/engine';
import type { GameFilters } from '@slipfinder/lichess';
import { extractTags, splitPgnGames } from '@slipfinder/pgn';

import type { SlipfinderConfig } from '../config/schema.js';
import { InputError } from '../errors/index.js';
import type { RunReporter, RunStats } from '../progress/types.js';

import type { Services } from './services.js';

/**
 * Where the games come from
 */
export type RunSource =
  | { kind: 'lichess'; username: string }
  | { kind: 'pgn'; text: string; username?: string };

export interface RunResult {
  games: AnalyzedGame[];
  cards: TrainerCard[];
  stats: RunStats;
}

export function filtersFromConfig(config: SlipfinderConfig): GameFilters {
  const { maxGames, since, until, perfTypes } = config.retrieval;
  const filters: GameFilters = { perfTypes: [...perfTypes], max: maxGames };
  if (since) filters.since = since;
  if (until) filters.until = until;
  return filters;
}

function gameLabel(pgnText: string): string {
  const tags = extractTags(pgnText);
  return `${tags['White'] ?? '?'} vs ${tags['Black'] ?? '?'}`;
}

function emptySeverityCounts(): Record<Severity, number> {
  return { inaccuracy: 0, mistake: 0, blunder: 0 };
}

async function loadGameTexts(
  source: RunSource,
  config: SlipfinderConfig,
  services: Services,
  reporter: RunReporter,
): Promise<string[]> {
  if (source.kind === 'pgn') {
    const texts = splitPgnGames(source.text);
    if (texts.length === 0) {
      throw new InputError('No games found in PGN input');
    }
    return texts;
  }

  reporter.startPhase('retrieval', source.username);
  try {
    const result = await services.retriever.retrieve(source.username, filtersFromConfig(config), {
      onAttempt: (outcome) => reporter.reportAttempt(outcome),
    });
    reporter.completePhase('retrieval', `${result.games.length} game(s)`);
    return result.games;
  } catch (error) {
    reporter.failPhase('retrieval', error instanceof Error ? error.message : String(error));
    throw error;
  }
}

/**
 * Run a full analysis
 *
 * A game whose analysis throws is reported and left out; an engine that
 * cannot be started or dies ends the run.
 */
export async function orchestrateRun(
  source: RunSource,
  config: SlipfinderConfig,
  services: Services,
  reporter: RunReporter,
): Promise<RunResult> {
  const startTime = Date.now();
  const texts = await loadGameTexts(source, config, services, reporter);

  const player = source.username;
  const walker = new GameWalker(services.oracle, {
    depth: config.engine.depth,
    thresholds: config.analysis.thresholds,
    minCpLoss: config.analysis.minCpLoss,
    side: config.analysis.side,
    ...(player ? { player } : {}),
    gameUrlBase: config.lichess.baseUrl,
  });

  const games: AnalyzedGame[] = [];
  let gamesSkipped = 0;
  let parseFailures = 0;

  reporter.startPhase('analysis', `${texts.length} game(s)`);
  for (const [index, text] of texts.entries()) {
    reporter.startGame(index, texts.length, gameLabel(text));

    let game: AnalyzedGame;
    try {
      game = await walker.walk(text, {
        onPly: (ply, total) => reporter.updatePly(ply, total),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (isFatalEngineError(error)) {
        reporter.failPhase('analysis', message);
        throw error;
      }
      gamesSkipped++;
      reporter.skipGame(index, texts.length, message);
      continue;
    }

    if (game.parseFailed) {
      parseFailures++;
      reporter.warn(`Game ${game.gameId || index + 1} could not be parsed; kept without records`);
    }
    games.push(game);
    reporter.completeGame(index, texts.length, game.errors.length);
  }

  const cards = buildTrainerCards(games);
  const bySeverity = emptySeverityCounts();
  for (const card of cards) {
    bySeverity[card.severity]++;
  }
  reporter.completePhase('analysis', `${cards.length} record(s)`);

  return {
    games,
    cards,
    stats: {
      gamesRetrieved: texts.length,
      gamesAnalyzed: games.length - parseFailures,
      gamesSkipped,
      parseFailures,
      records: cards.length,
      bySeverity,
      durationMs: Date.now() - startTime,
    },
  };
}
