/**
 * Game retrieval with ordered fallbacks
 *
 * Lichess occasionally returns nothing for a filtered structured export that
 * the bulk PGN export (or the same query without the speed filter) answers.
 * Attempts are tried one at a time and the first that yields a game wins.
 */

import { extractTags, splitPgnGames } from '@slipfinder/pgn';

import type { LichessClient } from '../clients/lichess.js';
import { RetrievalExhaustedError, UnknownUserError } from '../errors.js';
import type {
  AttemptOutcome,
  FetchAttempt,
  FilterVariant,
  GameFilters,
  RetrievalResult,
  RetrievalStrategyName,
} from '../types.js';

import { buildGameQuery, validateFilters } from './query.js';

/**
 * One way of downloading a user's games
 */
export interface RetrievalStrategy {
  readonly name: RetrievalStrategyName;
  fetch(username: string, query: URLSearchParams): Promise<string[]>;
}

type RetrievalClient = Pick<LichessClient, 'getUser' | 'exportGamesNdjson' | 'exportGamesPgn'>;

export interface GameRetrieverOptions {
  /** Called after each attempt, in order */
  onAttempt?: (outcome: AttemptOutcome) => void;
}

/**
 * Default strategy order: structured NDJSON export, then bulk PGN
 */
export function createDefaultStrategies(client: RetrievalClient): RetrievalStrategy[] {
  return [
    {
      name: 'structured-api',
      fetch: (username, query) => client.exportGamesNdjson(username, query),
    },
    {
      name: 'raw-pgn',
      fetch: async (username, query) => [await client.exportGamesPgn(username, query)],
    },
  ];
}

/**
 * Every strategy with the full filters, then without the speed filter when
 * one was given
 */
export function planAttempts(strategies: RetrievalStrategy[], filters: GameFilters): FetchAttempt[] {
  const variants: FilterVariant[] = filters.perfTypes.length > 0 ? ['full', 'without-perf'] : ['full'];
  return strategies.flatMap((strategy) =>
    variants.map((variant): FetchAttempt => ({ strategy: strategy.name, variant })),
  );
}

/**
 * Split, de-duplicate (by Site when present) and cap game texts
 */
export function collectGames(texts: string[], max: number): string[] {
  const seen = new Set<string>();
  const games: string[] = [];

  for (const text of texts) {
    for (const game of splitPgnGames(text)) {
      const key = extractTags(game)['Site'] ?? game;
      if (seen.has(key)) continue;
      seen.add(key);
      games.push(game);
      if (games.length >= max) return games;
    }
  }
  return games;
}

export class GameRetriever {
  private readonly strategies: RetrievalStrategy[];

  constructor(
    private readonly client: RetrievalClient,
    strategies?: RetrievalStrategy[],
  ) {
    this.strategies = strategies ?? createDefaultStrategies(client);
  }

  /**
   * Download the user's games
   *
   * @throws InvalidDateError before any request when a date filter is bad
   * @throws UnknownUserError before any game query when the account is unknown
   * @throws TransportError when the account check itself fails
   * @throws RetrievalExhaustedError when no attempt yields a game
   */
  async retrieve(username: string, filters: GameFilters, options: GameRetrieverOptions = {}): Promise<RetrievalResult> {
    validateFilters(filters);
    await this.client.getUser(username);

    const outcomes: AttemptOutcome[] = [];
    for (const attempt of planAttempts(this.strategies, filters)) {
      const strategy = this.strategies.find((candidate) => candidate.name === attempt.strategy);
      if (!strategy) continue;

      const query = buildGameQuery(filters, attempt.variant);
      let outcome: AttemptOutcome;
      let games: string[] = [];
      try {
        games = collectGames(await strategy.fetch(username, query), filters.max);
        outcome = { ...attempt, status: games.length > 0 ? 'games' : 'empty', count: games.length };
      } catch (err) {
        if (err instanceof UnknownUserError) {
          throw err;
        }
        outcome = {
          ...attempt,
          status: 'failed',
          count: 0,
          error: err instanceof Error ? err.message : String(err),
        };
      }

      outcomes.push(outcome);
      options.onAttempt?.(outcome);

      if (games.length > 0) {
        return { games, attempt, attempts: outcomes };
      }
    }

    const reason = outcomes.some((outcome) => outcome.status === 'empty') ? 'no-games' : 'transport-failure';
    throw new RetrievalExhaustedError(username, reason, outcomes);
  }
}
