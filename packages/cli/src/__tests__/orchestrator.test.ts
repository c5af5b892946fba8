/**
 * Orchestrator tests against a scripted oracle and an in-process fetch
 */

import { EngineTerminatedError, EngineUnavailableError, StockfishOracle } from '@slipfinder/engine';
import { RetrievalExhaustedError, type AttemptOutcome } from '@slipfinder/lichess';
import { parsePgn, splitPgnGames } from '@slipfinder/pgn';
import {
  cpEval,
  createMockFetch,
  createMockOracle,
  jsonReply,
  loadPgnSync,
  ndjsonReply,
  oracleKey,
  scriptedFactory,
  SEARCH_REPLY,
  stockfishScript,
  textReply,
  type MockOracle,
  type MockRoute,
} from '@slipfinder/test-utils';
import { afterEach, describe, it, expect, vi } from 'vitest';

import { runAnalysis } from '../commands/analyze.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { SlipfinderConfig } from '../config/schema.js';
import { InputError } from '../errors/index.js';
import { orchestrateRun } from '../orchestrator/orchestrator.js';
import { closeServices, initializeServices, type Services } from '../orchestrator/services.js';
import type { RunPhase, RunReporter } from '../progress/types.js';

const WAYWARD_QUEEN = loadPgnSync('wayward-queen.pgn');
const RECENT_GAMES = loadPgnSync('recent-games.pgn');
const ILLEGAL_MOVE = loadPgnSync('illegal-move.pgn');

/** Position before 2. Qh5 */
const QH5_FEN = parsePgn(WAYWARD_QUEEN)[0]!.moves[2]!.fenBefore;

class RecordingReporter implements RunReporter {
  readonly events: string[] = [];
  readonly attempts: AttemptOutcome[] = [];
  readonly skipped: string[] = [];
  readonly warnings: string[] = [];
  readonly plies: Array<[number, number]> = [];

  startPhase(phase: RunPhase): void {
    this.events.push(`start:${phase}`);
  }
  completePhase(phase: RunPhase): void {
    this.events.push(`complete:${phase}`);
  }
  failPhase(phase: RunPhase, error: string): void {
    this.events.push(`fail:${phase}:${error}`);
  }
  reportAttempt(outcome: AttemptOutcome): void {
    this.attempts.push(outcome);
  }
  startGame(index: number, total: number, label: string): void {
    this.events.push(`game:${index + 1}/${total}:${label}`);
  }
  updatePly(ply: number, totalPlies: number): void {
    this.plies.push([ply, totalPlies]);
  }
  completeGame(index: number, _total: number, records: number): void {
    this.events.push(`done:${index + 1}:${records}`);
  }
  skipGame(_index: number, _total: number, reason: string): void {
    this.skipped.push(reason);
  }
  warn(message: string): void {
    this.warnings.push(message);
  }
}

const USER_ROUTE: MockRoute = {
  match: (url) => url.pathname === '/api/user/alice',
  reply: jsonReply({ id: 'alice', username: 'Alice' }),
};

function servicesWith(oracle: MockOracle, routes: MockRoute[] = []): Services {
  const services = initializeServices(DEFAULT_CONFIG, { fetch: createMockFetch(routes) });
  return { ...services, oracle };
}

function withConfig(overrides: Partial<SlipfinderConfig['analysis']>): SlipfinderConfig {
  return { ...DEFAULT_CONFIG, analysis: { ...DEFAULT_CONFIG.analysis, ...overrides } };
}

describe('orchestrateRun', () => {
  it('should find the mistake in a local PGN and build its card', async () => {
    const oracle = createMockOracle({
      responses: new Map([
        [oracleKey(QH5_FEN), cpEval(120, 'g1f3')],
        [oracleKey(QH5_FEN, 'd1h5'), cpEval(-40, 'd1h5')],
      ]),
    });
    const reporter = new RecordingReporter();

    const result = await orchestrateRun(
      { kind: 'pgn', text: WAYWARD_QUEEN },
      DEFAULT_CONFIG,
      servicesWith(oracle),
      reporter,
    );

    expect(result.games).toHaveLength(1);
    expect(result.cards).toHaveLength(1);
    const card = result.cards[0]!;
    expect(card.index).toBe(1);
    expect(card.severity).toBe('mistake');
    expect(card.cpLoss).toBe(160);
    expect(card.bestSan).toBe('Nf3');
    expect(card.link).toBe('https://lichess.org/q7ZvsdUF#3');
    expect(result.stats).toMatchObject({
      gamesRetrieved: 1,
      gamesAnalyzed: 1,
      gamesSkipped: 0,
      parseFailures: 0,
      records: 1,
      bySeverity: { inaccuracy: 0, mistake: 1, blunder: 0 },
    });
    expect(reporter.events).toEqual([
      'start:analysis',
      'game:1/1:Alice vs Bob',
      'done:1:1',
      'complete:analysis',
    ]);
    expect(reporter.plies.at(-1)).toEqual([7, 7]);
  });

  it('should download games and analyze only the player moves', async () => {
    const games = splitPgnGames(RECENT_GAMES);
    const oracle = createMockOracle();
    const reporter = new RecordingReporter();
    const routes: MockRoute[] = [
      USER_ROUTE,
      {
        match: (url) => url.pathname === '/api/games/user/alice',
        reply: ndjsonReply(games.map((pgn, i) => ({ id: `g${i}`, pgn }))),
      },
    ];

    const result = await orchestrateRun(
      { kind: 'lichess', username: 'alice' },
      withConfig({ side: 'player' }),
      servicesWith(oracle, routes),
      reporter,
    );

    expect(result.games.map((game) => game.gameId)).toEqual(['Rk3mPq1a', 'Tx8bNw2c']);
    expect(result.cards).toEqual([]);
    // Two moves of Alice's per game, two queries per move
    expect(oracle.evaluate).toHaveBeenCalledTimes(8);
    expect(reporter.attempts).toEqual([
      { strategy: 'structured-api', variant: 'full', status: 'games', count: 2 },
    ]);
    expect(reporter.events.slice(0, 2)).toEqual(['start:retrieval', 'complete:retrieval']);
  });

  it('should skip a game whose analysis fails and keep going', async () => {
    const failingFen = parsePgn(splitPgnGames(RECENT_GAMES)[1]!)[0]!.moves[1]!.fenBefore;
    const oracle = createMockOracle({ failureFens: new Set([failingFen]) });
    const reporter = new RecordingReporter();

    const result = await orchestrateRun(
      { kind: 'pgn', text: RECENT_GAMES },
      DEFAULT_CONFIG,
      servicesWith(oracle),
      reporter,
    );

    expect(result.games.map((game) => game.gameId)).toEqual(['Rk3mPq1a']);
    expect(result.stats.gamesRetrieved).toBe(2);
    expect(result.stats.gamesSkipped).toBe(1);
    expect(reporter.skipped).toEqual([`Engine evaluation failed for position: ${failingFen}`]);
  });

  it('should keep an unparseable game as a placeholder', async () => {
    const reporter = new RecordingReporter();

    const result = await orchestrateRun(
      { kind: 'pgn', text: `${ILLEGAL_MOVE}\n\n${WAYWARD_QUEEN}` },
      DEFAULT_CONFIG,
      servicesWith(createMockOracle()),
      reporter,
    );

    expect(result.games).toHaveLength(2);
    expect(result.games[0]!.parseFailed).toBe(true);
    expect(result.games[0]!.gameId).toBe('Bad00Mv1');
    expect(result.stats.parseFailures).toBe(1);
    expect(result.stats.gamesAnalyzed).toBe(1);
    expect(reporter.warnings).toEqual(['Game Bad00Mv1 could not be parsed; kept without records']);
  });

  it('should end the run when the engine dies', async () => {
    const reporter = new RecordingReporter();

    await expect(
      orchestrateRun(
        { kind: 'pgn', text: RECENT_GAMES },
        DEFAULT_CONFIG,
        servicesWith(createMockOracle({ terminateAfter: 3 })),
        reporter,
      ),
    ).rejects.toThrow(EngineTerminatedError);
    expect(reporter.events.at(-1)).toMatch(/^fail:analysis:/);
  });

  it('should start a new engine game before each game', async () => {
    const oracle = createMockOracle();

    await orchestrateRun(
      { kind: 'pgn', text: RECENT_GAMES },
      DEFAULT_CONFIG,
      servicesWith(oracle),
      new RecordingReporter(),
    );

    expect(oracle.newGame).toHaveBeenCalledTimes(2);
  });

  it('should reject input without games', async () => {
    const services = servicesWith(createMockOracle());
    await expect(
      orchestrateRun({ kind: 'pgn', text: '  \n' }, DEFAULT_CONFIG, services, new RecordingReporter()),
    ).rejects.toThrow(InputError);
  });

  it('should report retrieval exhaustion', async () => {
    const reporter = new RecordingReporter();
    const routes: MockRoute[] = [
      USER_ROUTE,
      { match: (url) => url.pathname === '/api/games/user/alice', reply: textReply('') },
    ];

    await expect(
      orchestrateRun(
        { kind: 'lichess', username: 'alice' },
        DEFAULT_CONFIG,
        servicesWith(createMockOracle(), routes),
        reporter,
      ),
    ).rejects.toThrow(RetrievalExhaustedError);
    expect(reporter.attempts.map((attempt) => attempt.status)).toEqual(['empty', 'empty']);
    expect(reporter.events).toEqual([
      'start:retrieval',
      'fail:retrieval:No games found for "alice" with the given filters',
    ]);
  });
});

describe('closeServices', () => {
  it('should close the oracle', async () => {
    const oracle = createMockOracle();
    await closeServices(servicesWith(oracle));
    expect(oracle.close).toHaveBeenCalledTimes(1);
  });
});

describe('runAnalysis', () => {
  const withEngine = (engine: Partial<SlipfinderConfig['engine']>): SlipfinderConfig => ({
    ...DEFAULT_CONFIG,
    engine: { ...DEFAULT_CONFIG.engine, ...engine },
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should surface an engine that cannot start', async () => {
    await expect(
      runAnalysis({ kind: 'pgn', text: WAYWARD_QUEEN }, DEFAULT_CONFIG, new RecordingReporter(), {
        transportFactory: () => {
          throw new Error('spawn stockfish ENOENT');
        },
      }),
    ).rejects.toThrow(EngineUnavailableError);
  });

  it('should quit the engine once after a normal run', async () => {
    const close = vi.spyOn(StockfishOracle.prototype, 'close');
    const { factory, transports } = scriptedFactory(stockfishScript());

    const result = await runAnalysis({ kind: 'pgn', text: RECENT_GAMES }, DEFAULT_CONFIG, new RecordingReporter(), {
      transportFactory: factory,
    });

    expect(result.stats.gamesAnalyzed).toBe(2);
    expect(transports).toHaveLength(1);
    expect(transports[0]!.count('quit')).toBe(1);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should quit the engine once when a game fails mid-analysis', async () => {
    const close = vi.spyOn(StockfishOracle.prototype, 'close');
    let searches = 0;
    const { factory, transports } = scriptedFactory(
      stockfishScript(() => (searches++ === 0 ? ['bestmove e2e4'] : SEARCH_REPLY)),
    );
    const reporter = new RecordingReporter();

    const result = await runAnalysis({ kind: 'pgn', text: RECENT_GAMES }, DEFAULT_CONFIG, reporter, {
      transportFactory: factory,
    });

    expect(reporter.skipped).toEqual(['Search reported no score']);
    expect(result.games.map((game) => game.gameId)).toEqual(['Tx8bNw2c']);
    expect(transports).toHaveLength(1);
    expect(transports[0]!.count('quit')).toBe(1);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should release the oracle once when retrieval is exhausted', async () => {
    const close = vi.spyOn(StockfishOracle.prototype, 'close');
    const { factory, transports } = scriptedFactory(stockfishScript());
    const fetch = createMockFetch([
      USER_ROUTE,
      { match: (url) => url.pathname === '/api/games/user/alice', reply: textReply('') },
    ]);

    await expect(
      runAnalysis({ kind: 'lichess', username: 'alice' }, DEFAULT_CONFIG, new RecordingReporter(), {
        fetch,
        transportFactory: factory,
      }),
    ).rejects.toThrow(RetrievalExhaustedError);

    expect(close).toHaveBeenCalledTimes(1);
    // Nothing to analyze, so the engine was never launched
    expect(transports).toHaveLength(0);
  });

  it('should skip a game whose search times out and analyze the next one on a new engine', async () => {
    let searches = 0;
    const { factory, transports } = scriptedFactory(
      stockfishScript(() => (searches++ === 0 ? undefined : SEARCH_REPLY)),
    );
    const reporter = new RecordingReporter();

    const result = await runAnalysis(
      { kind: 'pgn', text: RECENT_GAMES },
      withEngine({ searchTimeoutMs: 50 }),
      reporter,
      { transportFactory: factory },
    );

    expect(reporter.skipped).toEqual(["Engine operation 'search' timed out after 50ms"]);
    expect(result.games.map((game) => game.gameId)).toEqual(['Tx8bNw2c']);
    expect(result.stats.gamesSkipped).toBe(1);
    expect(transports).toHaveLength(2);
    expect(transports[0]!.killed).toBe(true);
    expect(transports[1]!.count('quit')).toBe(1);
  });

  it('should keep unparseable games without launching the engine', async () => {
    const transportFactory = vi.fn(() => {
      throw new Error('spawn stockfish ENOENT');
    });

    const result = await runAnalysis({ kind: 'pgn', text: ILLEGAL_MOVE }, DEFAULT_CONFIG, new RecordingReporter(), {
      transportFactory,
    });

    expect(result.games).toHaveLength(1);
    expect(result.games[0]!.parseFailed).toBe(true);
    expect(result.stats.parseFailures).toBe(1);
    expect(transportFactory).not.toHaveBeenCalled();
  });
});
