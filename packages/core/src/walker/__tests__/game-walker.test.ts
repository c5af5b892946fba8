import { EngineProtocolError, EngineTerminatedError, type OracleEvaluation } from '@slipfinder/engine';
import { ChessPosition, parsePgn, type MoveInfo } from '@slipfinder/pgn';
import { cpEval, createMockOracle, loadPgnSync, mateEval, oracleKey } from '@slipfinder/test-utils';
import { describe, it, expect } from 'vitest';

import { MATE_SCORE } from '../../classifier/score.js';
import { DEFAULT_THRESHOLDS, ThresholdOrderError } from '../../classifier/thresholds.js';
import { GameWalker, type GameWalkerConfig } from '../game-walker.js';

const WAYWARD_QUEEN = loadPgnSync('wayward-queen.pgn');
const MOVES: MoveInfo[] = parsePgn(WAYWARD_QUEEN)[0]!.moves;

function fenBeforePly(ply: number): string {
  return MOVES[ply - 1]!.fenBefore;
}

const CONFIG: GameWalkerConfig = {
  depth: 12,
  thresholds: { ...DEFAULT_THRESHOLDS },
  minCpLoss: 0,
  side: 'both',
  gameUrlBase: 'https://lichess.org',
};

/** Ply 3 (2. Qh5): best Nf3 at +120, the queen sortie at -40 */
function mistakeAtPly3(): Map<string, OracleEvaluation> {
  return new Map([
    [oracleKey(fenBeforePly(3)), cpEval(120, 'g1f3')],
    [oracleKey(fenBeforePly(3), 'd1h5'), cpEval(-40, 'd1h5')],
  ]);
}

describe('GameWalker', () => {
  describe('constructor', () => {
    it('should reject thresholds out of order', () => {
      const oracle = createMockOracle();
      expect(
        () => new GameWalker(oracle, { ...CONFIG, thresholds: { inaccuracy: 50, mistake: 400, blunder: 300 } }),
      ).toThrow(ThresholdOrderError);
    });

    it('should reject a depth below one', () => {
      const oracle = createMockOracle();
      expect(() => new GameWalker(oracle, { ...CONFIG, depth: 0 })).toThrow(RangeError);
    });
  });

  describe('walk', () => {
    it('should flag a 160 centipawn loss as a mistake', async () => {
      const oracle = createMockOracle({ responses: mistakeAtPly3() });
      const walker = new GameWalker(oracle, CONFIG);

      const game = await walker.walk(WAYWARD_QUEEN);

      expect(game.parseFailed).toBe(false);
      expect(game.errors).toEqual([
        {
          ply: 3,
          moveNo: 2,
          side: 'white',
          san: 'Qh5',
          cpLoss: 160,
          severity: 'mistake',
          fenBefore: fenBeforePly(3),
          bestUci: 'g1f3',
          bestSan: 'Nf3',
          playedUci: 'd1h5',
          link: 'https://lichess.org/q7ZvsdUF#3',
        },
      ]);
    });

    it('should carry the game headers', async () => {
      const walker = new GameWalker(createMockOracle(), CONFIG);

      const game = await walker.walk(WAYWARD_QUEEN);

      expect(game.gameId).toBe('q7ZvsdUF');
      expect(game.white).toBe('Alice');
      expect(game.black).toBe('Bob');
      expect(game.whiteElo).toBe(1500);
      expect(game.blackElo).toBe(1480);
      expect(game.date).toBe('2024.03.02');
      expect(game.timeControl).toBe('180+2');
      expect(game.opening).toBe("King's Pawn Game: Wayward Queen Attack");
    });

    it('should query the best and the played move on the same position', async () => {
      const oracle = createMockOracle();
      const walker = new GameWalker(oracle, CONFIG);

      await walker.walk(WAYWARD_QUEEN);

      expect(oracle.evaluate).toHaveBeenCalledTimes(MOVES.length * 2);
      expect(oracle.evaluate.mock.calls[4]).toEqual([fenBeforePly(3), { depth: 12 }]);
      expect(oracle.evaluate.mock.calls[5]).toEqual([fenBeforePly(3), { depth: 12, searchMoves: ['d1h5'] }]);
    });

    it('should normalize a mate against the mover to the sentinel', async () => {
      // 3... Nf6 allows 4. Qxf7#
      const responses = new Map([
        [oracleKey(fenBeforePly(6)), cpEval(-30, 'g7g6')],
        [oracleKey(fenBeforePly(6), 'g8f6'), mateEval(-1, 'h5f7')],
      ]);
      const walker = new GameWalker(createMockOracle({ responses }), CONFIG);

      const game = await walker.walk(WAYWARD_QUEEN);

      expect(game.errors).toHaveLength(1);
      const record = game.errors[0]!;
      expect(record.ply).toBe(6);
      expect(record.moveNo).toBe(3);
      expect(record.side).toBe('black');
      expect(record.cpLoss).toBe(MATE_SCORE - 30);
      expect(record.severity).toBe('blunder');
      expect(record.bestSan).toBe('g6');
    });

    it('should never report a negative loss', async () => {
      const responses = new Map([
        [oracleKey(fenBeforePly(1)), cpEval(10, 'd2d4')],
        [oracleKey(fenBeforePly(1), 'e2e4'), cpEval(40, 'e2e4')],
      ]);
      const walker = new GameWalker(createMockOracle({ responses }), {
        ...CONFIG,
        thresholds: { inaccuracy: 0, mistake: 0, blunder: 0 },
      });

      const game = await walker.walk(WAYWARD_QUEEN);

      expect(game.errors).toHaveLength(MOVES.length);
      expect(game.errors[0]!.cpLoss).toBe(0);
      for (const record of game.errors) {
        expect(record.cpLoss).toBeGreaterThanOrEqual(0);
      }
    });

    it('should record best moves that are legal from the position before the move', async () => {
      const walker = new GameWalker(createMockOracle({ responses: mistakeAtPly3() }), {
        ...CONFIG,
        thresholds: { inaccuracy: 0, mistake: 0, blunder: 0 },
      });

      const game = await walker.walk(WAYWARD_QUEEN);

      for (const record of game.errors) {
        const position = ChessPosition.fromFen(record.fenBefore);
        const side = record.side === 'white' ? 'w' : 'b';
        expect(position.turn()).toBe(side);
        expect(position.getLegalMovesUci()).toContain(record.bestUci);
      }
    });

    it('should drop records below the minimum loss', async () => {
      const walker = new GameWalker(createMockOracle({ responses: mistakeAtPly3() }), { ...CONFIG, minCpLoss: 200 });

      const game = await walker.walk(WAYWARD_QUEEN);

      expect(game.errors).toEqual([]);
    });

    it('should produce identical records on a second run', async () => {
      const walker = new GameWalker(createMockOracle({ responses: mistakeAtPly3() }), CONFIG);

      const first = await walker.walk(WAYWARD_QUEEN);
      const second = await walker.walk(WAYWARD_QUEEN);

      expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    });

    it('should report progress after every ply', async () => {
      const walker = new GameWalker(createMockOracle(), { ...CONFIG, side: 'black' });
      const seen: Array<[number, number]> = [];

      await walker.walk(WAYWARD_QUEEN, { onPly: (ply, total) => seen.push([ply, total]) });

      expect(seen).toEqual([
        [1, 7],
        [2, 7],
        [3, 7],
        [4, 7],
        [5, 7],
        [6, 7],
        [7, 7],
      ]);
    });

    it('should throw when a flagged position has no best move', async () => {
      const responses = new Map([
        [oracleKey(fenBeforePly(3)), cpEval(120, null)],
        [oracleKey(fenBeforePly(3), 'd1h5'), cpEval(-40, 'd1h5')],
      ]);
      const walker = new GameWalker(createMockOracle({ responses }), CONFIG);

      await expect(walker.walk(WAYWARD_QUEEN)).rejects.toThrow(EngineProtocolError);
    });

    it('should start a new engine game once, before the first query', async () => {
      const oracle = createMockOracle();
      const walker = new GameWalker(oracle, CONFIG);

      await walker.walk(WAYWARD_QUEEN);

      expect(oracle.newGame).toHaveBeenCalledTimes(1);
      expect(oracle.newGame.mock.invocationCallOrder[0]!).toBeLessThan(
        oracle.evaluate.mock.invocationCallOrder[0]!,
      );
    });

    it('should pass oracle failures through', async () => {
      const walker = new GameWalker(createMockOracle({ terminateAfter: 3 }), CONFIG);

      await expect(walker.walk(WAYWARD_QUEEN)).rejects.toThrow(EngineTerminatedError);
    });

    it('should not double the slash in links', async () => {
      const walker = new GameWalker(createMockOracle({ responses: mistakeAtPly3() }), {
        ...CONFIG,
        gameUrlBase: 'https://lichess.org/',
      });

      const game = await walker.walk(WAYWARD_QUEEN);

      expect(game.errors[0]!.link).toBe('https://lichess.org/q7ZvsdUF#3');
    });
  });

  describe('side filter', () => {
    it('should skip white moves without querying when only black is analyzed', async () => {
      const oracle = createMockOracle({ responses: mistakeAtPly3() });
      const walker = new GameWalker(oracle, { ...CONFIG, side: 'black' });

      const game = await walker.walk(WAYWARD_QUEEN);

      expect(game.errors).toEqual([]);
      expect(oracle.evaluate).toHaveBeenCalledTimes(6);
      for (const [fen] of oracle.evaluate.mock.calls) {
        expect(fen.split(' ')[1]).toBe('b');
      }
    });

    it('should analyze the side the player had, ignoring case', async () => {
      const oracle = createMockOracle({ responses: mistakeAtPly3() });
      const walker = new GameWalker(oracle, { ...CONFIG, side: 'player', player: 'ALICE' });

      const game = await walker.walk(WAYWARD_QUEEN);

      expect(game.errors).toHaveLength(1);
      expect(oracle.evaluate).toHaveBeenCalledTimes(8);
    });

    it('should analyze both sides when the player is in neither seat', async () => {
      const oracle = createMockOracle();
      const walker = new GameWalker(oracle, { ...CONFIG, side: 'player', player: 'zed' });

      await walker.walk(WAYWARD_QUEEN);

      expect(oracle.evaluate).toHaveBeenCalledTimes(14);
    });

    it('should take the side to move from the position in a set-up game', async () => {
      const pgn = `[Event "Casual game"]
[Site "https://lichess.org/SetUp001"]
[White "Alice"]
[Black "Bob"]
[Result "*"]
[SetUp "1"]
[FEN "rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1"]

1... e5 2. Nf3 *`;
      const oracle = createMockOracle();
      const walker = new GameWalker(oracle, { ...CONFIG, side: 'black' });

      await walker.walk(pgn);

      expect(oracle.evaluate).toHaveBeenCalledTimes(2);
      expect(oracle.evaluate.mock.calls[1]![1]).toEqual({ depth: 12, searchMoves: ['e7e5'] });
    });
  });

  describe('degenerate games', () => {
    it('should return headers only when a move is illegal', async () => {
      const oracle = createMockOracle();
      const walker = new GameWalker(oracle, CONFIG);

      const game = await walker.walk(loadPgnSync('illegal-move.pgn'));

      expect(game).toEqual({
        gameId: 'Bad00Mv1',
        white: 'Alice',
        black: 'Erin',
        whiteElo: 1490,
        blackElo: null,
        date: '2024.05.01',
        timeControl: '60+0',
        opening: '',
        errors: [],
        parseFailed: true,
      });
      expect(oracle.evaluate).not.toHaveBeenCalled();
      expect(oracle.newGame).not.toHaveBeenCalled();
    });

    it('should return no records for a game without moves', async () => {
      const oracle = createMockOracle();
      const walker = new GameWalker(oracle, CONFIG);

      const game = await walker.walk('[Event "Casual game"]\n[Site "https://lichess.org/NoMoves1"]\n[Result "*"]\n\n*');

      expect(game.parseFailed).toBe(false);
      expect(game.gameId).toBe('NoMoves1');
      expect(game.errors).toEqual([]);
      expect(oracle.evaluate).not.toHaveBeenCalled();
    });

    it('should return an empty placeholder for empty text', async () => {
      const walker = new GameWalker(createMockOracle(), CONFIG);

      const game = await walker.walk('');

      expect(game.parseFailed).toBe(true);
      expect(game.gameId).toBe('');
      expect(game.white).toBe('Unknown');
    });
  });
});
