/**
 * Game Walker
 *
 * Replays one game and asks the oracle, at every analyzed ply, for the best
 * achievable score and for the score of the move actually played. Both
 * queries are made on the position before the move, so their difference is
 * the centipawn cost of the move.
 */

import { EngineProtocolError, type PositionOracle } from '@slipfinder/engine';
import {
  ChessPosition,
  extractTags,
  isPgnError,
  parsePgn,
  type MoveInfo,
  type ParsedGame,
} from '@slipfinder/pgn';

import { scoreToCp } from '../classifier/score.js';
import { classifySeverity } from '../classifier/severity.js';
import { validateThresholds, type SeverityThresholds } from '../classifier/thresholds.js';
import type { AnalyzedGame, ErrorRecord, GameHeaderMeta, Side, SideFilter } from '../types/analysis.js';

import { playerSide, readHeaderMeta } from './headers.js';

export interface GameWalkerConfig {
  /** Fixed search depth for every query of the run */
  depth: number;
  thresholds: SeverityThresholds;
  /** Records below this loss are dropped even when classified */
  minCpLoss: number;
  side: SideFilter;
  /** Username used to resolve the `player` side filter */
  player?: string;
  /** Base of the per-ply deep link, e.g. https://lichess.org */
  gameUrlBase: string;
}

export interface WalkOptions {
  /** Called after each ply, analyzed or skipped */
  onPly?: (ply: number, total: number) => void;
}

export class GameWalker {
  private readonly gameUrlBase: string;

  /**
   * @throws ThresholdOrderError when the thresholds are out of order
   */
  constructor(
    private readonly oracle: PositionOracle,
    private readonly config: GameWalkerConfig,
  ) {
    validateThresholds(config.thresholds);
    if (!Number.isInteger(config.depth) || config.depth < 1) {
      throw new RangeError(`Search depth must be a positive integer (got ${config.depth})`);
    }
    this.gameUrlBase = config.gameUrlBase.replace(/\/+$/, '');
  }

  /**
   * Analyze the first game in `pgnText`
   *
   * A game that cannot be parsed or replayed yields its headers with
   * `parseFailed` set and no records; the oracle is not touched. Otherwise
   * the oracle's newGame runs once, before the first query.
   *
   * @throws oracle errors unchanged
   */
  async walk(pgnText: string, options: WalkOptions = {}): Promise<AnalyzedGame> {
    let game: ParsedGame | undefined;
    try {
      game = parsePgn(pgnText)[0];
    } catch (err) {
      if (isPgnError(err)) {
        return this.placeholder(pgnText);
      }
      throw err;
    }
    if (!game) {
      return this.placeholder(pgnText);
    }

    const meta = readHeaderMeta(game.tags);
    const analyzedSides = this.resolveSides(meta);
    const total = game.moves.length;
    const errors: ErrorRecord[] = [];
    let queried = false;

    for (const move of game.moves) {
      const side: Side = move.isWhiteMove ? 'white' : 'black';
      if (analyzedSides.has(side)) {
        if (!queried) {
          await this.oracle.newGame?.();
          queried = true;
        }
        const record = await this.analyzeMove(move, side, meta);
        if (record) errors.push(record);
      }
      options.onPly?.(move.ply, total);
    }

    return { ...meta, errors, parseFailed: false };
  }

  private async analyzeMove(move: MoveInfo, side: Side, meta: GameHeaderMeta): Promise<ErrorRecord | undefined> {
    const { depth, thresholds, minCpLoss } = this.config;

    const best = await this.oracle.evaluate(move.fenBefore, { depth });
    const played = await this.oracle.evaluate(move.fenBefore, { depth, searchMoves: [move.uci] });

    const bestScore = scoreToCp(best.score);
    const playedScore = scoreToCp(played.score);
    // A restricted search can score above the free one at the same depth
    const cpLoss = Math.max(0, bestScore - playedScore);

    const severity = classifySeverity(cpLoss, thresholds);
    if (severity === null || cpLoss < minCpLoss) {
      return undefined;
    }

    if (best.bestMove === null) {
      throw new EngineProtocolError(`Engine returned no best move for ${move.fenBefore}`);
    }
    const bestSan = ChessPosition.fromFen(move.fenBefore).uciToSan(best.bestMove);

    return {
      ply: move.ply,
      moveNo: Math.floor((move.ply + 1) / 2),
      side,
      san: move.san,
      cpLoss,
      severity,
      fenBefore: move.fenBefore,
      bestUci: best.bestMove,
      bestSan,
      playedUci: move.uci,
      link: `${this.gameUrlBase}/${meta.gameId}#${move.ply}`,
    };
  }

  private resolveSides(meta: GameHeaderMeta): Set<Side> {
    const { side, player } = this.config;
    if (side === 'white' || side === 'black') {
      return new Set([side]);
    }
    if (side === 'player' && player) {
      const own = playerSide(meta, player);
      if (own) return new Set([own]);
    }
    return new Set<Side>(['white', 'black']);
  }

  private placeholder(pgnText: string): AnalyzedGame {
    return { ...readHeaderMeta(extractTags(pgnText)), errors: [], parseFailed: true };
  }
}
