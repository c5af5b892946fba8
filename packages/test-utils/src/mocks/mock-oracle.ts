/**
 * Scripted position oracle for testing
 */

import {
  EngineTerminatedError,
  type EvaluateOptions,
  type OracleEvaluation,
  type PositionOracle,
} from '@slipfinder/engine';
import { ChessPosition } from '@slipfinder/pgn';
import { vi } from 'vitest';

export type OracleScript = (fen: string, options: EvaluateOptions) => OracleEvaluation | undefined;

export interface MockOracleConfig {
  /** Decides the answer per query; return undefined to fall through */
  script?: OracleScript;
  /** Fixed answers keyed by oracleKey(fen, searchMove) */
  responses?: Map<string, OracleEvaluation>;
  /** Positions whose query throws an ordinary error */
  failureFens?: Set<string>;
  /** Throw EngineTerminatedError once this many queries have been answered */
  terminateAfter?: number;
}

/**
 * Lookup key for fixed responses: the FEN, plus the restricted move if any
 */
export function oracleKey(fen: string, searchMove?: string): string {
  return searchMove ? `${fen}|${searchMove}` : fen;
}

export function cpEval(value: number, bestMove: string | null, depth = 12): OracleEvaluation {
  return { score: { type: 'cp', value }, bestMove, depth, pv: bestMove ? [bestMove] : [] };
}

export function mateEval(moves: number, bestMove: string | null, depth = 12): OracleEvaluation {
  return { score: { type: 'mate', value: moves }, bestMove, depth, pv: bestMove ? [bestMove] : [] };
}

/**
 * Answer for unscripted queries: an even score, with the restricted move or
 * the first legal move as best. Never produces a centipawn loss.
 */
function neutralEvaluation(fen: string, options: EvaluateOptions): OracleEvaluation {
  const restricted = options.searchMoves?.[0];
  const bestMove = restricted ?? ChessPosition.fromFen(fen).getLegalMovesUci()[0] ?? null;
  return cpEval(0, bestMove, options.depth);
}

/**
 * Create a mock oracle implementing PositionOracle
 */
export function createMockOracle(config: MockOracleConfig = {}) {
  const { script, responses = new Map(), failureFens = new Set(), terminateAfter } = config;
  let answered = 0;

  const evaluate = vi.fn(async (fen: string, options: EvaluateOptions): Promise<OracleEvaluation> => {
    if (terminateAfter !== undefined && answered >= terminateAfter) {
      throw new EngineTerminatedError(null, 'SIGKILL');
    }
    if (failureFens.has(fen)) {
      throw new Error(`Engine evaluation failed for position: ${fen}`);
    }
    answered++;

    const scripted = script?.(fen, options);
    if (scripted) {
      return scripted;
    }
    const fixed = responses.get(oracleKey(fen, options.searchMoves?.[0]));
    if (fixed) {
      return fixed;
    }
    return neutralEvaluation(fen, options);
  });

  const newGame = vi.fn(async (): Promise<void> => undefined);
  const close = vi.fn(async (): Promise<void> => undefined);

  const oracle = { evaluate, newGame, close } satisfies PositionOracle;
  return oracle;
}

export type MockOracle = ReturnType<typeof createMockOracle>;
