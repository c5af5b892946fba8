/**
 * Comparison of a proposed move against a recorded best move
 */

import { ChessPosition, type MoveResultWithUci, type SquareMove } from '@slipfinder/pgn';

export type MoveVerdict = 'solved' | 'incorrect' | 'wrong-side' | 'illegal';

export interface MoveCheck {
  verdict: MoveVerdict;
  /** The move as played, for solved and incorrect verdicts */
  played?: MoveResultWithUci;
}

/**
 * Fill in a queen promotion when a pawn reaches its last rank without one
 */
export function withDefaultPromotion(position: ChessPosition, move: SquareMove): SquareMove {
  if (move.promotion || !position.isPromotionMove(move.from, move.to)) {
    return move;
  }
  return { ...move, promotion: 'q' };
}

/**
 * Play `move` on `position` and compare it with `bestUci`
 *
 * The position is left after the move for solved and incorrect verdicts and
 * untouched otherwise.
 */
export function checkMove(position: ChessPosition, bestUci: string, move: SquareMove): MoveCheck {
  const piece = position.getPiece(move.from);
  if (!piece) {
    return { verdict: 'illegal' };
  }
  if (piece.color !== position.turn()) {
    return { verdict: 'wrong-side' };
  }

  const played = position.tryMove(withDefaultPromotion(position, move));
  if (!played) {
    return { verdict: 'illegal' };
  }
  return {
    verdict: played.uci === bestUci.toLowerCase() ? 'solved' : 'incorrect',
    played,
  };
}

/**
 * One-shot form of the trainer comparison
 * @throws InvalidFenError if `fenBefore` is not a valid position
 */
export function verifyMove(fenBefore: string, bestUci: string, move: SquareMove): MoveVerdict {
  return checkMove(ChessPosition.fromFen(fenBefore), bestUci, move).verdict;
}
