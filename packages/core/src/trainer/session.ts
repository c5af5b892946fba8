/**
 * Trainer session: one card, any number of attempts until the best move is found
 */

import { ChessPosition, type SquareMove } from '@slipfinder/pgn';

import { checkMove, type MoveVerdict } from './verify.js';

export type TrainerAttemptStatus = MoveVerdict | 'already-solved';

export interface TrainerAttemptResult {
  status: TrainerAttemptStatus;
  /** Position after the attempt has been handled */
  fen: string;
  /** The move in both notations, when it was legal */
  uci?: string;
  san?: string;
}

/**
 * What a session needs from a card
 */
export interface TrainerTarget {
  fenBefore: string;
  bestUci: string;
}

export class TrainerSession {
  private readonly fenBefore: string;
  private readonly bestUci: string;
  private position: ChessPosition;
  private isSolved = false;
  private attemptCount = 0;

  /**
   * @throws InvalidFenError if the card's position is not valid
   */
  constructor(target: TrainerTarget) {
    this.fenBefore = target.fenBefore;
    this.bestUci = target.bestUci.toLowerCase();
    this.position = ChessPosition.fromFen(target.fenBefore);
  }

  get fen(): string {
    return this.position.fen();
  }

  get solved(): boolean {
    return this.isSolved;
  }

  /** Attempts made so far, not counting those after success */
  get attempts(): number {
    return this.attemptCount;
  }

  /**
   * Try a move. A legal move other than the best one is taken back so the
   * card can be retried from the same position.
   */
  attempt(move: SquareMove): TrainerAttemptResult {
    if (this.isSolved) {
      return { status: 'already-solved', fen: this.fen };
    }
    this.attemptCount++;

    const check = checkMove(this.position, this.bestUci, move);
    if (check.verdict === 'solved') {
      this.isSolved = true;
    } else if (check.verdict === 'incorrect') {
      this.position = ChessPosition.fromFen(this.fenBefore);
    }

    const result: TrainerAttemptResult = { status: check.verdict, fen: this.fen };
    if (check.played) {
      result.uci = check.played.uci;
      result.san = check.played.san;
    }
    return result;
  }

  reset(): void {
    this.position = ChessPosition.fromFen(this.fenBefore);
    this.isSolved = false;
    this.attemptCount = 0;
  }
}
