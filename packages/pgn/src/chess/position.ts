import { Chess, type Square } from 'chess.js';

import { InvalidFenError, IllegalMoveError } from '../errors.js';

/**
 * Result of applying a move to a position
 */
export interface MoveResult {
  /** The move in Standard Algebraic Notation */
  san: string;
  /** FEN before the move was made */
  fenBefore: string;
  /** FEN after the move was made */
  fenAfter: string;
}

/**
 * Move result that also carries the coordinate (UCI) form of the move
 */
export interface MoveResultWithUci extends MoveResult {
  /** Move in UCI format, lowercase (e.g. "e2e4", "e7e8q") */
  uci: string;
}

/**
 * A move given by squares, as a board UI would report it
 */
export interface SquareMove {
  from: string;
  to: string;
  promotion?: string;
}

export type PieceColor = 'w' | 'b';

export interface PieceInfo {
  type: string;
  color: PieceColor;
}

/**
 * Standard starting position FEN
 */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

const SQUARE_PATTERN = /^[a-h][1-8]$/;

export function isSquare(value: string): value is Square {
  return SQUARE_PATTERN.test(value);
}

/**
 * A chess position wrapper around chess.js
 *
 * All move application in the project goes through here so that legality
 * and notation conversion follow a single set of rules.
 */
export class ChessPosition {
  private chess: Chess;

  constructor(fen?: string) {
    if (fen) {
      try {
        this.chess = new Chess(fen);
      } catch {
        throw new InvalidFenError(`Invalid FEN: ${fen}`);
      }
    } else {
      this.chess = new Chess();
    }
  }

  static startingPosition(): ChessPosition {
    return new ChessPosition();
  }

  /**
   * Create a position from a FEN string
   * @throws InvalidFenError if the FEN is invalid
   */
  static fromFen(fen: string): ChessPosition {
    return new ChessPosition(fen);
  }

  fen(): string {
    return this.chess.fen();
  }

  /**
   * Apply a move in SAN notation
   * @throws IllegalMoveError if the move is not legal
   */
  move(san: string): MoveResultWithUci {
    const fenBefore = this.chess.fen();
    try {
      const result = this.chess.move(san);
      return {
        san: result.san,
        uci: toUci(result.from, result.to, result.promotion),
        fenBefore,
        fenAfter: this.chess.fen(),
      };
    } catch {
      throw new IllegalMoveError(san, fenBefore);
    }
  }

  /**
   * Try a move given by squares. Returns null instead of throwing when the
   * move is not legal, leaving the position untouched.
   */
  tryMove(move: SquareMove): MoveResultWithUci | null {
    const from = move.from.toLowerCase();
    const to = move.to.toLowerCase();
    if (!isSquare(from) || !isSquare(to)) {
      return null;
    }

    const fenBefore = this.chess.fen();
    const moveObj: { from: string; to: string; promotion?: string } = { from, to };
    if (move.promotion) {
      moveObj.promotion = move.promotion.toLowerCase();
    }

    try {
      const result = this.chess.move(moveObj);
      return {
        san: result.san,
        uci: toUci(result.from, result.to, result.promotion),
        fenBefore,
        fenAfter: this.chess.fen(),
      };
    } catch {
      return null;
    }
  }

  /**
   * All legal moves in UCI format
   */
  getLegalMovesUci(): string[] {
    return this.chess
      .moves({ verbose: true })
      .map((move) => toUci(move.from, move.to, move.promotion));
  }

  turn(): PieceColor {
    return this.chess.turn();
  }

  moveNumber(): number {
    return this.chess.moveNumber();
  }

  isCheckmate(): boolean {
    return this.chess.isCheckmate();
  }

  /**
   * Convert a UCI move to SAN notation without changing the position
   * @param uci - Move in UCI format (e.g., "e2e4", "e7e8q")
   * @throws IllegalMoveError if the move is not legal
   */
  uciToSan(uci: string): string {
    const normalized = uci.toLowerCase();
    const from = normalized.slice(0, 2);
    const to = normalized.slice(2, 4);
    const promotionChar = normalized[4];

    const moveObj: SquareMove = { from, to };
    if (promotionChar) {
      moveObj.promotion = promotionChar;
    }

    const result = this.tryMove(moveObj);
    if (!result) {
      throw new IllegalMoveError(uci, this.chess.fen());
    }
    this.chess.undo();
    return result.san;
  }

  getPiece(square: string): PieceInfo | undefined {
    const normalized = square.toLowerCase();
    if (!isSquare(normalized)) return undefined;
    const piece = this.chess.get(normalized);
    if (!piece) return undefined;
    return { type: piece.type, color: piece.color };
  }

  /**
   * True when moving from `from` to `to` would push a pawn to its last rank
   */
  isPromotionMove(from: string, to: string): boolean {
    const piece = this.getPiece(from);
    if (!piece || piece.type !== 'p') return false;
    const rank = to.toLowerCase()[1];
    return (piece.color === 'w' && rank === '8') || (piece.color === 'b' && rank === '1');
  }
}

function toUci(from: string, to: string, promotion?: string): string {
  return `${from}${to}${promotion ?? ''}`.toLowerCase();
}
