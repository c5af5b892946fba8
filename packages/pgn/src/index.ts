/**
 * @slipfinder/pgn - PGN handling for Slipfinder
 *
 * This package handles:
 * - Splitting multi-game exports into single games
 * - Header tag reading, with or without a valid move list
 * - Move text parsing and replay (SAN and UCI)
 */

export const VERSION = '0.1.0';

/**
 * Game metadata from PGN headers
 */
export interface GameMetadata {
  event?: string;
  site?: string;
  /** UTCDate when present, otherwise Date */
  date?: string;
  white: string;
  black: string;
  result: string;
  whiteElo?: number;
  blackElo?: number;
  timeControl?: string;
  opening?: string;
  eco?: string;
}

/**
 * A single main-line move with the positions around it
 */
export interface MoveInfo {
  /** 1-based index of the half-move within the game */
  ply: number;
  moveNumber: number;
  san: string;
  uci: string;
  isWhiteMove: boolean;
  fenBefore: string;
  fenAfter: string;
}

/**
 * A fully parsed game
 */
export interface ParsedGame {
  metadata: GameMetadata;
  /** All header tags, flattened to their text form */
  tags: Record<string, string>;
  /** FEN tag when present, otherwise the standard start position */
  startFen: string;
  moves: MoveInfo[];
}

export { parsePgnString as parsePgn, extractMetadata, parseElo } from './parser/pgn-parser.js';
export { splitPgnGames, extractTags } from './parser/splitter.js';

export { ChessPosition, STARTING_FEN, isSquare } from './chess/index.js';
export type {
  MoveResult,
  MoveResultWithUci,
  SquareMove,
  PieceColor,
  PieceInfo,
} from './chess/index.js';

export { PgnParseError, InvalidFenError, IllegalMoveError, isPgnError } from './errors.js';
