/**
 * Analysis result types
 */

import type { Severity } from '../classifier/severity.js';

export type Side = 'white' | 'black';

/**
 * Which moves get analyzed. `player` resolves per game to the side the
 * configured user played.
 */
export type SideFilter = 'both' | Side | 'player';

export const SIDE_FILTERS: readonly SideFilter[] = ['both', 'white', 'black', 'player'];

export function isSideFilter(value: string): value is SideFilter {
  return SIDE_FILTERS.some((filter) => filter === value);
}

/**
 * Game header fields carried on every analyzed game
 */
export interface GameHeaderMeta {
  /** Last path segment of the game URL; empty when the game has none */
  gameId: string;
  white: string;
  black: string;
  whiteElo: number | null;
  blackElo: number | null;
  /** UTCDate, falling back to Date */
  date: string;
  timeControl: string;
  opening: string;
}

/**
 * A move whose evaluation fell materially short of the best move
 */
export interface ErrorRecord {
  /** 1-based half-move index within the game */
  ply: number;
  moveNo: number;
  side: Side;
  san: string;
  /** Centipawns lost against the best move, never negative */
  cpLoss: number;
  severity: Severity;
  /** Position before the move was played */
  fenBefore: string;
  bestUci: string;
  bestSan: string;
  playedUci: string;
  /** Game URL anchored at this ply */
  link: string;
}

export interface AnalyzedGame extends GameHeaderMeta {
  errors: ErrorRecord[];
  /** Set when the move text could not be replayed; errors is then empty */
  parseFailed: boolean;
}
