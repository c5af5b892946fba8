/**
 * Conversion of engine scores to a single comparable centipawn value
 */

import type { EngineScore } from '@slipfinder/engine';

/** Value standing in for a forced mate */
export const MATE_SCORE = 100_000;

/** Finite evaluations are clamped below the mate value */
export const MAX_CP_SCORE = MATE_SCORE - 1;

/**
 * Convert an engine score to centipawns for the side to move
 *
 * Engine scores arrive already relative to the side to move in the searched
 * position. Any mate maps to ±MATE_SCORE whatever its distance: positive when
 * the side to move mates, negative for `mate 0` (already mated) or when the
 * opponent mates.
 */
export function scoreToCp(score: EngineScore): number {
  if (score.type === 'mate') {
    return score.value > 0 ? MATE_SCORE : -MATE_SCORE;
  }
  return Math.max(-MAX_CP_SCORE, Math.min(MAX_CP_SCORE, Math.round(score.value)));
}
