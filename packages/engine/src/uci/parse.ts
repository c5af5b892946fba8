/**
 * Parsing of UCI engine output
 */

import { EngineProtocolError } from '../errors.js';
import type { EngineScore, OracleEvaluation } from '../types.js';

export interface InfoLine {
  depth?: number;
  multipv: number;
  score?: EngineScore;
  /** Set when the score is only a bound from an aspiration window */
  bound?: 'lower' | 'upper';
  pv: string[];
}

export interface BestMoveLine {
  /** null for `bestmove (none)` */
  bestMove: string | null;
  ponder?: string;
}

const UCI_MOVE_PATTERN = /^(?:[a-h][1-8][a-h][1-8][qrbn]?|0000)$/i;

export function isUciMove(token: string): boolean {
  return UCI_MOVE_PATTERN.test(token);
}

/**
 * Parse a single `info ...` line. Returns undefined for lines that are not
 * search info (including `info string`).
 */
export function parseInfoLine(line: string): InfoLine | undefined {
  const tokens = line.trim().split(/\s+/);
  if (tokens[0] !== 'info' || tokens[1] === 'string') {
    return undefined;
  }

  const info: InfoLine = { multipv: 1, pv: [] };

  for (let i = 1; i < tokens.length; i++) {
    const token = tokens[i];

    switch (token) {
      case 'depth': {
        const value = Number(tokens[i + 1]);
        if (!Number.isNaN(value)) info.depth = value;
        i++;
        break;
      }
      case 'multipv': {
        const value = Number(tokens[i + 1]);
        if (!Number.isNaN(value)) info.multipv = value;
        i++;
        break;
      }
      case 'score': {
        const kind = tokens[i + 1];
        const value = Number(tokens[i + 2]);
        if ((kind === 'cp' || kind === 'mate') && !Number.isNaN(value)) {
          info.score = { type: kind, value };
        }
        i += 2;
        break;
      }
      case 'lowerbound':
        info.bound = 'lower';
        break;
      case 'upperbound':
        info.bound = 'upper';
        break;
      case 'pv':
        info.pv = tokens.slice(i + 1).filter(isUciMove);
        i = tokens.length;
        break;
      default:
        // seldepth, nodes, nps, hashfull, wdl, ... are not used
        break;
    }
  }

  return info;
}

/**
 * Parse a `bestmove <move> [ponder <move>]` line
 */
export function parseBestMoveLine(line: string): BestMoveLine | undefined {
  const tokens = line.trim().split(/\s+/);
  if (tokens[0] !== 'bestmove') {
    return undefined;
  }

  const move = tokens[1];
  const result: BestMoveLine = {
    bestMove: move && move !== '(none)' && move !== '0000' ? move.toLowerCase() : null,
  };
  const ponderIndex = tokens.indexOf('ponder');
  const ponder = ponderIndex >= 0 ? tokens[ponderIndex + 1] : undefined;
  if (ponder) result.ponder = ponder;
  return result;
}

/**
 * Collect the output of one `go` into an evaluation
 *
 * Uses the deepest exact score of the first PV line; bound-only scores are
 * used only when no exact one was reported.
 *
 * @throws EngineProtocolError when no score or no bestmove line is present
 */
export function collectSearchResult(lines: string[]): OracleEvaluation {
  let exact: InfoLine | undefined;
  let bounded: InfoLine | undefined;
  let best: BestMoveLine | undefined;

  for (const line of lines) {
    const info = parseInfoLine(line);
    if (info) {
      if (info.multipv !== 1 || !info.score) continue;
      if (info.bound) {
        if (!bounded || (info.depth ?? 0) >= (bounded.depth ?? 0)) bounded = info;
      } else if (!exact || (info.depth ?? 0) >= (exact.depth ?? 0)) {
        exact = info;
      }
      continue;
    }

    const bestMove = parseBestMoveLine(line);
    if (bestMove) {
      best = bestMove;
    }
  }

  const chosen = exact ?? bounded;
  if (!best) {
    throw new EngineProtocolError('Search ended without a bestmove line', lines.join('\n'));
  }
  if (!chosen?.score) {
    throw new EngineProtocolError('Search reported no score', lines.join('\n'));
  }

  return {
    score: chosen.score,
    bestMove: best.bestMove,
    depth: chosen.depth ?? 0,
    pv: chosen.pv,
  };
}
