import { extractMetadata } from '@slipfinder/pgn';

import type { GameHeaderMeta, Side } from '../types/analysis.js';

/**
 * Last path segment of a game URL, e.g. "q7ZvsdUF" for
 * https://lichess.org/q7ZvsdUF
 */
export function gameIdFromUrl(url: string): string {
  const path = url.split(/[?#]/)[0] ?? '';
  const segments = path.split('/').filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? '';
}

/**
 * Header fields of a game, read from its tag pairs
 */
export function readHeaderMeta(tags: Record<string, string>): GameHeaderMeta {
  const metadata = extractMetadata(tags);
  const url = tags['LichessURL'] ?? tags['Site'] ?? '';

  return {
    gameId: gameIdFromUrl(url),
    white: metadata.white,
    black: metadata.black,
    whiteElo: metadata.whiteElo ?? null,
    blackElo: metadata.blackElo ?? null,
    date: metadata.date ?? '',
    timeControl: metadata.timeControl ?? '',
    opening: metadata.opening ?? '',
  };
}

/**
 * The side a player had in a game, by case-insensitive name match
 */
export function playerSide(meta: GameHeaderMeta, player: string): Side | undefined {
  const name = player.toLowerCase();
  if (meta.white.toLowerCase() === name) return 'white';
  if (meta.black.toLowerCase() === name) return 'black';
  return undefined;
}
