import { parse } from '@mliebelt/pgn-parser';

import { ChessPosition, STARTING_FEN } from '../chess/position.js';
import { PgnParseError } from '../errors.js';
import type { GameMetadata, MoveInfo, ParsedGame } from '../index.js';

/**
 * Date object from pgn-parser
 */
interface RawDate {
  value: string;
  year?: number;
  month?: number;
  day?: number;
}

/**
 * TimeControl object from pgn-parser
 */
interface RawTimeControl {
  value: string;
  kind?: string;
  seconds?: number;
  increment?: number;
}

/**
 * Raw tags from pgn-parser (object format)
 */
interface RawTags {
  Date?: string | RawDate;
  UTCDate?: string | RawDate;
  WhiteElo?: string | number;
  BlackElo?: string | number;
  TimeControl?: string | RawTimeControl[];
  FEN?: string;
  [key: string]: unknown;
}

/**
 * Raw move from pgn-parser
 */
interface RawMove {
  notation?: {
    notation: string;
  };
  moveNumber?: number;
  turn?: 'w' | 'b';
}

/**
 * Raw game from pgn-parser
 */
interface RawGame {
  tags?: RawTags;
  moves?: RawMove[];
}

/**
 * Parse a PGN string into an array of ParsedGame objects
 *
 * Every main-line move is replayed on a fresh position, so an illegal move
 * surfaces here rather than later during analysis.
 *
 * @param pgnString - The PGN content to parse (can contain multiple games)
 * @throws PgnParseError if the PGN is malformed
 * @throws IllegalMoveError if a move cannot be played
 * @throws InvalidFenError if a FEN tag is not a valid position
 */
export function parsePgnString(pgnString: string): ParsedGame[] {
  if (!pgnString.trim()) {
    return [];
  }

  let parsed: RawGame[];
  try {
    parsed = parse(pgnString, { startRule: 'games' }) as RawGame[];
  } catch (err) {
    const location = readLocation(err);
    throw new PgnParseError(`Failed to parse PGN: ${String(err)}`, location?.line, location?.column);
  }

  return parsed.map((game) => transformGame(game));
}

function transformGame(rawGame: RawGame): ParsedGame {
  const rawTags = rawGame.tags ?? {};
  const tags = normalizeTags(rawTags);
  const metadata = extractMetadata(tags);

  const startFen = tags['FEN'] ?? STARTING_FEN;
  const position = ChessPosition.fromFen(startFen);
  const moves = processMoves(rawGame.moves ?? [], position);

  return { metadata, tags, startFen, moves };
}

/**
 * Flatten pgn-parser's typed tag values back to the strings found in the file
 */
function normalizeTags(rawTags: RawTags): Record<string, string> {
  const tags: Record<string, string> = {};
  for (const [name, value] of Object.entries(rawTags)) {
    const text = tagValueToString(value);
    if (text !== undefined) {
      tags[name] = text;
    }
  }
  return tags;
}

function tagValueToString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (Array.isArray(value)) {
    return value.length > 0 ? tagValueToString(value[0]) : undefined;
  }
  if (value !== null && typeof value === 'object' && 'value' in value) {
    return tagValueToString(value.value);
  }
  return undefined;
}

/**
 * Extract game metadata from string tags
 */
export function extractMetadata(tags: Record<string, string>): GameMetadata {
  const metadata: GameMetadata = {
    white: tags['White'] ?? 'Unknown',
    black: tags['Black'] ?? 'Unknown',
    result: tags['Result'] ?? '*',
  };

  const event = tags['Event'];
  if (event !== undefined) metadata.event = event;
  const site = tags['Site'];
  if (site !== undefined) metadata.site = site;
  const date = tags['UTCDate'] ?? tags['Date'];
  if (date !== undefined) metadata.date = date;
  const timeControl = tags['TimeControl'];
  if (timeControl !== undefined) metadata.timeControl = timeControl;
  const opening = tags['Opening'];
  if (opening !== undefined) metadata.opening = opening;
  const eco = tags['ECO'];
  if (eco !== undefined) metadata.eco = eco;

  const whiteElo = parseElo(tags['WhiteElo']);
  if (whiteElo !== undefined) metadata.whiteElo = whiteElo;
  const blackElo = parseElo(tags['BlackElo']);
  if (blackElo !== undefined) metadata.blackElo = blackElo;

  return metadata;
}

/**
 * Parse an Elo string to a number, returning undefined if invalid.
 * pgn-parser reports "?" and "-" as 0.
 */
export function parseElo(elo: string | undefined): number | undefined {
  if (!elo || elo === '?' || elo === '-') {
    return undefined;
  }
  const parsed = parseInt(elo, 10);
  return isNaN(parsed) || parsed <= 0 ? undefined : parsed;
}

function processMoves(rawMoves: RawMove[], position: ChessPosition): MoveInfo[] {
  const moves: MoveInfo[] = [];

  for (const rawMove of rawMoves) {
    // Comment-only entries carry no notation
    if (!rawMove.notation?.notation) {
      continue;
    }

    const isWhiteMove = position.turn() === 'w';
    const moveNumber = position.moveNumber();
    const result = position.move(rawMove.notation.notation);

    moves.push({
      ply: moves.length + 1,
      moveNumber,
      san: result.san,
      uci: result.uci,
      isWhiteMove,
      fenBefore: result.fenBefore,
      fenAfter: result.fenAfter,
    });
  }

  return moves;
}

function readLocation(err: unknown): { line: number; column: number } | undefined {
  if (err === null || typeof err !== 'object' || !('location' in err)) return undefined;
  const location = err.location;
  if (location === null || typeof location !== 'object' || !('start' in location)) return undefined;
  const start = location.start;
  if (start === null || typeof start !== 'object') return undefined;
  if (!('line' in start) || !('column' in start)) return undefined;
  const { line, column } = start;
  return typeof line === 'number' && typeof column === 'number' ? { line, column } : undefined;
}
