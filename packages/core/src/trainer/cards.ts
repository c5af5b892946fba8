import type { PieceColor } from '@slipfinder/pgn';

import type { AnalyzedGame, ErrorRecord, GameHeaderMeta, Side } from '../types/analysis.js';

/**
 * A flagged move with its game's headers, ready for a viewer
 */
export interface TrainerCard extends GameHeaderMeta, ErrorRecord {
  /** Position of the card in the deck, from 1 */
  index: number;
  turn: PieceColor;
  /** Board orientation: the side that made the mistake at the bottom */
  orientation: Side;
}

function headerOf(game: AnalyzedGame): GameHeaderMeta {
  return {
    gameId: game.gameId,
    white: game.white,
    black: game.black,
    whiteElo: game.whiteElo,
    blackElo: game.blackElo,
    date: game.date,
    timeControl: game.timeControl,
    opening: game.opening,
  };
}

/**
 * Flatten analyzed games into cards, in game order then record order
 */
export function buildTrainerCards(games: AnalyzedGame[]): TrainerCard[] {
  const cards: TrainerCard[] = [];
  for (const game of games) {
    const header = headerOf(game);
    for (const record of game.errors) {
      cards.push({
        index: cards.length + 1,
        ...header,
        ...record,
        turn: record.side === 'white' ? 'w' : 'b',
        orientation: record.side,
      });
    }
  }
  return cards;
}
