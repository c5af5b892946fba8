export { ChessPosition, STARTING_FEN, isSquare } from './position.js';
export type {
  MoveResult,
  MoveResultWithUci,
  SquareMove,
  PieceColor,
  PieceInfo,
} from './position.js';
