/**
 * Error thrown when PGN text cannot be read as a game
 */
export class PgnParseError extends Error {
  constructor(
    message: string,
    public line?: number,
    public column?: number,
  ) {
    super(message);
    this.name = 'PgnParseError';
  }
}

/**
 * Error thrown when a FEN string is invalid
 */
export class InvalidFenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFenError';
  }
}

/**
 * Error thrown when a move cannot be played in the current position
 */
export class IllegalMoveError extends Error {
  constructor(
    public readonly move: string,
    public readonly fen: string,
  ) {
    super(`Illegal move "${move}" in position: ${fen}`);
    this.name = 'IllegalMoveError';
  }
}

/**
 * True for any error raised while turning PGN text into a replayed game
 */
export function isPgnError(error: unknown): error is PgnParseError | InvalidFenError | IllegalMoveError {
  return (
    error instanceof PgnParseError ||
    error instanceof InvalidFenError ||
    error instanceof IllegalMoveError
  );
}
