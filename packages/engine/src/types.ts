/**
 * Engine score for the side to move, as reported by UCI
 *
 * `mate` values count moves: positive means the side to move mates,
 * negative means it gets mated.
 */
export type EngineScore = { type: 'cp'; value: number } | { type: 'mate'; value: number };

export interface EvaluateOptions {
  /** Search depth in plies */
  depth: number;
  /** Restrict the search to these UCI moves */
  searchMoves?: string[];
}

export interface OracleEvaluation {
  /** Score from the perspective of the side to move in the queried position */
  score: EngineScore;
  /** Best move in UCI format, null when the position has no legal move */
  bestMove: string | null;
  /** Depth of the line the score was taken from */
  depth: number;
  /** Principal variation in UCI format */
  pv: string[];
}

/**
 * Anything that can score a position. The engine is the production
 * implementation; tests use scripted ones.
 */
export interface PositionOracle {
  evaluate(fen: string, options: EvaluateOptions): Promise<OracleEvaluation>;
  /** Clear search state before the first query of a game */
  newGame?(): Promise<void>;
  close(): Promise<void>;
}

export interface EngineHealth {
  healthy: boolean;
  /** Engine name as reported by `id name` */
  name?: string;
}
