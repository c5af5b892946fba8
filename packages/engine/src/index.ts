/**
 * @slipfinder/engine - Engine access for Slipfinder
 *
 * This package provides:
 * - The PositionOracle interface the analysis depends on
 * - A UCI protocol driver over a pluggable transport
 * - A Stockfish oracle that starts the engine lazily
 */

export const VERSION = '0.1.0';

export type {
  EngineScore,
  EvaluateOptions,
  OracleEvaluation,
  PositionOracle,
  EngineHealth,
} from './types.js';

export { StockfishOracle, DEFAULT_STOCKFISH_CONFIG, type StockfishConfig } from './clients/index.js';

export { UciEngine, type UciEngineConfig, type UciOptionValue } from './uci/engine.js';
export {
  spawnTransport,
  type UciTransport,
  type TransportFactory,
  type ExitListener,
} from './uci/transport.js';
export {
  parseInfoLine,
  parseBestMoveLine,
  collectSearchResult,
  isUciMove,
  type InfoLine,
  type BestMoveLine,
} from './uci/parse.js';

export {
  EngineError,
  EngineUnavailableError,
  EngineTerminatedError,
  EngineTimeoutError,
  EngineProtocolError,
  isFatalEngineError,
} from './errors.js';
