export { StockfishOracle, DEFAULT_STOCKFISH_CONFIG, type StockfishConfig } from './stockfish.js';
