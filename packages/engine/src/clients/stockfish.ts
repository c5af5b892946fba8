/**
 * Stockfish-backed position oracle
 */

import { EngineProtocolError } from '../errors.js';
import type { EngineHealth, EvaluateOptions, OracleEvaluation, PositionOracle } from '../types.js';
import { UciEngine } from '../uci/engine.js';
import type { TransportFactory } from '../uci/transport.js';

export interface StockfishConfig {
  /** Path or command name of the engine binary */
  path: string;
  /** Search threads (UCI option Threads) */
  threads: number;
  /** Hash table size in MB (UCI option Hash) */
  hashMb: number;
  /** Handshake and isready timeout (ms) */
  readyTimeoutMs: number;
  /** Per-search timeout (ms); 0 disables */
  searchTimeoutMs: number;
}

/**
 * Default configuration for the Stockfish oracle
 */
export const DEFAULT_STOCKFISH_CONFIG: StockfishConfig = {
  path: 'stockfish',
  threads: 2,
  hashMb: 256,
  readyTimeoutMs: 10_000,
  searchTimeoutMs: 0,
};

/**
 * Position oracle backed by a local Stockfish process.
 *
 * The process is started on the first query, not at construction, so a run
 * that finds no games never launches it. close() is safe to call any number
 * of times, whether or not the engine was ever started. A search that times
 * out kills the process; the next query starts a fresh one.
 */
export class StockfishOracle implements PositionOracle {
  private readonly engine: UciEngine;
  private startPromise: Promise<void> | null = null;
  private closed = false;
  readonly config: StockfishConfig;

  constructor(config: Partial<StockfishConfig> = {}, transportFactory?: TransportFactory) {
    this.config = { ...DEFAULT_STOCKFISH_CONFIG, ...config };
    this.engine = new UciEngine({
      path: this.config.path,
      options: {
        Threads: this.config.threads,
        Hash: this.config.hashMb,
      },
      readyTimeoutMs: this.config.readyTimeoutMs,
      searchTimeoutMs: this.config.searchTimeoutMs,
      transportFactory,
    });
  }

  /** True once the engine process has been launched */
  get isStarted(): boolean {
    return this.engine.isRunning;
  }

  /**
   * Score a position for the side to move
   *
   * @param fen - Position in FEN notation
   * @param options - Depth and optional root-move restriction
   */
  async evaluate(fen: string, options: EvaluateOptions): Promise<OracleEvaluation> {
    await this.ensureStarted();
    return this.engine.search(fen, options);
  }

  /**
   * Clear engine search state between games
   */
  async newGame(): Promise<void> {
    await this.ensureStarted();
    await this.engine.newGame();
  }

  /**
   * Start the engine if needed and report whether it answered the handshake
   */
  async healthCheck(): Promise<EngineHealth> {
    await this.ensureStarted();
    const health: EngineHealth = { healthy: this.engine.isRunning };
    if (this.engine.engineName) health.name = this.engine.engineName;
    return health;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.startPromise) {
      // Let a start in flight settle before quitting; its failure is reported to the caller that began it
      await this.startPromise.then(
        () => undefined,
        () => undefined,
      );
    }
    await this.engine.quit();
  }

  private async ensureStarted(): Promise<void> {
    if (this.closed) {
      throw new EngineProtocolError('Engine oracle has been closed');
    }
    if (!this.startPromise || this.engine.needsRestart) {
      this.startPromise = this.engine.start();
    }
    await this.startPromise;
  }
}
