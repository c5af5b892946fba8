/**
 * UCI engine driver
 *
 * Speaks the UCI text protocol over a UciTransport. Commands are strictly
 * serialized: UCI allows a single search at a time, so every request waits
 * for the previous one to finish.
 */

import {
  EngineError,
  EngineProtocolError,
  EngineTerminatedError,
  EngineTimeoutError,
  EngineUnavailableError,
} from '../errors.js';
import type { EvaluateOptions, OracleEvaluation } from '../types.js';

import { collectSearchResult } from './parse.js';
import { spawnTransport, type TransportFactory, type UciTransport } from './transport.js';

export type UciOptionValue = string | number | boolean;

export interface UciEngineConfig {
  /** Path or command name of the engine binary */
  path: string;
  /** UCI options sent after the handshake, e.g. Threads and Hash */
  options?: Record<string, UciOptionValue>;
  /** Timeout for the handshake and isready (ms) */
  readyTimeoutMs?: number;
  /** Timeout for a single search (ms); 0 lets the depth limit alone end it */
  searchTimeoutMs?: number;
  /** Replaces process spawning, used by tests */
  transportFactory?: TransportFactory;
}

interface LineWaiter {
  match: (line: string) => boolean;
  lines: string[];
  resolve: (lines: string[]) => void;
  reject: (error: Error) => void;
  timer?: NodeJS.Timeout;
}

const DEFAULT_READY_TIMEOUT_MS = 10_000;
const QUIT_TIMEOUT_MS = 2_000;

function buildSetOption(name: string, value: UciOptionValue): string {
  return `setoption name ${name} value ${String(value)}`;
}

export class UciEngine {
  private transport: UciTransport | null = null;
  private waiter: LineWaiter | null = null;
  private exited = false;
  private abandoned = false;
  private queue: Promise<unknown> = Promise.resolve();
  private name: string | undefined;

  private readonly readyTimeoutMs: number;
  private readonly searchTimeoutMs: number;
  private readonly transportFactory: TransportFactory;

  constructor(private readonly config: UciEngineConfig) {
    this.readyTimeoutMs = config.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS;
    this.searchTimeoutMs = config.searchTimeoutMs ?? 0;
    this.transportFactory = config.transportFactory ?? spawnTransport;
  }

  get isRunning(): boolean {
    return this.transport !== null && !this.exited;
  }

  /** True after a timed-out request shut the process down; start() launches a new one */
  get needsRestart(): boolean {
    return this.abandoned;
  }

  /** Engine name from `id name`, once started */
  get engineName(): string | undefined {
    return this.name;
  }

  /**
   * Spawn the engine, complete the UCI handshake and apply options
   * @throws EngineUnavailableError if any step fails
   */
  async start(): Promise<void> {
    if (this.transport) return;
    this.abandoned = false;

    try {
      const transport = this.transportFactory(this.config.path);
      this.attach(transport);

      const handshake = await this.request('uci', (line) => line === 'uciok', this.readyTimeoutMs, 'uci');
      const idLine = handshake.find((line) => line.startsWith('id name '));
      this.name = idLine?.slice('id name '.length).trim();

      for (const [name, value] of Object.entries(this.config.options ?? {})) {
        this.send(buildSetOption(name, value));
      }
      await this.isReady();
    } catch (err) {
      this.detach();
      this.abandoned = false;
      throw new EngineUnavailableError(this.config.path, err instanceof Error ? err : undefined);
    }
  }

  /**
   * Signal a new game so the engine can clear its search state
   */
  async newGame(): Promise<void> {
    await this.enqueue(async () => {
      this.send('ucinewgame');
      await this.isReady();
    });
  }

  /**
   * Search a position to a fixed depth
   * @throws EngineTerminatedError if the engine dies during the search
   * @throws EngineProtocolError if the output carries no score or bestmove
   */
  async search(fen: string, options: EvaluateOptions): Promise<OracleEvaluation> {
    return this.enqueue(async () => {
      this.send(`position fen ${fen}`);

      const go = ['go', 'depth', String(options.depth)];
      if (options.searchMoves && options.searchMoves.length > 0) {
        go.push('searchmoves', ...options.searchMoves);
      }

      const lines = await this.request(
        go.join(' '),
        (line) => line.startsWith('bestmove'),
        this.searchTimeoutMs,
        'search',
      );
      return collectSearchResult(lines);
    });
  }

  /**
   * Ask the engine to quit, killing it if it does not exit in time
   */
  async quit(): Promise<void> {
    const transport = this.transport;
    if (!transport) return;

    const alreadyExited = this.exited;
    this.detach(false);
    if (alreadyExited) return;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        transport.kill();
        resolve();
      }, QUIT_TIMEOUT_MS);
      transport.onExit(() => {
        clearTimeout(timer);
        resolve();
      });
      transport.send('quit');
    });
  }

  private async isReady(): Promise<void> {
    await this.request('isready', (line) => line === 'readyok', this.readyTimeoutMs, 'isready');
  }

  private attach(transport: UciTransport): void {
    this.transport = transport;
    this.exited = false;

    transport.onLine((raw) => {
      if (this.transport === transport) this.handleLine(raw);
    });
    transport.onExit((code, signal) => {
      if (this.transport === transport) this.handleExit(new EngineTerminatedError(code, signal));
    });
    transport.onError((error) => {
      if (this.transport === transport) this.handleExit(new EngineTerminatedError(null, null, error));
    });
  }

  private detach(kill = true): void {
    const transport = this.transport;
    this.transport = null;
    this.name = undefined;
    if (this.waiter) {
      this.failWaiter(new EngineError('Engine was shut down'));
    }
    if (kill && transport && !this.exited) {
      transport.kill();
    }
  }

  private handleLine(raw: string): void {
    const line = raw.trim();
    const waiter = this.waiter;
    if (!line || !waiter) return;

    waiter.lines.push(line);
    if (waiter.match(line)) {
      clearTimeout(waiter.timer);
      this.waiter = null;
      waiter.resolve(waiter.lines);
    }
  }

  private handleExit(error: EngineTerminatedError): void {
    this.exited = true;
    if (this.waiter) {
      this.failWaiter(error);
    }
  }

  private failWaiter(error: Error): void {
    const waiter = this.waiter;
    if (!waiter) return;
    clearTimeout(waiter.timer);
    this.waiter = null;
    waiter.reject(error);
  }

  private send(command: string): void {
    if (!this.transport || this.exited) {
      throw new EngineTerminatedError(null, null);
    }
    this.transport.send(command);
  }

  private request(
    command: string,
    match: (line: string) => boolean,
    timeoutMs: number,
    operation: string,
  ): Promise<string[]> {
    if (this.waiter) {
      return Promise.reject(new EngineProtocolError(`Engine is busy; cannot run '${operation}'`));
    }

    return new Promise<string[]>((resolve, reject) => {
      const waiter: LineWaiter = { match, lines: [], resolve, reject };
      if (timeoutMs > 0) {
        waiter.timer = setTimeout(() => {
          this.failWaiter(new EngineTimeoutError(operation, timeoutMs));
          // A late bestmove would be read as the answer to the next query
          this.detach();
          this.abandoned = true;
        }, timeoutMs);
      }
      this.waiter = waiter;
      try {
        this.send(command);
      } catch (err) {
        this.failWaiter(err instanceof Error ? err : new EngineError(String(err)));
      }
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
