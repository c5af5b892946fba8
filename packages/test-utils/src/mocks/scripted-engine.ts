/**
 * Scripted UCI engine for testing the engine driver without a binary
 */

import type { ExitListener, TransportFactory, UciTransport } from '@slipfinder/engine';

/**
 * What the scripted engine does with a command: print lines, exit, fail,
 * or stay silent
 */
export type ScriptReply =
  | string[]
  | { exit: { code: number | null; signal: string | null } }
  | { error: Error }
  | undefined;

export type Script = (command: string) => ScriptReply;

export const SEARCH_REPLY = ['info depth 12 seldepth 16 score cp 25 nodes 1000 pv e2e4 e7e5', 'bestmove e2e4 ponder e7e5'];

/**
 * Answers like a well-behaved Stockfish; `search` decides the reply to `go`
 */
export function stockfishScript(search: (command: string) => ScriptReply = () => SEARCH_REPLY): Script {
  return (command) => {
    if (command === 'uci') {
      return ['id name Stockfish 16', 'id author the Stockfish developers', 'option name Threads type spin default 1 min 1 max 1024', 'uciok'];
    }
    if (command === 'isready') return ['readyok'];
    if (command === 'quit') return { exit: { code: 0, signal: null } };
    if (command.startsWith('go')) return search(command);
    return undefined;
  };
}

/**
 * In-process stand-in for an engine process
 */
export class ScriptedTransport implements UciTransport {
  readonly sent: string[] = [];
  killed = false;
  private readonly lineListeners: Array<(line: string) => void> = [];
  private readonly exitListeners: ExitListener[] = [];
  private readonly errorListeners: Array<(error: Error) => void> = [];

  constructor(private readonly script: Script) {}

  send(command: string): void {
    this.sent.push(command);
    const reply = this.script(command);
    if (reply === undefined) return;

    setImmediate(() => {
      if (Array.isArray(reply)) {
        for (const line of reply) this.lineListeners.forEach((listener) => listener(line));
      } else if ('exit' in reply) {
        this.emitExit(reply.exit.code, reply.exit.signal);
      } else {
        this.errorListeners.forEach((listener) => listener(reply.error));
      }
    });
  }

  onLine(listener: (line: string) => void): void {
    this.lineListeners.push(listener);
  }

  onExit(listener: ExitListener): void {
    this.exitListeners.push(listener);
  }

  onError(listener: (error: Error) => void): void {
    this.errorListeners.push(listener);
  }

  kill(): void {
    this.killed = true;
    setImmediate(() => this.emitExit(null, 'SIGTERM'));
  }

  /** How many times `command` was sent */
  count(command: string): number {
    return this.sent.filter((sent) => sent === command).length;
  }

  private emitExit(code: number | null, signal: string | null): void {
    this.exitListeners.forEach((listener) => listener(code, signal));
  }
}

export interface ScriptedFactory {
  factory: TransportFactory & ((path: string) => ScriptedTransport);
  transports: ScriptedTransport[];
  paths: string[];
}

/**
 * Transport factory that records every transport it hands out
 */
export function scriptedFactory(script: Script): ScriptedFactory {
  const transports: ScriptedTransport[] = [];
  const paths: string[] = [];
  return {
    transports,
    paths,
    factory: (path: string) => {
      paths.push(path);
      const transport = new ScriptedTransport(script);
      transports.push(transport);
      return transport;
    },
  };
}
