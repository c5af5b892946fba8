/**
 * Line-oriented channel to a UCI engine
 */

import { spawn } from 'node:child_process';
import * as readline from 'node:readline';

export type ExitListener = (code: number | null, signal: string | null) => void;

/**
 * Byte-level plumbing the engine driver talks through. The process-backed
 * implementation is below; tests substitute a scripted one.
 */
export interface UciTransport {
  send(command: string): void;
  onLine(listener: (line: string) => void): void;
  onExit(listener: ExitListener): void;
  onError(listener: (error: Error) => void): void;
  kill(): void;
}

export type TransportFactory = (enginePath: string) => UciTransport;

/**
 * Spawn the engine binary and expose its stdio as a UciTransport
 */
export function spawnTransport(enginePath: string): UciTransport {
  const proc = spawn(enginePath, [], {
    stdio: ['pipe', 'pipe', 'ignore'],
    windowsHide: true,
  });
  const rl = readline.createInterface({ input: proc.stdout });
  const errorListeners: Array<(error: Error) => void> = [];
  let exited = false;

  proc.on('exit', () => {
    exited = true;
    rl.close();
  });
  proc.on('error', (error) => errorListeners.forEach((listener) => listener(error)));
  proc.stdin.on('error', (error) => errorListeners.forEach((listener) => listener(error)));

  return {
    send(command: string): void {
      if (exited || !proc.stdin.writable) {
        return;
      }
      proc.stdin.write(`${command}\n`);
    },
    onLine(listener) {
      rl.on('line', listener);
    },
    onExit(listener) {
      proc.on('exit', (code, signal) => listener(code, signal));
    },
    onError(listener) {
      errorListeners.push(listener);
    },
    kill(): void {
      if (!exited && !proc.killed) {
        proc.kill();
      }
    },
  };
}
