/**
 * Progress reporting contracts
 */

import type { Severity } from '@slipfinder/core';
import type { AttemptOutcome } from '@slipfinder/lichess';

/**
 * Phases of a run
 */
export type RunPhase = 'retrieval' | 'analysis' | 'output';

/**
 * Status of a service health check
 */
export interface ServiceStatus {
  name: string;
  healthy: boolean;
  latencyMs?: number;
  error?: string;
}

/**
 * Counters gathered over a run
 */
export interface RunStats {
  gamesRetrieved: number;
  gamesAnalyzed: number;
  /** Games dropped because their analysis failed */
  gamesSkipped: number;
  /** Games kept as header-only placeholders */
  parseFailures: number;
  records: number;
  bySeverity: Record<Severity, number>;
  durationMs: number;
}

/**
 * What the orchestrator tells the user about. Advisory only.
 */
export interface RunReporter {
  startPhase(phase: RunPhase, detail?: string): void;
  completePhase(phase: RunPhase, detail?: string): void;
  failPhase(phase: RunPhase, error: string): void;
  reportAttempt(outcome: AttemptOutcome): void;
  startGame(index: number, total: number, label: string): void;
  updatePly(ply: number, totalPlies: number): void;
  completeGame(index: number, total: number, records: number): void;
  skipGame(index: number, total: number, reason: string): void;
  warn(message: string): void;
}

/**
 * Display names for the phases
 */
export const PHASE_NAMES: Record<RunPhase, string> = {
  retrieval: 'Retrieving games',
  analysis: 'Analyzing games',
  output: 'Writing report',
};

export interface ProgressReporterOptions {
  /** Print nothing */
  silent?: boolean;
  /** Colorize output (default true) */
  color?: boolean;
}

export interface ColorFunctions {
  bold: (text: string) => string;
  dim: (text: string) => string;
  green: (text: string) => string;
  red: (text: string) => string;
  yellow: (text: string) => string;
  cyan: (text: string) => string;
}
