/**
 * Configuration schema types for the slipfinder CLI
 */

import type { SeverityThresholds, SideFilter } from '@slipfinder/core';
import type { PerfType } from '@slipfinder/lichess';

/**
 * Engine depth presets
 */
export type AnalysisProfile = 'quick' | 'standard' | 'deep';

/**
 * Lichess API access
 */
export interface LichessConfigSchema {
  baseUrl: string;
  /** Personal API token (from LICHESS_TOKEN) */
  token?: string;
  /** Request timeout in milliseconds */
  timeoutMs: number;
}

/**
 * Which games to download
 */
export interface RetrievalConfigSchema {
  maxGames: number;
  /** First day included, YYYY-MM-DD */
  since?: string;
  /** Last day included, YYYY-MM-DD */
  until?: string;
  perfTypes: PerfType[];
}

/**
 * UCI engine process
 */
export interface EngineConfigSchema {
  /** Executable path or a name resolved on PATH */
  path: string;
  profile: AnalysisProfile;
  /** Search depth for every query of the run */
  depth: number;
  threads: number;
  hashMb: number;
  readyTimeoutMs: number;
  /** 0 disables the per-search timeout */
  searchTimeoutMs: number;
}

export interface AnalysisConfigSchema {
  thresholds: SeverityThresholds;
  /** Smallest centipawn loss that produces a record */
  minCpLoss: number;
  side: SideFilter;
}

export interface OutputConfigSchema {
  /** Indent the JSON report */
  pretty: boolean;
}

/**
 * Complete configuration
 */
export interface SlipfinderConfig {
  lichess: LichessConfigSchema;
  retrieval: RetrievalConfigSchema;
  engine: EngineConfigSchema;
  analysis: AnalysisConfigSchema;
  output: OutputConfigSchema;
}

/**
 * Options as given on the command line
 */
export interface CliOptions {
  user?: string;
  input?: string;
  output?: string;
  config?: string;
  maxGames?: number;
  since?: string;
  until?: string;
  perf?: string[];
  profile?: AnalysisProfile;
  depth?: number;
  threads?: number;
  hashMb?: number;
  minCp?: number;
  inaccuracy?: number;
  mistake?: number;
  blunder?: number;
  side?: SideFilter;
  engine?: string;
  token?: string;
  showConfig?: boolean;
  dryRun?: boolean;
  noColor?: boolean;
  quiet?: boolean;
}
