/**
 * Default configuration values and profile presets
 */

import { DEFAULT_THRESHOLDS } from '@slipfinder/core';
import { DEFAULT_STOCKFISH_CONFIG } from '@slipfinder/engine';
import { DEFAULT_LICHESS_CONFIG } from '@slipfinder/lichess';

import type { AnalysisProfile, EngineConfigSchema, SlipfinderConfig } from './schema.js';

/**
 * Search depth per profile
 */
export const ANALYSIS_PROFILES: Record<AnalysisProfile, Pick<EngineConfigSchema, 'depth'>> = {
  quick: { depth: 10 },
  standard: { depth: 12 },
  deep: { depth: 18 },
};

export const DEFAULT_ENGINE_CONFIG: EngineConfigSchema = {
  path: DEFAULT_STOCKFISH_CONFIG.path,
  profile: 'standard',
  depth: ANALYSIS_PROFILES.standard.depth,
  threads: DEFAULT_STOCKFISH_CONFIG.threads,
  hashMb: DEFAULT_STOCKFISH_CONFIG.hashMb,
  readyTimeoutMs: DEFAULT_STOCKFISH_CONFIG.readyTimeoutMs,
  searchTimeoutMs: DEFAULT_STOCKFISH_CONFIG.searchTimeoutMs,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: SlipfinderConfig = {
  lichess: {
    baseUrl: DEFAULT_LICHESS_CONFIG.baseUrl,
    timeoutMs: DEFAULT_LICHESS_CONFIG.timeoutMs ?? 30000,
  },
  retrieval: {
    maxGames: 10,
    perfTypes: [],
  },
  engine: DEFAULT_ENGINE_CONFIG,
  analysis: {
    thresholds: { ...DEFAULT_THRESHOLDS },
    minCpLoss: 50,
    side: 'both',
  },
  output: {
    pretty: true,
  },
};

/**
 * Apply a profile's depth to an engine configuration
 */
export function applyProfile(config: EngineConfigSchema, profile: AnalysisProfile): EngineConfigSchema {
  return {
    ...config,
    ...ANALYSIS_PROFILES[profile],
    profile,
  };
}
