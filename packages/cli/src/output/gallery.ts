/**
 * Gallery report: the JSON document the trainer pages are built from
 */

import type { AnalyzedGame, SeverityThresholds, SideFilter, TrainerCard } from '@slipfinder/core';
import type { PerfType } from '@slipfinder/lichess';

import type { AnalysisProfile, SlipfinderConfig } from '../config/schema.js';
import type { RunResult } from '../orchestrator/orchestrator.js';
import type { RunStats } from '../progress/types.js';

/**
 * Settings a report was produced with
 */
export interface ReportSettings {
  profile: AnalysisProfile;
  depth: number;
  thresholds: SeverityThresholds;
  minCpLoss: number;
  side: SideFilter;
  maxGames: number;
  since: string | null;
  until: string | null;
  perfTypes: PerfType[];
}

export interface GalleryReport {
  /** ISO-8601 timestamp */
  generatedAt: string;
  /** Lichess user the games belong to, null for a local file without --user */
  user: string | null;
  settings: ReportSettings;
  stats: RunStats;
  games: AnalyzedGame[];
  cards: TrainerCard[];
}

export function reportSettings(config: SlipfinderConfig): ReportSettings {
  return {
    profile: config.engine.profile,
    depth: config.engine.depth,
    thresholds: { ...config.analysis.thresholds },
    minCpLoss: config.analysis.minCpLoss,
    side: config.analysis.side,
    maxGames: config.retrieval.maxGames,
    since: config.retrieval.since ?? null,
    until: config.retrieval.until ?? null,
    perfTypes: [...config.retrieval.perfTypes],
  };
}

export function buildGalleryReport(
  result: RunResult,
  config: SlipfinderConfig,
  user: string | null,
  generatedAt: Date = new Date(),
): GalleryReport {
  return {
    generatedAt: generatedAt.toISOString(),
    user,
    settings: reportSettings(config),
    stats: result.stats,
    games: result.games,
    cards: result.cards,
  };
}

export function serializeReport(report: GalleryReport, pretty: boolean): string {
  return `${JSON.stringify(report, null, pretty ? 2 : undefined)}\n`;
}
