/**
 * Output formatting utilities
 */

import { SEVERITIES, type Severity } from '@slipfinder/core';
import type { AttemptOutcome } from '@slipfinder/lichess';
import chalk from 'chalk';

import type { SlipfinderConfig } from '../config/schema.js';

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: SlipfinderConfig): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Configuration:'));
  lines.push('');

  lines.push(chalk.dim('Lichess:'));
  lines.push(`  URL: ${config.lichess.baseUrl}`);
  lines.push(`  Token: ${config.lichess.token ? chalk.green('set') : chalk.yellow('not set')}`);
  lines.push('');

  lines.push(chalk.dim('Retrieval:'));
  lines.push(`  Max games: ${config.retrieval.maxGames}`);
  if (config.retrieval.since) {
    lines.push(`  Since: ${config.retrieval.since}`);
  }
  if (config.retrieval.until) {
    lines.push(`  Until: ${config.retrieval.until}`);
  }
  lines.push(`  Speeds: ${config.retrieval.perfTypes.length > 0 ? config.retrieval.perfTypes.join(', ') : 'all'}`);
  lines.push('');

  lines.push(chalk.dim('Engine:'));
  lines.push(`  Path: ${config.engine.path}`);
  lines.push(`  Profile: ${config.engine.profile}`);
  lines.push(`  Depth: ${config.engine.depth}`);
  lines.push(`  Threads: ${config.engine.threads}`);
  lines.push(`  Hash: ${config.engine.hashMb} MB`);
  lines.push('');

  const { thresholds } = config.analysis;
  lines.push(chalk.dim('Analysis:'));
  lines.push(`  Thresholds: ${thresholds.inaccuracy} / ${thresholds.mistake} / ${thresholds.blunder}`);
  lines.push(`  Min loss: ${config.analysis.minCpLoss}`);
  lines.push(`  Side: ${config.analysis.side}`);

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Format a progress bar like "[========          ]"
 */
export function formatProgressBar(current: number, total: number, width: number = 20): string {
  if (total <= 0) {
    return `[${'?'.repeat(width)}]`;
  }

  const ratio = Math.min(current / total, 1);
  const filled = Math.round(ratio * width);
  const empty = width - filled;

  return `[${'='.repeat(filled)}${' '.repeat(empty)}]`;
}

/**
 * Format a percentage like "42%"
 */
export function formatPercentage(current: number, total: number): string {
  if (total <= 0) {
    return '0%';
  }

  const percentage = Math.round((current / total) * 100);
  return `${percentage}%`;
}

/**
 * One retrieval attempt, e.g. "structured-api (without speed filter): 3 game(s)"
 */
export function formatAttempt(outcome: AttemptOutcome): string {
  const variant = outcome.variant === 'without-perf' ? ' (without speed filter)' : '';
  const label = `${outcome.strategy}${variant}`;
  switch (outcome.status) {
    case 'games':
      return `${label}: ${outcome.count} game(s)`;
    case 'empty':
      return `${label}: no games`;
    case 'failed':
      return `${label}: failed (${outcome.error ?? 'unknown error'})`;
  }
}

/**
 * Severity counts, largest first, e.g. "1 blunder, 2 mistakes, 0 inaccuracies"
 */
export function formatSeverityCounts(counts: Record<Severity, number>): string {
  return [...SEVERITIES]
    .reverse()
    .map((severity) => {
      const count = counts[severity];
      const noun = count === 1 ? severity : severity === 'inaccuracy' ? 'inaccuracies' : `${severity}s`;
      return `${count} ${noun}`;
    })
    .join(', ');
}
