/**
 * Progress module exports
 */

export type {
  RunPhase,
  RunReporter,
  RunStats,
  ServiceStatus,
  ProgressReporterOptions,
  ColorFunctions,
} from './types.js';
export { PHASE_NAMES } from './types.js';
export { ProgressReporter } from './reporter.js';
export {
  formatConfigDisplay,
  formatDuration,
  formatProgressBar,
  formatPercentage,
  formatAttempt,
  formatSeverityCounts,
} from './formatters.js';
