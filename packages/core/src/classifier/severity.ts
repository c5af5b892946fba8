import type { SeverityThresholds } from './thresholds.js';

export type Severity = 'blunder' | 'mistake' | 'inaccuracy';

export const SEVERITIES: readonly Severity[] = ['inaccuracy', 'mistake', 'blunder'];

/**
 * Classify a centipawn loss, checking the largest cutoff first
 *
 * @returns null when the loss is below the inaccuracy cutoff
 */
export function classifySeverity(cpLoss: number, thresholds: SeverityThresholds): Severity | null {
  if (cpLoss >= thresholds.blunder) return 'blunder';
  if (cpLoss >= thresholds.mistake) return 'mistake';
  if (cpLoss >= thresholds.inaccuracy) return 'inaccuracy';
  return null;
}

/**
 * Ordering key: none 0, inaccuracy 1, mistake 2, blunder 3
 */
export function severityRank(severity: Severity | null): number {
  return severity === null ? 0 : SEVERITIES.indexOf(severity) + 1;
}
