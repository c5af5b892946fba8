export { MATE_SCORE, MAX_CP_SCORE, scoreToCp } from './score.js';
export { classifySeverity, severityRank, SEVERITIES, type Severity } from './severity.js';
export {
  DEFAULT_THRESHOLDS,
  ThresholdOrderError,
  validateThresholds,
  type SeverityThresholds,
} from './thresholds.js';
