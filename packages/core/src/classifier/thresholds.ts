/**
 * Severity cutoffs, in centipawns lost
 */

export interface SeverityThresholds {
  inaccuracy: number;
  mistake: number;
  blunder: number;
}

export const DEFAULT_THRESHOLDS: Readonly<SeverityThresholds> = {
  inaccuracy: 50,
  mistake: 150,
  blunder: 300,
};

/**
 * Thrown when cutoffs are negative or out of order
 */
export class ThresholdOrderError extends Error {
  constructor(public readonly thresholds: SeverityThresholds) {
    super(
      `Severity thresholds must satisfy 0 <= inaccuracy <= mistake <= blunder ` +
        `(got inaccuracy=${thresholds.inaccuracy}, mistake=${thresholds.mistake}, blunder=${thresholds.blunder})`,
    );
    this.name = 'ThresholdOrderError';
  }
}

/**
 * @throws ThresholdOrderError unless 0 <= inaccuracy <= mistake <= blunder
 */
export function validateThresholds(thresholds: SeverityThresholds): void {
  const { inaccuracy, mistake, blunder } = thresholds;
  const finite = [inaccuracy, mistake, blunder].every((value) => Number.isFinite(value));
  if (!finite || inaccuracy < 0 || inaccuracy > mistake || mistake > blunder) {
    throw new ThresholdOrderError(thresholds);
  }
}
