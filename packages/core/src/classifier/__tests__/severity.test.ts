import { describe, it, expect } from 'vitest';

import { classifySeverity, severityRank } from '../severity.js';
import { DEFAULT_THRESHOLDS } from '../thresholds.js';

describe('classifySeverity', () => {
  it('should return null below the inaccuracy cutoff', () => {
    expect(classifySeverity(0, DEFAULT_THRESHOLDS)).toBeNull();
    expect(classifySeverity(49, DEFAULT_THRESHOLDS)).toBeNull();
  });

  it('should include each cutoff in its own tier', () => {
    expect(classifySeverity(50, DEFAULT_THRESHOLDS)).toBe('inaccuracy');
    expect(classifySeverity(150, DEFAULT_THRESHOLDS)).toBe('mistake');
    expect(classifySeverity(300, DEFAULT_THRESHOLDS)).toBe('blunder');
  });

  it('should classify a 160 centipawn loss as a mistake', () => {
    expect(classifySeverity(120 - -40, DEFAULT_THRESHOLDS)).toBe('mistake');
  });

  it('should be monotonic in the loss', () => {
    let previous = 0;
    for (let loss = 0; loss <= 1000; loss += 5) {
      const rank = severityRank(classifySeverity(loss, DEFAULT_THRESHOLDS));
      expect(rank).toBeGreaterThanOrEqual(previous);
      previous = rank;
    }
    expect(previous).toBe(3);
  });

  it('should skip a tier whose cutoff equals the next one', () => {
    const thresholds = { inaccuracy: 100, mistake: 100, blunder: 400 };
    expect(classifySeverity(100, thresholds)).toBe('mistake');
    expect(classifySeverity(99, thresholds)).toBeNull();
  });
});

describe('severityRank', () => {
  it('should order tiers from none to blunder', () => {
    expect(severityRank(null)).toBe(0);
    expect(severityRank('inaccuracy')).toBe(1);
    expect(severityRank('mistake')).toBe(2);
    expect(severityRank('blunder')).toBe(3);
  });
});
