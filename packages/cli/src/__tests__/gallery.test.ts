/**
 * Gallery report tests
 */

import type { AnalyzedGame } from '@slipfinder/core';
import { describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { RunResult } from '../orchestrator/orchestrator.js';
import { buildGalleryReport, reportSettings, serializeReport } from '../output/gallery.js';

const GAME: AnalyzedGame = {
  gameId: 'q7ZvsdUF',
  white: 'Alice',
  black: 'Bob',
  whiteElo: 1500,
  blackElo: 1480,
  date: '2024.03.02',
  timeControl: '180+2',
  opening: 'Wayward Queen Attack',
  parseFailed: false,
  errors: [],
};

const RESULT: RunResult = {
  games: [GAME],
  cards: [],
  stats: {
    gamesRetrieved: 1,
    gamesAnalyzed: 1,
    gamesSkipped: 0,
    parseFailures: 0,
    records: 0,
    bySeverity: { inaccuracy: 0, mistake: 0, blunder: 0 },
    durationMs: 1200,
  },
};

describe('reportSettings', () => {
  it('should record the settings with unset dates as null', () => {
    expect(reportSettings(DEFAULT_CONFIG)).toEqual({
      profile: 'standard',
      depth: 12,
      thresholds: { inaccuracy: 50, mistake: 150, blunder: 300 },
      minCpLoss: 50,
      side: 'both',
      maxGames: 10,
      since: null,
      until: null,
      perfTypes: [],
    });
  });
});

describe('buildGalleryReport', () => {
  it('should stamp the report and carry games, cards and stats', () => {
    const generatedAt = new Date(Date.UTC(2024, 4, 1, 12, 0, 0));
    const report = buildGalleryReport(RESULT, DEFAULT_CONFIG, 'alice', generatedAt);

    expect(report.generatedAt).toBe('2024-05-01T12:00:00.000Z');
    expect(report.user).toBe('alice');
    expect(report.games).toEqual([GAME]);
    expect(report.cards).toEqual([]);
    expect(report.stats.durationMs).toBe(1200);
  });
});

describe('serializeReport', () => {
  const report = buildGalleryReport(RESULT, DEFAULT_CONFIG, null, new Date(Date.UTC(2024, 0, 1)));

  it('should write compact JSON on one line', () => {
    const text = serializeReport(report, false);
    expect(text.split('\n')).toHaveLength(2);
    expect(text.endsWith('}\n')).toBe(true);
    expect(JSON.parse(text)).toEqual(report);
  });

  it('should indent pretty JSON by two spaces', () => {
    const lines = serializeReport(report, true).split('\n');
    expect(lines[0]).toBe('{');
    expect(lines[1]).toBe('  "generatedAt": "2024-01-01T00:00:00.000Z",');
    expect(lines[2]).toBe('  "user": null,');
  });
});
