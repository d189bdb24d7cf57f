import { describe, it, expect } from 'vitest';
import { seasonTrends } from './season-trends';
import { createSeasonDefinition } from './season-definition';
import { projectSeason } from './season-projection';
import { wnba2025, wnba2026 } from './test-fixtures';

describe('seasonTrends', () => {
  it('measures season spans and the gaps between starts', () => {
    const trends = seasonTrends('wnba', [wnba2026, wnba2025, projectSeason(wnba2025, 2027)]);

    expect(trends.seasonsAnalyzed).toBe(3);
    expect(trends.seasons[0]).toEqual({ year: 2025, start: '2025-05-02', end: '2025-10-19', totalDays: 171 });
    expect(trends.seasons.map(s => s.daysSincePreviousStart)).toEqual([undefined, 365, 365]);
    expect(trends.averageDaysBetweenStarts).toBe(365);
    expect(trends.consistency).toBe('high');
  });

  it('rates a calendar that drifts by ten days or more as medium', () => {
    const lateStart = createSeasonDefinition({
      sport: 'wnba',
      year: 2027,
      phases: [{ name: 'regular-season', start: '2027-05-20', end: '2027-09-10' }],
    });

    const trends = seasonTrends('wnba', [wnba2025, wnba2026, lateStart]);

    expect(trends.seasons.map(s => s.daysSincePreviousStart)).toEqual([undefined, 365, 383]);
    expect(trends.averageDaysBetweenStarts).toBe(374);
    expect(trends.consistency).toBe('medium');
  });

  it('has no averages with a single season', () => {
    expect(seasonTrends('wnba', [wnba2025])).toMatchObject({
      seasonsAnalyzed: 1,
      averageDaysBetweenStarts: null,
      consistency: null,
    });
  });
});
