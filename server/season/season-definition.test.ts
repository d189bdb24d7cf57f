import { describe, it, expect } from 'vitest';
import { createSeasonDefinition, findPhaseIndex, seasonEnd, seasonStart, containsDate } from './season-definition';
import { InvalidSeasonConfig } from './errors';
import { wnba2025 } from './test-fixtures';

describe('createSeasonDefinition', () => {
  it('builds a frozen definition with a default display name', () => {
    expect(wnba2025.name).toBe('WNBA 2025');
    expect(wnba2025.projected).toBe(false);
    expect(wnba2025.phases.map(p => p.name)).toEqual(['pre-season', 'regular-season', 'playoffs']);
    expect(Object.isFrozen(wnba2025)).toBe(true);
    expect(Object.isFrozen(wnba2025.phases)).toBe(true);
    expect(Object.isFrozen(wnba2025.phases[0])).toBe(true);
  });

  it('defaults weekNumbered to true', () => {
    expect(wnba2025.phases.every(p => p.weekNumbered)).toBe(true);
  });

  it('names cross-year sports with both years', () => {
    const nba = createSeasonDefinition({
      sport: 'nba',
      year: 2025,
      phases: [{ name: 'regular-season', start: '2025-10-21', end: '2026-04-13' }],
    });
    expect(nba.name).toBe('NBA 2025-26');
  });

  it('keeps an explicit name', () => {
    const def = createSeasonDefinition({
      sport: 'wnba',
      year: 2025,
      name: 'Commissioner Cup Year',
      phases: [{ name: 'regular-season', start: '2025-05-16', end: '2025-09-11' }],
    });
    expect(def.name).toBe('Commissioner Cup Year');
  });

  it('accepts contiguous phases', () => {
    expect(seasonStart(wnba2025)).toBe('2025-05-02');
    expect(seasonEnd(wnba2025)).toBe('2025-10-19');
  });

  it('rejects an empty phase list', () => {
    expect(() => createSeasonDefinition({ sport: 'wnba', year: 2025, phases: [] })).toThrow(
      'wnba 2025: a season needs at least one phase',
    );
  });

  it('rejects a phase that ends before it starts', () => {
    expect(() =>
      createSeasonDefinition({
        sport: 'wnba',
        year: 2025,
        phases: [{ name: 'playoffs', start: '2025-10-19', end: '2025-09-14' }],
      }),
    ).toThrow('wnba 2025: playoffs starts 2025-10-19 after it ends 2025-09-14');
  });

  it('rejects overlapping phases', () => {
    // An all-star break inside the regular season is an overlap
    expect(() =>
      createSeasonDefinition({
        sport: 'wnba',
        year: 2025,
        phases: [
          { name: 'regular-season', start: '2025-05-16', end: '2025-09-11' },
          { name: 'all-star-break', start: '2025-07-18', end: '2025-07-21', weekNumbered: false },
        ],
      }),
    ).toThrow(/overlaps all-star-break/);
  });

  it('rejects phases listed out of order', () => {
    expect(() =>
      createSeasonDefinition({
        sport: 'wnba',
        year: 2025,
        phases: [
          { name: 'playoffs', start: '2025-09-14', end: '2025-10-19' },
          { name: 'regular-season', start: '2025-05-16', end: '2025-09-11' },
        ],
      }),
    ).toThrow(/phases are out of order/);
  });

  it('rejects a phase name used twice', () => {
    expect(() =>
      createSeasonDefinition({
        sport: 'wnba',
        year: 2025,
        phases: [
          { name: 'regular-season', start: '2025-05-16', end: '2025-06-30' },
          { name: 'regular-season', start: '2025-07-01', end: '2025-09-11' },
        ],
      }),
    ).toThrow('wnba 2025: phase regular-season is defined twice');
  });

  it('rejects dates that are not calendar dates', () => {
    expect(() =>
      createSeasonDefinition({
        sport: 'wnba',
        year: 2025,
        phases: [{ name: 'regular-season', start: '2025-02-30', end: '2025-09-11' }],
      }),
    ).toThrow(/phase #1 is invalid \(start:/);
  });

  it('rejects a fractional year', () => {
    expect(() =>
      createSeasonDefinition({
        sport: 'wnba',
        year: 2025.5,
        phases: [{ name: 'regular-season', start: '2025-05-16', end: '2025-09-11' }],
      }),
    ).toThrow(InvalidSeasonConfig);
  });

  it('reports status 500 for configuration errors', () => {
    try {
      createSeasonDefinition({ sport: 'wnba', year: 2025, phases: [] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidSeasonConfig);
      expect(error instanceof InvalidSeasonConfig && error.status).toBe(500);
    }
  });
});

describe('findPhaseIndex', () => {
  it('returns -1 before the first phase', () => {
    expect(findPhaseIndex(wnba2025, '2025-05-01')).toBe(-1);
  });

  it('finds the phase starting on or before the date', () => {
    expect(findPhaseIndex(wnba2025, '2025-05-02')).toBe(0);
    expect(findPhaseIndex(wnba2025, '2025-05-16')).toBe(1);
    expect(findPhaseIndex(wnba2025, '2025-10-19')).toBe(2);
  });

  it('returns the earlier neighbour inside a gap and the last phase after the season', () => {
    expect(findPhaseIndex(wnba2025, '2025-09-12')).toBe(1);
    expect(findPhaseIndex(wnba2025, '2025-12-01')).toBe(2);
  });
});

describe('containsDate', () => {
  it('includes both season bounds', () => {
    expect(containsDate(wnba2025, '2025-05-02')).toBe(true);
    expect(containsDate(wnba2025, '2025-10-19')).toBe(true);
    expect(containsDate(wnba2025, '2025-10-20')).toBe(false);
  });
});
