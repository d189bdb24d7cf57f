import { describe, it, expect } from 'vitest';
import { listBoundaries, listMilestones, nextMilestone } from './milestone-scanner';
import { createSeasonDefinition } from './season-definition';
import { wnba2025 } from './test-fixtures';

describe('nextMilestone', () => {
  it('finds the end of the current phase', () => {
    expect(nextMilestone(wnba2025, '2025-09-01')).toEqual({
      kind: 'upcoming',
      label: 'regular-season end',
      phase: 'regular-season',
      boundary: 'end',
      date: '2025-09-11',
      daysUntil: 10,
    });
  });

  it('skips a boundary that falls on the query date', () => {
    const milestone = nextMilestone(wnba2025, '2025-09-11');
    expect(milestone).toMatchObject({ label: 'playoffs start', date: '2025-09-14', daysUntil: 3 });
  });

  it('points at the first phase start before the season', () => {
    expect(nextMilestone(wnba2025, '2025-04-01')).toMatchObject({
      label: 'pre-season start',
      date: '2025-05-02',
      daysUntil: 31,
    });
  });

  it('reports a completed season on and after the final day', () => {
    expect(nextMilestone(wnba2025, '2025-10-19')).toEqual({ kind: 'season-complete' });
    expect(nextMilestone(wnba2025, '2026-01-01')).toEqual({ kind: 'season-complete' });
  });
});

describe('listBoundaries', () => {
  it('lists a one-day phase start before end', () => {
    const def = createSeasonDefinition({
      sport: 'wnba',
      year: 2025,
      phases: [
        { name: 'regular-season', start: '2025-05-16', end: '2025-07-18' },
        { name: 'mid-season-event', start: '2025-07-19', end: '2025-07-19', weekNumbered: false },
      ],
    });
    expect(listBoundaries(def).map(b => `${b.phase} ${b.boundary} ${b.date}`)).toEqual([
      'regular-season start 2025-05-16',
      'regular-season end 2025-07-18',
      'mid-season-event start 2025-07-19',
      'mid-season-event end 2025-07-19',
    ]);
    expect(nextMilestone(def, '2025-07-18')).toMatchObject({ label: 'mid-season-event start', daysUntil: 1 });
  });
});

describe('listMilestones', () => {
  it('marks boundaries before, on and after the date', () => {
    const milestones = listMilestones(wnba2025, '2025-09-14');

    expect(milestones).toHaveLength(6);
    expect(milestones[3]).toEqual({
      label: 'regular-season end',
      phase: 'regular-season',
      boundary: 'end',
      date: '2025-09-11',
      daysUntil: -3,
      status: 'completed',
    });
    expect(milestones[4]).toMatchObject({ label: 'playoffs start', daysUntil: 0, status: 'today' });
    expect(milestones[5]).toMatchObject({ label: 'playoffs end', daysUntil: 35, status: 'upcoming' });
  });

  it('lists everything as upcoming before the season', () => {
    expect(listMilestones(wnba2025, '2025-01-01').every(m => m.status === 'upcoming')).toBe(true);
  });

  it('agrees with nextMilestone on the first upcoming boundary', () => {
    const upcoming = listMilestones(wnba2025, '2025-09-01').find(m => m.status === 'upcoming');
    expect(upcoming).toMatchObject({ label: 'regular-season end', daysUntil: 10 });
  });
});
