import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import express from 'express';
import request from 'supertest';
import { InvalidQueryParameter, parseSeasonContext, registerRoutes } from './routes';
import { InvalidSeasonConfig } from './season/errors';
import { seasonRegistry } from './season/season-registry';
import { nba2025, wnba2025, wnba2026 } from './season/test-fixtures';
import { UpstreamError, fetchScores, fetchStandings, type Game } from './sportsblaze';

vi.mock('./sportsblaze', async importOriginal => {
  const actual = await importOriginal<typeof import('./sportsblaze')>();
  return {
    ...actual,
    fetchScores: vi.fn(),
    fetchSchedule: vi.fn(),
    fetchStandings: vi.fn(),
  };
});

const finalGame: Game = {
  id: '401',
  awayTeam: { abbreviation: 'NYL', name: 'Liberty' },
  homeTeam: { abbreviation: 'LVA', name: 'Aces' },
  awayScore: 79,
  homeScore: 88,
  status: 'F',
  completed: true,
};

describe('routes', () => {
  const app = express();

  beforeAll(async () => {
    await registerRoutes(app);
  });

  beforeEach(() => {
    seasonRegistry.replaceAll([wnba2025, wnba2026]);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('GET /api/sports', () => {
    it('lists every sport with its registered seasons', async () => {
      const res = await request(app).get('/api/sports');

      expect(res.status).toBe(200);
      expect(res.body).toHaveLength(5);
      expect(res.body[0]).toMatchObject({ name: 'WNBA', apiPath: 'wnba', seasons: [2025, 2026] });
      expect(res.body[1]).toMatchObject({ name: 'NBA', seasons: [] });
    });
  });

  describe('GET /api/:sport/season', () => {
    it('returns the season status for a date', async () => {
      const res = await request(app).get('/api/wnba/season?date=2025-09-01');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        sport: 'wnba',
        year: 2025,
        week: 16,
        transition: 'active',
        resolution: { kind: 'in-phase', phase: 'regular-season' },
        milestone: { label: 'regular-season end', daysUntil: 10 },
      });
    });

    it('picks the season the date belongs to', async () => {
      const res = await request(app).get('/api/wnba/season?date=2026-05-10');
      expect(res.body.year).toBe(2026);
    });

    it('applies the threshold parameter', async () => {
      const res = await request(app).get('/api/wnba/season?date=2025-10-10&threshold=5');
      // 9 days of playoffs left
      expect(res.body.transition).toBe('active');
    });

    it('accepts sport names in any case', async () => {
      const res = await request(app).get('/api/WNBA/season?date=2025-09-01');
      expect(res.status).toBe(200);
    });

    it('rejects malformed dates with 400', async () => {
      const res = await request(app).get('/api/wnba/season?date=2025-13-01');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: 'Invalid query parameter date: Expected a calendar date in YYYY-MM-DD format',
      });
    });

    it('rejects negative thresholds with 400', async () => {
      const res = await request(app).get('/api/wnba/season?date=2025-09-01&threshold=-1');
      expect(res.status).toBe(400);
    });

    it('returns 404 for unknown sports', async () => {
      const res = await request(app).get('/api/cricket/season');

      expect(res.status).toBe(404);
      expect(res.body.error).toBe('Unknown sport: cricket. Supported: wnba, nba, nhl, mlb, nfl');
    });

    it('returns 404 for unregistered seasons', async () => {
      const missingYear = await request(app).get('/api/wnba/season?date=2025-09-01&year=2030');
      expect(missingYear.status).toBe(404);
      expect(missingYear.body.error).toBe('No season 2030 registered for wnba');

      const missingSport = await request(app).get('/api/nba/season?date=2025-11-01');
      expect(missingSport.status).toBe(404);
      expect(missingSport.body.error).toBe('No seasons registered for nba');
    });
  });

  describe('parseSeasonContext', () => {
    it('raises request errors apart from season configuration errors', () => {
      let caught: unknown;
      try {
        parseSeasonContext('wnba', { threshold: 'soon' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidQueryParameter);
      expect(caught).not.toBeInstanceOf(InvalidSeasonConfig);
      expect(caught).toMatchObject({ status: 400, name: 'InvalidQueryParameter' });
    });
  });

  describe('GET /api/:sport/seasons', () => {
    it('lists season definitions', async () => {
      const res = await request(app).get('/api/wnba/seasons');

      expect(res.status).toBe(200);
      expect(res.body.map((season: { name: string }) => season.name)).toEqual(['WNBA 2025', 'WNBA 2026']);
    });
  });

  describe('season analytics', () => {
    it('lists milestones with their status', async () => {
      const res = await request(app).get('/api/wnba/milestones?date=2025-09-14');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ sport: 'wnba', year: 2025, date: '2025-09-14' });
      expect(res.body.milestones.map((m: { status: string }) => m.status)).toEqual([
        'completed',
        'completed',
        'completed',
        'completed',
        'today',
        'upcoming',
      ]);
    });

    it('compares every season of a sport', async () => {
      const res = await request(app).get('/api/wnba/comparison?date=2025-09-01');

      expect(res.status).toBe(200);
      expect(res.body.seasons.map((s: { year: number }) => s.year)).toEqual([2025, 2026]);
      expect(res.body.seasons[0].progress.overall.percentage).toBe(71.9);
    });

    it('reports start-date trends', async () => {
      const res = await request(app).get('/api/wnba/trends');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ sport: 'wnba', averageDaysBetweenStarts: 365, consistency: 'high' });
    });

    it('gives an overview across sports', async () => {
      seasonRegistry.replaceAll([wnba2025, wnba2026, nba2025]);

      const res = await request(app).get('/api/overview?date=2025-11-01');

      expect(res.status).toBe(200);
      expect(res.body.date).toBe('2025-11-01');
      expect(res.body.sports.map((s: { sport: string; transition: string }) => [s.sport, s.transition])).toEqual([
        ['wnba', 'offseason'],
        ['nba', 'active'],
      ]);
    });

    it('validates the overview query', async () => {
      const res = await request(app).get('/api/overview?threshold=-1');

      expect(res.status).toBe(400);
      expect(res.body.error).toMatch(/^Invalid query parameter threshold: /);
    });

    it('renders the overview and milestones as text', async () => {
      const overview = await request(app).get('/curl/overview?date=2025-09-01');
      expect(overview.text).toBe('Season overview for 2025-09-01:\n\nWNBA 2025    Regular Season, week 16 (71.9%, active)\n');

      const milestones = await request(app).get('/curl/wnba/milestones?date=2025-09-14');
      expect(milestones.text.split('\n')[0]).toBe('WNBA 2025 milestones as of 2025-09-14:');
    });
  });

  describe('upstream data', () => {
    it('returns scores for the requested day and season', async () => {
      vi.mocked(fetchScores).mockResolvedValue([finalGame]);

      const res = await request(app).get('/api/wnba/scores?date=2025-07-09');

      expect(res.status).toBe(200);
      expect(res.body.games).toEqual([finalGame]);
      expect(res.body.season.week).toBe(8);
      expect(fetchScores).toHaveBeenCalledWith('wnba', '2025-07-09', 2025);
    });

    it('returns a league table when asked', async () => {
      vi.mocked(fetchStandings).mockResolvedValue([
        { name: 'East', entries: [{ abbreviation: 'NYL', name: 'Liberty', wins: 20, losses: 8 }] },
        { name: 'West', entries: [{ abbreviation: 'MIN', name: 'Lynx', wins: 24, losses: 4 }] },
      ]);

      const res = await request(app).get('/api/wnba/standings?date=2025-09-01&group=league');

      expect(res.body.grouping).toBe('league');
      expect(res.body.standings.map((entry: { abbreviation: string }) => entry.abbreviation)).toEqual(['MIN', 'NYL']);
    });

    it('maps upstream failures to 502', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      vi.mocked(fetchStandings).mockRejectedValue(new UpstreamError('Upstream wnba /standings request failed: timeout'));

      const res = await request(app).get('/api/wnba/standings?date=2025-09-01');

      expect(res.status).toBe(502);
      expect(res.body).toEqual({ error: 'Upstream wnba /standings request failed: timeout' });
    });
  });

  describe('curl endpoints', () => {
    it('serves the help text', async () => {
      const res = await request(app).get('/curl/help');

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toMatch(/^text\/plain/);
      expect(res.text.startsWith('Sports Relay - Curl Endpoints\n')).toBe(true);
    });

    it('renders scores as text', async () => {
      vi.mocked(fetchScores).mockResolvedValue([finalGame]);

      const res = await request(app).get('/curl/wnba/scores?date=2025-07-09');

      expect(res.text).toBe(
        'WNBA scores for 2025-07-09:\n\n LVA (h) [88 - 79]  NYL (v) F\n\nPhase: Regular Season\nWeek: 8\n',
      );
    });

    it('renders the season status as text', async () => {
      const res = await request(app).get('/curl/wnba/season?date=2025-09-12');

      expect(res.text.split('\n').slice(0, 3)).toEqual([
        'WNBA 2025 season status for 2025-09-12:',
        'Phase: Between Regular Season and Playoffs',
        'Next milestone: playoffs start on September 14, 2025 (in 2 days)',
      ]);
    });

    it('reports errors as one line of text', async () => {
      const res = await request(app).get('/curl/cricket/scores');

      expect(res.status).toBe(404);
      expect(res.text).toBe('Error: Unknown sport: cricket. Supported: wnba, nba, nhl, mlb, nfl\n');
    });
  });

  describe('jobs', () => {
    it('returns 404 for unknown jobs', async () => {
      const res = await request(app).post('/api/jobs/sync_everything/run');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Unknown job: sync_everything' });
    });

    it('returns the transition history', async () => {
      const res = await request(app).get('/api/transitions?limit=5');

      expect(res.status).toBe(200);
      expect(res.body).toEqual([]);
    });
  });
});
