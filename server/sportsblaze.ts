/**
 * SportsBlaze API Service
 *
 * Fetches schedule, scores and standings for every sport from the upstream
 * provider and normalizes the ESPN-style payloads into flat records.
 *
 * Endpoints used (per sport, e.g. https://api.sportsblaze.com/v1/wnba):
 * - GET /scores?date=YYYY-MM-DD&season=YYYY
 * - GET /schedule?date=YYYY-MM-DD&season=YYYY
 * - GET /standings?season=YYYY
 */

import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { getSportConfig, type Sport } from "@shared/sport-config";
import { TtlCache } from "./cache";
import { config, getApiKey } from "./config";

// ============================================================================
// Types
// ============================================================================

export interface GameTeam {
  abbreviation: string;
  name: string;
  record?: string;
}

export interface Game {
  id: string;
  startTime?: string;
  awayTeam: GameTeam;
  homeTeam: GameTeam;
  awayScore: number | null;
  homeScore: number | null;
  /** Short status label: "Scheduled", "Q3", "H", "F", "F/OT", ... */
  status: string;
  completed: boolean;
}

export interface StandingsEntry {
  abbreviation: string;
  name: string;
  wins: number;
  losses: number;
}

export interface StandingsGroup {
  name: string;
  entries: StandingsEntry[];
}

export type StandingsGrouping = "conference" | "league";

/**
 * Upstream request failed or returned an unexpected payload
 */
export class UpstreamError extends Error {
  constructor(
    message: string,
    readonly status: number = 502,
  ) {
    super(message);
    this.name = "UpstreamError";
  }
}

// ============================================================================
// Raw payload schemas
// ============================================================================

const rawTeamSchema = z.object({
  abbreviation: z.string(),
  shortDisplayName: z.string().optional(),
  displayName: z.string().optional(),
});

const rawCompetitorSchema = z.object({
  homeAway: z.string(),
  team: rawTeamSchema,
  score: z.union([z.string(), z.number()]).optional(),
  records: z.array(z.object({ summary: z.string() })).optional(),
});

const rawStatusSchema = z.object({
  period: z.number().optional(),
  type: z.object({
    name: z.string(),
    description: z.string().optional(),
    completed: z.boolean().optional(),
  }),
});

const rawEventSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  date: z.string().optional(),
  competitions: z.array(
    z.object({
      competitors: z.array(rawCompetitorSchema),
      status: rawStatusSchema.optional(),
    }),
  ),
});

export const rawScoreboardSchema = z.object({
  events: z.array(rawEventSchema).default([]),
});

export const rawStandingsSchema = z.object({
  children: z
    .array(
      z.object({
        name: z.string(),
        standings: z.object({
          entries: z
            .array(
              z.object({
                team: rawTeamSchema,
                stats: z.array(z.object({ name: z.string(), value: z.union([z.number(), z.string()]).optional() })).default([]),
              }),
            )
            .default([]),
        }),
      }),
    )
    .default([]),
});

type RawEvent = z.infer<typeof rawEventSchema>;
type RawCompetitor = z.infer<typeof rawCompetitorSchema>;

// ============================================================================
// Normalization
// ============================================================================

const STATUS_LABELS: Record<string, string> = {
  STATUS_SCHEDULED: "Scheduled",
  STATUS_IN_PROGRESS: "Live",
  STATUS_HALFTIME: "H",
  STATUS_FINAL: "F",
  STATUS_FINAL_OVERTIME: "F/OT",
  STATUS_POSTPONED: "Postponed",
  STATUS_CANCELED: "Cancelled",
  STATUS_CANCELLED: "Cancelled",
  STATUS_SUSPENDED: "Suspended",
};

/**
 * Short status label for a game.
 *
 * Periods past regulation become overtime ("OT", "2OT", "F/2OT") for clock
 * sports and the final inning ("F/11") for baseball.
 *
 * @example
 * getStatusDisplay("wnba", "STATUS_FINAL", "Final", 6) // "F/2OT"
 * getStatusDisplay("nba", "STATUS_IN_PROGRESS", "3rd Quarter - Q3", 3) // "Live"
 */
export function getStatusDisplay(sport: Sport, statusName: string, description = "", period?: number): string {
  const { regulationPeriods, extraPeriodStyle } = getSportConfig(sport);
  const isFinal = statusName === "STATUS_FINAL" || statusName === "STATUS_FINAL_OVERTIME";

  if (period !== undefined && period > regulationPeriods) {
    if (extraPeriodStyle === "innings") {
      if (isFinal) return `F/${period}`;
    } else {
      const extra = period - regulationPeriods;
      const overtime = extra === 1 ? "OT" : `${extra}OT`;
      return isFinal ? `F/${overtime}` : overtime;
    }
  }

  const mapped = STATUS_LABELS[statusName];
  if (mapped) {
    return mapped;
  }

  const lastWord = description.trim().split(/\s+/).pop() ?? "";
  if (/^Q\d$/.test(lastWord)) {
    return lastWord;
  }

  const upper = description.toUpperCase();
  if (upper.includes("HALF")) return "H";
  if (upper.includes("FINAL")) return "F";
  if (upper.includes("LIVE") || upper.includes("IN PROGRESS")) return "Live";

  return description || statusName;
}

function parseScore(score: string | number | undefined): number | null {
  if (score === undefined || score === "") return null;
  const value = typeof score === "number" ? score : Number(score);
  return Number.isInteger(value) ? value : null;
}

function toGameTeam(competitor: RawCompetitor): GameTeam {
  const record = competitor.records?.[0]?.summary;
  return {
    abbreviation: competitor.team.abbreviation,
    name: competitor.team.shortDisplayName ?? competitor.team.displayName ?? competitor.team.abbreviation,
    ...(record ? { record } : {}),
  };
}

/**
 * Flatten one scoreboard event. Events without both a home and an away
 * competitor are dropped (returns null).
 */
export function normalizeEvent(sport: Sport, event: RawEvent, index = 0): Game | null {
  const competition = event.competitions[0];
  if (!competition) return null;

  const home = competition.competitors.find(c => c.homeAway === "home");
  const away = competition.competitors.find(c => c.homeAway === "away");
  if (!home || !away) return null;

  const statusName = competition.status?.type.name ?? "STATUS_SCHEDULED";
  const scheduled = statusName === "STATUS_SCHEDULED";

  return {
    id: event.id !== undefined ? String(event.id) : `${away.team.abbreviation}@${home.team.abbreviation}#${index}`,
    ...(event.date ? { startTime: event.date } : {}),
    awayTeam: toGameTeam(away),
    homeTeam: toGameTeam(home),
    awayScore: scheduled ? null : parseScore(away.score),
    homeScore: scheduled ? null : parseScore(home.score),
    status: getStatusDisplay(sport, statusName, competition.status?.type.description, competition.status?.period),
    completed: competition.status?.type.completed ?? statusName.startsWith("STATUS_FINAL"),
  };
}

export function normalizeScoreboard(sport: Sport, raw: unknown): Game[] {
  const parsed = rawScoreboardSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UpstreamError(`Unexpected ${sport} scoreboard payload: ${parsed.error.issues[0].message}`);
  }
  return parsed.data.events
    .map((event, index) => normalizeEvent(sport, event, index))
    .filter((game): game is Game => game !== null);
}

function statValue(stats: Array<{ name: string; value?: number | string }>, name: string): number {
  const stat = stats.find(s => s.name === name);
  const value = Number(stat?.value ?? 0);
  return Number.isFinite(value) ? Math.trunc(value) : 0;
}

export function normalizeStandings(sport: Sport, raw: unknown): StandingsGroup[] {
  const parsed = rawStandingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UpstreamError(`Unexpected ${sport} standings payload: ${parsed.error.issues[0].message}`);
  }
  return parsed.data.children.map(group => ({
    name: group.name,
    entries: group.standings.entries.map(entry => ({
      abbreviation: entry.team.abbreviation,
      name: entry.team.shortDisplayName ?? entry.team.displayName ?? entry.team.abbreviation,
      wins: statValue(entry.stats, "wins"),
      losses: statValue(entry.stats, "losses"),
    })),
  }));
}

/**
 * Merge conference groups into one table, most wins first (ties keep
 * their conference order)
 */
export function toLeagueTable(groups: StandingsGroup[]): StandingsEntry[] {
  return groups.flatMap(group => group.entries).sort((a, b) => b.wins - a.wins);
}

// ============================================================================
// HTTP
// ============================================================================

const clients = new Map<Sport, { apiKey: string; client: AxiosInstance }>();

function getApiClient(sport: Sport): AxiosInstance {
  const apiKey = getApiKey(sport);
  if (!apiKey) {
    throw new UpstreamError(`No API key configured for ${sport.toUpperCase()} (set ${sport.toUpperCase()}_API_KEY or SPORTSBLAZE_API_KEY)`, 503);
  }

  const existing = clients.get(sport);
  if (existing && existing.apiKey === apiKey) {
    return existing.client;
  }

  const client = axios.create({
    baseURL: `${config.sportsBlazeApiBase}/${getSportConfig(sport).apiPath}`,
    headers: {
      Authorization: `Bearer ${apiKey}`,
      "Content-Type": "application/json",
    },
    timeout: 10000,
  });
  clients.set(sport, { apiKey, client });
  return client;
}

async function fetchJson(sport: Sport, path: string, params: Record<string, string | number>): Promise<unknown> {
  const client = getApiClient(sport);
  try {
    const response = await client.get(path, { params });
    return response.data;
  } catch (error) {
    if (axios.isAxiosError(error)) {
      console.error(`[SportsBlaze] Error fetching ${sport} ${path}:`, {
        params,
        status: error.response?.status,
        statusText: error.response?.statusText,
        message: error.message,
      });
      throw new UpstreamError(`Upstream ${sport} ${path} request failed: ${error.message}`);
    }
    throw error;
  }
}

const gamesCache = new TtlCache<Game[]>(config.upstreamCacheTtlMs);
const standingsCache = new TtlCache<StandingsGroup[]>(config.upstreamCacheTtlMs * 5);

export async function fetchScores(sport: Sport, date: string, season: number): Promise<Game[]> {
  return gamesCache.getOrCompute(`scores:${sport}:${season}:${date}`, async () => {
    const raw = await fetchJson(sport, "/scores", { date, season });
    return normalizeScoreboard(sport, raw);
  });
}

export async function fetchSchedule(sport: Sport, date: string, season: number): Promise<Game[]> {
  return gamesCache.getOrCompute(`schedule:${sport}:${season}:${date}`, async () => {
    const raw = await fetchJson(sport, "/schedule", { date, season });
    return normalizeScoreboard(sport, raw);
  });
}

export async function fetchStandings(sport: Sport, season: number): Promise<StandingsGroup[]> {
  return standingsCache.getOrCompute(`standings:${sport}:${season}`, async () => {
    const raw = await fetchJson(sport, "/standings", { season });
    return normalizeStandings(sport, raw);
  });
}

/**
 * Drop cached upstream responses (all sports, or one)
 */
export function clearUpstreamCache(sport?: Sport): void {
  if (!sport) {
    gamesCache.clearAll();
    standingsCache.clearAll();
    return;
  }
  const pattern = new RegExp(`^\\w+:${sport}:`);
  gamesCache.invalidatePattern(pattern);
  standingsCache.invalidatePattern(pattern);
}
