import type { Express, Response } from "express";
import { createServer, type Server } from "http";
import { z } from "zod";
import { isoDateSchema, type SeasonStatus } from "@shared/schema";
import { SPORTS, getSportConfig, isValidSport, type Sport } from "@shared/sport-config";
import { config } from "./config";
import { formatGames, formatHelp, formatMilestones, formatOverview, formatSeasonStatus, formatStandings } from "./format/text";
import { jobScheduler } from "./jobs/scheduler";
import { transitionMonitor } from "./jobs/season-transitions";
import { getToday } from "./lib/time";
import { InvalidSeasonConfig, SeasonNotFound } from "./season/errors";
import { seasonService } from "./season/season-service";
import { fetchSchedule, fetchScores, fetchStandings, toLeagueTable, UpstreamError } from "./sportsblaze";

export const seasonQuerySchema = z.object({
  date: isoDateSchema.optional(),
  year: z.coerce.number().int().min(1900).max(9999).optional(),
  threshold: z.coerce.number().int().min(0).max(365).optional(),
  group: z.enum(["conference", "league"]).optional(),
});

export type SeasonQuery = z.infer<typeof seasonQuerySchema>;

type ResponseFormat = "json" | "text";

class UnknownSport extends Error {
  readonly status = 404;

  constructor(sport: string) {
    super(`Unknown sport: ${sport}. Supported: ${SPORTS.join(", ")}`);
    this.name = "UnknownSport";
  }
}

export class InvalidQueryParameter extends Error {
  readonly status = 400;

  constructor(parameter: string, reason: string) {
    super(`Invalid query parameter ${parameter}: ${reason}`);
    this.name = "InvalidQueryParameter";
  }
}

function parseSport(sportParam: string): Sport {
  const sport = sportParam.toLowerCase();
  if (!isValidSport(sport)) {
    throw new UnknownSport(sportParam);
  }
  return sport;
}

export function parseSeasonQuery(rawQuery: unknown): SeasonQuery {
  const parsed = seasonQuerySchema.safeParse(rawQuery);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidQueryParameter(issue.path.join("."), issue.message);
  }
  return parsed.data;
}

interface SeasonContext {
  sport: Sport;
  date: string;
  year: number;
  threshold: number;
  query: SeasonQuery;
}

/**
 * Validate :sport and the query string. Date defaults to today in the season
 * timezone, year to the season that date belongs to.
 */
export function parseSeasonContext(sportParam: string, rawQuery: unknown): SeasonContext {
  const sport = parseSport(sportParam);
  const query = parseSeasonQuery(rawQuery);
  const date = query.date ?? getToday(config.seasonTimezone);
  const year = query.year ?? seasonService.currentSeasonYear(sport, date);
  const threshold = query.threshold ?? config.transitionThresholdDays;
  return { sport, date, year, threshold, query };
}

export function errorStatus(error: unknown): number {
  if (
    error instanceof InvalidSeasonConfig ||
    error instanceof SeasonNotFound ||
    error instanceof UpstreamError ||
    error instanceof UnknownSport ||
    error instanceof InvalidQueryParameter
  ) {
    return error.status;
  }
  return 500;
}

function sendError(res: Response, error: unknown, format: ResponseFormat): void {
  const status = errorStatus(error);
  const message = error instanceof Error ? error.message : "Internal Server Error";
  if (status >= 500) {
    console.error(`[routes] ${message}`);
  }

  if (format === "text") {
    res.status(status).type("text/plain").send(`Error: ${message}\n`);
  } else {
    res.status(status).json({ error: message });
  }
}

function sendText(res: Response, body: string): void {
  res.type("text/plain").send(`${body}\n`);
}

function statusFor(context: SeasonContext): SeasonStatus {
  return seasonService.seasonStatus(context.sport, context.year, context.date, context.threshold);
}

export async function registerRoutes(app: Express): Promise<Server> {
  // ============================================================================
  // JSON API
  // ============================================================================

  app.get("/api/sports", (_req, res) => {
    res.json(
      SPORTS.map(sport => ({
        ...getSportConfig(sport),
        seasons: seasonService.listSeasons(sport).map(definition => definition.year),
      })),
    );
  });

  app.get("/api/:sport/season", (req, res) => {
    try {
      const context = parseSeasonContext(req.params.sport, req.query);
      res.json(statusFor(context));
    } catch (error) {
      sendError(res, error, "json");
    }
  });

  app.get("/api/:sport/seasons", (req, res) => {
    try {
      res.json(seasonService.listSeasons(parseSport(req.params.sport)));
    } catch (error) {
      sendError(res, error, "json");
    }
  });

  app.get("/api/:sport/milestones", (req, res) => {
    try {
      const context = parseSeasonContext(req.params.sport, req.query);
      res.json({
        sport: context.sport,
        year: context.year,
        date: context.date,
        milestones: seasonService.milestones(context.sport, context.year, context.date),
      });
    } catch (error) {
      sendError(res, error, "json");
    }
  });

  app.get("/api/:sport/comparison", (req, res) => {
    try {
      const context = parseSeasonContext(req.params.sport, req.query);
      res.json({ sport: context.sport, date: context.date, seasons: seasonService.comparison(context.sport, context.date) });
    } catch (error) {
      sendError(res, error, "json");
    }
  });

  app.get("/api/:sport/trends", (req, res) => {
    try {
      res.json(seasonService.trends(parseSport(req.params.sport)));
    } catch (error) {
      sendError(res, error, "json");
    }
  });

  app.get("/api/overview", (req, res) => {
    try {
      const query = parseSeasonQuery(req.query);
      const date = query.date ?? getToday(config.seasonTimezone);
      res.json({ date, sports: seasonService.overview(date, query.threshold ?? config.transitionThresholdDays) });
    } catch (error) {
      sendError(res, error, "json");
    }
  });

  app.get("/api/:sport/scores", async (req, res) => {
    try {
      const context = parseSeasonContext(req.params.sport, req.query);
      const games = await fetchScores(context.sport, context.date, context.year);
      res.json({ date: context.date, season: statusFor(context), games });
    } catch (error) {
      sendError(res, error, "json");
    }
  });

  app.get("/api/:sport/schedule", async (req, res) => {
    try {
      const context = parseSeasonContext(req.params.sport, req.query);
      const games = await fetchSchedule(context.sport, context.date, context.year);
      res.json({ date: context.date, season: statusFor(context), games });
    } catch (error) {
      sendError(res, error, "json");
    }
  });

  app.get("/api/:sport/standings", async (req, res) => {
    try {
      const context = parseSeasonContext(req.params.sport, req.query);
      const groups = await fetchStandings(context.sport, context.year);
      const grouping = context.query.group ?? "conference";
      res.json({
        season: statusFor(context),
        grouping,
        standings: grouping === "league" ? toLeagueTable(groups) : groups,
      });
    } catch (error) {
      sendError(res, error, "json");
    }
  });

  // ============================================================================
  // Jobs
  // ============================================================================

  app.get("/api/jobs", (_req, res) => {
    res.json(jobScheduler.getStatus());
  });

  app.post("/api/jobs/:jobName/run", async (req, res) => {
    const { jobName } = req.params;
    if (!jobScheduler.getStatus().some(job => job.name === jobName)) {
      res.status(404).json({ error: `Unknown job: ${jobName}` });
      return;
    }
    try {
      const result = await jobScheduler.triggerJob(jobName);
      res.json({ success: true, result });
    } catch (error) {
      sendError(res, error, "json");
    }
  });

  app.get("/api/transitions", (req, res) => {
    const limit = z.coerce.number().int().positive().optional().safeParse(req.query.limit);
    res.json(transitionMonitor.getHistory(limit.success ? limit.data : undefined));
  });

  // ============================================================================
  // Plain-text endpoints for curl
  // ============================================================================

  app.get("/curl/help", (_req, res) => {
    sendText(res, formatHelp());
  });

  app.get("/curl/overview", (req, res) => {
    try {
      const query = parseSeasonQuery(req.query);
      const date = query.date ?? getToday(config.seasonTimezone);
      sendText(res, formatOverview(date, seasonService.overview(date, query.threshold ?? config.transitionThresholdDays)));
    } catch (error) {
      sendError(res, error, "text");
    }
  });

  app.get("/curl/:sport/milestones", (req, res) => {
    try {
      const context = parseSeasonContext(req.params.sport, req.query);
      const { name } = seasonService.getSeason(context.sport, context.year);
      sendText(res, formatMilestones(name, context.date, seasonService.milestones(context.sport, context.year, context.date)));
    } catch (error) {
      sendError(res, error, "text");
    }
  });

  app.get("/curl/:sport/season", (req, res) => {
    try {
      const context = parseSeasonContext(req.params.sport, req.query);
      sendText(res, formatSeasonStatus(statusFor(context)));
    } catch (error) {
      sendError(res, error, "text");
    }
  });

  app.get("/curl/:sport/scores", async (req, res) => {
    try {
      const context = parseSeasonContext(req.params.sport, req.query);
      const games = await fetchScores(context.sport, context.date, context.year);
      sendText(res, formatGames("scores", context.sport, context.date, games, statusFor(context)));
    } catch (error) {
      sendError(res, error, "text");
    }
  });

  app.get("/curl/:sport/schedule", async (req, res) => {
    try {
      const context = parseSeasonContext(req.params.sport, req.query);
      const games = await fetchSchedule(context.sport, context.date, context.year);
      sendText(res, formatGames("schedule", context.sport, context.date, games, statusFor(context)));
    } catch (error) {
      sendError(res, error, "text");
    }
  });

  app.get("/curl/:sport/standings", async (req, res) => {
    try {
      const context = parseSeasonContext(req.params.sport, req.query);
      const groups = await fetchStandings(context.sport, context.year);
      sendText(res, formatStandings(context.sport, groups, context.query.group ?? "conference", statusFor(context)));
    } catch (error) {
      sendError(res, error, "text");
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}
