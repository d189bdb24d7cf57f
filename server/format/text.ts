/**
 * Plain-text rendering for the /curl endpoints.
 * Every function returns the full body; lines are joined with "\n".
 */

import type { Milestone, NextMilestone, SeasonStatus } from "@shared/schema";
import { getSportConfig, SPORTS, type Sport } from "@shared/sport-config";
import { formatLongDate } from "../lib/time";
import { describeResolution } from "../season/phase-resolver";
import type { Game, StandingsGroup, StandingsGrouping } from "../sportsblaze";
import { toLeagueTable } from "../sportsblaze";

export function formatMilestone(milestone: NextMilestone): string {
  if (milestone.kind === "season-complete") {
    return "Next milestone: none (season complete)";
  }
  const days = milestone.daysUntil === 1 ? "1 day" : `${milestone.daysUntil} days`;
  return `Next milestone: ${milestone.label} on ${formatLongDate(milestone.date)} (in ${days})`;
}

/**
 * Footer shared by scores, schedule and standings: phase and week
 */
export function formatSeasonFooter(status: SeasonStatus): string[] {
  const lines = [`Phase: ${describeResolution(status.resolution)}`];
  if (status.week !== undefined) {
    lines.push(`Week: ${status.week}`);
  }
  return lines;
}

export function formatSeasonStatus(status: SeasonStatus): string {
  const { overall, phase } = status.progress;
  const lines = [
    `${status.name} season status for ${status.date}:`,
    `Phase: ${describeResolution(status.resolution)}`,
  ];
  if (status.week !== undefined) {
    lines.push(`Week: ${status.week}`);
  }
  if (status.resolution.kind === "in-phase") {
    lines.push(`Days left in phase: ${status.resolution.daysRemainingInPhase}`);
  }
  lines.push(formatMilestone(status.milestone));
  lines.push(`Transition: ${status.transition}`);
  lines.push(`Season progress: ${overall.percentage}% (day ${overall.daysElapsed} of ${overall.totalDays})`);
  if (phase) {
    lines.push(`Phase progress: ${phase.percentage}% (day ${phase.daysElapsed} of ${phase.totalDays})`);
  }
  return lines.join("\n");
}

/**
 * One milestone per line, e.g.
 *   "[done]  pre-season start   May 2, 2025 (132 days ago)"
 */
export function formatMilestones(seasonName: string, date: string, milestones: Milestone[]): string {
  const lines = [`${seasonName} milestones as of ${date}:`, ""];
  for (const milestone of milestones) {
    const marker = { completed: "[done] ", today: "[today]", upcoming: "[next] " }[milestone.status];
    const days = Math.abs(milestone.daysUntil) === 1 ? "1 day" : `${Math.abs(milestone.daysUntil)} days`;
    const when =
      milestone.status === "today" ? "today" : milestone.status === "completed" ? `${days} ago` : `in ${days}`;
    lines.push(`${marker} ${milestone.label.padEnd(22)} ${formatLongDate(milestone.date)} (${when})`);
  }
  return lines.join("\n");
}

export function formatOverview(date: string, statuses: SeasonStatus[]): string {
  if (statuses.length === 0) {
    return `No seasons registered as of ${date}.`;
  }
  const lines = [`Season overview for ${date}:`, ""];
  for (const status of statuses) {
    const week = status.week === undefined ? "" : `, week ${status.week}`;
    lines.push(
      `${status.name.padEnd(12)} ${describeResolution(status.resolution)}${week} ` +
        `(${status.progress.overall.percentage}%, ${status.transition})`,
    );
  }
  return lines.join("\n");
}

/**
 * One game per line. Finished or live games put the leading team first:
 *   " LVA (h) [88 - 79]  NYL (v) F"
 * Games without scores:
 *   " NYL (v) [vs]  LVA (h) Scheduled"
 */
export function formatGameLine(game: Game): string {
  const home = game.homeTeam.abbreviation.padStart(4);
  const away = game.awayTeam.abbreviation.padStart(4);

  if (game.homeScore === null || game.awayScore === null) {
    return `${away} (v) [vs] ${home} (h) ${game.status}`;
  }
  if (game.homeScore >= game.awayScore) {
    return `${home} (h) [${game.homeScore} - ${game.awayScore}] ${away} (v) ${game.status}`;
  }
  return `${away} (v) [${game.awayScore} - ${game.homeScore}] ${home} (h) ${game.status}`;
}

export function formatGames(
  kind: "scores" | "schedule",
  sport: Sport,
  date: string,
  games: Game[],
  status: SeasonStatus,
): string {
  const name = getSportConfig(sport).name;
  const lines = [`${name} ${kind} for ${date}:`, ""];
  if (games.length === 0) {
    lines.push(`No ${name} games on ${date}.`);
  } else {
    lines.push(...games.map(formatGameLine));
  }
  lines.push("", ...formatSeasonFooter(status));
  return lines.join("\n");
}

function formatStandingsRow(entry: { abbreviation: string; name: string; wins: number; losses: number }): string {
  const team = `${entry.abbreviation} ${entry.name}`.padEnd(15);
  return `${team} ${String(entry.wins).padStart(2)} - ${String(entry.losses).padStart(2)}`;
}

export function formatStandings(
  sport: Sport,
  groups: StandingsGroup[],
  grouping: StandingsGrouping,
  status: SeasonStatus,
): string {
  const name = getSportConfig(sport).name;
  if (groups.length === 0) {
    return `No ${name} standings data available.`;
  }

  const lines = [`${name} standings for ${status.date}:`, `Season: ${status.name}`, ""];
  if (grouping === "league") {
    lines.push(...toLeagueTable(groups).map(formatStandingsRow));
  } else {
    for (const group of groups) {
      lines.push(`${group.name}:`, ...group.entries.map(formatStandingsRow), "");
    }
    lines.pop();
  }
  lines.push("", ...formatSeasonFooter(status));
  return lines.join("\n");
}

export function formatHelp(): string {
  return [
    "Sports Relay - Curl Endpoints",
    "=============================",
    "",
    `Sports: ${SPORTS.join(", ")}`,
    "",
    "Available endpoints:",
    "- /curl/help - Show this help message",
    "- /curl/:sport/season - Season phase, week and next milestone",
    "- /curl/:sport/scores - Scores for a day",
    "- /curl/:sport/schedule - Schedule for a day",
    "- /curl/:sport/standings - Current standings",
    "- /curl/:sport/milestones - Every phase start and end with days to go",
    "- /curl/overview - Where every sport stands on one date",
    "",
    "Optional parameters:",
    "- date: YYYY-MM-DD (e.g., ?date=2025-07-09), defaults to today",
    "- year: season year (e.g., ?year=2025), defaults to the season of the date",
    "- threshold: days counted as ending soon / upcoming (e.g., ?threshold=7)",
    '- group: "conference" or "league" (standings only)',
    "",
    "Examples:",
    "- /curl/wnba/standings?group=league",
    "- /curl/nba/scores?date=2025-11-01",
    "- /curl/nfl/season",
  ].join("\n");
}
