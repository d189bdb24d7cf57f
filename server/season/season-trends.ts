import type { SeasonDefinition, SeasonSpan, SeasonTrends } from "@shared/schema";
import type { Sport } from "@shared/sport-config";
import { daysBetween } from "../lib/time";
import { seasonEnd, seasonStart } from "./season-definition";

// Start-to-start gaps that vary by less than this read as a steady calendar
const HIGH_CONSISTENCY_SPREAD_DAYS = 10;

/**
 * How a sport's seasons move from year to year: each season's span and the
 * days between consecutive season starts.
 *
 * @example
 * seasonTrends("wnba", [wnba2025, wnba2026]).averageDaysBetweenStarts // 365
 */
export function seasonTrends(sport: Sport, definitions: readonly SeasonDefinition[]): SeasonTrends {
  const ordered = [...definitions].sort((a, b) => a.year - b.year);

  const seasons: SeasonSpan[] = ordered.map((definition, i) => {
    const start = seasonStart(definition);
    const end = seasonEnd(definition);
    const span: SeasonSpan = { year: definition.year, start, end, totalDays: daysBetween(start, end) + 1 };
    if (i > 0) {
      span.daysSincePreviousStart = daysBetween(seasonStart(ordered[i - 1]), start);
    }
    return span;
  });

  const gaps = seasons.flatMap(span => (span.daysSincePreviousStart === undefined ? [] : [span.daysSincePreviousStart]));
  if (gaps.length === 0) {
    return { sport, seasonsAnalyzed: seasons.length, seasons, averageDaysBetweenStarts: null, consistency: null };
  }

  const average = gaps.reduce((sum, gap) => sum + gap, 0) / gaps.length;
  const spread = Math.max(...gaps) - Math.min(...gaps);
  return {
    sport,
    seasonsAnalyzed: seasons.length,
    seasons,
    averageDaysBetweenStarts: Math.round(average * 10) / 10,
    consistency: spread < HIGH_CONSISTENCY_SPREAD_DAYS ? "high" : "medium",
  };
}
