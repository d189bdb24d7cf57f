import type { SeasonDefinition } from "@shared/schema";
import { getSeasonDisplayName } from "@shared/sport-config";
import { addCalendarYears } from "../lib/time";
import { createSeasonDefinition } from "./season-definition";

/**
 * Project a season onto a later (or earlier) year by shifting every phase
 * boundary by the same number of calendar years.
 *
 * Fills years whose league calendar is not published yet. The result is
 * marked `projected` and goes through the usual validation.
 *
 * A start on Feb 29 moves to Mar 1 in a non-leap year and an end moves to
 * Feb 28, so contiguous phases around the leap day stay disjoint.
 *
 * @example
 * projectSeason(nba2025, 2027).phases[0] // pre-season 2027-10-01..2027-10-20
 */
export function projectSeason(template: SeasonDefinition, year: number): SeasonDefinition {
  const offset = year - template.year;
  return createSeasonDefinition({
    sport: template.sport,
    year,
    name: getSeasonDisplayName(template.sport, year),
    projected: true,
    phases: template.phases.map(phase => {
      const start = addCalendarYears(phase.start, offset, "roll-forward");
      const end = addCalendarYears(phase.end, offset);
      return {
        name: phase.name,
        start,
        // a one-day Feb 29 phase
        end: end < start ? start : end,
        weekNumbered: phase.weekNumbered,
      };
    }),
  });
}

/**
 * Projections for `count` consecutive years after the template's year
 */
export function projectSeasons(template: SeasonDefinition, count: number): SeasonDefinition[] {
  return Array.from({ length: count }, (_, i) => projectSeason(template, template.year + i + 1));
}
