import type { SeasonDefinition, TransitionState } from "@shared/schema";
import { daysBetween } from "../lib/time";
import { resolvePhase } from "./phase-resolver";
import { lastPhase, seasonStart } from "./season-definition";

/**
 * Where a date sits relative to the live part of a season.
 *
 * - active: inside a phase (or a gap between phases) with the season continuing
 * - ending_soon: inside the last phase with `thresholdDays` or fewer remaining
 * - offseason: no live phase and no season start within `thresholdDays`
 * - upcoming: a season's first phase starts within `thresholdDays`
 *
 * `next` is the following season when one is registered. A date that has
 * already reached `next`'s first phase is classified against `next` alone.
 */
export function transitionState(
  current: SeasonDefinition,
  next: SeasonDefinition | undefined,
  date: string,
  thresholdDays: number,
): TransitionState {
  const resolution = resolvePhase(current, date);

  switch (resolution.kind) {
    case "in-phase": {
      const isLast = resolution.interval === lastPhase(current);
      return isLast && resolution.daysRemainingInPhase <= thresholdDays ? "ending_soon" : "active";
    }
    case "between-phases":
      return "active";
    case "before-season":
      return resolution.daysUntilNext <= thresholdDays ? "upcoming" : "offseason";
    case "after-season": {
      if (!next) {
        return "offseason";
      }
      const daysUntilNext = daysBetween(date, seasonStart(next));
      if (daysUntilNext <= 0) {
        return transitionState(next, undefined, date, thresholdDays);
      }
      return daysUntilNext <= thresholdDays ? "upcoming" : "offseason";
    }
  }
}
