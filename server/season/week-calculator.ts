import type { PhaseInterval, SeasonDefinition } from "@shared/schema";
import { daysBetween } from "../lib/time";
import { findPhaseIndex } from "./season-definition";

const DAYS_PER_WEEK = 7;

/**
 * 1-based week of `date` within a phase: the first seven days are week 1.
 * Undefined for phases that are not week-numbered (e.g. the all-star break)
 * and for dates outside the phase.
 */
export function weekInPhase(interval: PhaseInterval, date: string): number | undefined {
  if (!interval.weekNumbered || date < interval.start || date > interval.end) {
    return undefined;
  }
  return Math.floor(daysBetween(interval.start, date) / DAYS_PER_WEEK) + 1;
}

/**
 * Week number of a date within its season phase, or undefined when the date
 * is outside every phase or its phase has no week numbers.
 *
 * @example
 * weekOf(wnba2025, "2025-05-16") // 1 (first day of the regular season)
 * weekOf(wnba2025, "2025-05-23") // 2
 */
export function weekOf(definition: SeasonDefinition, date: string): number | undefined {
  const index = findPhaseIndex(definition, date);
  if (index < 0) {
    return undefined;
  }
  return weekInPhase(definition.phases[index], date);
}
