import type { PhaseInterval, PhaseProgress, SeasonDefinition, SeasonProgress } from "@shared/schema";
import { daysBetween } from "../lib/time";
import { findPhaseIndex, seasonEnd, seasonStart } from "./season-definition";

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Progress through an inclusive date span. Day counts are inclusive of both
 * ends, so the last day of a span reads 100%.
 */
export function spanProgress(start: string, end: string, date: string): PhaseProgress {
  const totalDays = daysBetween(start, end) + 1;
  const daysElapsed = Math.min(totalDays, Math.max(0, daysBetween(start, date) + 1));
  return {
    percentage: round1((daysElapsed / totalDays) * 100),
    daysElapsed,
    totalDays,
    daysRemaining: totalDays - daysElapsed,
  };
}

/**
 * Overall progress through the season plus progress through the phase
 * containing `date` (null between phases or outside the season).
 */
export function seasonProgress(definition: SeasonDefinition, date: string): SeasonProgress {
  const index = findPhaseIndex(definition, date);
  const current: PhaseInterval | undefined = index >= 0 ? definition.phases[index] : undefined;

  return {
    overall: spanProgress(seasonStart(definition), seasonEnd(definition), date),
    phase: current && date <= current.end ? spanProgress(current.start, current.end, date) : null,
  };
}
