import type { PhaseResolution, SeasonDefinition } from "@shared/schema";
import { daysBetween } from "../lib/time";
import { findPhaseIndex, firstPhase, lastPhase } from "./season-definition";
import { weekInPhase } from "./week-calculator";

/**
 * Classify a date against a season's phases.
 *
 * Bounds are inclusive. Dates outside every phase resolve to one of the
 * sentinels: before the first start, after the last end, or in a gap between
 * two phases (both neighbours are reported).
 *
 * @example
 * resolvePhase(wnba2025, "2025-09-12")
 * // { kind: "between-phases", previous: "regular-season", next: "playoffs", daysUntilNext: 2, ... }
 */
export function resolvePhase(definition: SeasonDefinition, date: string): PhaseResolution {
  const { phases } = definition;
  const first = firstPhase(definition);
  const last = lastPhase(definition);

  if (date < first.start) {
    return {
      kind: "before-season",
      phase: "before-season",
      next: first.name,
      daysUntilNext: daysBetween(date, first.start),
    };
  }
  if (date > last.end) {
    return { kind: "after-season", phase: "after-season", previous: last.name };
  }

  const index = findPhaseIndex(definition, date);
  const interval = phases[index];
  if (date <= interval.end) {
    const week = weekInPhase(interval, date);
    return {
      kind: "in-phase",
      phase: interval.name,
      interval,
      daysIntoPhase: daysBetween(interval.start, date),
      daysRemainingInPhase: daysBetween(date, interval.end),
      ...(week === undefined ? {} : { week }),
    };
  }

  const next = phases[index + 1];
  return {
    kind: "between-phases",
    phase: "between-phases",
    previous: interval.name,
    next: next.name,
    daysUntilNext: daysBetween(date, next.start),
  };
}

/**
 * Human-readable phase label, e.g. "Regular Season" or
 * "Between Regular Season and Playoffs"
 */
export function describeResolution(resolution: PhaseResolution): string {
  switch (resolution.kind) {
    case "in-phase":
      return formatPhaseName(resolution.phase);
    case "between-phases":
      return `Between ${formatPhaseName(resolution.previous)} and ${formatPhaseName(resolution.next)}`;
    case "before-season":
      return "Before Season";
    case "after-season":
      return "Off Season";
  }
}

export function formatPhaseName(name: string): string {
  return name
    .split("-")
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}
