import type { Milestone, MilestoneBoundary, NextMilestone, PhaseName, SeasonDefinition } from "@shared/schema";
import { daysBetween } from "../lib/time";

interface Boundary {
  phase: PhaseName;
  boundary: MilestoneBoundary;
  date: string;
}

/**
 * Every phase start and end in chronological order. A one-day phase lists
 * its start before its end; phases keep their definition order.
 */
export function listBoundaries(definition: SeasonDefinition): Boundary[] {
  return definition.phases.flatMap(phase => [
    { phase: phase.name, boundary: "start" as const, date: phase.start },
    { phase: phase.name, boundary: "end" as const, date: phase.end },
  ]);
}

export function milestoneLabel(phase: PhaseName, boundary: MilestoneBoundary): string {
  return `${phase} ${boundary}`;
}

/**
 * Nearest phase boundary strictly after `date`.
 *
 * Returns `{ kind: "season-complete" }` once the last phase has ended; callers
 * that want to keep counting look up the following season themselves.
 *
 * @example
 * nextMilestone(wnba2025, "2025-09-01")
 * // { kind: "upcoming", label: "regular-season end", date: "2025-09-11", daysUntil: 10, ... }
 */
export function nextMilestone(definition: SeasonDefinition, date: string): NextMilestone {
  // listBoundaries is chronological for a validated definition
  const upcoming = listBoundaries(definition).find(b => b.date > date);
  if (!upcoming) {
    return { kind: "season-complete" };
  }
  return {
    kind: "upcoming",
    label: milestoneLabel(upcoming.phase, upcoming.boundary),
    phase: upcoming.phase,
    boundary: upcoming.boundary,
    date: upcoming.date,
    daysUntil: daysBetween(date, upcoming.date),
  };
}

/**
 * Every boundary of the season with its distance from `date`: "completed"
 * before it, "today" on it, "upcoming" after.
 */
export function listMilestones(definition: SeasonDefinition, date: string): Milestone[] {
  return listBoundaries(definition).map(b => {
    const daysUntil = daysBetween(date, b.date);
    return {
      label: milestoneLabel(b.phase, b.boundary),
      phase: b.phase,
      boundary: b.boundary,
      date: b.date,
      daysUntil,
      status: daysUntil < 0 ? "completed" : daysUntil === 0 ? "today" : "upcoming",
    };
  });
}
