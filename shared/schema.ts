import { z } from "zod";
import { isValid, parseISO } from "date-fns";
import type { Sport } from "./sport-config";

// Calendar dates are plain YYYY-MM-DD strings; zero padding keeps them sortable as text.
export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  return ISO_DATE_PATTERN.test(value) && isValid(parseISO(value));
}

export const isoDateSchema = z.string().refine(isIsoDate, {
  message: "Expected a calendar date in YYYY-MM-DD format",
});

export const PHASE_NAMES = [
  "pre-season",
  "regular-season",
  "mid-season-event",
  "all-star-break",
  "playoffs",
  "offseason",
] as const;

export const phaseNameSchema = z.enum(PHASE_NAMES);
export type PhaseName = z.infer<typeof phaseNameSchema>;

// Season file schemas (data/seasons.json)
export const phaseIntervalInputSchema = z.object({
  name: phaseNameSchema,
  start: isoDateSchema,
  end: isoDateSchema,
  weekNumbered: z.boolean().default(true),
});

export const seasonEntrySchema = z.object({
  name: z.string().min(1).optional(),
  phases: z.array(phaseIntervalInputSchema),
});

export const seasonsFileSchema = z.object({
  seasons: z.record(z.string(), z.record(z.string(), seasonEntrySchema)),
  settings: z
    .object({
      // Years to project past each sport's latest listed season
      projectAhead: z.number().int().min(0).max(10).default(0),
    })
    .default({}),
});

export type PhaseIntervalInput = z.input<typeof phaseIntervalInputSchema>;

// Core season types
export interface PhaseInterval {
  readonly name: PhaseName;
  readonly start: string;
  readonly end: string;
  readonly weekNumbered: boolean;
}

export interface SeasonDefinition {
  readonly sport: Sport;
  readonly year: number;
  readonly name: string;
  /** Dates shifted from an earlier season rather than published */
  readonly projected: boolean;
  readonly phases: readonly PhaseInterval[];
}

export type PhaseResolution =
  | {
      kind: "in-phase";
      phase: PhaseName;
      interval: PhaseInterval;
      daysIntoPhase: number;
      daysRemainingInPhase: number;
      week?: number;
    }
  | {
      kind: "between-phases";
      phase: "between-phases";
      previous: PhaseName;
      next: PhaseName;
      daysUntilNext: number;
    }
  | {
      kind: "before-season";
      phase: "before-season";
      next: PhaseName;
      daysUntilNext: number;
    }
  | {
      kind: "after-season";
      phase: "after-season";
      previous: PhaseName;
    };

export type MilestoneBoundary = "start" | "end";

export type NextMilestone =
  | {
      kind: "upcoming";
      label: string;
      phase: PhaseName;
      boundary: MilestoneBoundary;
      date: string;
      daysUntil: number;
    }
  | { kind: "season-complete" };

export type MilestoneStatus = "completed" | "today" | "upcoming";

export interface Milestone {
  label: string;
  phase: PhaseName;
  boundary: MilestoneBoundary;
  date: string;
  // Negative once the boundary has passed
  daysUntil: number;
  status: MilestoneStatus;
}

export const TRANSITION_STATES = ["active", "ending_soon", "offseason", "upcoming"] as const;
export type TransitionState = typeof TRANSITION_STATES[number];

export interface PhaseProgress {
  percentage: number;
  daysElapsed: number;
  totalDays: number;
  daysRemaining: number;
}

export interface SeasonProgress {
  overall: PhaseProgress;
  phase: PhaseProgress | null;
}

export interface SeasonStatus {
  sport: Sport;
  year: number;
  name: string;
  date: string;
  resolution: PhaseResolution;
  week?: number;
  milestone: NextMilestone;
  transition: TransitionState;
  progress: SeasonProgress;
}

export interface SeasonComparisonEntry {
  year: number;
  name: string;
  projected: boolean;
  progress: SeasonProgress;
}

export interface SeasonSpan {
  year: number;
  start: string;
  end: string;
  totalDays: number;
  // Days from the previous season's start; absent for the first season
  daysSincePreviousStart?: number;
}

export interface SeasonTrends {
  sport: Sport;
  seasonsAnalyzed: number;
  seasons: SeasonSpan[];
  // Both null with fewer than two seasons
  averageDaysBetweenStarts: number | null;
  consistency: "high" | "medium" | null;
}
