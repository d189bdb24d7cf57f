/**
 * Season Definition
 *
 * Builds the immutable, validated phase list for one sport/year.
 * Every other season module assumes the invariants checked here:
 * - at least one phase, each with start <= end
 * - phases sorted ascending by start
 * - no two closed intervals intersect (contiguous phases are fine)
 * - each phase name appears once
 */

import {
  phaseIntervalInputSchema,
  type PhaseInterval,
  type PhaseIntervalInput,
  type SeasonDefinition,
} from "@shared/schema";
import { getSeasonDisplayName, isValidSport, type Sport } from "@shared/sport-config";
import { InvalidSeasonConfig } from "./errors";

export interface SeasonDefinitionInput {
  sport: Sport;
  year: number;
  name?: string;
  projected?: boolean;
  phases: readonly PhaseIntervalInput[];
}

export function createSeasonDefinition(input: SeasonDefinitionInput): SeasonDefinition {
  const { sport, year } = input;
  const label = `${sport} ${year}`;

  if (!isValidSport(sport)) {
    throw new InvalidSeasonConfig(`Unknown sport: ${sport}`);
  }
  if (!Number.isInteger(year)) {
    throw new InvalidSeasonConfig(`Season year must be an integer, got ${year}`);
  }
  if (input.phases.length === 0) {
    throw new InvalidSeasonConfig(`${label}: a season needs at least one phase`);
  }

  const phases: PhaseInterval[] = input.phases.map((raw, index) => {
    const parsed = phaseIntervalInputSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidSeasonConfig(
        `${label}: phase #${index + 1} is invalid (${issue.path.join(".")}: ${issue.message})`,
      );
    }
    const phase = parsed.data;
    if (phase.start > phase.end) {
      throw new InvalidSeasonConfig(
        `${label}: ${phase.name} starts ${phase.start} after it ends ${phase.end}`,
      );
    }
    return Object.freeze({
      name: phase.name,
      start: phase.start,
      end: phase.end,
      weekNumbered: phase.weekNumbered,
    });
  });

  const seen = new Set<string>();
  for (let i = 0; i < phases.length; i++) {
    const phase = phases[i];
    if (seen.has(phase.name)) {
      throw new InvalidSeasonConfig(`${label}: phase ${phase.name} is defined twice`);
    }
    seen.add(phase.name);

    if (i === 0) continue;
    const previous = phases[i - 1];
    if (phase.start < previous.start) {
      throw new InvalidSeasonConfig(
        `${label}: phases are out of order (${phase.name} ${phase.start} listed after ${previous.name} ${previous.start})`,
      );
    }
    if (phase.start <= previous.end) {
      throw new InvalidSeasonConfig(
        `${label}: ${previous.name} (${previous.start}..${previous.end}) overlaps ${phase.name} (${phase.start}..${phase.end})`,
      );
    }
  }

  return Object.freeze({
    sport,
    year,
    name: input.name ?? getSeasonDisplayName(sport, year),
    projected: input.projected ?? false,
    phases: Object.freeze(phases),
  });
}

export function firstPhase(definition: SeasonDefinition): PhaseInterval {
  return definition.phases[0];
}

export function lastPhase(definition: SeasonDefinition): PhaseInterval {
  return definition.phases[definition.phases.length - 1];
}

export function seasonStart(definition: SeasonDefinition): string {
  return firstPhase(definition).start;
}

export function seasonEnd(definition: SeasonDefinition): string {
  return lastPhase(definition).end;
}

export function containsDate(definition: SeasonDefinition, date: string): boolean {
  return seasonStart(definition) <= date && date <= seasonEnd(definition);
}

/**
 * Index of the last phase starting on or before `date`, or -1 when the date
 * precedes the season. Binary search; phases are sorted by start.
 */
export function findPhaseIndex(definition: SeasonDefinition, date: string): number {
  const { phases } = definition;
  if (date < phases[0].start) {
    return -1;
  }
  let low = 0;
  let high = phases.length - 1;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (phases[mid].start <= date) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low;
}
