/**
 * Season Service
 *
 * Entry point for the HTTP and job layers: every query names the sport,
 * the season year and the date explicitly. Nothing here reads the clock.
 */

import type {
  Milestone,
  NextMilestone,
  PhaseResolution,
  SeasonComparisonEntry,
  SeasonDefinition,
  SeasonStatus,
  SeasonTrends,
  TransitionState,
} from "@shared/schema";
import { SPORTS, type Sport } from "@shared/sport-config";
import { InvalidSeasonConfig } from "./errors";
import { listMilestones, nextMilestone } from "./milestone-scanner";
import { resolvePhase } from "./phase-resolver";
import { seasonProgress } from "./season-progress";
import { seasonRegistry, type SeasonRegistry } from "./season-registry";
import { seasonTrends } from "./season-trends";
import { transitionState } from "./transition-detector";
import { weekOf } from "./week-calculator";

export class SeasonService {
  constructor(private registry: SeasonRegistry) {}

  resolve(sport: Sport, year: number, date: string): PhaseResolution {
    return resolvePhase(this.registry.get(sport, year), date);
  }

  weekOf(sport: Sport, year: number, date: string): number | undefined {
    return weekOf(this.registry.get(sport, year), date);
  }

  nextMilestone(sport: Sport, year: number, date: string): NextMilestone {
    return nextMilestone(this.registry.get(sport, year), date);
  }

  milestones(sport: Sport, year: number, date: string): Milestone[] {
    return listMilestones(this.registry.get(sport, year), date);
  }

  /**
   * Transition state against the season and the next registered one
   */
  transitionState(sport: Sport, year: number, date: string, thresholdDays: number): TransitionState {
    const current = this.registry.get(sport, year);
    return transitionState(current, this.registry.nextSeason(sport, year), date, thresholdDays);
  }

  registerSeason(sport: Sport, year: number, definition: SeasonDefinition): void {
    if (definition.sport !== sport || definition.year !== year) {
      throw new InvalidSeasonConfig(
        `Season definition for ${definition.sport} ${definition.year} cannot be registered as ${sport} ${year}`,
      );
    }
    this.registry.register(definition);
  }

  getSeason(sport: Sport, year: number): SeasonDefinition {
    return this.registry.get(sport, year);
  }

  listSeasons(sport: Sport): SeasonDefinition[] {
    return this.registry.seasons(sport);
  }

  currentSeasonYear(sport: Sport, date: string): number {
    return this.registry.seasonForDate(sport, date).year;
  }

  /**
   * Everything the presentation layers show for one sport on one date
   */
  seasonStatus(sport: Sport, year: number, date: string, thresholdDays: number): SeasonStatus {
    const definition = this.registry.get(sport, year);
    const resolution = resolvePhase(definition, date);
    const week = resolution.kind === "in-phase" ? resolution.week : undefined;

    return {
      sport,
      year,
      name: definition.name,
      date,
      resolution,
      ...(week === undefined ? {} : { week }),
      milestone: nextMilestone(definition, date),
      transition: transitionState(definition, this.registry.nextSeason(sport, year), date, thresholdDays),
      progress: seasonProgress(definition, date),
    };
  }

  /**
   * Status of every sport with registered seasons, each in the season the
   * date belongs to
   */
  overview(date: string, thresholdDays: number): SeasonStatus[] {
    return SPORTS.filter(sport => this.registry.seasons(sport).length > 0).map(sport =>
      this.seasonStatus(sport, this.currentSeasonYear(sport, date), date, thresholdDays),
    );
  }

  /**
   * Progress of every registered season of a sport on one date
   */
  comparison(sport: Sport, date: string): SeasonComparisonEntry[] {
    return this.registry.seasons(sport).map(definition => ({
      year: definition.year,
      name: definition.name,
      projected: definition.projected,
      progress: seasonProgress(definition, date),
    }));
  }

  trends(sport: Sport): SeasonTrends {
    return seasonTrends(sport, this.registry.seasons(sport));
  }
}

export const seasonService = new SeasonService(seasonRegistry);
