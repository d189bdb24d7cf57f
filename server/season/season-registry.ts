/**
 * Season Registry
 *
 * Process-wide store of season definitions keyed by (sport, year).
 *
 * The registry holds one immutable snapshot map. Writers build a new map and
 * swap the reference, so a reader always sees either the old or the new set
 * of seasons, never a half-applied reload.
 */

import type { SeasonDefinition } from "@shared/schema";
import type { Sport } from "@shared/sport-config";
import { InvalidSeasonConfig, SeasonNotFound } from "./errors";
import { containsDate, seasonStart } from "./season-definition";

type Snapshot = ReadonlyMap<string, SeasonDefinition>;

function seasonKey(sport: Sport, year: number): string {
  return `${sport}:${year}`;
}

export class SeasonRegistry {
  private snapshot: Snapshot = new Map();

  constructor(definitions: Iterable<SeasonDefinition> = []) {
    this.replaceAll(definitions);
  }

  /**
   * Add or replace one season. Copies the current snapshot, then swaps.
   */
  register(definition: SeasonDefinition): void {
    const next = new Map(this.snapshot);
    next.set(seasonKey(definition.sport, definition.year), definition);
    this.snapshot = next;
  }

  /**
   * Replace every registered season at once (used for configuration reload).
   */
  replaceAll(definitions: Iterable<SeasonDefinition>): void {
    const next = new Map<string, SeasonDefinition>();
    for (const definition of definitions) {
      const key = seasonKey(definition.sport, definition.year);
      if (next.has(key)) {
        throw new InvalidSeasonConfig(`Season ${definition.year} for ${definition.sport} is defined twice`);
      }
      next.set(key, definition);
    }
    this.snapshot = next;
  }

  get(sport: Sport, year: number): SeasonDefinition {
    const definition = this.find(sport, year);
    if (!definition) {
      throw new SeasonNotFound(sport, year);
    }
    return definition;
  }

  find(sport: Sport, year: number): SeasonDefinition | undefined {
    return this.snapshot.get(seasonKey(sport, year));
  }

  /**
   * All seasons of a sport, oldest first
   */
  seasons(sport: Sport): SeasonDefinition[] {
    return Array.from(this.snapshot.values())
      .filter(definition => definition.sport === sport)
      .sort((a, b) => a.year - b.year);
  }

  years(sport: Sport): number[] {
    return this.seasons(sport).map(definition => definition.year);
  }

  /**
   * Seasons of a sport with fromYear <= year <= toYear, oldest first
   */
  range(sport: Sport, fromYear: number, toYear: number): SeasonDefinition[] {
    return this.seasons(sport).filter(definition => definition.year >= fromYear && definition.year <= toYear);
  }

  /**
   * Closest registered season after `year` (not necessarily year + 1)
   */
  nextSeason(sport: Sport, year: number): SeasonDefinition | undefined {
    return this.seasons(sport).find(definition => definition.year > year);
  }

  previousSeason(sport: Sport, year: number): SeasonDefinition | undefined {
    return this.seasons(sport)
      .reverse()
      .find(definition => definition.year < year);
  }

  /**
   * The season a date belongs to: the one whose span contains it, otherwise
   * the latest season that started on or before it (its offseason), otherwise
   * the earliest registered season.
   */
  seasonForDate(sport: Sport, date: string): SeasonDefinition {
    const seasons = this.seasons(sport);
    if (seasons.length === 0) {
      throw new SeasonNotFound(sport);
    }

    const containing = seasons.find(definition => containsDate(definition, date));
    if (containing) {
      return containing;
    }

    const started = seasons.filter(definition => seasonStart(definition) <= date);
    return started.length > 0 ? started[started.length - 1] : seasons[0];
  }

  /**
   * Current snapshot; safe to hold on to, later writes never mutate it.
   */
  current(): Snapshot {
    return this.snapshot;
  }

  get size(): number {
    return this.snapshot.size;
  }
}

export const seasonRegistry = new SeasonRegistry();
