/**
 * Season Loader
 *
 * Reads the season calendar file, validates it and fills the registry.
 *
 * File format:
 * {
 *   "seasons": {
 *     "wnba": {
 *       "2025": {
 *         "name": "WNBA 2025",
 *         "phases": [
 *           { "name": "pre-season", "start": "2025-05-02", "end": "2025-05-15", "weekNumbered": true },
 *           ...
 *         ]
 *       }
 *     }
 *   },
 *   "settings": { "projectAhead": 1 }
 * }
 */

import fs from "fs";
import { seasonsFileSchema, type SeasonDefinition } from "@shared/schema";
import { isValidSport } from "@shared/sport-config";
import { InvalidSeasonConfig } from "./errors";
import { createSeasonDefinition } from "./season-definition";
import { projectSeasons } from "./season-projection";
import type { SeasonRegistry } from "./season-registry";

const YEAR_PATTERN = /^\d{4}$/;

/**
 * Turn parsed JSON into validated season definitions.
 * Any invalid entry fails the whole file.
 */
export function parseSeasonsFile(raw: unknown): SeasonDefinition[] {
  const parsed = seasonsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidSeasonConfig(`Invalid seasons file at ${issue.path.join(".") || "(root)"}: ${issue.message}`);
  }

  const { seasons, settings } = parsed.data;
  const definitions: SeasonDefinition[] = [];

  for (const [sport, years] of Object.entries(seasons)) {
    if (!isValidSport(sport)) {
      throw new InvalidSeasonConfig(`Unknown sport in seasons file: ${sport}`);
    }

    const listed: SeasonDefinition[] = [];
    for (const [yearKey, entry] of Object.entries(years)) {
      if (!YEAR_PATTERN.test(yearKey)) {
        throw new InvalidSeasonConfig(`Invalid season year for ${sport}: ${yearKey}`);
      }
      listed.push(
        createSeasonDefinition({
          sport,
          year: parseInt(yearKey, 10),
          name: entry.name,
          phases: entry.phases,
        }),
      );
    }

    listed.sort((a, b) => a.year - b.year);
    definitions.push(...listed);

    const latest = listed[listed.length - 1];
    if (latest && settings.projectAhead > 0) {
      definitions.push(...projectSeasons(latest, settings.projectAhead));
    }
  }

  return definitions;
}

export function loadSeasonsFile(filePath: string): SeasonDefinition[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidSeasonConfig(`Could not read seasons file ${filePath}: ${reason}`);
  }
  return parseSeasonsFile(raw);
}

/**
 * Load the file and swap it into the registry in one step.
 * On failure the registry keeps its previous snapshot and the error propagates.
 */
export function reloadSeasons(registry: SeasonRegistry, filePath: string): number {
  const definitions = loadSeasonsFile(filePath);
  registry.replaceAll(definitions);
  console.log(`[SeasonLoader] Loaded ${definitions.length} seasons from ${filePath}`);
  return definitions.length;
}
