import type { SeasonDefinition } from "@shared/schema";
import { createSeasonDefinition } from "./season-definition";
import { projectSeason } from "./season-projection";

// WNBA 2025 as published: pre-season, regular season, a two-day gap, playoffs
export const wnba2025: SeasonDefinition = createSeasonDefinition({
  sport: "wnba",
  year: 2025,
  phases: [
    { name: "pre-season", start: "2025-05-02", end: "2025-05-15" },
    { name: "regular-season", start: "2025-05-16", end: "2025-09-11" },
    { name: "playoffs", start: "2025-09-14", end: "2025-10-19" },
  ],
});

// Same calendar one year later (pre-season opens 2026-05-02)
export const wnba2026: SeasonDefinition = projectSeason(wnba2025, 2026);

export const nba2025: SeasonDefinition = createSeasonDefinition({
  sport: "nba",
  year: 2025,
  phases: [
    { name: "pre-season", start: "2025-10-01", end: "2025-10-20" },
    { name: "regular-season", start: "2025-10-21", end: "2026-02-12" },
    { name: "all-star-break", start: "2026-02-13", end: "2026-02-18", weekNumbered: false },
    { name: "playoffs", start: "2026-04-19", end: "2026-06-23" },
  ],
});
