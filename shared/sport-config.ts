/**
 * Sport Configuration
 *
 * Central configuration for all sports the relay serves.
 * This file defines sport-specific settings like display names,
 * season naming, upstream API paths and how game periods are counted.
 */

export const SPORTS = ["wnba", "nba", "nhl", "mlb", "nfl"] as const;
export type Sport = typeof SPORTS[number];

export interface SportConfig {
    name: string;
    fullName: string;
    emoji: string;
    /** Path segment of the sport on the upstream API */
    apiPath: string;
    /** Season runs across New Year (e.g., NBA 2025-26) */
    spansCalendarYears: boolean;
    /** Periods in a regulation game; later periods are overtime / extra innings */
    regulationPeriods: number;
    /** "overtime" for clock sports, "innings" for baseball */
    extraPeriodStyle: "overtime" | "innings";
}

export const SPORT_CONFIGS: Record<Sport, SportConfig> = {
    wnba: {
        name: "WNBA",
        fullName: "Women's National Basketball Association",
        emoji: "🏀",
        apiPath: "wnba",
        spansCalendarYears: false,
        regulationPeriods: 4,
        extraPeriodStyle: "overtime",
    },
    nba: {
        name: "NBA",
        fullName: "National Basketball Association",
        emoji: "🏀",
        apiPath: "nba",
        spansCalendarYears: true,
        regulationPeriods: 4,
        extraPeriodStyle: "overtime",
    },
    nhl: {
        name: "NHL",
        fullName: "National Hockey League",
        emoji: "🏒",
        apiPath: "nhl",
        spansCalendarYears: true,
        regulationPeriods: 3,
        extraPeriodStyle: "overtime",
    },
    mlb: {
        name: "MLB",
        fullName: "Major League Baseball",
        emoji: "⚾",
        apiPath: "mlb",
        spansCalendarYears: false,
        regulationPeriods: 9,
        extraPeriodStyle: "innings",
    },
    nfl: {
        name: "NFL",
        fullName: "National Football League",
        emoji: "🏈",
        apiPath: "nfl",
        spansCalendarYears: true,
        regulationPeriods: 4,
        extraPeriodStyle: "overtime",
    },
};

/**
 * Get sport config by sport name
 */
export function getSportConfig(sport: Sport): SportConfig {
    return SPORT_CONFIGS[sport];
}

/**
 * Check if a string is a valid sport
 */
export function isValidSport(sport: string): sport is Sport {
    return SPORTS.some(s => s === sport);
}

/**
 * Display name of a season, e.g. "NBA 2025-26" or "WNBA 2025"
 */
export function getSeasonDisplayName(sport: Sport, year: number): string {
    const config = SPORT_CONFIGS[sport];
    if (!config.spansCalendarYears) {
        return `${config.name} ${year}`;
    }
    const nextYearSuffix = String((year + 1) % 100).padStart(2, "0");
    return `${config.name} ${year}-${nextYearSuffix}`;
}
