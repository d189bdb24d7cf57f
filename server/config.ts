/**
 * Centralized configuration. No other server module reads process.env.
 *
 * Environment Variables:
 *   PORT                        HTTP port (default 5000)
 *   SEASONS_FILE                Season calendar JSON (default data/seasons.json)
 *   SEASON_TIMEZONE             Reference timezone for "today" (default America/New_York)
 *   TRANSITION_THRESHOLD_DAYS   Days counted as "ending soon" / "upcoming" (default 14)
 *   SPORTSBLAZE_API_BASE        Upstream base URL (default https://api.sportsblaze.com/v1)
 *   SPORTSBLAZE_API_KEY         Upstream key shared by all sports
 *   <SPORT>_API_KEY             Per-sport key, e.g. WNBA_API_KEY; wins over the shared key
 *   UPSTREAM_CACHE_TTL_MS       Cache lifetime of upstream responses (default 60000)
 *   TRANSITION_MONITOR_ENABLED  "false" disables the hourly season transition job
 *   TRANSITION_WEBHOOK_URL      Optional URL that receives transition alerts
 */

import dotenv from "dotenv";
import path from "path";
import type { Sport } from "@shared/sport-config";

dotenv.config();

export interface Config {
  port: number;
  seasonsFile: string;
  seasonTimezone: string;
  transitionThresholdDays: number;
  sportsBlazeApiBase: string;
  upstreamCacheTtlMs: number;
  transitionMonitorEnabled: boolean;
  transitionWebhookUrl: string | undefined;
}

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return !isNaN(parsed) && parsed >= 0 ? parsed : fallback;
}

function getConfig(): Config {
  return {
    port: parseNonNegativeInt(process.env.PORT, 5000),
    seasonsFile: process.env.SEASONS_FILE || path.resolve(process.cwd(), "data", "seasons.json"),
    seasonTimezone: process.env.SEASON_TIMEZONE || "America/New_York",
    transitionThresholdDays: parseNonNegativeInt(process.env.TRANSITION_THRESHOLD_DAYS, 14),
    sportsBlazeApiBase: process.env.SPORTSBLAZE_API_BASE || "https://api.sportsblaze.com/v1",
    upstreamCacheTtlMs: parseNonNegativeInt(process.env.UPSTREAM_CACHE_TTL_MS, 60 * 1000),
    transitionMonitorEnabled: process.env.TRANSITION_MONITOR_ENABLED !== "false",
    transitionWebhookUrl: process.env.TRANSITION_WEBHOOK_URL || undefined,
  };
}

export let config = getConfig();

/**
 * Reload configuration from environment variables (tests modify process.env)
 */
export function reloadConfig(): void {
  config = getConfig();
}

/**
 * API key for a sport: `<SPORT>_API_KEY` first, then the shared key.
 * Read at call time so a rotated key applies without a restart.
 */
export function getApiKey(sport: Sport): string | undefined {
  return process.env[`${sport.toUpperCase()}_API_KEY`] || process.env.SPORTSBLAZE_API_KEY || undefined;
}

export function logConfigOnStartup(): void {
  console.log("[CONFIG] Seasons file:", config.seasonsFile);
  console.log("[CONFIG] Season timezone:", config.seasonTimezone);
  console.log("[CONFIG] Transition threshold:", `${config.transitionThresholdDays} days`);
  console.log("[CONFIG] Upstream:", config.sportsBlazeApiBase);
  console.log("[CONFIG] Shared API key:", process.env.SPORTSBLAZE_API_KEY ? "(set)" : "(not set)");
}
