import { config } from "../config";
import { reloadSeasons } from "../season/season-loader";
import { seasonRegistry } from "../season/season-registry";
import type { JobResult } from "./types";

/**
 * Re-read the seasons file so operator edits apply without a restart.
 * A bad file throws and the registry keeps serving the previous snapshot.
 */
export async function reloadSeasonCalendar(): Promise<JobResult> {
  const count = reloadSeasons(seasonRegistry, config.seasonsFile);
  return { requestCount: 0, recordsProcessed: count, errorCount: 0 };
}
