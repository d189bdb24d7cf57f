/**
 * Season Transition Job
 *
 * Checks every sport's current season, phase and week for today (in the
 * reference timezone) and alerts on changes since the previous run.
 */

import { config } from "../config";
import { getToday } from "../lib/time";
import { seasonService } from "../season/season-service";
import { SeasonTransitionMonitor, logAlert, webhookAlert, type TransitionAlert } from "../season/transition-monitor";
import type { JobResult } from "./types";

export const transitionMonitor = new SeasonTransitionMonitor(seasonService);
transitionMonitor.onTransition(logAlert);
if (config.transitionWebhookUrl) {
  transitionMonitor.onTransition(webhookAlert(config.transitionWebhookUrl));
}

/**
 * One webhook request per alert when a webhook is configured; every failed
 * callback counts as an error.
 */
export function transitionJobResult(alerts: TransitionAlert[], webhookConfigured: boolean): JobResult {
  return {
    requestCount: webhookConfigured ? alerts.length : 0,
    recordsProcessed: alerts.length,
    errorCount: alerts.reduce((sum, alert) => sum + alert.failedCallbacks, 0),
  };
}

export async function checkSeasonTransitions(): Promise<JobResult> {
  const today = getToday(config.seasonTimezone);
  const alerts = await transitionMonitor.check(today);
  console.log(`[season_transitions] ${today}: ${alerts.length} transition(s)`);
  return transitionJobResult(alerts, Boolean(config.transitionWebhookUrl));
}
