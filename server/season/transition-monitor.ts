/**
 * Season Transition Monitor
 *
 * Remembers each sport's (season, phase, week) between checks and reports
 * what changed: a new season, a new phase, or a new week inside a phase.
 */

import axios from "axios";
import { SPORTS, getSportConfig, type Sport } from "@shared/sport-config";
import { describeResolution } from "./phase-resolver";
import type { SeasonService } from "./season-service";

export interface SeasonSnapshot {
  year: number;
  phase: string;
  week?: number;
}

export type SeasonTransition =
  | { sport: Sport; type: "season_change"; from: number; to: number }
  | { sport: Sport; type: "phase_change"; year: number; from: string; to: string }
  | { sport: Sport; type: "week_change"; year: number; phase: string; from: number | undefined; to: number };

export interface TransitionAlert {
  id: string;
  date: string;
  transition: SeasonTransition;
  message: string;
  // Callbacks that threw or rejected for this alert
  failedCallbacks: number;
}

export type TransitionCallback = (alert: TransitionAlert) => void | Promise<void>;

/**
 * Compare two snapshots of one sport. At most one transition is reported:
 * a season change hides the phase change that comes with it, and a phase
 * change hides the week reset.
 */
export function detectTransition(
  sport: Sport,
  previous: SeasonSnapshot,
  current: SeasonSnapshot,
): SeasonTransition | null {
  if (previous.year !== current.year) {
    return { sport, type: "season_change", from: previous.year, to: current.year };
  }
  if (previous.phase !== current.phase) {
    return { sport, type: "phase_change", year: current.year, from: previous.phase, to: current.phase };
  }
  if (current.week !== undefined && previous.week !== current.week) {
    return { sport, type: "week_change", year: current.year, phase: current.phase, from: previous.week, to: current.week };
  }
  return null;
}

export function formatTransitionMessage(transition: SeasonTransition): string {
  const sport = getSportConfig(transition.sport).name;
  switch (transition.type) {
    case "season_change":
      return `${sport} SEASON TRANSITION: ${transition.from} → ${transition.to}`;
    case "phase_change":
      return `${sport} PHASE CHANGE: ${transition.from} → ${transition.to} (Season ${transition.year})`;
    case "week_change":
      return `${sport} WEEK ${transition.from ?? "-"} → ${transition.to} (${transition.phase}, Season ${transition.year})`;
  }
}

export class SeasonTransitionMonitor {
  private lastStates = new Map<Sport, SeasonSnapshot>();
  private callbacks: TransitionCallback[] = [];
  private history: TransitionAlert[] = [];
  private sequence = 0;

  constructor(
    private service: SeasonService,
    private sports: readonly Sport[] = SPORTS,
    private historyLimit = 100,
  ) {}

  onTransition(callback: TransitionCallback): void {
    this.callbacks.push(callback);
  }

  /**
   * Snapshot of a sport on `date`, or null when it has no registered seasons
   */
  snapshot(sport: Sport, date: string): SeasonSnapshot | null {
    if (this.service.listSeasons(sport).length === 0) {
      return null;
    }
    const year = this.service.currentSeasonYear(sport, date);
    const resolution = this.service.resolve(sport, year, date);
    return {
      year,
      phase: describeResolution(resolution),
      ...(resolution.kind === "in-phase" && resolution.week !== undefined ? { week: resolution.week } : {}),
    };
  }

  /**
   * Take new snapshots for `date` and alert on every change since the last
   * check. The first check for a sport only records its state.
   */
  async check(date: string): Promise<TransitionAlert[]> {
    const alerts: TransitionAlert[] = [];

    for (const sport of this.sports) {
      const current = this.snapshot(sport, date);
      if (!current) continue;

      const previous = this.lastStates.get(sport);
      this.lastStates.set(sport, current);
      if (!previous) continue;

      const transition = detectTransition(sport, previous, current);
      if (transition) {
        alerts.push(await this.alert(transition, date));
      }
    }

    return alerts;
  }

  getHistory(limit?: number): TransitionAlert[] {
    return limit ? this.history.slice(-limit) : [...this.history];
  }

  /**
   * Record an alert and hand it to every callback. A failing callback is
   * logged, counted on the alert, and does not stop the others.
   */
  private async alert(transition: SeasonTransition, date: string): Promise<TransitionAlert> {
    this.sequence += 1;
    const alert: TransitionAlert = {
      id: `${transition.sport}_${transition.type}_${date}_${this.sequence}`,
      date,
      transition,
      message: formatTransitionMessage(transition),
      failedCallbacks: 0,
    };

    this.history.push(alert);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }

    for (const callback of this.callbacks) {
      try {
        await callback(alert);
      } catch (error) {
        alert.failedCallbacks += 1;
        console.error(`[TransitionMonitor] Callback failed for ${alert.id}:`, error instanceof Error ? error.message : error);
      }
    }

    return alert;
  }
}

export function logAlert(alert: TransitionAlert): void {
  console.log(`[TransitionMonitor] ${alert.message}`);
}

/**
 * Callback that POSTs each alert as JSON to a webhook
 */
export function webhookAlert(webhookUrl: string): TransitionCallback {
  return async alert => {
    await axios.post(
      webhookUrl,
      { text: alert.message, date: alert.date, transition: alert.transition },
      { timeout: 5000 },
    );
  };
}
