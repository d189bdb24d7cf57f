/**
 * Cron Job Scheduler
 *
 * Runs the season calendar jobs: the transition monitor and the periodic
 * reload of the seasons file. Schedules are evaluated in the season
 * reference timezone.
 */

import * as cron from "node-cron";
import { config } from "../config";
import { checkSeasonTransitions } from "./season-transitions";
import { reloadSeasonCalendar } from "./reload-seasons";
import type { JobResult } from "./types";

export interface JobConfig {
  name: string;
  schedule: string; // Cron expression
  enabled: boolean;
  handler: () => Promise<JobResult>;
}

export class JobScheduler {
  private jobs: Map<string, cron.ScheduledTask> = new Map();
  private handlers: Map<string, () => Promise<JobResult>> = new Map();
  private running = new Set<string>();

  /**
   * Helper method to schedule a job
   */
  private scheduleJob(jobConfig: JobConfig) {
    if (!jobConfig.enabled) {
      console.log(`Job ${jobConfig.name} is disabled, skipping...`);
      return;
    }

    const task = cron.schedule(
      jobConfig.schedule,
      async () => {
        console.log(`[${jobConfig.name}] Starting scheduled run...`);
        try {
          await this.runJob(jobConfig.name, jobConfig.handler);
        } catch (error) {
          console.error(`[${jobConfig.name}] Failed:`, error instanceof Error ? error.message : error);
        }
      },
      {
        scheduled: false,
        timezone: config.seasonTimezone,
      }
    );

    this.jobs.set(jobConfig.name, task);
    this.handlers.set(jobConfig.name, jobConfig.handler);
    console.log(`Job ${jobConfig.name} scheduled: ${jobConfig.schedule}`);
  }

  private async runJob(name: string, handler: () => Promise<JobResult>): Promise<JobResult> {
    const result = await handler();
    if (result.errorCount > 0) {
      console.warn(`[${name}] Completed with errors - ${result.recordsProcessed} records processed, ${result.errorCount} failed, ${result.requestCount} requests`);
    } else {
      console.log(`[${name}] Completed successfully - ${result.recordsProcessed} records, ${result.requestCount} requests`);
    }
    return result;
  }

  /**
   * Register the season jobs
   */
  initializeSeasonJobs() {
    console.log("Initializing season jobs...");

    const seasonJobs: JobConfig[] = [
      {
        name: "season_transitions",
        schedule: "0 * * * *", // Every hour
        enabled: config.transitionMonitorEnabled,
        handler: checkSeasonTransitions,
      },
      {
        name: "reload_seasons",
        schedule: "*/15 * * * *", // Every 15 minutes - pick up edits to the seasons file
        enabled: true,
        handler: reloadSeasonCalendar,
      },
    ];

    for (const jobConfig of seasonJobs) {
      this.scheduleJob(jobConfig);
    }

    console.log("Season jobs initialized successfully");
  }

  /**
   * Start all scheduled jobs
   */
  start() {
    if (this.jobs.size === 0) {
      console.log("No jobs to start - initialize jobs first");
      return;
    }

    console.log("Starting all cron jobs...");
    Array.from(this.jobs.entries()).forEach(([name, task]) => {
      task.start();
      this.running.add(name);
      console.log(`Job ${name} started`);
    });
  }

  /**
   * Stop all scheduled jobs
   */
  stop() {
    console.log("Stopping all cron jobs...");
    Array.from(this.jobs.entries()).forEach(([name, task]) => {
      task.stop();
      this.running.delete(name);
      console.log(`Job ${name} stopped`);
    });
  }

  /**
   * Manually trigger a job (for admin purposes)
   */
  async triggerJob(jobName: string): Promise<JobResult> {
    const handler = this.handlers.get(jobName);
    if (!handler) {
      throw new Error(`Unknown job: ${jobName}`);
    }

    console.log(`[${jobName}] Manual trigger started...`);
    try {
      return await this.runJob(jobName, handler);
    } catch (error) {
      console.error(`[${jobName}] Manual trigger failed:`, error instanceof Error ? error.message : error);
      throw error;
    }
  }

  /**
   * Get status of all jobs
   */
  getStatus(): Array<{ name: string; running: boolean }> {
    return Array.from(this.jobs.keys()).map(name => ({
      name,
      running: this.running.has(name),
    }));
  }
}

// Global scheduler instance
export const jobScheduler = new JobScheduler();
