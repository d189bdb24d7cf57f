/**
 * Shared types for background jobs
 */

/**
 * Result of a job execution
 */
export interface JobResult {
  requestCount: number;
  recordsProcessed: number;
  errorCount: number;
}
