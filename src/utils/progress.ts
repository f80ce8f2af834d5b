/**
 * Progress tracking for batch runs
 *
 * Counts processed codebases, estimates the remaining time from the average
 * time per codebase and logs a final report.
 */

import { logger } from '@utils/logger';

export type BatchStage = 'starting' | 'metadata' | 'server' | 'database' | 'api' | 'dependencies' | 'commit' | 'done';

export interface BatchStats {
  codebases_total: number;
  codebases_processed: number;
  codebases_failed: number;
  commits_failed: number;
  current_codebase: string | null;
  stage: BatchStage;
  total_time_ms: number;
  avg_codebase_time_ms: number;
  errors: Array<{ codebase: string; error: string }>;
}

/**
 * Progress tracker for batch operations
 */
export class ProgressTracker {
  private stats: BatchStats;
  private startTime = 0;

  constructor() {
    this.stats = this.createInitialStats();
  }

  /**
   * Start tracking a batch
   *
   * @param totalCodebases - Number of codebases in the batch
   */
  public start = (totalCodebases: number): void => {
    this.stats = this.createInitialStats();
    this.startTime = Date.now();
    this.stats.codebases_total = totalCodebases;

    logger.info('Batch started', { total_codebases: totalCodebases });
  };

  /**
   * Mark the codebase now being processed
   */
  public begin = (codebase: string): void => {
    this.stats.current_codebase = codebase;
    this.stats.stage = 'starting';
  };

  public setStage = (stage: BatchStage): void => {
    this.stats.stage = stage;
    logger.debug('Stage changed', { codebase: this.stats.current_codebase, stage });
  };

  /**
   * Record a finished codebase and log progress
   *
   * @param error - Failure message when the codebase did not complete
   */
  public finish = (codebase: string, error?: string): void => {
    this.stats.codebases_processed++;
    this.stats.stage = 'done';
    if (error !== undefined) {
      this.stats.codebases_failed++;
      this.stats.errors.push({ codebase, error });
    }
    this.logProgress(codebase);
  };

  public recordCommitFailure = (codebase: string, message: string): void => {
    this.stats.commits_failed++;
    this.stats.errors.push({ codebase, error: `commit: ${message}` });
  };

  /**
   * @returns Snapshot of the current statistics
   */
  public getStats = (): BatchStats => {
    this.stats.total_time_ms = this.startTime === 0 ? 0 : Date.now() - this.startTime;
    if (this.stats.codebases_processed > 0) {
      this.stats.avg_codebase_time_ms = this.stats.total_time_ms / this.stats.codebases_processed;
    }
    return { ...this.stats, errors: [...this.stats.errors] };
  };

  /**
   * Format: "[codebase] X/Y (Z%) - ETA: Nm Ss"
   */
  private logProgress = (codebase: string): void => {
    const percentage = this.calculatePercentage();
    const eta = this.calculateETA();

    logger.info(
      `[${codebase}] ${String(this.stats.codebases_processed)}/${String(this.stats.codebases_total)} (${String(percentage)}%) - ETA: ${eta}`,
      {
        processed: this.stats.codebases_processed,
        failed: this.stats.codebases_failed,
        total: this.stats.codebases_total,
      }
    );
  };

  private calculatePercentage = (): number => {
    if (this.stats.codebases_total === 0) return 0;

    return Math.round((this.stats.codebases_processed / this.stats.codebases_total) * 100);
  };

  private calculateETA = (): string => {
    if (this.stats.codebases_processed === 0) {
      return 'calculating...';
    }

    const elapsed = Date.now() - this.startTime;
    const remaining = this.stats.codebases_total - this.stats.codebases_processed;

    return formatDuration(remaining * (elapsed / this.stats.codebases_processed));
  };

  private createInitialStats = (): BatchStats => ({
    codebases_total: 0,
    codebases_processed: 0,
    codebases_failed: 0,
    commits_failed: 0,
    current_codebase: null,
    stage: 'starting',
    total_time_ms: 0,
    avg_codebase_time_ms: 0,
    errors: [],
  });

  /**
   * Log the final batch report
   */
  public logFinalReport = (): void => {
    const stats = this.getStats();
    const succeeded = stats.codebases_processed - stats.codebases_failed;

    logger.info('Batch complete', {
      summary: {
        codebases: `${String(stats.codebases_processed)}/${String(stats.codebases_total)}`,
        failed: stats.codebases_failed,
        success_rate:
          stats.codebases_processed > 0
            ? `${String(Math.round((succeeded / stats.codebases_processed) * 100))}%`
            : 'n/a',
      },
      commits_failed: stats.commits_failed,
      performance: {
        avg_codebase_time_ms: Math.round(stats.avg_codebase_time_ms),
        total_time: formatDuration(stats.total_time_ms),
      },
      errors: {
        count: stats.errors.length,
        sample: stats.errors.slice(0, 5),
      },
    });
  };
}

/**
 * Format a duration in milliseconds (e.g. "2m 35s", "45s", "1h 5m")
 */
export const formatDuration = (ms: number): string => {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${String(hours)}h ${String(minutes % 60)}m`;
  }

  if (minutes > 0) {
    return `${String(minutes)}m ${String(seconds % 60)}s`;
  }

  return `${String(seconds)}s`;
};

export const createProgressTracker = (): ProgressTracker => {
  return new ProgressTracker();
};
