/**
 * BatchExecutionEngine
 *
 * Runs one job per input with at most `concurrency` jobs active at a time.
 *
 * Features:
 * - FIFO greedy dispatch: a freed slot immediately starts the next unstarted input
 * - Job isolation: a failed job becomes a Failure result and never touches its siblings
 * - Optional job-level retries for failures flagged retryable
 * - Usage of every completed model call, whether or not its job succeeded
 * - Per-job and batch wall-clock durations
 * - Join on every job before the report is folded
 */

import { ConcurrencyLimiter } from '../../utils/concurrency.js';
import { retryWithBackoff } from '../../utils/retry.js';
import { jobContext, logger } from '../../utils/logger.js';
import { CancelledError, describeCause, isPipelineError, JobErrorKind } from '../../types/errors.js';
import { summarizeUsage } from '../usage/UsageAggregator.js';
import type { UsageRecord } from '../usage/types.js';
import type { BatchProgress, BatchProgressCallback, BatchReport, JobFailure, JobResult, JobRunner } from './types.js';

/**
 * Configuration for the batch engine
 */
export interface BatchExecutionEngineConfig {
  /** Maximum number of concurrently active jobs */
  concurrency: number;
  runJob: JobRunner;
  /** Extra runs for a job whose failure is retryable (default: 0) */
  jobRetries?: number;
  /** Delay before the first job retry in milliseconds (default: 1000) */
  retryDelayMs?: number;
  onProgress?: BatchProgressCallback;
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
}

export interface BatchRunOptions {
  signal?: AbortSignal;
}

function toFailure(error: unknown, usage: UsageRecord[]): JobFailure {
  if (isPipelineError(error)) {
    return { status: 'failure', errorKind: error.kind, diagnostic: error.diagnostic, usage };
  }
  // Pipelines only throw PipelineErrors; anything else is reported against the model call stage
  return {
    status: 'failure',
    errorKind: JobErrorKind.GENERATION_ERROR,
    diagnostic: { message: 'Unexpected job failure', cause: describeCause(error), details: { unexpected: true } },
    usage,
  };
}

function usageOf(error: unknown): UsageRecord[] {
  return isPipelineError(error) ? error.usage : [];
}

function isRetryableJobError(error: unknown): boolean {
  return isPipelineError(error) && error.retryable;
}

export class BatchExecutionEngine {
  private readonly config: Required<Omit<BatchExecutionEngineConfig, 'onProgress'>>;
  private readonly onProgress?: BatchProgressCallback;

  constructor(config: BatchExecutionEngineConfig) {
    this.config = {
      concurrency: config.concurrency,
      runJob: config.runJob,
      jobRetries: config.jobRetries ?? 0,
      retryDelayMs: config.retryDelayMs ?? 1000,
      now: config.now ?? Date.now,
    };
    this.onProgress = config.onProgress;
  }

  /**
   * Run every input and fold the results into a report.
   * Never rejects because of a job failure.
   */
  async run(inputs: readonly string[], options: BatchRunOptions = {}): Promise<BatchReport> {
    const batchStart = this.config.now();
    const limiter = new ConcurrencyLimiter(this.config.concurrency);
    let completed = 0;

    logger.info({ total: inputs.length, concurrency: this.config.concurrency }, 'Batch started');

    const jobs = inputs.map((input, index) =>
      limiter.run(async () => {
        const result = await jobContext.run({ job: index + 1, file: input }, () => this.executeJob(input, options.signal));
        completed++;
        this.reportProgress({ completed, total: inputs.length, active: limiter.activeCount, result });
        return result;
      })
    );

    // Join: executeJob never rejects, so every slot resolves with a JobResult
    const perJob = await Promise.all(jobs);

    const usage = summarizeUsage(perJob.flatMap(job => job.outcome.usage));
    const succeeded = perJob.filter(job => job.outcome.status === 'success').length;

    const report: BatchReport = {
      total: perJob.length,
      succeeded,
      failed: perJob.length - succeeded,
      elapsedMs: this.config.now() - batchStart,
      perJob,
      usage,
    };

    logger.info(
      { total: report.total, succeeded: report.succeeded, failed: report.failed, elapsedMs: report.elapsedMs },
      'Batch finished'
    );
    return report;
  }

  private reportProgress(progress: BatchProgress): void {
    if (!this.onProgress) {
      return;
    }
    try {
      this.onProgress(progress);
    } catch (error) {
      logger.error({ error, file: progress.result.inputIdentifier }, 'Progress callback failed');
    }
  }

  private async executeJob(input: string, signal?: AbortSignal): Promise<JobResult> {
    const start = this.config.now();
    const usage: UsageRecord[] = [];
    let attempts = 0;

    try {
      const success = await retryWithBackoff(
        async () => {
          if (signal?.aborted) {
            throw new CancelledError('start');
          }
          attempts++;
          try {
            const attemptResult = await this.config.runJob(input, { signal, attempt: attempts });
            usage.push(...attemptResult.usage);
            return attemptResult;
          } catch (error) {
            usage.push(...usageOf(error));
            throw error;
          }
        },
        {
          maxAttempts: this.config.jobRetries,
          initialDelay: this.config.retryDelayMs,
          isRetryable: isRetryableJobError,
          signal,
        },
        `job ${input}`
      );

      const result: JobResult = {
        inputIdentifier: input,
        outcome: { status: 'success', artifacts: success.artifacts, usage },
        elapsedMs: this.config.now() - start,
        attempts,
      };
      return Object.freeze(result);
    } catch (error) {
      const failure = toFailure(error, usage);
      logger.warn({ file: input, kind: failure.errorKind, error: failure.diagnostic.message }, 'Job failed');
      const result: JobResult = {
        inputIdentifier: input,
        outcome: failure,
        elapsedMs: this.config.now() - start,
        attempts,
      };
      return Object.freeze(result);
    }
  }
}

/**
 * Process exit status for a finished batch: 0 iff no job failed
 */
export function exitCodeFor(report: BatchReport): number {
  return report.failed === 0 ? 0 : 1;
}

function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Human-readable run summary, printed whatever the outcome
 */
export function formatBatchSummary(report: BatchReport): string {
  const lines = [
    `Batch finished in ${formatSeconds(report.elapsedMs)}: ${report.total} total, ${report.succeeded} succeeded, ${report.failed} failed`,
  ];

  for (const job of report.perJob) {
    if (job.outcome.status === 'success') {
      lines.push(`  OK     ${job.inputIdentifier} (${formatSeconds(job.elapsedMs)})`);
    } else {
      lines.push(
        `  FAILED ${job.inputIdentifier} (${formatSeconds(job.elapsedMs)}) ${job.outcome.errorKind}: ${job.outcome.diagnostic.message}`
      );
    }
  }

  const { total, billedInputTokens, cacheHits, calls } = report.usage;
  lines.push(
    `Tokens: ${total.inputTokens} input (${total.cachedTokens} cached, ${billedInputTokens} billed), ` +
      `${total.outputTokens} output; ${cacheHits}/${calls} calls served from cache`
  );
  return lines.join('\n');
}
