import { describe, it, expect, vi } from 'vitest';
import { BatchExecutionEngine, exitCodeFor, formatBatchSummary } from '../BatchExecutionEngine.js';
import type { BatchProgress, BatchReport, JobRunner } from '../types.js';
import type { ArtifactPaths } from '../../../artifacts/OutputArtifactWriter.js';
import type { UsageRecord } from '../../usage/types.js';
import { summarizeUsage } from '../../usage/UsageAggregator.js';
import { ExtractionParseError, JobErrorKind, RemoteTimeoutError, SurveyParseError, UploadError } from '../../../types/errors.js';

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

function artifactsFor(input: string): ArtifactPaths {
  return {
    questions: `out/questions/${input}.json`,
    survey: `out/surveys/${input}.json`,
    html: `out/html/${input}.html`,
    response: `out/responses/${input}.txt`,
  };
}

function usageFor(input: string): UsageRecord[] {
  return [
    {
      stage: 'extraction',
      counters: { inputTokens: 10, outputTokens: 5, cachedTokens: 0, totalTokens: 15 },
      fromCache: false,
      inputIdentifier: input,
    },
  ];
}

const succeed: JobRunner = async input => ({ artifacts: artifactsFor(input), usage: usageFor(input) });

describe('BatchExecutionEngine', () => {
  it('never runs more jobs than the concurrency limit and keeps input order', async () => {
    let active = 0;
    let maxActive = 0;
    const started: string[] = [];
    const engine = new BatchExecutionEngine({
      concurrency: 2,
      runJob: async input => {
        started.push(input);
        active++;
        maxActive = Math.max(maxActive, active);
        await delay(input === 'a' ? 15 : 5);
        active--;
        return succeed(input, { attempt: 1 });
      },
    });

    const report = await engine.run(['a', 'b', 'c', 'd', 'e', 'f']);

    expect(maxActive).toBe(2);
    expect(started).toEqual(['a', 'b', 'c', 'd', 'e', 'f']);
    expect(report.perJob.map(job => job.inputIdentifier)).toEqual(['a', 'b', 'c', 'd', 'e', 'f']);
    expect(report).toMatchObject({ total: 6, succeeded: 6, failed: 0 });
    expect(exitCodeFor(report)).toBe(0);
  });

  it('isolates a failed job from its siblings', async () => {
    const engine = new BatchExecutionEngine({
      concurrency: 2,
      runJob: async input => {
        if (input === 'b.pdf') {
          throw new UploadError('Cannot read b.pdf');
        }
        return succeed(input, { attempt: 1 });
      },
    });

    const report = await engine.run(['a.pdf', 'b.pdf', 'c.pdf']);

    expect(report).toMatchObject({ total: 3, succeeded: 2, failed: 1 });
    expect(report.perJob[1].outcome).toEqual({
      status: 'failure',
      errorKind: JobErrorKind.UPLOAD_ERROR,
      diagnostic: { message: 'Cannot read b.pdf', cause: undefined },
      usage: [],
    });
    expect(report.perJob[0].outcome.status).toBe('success');
    expect(report.perJob[2].outcome.status).toBe('success');
    expect(exitCodeFor(report)).toBe(1);
  });

  it('reports unexpected errors as generation failures', async () => {
    const engine = new BatchExecutionEngine({
      concurrency: 1,
      runJob: () => Promise.reject(new TypeError('undefined is not a function')),
    });

    const report = await engine.run(['a.pdf']);

    expect(report.perJob[0].outcome).toEqual({
      status: 'failure',
      errorKind: JobErrorKind.GENERATION_ERROR,
      diagnostic: {
        message: 'Unexpected job failure',
        cause: 'undefined is not a function',
        details: { unexpected: true },
      },
      usage: [],
    });
  });

  it('returns an empty report for no inputs', async () => {
    const runJob = vi.fn(succeed);
    const engine = new BatchExecutionEngine({ concurrency: 4, runJob });

    const report = await engine.run([]);

    expect(report).toMatchObject({ total: 0, succeeded: 0, failed: 0, perJob: [] });
    expect(report.usage.calls).toBe(0);
    expect(runJob).not.toHaveBeenCalled();
    expect(exitCodeFor(report)).toBe(0);
  });

  it('counts the calls of failed jobs in the batch usage', async () => {
    const engine = new BatchExecutionEngine({
      concurrency: 2,
      runJob: async input => {
        if (input === 'bad') {
          const error = new SurveyParseError('No fenced JSON block in the survey response', 'no fence here');
          error.usage = usageFor(input);
          throw error;
        }
        return succeed(input, { attempt: 1 });
      },
    });

    const report = await engine.run(['one', 'bad', 'two']);

    expect(report.perJob[1].outcome).toMatchObject({ status: 'failure', usage: usageFor('bad') });
    expect(report.usage.total).toEqual({ inputTokens: 30, outputTokens: 15, cachedTokens: 0, totalTokens: 45 });
    expect(report.usage.calls).toBe(3);
  });

  describe('job retries', () => {
    it('reruns a job whose failure is retryable', async () => {
      const runJob = vi.fn<Parameters<JobRunner>, ReturnType<JobRunner>>()
        .mockRejectedValueOnce(new RemoteTimeoutError('generateContent', 1000))
        .mockImplementation(succeed);
      const engine = new BatchExecutionEngine({ concurrency: 1, runJob, jobRetries: 1, retryDelayMs: 1 });

      const report = await engine.run(['a.pdf']);

      expect(report.perJob[0]).toMatchObject({ attempts: 2, outcome: { status: 'success' } });
      expect(runJob.mock.calls.map(([, context]) => context.attempt)).toEqual([1, 2]);
    });

    it('keeps the usage of attempts that failed before a retry succeeded', async () => {
      const timeout = new RemoteTimeoutError('generateContent', 1000);
      timeout.usage = usageFor('a.pdf');
      const runJob = vi.fn<Parameters<JobRunner>, ReturnType<JobRunner>>()
        .mockRejectedValueOnce(timeout)
        .mockImplementation(succeed);
      const engine = new BatchExecutionEngine({ concurrency: 1, runJob, jobRetries: 1, retryDelayMs: 1 });

      const report = await engine.run(['a.pdf']);

      expect(report.perJob[0].outcome).toMatchObject({ status: 'success', usage: [...usageFor('a.pdf'), ...usageFor('a.pdf')] });
      expect(report.usage.calls).toBe(2);
    });

    it('does not retry by default', async () => {
      const runJob = vi.fn<Parameters<JobRunner>, ReturnType<JobRunner>>()
        .mockRejectedValue(new RemoteTimeoutError('generateContent', 1000));
      const engine = new BatchExecutionEngine({ concurrency: 1, runJob });

      const report = await engine.run(['a.pdf']);

      expect(report.perJob[0]).toMatchObject({
        attempts: 1,
        outcome: { status: 'failure', errorKind: JobErrorKind.REMOTE_TIMEOUT },
      });
    });

    it('does not retry failures that are not retryable', async () => {
      const runJob = vi.fn<Parameters<JobRunner>, ReturnType<JobRunner>>()
        .mockRejectedValue(new ExtractionParseError('Extraction response is not a list of questions', '{}'));
      const engine = new BatchExecutionEngine({ concurrency: 1, runJob, jobRetries: 3, retryDelayMs: 1 });

      const report = await engine.run(['a.pdf']);

      expect(report.perJob[0].attempts).toBe(1);
      expect(runJob).toHaveBeenCalledTimes(1);
    });
  });

  it('reports progress once per finished job', async () => {
    const progress: BatchProgress[] = [];
    const engine = new BatchExecutionEngine({ concurrency: 2, runJob: succeed, onProgress: p => progress.push(p) });

    await engine.run(['a', 'b', 'c']);

    expect(progress.map(p => [p.completed, p.total])).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
  });

  it('finishes the batch when the progress callback throws', async () => {
    const engine = new BatchExecutionEngine({
      concurrency: 2,
      runJob: succeed,
      onProgress: () => {
        throw new Error('terminal closed');
      },
    });

    const report = await engine.run(['a', 'b', 'c']);

    expect(report).toMatchObject({ total: 3, succeeded: 3, failed: 0 });
  });

  it('cancels jobs that have not started once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const runJob = vi.fn(succeed);
    const engine = new BatchExecutionEngine({ concurrency: 2, runJob });

    const report = await engine.run(['a', 'b'], { signal: controller.signal });

    expect(runJob).not.toHaveBeenCalled();
    expect(report.perJob.map(job => job.outcome.status === 'failure' && job.outcome.errorKind)).toEqual([
      JobErrorKind.CANCELLED,
      JobErrorKind.CANCELLED,
    ]);
    expect(exitCodeFor(report)).toBe(1);
  });

  it('measures durations with the injected clock', async () => {
    let now = 1_000;
    const engine = new BatchExecutionEngine({
      concurrency: 1,
      now: () => now,
      runJob: async input => {
        now += 2_500;
        return succeed(input, { attempt: 1 });
      },
    });

    const report = await engine.run(['a', 'b']);

    expect(report.perJob.map(job => job.elapsedMs)).toEqual([2_500, 2_500]);
    expect(report.elapsedMs).toBe(5_000);
  });

  it('freezes job results', async () => {
    const report = await new BatchExecutionEngine({ concurrency: 1, runJob: succeed }).run(['a']);
    expect(Object.isFrozen(report.perJob[0])).toBe(true);
  });
});

describe('formatBatchSummary', () => {
  it('lists every job and the token totals', () => {
    const report: BatchReport = {
      total: 2,
      succeeded: 1,
      failed: 1,
      elapsedMs: 12_345,
      perJob: [
        {
          inputIdentifier: 'input/a.pdf',
          outcome: { status: 'success', artifacts: artifactsFor('a'), usage: [] },
          elapsedMs: 4_000,
          attempts: 1,
        },
        {
          inputIdentifier: 'input/b.pdf',
          outcome: {
            status: 'failure',
            errorKind: JobErrorKind.UPLOAD_ERROR,
            diagnostic: { message: 'Cannot read input/b.pdf' },
            usage: [],
          },
          elapsedMs: 200,
          attempts: 1,
        },
      ],
      usage: summarizeUsage([
        {
          stage: 'generation',
          counters: { inputTokens: 150, outputTokens: 30, cachedTokens: 50, totalTokens: 180 },
          fromCache: false,
        },
      ]),
    };

    expect(formatBatchSummary(report).split('\n')).toEqual([
      'Batch finished in 12.3s: 2 total, 1 succeeded, 1 failed',
      '  OK     input/a.pdf (4.0s)',
      '  FAILED input/b.pdf (0.2s) UploadError: Cannot read input/b.pdf',
      'Tokens: 150 input (50 cached, 100 billed), 30 output; 0/1 calls served from cache',
    ]);
  });
});
