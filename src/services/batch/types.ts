import type { ArtifactPaths } from '../../artifacts/OutputArtifactWriter.js';
import type { JobDiagnostic, JobErrorKind } from '../../types/errors.js';
import type { UsageRecord, UsageSummary } from '../usage/types.js';

/**
 * `usage` on either outcome covers the model calls of every attempt, failed ones included
 */
export interface JobSuccess {
  status: 'success';
  artifacts: ArtifactPaths;
  usage: UsageRecord[];
}

export interface JobFailure {
  status: 'failure';
  errorKind: JobErrorKind;
  diagnostic: JobDiagnostic;
  usage: UsageRecord[];
}

/**
 * Outcome of one input. Produced exactly once per input and frozen.
 */
export interface JobResult {
  inputIdentifier: string;
  outcome: JobSuccess | JobFailure;
  elapsedMs: number;
  /** Pipeline runs it took, including job-level retries */
  attempts: number;
}

export interface BatchReport {
  total: number;
  succeeded: number;
  failed: number;
  elapsedMs: number;
  /** Same order as the inputs */
  perJob: JobResult[];
  usage: UsageSummary;
}

export interface JobContext {
  signal?: AbortSignal;
  /** 1-based */
  attempt: number;
}

/**
 * Runs one input to completion. Rejections are turned into Failure results.
 */
export type JobRunner = (input: string, context: JobContext) => Promise<{ artifacts: ArtifactPaths; usage: UsageRecord[] }>;

export interface BatchProgress {
  completed: number;
  total: number;
  active: number;
  result: JobResult;
}

export type BatchProgressCallback = (progress: BatchProgress) => void;
