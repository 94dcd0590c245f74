/**
 * Token counters reported by one model call
 */
export interface UsageCounters {
  inputTokens: number;
  outputTokens: number;
  /** Input tokens served from a context cache (subset of inputTokens) */
  cachedTokens: number;
  /** As reported by the service; may include tokens neither input nor output count */
  totalTokens: number;
}

export const ZERO_USAGE: Readonly<UsageCounters> = Object.freeze({
  inputTokens: 0,
  outputTokens: 0,
  cachedTokens: 0,
  totalTokens: 0,
});

export type UsageStage = 'extraction' | 'generation';

/**
 * One appended record
 */
export interface UsageRecord {
  stage: UsageStage;
  counters: UsageCounters;
  /** true when the response came from the invocation cache (counters are zero) */
  fromCache: boolean;
  inputIdentifier?: string;
}

export interface UsageSummary {
  byStage: Record<UsageStage, UsageCounters>;
  total: UsageCounters;
  /** Input tokens billed at the full rate: input - cached */
  billedInputTokens: number;
  calls: number;
  cacheHits: number;
}

export function addUsage(a: UsageCounters, b: UsageCounters): UsageCounters {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    cachedTokens: a.cachedTokens + b.cachedTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
}
