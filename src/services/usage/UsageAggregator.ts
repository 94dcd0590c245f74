/**
 * UsageAggregator
 *
 * Append-only fold over the usage records of a run. Records are frozen on append and
 * never modified; summaries are recomputed from the full stream.
 */

import { addUsage, ZERO_USAGE, type UsageCounters, type UsageRecord, type UsageStage, type UsageSummary } from './types.js';

export class UsageAggregator {
  private readonly records: Readonly<UsageRecord>[] = [];

  record(entry: UsageRecord): void {
    this.records.push(Object.freeze({ ...entry, counters: { ...entry.counters } }));
  }

  recordAll(entries: readonly UsageRecord[]): void {
    for (const entry of entries) {
      this.record(entry);
    }
  }

  getRecords(): ReadonlyArray<Readonly<UsageRecord>> {
    return this.records;
  }

  summary(): UsageSummary {
    return summarizeUsage(this.records);
  }
}

export function summarizeUsage(records: readonly UsageRecord[]): UsageSummary {
  const byStage: Record<UsageStage, UsageCounters> = {
    extraction: { ...ZERO_USAGE },
    generation: { ...ZERO_USAGE },
  };
  let total: UsageCounters = { ...ZERO_USAGE };
  let cacheHits = 0;

  for (const record of records) {
    byStage[record.stage] = addUsage(byStage[record.stage], record.counters);
    total = addUsage(total, record.counters);
    if (record.fromCache) {
      cacheHits++;
    }
  }

  return {
    byStage,
    total,
    billedInputTokens: total.inputTokens - total.cachedTokens,
    calls: records.length,
    cacheHits,
  };
}

export interface UsageSummaryContext {
  model: string;
  examplesUsed: number;
  /** Artifact paths produced, relative to the output directory */
  files: string[];
}

const RULE = '='.repeat(50);

function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

/**
 * Human-readable generation summary block
 */
export function formatUsageSummary(summary: UsageSummary, context: UsageSummaryContext): string {
  const lines = [
    RULE,
    'GENERATION SUMMARY',
    RULE,
    `Total Input tokens:   ${formatCount(summary.total.inputTokens)}`,
    `Total Output tokens:  ${formatCount(summary.total.outputTokens)}`,
    `Total tokens used:    ${formatCount(summary.total.totalTokens)}`,
  ];
  if (summary.total.cachedTokens > 0) {
    lines.push(`Cached tokens:        ${formatCount(summary.total.cachedTokens)}`);
    lines.push(`Billed input tokens:  ${formatCount(summary.billedInputTokens)}`);
  }
  if (summary.cacheHits > 0) {
    lines.push(`Calls from cache:     ${summary.cacheHits}/${summary.calls}`);
  }
  lines.push(`Examples used:        ${context.examplesUsed}`);
  lines.push(
    context.files.length > 0
      ? `Files generated:      ${context.files.length} (${context.files.join(', ')})`
      : 'Files generated:      0'
  );
  lines.push(`Model:                ${context.model}`);
  lines.push(RULE);
  return lines.join('\n');
}
