/**
 * Batch survey generation
 *
 * Runs the survey pipeline for every matching document in a directory with a bounded
 * number of jobs in flight, then prints a summary.
 *
 * Usage:
 *   tsx src/scripts/batch-generate.ts [inputDir] [options]
 *
 * Options:
 *   --concurrency=<n>              Maximum parallel jobs (default: MAX_PARALLEL_JOBS)
 *   --extensions=pdf,png           File extensions to process (default: INPUT_EXTENSIONS)
 *   --model=<name>                 Model to use (default: GEMINI_MODEL)
 *   --output=<dir>                 Output directory (default: OUTPUT_DIR)
 *   --default-pages=a,b|none       Default pages (default: introduction,consent)
 *   --default-pages-dir=<dir>      Directory of default page templates
 *   --examples=all|none|1,3        Example surveys (default: all)
 *   --job-retries=<n>              Extra runs for timed-out or transiently failed jobs (default: 0)
 *   --no-log-statistics            Skip the token summary
 *
 * Exit codes: 0 all jobs succeeded, 1 at least one job failed, 2 setup error.
 */

import { fileURLToPath } from 'url';
import { getEnv } from '../config/env.js';
import { parseCliArgs } from './cliArgs.js';
import { createSurveyRuntime, resolveExamples } from '../services/pipeline/surveyRuntime.js';
import { discoverInputs } from '../services/batch/inputDiscovery.js';
import { BatchExecutionEngine, exitCodeFor, formatBatchSummary } from '../services/batch/BatchExecutionEngine.js';
import { formatUsageSummary } from '../services/usage/UsageAggregator.js';
import type { JobRunner } from '../services/batch/types.js';
import { AppError, ConfigurationError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

const DEFAULT_BATCH_PAGES = 'introduction,consent';

const noPipeline: JobRunner = input => Promise.reject(new ConfigurationError(`No pipeline configured for ${input}`));

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    console.log('Usage: batch-generate [inputDir] [--concurrency=N] [--extensions=pdf] [--examples=all|none|1,3] ...');
    return 0;
  }

  const env = getEnv();
  const inputDir = options.positionals[0] ?? env.INPUT_DIR;
  const extensions = options.extensions ?? env.INPUT_EXTENSIONS;
  const concurrency = options.concurrency ?? env.MAX_PARALLEL_JOBS;

  const inputs = await discoverInputs(inputDir, extensions);
  if (inputs.length === 0) {
    // Nothing to dispatch: no credentials or templates are needed for an empty report
    logger.warn({ inputDir, extensions }, 'No input files found');
    const report = await new BatchExecutionEngine({ concurrency, runJob: noPipeline }).run([]);
    console.log(formatBatchSummary(report));
    return exitCodeFor(report);
  }
  logger.info({ inputDir, files: inputs.length, concurrency }, 'Found input files');

  const examples = await resolveExamples(options.examples ?? 'all', env.EXAMPLES_DIR);
  const runtime = await createSurveyRuntime({
    model: options.model ?? env.GEMINI_MODEL,
    outputDir: options.output ?? env.OUTPUT_DIR,
    examples,
    defaultPages: options.defaultPages ?? DEFAULT_BATCH_PAGES,
    defaultPagesDir: options.defaultPagesDir ?? env.DEFAULT_PAGES_DIR,
  });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted, letting running jobs stop at their next step');
    controller.abort();
  });

  const engine = new BatchExecutionEngine({
    concurrency,
    jobRetries: options.jobRetries ?? 0,
    runJob: (input, context) => runtime.pipeline.run({ path: input }, { signal: context.signal }),
    onProgress: progress => {
      const { result } = progress;
      const status = result.outcome.status === 'success' ? 'done' : `failed (${result.outcome.errorKind})`;
      logger.info(
        { completed: progress.completed, total: progress.total, elapsedMs: result.elapsedMs },
        `[${progress.completed}/${progress.total}] ${result.inputIdentifier} ${status}`
      );
    },
  });

  const report = await engine.run(inputs, { signal: controller.signal });

  console.log(formatBatchSummary(report));
  if (options.logStatistics) {
    console.log(
      formatUsageSummary(report.usage, {
        model: runtime.model,
        examplesUsed: runtime.examplesUsed,
        files: report.perJob.flatMap(job => (job.outcome.status === 'success' ? Object.values(job.outcome.artifacts) : [])),
      })
    );
  }
  logger.debug({ cache: runtime.store.getStats() }, 'Cache statistics');

  return exitCodeFor(report);
}

// Run if called directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main()
    .then(code => process.exit(code))
    .catch((error: unknown) => {
      if (error instanceof AppError) {
        console.error(`Error: ${error.message}`);
      } else {
        console.error('Error:', error);
      }
      process.exit(2);
    });
}
