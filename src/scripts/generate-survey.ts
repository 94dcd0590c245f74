/**
 * Survey generator CLI
 *
 * Turns one questionnaire document into questions, a SurveyJS definition, an HTML page
 * and the raw model response.
 *
 * Usage:
 *   tsx src/scripts/generate-survey.ts <file> [mimeType] [options]
 *
 * Options:
 *   --model=<name>                 Model to use (default: GEMINI_MODEL)
 *   --output=<dir>                 Output directory (default: OUTPUT_DIR)
 *   --examples=all|none|1,3        Example surveys for the context cache
 *   --all-examples                 Same as --examples=all
 *   --default-pages=a,b|none       Default pages to include (default: none)
 *   --default-pages-dir=<dir>      Directory of default page templates
 *   --no-log-statistics            Skip the generation summary
 *   --list-examples                List available examples and exit
 *
 * Without --examples, examples are chosen interactively when stdin is a terminal.
 * Exit codes: 0 success, 1 generation failed, 2 setup error.
 */

import { promises as fs } from 'fs';
import { relative } from 'path';
import { createInterface } from 'readline/promises';
import { fileURLToPath } from 'url';
import { getEnv } from '../config/env.js';
import { parseCliArgs, type CliOptions } from './cliArgs.js';
import { createSurveyRuntime, resolveExamples } from '../services/pipeline/surveyRuntime.js';
import { formatExampleListing, listExamples, parseExampleSelection, selectExamples, type ExampleFile } from '../services/survey/examples.js';
import { UsageAggregator, formatUsageSummary } from '../services/usage/UsageAggregator.js';
import type { UsageRecord } from '../services/usage/types.js';
import { AppError, ConfigurationError, isPipelineError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

const USAGE = 'Usage: generate-survey <file> [mimeType] [--model=...] [--output=...] [--examples=all|none|1,3] ' +
  '[--default-pages=...] [--default-pages-dir=...] [--no-log-statistics] [--list-examples]';

async function promptForExamples(examplesDir: string): Promise<ExampleFile[]> {
  const examples = await listExamples(examplesDir);
  if (examples.length === 0) {
    return [];
  }

  console.log('\nAvailable examples:');
  console.log(formatExampleListing(examples));

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(
      `\nEnter comma-separated IDs (1-${examples.length}), '*' for all, or press Enter to skip: `
    );
    return selectExamples(examples, parseExampleSelection(answer));
  } finally {
    rl.close();
  }
}

async function chooseExamples(options: CliOptions, examplesDir: string): Promise<ExampleFile[]> {
  if (options.examples !== undefined) {
    return resolveExamples(options.examples, examplesDir);
  }
  if (process.stdin.isTTY) {
    return promptForExamples(examplesDir);
  }
  return [];
}

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const env = getEnv();

  if (options.listExamples) {
    const examples = await listExamples(env.EXAMPLES_DIR);
    console.log(examples.length > 0 ? formatExampleListing(examples) : `No examples found in ${env.EXAMPLES_DIR}`);
    return 0;
  }

  const [file, mimeType] = options.positionals;
  if (!file) {
    throw new ConfigurationError(`Missing input file.\n${USAGE}`);
  }
  const stat = await fs.stat(file).catch(() => null);
  if (!stat?.isFile()) {
    throw new ConfigurationError(`Input file not found: ${file}`, { file });
  }

  const examples = await chooseExamples(options, env.EXAMPLES_DIR);
  const outputDir = options.output ?? env.OUTPUT_DIR;
  const runtime = await createSurveyRuntime({
    model: options.model ?? env.GEMINI_MODEL,
    outputDir,
    examples,
    defaultPages: options.defaultPages ?? 'none',
    defaultPagesDir: options.defaultPagesDir ?? env.DEFAULT_PAGES_DIR,
  });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted, stopping before the next step');
    controller.abort();
  });

  const printUsage = (records: UsageRecord[], files: string[]): void => {
    if (!options.logStatistics) {
      return;
    }
    const usage = new UsageAggregator();
    usage.recordAll(records);
    console.log(formatUsageSummary(usage.summary(), { model: runtime.model, examplesUsed: runtime.examplesUsed, files }));
  };

  logger.info({ file, mimeType }, 'Generating survey');
  try {
    const result = await runtime.pipeline.run({ path: file, mimeType }, { signal: controller.signal });
    printUsage(
      result.usage,
      Object.values(result.artifacts).map(path => relative(outputDir, path))
    );
    logger.debug({ cache: runtime.store.getStats() }, 'Cache statistics');
    return 0;
  } catch (error) {
    if (!isPipelineError(error)) {
      throw error;
    }
    console.error(`${error.kind}: ${error.message}`);
    if (error.diagnostic.cause) {
      console.error(`  cause: ${error.diagnostic.cause}`);
    }
    if (error.diagnostic.rawResponse !== undefined) {
      console.error('  raw response:');
      console.error(error.diagnostic.rawResponse);
    }
    if (error.usage.length > 0) {
      printUsage(error.usage, []);
    }
    return 1;
  }
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
