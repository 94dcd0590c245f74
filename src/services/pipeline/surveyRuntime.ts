/**
 * Wiring of a survey generation run: configuration, cache store, remote client,
 * gateway, artifact writer and the pipeline on top of them.
 */

import { getEnv } from '../../config/env.js';
import { FileSystemCacheStore } from '../cache/FileSystemCacheStore.js';
import { HOUR_MS, MINUTE_MS, TtlClass, type CacheStore } from '../cache/types.js';
import { GeminiClient } from '../gemini/GeminiClient.js';
import type { RemoteModelService } from '../gemini/types.js';
import { RemoteResourceGateway } from '../gateway/RemoteResourceGateway.js';
import { OutputArtifactWriter } from '../../artifacts/OutputArtifactWriter.js';
import { loadPromptTemplates } from '../survey/prompts.js';
import { loadHtmlTemplate } from '../survey/htmlRenderer.js';
import { formatExamples, listExamples, parseExampleSelection, selectExamples, type ExampleFile } from '../survey/examples.js';
import { formatDefaultPagesForPrompt, loadDefaultPages, parseDefaultPageNames } from '../survey/defaultPages.js';
import { SurveyPipeline } from './SurveyPipeline.js';
import { logger } from '../../utils/logger.js';

export interface SurveyRuntimeOptions {
  model: string;
  outputDir: string;
  /** Selected example surveys; empty for none */
  examples: ExampleFile[];
  /** Comma-separated page names, or "none" */
  defaultPages: string;
  defaultPagesDir: string;
  /** Replaces the Gemini client (tests) */
  service?: RemoteModelService;
  /** Replaces the on-disk cache store (tests) */
  store?: CacheStore;
}

export interface SurveyRuntime {
  pipeline: SurveyPipeline;
  store: CacheStore;
  model: string;
  examplesUsed: number;
}

/**
 * Resolve an example selection against EXAMPLES_DIR
 *
 * @throws {ConfigurationError} on a malformed selection or an id out of range
 */
export async function resolveExamples(selection: string, examplesDir: string = getEnv().EXAMPLES_DIR): Promise<ExampleFile[]> {
  const parsed = parseExampleSelection(selection);
  if (parsed.mode === 'none') {
    return [];
  }
  const examples = await listExamples(examplesDir);
  return selectExamples(examples, parsed);
}

/**
 * @throws {ConfigurationError} on missing templates or credentials
 */
export async function createSurveyRuntime(options: SurveyRuntimeOptions): Promise<SurveyRuntime> {
  const env = getEnv();

  const [prompts, htmlTemplate, defaultPages] = await Promise.all([
    loadPromptTemplates(env.PROMPTS_DIR),
    loadHtmlTemplate(env.HTML_TEMPLATE_PATH),
    loadDefaultPages(parseDefaultPageNames(options.defaultPages), options.defaultPagesDir),
  ]);

  const store =
    options.store ??
    new FileSystemCacheStore({
      baseDir: env.CACHE_DIR,
      ttlPolicy: {
        [TtlClass.HOURS_48]: env.FILE_UPLOAD_TTL_HOURS * HOUR_MS,
        [TtlClass.MINUTES_60]: env.EXAMPLES_CACHE_TTL_MINUTES * MINUTE_MS,
      },
    });
  const service = options.service ?? new GeminiClient();
  const gateway = new RemoteResourceGateway({
    store,
    service,
    contextTtlSeconds: env.EXAMPLES_CACHE_TTL_MINUTES * 60,
  });

  logger.info(
    {
      model: options.model,
      output: options.outputDir,
      examples: options.examples.length,
      defaultPages: defaultPages.length,
    },
    'Survey generation configured'
  );

  const pipeline = new SurveyPipeline({
    gateway,
    writer: new OutputArtifactWriter(options.outputDir),
    settings: {
      model: options.model,
      prompts,
      htmlTemplate,
      examplesContent: formatExamples(options.examples),
      defaultPagesContent: formatDefaultPagesForPrompt(defaultPages),
    },
  });

  return { pipeline, store, model: options.model, examplesUsed: options.examples.length };
}
