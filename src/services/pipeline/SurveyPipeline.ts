/**
 * SurveyPipeline
 *
 * Sequential state machine for one input document:
 *
 *   Uploading → ExtractingQuestions → GeneratingSurvey → WritingArtifacts → Done
 *
 * Any state may end in Failed(kind); the kind is carried by the thrown PipelineError.
 * The pipeline never retries. The only repeated remote work is the gateway's single
 * replacement of a rejected handle, and job-level retries belong to the batch engine.
 */

import { basename, extname } from 'path';
import type { Logger } from 'pino';
import type { RemoteResourceGateway } from '../gateway/RemoteResourceGateway.js';
import type { DocumentInput, InvocationResult } from '../gateway/types.js';
import type { OutputArtifactWriter, ArtifactPaths } from '../../artifacts/OutputArtifactWriter.js';
import {
  EXTRACTION_SYSTEM_INSTRUCTION,
  GENERATION_SYSTEM_INSTRUCTION,
  renderTemplate,
  type PromptTemplates,
} from '../survey/prompts.js';
import { parseExtractedQuestions, parseSurveyResponse } from '../survey/surveyParsing.js';
import { renderSurveyHtml } from '../survey/htmlRenderer.js';
import type { UsageRecord, UsageStage } from '../usage/types.js';
import {
  CancelledError,
  GenerationError,
  isInvalidHandleError,
  isPipelineError,
  isRemoteServiceError,
  JobErrorKind,
  UploadError,
} from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';

export enum PipelineState {
  UPLOADING = 'Uploading',
  EXTRACTING_QUESTIONS = 'ExtractingQuestions',
  GENERATING_SURVEY = 'GeneratingSurvey',
  WRITING_ARTIFACTS = 'WritingArtifacts',
  DONE = 'Done',
}

/**
 * Inputs shared by every job of a run
 */
export interface SurveyGenerationSettings {
  model: string;
  prompts: PromptTemplates;
  htmlTemplate: string;
  /** Formatted example surveys; empty means no context cache */
  examplesContent: string;
  /** Formatted default pages; empty means none */
  defaultPagesContent: string;
}

export interface SurveyPipelineDeps {
  gateway: RemoteResourceGateway;
  writer: OutputArtifactWriter;
  settings: SurveyGenerationSettings;
}

export interface PipelineRunOptions {
  signal?: AbortSignal;
  onStateChange?: (state: PipelineState) => void;
}

export interface PipelineSuccess {
  artifacts: ArtifactPaths;
  usage: UsageRecord[];
  questionCount: number;
}

export class SurveyPipeline {
  private readonly gateway: RemoteResourceGateway;
  private readonly writer: OutputArtifactWriter;
  private readonly settings: SurveyGenerationSettings;

  constructor(deps: SurveyPipelineDeps) {
    this.gateway = deps.gateway;
    this.writer = deps.writer;
    this.settings = deps.settings;
  }

  /**
   * @throws {PipelineError} the failure kind of the state that failed
   */
  async run(document: DocumentInput, options: PipelineRunOptions = {}): Promise<PipelineSuccess> {
    const { signal } = options;
    const baseName = basename(document.path, extname(document.path));
    const log = createChildLogger({ file: document.path });
    const usage: UsageRecord[] = [];
    let state = PipelineState.UPLOADING;

    const enter = (next: PipelineState): void => {
      if (signal?.aborted && next !== PipelineState.DONE) {
        throw new CancelledError(next);
      }
      state = next;
      log.debug({ state }, 'Pipeline state');
      options.onStateChange?.(next);
    };

    const recordUsage = (stage: UsageStage, result: InvocationResult): void => {
      usage.push({ stage, counters: result.usage, fromCache: result.fromCache, inputIdentifier: document.path });
    };

    try {
      enter(PipelineState.UPLOADING);
      const extraction = await this.extract(document, enter, log, result => recordUsage('extraction', result), signal);

      enter(PipelineState.GENERATING_SURVEY);
      const generation = await this.generate(
        extraction.questionsText,
        result => recordUsage('generation', result),
        signal
      );
      const survey = parseSurveyResponse(generation.text);

      enter(PipelineState.WRITING_ARTIFACTS);
      const artifacts = await this.writer.write(baseName, {
        questions: extraction.questionsText,
        survey: survey.json,
        html: renderSurveyHtml(this.settings.htmlTemplate, survey.json),
        response: generation.text,
      });

      enter(PipelineState.DONE);
      log.info({ baseName, questions: extraction.questionCount }, 'Survey generated');
      return { artifacts, usage, questionCount: extraction.questionCount };
    } catch (error) {
      const failure = signal?.aborted && !isCancellation(error) ? new CancelledError(state) : error;
      if (isPipelineError(failure)) {
        failure.usage = [...usage];
        log.warn({ state, kind: failure.kind, error: failure.message }, 'Pipeline failed');
      }
      throw failure;
    }
  }

  /**
   * Uploading and ExtractingQuestions. The extraction call runs inside the upload
   * handle's scope so a rejected handle is replaced and the call repeated once.
   */
  private async extract(
    document: DocumentInput,
    enter: (state: PipelineState) => void,
    log: Logger,
    onUsage: (result: InvocationResult) => void,
    signal?: AbortSignal
  ): Promise<{ result: InvocationResult; questionsText: string; questionCount: number }> {
    try {
      const result = await this.gateway.withUploadedDocument(
        document,
        async handle => {
          enter(PipelineState.EXTRACTING_QUESTIONS);
          log.debug({ remoteId: handle.remoteId }, 'Extracting questions');
          return this.gateway.invoke(
            {
              label: 'Question extraction',
              model: this.settings.model,
              systemInstruction: EXTRACTION_SYSTEM_INSTRUCTION,
              prompt: this.settings.prompts.extractQuestions,
              document: handle,
              responseMimeType: 'application/json',
              validate: text => {
                parseExtractedQuestions(text);
              },
            },
            { signal, onUsage }
          );
        },
        { signal }
      );
      const questions = parseExtractedQuestions(result.text);
      return { result, questionsText: questions.text, questionCount: questions.count };
    } catch (error) {
      if (isPipelineError(error)) {
        throw error;
      }
      if (isInvalidHandleError(error)) {
        throw new UploadError(`Uploaded document rejected after re-upload: ${error.message}`, error);
      }
      throw toGenerationError('Question extraction', error);
    }
  }

  /**
   * GeneratingSurvey. Examples, when configured, travel in a context cache together
   * with the system instruction.
   */
  private async generate(
    questionsText: string,
    onUsage: (result: InvocationResult) => void,
    signal?: AbortSignal
  ): Promise<InvocationResult> {
    const prompt = renderTemplate(this.settings.prompts.renderSurvey, {
      questions: questionsText,
      default_pages: this.settings.defaultPagesContent,
    });
    const spec = {
      label: 'Survey generation',
      model: this.settings.model,
      systemInstruction: GENERATION_SYSTEM_INSTRUCTION,
      prompt,
      responseMimeType: 'text/plain' as const,
      validate: (text: string) => {
        parseSurveyResponse(text);
      },
    };

    try {
      if (!this.settings.examplesContent) {
        return await this.gateway.invoke(spec, { signal, onUsage });
      }
      return await this.gateway.withContextCache(
        {
          content: this.settings.examplesContent,
          model: this.settings.model,
          systemInstruction: GENERATION_SYSTEM_INSTRUCTION,
        },
        context => this.gateway.invoke({ ...spec, context }, { signal, onUsage }),
        { signal }
      );
    } catch (error) {
      if (isPipelineError(error)) {
        throw error;
      }
      throw toGenerationError('Survey generation', error);
    }
  }
}

function isCancellation(error: unknown): boolean {
  return isPipelineError(error) && error.kind === JobErrorKind.CANCELLED;
}

function toGenerationError(label: string, error: unknown): GenerationError {
  if (isRemoteServiceError(error)) {
    return new GenerationError(`${label} failed: ${error.message}`, error, error.category === 'transient');
  }
  return new GenerationError(`${label} failed`, error);
}
