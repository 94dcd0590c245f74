/**
 * Structural parsing of model output
 *
 * Only structure is checked here. Whether a survey is valid SurveyJS is left to SurveyJS.
 */

import { z } from 'zod';
import { ExtractionParseError, SurveyParseError } from '../../types/errors.js';

const QuestionSchema = z.record(z.unknown());

/**
 * Extraction output: either a bare array of question objects or an object carrying one
 * under `questions`
 */
export const QuestionListSchema = z.union([
  z.array(QuestionSchema),
  z.object({ questions: z.array(QuestionSchema) }).passthrough(),
]);

export const SurveyDefinitionSchema = z
  .object({
    pages: z.array(z.record(z.unknown())).optional(),
  })
  .passthrough();

export type SurveyDefinition = z.infer<typeof SurveyDefinitionSchema>;

export interface ParsedQuestions {
  /** Response text as the model returned it; this is what the render prompt receives */
  text: string;
  count: number;
}

export interface ParsedSurvey {
  /** JSON text between the fences, trimmed */
  json: string;
  survey: SurveyDefinition;
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * @throws {ExtractionParseError} with the raw response attached
 */
export function parseExtractedQuestions(raw: string): ParsedQuestions {
  const json = parseJson(raw);
  if (!json.ok) {
    throw new ExtractionParseError(`Extraction response is not valid JSON: ${json.message}`, raw);
  }

  const list = QuestionListSchema.safeParse(json.value);
  if (!list.success) {
    throw new ExtractionParseError('Extraction response is not a list of questions', raw);
  }

  const questions = Array.isArray(list.data) ? list.data : list.data.questions;
  return { text: raw, count: questions.length };
}

/**
 * Text between the first ```json fence and the next ``` fence
 *
 * @returns null when there is no opening fence
 */
export function extractFencedJson(raw: string): string | null {
  const marker = '```json';
  const start = raw.indexOf(marker);
  if (start === -1) {
    return null;
  }
  const body = raw.slice(start + marker.length);
  const end = body.indexOf('```');
  return end === -1 ? body : body.slice(0, end);
}

/**
 * @throws {SurveyParseError} with the raw response attached
 */
export function parseSurveyResponse(raw: string): ParsedSurvey {
  const fenced = extractFencedJson(raw);
  if (fenced === null) {
    throw new SurveyParseError('Generation response contains no ```json block', raw);
  }

  const json = fenced.trim();
  const parsed = parseJson(json);
  if (!parsed.ok) {
    throw new SurveyParseError(`Survey block is not valid JSON: ${parsed.message}`, raw);
  }

  if (typeof parsed.value !== 'object' || parsed.value === null || Array.isArray(parsed.value)) {
    throw new SurveyParseError('Survey block is not a JSON object', raw);
  }

  const survey = SurveyDefinitionSchema.safeParse(parsed.value);
  if (!survey.success) {
    throw new SurveyParseError(`Survey structure is invalid: ${survey.error.issues[0]?.message ?? 'unknown issue'}`, raw);
  }

  return { json, survey: survey.data };
}
