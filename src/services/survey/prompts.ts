/**
 * Prompt templates and system instructions for the two model calls
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { ConfigurationError } from '../../types/errors.js';

export const EXTRACTION_SYSTEM_INSTRUCTION =
  'You are an expert analyst transcribing questionnaires into machine readable formats';

export const GENERATION_SYSTEM_INSTRUCTION =
  'You are an expert SurveyJS JSON generator that learns from examples and applies consistent patterns. ' +
  'Only add personal data if it exists in the questionnaire. Do not use buttons or dropdowns.';

export const EXTRACTION_PROMPT_FILE = 'extract_questions.txt';
export const RENDER_PROMPT_FILE = 'render_survey.txt';

export interface PromptTemplates {
  extractQuestions: string;
  /** Contains {{questions}} and {{default_pages}} */
  renderSurvey: string;
}

async function readTemplate(dir: string, file: string): Promise<string> {
  const path = join(dir, file);
  try {
    return await fs.readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Prompt template not readable: ${path}`, {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * @throws {ConfigurationError} if a template is missing
 */
export async function loadPromptTemplates(dir: string): Promise<PromptTemplates> {
  const [extractQuestions, renderSurvey] = await Promise.all([
    readTemplate(dir, EXTRACTION_PROMPT_FILE),
    readTemplate(dir, RENDER_PROMPT_FILE),
  ]);
  return { extractQuestions, renderSurvey };
}

/**
 * Substitute every `{{name}}` placeholder in one pass. Unknown placeholders stay as they are,
 * and substituted text is never scanned again.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : placeholder
  );
}
