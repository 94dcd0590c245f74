import { promises as fs } from 'fs';
import { ConfigurationError } from '../../types/errors.js';

export const SURVEY_JSON_PLACEHOLDER = '{{survey_json}}';

/**
 * @throws {ConfigurationError} if the template cannot be read
 */
export async function loadHtmlTemplate(path: string): Promise<string> {
  try {
    return await fs.readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`HTML template not readable: ${path}`, {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Embed the survey JSON into the page template (every placeholder occurrence)
 */
export function renderSurveyHtml(template: string, surveyJson: string): string {
  return template.split(SURVEY_JSON_PLACEHOLDER).join(surveyJson);
}
