/**
 * Default SurveyJS pages (introduction, consent, ...) injected into the render prompt
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';

export const DefaultPageSchema = z
  .object({
    name: z.string(),
    elements: z.array(z.unknown()),
  })
  .passthrough();

export type DefaultPage = z.infer<typeof DefaultPageSchema>;

/**
 * `none` (any case) or an empty value selects no pages
 */
export function parseDefaultPageNames(value: string): string[] {
  if (value.trim().toLowerCase() === 'none') {
    return [];
  }
  return value
    .split(',')
    .map(name => name.trim())
    .filter(name => name.length > 0);
}

/**
 * Load `<dir>/<name>.json` for every name. Missing, unparsable or structurally
 * invalid pages are skipped with a warning.
 */
export async function loadDefaultPages(names: string[], dir: string): Promise<DefaultPage[]> {
  const pages: DefaultPage[] = [];

  for (const name of names) {
    const file = join(dir, `${name}.json`);

    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf8');
    } catch {
      logger.warn({ file }, 'Default page file not found');
      continue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      logger.warn({ file, error: error instanceof Error ? error.message : String(error) }, 'Could not load default page');
      continue;
    }

    const page = DefaultPageSchema.safeParse(parsed);
    if (!page.success) {
      logger.warn({ file }, 'Invalid page structure');
      continue;
    }

    pages.push(page.data);
    logger.info({ page: name }, 'Loaded default page');
  }

  return pages;
}

/**
 * Pages renamed page0..pageN, as 2-space indented JSON. Empty string when there are none.
 */
export function formatDefaultPagesForPrompt(pages: DefaultPage[]): string {
  if (pages.length === 0) {
    return '';
  }
  const renamed = pages.map((page, index) => ({ ...page, name: `page${index}` }));
  return JSON.stringify(renamed, null, 2);
}
