/**
 * Example surveys
 *
 * Example SurveyJS definitions under EXAMPLES_DIR steer the generation call through a
 * context cache. They are listed in a stable (sorted) order so that numeric selections
 * and the resulting example-set fingerprint are reproducible.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { glob } from 'glob';
import { ConfigurationError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';

export interface ExampleFile {
  /** 1-based position in the sorted listing */
  id: number;
  /** Path relative to the examples directory, with forward slashes */
  relativePath: string;
  content: string;
  tokens: number;
}

export type ExampleSelection = { mode: 'all' } | { mode: 'none' } | { mode: 'ids'; ids: number[] };

/**
 * Rough token count (~4 characters per token)
 */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

export async function listExamples(examplesDir: string): Promise<ExampleFile[]> {
  const matches = await glob('**/*.json', { cwd: examplesDir, nodir: true, posix: true });
  const sorted = [...matches].sort();

  const examples: ExampleFile[] = [];
  for (const relativePath of sorted) {
    try {
      const content = await fs.readFile(join(examplesDir, relativePath), 'utf8');
      examples.push({ id: examples.length + 1, relativePath, content, tokens: estimateTokens(content) });
    } catch (error) {
      logger.warn(
        { file: relativePath, error: error instanceof Error ? error.message : String(error) },
        'Could not read example'
      );
    }
  }
  return examples;
}

/**
 * Parse an example selection: `all` or `*`, `none` or empty, or comma-separated 1-based ids
 *
 * @throws {ConfigurationError} on a malformed id list
 */
export function parseExampleSelection(input: string): ExampleSelection {
  const value = input.trim().toLowerCase();
  if (value === 'all' || value === '*') {
    return { mode: 'all' };
  }
  if (value === '' || value === 'none') {
    return { mode: 'none' };
  }

  const ids = value.split(',').map(part => Number(part.trim()));
  if (ids.some(id => !Number.isInteger(id) || id < 1)) {
    throw new ConfigurationError(`Invalid example selection "${input}". Use all, none, or ids like 1,3`);
  }
  return { mode: 'ids', ids };
}

/**
 * @throws {ConfigurationError} if an id is out of range
 */
export function selectExamples(examples: ExampleFile[], selection: ExampleSelection): ExampleFile[] {
  switch (selection.mode) {
    case 'all':
      return examples;
    case 'none':
      return [];
    case 'ids':
      return selection.ids.map(id => {
        const example = examples.find(candidate => candidate.id === id);
        if (!example) {
          throw new ConfigurationError(`Example id ${id} out of range (1-${examples.length})`);
        }
        return example;
      });
  }
}

/**
 * Format selected examples for the context cache. Empty string when nothing is selected.
 */
export function formatExamples(selected: ExampleFile[]): string {
  return selected.map((example, index) => `Example ${index + 1}: \`\`\`json\n${example.content}\n\`\`\`\n\n`).join('');
}

export function formatExampleListing(examples: ExampleFile[]): string {
  return examples
    .map(example => `${String(example.id).padStart(2, ' ')}. ${example.relativePath} (${example.tokens} tokens)`)
    .join('\n');
}
