/**
 * Argument parsing shared by the CLIs
 *
 * Options use the `--name=value` form; boolean flags take no value.
 */

import { ConfigurationError } from '../types/errors.js';

export interface CliOptions {
  positionals: string[];
  concurrency?: number;
  extensions?: string[];
  model?: string;
  output?: string;
  defaultPages?: string;
  defaultPagesDir?: string;
  /** Raw selection: all, none, or ids like 1,3 */
  examples?: string;
  logStatistics: boolean;
  jobRetries?: number;
  listExamples: boolean;
  help: boolean;
}

const VALUE_OPTIONS = [
  'concurrency',
  'extensions',
  'model',
  'output',
  'default-pages',
  'default-pages-dir',
  'examples',
  'job-retries',
] as const;

type ValueOption = (typeof VALUE_OPTIONS)[number];

function isValueOption(name: string): name is ValueOption {
  return VALUE_OPTIONS.some(option => option === name);
}

function parseInteger(name: string, value: string, min: number): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigurationError(`--${name}: expected an integer >= ${min}, got "${value}"`);
  }
  return parsed;
}

/**
 * @param argv - arguments after the script path (process.argv.slice(2))
 * @throws {ConfigurationError} on unknown options or invalid values
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    positionals: [],
    logStatistics: true,
    listExamples: false,
    help: false,
  };

  for (const arg of argv) {
    if (!arg.startsWith('--')) {
      options.positionals.push(arg);
      continue;
    }

    const [name, ...rest] = arg.slice(2).split('=');
    const value = rest.length > 0 ? rest.join('=') : undefined;

    switch (name) {
      case 'help':
        options.help = true;
        continue;
      case 'list-examples':
        options.listExamples = true;
        continue;
      case 'log-statistics':
        options.logStatistics = true;
        continue;
      case 'no-log-statistics':
        options.logStatistics = false;
        continue;
      case 'all-examples':
        options.examples = 'all';
        continue;
    }

    if (!isValueOption(name)) {
      throw new ConfigurationError(`Unknown option: --${name}`);
    }
    if (value === undefined || value === '') {
      throw new ConfigurationError(`--${name} requires a value (--${name}=...)`);
    }

    switch (name) {
      case 'concurrency':
        options.concurrency = parseInteger(name, value, 1);
        break;
      case 'extensions':
        options.extensions = value
          .split(',')
          .map(ext => ext.trim().replace(/^\./, '').toLowerCase())
          .filter(ext => ext.length > 0);
        break;
      case 'model':
        options.model = value;
        break;
      case 'output':
        options.output = value;
        break;
      case 'default-pages':
        options.defaultPages = value;
        break;
      case 'default-pages-dir':
        options.defaultPagesDir = value;
        break;
      case 'examples':
        options.examples = value;
        break;
      case 'job-retries':
        options.jobRetries = parseInteger(name, value, 0);
        break;
    }
  }

  return options;
}
