import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getEnv, resetEnv, validateEnv } from '../env.js';
import { ConfigurationError } from '../../types/errors.js';

const VARIABLES = [
  'GEMINI_TIMEOUT',
  'GEMINI_TRANSIENT_RETRIES',
  'MAX_PARALLEL_JOBS',
  'INPUT_EXTENSIONS',
  'FILE_UPLOAD_TTL_HOURS',
  'EXAMPLES_CACHE_TTL_MINUTES',
  'GEMINI_MODEL',
];

describe('env', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const name of VARIABLES) {
      saved[name] = process.env[name];
      delete process.env[name];
    }
    resetEnv();
  });

  afterEach(() => {
    for (const name of VARIABLES) {
      if (saved[name] === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = saved[name];
      }
    }
    resetEnv();
  });

  it('applies defaults', () => {
    expect(validateEnv()).toMatchObject({
      NODE_ENV: 'test',
      GEMINI_TIMEOUT: 300000,
      GEMINI_TRANSIENT_RETRIES: 1,
      MAX_PARALLEL_JOBS: 10,
      INPUT_EXTENSIONS: ['pdf'],
      FILE_UPLOAD_TTL_HOURS: 48,
      EXAMPLES_CACHE_TTL_MINUTES: 60,
    });
  });

  it('normalizes the extension list', () => {
    process.env.INPUT_EXTENSIONS = '.PDF, docx,,';
    expect(getEnv().INPUT_EXTENSIONS).toEqual(['pdf', 'docx']);
  });

  it('caches the validated values until reset', () => {
    process.env.GEMINI_MODEL = 'gemini-first';
    expect(getEnv().GEMINI_MODEL).toBe('gemini-first');

    process.env.GEMINI_MODEL = 'gemini-second';
    expect(getEnv().GEMINI_MODEL).toBe('gemini-first');

    resetEnv();
    expect(getEnv().GEMINI_MODEL).toBe('gemini-second');
  });

  it('reports every invalid value at once', () => {
    process.env.GEMINI_TIMEOUT = '10';
    process.env.MAX_PARALLEL_JOBS = '0';

    try {
      validateEnv();
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        context: {
          errors: [
            'GEMINI_TIMEOUT: Invalid value "10". Must be at least 1000 ms.',
            'MAX_PARALLEL_JOBS: Invalid value "0". Must be 1 or greater.',
          ],
        },
      });
    }
  });
});
