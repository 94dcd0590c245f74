/**
 * Environment Variable Validation
 *
 * Centralized parsing of all environment variables used by the survey generator.
 * Values are parsed manually with typed defaults; every invalid value is collected
 * and reported in a single ConfigurationError.
 */

// Load dotenv early so values from .env are visible to the first getEnv() call
import * as dotenv from 'dotenv';
dotenv.config();

import { ConfigurationError } from '../types/errors.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseListEnv(value: string | undefined, defaultValue: string[]): string[] {
  if (!value) return defaultValue;
  const items = value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
  return items.length > 0 ? items : defaultValue;
}

export type NodeEnv = 'development' | 'production' | 'test';

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: NodeEnv;
  LOG_LEVEL?: string;

  // Gemini
  GEMINI_API_KEY?: string;
  GEMINI_MODEL: string;
  GEMINI_BASE_URL: string;
  GEMINI_TIMEOUT: number;
  GEMINI_TRANSIENT_RETRIES: number;

  // Directories
  CACHE_DIR: string;
  LOGS_DIR: string;
  INPUT_DIR: string;
  OUTPUT_DIR: string;
  EXAMPLES_DIR: string;
  PROMPTS_DIR: string;
  DEFAULT_PAGES_DIR: string;
  HTML_TEMPLATE_PATH: string;

  // Batch
  MAX_PARALLEL_JOBS: number;
  INPUT_EXTENSIONS: string[];

  // Remote handle lifetimes
  FILE_UPLOAD_TTL_HOURS: number;
  EXAMPLES_CACHE_TTL_MINUTES: number;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {ConfigurationError} If any value is invalid
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'development';
  if (nodeEnv !== 'development' && nodeEnv !== 'production' && nodeEnv !== 'test') {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const geminiTimeout = parseNumericEnv(process.env.GEMINI_TIMEOUT, 300000);
  if (geminiTimeout < 1000) {
    errors.push(`GEMINI_TIMEOUT: Invalid value "${process.env.GEMINI_TIMEOUT}". Must be at least 1000 ms.`);
  }

  const transientRetries = parseNumericEnv(process.env.GEMINI_TRANSIENT_RETRIES, 1);
  if (transientRetries < 0 || transientRetries > 5) {
    errors.push(
      `GEMINI_TRANSIENT_RETRIES: Invalid value "${process.env.GEMINI_TRANSIENT_RETRIES}". Must be between 0 and 5.`
    );
  }

  const maxParallelJobs = parseNumericEnv(process.env.MAX_PARALLEL_JOBS, 10);
  if (maxParallelJobs < 1) {
    errors.push(`MAX_PARALLEL_JOBS: Invalid value "${process.env.MAX_PARALLEL_JOBS}". Must be 1 or greater.`);
  }

  const uploadTtlHours = parseNumericEnv(process.env.FILE_UPLOAD_TTL_HOURS, 48);
  if (uploadTtlHours < 1) {
    errors.push(`FILE_UPLOAD_TTL_HOURS: Invalid value "${process.env.FILE_UPLOAD_TTL_HOURS}". Must be 1 or greater.`);
  }

  const examplesTtlMinutes = parseNumericEnv(process.env.EXAMPLES_CACHE_TTL_MINUTES, 60);
  if (examplesTtlMinutes < 1) {
    errors.push(
      `EXAMPLES_CACHE_TTL_MINUTES: Invalid value "${process.env.EXAMPLES_CACHE_TTL_MINUTES}". Must be 1 or greater.`
    );
  }

  if (errors.length > 0) {
    throw new ConfigurationError(`Environment validation failed:\n  ${errors.join('\n  ')}`, { errors });
  }

  validatedEnv = {
    NODE_ENV: nodeEnv === 'production' || nodeEnv === 'test' ? nodeEnv : 'development',
    LOG_LEVEL: process.env.LOG_LEVEL,

    GEMINI_API_KEY: process.env.GEMINI_API_KEY,
    GEMINI_MODEL: process.env.GEMINI_MODEL || 'gemini-2.5-flash',
    GEMINI_BASE_URL: process.env.GEMINI_BASE_URL || 'https://generativelanguage.googleapis.com',
    GEMINI_TIMEOUT: geminiTimeout,
    GEMINI_TRANSIENT_RETRIES: transientRetries,

    CACHE_DIR: process.env.CACHE_DIR || 'cache',
    LOGS_DIR: process.env.LOGS_DIR || 'logs',
    INPUT_DIR: process.env.INPUT_DIR || 'input',
    OUTPUT_DIR: process.env.OUTPUT_DIR || 'output',
    EXAMPLES_DIR: process.env.EXAMPLES_DIR || 'examples',
    PROMPTS_DIR: process.env.PROMPTS_DIR || 'prompts',
    DEFAULT_PAGES_DIR: process.env.DEFAULT_PAGES_DIR || 'default_pages',
    HTML_TEMPLATE_PATH: process.env.HTML_TEMPLATE_PATH || 'templates/index.html',

    MAX_PARALLEL_JOBS: maxParallelJobs,
    INPUT_EXTENSIONS: parseListEnv(process.env.INPUT_EXTENSIONS, ['pdf']).map(ext => ext.replace(/^\./, '').toLowerCase()),

    FILE_UPLOAD_TTL_HOURS: uploadTtlHours,
    EXAMPLES_CACHE_TTL_MINUTES: examplesTtlMinutes,
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}
