/**
 * Google Gemini REST client
 *
 * Implements RemoteModelService against the public v1beta REST API with axios:
 * resumable file upload, context cache creation and generateContent.
 * Every call is bounded by a timeout, honours an AbortSignal, and rejects with the
 * categorized failures from remoteFailures.ts. Transient failures are retried.
 */

import type { AxiosInstance } from 'axios';
import type { ZodType } from 'zod';
import type {
  CachedContentRef,
  CachedContentSpec,
  GenerateContentResult,
  GenerateContentSpec,
  RemoteCallOptions,
  RemoteModelService,
  UploadedFile,
} from './types.js';
import {
  CachedContentResponseSchema,
  GenerateContentResponseSchema,
  UploadFileResponseSchema,
  type UsageMetadata,
} from './geminiSchemas.js';
import { toRemoteFailure } from './remoteFailures.js';
import { createHttpClient } from '../../config/httpClient.js';
import { getEnv } from '../../config/env.js';
import { ConfigurationError, RemoteServiceError } from '../../types/errors.js';
import { retryWithBackoff } from '../../utils/retry.js';
import { logger } from '../../utils/logger.js';
import type { UsageCounters } from '../usage/types.js';

export interface GeminiClientConfig {
  apiKey?: string;
  baseURL?: string;
  /** Per-call timeout in milliseconds */
  timeout?: number;
  /** Retries after a transient failure */
  transientRetries?: number;
  /** Delay before the first transient retry (default: 1000) */
  retryDelayMs?: number;
  /** Pre-built HTTP client (for testing) */
  httpClient?: AxiosInstance;
}

export function toUsageCounters(metadata: UsageMetadata | undefined): UsageCounters {
  return {
    inputTokens: metadata?.promptTokenCount ?? 0,
    outputTokens: metadata?.candidatesTokenCount ?? 0,
    cachedTokens: metadata?.cachedContentTokenCount ?? 0,
    totalTokens: metadata?.totalTokenCount ?? 0,
  };
}

export class GeminiClient implements RemoteModelService {
  private readonly apiKey: string;
  private readonly timeout: number;
  private readonly transientRetries: number;
  private readonly retryDelayMs: number;
  private readonly client: AxiosInstance;

  constructor(config: GeminiClientConfig = {}) {
    const env = getEnv();
    const apiKey = config.apiKey ?? env.GEMINI_API_KEY;
    if (!apiKey) {
      throw new ConfigurationError('Gemini not configured. Missing: GEMINI_API_KEY', { service: 'Gemini' });
    }

    this.apiKey = apiKey;
    this.timeout = config.timeout ?? env.GEMINI_TIMEOUT;
    this.transientRetries = config.transientRetries ?? env.GEMINI_TRANSIENT_RETRIES;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.client =
      config.httpClient ??
      createHttpClient({
        baseURL: config.baseURL ?? env.GEMINI_BASE_URL,
        timeout: this.timeout,
      });
  }

  async uploadFile(bytes: Buffer, mimeType: string, displayName: string, options: RemoteCallOptions = {}): Promise<UploadedFile> {
    return this.call('uploadFile', options, async () => {
      const start = await this.client.post(
        '/upload/v1beta/files',
        { file: { display_name: displayName } },
        {
          params: { key: this.apiKey },
          headers: {
            'Content-Type': 'application/json',
            'X-Goog-Upload-Protocol': 'resumable',
            'X-Goog-Upload-Command': 'start',
            'X-Goog-Upload-Header-Content-Length': String(bytes.length),
            'X-Goog-Upload-Header-Content-Type': mimeType,
          },
          timeout: this.timeout,
          signal: options.signal,
        }
      );

      const uploadUrl = start.headers['x-goog-upload-url'];
      if (typeof uploadUrl !== 'string' || uploadUrl.length === 0) {
        throw new RemoteServiceError('Gemini', 'uploadFile failed: no upload URL returned', 'permanent', start.status);
      }

      const finalize = await this.client.post(uploadUrl, bytes, {
        headers: {
          'Content-Type': mimeType,
          'X-Goog-Upload-Offset': '0',
          'X-Goog-Upload-Command': 'upload, finalize',
        },
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
        timeout: this.timeout,
        signal: options.signal,
      });

      const { file } = this.parse(UploadFileResponseSchema, finalize.data, 'uploadFile');
      logger.debug({ name: file.name, mimeType: file.mimeType, expirationTime: file.expirationTime }, 'Gemini file uploaded');
      return {
        name: file.name,
        uri: file.uri,
        mimeType: file.mimeType,
        expirationTime: file.expirationTime,
      };
    });
  }

  async createCachedContent(spec: CachedContentSpec, options: RemoteCallOptions = {}): Promise<CachedContentRef> {
    return this.call('createCachedContent', options, async () => {
      const response = await this.client.post(
        '/v1beta/cachedContents',
        {
          model: `models/${spec.model}`,
          displayName: spec.displayName,
          contents: spec.contents,
          ...(spec.systemInstruction ? { systemInstruction: { parts: [{ text: spec.systemInstruction }] } } : {}),
          ttl: `${spec.ttlSeconds}s`,
        },
        {
          params: { key: this.apiKey },
          timeout: this.timeout,
          signal: options.signal,
        }
      );

      const cache = this.parse(CachedContentResponseSchema, response.data, 'createCachedContent');
      logger.info({ name: cache.name, ttlSeconds: spec.ttlSeconds }, 'Created context cache');
      return { name: cache.name, expireTime: cache.expireTime };
    });
  }

  async generateContent(spec: GenerateContentSpec, options: RemoteCallOptions = {}): Promise<GenerateContentResult> {
    return this.call('generateContent', options, async () => {
      // The system instruction must live inside the cached content when one is used
      const systemInstruction = spec.cachedContent ? undefined : spec.systemInstruction;

      const response = await this.client.post(
        `/v1beta/models/${spec.model}:generateContent`,
        {
          contents: spec.contents,
          ...(systemInstruction ? { systemInstruction: { parts: [{ text: systemInstruction }] } } : {}),
          ...(spec.cachedContent ? { cachedContent: spec.cachedContent } : {}),
          generationConfig: {
            responseMimeType: spec.responseMimeType,
            temperature: spec.temperature,
          },
        },
        {
          params: { key: this.apiKey },
          timeout: this.timeout,
          signal: options.signal,
        }
      );

      const data = this.parse(GenerateContentResponseSchema, response.data, 'generateContent');
      const text = (data.candidates?.[0]?.content?.parts ?? [])
        .map(part => part.text ?? '')
        .join('');

      if (!text.trim()) {
        const blockReason = data.promptFeedback?.blockReason;
        throw new RemoteServiceError(
          'Gemini',
          blockReason ? `generateContent blocked: ${blockReason}` : 'Empty response from Gemini',
          'permanent',
          response.status,
          { reason: 'empty_response', finishReason: data.candidates?.[0]?.finishReason }
        );
      }

      return {
        text,
        model: data.modelVersion ?? spec.model,
        usage: toUsageCounters(data.usageMetadata),
      };
    });
  }

  private parse<T>(schema: ZodType<T>, data: unknown, operation: string): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new RemoteServiceError('Gemini', `${operation} returned an unexpected payload: ${result.error.message}`, 'permanent');
    }
    return result.data;
  }

  private call<T>(operation: string, options: RemoteCallOptions, request: () => Promise<T>): Promise<T> {
    return retryWithBackoff(
      async () => {
        try {
          return await request();
        } catch (error) {
          throw toRemoteFailure(error, operation, this.timeout);
        }
      },
      { maxAttempts: this.transientRetries, initialDelay: this.retryDelayMs, signal: options.signal },
      `gemini.${operation}`
    );
  }
}
