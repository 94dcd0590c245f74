/**
 * Remote Resource Gateway
 *
 * Cache-checked accessors for the three remote resources:
 * - uploaded documents (48h handles, keyed by content fingerprint + MIME type)
 * - context caches of example surveys (60min handles, keyed by example set + model + instruction)
 * - model invocations (permanent, keyed by every input of the call)
 *
 * Remote ids never enter a key. A rerun after a handle was replaced still hits the
 * invocation cache because the key only names the content the handle points at.
 */

import { promises as fs } from 'fs';
import { basename } from 'path';
import type { Logger } from 'pino';
import type { CacheStore } from '../cache/types.js';
import { TtlClass } from '../cache/types.js';
import { deriveCacheKey } from '../cache/cacheKeys.js';
import type { GeminiContent, GeminiPart, RemoteModelService } from '../gemini/types.js';
import { detectMimeType, isSupportedMimeType } from '../survey/mimeTypes.js';
import {
  ContextCacheHandleSchema,
  StoredInvocationSchema,
  UploadHandleSchema,
  type ContextCacheHandle,
  type DocumentInput,
  type EnsureUploadedOptions,
  type ExampleSetSpec,
  type GatewayCallOptions,
  type InvocationResult,
  type InvocationSpec,
  type InvokeOptions,
  type UploadHandle,
} from './types.js';
import { computeBytesFingerprint, computeTextFingerprint } from '../../utils/fingerprints.js';
import { isInvalidHandleError, isRemoteServiceError, RemoteTimeoutError, UploadError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import { ZERO_USAGE } from '../usage/types.js';

export interface RemoteResourceGatewayConfig {
  store: CacheStore;
  service: RemoteModelService;
  /** Lifetime requested for remote context caches */
  contextTtlSeconds: number;
  readFile?: (path: string) => Promise<Buffer>;
  logger?: Logger;
}

function toUploadFailure(error: unknown, path: string): Error {
  if (error instanceof RemoteTimeoutError || error instanceof UploadError) {
    return error;
  }
  if (isRemoteServiceError(error)) {
    return new UploadError(`Upload of ${path} rejected: ${error.message}`, error, error.category === 'transient');
  }
  return new UploadError(`Upload of ${path} failed`, error);
}

export class RemoteResourceGateway {
  private readonly store: CacheStore;
  private readonly service: RemoteModelService;
  private readonly contextTtlSeconds: number;
  private readonly readFile: (path: string) => Promise<Buffer>;
  private readonly logger: Logger;

  constructor(config: RemoteResourceGatewayConfig) {
    this.store = config.store;
    this.service = config.service;
    this.contextTtlSeconds = config.contextTtlSeconds;
    this.readFile = config.readFile ?? ((path: string) => fs.readFile(path));
    this.logger = config.logger ?? logger;
  }

  /**
   * Return a valid upload handle for the document, uploading it on a miss.
   *
   * @throws {UploadError} unreadable file, unsupported MIME type or remote rejection
   * @throws {RemoteTimeoutError}
   */
  async ensureUploaded(document: DocumentInput, options: EnsureUploadedOptions = {}): Promise<UploadHandle> {
    return this.upload(document, options, options.force ? () => true : undefined);
  }

  /**
   * Return a valid context cache handle for the example set, creating it on a miss.
   * Remote failures propagate unchanged.
   */
  async ensureContextCache(spec: ExampleSetSpec, options: GatewayCallOptions = {}): Promise<ContextCacheHandle> {
    return this.createContext(spec, options);
  }

  /**
   * Run a model call through the permanent invocation cache.
   * A hit costs nothing and reports zero usage. Remote failures propagate unchanged.
   * A billed response that fails `validate` still reaches `options.onUsage`.
   */
  async invoke(spec: InvocationSpec, options: InvokeOptions = {}): Promise<InvocationResult> {
    const { onUsage, ...callOptions } = options;
    const temperature = spec.temperature ?? 0;
    const key = deriveCacheKey('invoke', {
      model: spec.model,
      systemInstruction: computeTextFingerprint(spec.systemInstruction),
      prompt: computeTextFingerprint(spec.prompt),
      responseMimeType: spec.responseMimeType,
      temperature,
      documents: spec.document ? [spec.document.fingerprint] : [],
      examples: spec.context?.exampleSetFingerprint,
    });

    const parts: GeminiPart[] = [{ text: spec.prompt }];
    if (spec.document) {
      parts.push({ fileData: { fileUri: spec.document.uri, mimeType: spec.document.mimeType } });
    }
    const contents: GeminiContent[] = [{ role: 'user', parts }];

    const { value, created } = await this.store.getOrCreate(key, TtlClass.PERMANENT, StoredInvocationSchema, async () => {
      const result = await this.service.generateContent(
        {
          model: spec.model,
          contents,
          systemInstruction: spec.systemInstruction,
          cachedContent: spec.context?.remoteId,
          responseMimeType: spec.responseMimeType,
          temperature,
        },
        callOptions
      );
      onUsage?.({ text: result.text, usage: result.usage, fromCache: false });
      spec.validate?.(result.text);
      this.logger.info(
        {
          call: spec.label,
          model: result.model,
          inputTokens: result.usage.inputTokens,
          outputTokens: result.usage.outputTokens,
          totalTokens: result.usage.totalTokens,
          cachedTokens: result.usage.cachedTokens,
        },
        `${spec.label} completed`
      );
      return { text: result.text, model: result.model, usage: result.usage };
    });

    if (!created) {
      this.logger.info({ call: spec.label, key }, `${spec.label} served from cache`);
      const hit: InvocationResult = { text: value.text, usage: { ...ZERO_USAGE }, fromCache: true };
      onUsage?.(hit);
      return hit;
    }
    return { text: value.text, usage: value.usage, fromCache: false };
  }

  /**
   * Run `use` with the document's upload handle. If the remote side rejects the handle
   * as invalid, the handle is replaced by a fresh upload and `use` runs once more.
   */
  async withUploadedDocument<T>(
    document: DocumentInput,
    use: (handle: UploadHandle) => Promise<T>,
    options: GatewayCallOptions = {}
  ): Promise<T> {
    const handle = await this.ensureUploaded(document, options);
    try {
      return await use(handle);
    } catch (error) {
      if (!isInvalidHandleError(error)) {
        throw error;
      }
      this.logger.warn({ remoteId: handle.remoteId, file: document.path }, 'Upload handle rejected, re-uploading');
      const fresh = await this.upload(document, options, cached => cached.remoteId === handle.remoteId);
      return use(fresh);
    }
  }

  /**
   * Run `use` with the example set's context cache handle, re-creating the
   * context once if the remote side rejects it.
   */
  async withContextCache<T>(
    spec: ExampleSetSpec,
    use: (handle: ContextCacheHandle) => Promise<T>,
    options: GatewayCallOptions = {}
  ): Promise<T> {
    const handle = await this.ensureContextCache(spec, options);
    try {
      return await use(handle);
    } catch (error) {
      if (!isInvalidHandleError(error)) {
        throw error;
      }
      this.logger.warn({ remoteId: handle.remoteId }, 'Context cache rejected, re-creating');
      const fresh = await this.createContext(spec, options, cached => cached.remoteId === handle.remoteId);
      return use(fresh);
    }
  }

  private async upload(
    document: DocumentInput,
    options: GatewayCallOptions,
    isStale?: (cached: UploadHandle) => boolean
  ): Promise<UploadHandle> {
    const mimeType = detectMimeType(document.path, document.mimeType);
    if (!mimeType || !isSupportedMimeType(mimeType)) {
      throw new UploadError(`Unsupported MIME type for ${document.path}: ${mimeType ?? 'unknown'}`);
    }

    let bytes: Buffer;
    try {
      bytes = await this.readFile(document.path);
    } catch (error) {
      throw new UploadError(`Cannot read ${document.path}`, error);
    }

    const fingerprint = computeBytesFingerprint(bytes);
    const key = deriveCacheKey('upload', { fingerprint, mimeType });

    const { value, created } = await this.store.getOrCreate(
      key,
      TtlClass.HOURS_48,
      UploadHandleSchema,
      async () => {
        this.logger.debug({ file: document.path, mimeType }, 'Uploading document');
        try {
          const file = await this.service.uploadFile(bytes, mimeType, basename(document.path), options);
          return {
            remoteId: file.name,
            uri: file.uri,
            mimeType: file.mimeType,
            issuedAt: new Date().toISOString(),
            fingerprint,
          };
        } catch (error) {
          throw toUploadFailure(error, document.path);
        }
      },
      { isStale }
    );

    if (!created) {
      this.logger.debug({ file: document.path, remoteId: value.remoteId }, 'Reusing uploaded document');
    }
    return value;
  }

  private async createContext(
    spec: ExampleSetSpec,
    options: GatewayCallOptions,
    isStale?: (cached: ContextCacheHandle) => boolean
  ): Promise<ContextCacheHandle> {
    const exampleSetFingerprint = computeTextFingerprint(spec.content);
    const key = deriveCacheKey('context-cache', {
      examples: exampleSetFingerprint,
      model: spec.model,
      systemInstruction: computeTextFingerprint(spec.systemInstruction),
    });

    const { value } = await this.store.getOrCreate(
      key,
      TtlClass.MINUTES_60,
      ContextCacheHandleSchema,
      async () => {
        const ref = await this.service.createCachedContent(
          {
            model: spec.model,
            displayName: 'Survey Examples Cache',
            contents: [{ role: 'user', parts: [{ text: spec.content }] }],
            systemInstruction: spec.systemInstruction,
            ttlSeconds: this.contextTtlSeconds,
          },
          options
        );
        return { remoteId: ref.name, createdAt: new Date().toISOString(), exampleSetFingerprint };
      },
      { isStale }
    );

    return value;
  }
}
