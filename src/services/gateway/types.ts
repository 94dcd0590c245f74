import { z } from 'zod';
import type { UsageCounters } from '../usage/types.js';

export const UploadHandleSchema = z.object({
  /** Remote resource name, e.g. "files/abc-123" */
  remoteId: z.string().min(1),
  uri: z.string().min(1),
  mimeType: z.string().min(1),
  /** ISO timestamp of the upload */
  issuedAt: z.string().datetime(),
  /** SHA-256 of the uploaded bytes */
  fingerprint: z.string().length(64),
});

export type UploadHandle = z.infer<typeof UploadHandleSchema>;

export const ContextCacheHandleSchema = z.object({
  /** Remote resource name, e.g. "cachedContents/xyz" */
  remoteId: z.string().min(1),
  createdAt: z.string().datetime(),
  exampleSetFingerprint: z.string().length(64),
});

export type ContextCacheHandle = z.infer<typeof ContextCacheHandleSchema>;

const UsageCountersSchema = z.object({
  inputTokens: z.number().int().nonnegative(),
  outputTokens: z.number().int().nonnegative(),
  cachedTokens: z.number().int().nonnegative(),
  totalTokens: z.number().int().nonnegative(),
});

/**
 * Stored model response. `usage` is what the original call cost.
 */
export const StoredInvocationSchema = z.object({
  text: z.string(),
  model: z.string(),
  usage: UsageCountersSchema,
});

export type StoredInvocation = z.infer<typeof StoredInvocationSchema>;

export interface DocumentInput {
  path: string;
  /** Overrides the extension lookup */
  mimeType?: string;
}

export interface ExampleSetSpec {
  /** Formatted example surveys, injected verbatim into the context */
  content: string;
  model: string;
  systemInstruction: string;
}

export interface InvocationSpec {
  /** Shown in logs, not part of the cache key */
  label: string;
  model: string;
  systemInstruction: string;
  prompt: string;
  document?: UploadHandle;
  /** When set, the system instruction is taken from the context cache */
  context?: ContextCacheHandle;
  responseMimeType: 'application/json' | 'text/plain';
  /** Default: 0 */
  temperature?: number;
  /**
   * Checks a fresh response before it is stored. Whatever it throws propagates and
   * nothing is cached, so a malformed response is not replayed on reruns.
   */
  validate?: (text: string) => void;
}

export interface InvocationResult {
  text: string;
  /** Zero when served from the cache */
  usage: UsageCounters;
  fromCache: boolean;
}

export interface GatewayCallOptions {
  signal?: AbortSignal;
}

export interface InvokeOptions extends GatewayCallOptions {
  /**
   * Receives the call's result once, as soon as it is known: right after a remote
   * response arrives and before `validate` runs, or on a cache hit.
   */
  onUsage?: (result: InvocationResult) => void;
}

export interface EnsureUploadedOptions extends GatewayCallOptions {
  /** Replace any cached handle with a fresh upload */
  force?: boolean;
}
