/**
 * Remote model service boundary
 *
 * The pipeline never talks to Gemini directly: it goes through the gateway, which
 * goes through this interface. Tests substitute in-process fakes.
 */

import type { UsageCounters } from '../usage/types.js';

export type GeminiPart =
  | { text: string }
  | { fileData: { fileUri: string; mimeType: string } };

export interface GeminiContent {
  role: 'user' | 'model';
  parts: GeminiPart[];
}

export interface UploadedFile {
  /** Resource name, e.g. "files/abc-123" */
  name: string;
  uri: string;
  mimeType: string;
  /** Server-side expiry (RFC 3339), when reported */
  expirationTime?: string;
}

export interface CachedContentSpec {
  model: string;
  displayName: string;
  contents: GeminiContent[];
  systemInstruction?: string;
  ttlSeconds: number;
}

export interface CachedContentRef {
  /** Resource name, e.g. "cachedContents/xyz" */
  name: string;
  expireTime?: string;
}

export interface GenerateContentSpec {
  model: string;
  contents: GeminiContent[];
  /** Ignored by the service when cachedContent carries one */
  systemInstruction?: string;
  cachedContent?: string;
  responseMimeType: 'application/json' | 'text/plain';
  temperature: number;
}

export interface GenerateContentResult {
  text: string;
  model: string;
  usage: UsageCounters;
}

export interface RemoteCallOptions {
  /** Aborting rejects the call with RemoteTimeoutError */
  signal?: AbortSignal;
}

/**
 * Failure contract: implementations reject with RemoteServiceError (categorized)
 * or RemoteTimeoutError.
 */
export interface RemoteModelService {
  uploadFile(bytes: Buffer, mimeType: string, displayName: string, options?: RemoteCallOptions): Promise<UploadedFile>;

  createCachedContent(spec: CachedContentSpec, options?: RemoteCallOptions): Promise<CachedContentRef>;

  generateContent(spec: GenerateContentSpec, options?: RemoteCallOptions): Promise<GenerateContentResult>;
}
