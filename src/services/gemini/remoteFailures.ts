/**
 * Classification of remote failures
 *
 * The Gemini API does not expose a dedicated "handle expired" code, so the rules are
 * deliberately conservative:
 *
 * - aborted or timed-out requests              → RemoteTimeoutError
 * - 429, 5xx, connection dropped with no reply  → transient (retried once)
 * - 404 whose message names a file or cached
 *   content                                     → invalid_handle
 * - 400/403 whose message names a file or cached
 *   content that is missing, expired or denied  → invalid_handle
 * - anything else                               → permanent
 *
 * An invalid_handle that was not caused by a stale handle will fail again after the
 * gateway's single re-creation and then fail the job, so misclassification costs at most
 * one extra upload.
 */

import axios from 'axios';
import { GoogleApiErrorSchema } from './geminiSchemas.js';
import { RemoteServiceError, RemoteTimeoutError, type RemoteFailureCategory } from '../../types/errors.js';

const SERVICE_NAME = 'Gemini';

const TRANSIENT_NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN', 'ERR_NETWORK']);
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

const HANDLE_MENTION = /(\bfiles\/|\bfile\b|cachedcontents\/|cached ?content)/i;
const HANDLE_GONE = /(does not exist|not found|expired|permission|not accessible|no longer)/i;

export function categorizeHttpFailure(status: number, message: string): RemoteFailureCategory {
  if (status === 429 || status >= 500) {
    return 'transient';
  }
  // An unknown model is a 404 too, and a fresh upload cannot fix it
  if (status === 404) {
    return HANDLE_MENTION.test(message) ? 'invalid_handle' : 'permanent';
  }
  if ((status === 400 || status === 403) && HANDLE_MENTION.test(message) && HANDLE_GONE.test(message)) {
    return 'invalid_handle';
  }
  return 'permanent';
}

function extractApiMessage(data: unknown, fallback: string): string {
  const parsed = GoogleApiErrorSchema.safeParse(data);
  if (parsed.success && parsed.data.error.message) {
    return parsed.data.error.message;
  }
  return fallback;
}

/**
 * Convert anything thrown by an axios call into the remote failure contract
 *
 * @param operation - label used in messages, e.g. "generateContent"
 * @param timeoutMs - budget the call ran with, for the timeout message
 */
export function toRemoteFailure(error: unknown, operation: string, timeoutMs: number): RemoteServiceError | RemoteTimeoutError {
  if (error instanceof RemoteServiceError || error instanceof RemoteTimeoutError) {
    return error;
  }

  if (axios.isCancel(error)) {
    return new RemoteTimeoutError(operation);
  }

  if (axios.isAxiosError(error)) {
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new RemoteTimeoutError(operation, timeoutMs);
    }

    if (error.response) {
      const status = error.response.status;
      const message = extractApiMessage(error.response.data, error.message);
      return new RemoteServiceError(SERVICE_NAME, `${operation} failed: ${message}`, categorizeHttpFailure(status, message), status, {
        operation,
      });
    }

    const category: RemoteFailureCategory = error.code && TRANSIENT_NETWORK_CODES.has(error.code) ? 'transient' : 'permanent';
    return new RemoteServiceError(SERVICE_NAME, `${operation} failed: ${error.message}`, category, undefined, {
      operation,
      code: error.code,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new RemoteServiceError(SERVICE_NAME, `${operation} failed: ${message}`, 'permanent', undefined, { operation });
}
