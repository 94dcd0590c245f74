/**
 * Cache key derivation
 *
 * Key format: "{operation}-{sha256(canonicalJson({operation, inputs}))}"
 *
 * Only the semantically relevant inputs of an operation may be passed in. Remote ids,
 * timestamps and local paths must stay out, otherwise reruns stop hitting the cache.
 */

import { computeValueFingerprint, type FingerprintInput } from '../../utils/fingerprints.js';

export type CacheOperation = 'upload' | 'context-cache' | 'invoke';

export function deriveCacheKey(operation: CacheOperation, inputs: FingerprintInput): string {
  return `${operation}-${computeValueFingerprint({ operation, inputs })}`;
}
