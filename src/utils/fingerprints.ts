/**
 * Fingerprint Utilities
 *
 * Deterministic fingerprinting of documents, example sets and model call inputs.
 * Fingerprints are the only thing cache keys are built from, so two logically identical
 * inputs must always produce the same digest regardless of object key order or line endings.
 */

import { createHash } from 'crypto';

/**
 * Value accepted by canonicalJson
 */
export type FingerprintInput =
  | string
  | number
  | boolean
  | null
  | undefined
  | FingerprintInput[]
  | { [key: string]: FingerprintInput };

/**
 * Normalize text for fingerprinting:
 * - Normalize newlines to \n
 * - Trim trailing whitespace at end of text
 *
 * Inner whitespace is preserved: prompts and example surveys are whitespace sensitive.
 */
export function normalizeTextForFingerprint(text: string): string {
  return text
    .replace(/\r\n/g, '\n') // Normalize Windows line endings
    .replace(/\r/g, '\n') // Normalize Mac line endings
    .trimEnd();
}

/**
 * Serialize a value to JSON with object keys sorted recursively.
 * `undefined` object members are dropped, `undefined` array items become null,
 * matching JSON.stringify.
 */
export function canonicalJson(value: FingerprintInput): string {
  if (value === undefined) {
    return 'null';
  }
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(item => canonicalJson(item)).join(',')}]`;
  }
  const members = Object.keys(value)
    .sort()
    .filter(key => value[key] !== undefined)
    .map(key => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
  return `{${members.join(',')}}`;
}

/**
 * SHA-256 of raw bytes (uploaded documents)
 *
 * @returns 64-character hex string
 */
export function computeBytesFingerprint(bytes: Buffer): string {
  return createHash('sha256').update(bytes).digest('hex');
}

/**
 * SHA-256 of normalized text
 *
 * @returns 64-character hex string
 */
export function computeTextFingerprint(text: string): string {
  return createHash('sha256').update(normalizeTextForFingerprint(text), 'utf8').digest('hex');
}

/**
 * SHA-256 of the canonical JSON of a structured value
 *
 * @returns 64-character hex string
 */
export function computeValueFingerprint(value: FingerprintInput): string {
  return createHash('sha256').update(canonicalJson(value), 'utf8').digest('hex');
}
