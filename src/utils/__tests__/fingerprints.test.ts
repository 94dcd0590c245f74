import { describe, it, expect } from 'vitest';
import {
  canonicalJson,
  computeBytesFingerprint,
  computeTextFingerprint,
  computeValueFingerprint,
  normalizeTextForFingerprint,
} from '../fingerprints.js';
import { deriveCacheKey } from '../../services/cache/cacheKeys.js';

describe('fingerprints', () => {
  describe('canonicalJson', () => {
    it('sorts object keys recursively and drops undefined members', () => {
      expect(canonicalJson({ b: 1, a: [1, { d: 2, c: undefined }] })).toBe('{"a":[1,{"d":2}],"b":1}');
    });

    it('writes undefined array items as null', () => {
      expect(canonicalJson([undefined, 'x'])).toBe('[null,"x"]');
    });
  });

  it('normalizes line endings and trailing whitespace only', () => {
    expect(normalizeTextForFingerprint('a\r\nb\r  c\n  ')).toBe('a\nb\n  c');
  });

  it('hashes raw bytes with sha256', () => {
    expect(computeBytesFingerprint(Buffer.from('abc'))).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
  });

  it('gives the same text fingerprint regardless of line endings', () => {
    expect(computeTextFingerprint('line one\r\nline two\r\n')).toBe(computeTextFingerprint('line one\nline two'));
    expect(computeTextFingerprint('line one')).not.toBe(computeTextFingerprint('line  one'));
  });

  it('gives the same value fingerprint regardless of key order', () => {
    expect(computeValueFingerprint({ a: 1, b: { c: true, d: null } })).toBe(
      computeValueFingerprint({ b: { d: null, c: true }, a: 1 })
    );
  });

  describe('deriveCacheKey', () => {
    it('prefixes the operation to a 64 character digest', () => {
      expect(deriveCacheKey('upload', { fingerprint: 'abc', mimeType: 'application/pdf' })).toMatch(
        /^upload-[0-9a-f]{64}$/
      );
    });

    it('separates operations with identical inputs', () => {
      const inputs = { model: 'gemini-test' };
      expect(deriveCacheKey('invoke', inputs).slice('invoke-'.length)).not.toBe(
        deriveCacheKey('context-cache', inputs).slice('context-cache-'.length)
      );
    });

    it('is stable for reordered inputs', () => {
      expect(deriveCacheKey('invoke', { prompt: 'p', model: 'm' })).toBe(
        deriveCacheKey('invoke', { model: 'm', prompt: 'p' })
      );
    });
  });
});
