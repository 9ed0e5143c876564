import { describe, it, expect } from 'vitest';
import { maskSensitiveStrings, sanitizeForLogging } from '../../src/utils/sanitize.js';

describe('sanitizeForLogging', () => {
  it('should pass through primitives', () => {
    expect(sanitizeForLogging(null)).toBeNull();
    expect(sanitizeForLogging(undefined)).toBeUndefined();
    expect(sanitizeForLogging(42)).toBe(42);
    expect(sanitizeForLogging(false)).toBe(false);
  });

  it('should redact sensitive keys recursively', () => {
    const result = sanitizeForLogging({
      apiKey: 'test-secret',
      nested: { token: 'test-secret', name: 'guide' },
      list: ['sk-abcdefghijklmnopqrstuvwx'],
    });

    expect(result).toEqual({
      apiKey: '***REDACTED***',
      nested: { token: '***REDACTED***', name: 'guide' },
      list: ['sk-...***REDACTED***'],
    });
  });
});

describe('maskSensitiveStrings', () => {
  it('should mask provider keys keeping a short prefix', () => {
    expect(maskSensitiveStrings('key sk-ant-REDACTED used')).toBe(
      'key sk-...***REDACTED*** used'
    );
  });

  it('should mask bearer tokens', () => {
    expect(maskSensitiveStrings('Authorization: Bearer abc.def')).toBe(
      'Authorization: Bea...***REDACTED***'
    );
  });

  it('should leave short sk- words alone', () => {
    expect(maskSensitiveStrings('ask-me later')).toBe('ask-me later');
  });
});
