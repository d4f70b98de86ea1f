import { describe, it, expect } from 'vitest';
import { constantTimeEquals, generateToken, sha256, shortMd5 } from '../../../src/utils/crypto.js';

describe('crypto helpers', () => {
  it('should hash with SHA-256', () => {
    expect(sha256('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('should take the first 8 hex characters of MD5', () => {
    expect(shortMd5('abc')).toBe('90015098');
  });

  it('should generate prefixed url-safe tokens', () => {
    const token = generateToken('upl');
    expect(token).toMatch(/^upl_[A-Za-z0-9_-]{32}$/);
    expect(generateToken('upl')).not.toBe(token);
  });

  it('should compare strings', () => {
    expect(constantTimeEquals('test-secret', 'test-secret')).toBe(true);
    expect(constantTimeEquals('test-secret', 'test-secreT')).toBe(false);
    expect(constantTimeEquals('short', 'longer-value')).toBe(false);
  });
});
