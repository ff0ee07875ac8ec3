import { describe, it, expect } from 'vitest';
import {
  constantTimeCompare,
  decrypt,
  decryptIfEncrypted,
  encrypt,
  encryptIfAvailable,
  generateSessionToken,
  hashSessionToken,
  isWellFormedSessionToken,
} from '@/utils/crypto';

const KEY = 'a'.repeat(64);

describe('session tokens', () => {
  it('generates 64 lowercase hex characters', () => {
    const token = generateSessionToken();
    expect(token).toMatch(/^[0-9a-f]{64}$/);
    expect(isWellFormedSessionToken(token)).toBe(true);
  });

  it('generates distinct tokens', () => {
    expect(generateSessionToken()).not.toBe(generateSessionToken());
  });

  it('rejects malformed tokens', () => {
    expect(isWellFormedSessionToken('')).toBe(false);
    expect(isWellFormedSessionToken('abc')).toBe(false);
    expect(isWellFormedSessionToken('G'.repeat(64))).toBe(false);
    expect(isWellFormedSessionToken('a'.repeat(65))).toBe(false);
  });

  it('hashes deterministically per secret', () => {
    const token = generateSessionToken();
    const hash = hashSessionToken(token, 'test-secret-one!');

    expect(hash).toHaveLength(64);
    expect(hashSessionToken(token, 'test-secret-one!')).toBe(hash);
    expect(hashSessionToken(token, 'test-secret-two!')).not.toBe(hash);
  });
});

describe('constantTimeCompare', () => {
  it('compares equal and unequal strings', () => {
    expect(constantTimeCompare('abc', 'abc')).toBe(true);
    expect(constantTimeCompare('abc', 'abd')).toBe(false);
    expect(constantTimeCompare('abc', 'abcd')).toBe(false);
  });
});

describe('AES-256-GCM', () => {
  it('decrypts what it encrypts', () => {
    const encrypted = encrypt('provider-token', KEY);
    expect(encrypted.split('.')).toHaveLength(3);
    expect(decrypt(encrypted, KEY)).toBe('provider-token');
  });

  it('fails on a wrong key', () => {
    const encrypted = encrypt('provider-token', KEY);
    expect(() => decrypt(encrypted, 'b'.repeat(64))).toThrow();
  });

  it('passes values through without a key', () => {
    expect(encryptIfAvailable('plain', undefined)).toBe('plain');
    expect(decryptIfEncrypted('plain', KEY)).toBe('plain');
    expect(decryptIfEncrypted(encryptIfAvailable('secret', KEY), KEY)).toBe('secret');
  });
});
