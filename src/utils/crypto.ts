/**
 * Cryptographic Utilities
 *
 * Session token generation and hashing, constant-time comparison, and
 * AES-256-GCM encryption for OAuth provider tokens at rest.
 */

import crypto from 'crypto';
import { logger } from '@/utils/logger';

const SESSION_TOKEN_PATTERN = /^[0-9a-f]{64}$/;

/**
 * Generate a secure session token
 *
 * @returns Random session token (64 hex chars, 256 bits)
 */
export function generateSessionToken(): string {
  return crypto.randomBytes(32).toString('hex');
}

/**
 * Whether a string has the shape of a token from generateSessionToken()
 */
export function isWellFormedSessionToken(token: string): boolean {
  return SESSION_TOKEN_PATTERN.test(token);
}

/**
 * Hash a session token for storage
 *
 * Keyed with the session secret, so a leaked sessions table alone cannot be
 * used to check guessed tokens.
 *
 * @returns HMAC-SHA256 (hex string, 64 chars)
 */
export function hashSessionToken(token: string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(token).digest('hex');
}

/**
 * Constant-time string comparison
 *
 * Prevents timing attacks by ensuring comparison
 * takes the same time regardless of where strings differ.
 */
export function constantTimeCompare(a: string, b: string): boolean {
  try {
    const bufA = Buffer.from(a, 'utf8');
    const bufB = Buffer.from(b, 'utf8');

    // Length check is not timing-safe, but needed for timingSafeEqual
    if (bufA.length !== bufB.length) {
      crypto.timingSafeEqual(bufA, bufA);
      return false;
    }

    return crypto.timingSafeEqual(bufA, bufB);
  } catch (error) {
    logger.error('Error in constant time comparison', { error: String(error) });
    return false;
  }
}

// ─── AES-256-GCM Encryption ─────────────────────

function parseKey(hexKey: string): Buffer {
  const keyBuf = Buffer.from(hexKey, 'hex');
  if (keyBuf.length !== 32) throw new Error('Encryption key must be 32 bytes (64 hex chars)');
  return keyBuf;
}

/**
 * Encrypt a plaintext string using AES-256-GCM
 *
 * Format: iv.authTag.ciphertext (all base64)
 */
export function encrypt(plaintext: string, hexKey: string): string {
  const keyBuf = parseKey(hexKey);
  const iv = crypto.randomBytes(12);
  const cipher = crypto.createCipheriv('aes-256-gcm', keyBuf, iv);
  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  const authTag = cipher.getAuthTag();

  return `${iv.toString('base64')}.${authTag.toString('base64')}.${encrypted.toString('base64')}`;
}

/**
 * Decrypt an AES-256-GCM encrypted string
 *
 * @throws Error if decryption fails (tampered data, wrong key, etc.)
 */
export function decrypt(encryptedStr: string, hexKey: string): string {
  const keyBuf = parseKey(hexKey);

  const [ivB64, tagB64, dataB64] = encryptedStr.split('.');
  if (!ivB64 || !tagB64 || !dataB64) throw new Error('Invalid encrypted format');

  const iv = Buffer.from(ivB64, 'base64');
  const authTag = Buffer.from(tagB64, 'base64');
  const encrypted = Buffer.from(dataB64, 'base64');

  const decipher = crypto.createDecipheriv('aes-256-gcm', keyBuf, iv);
  decipher.setAuthTag(authTag);
  return decipher.update(encrypted, undefined, 'utf8') + decipher.final('utf8');
}

/**
 * Encrypt when a key is configured, otherwise return as-is
 * (local development without ENCRYPTION_KEY).
 */
export function encryptIfAvailable(plaintext: string, hexKey: string | undefined): string {
  if (!hexKey) return plaintext;
  return encrypt(plaintext, hexKey);
}

/**
 * Decrypt a value written by encryptIfAvailable()
 */
export function decryptIfEncrypted(value: string, hexKey: string | undefined): string {
  const parts = value.split('.');
  if (parts.length !== 3) return value;
  if (!hexKey) return value;
  return decrypt(value, hexKey);
}
